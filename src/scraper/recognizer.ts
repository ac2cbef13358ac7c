import OpenAI from 'openai'
import { RecognitionUnavailableError } from './errors.js'

/** Turns a rendered formula image (PNG bytes) into LaTeX source. */
export interface FormulaRecognizer {
  recognize(image: Buffer): Promise<string>
}

export type RecognizerFactory = () => FormulaRecognizer | Promise<FormulaRecognizer>

const SYSTEM_PROMPT = [
  'You transcribe images of mathematical formulas into LaTeX.',
  'Reply with the LaTeX source only: no dollar signs, no code fences, no commentary.',
].join(' ')

const stripDelimiters = (value: string) =>
  value
    .trim()
    .replace(/^```(?:latex|tex)?\s*/i, '')
    .replace(/\s*```$/, '')
    .replace(/^\$+|\$+$/g, '')
    .trim()

class OpenAiFormulaRecognizer implements FormulaRecognizer {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async recognize(image: Buffer) {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: [
            {
              type: 'image_url',
              image_url: { url: `data:image/png;base64,${image.toString('base64')}` },
            },
          ],
        },
      ],
    })
    return stripDelimiters(completion.choices[0]?.message?.content ?? '')
  }
}

export const createOpenAiRecognizerFactory =
  (options: { apiKey: string; model: string }): RecognizerFactory =>
  () => {
    if (!options.apiKey) {
      throw new RecognitionUnavailableError(
        'Formula recognition requires OPENAI_API_KEY to be set.',
      )
    }
    return new OpenAiFormulaRecognizer(new OpenAI({ apiKey: options.apiKey }), options.model)
  }
