import { env } from '../config.js'
import { createLogger } from '../lib/logger.js'
import { SdamGiaClient, type SdamGiaClientOptions } from '../scraper/client.js'
import { createOpenAiRecognizerFactory } from '../scraper/recognizer.js'

export const clientOptionsFromEnv = (): SdamGiaClientOptions => ({
  examType: env.examType,
  subject: env.subject,
  timeoutMs: env.requestTimeoutMs,
  formulaConcurrency: env.formulaConcurrency,
  recognizer: createOpenAiRecognizerFactory({
    apiKey: env.openaiApiKey,
    model: env.openaiFormulaModel,
  }),
  logger: createLogger('sdamgia'),
})

export const createSdamGiaClient = () => new SdamGiaClient(clientOptionsFromEnv())
