import pMap from 'p-map'
import type { Logger } from '../lib/logger.js'
import { RecognitionUnavailableError } from './errors.js'
import type { Rasterizer } from './rasterize.js'
import type { FormulaRecognizer, RecognizerFactory } from './recognizer.js'
import { wrapFormula } from './text.js'

/**
 * Builds the recognizer on first use and hands the same instance to every
 * later caller. A failed build is remembered: later calls fail the same way
 * without calling the factory again.
 */
export class LazyRecognizer {
  private pending: Promise<FormulaRecognizer> | null = null

  constructor(private readonly factory: RecognizerFactory) {}

  get() {
    if (!this.pending) {
      this.pending = this.build()
    }
    return this.pending
  }

  private async build() {
    try {
      return await this.factory()
    } catch (error) {
      if (error instanceof RecognitionUnavailableError) {
        throw error
      }
      throw new RecognitionUnavailableError('Formula recognizer could not be created.', {
        cause: error,
      })
    }
  }
}

export type FormulaPipelineOptions = {
  fetchImage: (url: string) => Promise<Buffer>
  rasterize: Rasterizer
  recognizer: LazyRecognizer
  concurrency: number
  logger: Logger
}

export class FormulaPipeline {
  constructor(private readonly options: FormulaPipelineOptions) {}

  /** Recognized `$…$` text for each formula image URL. */
  async resolve(urls: readonly string[]): Promise<Map<string, string>> {
    const unique = Array.from(new Set(urls))
    if (unique.length === 0) {
      return new Map()
    }

    const { fetchImage, rasterize, concurrency, logger } = this.options
    const recognizer = await this.options.recognizer.get()

    const entries = await pMap(
      unique,
      async (url): Promise<[string, string]> => {
        const bitmap = await rasterize(await fetchImage(url))
        const text = await recognizer.recognize(bitmap)
        return [url, wrapFormula(text)]
      },
      { concurrency },
    )

    logger.debug({ count: entries.length }, 'Recognized formula images')
    return new Map(entries)
  }
}
