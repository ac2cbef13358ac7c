import { createLogger, type Logger } from '../lib/logger.js'
import { getCatalog } from './catalog.js'
import { RecognitionUnavailableError } from './errors.js'
import { FormulaPipeline, LazyRecognizer } from './formulas.js'
import { generatePdf, generateTest } from './generator.js'
import { RequestExecutor } from './http.js'
import { getTestProblems, getThemeProblems, searchProblems } from './listing.js'
import { extractProblem } from './problem.js'
import { rasterizeSvg, type Rasterizer } from './rasterize.js'
import type { RecognizerFactory } from './recognizer.js'
import { Session, type FetchLike } from './session.js'
import type {
  CatalogEntry,
  PdfOptions,
  Problem,
  Scope,
  ScopeOverride,
  TestSelection,
} from './types.js'

export type SdamGiaClientOptions = {
  examType?: Scope['examType']
  subject?: Scope['subject']
  fetch?: FetchLike
  timeoutMs?: number
  /** Builds the formula recognizer; only called once text recognition is requested. */
  recognizer?: RecognizerFactory
  rasterize?: Rasterizer
  /** Upper bound on formula images processed at once. */
  formulaConcurrency?: number
  logger?: Logger
}

export type CallOptions = {
  scope?: ScopeOverride
}

export type ProblemOptions = CallOptions & {
  recognizeText?: boolean
}

const missingRecognizer: RecognizerFactory = () => {
  throw new RecognitionUnavailableError('No formula recognizer was configured.')
}

export class SdamGiaClient {
  readonly scope: Readonly<Scope>
  private readonly session: Session
  private readonly executor: RequestExecutor
  private readonly formulas: FormulaPipeline
  private readonly logger: Logger

  constructor(options: SdamGiaClientOptions = {}) {
    this.scope = Object.freeze({
      examType: options.examType ?? 'ege',
      subject: options.subject ?? 'math',
    })
    this.logger = options.logger ?? createLogger('sdamgia')
    this.session = new Session({ fetch: options.fetch, timeoutMs: options.timeoutMs })
    this.executor = new RequestExecutor(this.session, this.logger)
    this.formulas = new FormulaPipeline({
      fetchImage: (url) => this.executor.fetchBytes(url),
      rasterize: options.rasterize ?? rasterizeSvg,
      recognizer: new LazyRecognizer(options.recognizer ?? missingRecognizer),
      concurrency: Math.max(1, options.formulaConcurrency ?? 4),
      logger: this.logger,
    })
  }

  get closed() {
    return this.session.closed
  }

  /** The client's default scope with the override applied, for one call. */
  resolveScope(override: ScopeOverride = {}): Scope {
    return {
      examType: override.examType ?? this.scope.examType,
      subject: override.subject ?? this.scope.subject,
    }
  }

  getProblem(problemId: number, options: ProblemOptions = {}): Promise<Problem> {
    return extractProblem(
      this.executor,
      this.formulas,
      this.resolveScope(options.scope),
      problemId,
      options.recognizeText ?? false,
    )
  }

  search(query: string, options: CallOptions = {}): Promise<number[]> {
    return searchProblems(this.executor, this.resolveScope(options.scope), query, this.logger)
  }

  getTest(testId: number, options: CallOptions = {}): Promise<number[]> {
    return getTestProblems(this.executor, this.resolveScope(options.scope), testId)
  }

  getTheme(themeId: number, options: CallOptions = {}): Promise<string[]> {
    return getThemeProblems(this.executor, this.resolveScope(options.scope), themeId, this.logger)
  }

  getCatalog(options: CallOptions = {}): Promise<CatalogEntry[]> {
    return getCatalog(this.executor, this.resolveScope(options.scope))
  }

  generateTest(selection?: TestSelection, options: CallOptions = {}): Promise<number> {
    return generateTest(this.executor, this.resolveScope(options.scope), selection)
  }

  generatePdf(testId: number, pdfOptions: PdfOptions = {}, options: CallOptions = {}) {
    return generatePdf(this.executor, this.resolveScope(options.scope), testId, pdfOptions)
  }

  close() {
    this.session.close()
  }
}

/** Runs `fn` with a fresh client and closes it however `fn` ends. */
export const withSdamGiaClient = async <T>(
  options: SdamGiaClientOptions,
  fn: (client: SdamGiaClient) => Promise<T>,
): Promise<T> => {
  const client = new SdamGiaClient(options)
  try {
    return await fn(client)
  } finally {
    client.close()
  }
}
