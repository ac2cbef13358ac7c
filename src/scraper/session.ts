import { CookieJar } from '../utils/cookieJar.js'
import { SdamGiaError, TransportError } from './errors.js'

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>

/** Consumes a response; runs while the request's timeout and abort still apply. */
export type ResponseReader<T> = (response: Response) => Promise<T>

export type SessionOptions = {
  fetch?: FetchLike
  /** Per-request timeout in milliseconds; 0 disables it. */
  timeoutMs?: number
  userAgent?: string
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'

/**
 * One transport shared by every call made through a client. Keeps the site's
 * cookies between requests and must be closed when the client is done.
 */
export class Session {
  private readonly fetchImpl: FetchLike
  private readonly timeoutMs: number
  private readonly userAgent: string
  private readonly cookies = new CookieJar()
  private readonly controller = new AbortController()

  constructor(options: SessionOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch
    this.timeoutMs = options.timeoutMs ?? 0
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
  }

  get closed() {
    return this.controller.signal.aborted
  }

  /**
   * Sends a GET and hands the response to `read`. The timeout and `close()`
   * stay in force until `read` settles, so they cover the body as well.
   */
  async request<T>(
    url: URL,
    read: ResponseReader<T>,
    redirect: 'follow' | 'manual' = 'follow',
  ): Promise<T> {
    const target = url.toString()
    if (this.closed) {
      throw new TransportError(target, 'Session is closed')
    }

    const request = new AbortController()
    const abort = () => request.abort()
    this.controller.signal.addEventListener('abort', abort, { once: true })
    const timer =
      this.timeoutMs > 0 ? setTimeout(abort, this.timeoutMs) : undefined

    const headers: Record<string, string> = { 'user-agent': this.userAgent }
    const cookieHeader = this.cookies.header()
    if (cookieHeader) {
      headers.cookie = cookieHeader
    }

    const failure = (fallback: string, error: unknown) => {
      const reason = this.closed
        ? 'Session closed during request'
        : request.signal.aborted
          ? `Request timed out after ${this.timeoutMs}ms`
          : fallback
      return new TransportError(target, reason, { cause: error })
    }

    try {
      let response: Response
      try {
        response = await this.fetchImpl(target, {
          method: 'GET',
          headers,
          redirect,
          signal: request.signal,
        })
      } catch (error) {
        throw failure('Request failed', error)
      }
      this.cookies.ingest(response.headers)

      try {
        return await read(response)
      } catch (error) {
        if (error instanceof SdamGiaError) {
          throw error
        }
        throw failure('Reading the response failed', error)
      }
    } finally {
      if (timer) {
        clearTimeout(timer)
      }
      this.controller.signal.removeEventListener('abort', abort)
    }
  }

  close() {
    if (this.closed) {
      return
    }
    this.controller.abort()
    this.cookies.clear()
  }
}
