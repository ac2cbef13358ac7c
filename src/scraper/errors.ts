export class SdamGiaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Network-level failure, including requests made on a closed session. */
export class TransportError extends SdamGiaError {
  readonly url: string

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${url})`, options)
    this.url = url
  }
}

export class HttpStatusError extends SdamGiaError {
  readonly status: number
  readonly url: string

  constructor(status: number, url: string) {
    super(`Unexpected HTTP status ${status} for ${url}`)
    this.status = status
    this.url = url
  }
}

export class ProblemNotFoundError extends SdamGiaError {
  readonly problemId: number

  constructor(problemId: number) {
    super(`Problem ${problemId} not found.`)
    this.problemId = problemId
  }
}

export class MissingRedirectError extends SdamGiaError {
  readonly url: string

  constructor(url: string) {
    super(`Expected a Location header from ${url}`)
    this.url = url
  }
}

/** The generation endpoint redirected somewhere that carries no test id. */
export class UnexpectedRedirectError extends SdamGiaError {
  readonly location: string

  constructor(location: string) {
    super(`Redirect target carries no test id: ${location}`)
    this.location = location
  }
}

export class RecognitionUnavailableError extends SdamGiaError {}
