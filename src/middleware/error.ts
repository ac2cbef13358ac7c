import type { ErrorRequestHandler } from 'express'
import { createLogger } from '../lib/logger.js'
import {
  HttpStatusError,
  MissingRedirectError,
  ProblemNotFoundError,
  RecognitionUnavailableError,
  TransportError,
  UnexpectedRedirectError,
} from '../scraper/errors.js'

const logger = createLogger('http')

export class BadRequestError extends Error {
  readonly status = 400
}

const statusFor = (error: unknown) => {
  if (error instanceof BadRequestError) {
    return 400
  }
  if (error instanceof ProblemNotFoundError) {
    return 404
  }
  if (error instanceof RecognitionUnavailableError) {
    return 503
  }
  if (
    error instanceof HttpStatusError ||
    error instanceof TransportError ||
    error instanceof MissingRedirectError ||
    error instanceof UnexpectedRedirectError
  ) {
    return 502
  }
  return 500
}

export const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  const status = statusFor(error)
  const message = error instanceof Error ? error.message : 'Unexpected error.'

  if (status >= 500) {
    logger.error({ err: error, method: req.method, path: req.originalUrl }, 'Request failed')
  } else {
    logger.warn({ method: req.method, path: req.originalUrl, status, message }, 'Request rejected')
  }

  res.status(status).json({ error: status === 500 ? 'Internal server error.' : message })
}
