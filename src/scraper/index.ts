export { SdamGiaClient, withSdamGiaClient } from './client.js'
export type { CallOptions, ProblemOptions, SdamGiaClientOptions } from './client.js'
export * from './errors.js'
export { createOpenAiRecognizerFactory } from './recognizer.js'
export type { FormulaRecognizer, RecognizerFactory } from './recognizer.js'
export type { Rasterizer } from './rasterize.js'
export type { FetchLike } from './session.js'
export * from './types.js'
