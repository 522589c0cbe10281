/**
 * HTTP client module exports
 */

export { RestClient } from './restClient.js'
export type { DoOptions, Requester } from './restClient.js'
export {
  calculateBackoffSeconds,
  execute,
  jsonObject,
  passthrough,
  sleep,
} from './retry.js'
export type { ExecuteOptions } from './retry.js'
export { invokeTransport } from './transport.js'
export {
  DecodeError,
  EncodingError,
  ErrorKind,
  isRestClientError,
  isRestClientErrorOfKind,
  isRetriableError,
  isRetriableStatus,
  RequestConstructionError,
  ResponseReadError,
  RetriesExhaustedError,
  TransportError,
} from './errors.js'
export type { RestClientError } from './errors.js'
export { INTERNAL_FAILURE_STATUS } from './types.js'
export type {
  AttemptResult,
  Decoder,
  Outcome,
  RequestConfig,
  RequestConfigInput,
} from './types.js'
