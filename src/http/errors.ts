/**
 * Error kinds surfaced by the transport and the retry loop
 */

export enum ErrorKind {
  ENCODING = 'ENCODING',
  REQUEST_CONSTRUCTION = 'REQUEST_CONSTRUCTION',
  TRANSPORT = 'TRANSPORT',
  RESPONSE_READ = 'RESPONSE_READ',
  DECODE = 'DECODE',
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
}

export interface ErrorTarget {
  method: string
  url: string
}

abstract class BaseRestClientError extends Error {
  abstract readonly kind: ErrorKind
  readonly method: string
  readonly url: string

  constructor(message: string, target: ErrorTarget, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = new.target.name
    this.method = target.method
    this.url = target.url
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * The request payload could not be serialized to JSON
 */
export class EncodingError extends BaseRestClientError {
  readonly kind = ErrorKind.ENCODING

  constructor(target: ErrorTarget, cause: unknown) {
    super(`failed to encode request body: ${describeCause(cause)}`, target, cause)
  }
}

/**
 * Method, URL, headers or body were rejected while building the request
 */
export class RequestConstructionError extends BaseRestClientError {
  readonly kind = ErrorKind.REQUEST_CONSTRUCTION

  constructor(target: ErrorTarget, cause: unknown) {
    super(`failed to create request ${target.method} ${target.url}: ${describeCause(cause)}`, target, cause)
  }
}

export interface TransportFailure {
  timeoutMs?: number
  cancelled?: boolean
}

/**
 * The network call failed, timed out or was cancelled by the caller
 */
export class TransportError extends BaseRestClientError {
  readonly kind = ErrorKind.TRANSPORT
  readonly timedOut: boolean
  readonly cancelled: boolean

  constructor(target: ErrorTarget, cause: unknown, failure: TransportFailure = {}) {
    super(`${target.method} ${target.url}: ${transportReason(cause, failure)}`, target, cause)
    this.timedOut = failure.timeoutMs !== undefined
    this.cancelled = failure.cancelled === true
  }
}

/**
 * The response arrived but its body could not be read
 */
export class ResponseReadError extends BaseRestClientError {
  readonly kind = ErrorKind.RESPONSE_READ
  readonly status: number

  constructor(target: ErrorTarget, status: number, cause: unknown) {
    super(`failed to read response body of ${target.method} ${target.url}: ${describeCause(cause)}`, target, cause)
    this.status = status
  }
}

/**
 * The exchange succeeded but the body does not match the expected shape
 */
export class DecodeError extends BaseRestClientError {
  readonly kind = ErrorKind.DECODE
  readonly status: number

  constructor(target: ErrorTarget, status: number, cause: unknown) {
    super(`failed to decode response of ${target.method} ${target.url}: ${describeCause(cause)}`, target, cause)
    this.status = status
  }
}

/**
 * Every attempt ended with a server error status
 */
export class RetriesExhaustedError extends BaseRestClientError {
  readonly kind = ErrorKind.RETRIES_EXHAUSTED
  readonly status: number
  readonly attempts: number

  constructor(target: ErrorTarget, status: number, attempts: number) {
    super(`${target.method} ${target.url}: giving up after ${attempts} attempt(s), last status ${status}`, target)
    this.status = status
    this.attempts = attempts
  }
}

export type RestClientError
  = | EncodingError
    | RequestConstructionError
    | TransportError
    | ResponseReadError
    | DecodeError
    | RetriesExhaustedError

function transportReason(cause: unknown, failure: TransportFailure): string {
  if (failure.timeoutMs !== undefined)
    return `deadline exceeded after ${failure.timeoutMs}ms`
  if (failure.cancelled === true)
    return 'request cancelled'
  return describeCause(cause)
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message
  }
  return String(cause)
}

/**
 * Checks if an HTTP status code represents a server error that should be retried
 */
export function isRetriableStatus(status: number): boolean {
  return status >= 500
}

/**
 * Errors the retry loop recovers from by trying again
 */
export function isRetriableError(error: RestClientError): boolean {
  return error.kind === ErrorKind.TRANSPORT
}

export function isRestClientError(error: unknown): error is RestClientError {
  return error instanceof BaseRestClientError
}

/**
 * Checks if an error is a RestClientError of a specific kind
 */
export function isRestClientErrorOfKind<K extends ErrorKind>(
  error: unknown,
  kind: K,
): error is Extract<RestClientError, { kind: K }> {
  return isRestClientError(error) && error.kind === kind
}
