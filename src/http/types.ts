/**
 * HTTP client types and interfaces
 */

import type { RestClientError } from './errors.js'

/**
 * Status reported for failures that happen before, or instead of, an HTTP status
 */
export const INTERNAL_FAILURE_STATUS = 999

export interface RequestConfig {
  readonly method: string
  readonly url: string
  readonly headers: Readonly<Record<string, string>>
  /** Per-attempt timeout in milliseconds. 0 disables it. */
  readonly timeoutMs: number
  /** Total attempts, the first one included */
  readonly maxAttempts: number
  readonly intervalSeconds: number
  readonly backoffRate: number
}

export type RequestConfigInput = Partial<Omit<RequestConfig, 'headers'>> & {
  headers?: Record<string, string>
}

/**
 * Result of a single call made by the transport
 */
export type AttemptResult
  = | { status: number, body: Uint8Array, error?: undefined }
    | { status: typeof INTERNAL_FAILURE_STATUS, body?: undefined, error: RestClientError }

export type Outcome<T>
  = | { ok: true, status: number, data: T, attempts: number }
    | { ok: false, status: typeof INTERNAL_FAILURE_STATUS, error: RestClientError, attempts: number }

/**
 * Turns a parsed JSON value into the caller's result shape. Throwing rejects the value.
 */
export type Decoder<T> = (value: unknown) => T
