/**
 * Retry loop with exponential backoff around the transport
 */

import type { EventSink } from '../logging/index.js'
import type { RestClientError } from './errors.js'
import type { AttemptResult, Decoder, Outcome, RequestConfig } from './types.js'
import { silentSink } from '../logging/index.js'
import {
  DecodeError,
  isRetriableError,
  isRetriableStatus,
  RetriesExhaustedError,
} from './errors.js'
import { invokeTransport } from './transport.js'
import { INTERNAL_FAILURE_STATUS } from './types.js'

export interface ExecuteOptions<T> {
  decode: Decoder<T>
  /** Cancels the wait between attempts and any in-flight call */
  signal?: AbortSignal
  sink?: EventSink
}

/**
 * Seconds to wait after the attempt with the given zero-based index failed:
 * intervalSeconds * backoffRate^(attemptIndex + 1)
 */
export function calculateBackoffSeconds(
  attemptIndex: number,
  config: Pick<RequestConfig, 'intervalSeconds' | 'backoffRate'>,
): number {
  return config.intervalSeconds * config.backoffRate ** (attemptIndex + 1)
}

/** Longest delay a single setTimeout can hold */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

function sleepOnce(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timeoutId)
      resolve()
    }
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Sleeps for the specified number of milliseconds, returning early on abort.
 * Delays beyond the timer limit are waited out in consecutive chunks.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = ms
  while (remaining > 0 && signal?.aborted !== true) {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS)
    await sleepOnce(chunk, signal)
    remaining -= chunk
  }
}

export const passthrough: Decoder<unknown> = value => value

/**
 * Accepts only JSON objects
 */
export const jsonObject: Decoder<Record<string, unknown>> = (value) => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TypeError('expected a JSON object')
  }
  return Object.fromEntries(Object.entries(value))
}

function decodeBody<T>(body: Uint8Array, decode: Decoder<T>): T {
  const text = new TextDecoder('utf-8', { fatal: true }).decode(body)
  return decode(JSON.parse(text))
}

/**
 * Executes a request with retries on server errors and transport failures.
 * Every failure resolves to an Outcome with INTERNAL_FAILURE_STATUS; this never rejects.
 */
export async function execute<T>(
  config: RequestConfig,
  request: unknown,
  options: ExecuteOptions<T>,
): Promise<Outcome<T>> {
  const { decode, signal, sink = silentSink } = options
  const target = { method: config.method, url: config.url }

  let retries = 0
  let attempts = 0
  let wait = 0
  let result: AttemptResult | undefined

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    await sleep(wait * 1000, signal)

    sink.record({
      type: 'attempt',
      method: config.method,
      url: config.url,
      headers: config.headers,
      attempt: attempt + 1,
      time: new Date().toISOString(),
    })
    result = await invokeTransport(config, request, signal)
    attempts++

    // Anything below 500 is resolved, including handled client errors
    if (!isRetriableStatus(result.status)) {
      break
    }
    if (result.error !== undefined && !isRetriableError(result.error)) {
      break
    }

    retries++
    const nextWait = calculateBackoffSeconds(attempt, config)
    sink.record({
      type: 'retry',
      error: result.error?.message,
      url: config.url,
      status: result.status,
      wait,
      nextWait,
      interval: config.intervalSeconds,
      attempt: retries,
      time: new Date().toISOString(),
    })
    wait = nextWait
  }

  const fail = (error: RestClientError): Outcome<T> => {
    sink.record({
      type: 'failure',
      error: error.message,
      kind: error.kind,
      url: config.url,
      status: 'status' in error ? error.status : INTERNAL_FAILURE_STATUS,
      attempts,
      time: new Date().toISOString(),
    })
    return { ok: false, status: INTERNAL_FAILURE_STATUS, error, attempts }
  }

  if (result === undefined) {
    // maxAttempts below 1 never reaches the transport
    return fail(new RetriesExhaustedError(target, INTERNAL_FAILURE_STATUS, 0))
  }

  if (result.error !== undefined) {
    return fail(result.error)
  }

  if (isRetriableStatus(result.status)) {
    return fail(new RetriesExhaustedError(target, result.status, attempts))
  }

  let data: T
  try {
    data = decodeBody(result.body, decode)
  }
  catch (error) {
    return fail(new DecodeError(target, result.status, error))
  }

  sink.record({
    type: 'done',
    url: config.url,
    status: result.status,
    retries,
    time: new Date().toISOString(),
  })

  return { ok: true, status: result.status, data, attempts }
}
