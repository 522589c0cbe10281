/**
 * Single HTTP exchange over undici with a per-attempt timeout
 */

import type { Dispatcher } from 'undici'
import type { AttemptResult, RequestConfig } from './types.js'
import { errors, request as sendRequest } from 'undici'
import {
  EncodingError,
  RequestConstructionError,
  ResponseReadError,
  TransportError,
} from './errors.js'
import { INTERNAL_FAILURE_STATUS } from './types.js'

const HTTP_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
])

function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return HTTP_METHODS.has(method)
}

/**
 * Serializes the payload as JSON. Values JSON cannot represent mean "no body".
 */
function encodeBody(request: unknown): string | undefined {
  if (request === undefined) {
    return undefined
  }
  return JSON.stringify(request)
}

function parseTarget(url: string): URL {
  const parsed = new URL(url)
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new TypeError(`unsupported protocol ${parsed.protocol}`)
  }
  return parsed
}

/**
 * Executes exactly one HTTP call. Never throws: failures come back with
 * INTERNAL_FAILURE_STATUS and the error that caused them.
 */
export async function invokeTransport(
  config: RequestConfig,
  request: unknown,
  signal?: AbortSignal,
): Promise<AttemptResult> {
  const target = { method: config.method, url: config.url }

  let body: string | undefined
  try {
    body = encodeBody(request)
  }
  catch (error) {
    return { status: INTERNAL_FAILURE_STATUS, error: new EncodingError(target, error) }
  }

  const controller = new AbortController()
  let timedOut = false
  let timeoutId: ReturnType<typeof setTimeout> | undefined

  const onCallerAbort = (): void => controller.abort(signal?.reason)
  if (signal?.aborted === true) {
    controller.abort(signal.reason)
  }
  else {
    signal?.addEventListener('abort', onCallerAbort, { once: true })
  }

  if (config.timeoutMs > 0) {
    timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, config.timeoutMs)
  }

  const abortFailure = (cause: unknown): TransportError | undefined => {
    if (timedOut) {
      return new TransportError(target, cause, { timeoutMs: config.timeoutMs })
    }
    if (signal?.aborted === true) {
      return new TransportError(target, cause, { cancelled: true })
    }
    return undefined
  }

  try {
    let method: Dispatcher.HttpMethod
    let url: URL
    try {
      if (!isHttpMethod(config.method)) {
        throw new TypeError(`unsupported method ${config.method}`)
      }
      method = config.method
      url = parseTarget(config.url)
    }
    catch (error) {
      return { status: INTERNAL_FAILURE_STATUS, error: new RequestConstructionError(target, error) }
    }

    let response: Dispatcher.ResponseData
    try {
      // A body is sent whenever one was given, GET and HEAD included
      response = await sendRequest(url, {
        method,
        headers: { ...config.headers },
        body,
        signal: controller.signal,
      })
    }
    catch (error) {
      const failure = abortFailure(error)
      if (failure !== undefined) {
        return { status: INTERNAL_FAILURE_STATUS, error: failure }
      }
      if (error instanceof errors.InvalidArgumentError) {
        return { status: INTERNAL_FAILURE_STATUS, error: new RequestConstructionError(target, error) }
      }
      return { status: INTERNAL_FAILURE_STATUS, error: new TransportError(target, error) }
    }

    // The whole body is read so the underlying connection is released
    try {
      const bytes = new Uint8Array(await response.body.arrayBuffer())
      return { status: response.statusCode, body: bytes }
    }
    catch (error) {
      return {
        status: INTERNAL_FAILURE_STATUS,
        error: abortFailure(error) ?? new ResponseReadError(target, response.statusCode, error),
      }
    }
  }
  finally {
    clearTimeout(timeoutId)
    signal?.removeEventListener('abort', onCallerAbort)
  }
}
