/**
 * Immutable fluent client over the retry loop
 */

import type { EventSink } from '../logging/index.js'
import type { Decoder, Outcome, RequestConfig, RequestConfigInput } from './types.js'
import { createRequestConfig } from '../config/index.js'
import { silentSink } from '../logging/index.js'
import { execute, passthrough } from './retry.js'

export interface DoOptions {
  signal?: AbortSignal
}

/**
 * Anything that can perform a request and report its outcome
 */
export interface Requester {
  do: <T>(request: unknown, options: DoOptions & { decode: Decoder<T> }) => Promise<Outcome<T>>
}

/**
 * HTTP client that retries server errors and transport failures with exponential backoff.
 * Every `with*` call returns a new client; instances are never mutated.
 *
 * @example
 * ```typescript
 * const client = new RestClient()
 *   .withMethod('GET')
 *   .withUrl('http://localhost:8080')
 *   .withTimeout(10_000)
 *   .withIntervalSeconds(1)
 *   .withBackoffRate(2)
 *   .withMaxAttempts(3)
 *
 * const outcome = await client.do()
 * if (outcome.ok)
 *   console.log(outcome.status, outcome.data)
 * ```
 */
export class RestClient implements Requester {
  readonly config: RequestConfig
  private readonly sink: EventSink

  constructor(config: RequestConfigInput = {}, sink: EventSink = silentSink) {
    this.config = createRequestConfig(config)
    this.sink = sink
  }

  private copyWith(overrides: RequestConfigInput): RestClient {
    return new RestClient({ ...this.config, ...overrides }, this.sink)
  }

  withMethod(method: string): RestClient {
    return this.copyWith({ method })
  }

  withUrl(url: string): RestClient {
    return this.copyWith({ url })
  }

  withHeaders(headers: Record<string, string>): RestClient {
    return this.copyWith({ headers })
  }

  /**
   * Per-attempt timeout in milliseconds; 0 leaves the attempt uncapped
   */
  withTimeout(timeoutMs: number): RestClient {
    return this.copyWith({ timeoutMs })
  }

  withMaxAttempts(maxAttempts: number): RestClient {
    return this.copyWith({ maxAttempts })
  }

  withIntervalSeconds(intervalSeconds: number): RestClient {
    return this.copyWith({ intervalSeconds })
  }

  withBackoffRate(backoffRate: number): RestClient {
    return this.copyWith({ backoffRate })
  }

  withSink(sink: EventSink): RestClient {
    return new RestClient({ ...this.config }, sink)
  }

  /**
   * Sends the request, retrying as configured. Without a decoder the parsed JSON is returned as is.
   */
  async do<T>(request: unknown, options: DoOptions & { decode: Decoder<T> }): Promise<Outcome<T>>
  async do(request?: unknown, options?: DoOptions): Promise<Outcome<unknown>>
  async do<T>(
    request?: unknown,
    options: DoOptions & { decode?: Decoder<T> } = {},
  ): Promise<Outcome<T | unknown>> {
    const decode = options.decode ?? passthrough
    return execute<unknown>(this.config, request, {
      decode,
      signal: options.signal,
      sink: this.sink,
    })
  }
}
