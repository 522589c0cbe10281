import type { AttemptResult } from '../http/types.js'
import type { RequestEvent } from '../logging/index.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createRequestConfig } from '../config/index.js'
import {
  DecodeError,
  EncodingError,
  RetriesExhaustedError,
  TransportError,
} from '../http/errors.js'
import {
  calculateBackoffSeconds,
  execute,
  jsonObject,
  passthrough,
  sleep,
} from '../http/retry.js'
import { invokeTransport } from '../http/transport.js'
import { INTERNAL_FAILURE_STATUS } from '../http/types.js'

vi.mock('../http/transport.js', () => ({
  invokeTransport: vi.fn(),
}))

const mockTransport = vi.mocked(invokeTransport)

const target = { method: 'GET', url: 'http://api.test/status' }

function reply(status: number, body: string): AttemptResult {
  return { status, body: new TextEncoder().encode(body) }
}

function transportFailure(cause: string, cancelled = false): AttemptResult {
  return {
    status: INTERNAL_FAILURE_STATUS,
    error: new TransportError(target, new TypeError(cause), { cancelled }),
  }
}

function respond(status: number, body: string): void {
  mockTransport.mockImplementation(async () => reply(status, body))
}

/**
 * Answers 503 until the signal aborts, then fails fast as a cancelled call
 */
function cancellableTransport(): void {
  mockTransport.mockImplementation(async (_config, _request, signal) =>
    signal?.aborted === true ? transportFailure('This operation was aborted', true) : reply(503, 'busy'))
}

function recordingSink(): { events: RequestEvent[], record: (event: RequestEvent) => void } {
  const events: RequestEvent[] = []
  return {
    events,
    record(event) {
      events.push(event)
    },
  }
}

const baseConfig = createRequestConfig({
  method: 'GET',
  url: 'http://api.test/status',
  timeoutMs: 0,
  maxAttempts: 3,
  intervalSeconds: 1,
  backoffRate: 2,
})

describe('hTTP retry logic', () => {
  beforeEach(() => {
    mockTransport.mockReset()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('calculateBackoffSeconds', () => {
    it('grows exponentially starting from the first retry', () => {
      const config = { intervalSeconds: 1, backoffRate: 2 }

      expect(calculateBackoffSeconds(0, config)).toBe(2)
      expect(calculateBackoffSeconds(1, config)).toBe(4)
      expect(calculateBackoffSeconds(2, config)).toBe(8)
    })

    it('is zero when interval or rate is zero', () => {
      expect(calculateBackoffSeconds(3, { intervalSeconds: 0, backoffRate: 2 })).toBe(0)
      expect(calculateBackoffSeconds(3, { intervalSeconds: 1, backoffRate: 0 })).toBe(0)
    })

    it('stays flat with a rate of one', () => {
      expect(calculateBackoffSeconds(5, { intervalSeconds: 0.5, backoffRate: 1 })).toBe(0.5)
    })
  })

  describe('sleep', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
    })

    it('resolves after the given delay', async () => {
      const done = vi.fn()
      void sleep(1000).then(done)

      await vi.advanceTimersByTimeAsync(999)
      expect(done).not.toHaveBeenCalled()

      await vi.advanceTimersByTimeAsync(1)
      expect(done).toHaveBeenCalledOnce()
    })

    it('waits out delays longer than a single timer can hold', async () => {
      const done = vi.fn()
      void sleep(3_000_000_000).then(done)

      await vi.advanceTimersByTimeAsync(2 ** 31 - 1)
      expect(done).not.toHaveBeenCalled()

      await vi.advanceTimersByTimeAsync(3_000_000_000 - (2 ** 31 - 1) - 1)
      expect(done).not.toHaveBeenCalled()

      await vi.advanceTimersByTimeAsync(1)
      expect(done).toHaveBeenCalledOnce()
    })

    it('returns early when the signal aborts', async () => {
      const controller = new AbortController()
      const done = vi.fn()
      void sleep(60_000, controller.signal).then(done)

      controller.abort()
      await vi.advanceTimersByTimeAsync(0)

      expect(done).toHaveBeenCalledOnce()
    })
  })

  describe('execute', () => {
    it('decodes a successful response after a single call', async () => {
      respond(200, '{"message":"success"}')

      const outcome = await execute(baseConfig, undefined, { decode: passthrough })

      expect(outcome).toEqual({ ok: true, status: 200, data: { message: 'success' }, attempts: 1 })
      expect(mockTransport).toHaveBeenCalledOnce()
    })

    it('does not retry handled client errors and decodes their body', async () => {
      respond(404, '{"error":"not found"}')
      const sink = recordingSink()

      const outcome = await execute(baseConfig, undefined, { decode: passthrough, sink })

      expect(outcome).toEqual({ ok: true, status: 404, data: { error: 'not found' }, attempts: 1 })
      expect(mockTransport).toHaveBeenCalledOnce()
      expect(sink.events.filter(event => event.type === 'retry')).toHaveLength(0)
    })

    it('calls the transport maxAttempts times with growing waits on persistent server errors', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
      respond(503, 'unavailable')

      const pending = execute(baseConfig, undefined, { decode: passthrough })

      await vi.advanceTimersByTimeAsync(0)
      expect(mockTransport).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(1999)
      expect(mockTransport).toHaveBeenCalledTimes(1)
      await vi.advanceTimersByTimeAsync(1)
      expect(mockTransport).toHaveBeenCalledTimes(2)

      await vi.advanceTimersByTimeAsync(3999)
      expect(mockTransport).toHaveBeenCalledTimes(2)
      await vi.advanceTimersByTimeAsync(1)
      expect(mockTransport).toHaveBeenCalledTimes(3)

      const outcome = await pending
      expect(outcome.ok).toBe(false)
      expect(outcome.status).toBe(INTERNAL_FAILURE_STATUS)
      expect(outcome.attempts).toBe(3)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(RetriesExhaustedError)
        expect(outcome.error.message).toBe('GET http://api.test/status: giving up after 3 attempt(s), last status 503')
      }
    })

    it('records a retry event for every server error', async () => {
      respond(500, 'oops')
      const sink = recordingSink()
      const config = createRequestConfig({ ...baseConfig, intervalSeconds: 0.001, backoffRate: 2, maxAttempts: 4 })

      await execute(config, undefined, { decode: passthrough, sink })

      const retries = sink.events.flatMap(event => event.type === 'retry' ? [event] : [])
      expect(retries.map(event => event.attempt)).toEqual([1, 2, 3, 4])
      expect(retries.map(event => event.status)).toEqual([500, 500, 500, 500])
      expect(retries.map(event => event.wait)).toEqual([0, 0.002, 0.004, 0.008])
      expect(retries.map(event => event.nextWait)).toEqual([0.002, 0.004, 0.008, 0.016])
      expect(retries[0].url).toBe('http://api.test/status')
      expect(retries[0].interval).toBe(0.001)
      expect(retries[0].error).toBeUndefined()
      expect(Number.isNaN(Date.parse(retries[0].time))).toBe(false)
    })

    it('never retries when maxAttempts is one', async () => {
      respond(502, 'bad gateway')
      const sink = recordingSink()

      const outcome = await execute(createRequestConfig({ ...baseConfig, maxAttempts: 1 }), undefined, { decode: passthrough, sink })

      expect(mockTransport).toHaveBeenCalledOnce()
      expect(outcome.ok).toBe(false)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(RetriesExhaustedError)
        expect(outcome.attempts).toBe(1)
      }
      expect(sink.events.map(event => event.type)).toEqual(['attempt', 'retry', 'failure'])
    })

    it('recovers when a later attempt succeeds', async () => {
      mockTransport
        .mockResolvedValueOnce(reply(503, 'down'))
        .mockResolvedValueOnce(reply(200, '{"ready":true}'))
      const config = createRequestConfig({ ...baseConfig, intervalSeconds: 0 })

      const outcome = await execute(config, undefined, { decode: passthrough })

      expect(outcome).toEqual({ ok: true, status: 200, data: { ready: true }, attempts: 2 })
      expect(mockTransport).toHaveBeenCalledTimes(2)
    })

    it('retries transport failures and surfaces the last one', async () => {
      mockTransport.mockResolvedValue(transportFailure('other side closed'))
      const config = createRequestConfig({ ...baseConfig, intervalSeconds: 0 })

      const outcome = await execute(config, undefined, { decode: passthrough })

      expect(mockTransport).toHaveBeenCalledTimes(3)
      expect(outcome.status).toBe(INTERNAL_FAILURE_STATUS)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(TransportError)
        expect(outcome.error.message).toBe('GET http://api.test/status: other side closed')
      }
    })

    it('does not retry encoding failures', async () => {
      mockTransport.mockResolvedValue({
        status: INTERNAL_FAILURE_STATUS,
        error: new EncodingError(target, new TypeError('Do not know how to serialize a BigInt')),
      })
      const sink = recordingSink()

      const outcome = await execute(baseConfig, { size: 1n }, { decode: passthrough, sink })

      expect(mockTransport).toHaveBeenCalledOnce()
      expect(outcome.attempts).toBe(1)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(EncodingError)
      }
      expect(sink.events.map(event => event.type)).toEqual(['attempt', 'failure'])
    })

    it('reports a body that is not JSON as a decode failure', async () => {
      respond(200, 'plain text')

      const outcome = await execute(baseConfig, undefined, { decode: passthrough })

      expect(outcome.ok).toBe(false)
      expect(outcome.status).toBe(INTERNAL_FAILURE_STATUS)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(DecodeError)
        if (outcome.error instanceof DecodeError) {
          expect(outcome.error.status).toBe(200)
        }
      }
    })

    it('reports an empty body as a decode failure', async () => {
      respond(200, '')

      const outcome = await execute(baseConfig, undefined, { decode: passthrough })

      expect(outcome.ok).toBe(false)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(DecodeError)
      }
    })

    it('reports a value the decoder rejects as a decode failure', async () => {
      respond(200, '["not","an","object"]')

      const outcome = await execute(baseConfig, undefined, { decode: jsonObject })

      expect(outcome.ok).toBe(false)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(DecodeError)
        expect(outcome.error.message).toBe('failed to decode response of GET http://api.test/status: expected a JSON object')
      }
    })

    it('shapes the result with the decoder', async () => {
      respond(200, '{"count":3}')
      const decode = (value: unknown): number => {
        const record = jsonObject(value)
        if (typeof record.count !== 'number')
          throw new TypeError('count must be a number')
        return record.count
      }

      const outcome = await execute(baseConfig, undefined, { decode })

      expect(outcome).toEqual({ ok: true, status: 200, data: 3, attempts: 1 })
    })

    it('records attempt, done and failure events', async () => {
      respond(200, '{"message":"success"}')
      const sink = recordingSink()

      await execute(baseConfig, undefined, { decode: passthrough, sink })

      expect(sink.events).toHaveLength(2)
      expect(sink.events[0]).toMatchObject({
        type: 'attempt',
        method: 'GET',
        url: 'http://api.test/status',
        attempt: 1,
      })
      expect(sink.events[1]).toMatchObject({
        type: 'done',
        url: 'http://api.test/status',
        status: 200,
        retries: 0,
      })
    })

    it('keeps attempting with fast failures after cancellation', async () => {
      cancellableTransport()
      const controller = new AbortController()
      controller.abort()

      const outcome = await execute(baseConfig, undefined, { decode: passthrough, signal: controller.signal })

      expect(mockTransport).toHaveBeenCalledTimes(3)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(TransportError)
        expect(outcome.error.message).toBe('GET http://api.test/status: request cancelled')
      }
    })

    it('cuts a backoff wait short when cancelled mid-sleep', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
      cancellableTransport()
      const controller = new AbortController()
      const config = createRequestConfig({ ...baseConfig, intervalSeconds: 60, backoffRate: 1 })

      const pending = execute(config, undefined, { decode: passthrough, signal: controller.signal })

      await vi.advanceTimersByTimeAsync(1000)
      expect(mockTransport).toHaveBeenCalledTimes(1)
      expect(mockTransport.mock.calls[0][2]?.aborted).toBe(false)

      controller.abort()
      // No timer is advanced past this point: the outcome only settles if the wait ended
      const outcome = await pending

      expect(mockTransport).toHaveBeenCalledTimes(3)
      expect(outcome.attempts).toBe(3)
      expect(outcome.ok).toBe(false)
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(TransportError)
        if (outcome.error instanceof TransportError) {
          expect(outcome.error.cancelled).toBe(true)
        }
      }
    })

    it('waits out backoff delays longer than a single timer can hold', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
      respond(503, 'unavailable')
      const config = createRequestConfig({ ...baseConfig, maxAttempts: 2, intervalSeconds: 1, backoffRate: 3_000_000 })

      const pending = execute(config, undefined, { decode: passthrough })

      await vi.advanceTimersByTimeAsync(2 ** 31)
      expect(mockTransport).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(3_000_000_000 - 2 ** 31)
      expect(mockTransport).toHaveBeenCalledTimes(2)

      const outcome = await pending
      expect(outcome.attempts).toBe(2)
    })

    it('gives identical results for repeated identical calls', async () => {
      respond(200, '{"items":[1,2,3]}')

      const first = await execute(baseConfig, undefined, { decode: passthrough })
      const second = await execute(baseConfig, undefined, { decode: passthrough })

      expect(second).toEqual(first)
    })

    it('never calls the transport when maxAttempts is below one', async () => {
      respond(200, '{}')

      const outcome = await execute({ ...baseConfig, maxAttempts: 0 }, undefined, { decode: passthrough })

      expect(mockTransport).not.toHaveBeenCalled()
      expect(outcome.ok).toBe(false)
      expect(outcome.attempts).toBe(0)
    })
  })
})
