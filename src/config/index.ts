import type { RequestConfig, RequestConfigInput } from '../http/types.js'
import type { LogLevel } from '../logging/index.js'
import process from 'node:process'
import { isLogLevel } from '../logging/index.js'

export interface AppConfig {
  request: RequestConfig
  logLevel: LogLevel
}

export const DEFAULT_REQUEST_CONFIG: RequestConfig = Object.freeze({
  method: 'GET',
  url: 'http://localhost:8080',
  headers: Object.freeze({ 'Content-Type': 'application/json' }),
  timeoutMs: 10000,
  maxAttempts: 3,
  intervalSeconds: 1,
  backoffRate: 2,
})

function assertNonNegative(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative finite number`)
  }
}

/**
 * Creates a validated, frozen request configuration, filling gaps from the defaults
 */
export function createRequestConfig(
  overrides: RequestConfigInput = {},
  base: RequestConfig = DEFAULT_REQUEST_CONFIG,
): RequestConfig {
  const method = overrides.method ?? base.method
  const url = overrides.url ?? base.url
  const headers = overrides.headers ?? base.headers
  const timeoutMs = overrides.timeoutMs ?? base.timeoutMs
  const maxAttempts = overrides.maxAttempts ?? base.maxAttempts
  const intervalSeconds = overrides.intervalSeconds ?? base.intervalSeconds
  const backoffRate = overrides.backoffRate ?? base.backoffRate

  if (method.trim() === '') {
    throw new Error('Method must be a non-empty string')
  }
  if (url.trim() === '') {
    throw new Error('URL must be a non-empty string')
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error('Max attempts must be an integer of at least 1')
  }
  assertNonNegative(timeoutMs, 'Timeout')
  assertNonNegative(intervalSeconds, 'Interval seconds')
  assertNonNegative(backoffRate, 'Backoff rate')

  return Object.freeze({
    method: method.toUpperCase(),
    url,
    headers: Object.freeze({ ...headers }),
    timeoutMs,
    maxAttempts,
    intervalSeconds,
    backoffRate,
  })
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '')
    return fallback
  const num = Number(value)
  if (!Number.isFinite(num) || num < 0)
    return fallback
  return num
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const num = parseNumber(value, fallback)
  return num < 1 ? fallback : Math.floor(num)
}

/**
 * Parses a JSON object whose values are all strings
 */
export function parseHeaders(raw: string): Record<string, string> {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  }
  catch (error) {
    throw new Error('REST_CLIENT_HEADERS must be valid JSON', { cause: error })
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('REST_CLIENT_HEADERS must be a JSON object')
  }

  const headers: Record<string, string> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new TypeError(`REST_CLIENT_HEADERS value for "${key}" must be a string`)
    }
    headers[key] = value
  }
  return headers
}

export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const defaults = DEFAULT_REQUEST_CONFIG

  const logLevelRaw = env.REST_CLIENT_LOG_LEVEL?.trim().toLowerCase() ?? 'info'
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`Invalid REST_CLIENT_LOG_LEVEL: ${logLevelRaw}`)
  }

  const headersRaw = env.REST_CLIENT_HEADERS
  const headers = headersRaw !== undefined && headersRaw.trim() !== ''
    ? parseHeaders(headersRaw)
    : { ...defaults.headers }

  const request = createRequestConfig({
    method: env.REST_CLIENT_METHOD?.trim() || defaults.method,
    url: env.REST_CLIENT_URL?.trim() || defaults.url,
    headers,
    timeoutMs: parseNumber(env.REST_CLIENT_TIMEOUT_MS, defaults.timeoutMs),
    maxAttempts: parsePositiveInt(env.REST_CLIENT_MAX_ATTEMPTS, defaults.maxAttempts),
    intervalSeconds: parseNumber(env.REST_CLIENT_INTERVAL_SECONDS, defaults.intervalSeconds),
    backoffRate: parseNumber(env.REST_CLIENT_BACKOFF_RATE, defaults.backoffRate),
  })

  return {
    request,
    logLevel: logLevelRaw,
  }
}
