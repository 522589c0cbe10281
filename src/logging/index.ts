/**
 * Centralized structured logging with automatic sensitive data redaction
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface LogMetadata {
  [key: string]: unknown
}

export interface Logger {
  debug: (message: string, meta?: LogMetadata) => void
  info: (message: string, meta?: LogMetadata) => void
  warn: (message: string, meta?: LogMetadata) => void
  error: (message: string, meta?: LogMetadata) => void
  log: (message: string, meta?: LogMetadata) => void
}

export interface LoggerOptions {
  /** Messages below this level are dropped. Default: info */
  level?: LogLevel
}

const SENSITIVE_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'x-api-key',
  'cookie',
  'set-cookie',
  'x-auth-token',
])

const SENSITIVE_KEYS = new Set([
  'password',
  'token',
  'apikey',
  'api_key',
  'secret',
])

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase()
  return SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)
}

function redactSensitiveData(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (value instanceof Error) {
    return value.message
  }

  if (Array.isArray(value)) {
    return value.map(item => redactSensitiveData(item))
  }

  if (typeof value === 'object') {
    const redacted: Record<string, unknown> = {}
    for (const [key, val] of Object.entries(value)) {
      if (isSensitiveKey(key)) {
        redacted[key] = '[REDACTED]'
      }
      else {
        redacted[key] = redactSensitiveData(val)
      }
    }
    return redacted
  }

  return value
}

function formatLogMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
  const timestamp = new Date().toISOString()
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`

  if (!meta || Object.keys(meta).length === 0) {
    return `${prefix} ${message}`
  }

  const redactedMeta = redactSensitiveData(meta)
  return `${prefix} ${message} ${JSON.stringify(redactedMeta)}`
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export function createLogger(name?: string, options: LoggerOptions = {}): Logger {
  const logPrefix = (name !== undefined && name !== '') ? `[${name}] ` : ''
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info')
  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold

  return {
    debug(message: string, meta?: LogMetadata) {
      if (!enabled('debug'))
        return
      // eslint-disable-next-line no-console
      console.debug(formatLogMessage('debug', logPrefix + message, meta))
    },

    info(message: string, meta?: LogMetadata) {
      if (!enabled('info'))
        return
      // eslint-disable-next-line no-console
      console.log(formatLogMessage('info', logPrefix + message, meta))
    },

    warn(message: string, meta?: LogMetadata) {
      if (!enabled('warn'))
        return
      console.warn(formatLogMessage('warn', logPrefix + message, meta))
    },

    error(message: string, meta?: LogMetadata) {
      if (!enabled('error'))
        return
      console.error(formatLogMessage('error', logPrefix + message, meta))
    },

    log(message: string, meta?: LogMetadata) {
      this.info(message, meta)
    },
  }
}

export const defaultLogger = createLogger()

/**
 * Structured events emitted while a request is executed
 */
export type RequestEvent
  = | {
    type: 'attempt'
    method: string
    url: string
    headers: Readonly<Record<string, string>>
    attempt: number
    time: string
  }
  | {
    type: 'retry'
    error?: string
    url: string
    status: number
    /** Seconds waited before the attempt that just failed */
    wait: number
    /** Seconds to wait before the next attempt */
    nextWait: number
    interval: number
    attempt: number
    time: string
  }
  | {
    type: 'failure'
    error: string
    kind: string
    url: string
    status: number
    attempts: number
    time: string
  }
  | {
    type: 'done'
    url: string
    status: number
    retries: number
    time: string
  }

export interface EventSink {
  record: (event: RequestEvent) => void
}

export const silentSink: EventSink = {
  record() {},
}

/**
 * Writes request events to a logger at the level each event carries
 */
export function createLoggerSink(logger: Logger = defaultLogger): EventSink {
  return {
    record(event) {
      switch (event.type) {
        case 'attempt': {
          const { type: _type, ...meta } = event
          logger.debug('sending request', meta)
          break
        }
        case 'retry': {
          const { type: _type, ...meta } = event
          logger.warn('retrying request', meta)
          break
        }
        case 'failure': {
          const { type: _type, ...meta } = event
          logger.error('error calling api', meta)
          break
        }
        case 'done': {
          const { type: _type, ...meta } = event
          logger.debug('request done', meta)
          break
        }
      }
    },
  }
}
