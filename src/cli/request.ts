#!/usr/bin/env node
import type { RequestConfigInput } from '../http/types.js'
import type { LogLevel } from '../logging/index.js'
import { realpathSync } from 'node:fs'
import process from 'node:process'
import { pathToFileURL } from 'node:url'
import { Command, InvalidArgumentError } from 'commander'
import { loadConfigFromEnv } from '../config/index.js'
import { RestClient } from '../http/restClient.js'
import { createLogger, createLoggerSink, isLogLevel } from '../logging/index.js'

const DEFAULT_DEADLINE_MS = 60000

type CliOptions = {
  method?: string
  url?: string
  header: string[]
  data?: string
  timeoutMs?: number
  maxAttempts?: number
  intervalSeconds?: number
  backoffRate?: number
  deadlineMs: number
  logLevel?: LogLevel
}

function parseNonNegative(value: string): number {
  const num = Number(value)
  if (value.trim() === '' || !Number.isFinite(num) || num < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.')
  }
  return num
}

function parseAttempts(value: string): number {
  const num = Number(value)
  if (!Number.isInteger(num) || num < 1) {
    throw new InvalidArgumentError('Must be an integer of at least 1.')
  }
  return num
}

function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase()
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError('Must be one of debug, info, warn, error.')
  }
  return level
}

function collectHeader(value: string, previous: string[]): string[] {
  if (!value.includes(':')) {
    throw new InvalidArgumentError('Headers take the form "Name: value".')
  }
  return [...previous, value]
}

/**
 * Turns "Name: value" pairs into a header map; later entries win
 */
export function parseHeaderPairs(pairs: string[]): Record<string, string> {
  const headers: Record<string, string> = {}
  for (const pair of pairs) {
    const separator = pair.indexOf(':')
    headers[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim()
  }
  return headers
}

function createProgram(): Command {
  return new Command()
    .name('rest-client')
    .description('Send one HTTP request, retrying server errors with exponential backoff')
    .option('-X, --method <method>', 'HTTP method')
    .option('-u, --url <url>', 'Target URL')
    .option('-H, --header <header>', 'Request header as "Name: value" (repeatable)', collectHeader, [])
    .option('-d, --data <json>', 'JSON request body')
    .option('--timeout-ms <ms>', 'Per-attempt timeout in milliseconds, 0 for none', parseNonNegative)
    .option('--max-attempts <n>', 'Total attempts, the first one included', parseAttempts)
    .option('--interval-seconds <s>', 'Base backoff interval in seconds', parseNonNegative)
    .option('--backoff-rate <rate>', 'Multiplier applied to the interval per retry', parseNonNegative)
    .option('--deadline-ms <ms>', 'Overall deadline in milliseconds', parseNonNegative, DEFAULT_DEADLINE_MS)
    .option('--log-level <level>', 'Minimum log level', parseLogLevel)
}

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function main(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const program = createProgram()
  program.parse([...argv], { from: 'node' })
  const options = program.opts<CliOptions>()

  let logger = createLogger('rest-client')

  try {
    const appConfig = loadConfigFromEnv(env)
    logger = createLogger('rest-client', { level: options.logLevel ?? appConfig.logLevel })

    const overrides: RequestConfigInput = {
      method: options.method ?? appConfig.request.method,
      url: options.url ?? appConfig.request.url,
      timeoutMs: options.timeoutMs ?? appConfig.request.timeoutMs,
      maxAttempts: options.maxAttempts ?? appConfig.request.maxAttempts,
      intervalSeconds: options.intervalSeconds ?? appConfig.request.intervalSeconds,
      backoffRate: options.backoffRate ?? appConfig.request.backoffRate,
      headers: { ...appConfig.request.headers, ...parseHeaderPairs(options.header) },
    }

    let body: unknown
    if (options.data !== undefined) {
      try {
        body = JSON.parse(options.data)
      }
      catch (error) {
        throw new Error('--data must be valid JSON', { cause: error })
      }
    }

    const client = new RestClient(overrides, createLoggerSink(logger))
    const outcome = await client.do(body, { signal: AbortSignal.timeout(options.deadlineMs) })

    if (!outcome.ok) {
      logger.error('error making request', {
        error: outcome.error.message,
        kind: outcome.error.kind,
        status: outcome.status,
      })
      return 1
    }

    logger.info('response', {
      status: outcome.status,
      response: outcome.data,
    })
    return 0
  }
  catch (error) {
    logger.error('invalid configuration', {
      error: error instanceof Error ? error.message : String(error),
    })
    return 1
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1]
  if (entry === undefined)
    return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href
  }
  catch {
    return false
  }
}

if (isEntryPoint()) {
  main().then((code) => {
    process.exitCode = code
  }, (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}
