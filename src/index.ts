export { createRequestConfig, DEFAULT_REQUEST_CONFIG, loadConfigFromEnv } from './config/index.js'
export type { AppConfig } from './config/index.js'
export * from './http/index.js'
export {
  createLogger,
  createLoggerSink,
  defaultLogger,
  silentSink,
} from './logging/index.js'
export type {
  EventSink,
  Logger,
  LogLevel,
  RequestEvent,
} from './logging/index.js'
