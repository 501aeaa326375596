import type {
  Logger as PinoLogger,
  LoggerOptions as PinoLoggerOptions,
} from 'pino'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/**
 * Logger configuration extending Pino logger options
 */
export interface LoggerConfig extends Omit<Partial<PinoLoggerOptions>, 'level'> {
  /**
   * Minimum log level to output
   * @default 'info'
   */
  level?: LogLevel

  /**
   * Log output format
   * - json: Structured JSON format for production
   * - pretty: Human-readable format for development
   * @default 'json'
   */
  format?: 'json' | 'pretty'

  /**
   * Log output destination
   * @default 'console'
   */
  output?: 'console' | 'file'

  /**
   * File path for file-based logging
   * Required when output is 'file'
   */
  filePath?: string

  /**
   * Enable timing logs emitted through `logMetrics`
   * @default true
   */
  enableMetrics?: boolean
}

/**
 * Structured logger shared by the export engine and the rule engine
 */
export interface Logger {
  /**
   * Access to the underlying Pino logger instance
   */
  readonly pino: PinoLogger

  info(message: string, data?: Record<string, unknown>): void
  info(obj: object, message?: string): void

  debug(message: string, data?: Record<string, unknown>): void
  debug(obj: object, message?: string): void

  warn(message: string, data?: Record<string, unknown>): void
  warn(obj: object, message?: string): void

  /**
   * Log error messages for failures and exceptions
   * @param message - Error message
   * @param error - Error object with stack trace
   * @param data - Additional error context
   */
  error(message: string, error?: Error, data?: Record<string, unknown>): void
  error(obj: object, message?: string): void

  /**
   * Create a child logger with additional context
   * @example
   * ```ts
   * const serviceLogger = logger.child({ serviceId: 42 })
   * serviceLogger.info('Export started')
   * ```
   */
  child(context: Record<string, unknown>): Logger

  setLevel(level: LogLevel): void

  getLevel(): LogLevel

  /**
   * Log how long an operation took
   * @example
   * ```ts
   * logger.logMetrics('export', 'service', 12, { serviceId: 42 })
   * ```
   */
  logMetrics(
    component: string,
    operation: string,
    duration: number,
    metadata?: Record<string, unknown>,
  ): void
}
