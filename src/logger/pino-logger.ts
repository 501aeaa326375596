/**
 * Pino logger for the control plane
 *
 * Structured JSON logging shared by the export engine, the provider adapters
 * and the data-plane rule engine. Credentials that may show up in backend
 * descriptors (api keys, tokens, secrets) are redacted both by Pino's path
 * redaction and by a key scan over the logged object.
 *
 * @example
 * ```ts
 * const logger = new ControlPlaneLogger({ level: 'debug', format: 'pretty' })
 *
 * logger.info('Service exported', { serviceId: 42, resources: 2 })
 * logger.logMetrics('export', 'service', 12, { serviceId: 42 })
 * ```
 */
import pino from 'pino'
import type { LoggerOptions, Logger as PinoLogger } from 'pino'
import type { LogLevel, Logger, LoggerConfig } from '../interfaces/logger'

const REDACT_PATHS = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'token',
  'access_token',
  '*.token',
  '*.access_token',
  'secret',
  '*.secret',
  'password',
  '*.password',
  'headers.authorization',
]

const SENSITIVE_KEYS = [
  'apikey',
  'api_key',
  'authorization',
  'token',
  'secret',
  'password',
  'private_key',
  'privatekey',
]

const SENSITIVE_MESSAGE_PATTERNS = [
  /\bBearer\s+[^\s,}\]]+/gi,
  /\b(api[_-]?key|token|secret|password)[\s:=]+[^\s,}\]]+/gi,
]

/**
 * Pino-backed implementation of {@link Logger}
 */
export class ControlPlaneLogger implements Logger {
  readonly pino: PinoLogger
  private config: LoggerConfig

  /**
   * @param config - Logger configuration
   * @param instance - Existing Pino instance to wrap, used for child loggers
   */
  constructor(config: LoggerConfig = {}, instance?: PinoLogger) {
    this.config = {
      level: 'info',
      format: 'json',
      enableMetrics: true,
      ...config,
    }

    if (instance) {
      this.pino = instance
      return
    }

    const {
      format,
      output,
      filePath,
      enableMetrics: _enableMetrics,
      ...pinoConfig
    } = this.config

    const options: LoggerOptions = {
      ...pinoConfig,
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
    }

    if (format === 'pretty') {
      options.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    }

    if (output === 'file' && filePath) {
      options.transport = {
        target: 'pino/file',
        options: { destination: filePath },
      }
    }

    this.pino = pino(options)
  }

  private sanitizeRecord(data: object): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase()
      if (SENSITIVE_KEYS.some((pattern) => lowerKey.includes(pattern))) {
        sanitized[key] = '[REDACTED]'
      } else if (Array.isArray(value)) {
        sanitized[key] = value.map((item: unknown) =>
          item !== null && typeof item === 'object'
            ? this.sanitizeRecord(item)
            : item,
        )
      } else if (value !== null && typeof value === 'object') {
        sanitized[key] =
          value instanceof Uint8Array ? value : this.sanitizeRecord(value)
      } else {
        sanitized[key] = value
      }
    }
    return sanitized
  }

  private sanitizeMessage(message: string | undefined): string | undefined {
    if (!message) {
      return message
    }

    let sanitized = message
    for (const pattern of SENSITIVE_MESSAGE_PATTERNS) {
      sanitized = sanitized.replace(pattern, (match) => {
        const separator = match.search(/[\s:=]/)
        return separator !== -1
          ? `${match.substring(0, separator + 1)}[REDACTED]`
          : '[REDACTED]'
      })
    }
    return sanitized
  }

  private write(
    level: 'info' | 'debug' | 'warn',
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    if (typeof msgOrObj === 'string') {
      const data = typeof dataOrMsg === 'object' ? dataOrMsg : {}
      this.pino[level](this.sanitizeRecord(data), this.sanitizeMessage(msgOrObj))
    } else {
      const message = typeof dataOrMsg === 'string' ? dataOrMsg : undefined
      this.pino[level](
        this.sanitizeRecord(msgOrObj),
        this.sanitizeMessage(message),
      )
    }
  }

  info(message: string, data?: Record<string, unknown>): void
  info(obj: object, message?: string): void
  info(
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    this.write('info', msgOrObj, dataOrMsg)
  }

  debug(message: string, data?: Record<string, unknown>): void
  debug(obj: object, message?: string): void
  debug(
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    this.write('debug', msgOrObj, dataOrMsg)
  }

  warn(message: string, data?: Record<string, unknown>): void
  warn(obj: object, message?: string): void
  warn(
    msgOrObj: string | object,
    dataOrMsg?: Record<string, unknown> | string,
  ): void {
    this.write('warn', msgOrObj, dataOrMsg)
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void
  error(obj: object, message?: string): void
  error(
    msgOrObj: string | object,
    errorOrMsg?: Error | string,
    data?: Record<string, unknown>,
  ): void {
    if (typeof msgOrObj === 'string') {
      const errorData = {
        ...data,
        ...(errorOrMsg instanceof Error
          ? {
              error: {
                name: errorOrMsg.name,
                message: errorOrMsg.message,
                stack: errorOrMsg.stack,
              },
            }
          : {}),
      }
      this.pino.error(
        this.sanitizeRecord(errorData),
        this.sanitizeMessage(msgOrObj),
      )
    } else {
      const message = typeof errorOrMsg === 'string' ? errorOrMsg : undefined
      this.pino.error(
        this.sanitizeRecord(msgOrObj),
        this.sanitizeMessage(message),
      )
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new ControlPlaneLogger({ ...this.config }, this.pino.child(context))
  }

  setLevel(level: LogLevel): void {
    this.pino.level = level
    this.config.level = level
  }

  getLevel(): LogLevel {
    return this.config.level ?? 'info'
  }

  logMetrics(
    component: string,
    operation: string,
    duration: number,
    metadata?: Record<string, unknown>,
  ): void {
    if (!this.config.enableMetrics) return

    this.pino.info(
      {
        metrics: {
          component,
          operation,
          duration,
          ...metadata,
        },
      },
      `${component}.${operation} completed in ${duration}ms`,
    )
  }
}

/**
 * Factory function to create a logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new ControlPlaneLogger(config)
}

/**
 * Default logger instance
 */
export const defaultLogger = createLogger({
  level: 'info',
  format: 'json',
})
