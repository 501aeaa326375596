/**
 * Error hierarchy for compilation and data-plane configuration
 *
 * - ExportError: one service's export failed; no bundle is produced
 * - ConfigParseError: the rule engine rejected a configuration document
 * - ConfigBusyError: the rule engine's configuration cell was in use
 */

export type ExportFailureKind =
  | 'AdapterFailure'
  | 'EncodingFailure'
  | 'AssetIntegrityFailure'

export interface ExportErrorJSON {
  code: ExportFailureKind
  serviceId: number
  adapter?: string
  message: string
  cause?: string
}

/**
 * Returns the message of anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * A service could not be compiled
 *
 * The message is prefixed with the owning service id.
 */
export class ExportError extends Error {
  readonly code: ExportFailureKind
  readonly serviceId: number
  readonly adapter?: string

  constructor(
    code: ExportFailureKind,
    serviceId: number,
    message: string,
    options: { adapter?: string; cause?: unknown } = {},
  ) {
    super(`service ${serviceId}: ${message}`, { cause: options.cause })
    this.name = 'ExportError'
    this.code = code
    this.serviceId = serviceId
    this.adapter = options.adapter

    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): ExportErrorJSON {
    return {
      code: this.code,
      serviceId: this.serviceId,
      adapter: this.adapter,
      message: this.message,
      cause: this.cause === undefined ? undefined : describeError(this.cause),
    }
  }
}

/**
 * A configuration document was rejected; the active configuration is unchanged
 */
export class ConfigParseError extends Error {
  readonly code = 'ConfigParseFailure'
  /** One entry per failed field, `path: reason` */
  readonly issues: string[]

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, { cause })
    this.name = 'ConfigParseError'
    this.issues = issues

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * An import was attempted while the configuration cell was held
 */
export class ConfigBusyError extends Error {
  readonly code = 'ConfigBusy'

  constructor() {
    super('configuration is in use by an in-flight match; import rejected')
    this.name = 'ConfigBusyError'

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
