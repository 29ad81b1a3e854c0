export type OutputErrorCode =
  | "already_initialized"
  | "already_shutdown"
  | "not_initialized"
  | "output_busy"
  | "write_failed"
  | "invalid_config"

export type ErrorContext = Readonly<Record<string, unknown>>

export type OutputErrorOptions<C extends OutputErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export type SerializedOutputError = Readonly<{
  name: string
  code: OutputErrorCode
  message: string
  context: Record<string, unknown>
  isOperational: boolean
  timestamp: string
}>

export class OutputError<C extends OutputErrorCode = OutputErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  /**
   * `false` marks a programming error (emitting before install, re-entering
   * the registry) rather than a condition the caller is expected to handle.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: OutputErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedOutputError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isOperational: this.isOperational,
      timestamp: this.timestamp.toISOString(),
    }
  }
}

export class AlreadyInitializedError extends OutputError<"already_initialized"> {
  constructor() {
    super("output already initialized", { code: "already_initialized" })
  }
}

export class AlreadyShutdownError extends OutputError<"already_shutdown"> {
  constructor() {
    super("output already shut down", { code: "already_shutdown" })
  }
}

export class NotInitializedError extends OutputError<"not_initialized"> {
  constructor() {
    super("attempt to emit output before initializing", {
      code: "not_initialized",
      isOperational: false,
    })
  }
}

export class OutputBusyError extends OutputError<"output_busy"> {
  constructor(attempted: string, holder: string) {
    super(`cannot ${attempted} while ${holder} is in progress`, {
      code: "output_busy",
      context: { attempted, holder },
      isOperational: false,
    })
  }
}

export class WriteFailedError extends OutputError<"write_failed"> {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`failed to write output: ${reason}`, { code: "write_failed", cause })
  }
}

export class InvalidConfigError extends OutputError<"invalid_config"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "invalid_config", ...(context && { context }) })
  }
}

export function isOutputError(value: unknown): value is OutputError {
  return value instanceof OutputError
}

export type LifecycleResult<E extends OutputError> =
  | { ok: true }
  | { ok: false; error: E }
