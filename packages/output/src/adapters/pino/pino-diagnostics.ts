import pino, { type DestinationStream, type Logger as PinoLoggerBase } from "pino"
import { errWithCause } from "pino-std-serializers"
import type {
  DiagnosticLevelName,
  DiagnosticLogger,
  DiagnosticMeta,
} from "../../ports/diagnostic-logger"

export type PinoDiagnosticsDeps = {
  /**
   * Base pino logger to derive from. When provided, `level` and
   * `destination` are ignored and only the component binding is added.
   */
  base?: PinoLoggerBase

  /**
   * Where diagnostics go. Defaults to stderr so they never mix with the
   * output they are about.
   */
  destination?: DestinationStream
}

export type PinoDiagnosticsOptions = {
  /** @default "warn" */
  level?: DiagnosticLevelName
}

const STDERR_FD = 2

export class PinoDiagnostics implements DiagnosticLogger {
  protected readonly logger: PinoLoggerBase

  constructor(deps: PinoDiagnosticsDeps = {}, opts: PinoDiagnosticsOptions = {}) {
    this.logger = this.init(deps, opts)
  }

  private init(deps: PinoDiagnosticsDeps, opts: PinoDiagnosticsOptions): PinoLoggerBase {
    const bindings = { component: "clout" }

    if (deps.base) return deps.base.child(bindings)

    const destination = deps.destination ?? pino.destination({ dest: STDERR_FD, sync: true })

    return pino(
      {
        level: opts.level ?? "warn",
        serializers: { err: errWithCause },
      },
      destination,
    ).child(bindings)
  }

  debug(message: string, meta?: DiagnosticMeta): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: DiagnosticMeta): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: DiagnosticMeta): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: DiagnosticMeta): void {
    this.logger.error(meta ?? {}, message)
  }
}

export function createPinoDiagnostics(
  deps?: PinoDiagnosticsDeps,
  opts?: PinoDiagnosticsOptions,
): DiagnosticLogger {
  return new PinoDiagnostics(deps, opts)
}
