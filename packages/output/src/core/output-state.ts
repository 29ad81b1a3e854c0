import type { DiagnosticLogger } from "../ports/diagnostic-logger"
import { type Level, levelName, isLevelEnabled } from "../ports/level"
import type { StyledWriter } from "../ports/styled-writer"
import { WriteFailedError } from "./errors"
import { styleForLevel } from "./level-styles"

export type WriteErrorHandler = (error: WriteFailedError) => void

export type OutputStateDeps = {
  writer: StyledWriter
  diagnostics: DiagnosticLogger
  onWriteError?: WriteErrorHandler | undefined
}

/**
 * The installed configuration: a threshold and the writer that renders
 * everything passing it.
 */
export class OutputState {
  private lastFailure: WriteFailedError | undefined

  constructor(
    readonly threshold: Level,
    private readonly deps: OutputStateDeps,
  ) {}

  get useColor(): boolean {
    return this.deps.writer.useColor
  }

  isEnabled(level: Level): boolean {
    return isLevelEnabled(this.threshold, level)
  }

  /**
   * Filter, then render one line as a single chunk.
   *
   * A synchronous write failure is returned rather than thrown, so the
   * caller can report it once it no longer holds the registry guard.
   */
  render(level: Level, message: string): WriteFailedError | undefined {
    if (!this.isEnabled(level)) return undefined

    const { writer } = this.deps

    writer.setStyle(styleForLevel(level))
    writer.write(message)
    writer.endLine()
    writer.reset()

    try {
      writer.flush()
    } catch (err) {
      return new WriteFailedError(err)
    }

    return undefined
  }

  /**
   * Record a failure, log it, and hand it to the write error handler.
   * Whatever the handler throws is logged at error and not rethrown.
   */
  reportWriteFailure(error: WriteFailedError): void {
    const { diagnostics, onWriteError } = this.deps

    this.lastFailure = error
    diagnostics.warn("output write failed", { err: error })

    if (!onWriteError) return

    try {
      onWriteError(error)
    } catch (err) {
      diagnostics.error("write error handler threw", { err })
    }
  }

  lastWriteError(): WriteFailedError | undefined {
    return this.lastFailure
  }

  describe(): Record<string, unknown> {
    return { threshold: levelName(this.threshold), useColor: this.useColor }
  }
}
