import type { DiagnosticLogger } from "../ports/diagnostic-logger"
import type { Level } from "../ports/level"
import {
  AlreadyInitializedError,
  AlreadyShutdownError,
  type LifecycleResult,
  NotInitializedError,
  OutputBusyError,
  type WriteFailedError,
} from "./errors"
import { formatMessage } from "./format-message"
import { OutputBuilder } from "./output-builder"
import type { OutputState } from "./output-state"

type Operation = "install" | "shutdown" | "emit"

/** What a successful install publishes. */
export type InstalledOutput = {
  state: OutputState
  diagnostics: DiagnosticLogger
}

/**
 * Owns the single output state slot.
 *
 * Every operation runs inside a non-reentrant critical section: starting one
 * while another is still in progress on the same registry (a sink that
 * emits, say) throws {@link OutputBusyError} instead of observing a
 * half-finished state.
 */
export class OutputRegistry {
  private state: OutputState | undefined
  private holder: Operation | undefined
  private diagnostics: DiagnosticLogger | undefined

  init(): OutputBuilder {
    return new OutputBuilder(this)
  }

  /**
   * `create` runs only when the slot is empty, so a rejected install opens
   * no sink or diagnostics destination.
   */
  install(create: () => InstalledOutput): LifecycleResult<AlreadyInitializedError> {
    return this.guard<LifecycleResult<AlreadyInitializedError>>("install", () => {
      if (this.state) return { ok: false, error: new AlreadyInitializedError() }

      const { state, diagnostics } = create()

      this.state = state
      this.diagnostics = diagnostics
      diagnostics.debug("output installed", state.describe())

      return { ok: true }
    })
  }

  shutdown(): LifecycleResult<AlreadyShutdownError> {
    return this.guard<LifecycleResult<AlreadyShutdownError>>("shutdown", () => {
      if (!this.state) return { ok: false, error: new AlreadyShutdownError() }

      this.state = undefined
      this.diagnostics?.debug("output shut down")
      this.diagnostics = undefined

      return { ok: true }
    })
  }

  /**
   * @throws {NotInitializedError} when nothing is installed
   */
  emit(level: Level, template: string, ...args: unknown[]): void {
    const { state, failure } = this.guard("emit", () => {
      const active = this.requireState()

      if (!active.isEnabled(level)) return { state: active, failure: undefined }

      return { state: active, failure: active.render(level, formatMessage(template, args)) }
    })

    if (failure) state.reportWriteFailure(failure)
  }

  isEnabled(level: Level): boolean {
    return this.requireState().isEnabled(level)
  }

  isActive(): boolean {
    return this.state !== undefined
  }

  threshold(): Level | undefined {
    return this.state?.threshold
  }

  lastWriteError(): WriteFailedError | undefined {
    return this.state?.lastWriteError()
  }

  private requireState(): OutputState {
    if (!this.state) throw new NotInitializedError()

    return this.state
  }

  private guard<T>(operation: Operation, fn: () => T): T {
    if (this.holder) throw new OutputBusyError(operation, this.holder)

    this.holder = operation

    try {
      return fn()
    } finally {
      this.holder = undefined
    }
  }
}
