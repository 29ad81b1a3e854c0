import { ChalkWriter } from "../adapters/chalk/chalk-writer"
import { PinoDiagnostics } from "../adapters/pino/pino-diagnostics"
import { createStdoutSink } from "../adapters/stream/stream-sink"
import type { OutputConfig } from "../config/output-env"
import type { ColorMode } from "../ports/color-mode"
import type { DiagnosticLogger } from "../ports/diagnostic-logger"
import { type Level, levelFromName, Levels } from "../ports/level"
import type { OutputSink } from "../ports/output-sink"
import { resolveColor } from "./color-policy"
import { type AlreadyInitializedError, type LifecycleResult, WriteFailedError } from "./errors"
import type { InstalledOutput, OutputRegistry } from "./output-registry"
import { OutputState, type WriteErrorHandler } from "./output-state"
import { levelFromVerbosity } from "./verbosity"

export type OutputSettings = Readonly<{
  threshold: Level
  colorMode: ColorMode
  sink?: OutputSink
  diagnostics?: DiagnosticLogger
  onWriteError?: WriteErrorHandler
}>

const DEFAULT_SETTINGS: OutputSettings = {
  threshold: Levels.Status,
  colorMode: "auto",
}

/**
 * Accumulates output settings and installs them into a registry.
 *
 * Every setter returns a new builder. Fields are last-write-wins, except
 * that `withQuiet(false)` and `withSilent(false)` leave the threshold
 * alone, so apply verbosity first, then quiet, then silent:
 *
 * @example
 * ```ts
 * const result = init()
 *   .withVerbosity(args.verbose)
 *   .withQuiet(args.quiet)
 *   .withSilent(args.silent)
 *   .withColorMode("auto")
 *   .install()
 *
 * if (!result.ok) throw result.error
 * ```
 */
export class OutputBuilder {
  constructor(
    private readonly registry: OutputRegistry,
    readonly settings: OutputSettings = DEFAULT_SETTINGS,
  ) {}

  withLevel(level: Level): OutputBuilder {
    return this.with({ threshold: level })
  }

  /**
   * Map a repeated `-v` count to a threshold: 0 is status, 1 info, 2 debug,
   * and anything higher trace.
   *
   * @throws {InvalidConfigError} for a negative or fractional count
   */
  withVerbosity(verbosity: number): OutputBuilder {
    return this.with({ threshold: levelFromVerbosity(verbosity) })
  }

  /** Errors only when `quiet` is set. Apply after `withVerbosity()`. */
  withQuiet(quiet: boolean): OutputBuilder {
    return quiet ? this.with({ threshold: Levels.Error }) : this
  }

  /** Nothing at all when `silent` is set. Apply after `withQuiet()`. */
  withSilent(silent: boolean): OutputBuilder {
    return silent ? this.with({ threshold: Levels.Silent }) : this
  }

  withColorMode(colorMode: ColorMode): OutputBuilder {
    return this.with({ colorMode })
  }

  /**
   * Apply settings read from the environment, in the same order a caller
   * would: level, verbosity, quiet, silent, then color mode.
   */
  withConfig(config: OutputConfig): OutputBuilder {
    const leveled =
      config.level === undefined ? this : this.withLevel(levelFromName(config.level))
    const verbose =
      config.verbosity === undefined ? leveled : leveled.withVerbosity(config.verbosity)
    const gated = verbose.withQuiet(config.quiet).withSilent(config.silent)

    return config.colorMode ? gated.withColorMode(config.colorMode) : gated
  }

  withSink(sink: OutputSink): OutputBuilder {
    return this.with({ sink })
  }

  withDiagnostics(diagnostics: DiagnosticLogger): OutputBuilder {
    return this.with({ diagnostics })
  }

  withWriteErrorHandler(onWriteError: WriteErrorHandler): OutputBuilder {
    return this.with({ onWriteError })
  }

  /**
   * Resolve the color mode against the sink, then publish the resulting
   * state. Fails if the registry already holds one; that state stays.
   */
  install(): LifecycleResult<AlreadyInitializedError> {
    return this.registry.install(() => this.build())
  }

  private build(): InstalledOutput {
    const { threshold, colorMode, onWriteError } = this.settings
    const sink = this.settings.sink ?? createStdoutSink()
    const diagnostics = this.settings.diagnostics ?? new PinoDiagnostics()

    const writer = new ChalkWriter(
      {
        sink,
        onAsyncError: (err) => state.reportWriteFailure(new WriteFailedError(err)),
      },
      resolveColor(colorMode, sink.isTerminal()),
    )

    const state = new OutputState(threshold, { writer, diagnostics, onWriteError })

    return { state, diagnostics }
  }

  private with(patch: Partial<OutputSettings>): OutputBuilder {
    return new OutputBuilder(this.registry, { ...this.settings, ...patch })
  }
}
