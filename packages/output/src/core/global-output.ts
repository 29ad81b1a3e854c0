import { PinoDiagnostics } from "../adapters/pino/pino-diagnostics"
import { loadOutputConfig } from "../config/output-env"
import { type Level, Levels, type MessageLevel } from "../ports/level"
import type { AlreadyShutdownError, LifecycleResult, WriteFailedError } from "./errors"
import type { OutputBuilder } from "./output-builder"
import { OutputRegistry } from "./output-registry"

/** The process-wide registry behind the free functions below. */
export const globalRegistry = new OutputRegistry()

/**
 * Start configuring output. Defaults: status threshold, automatic color.
 * Nothing may be emitted until the returned builder is installed.
 */
export function init(): OutputBuilder {
  return globalRegistry.init()
}

/**
 * Like {@link init}, pre-configured from environment variables.
 *
 * @throws {InvalidConfigError} when a variable does not validate
 */
export function initFromEnv(
  env: Record<string, string | undefined> = process.env,
): OutputBuilder {
  const config = loadOutputConfig(env)

  return init()
    .withConfig(config)
    .withDiagnostics(new PinoDiagnostics({}, { level: config.diagnosticsLevel }))
}

export function shutdown(): LifecycleResult<AlreadyShutdownError> {
  return globalRegistry.shutdown()
}

/**
 * Emit a message at `level`. Prefer the leveled functions.
 *
 * @throws {NotInitializedError} when output has not been installed
 */
export function emit(level: MessageLevel, template: string, ...args: unknown[]): void {
  globalRegistry.emit(level, template, ...args)
}

export function error(template: string, ...args: unknown[]): void {
  globalRegistry.emit(Levels.Error, template, ...args)
}

export function warn(template: string, ...args: unknown[]): void {
  globalRegistry.emit(Levels.Warn, template, ...args)
}

export function status(template: string, ...args: unknown[]): void {
  globalRegistry.emit(Levels.Status, template, ...args)
}

export function info(template: string, ...args: unknown[]): void {
  globalRegistry.emit(Levels.Info, template, ...args)
}

export function debug(template: string, ...args: unknown[]): void {
  globalRegistry.emit(Levels.Debug, template, ...args)
}

export function trace(template: string, ...args: unknown[]): void {
  globalRegistry.emit(Levels.Trace, template, ...args)
}

/** Whether a message at `level` would currently be shown. */
export function isEnabled(level: Level): boolean {
  return globalRegistry.isEnabled(level)
}

export function lastWriteError(): WriteFailedError | undefined {
  return globalRegistry.lastWriteError()
}
