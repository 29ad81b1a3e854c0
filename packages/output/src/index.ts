export { ChalkWriter } from "./adapters/chalk/chalk-writer"
export { MemorySink } from "./adapters/memory/memory-sink"
export { NullDiagnostics } from "./adapters/null/null-diagnostics"
export { createPinoDiagnostics, PinoDiagnostics } from "./adapters/pino/pino-diagnostics"
export { createStdoutSink, StreamSink, type TextStream } from "./adapters/stream/stream-sink"
export { loadOutputConfig, type OutputConfig, outputEnvSchema } from "./config/output-env"
export { resolveColor } from "./core/color-policy"
export * from "./core/errors"
export {
  debug,
  emit,
  error,
  globalRegistry,
  info,
  init,
  initFromEnv,
  isEnabled,
  lastWriteError,
  shutdown,
  status,
  trace,
  warn,
} from "./core/global-output"
export { styleForLevel } from "./core/level-styles"
export { OutputBuilder, type OutputSettings } from "./core/output-builder"
export { OutputRegistry } from "./core/output-registry"
export { OutputState, type WriteErrorHandler } from "./core/output-state"
export { levelFromVerbosity } from "./core/verbosity"
export { type ColorMode, colorModes } from "./ports/color-mode"
export {
  type DiagnosticLevelName,
  type DiagnosticLogger,
  type DiagnosticMeta,
  diagnosticLevelNames,
} from "./ports/diagnostic-logger"
export {
  compareLevels,
  isLevelEnabled,
  type Level,
  type LevelName,
  levelFromName,
  levelName,
  levelNames,
  Levels,
  type MessageLevel,
} from "./ports/level"
export type { OutputSink, WriteErrorListener } from "./ports/output-sink"
export type { Style, StyleColor } from "./ports/style"
export type { StyledWriter } from "./ports/styled-writer"
