import { type Level, Levels } from "../ports/level"
import { InvalidConfigError } from "./errors"

const VERBOSITY_LEVELS = [Levels.Status, Levels.Info, Levels.Debug] as const

/**
 * 0 → status, 1 → info, 2 → debug, 3 and above → trace.
 */
export function levelFromVerbosity(verbosity: number): Level {
  if (!Number.isInteger(verbosity) || verbosity < 0) {
    throw new InvalidConfigError(`verbosity must be a non-negative integer, got ${verbosity}`, {
      verbosity,
    })
  }

  return VERBOSITY_LEVELS[verbosity] ?? Levels.Trace
}
