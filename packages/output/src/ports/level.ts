/**
 * Message levels, ordered from least to most verbose.
 *
 * The ordering is the filtering relation: a message at level `L` is shown
 * iff the configured threshold is `>= L`. `Silent` is only ever a
 * threshold; nothing is emitted at it.
 */
export const Levels = {
  /** Display nothing at all, not even errors. */
  Silent: 0,
  /** An operation cannot proceed. */
  Error: 1,
  /** An operation will proceed but may not do what the user wanted. */
  Warn: 2,
  /** The usual messages describing what an operation is doing. */
  Status: 3,
  /** Useful to the user but not essential. */
  Info: 4,
  /** Useful to developers or in bug reports. */
  Debug: 5,
  /** Low-level detail of what an operation is doing. */
  Trace: 6,
} as const

export type Level = (typeof Levels)[keyof typeof Levels]

export type MessageLevel = Exclude<Level, typeof Levels.Silent>

export const levelNames = [
  "silent",
  "error",
  "warn",
  "status",
  "info",
  "debug",
  "trace",
] as const

export type LevelName = (typeof levelNames)[number]

const LEVEL_BY_NAME: Record<LevelName, Level> = {
  silent: Levels.Silent,
  error: Levels.Error,
  warn: Levels.Warn,
  status: Levels.Status,
  info: Levels.Info,
  debug: Levels.Debug,
  trace: Levels.Trace,
}

export function levelFromName(name: LevelName): Level {
  return LEVEL_BY_NAME[name]
}

const NAME_BY_LEVEL: Record<Level, LevelName> = {
  0: "silent",
  1: "error",
  2: "warn",
  3: "status",
  4: "info",
  5: "debug",
  6: "trace",
}

export function levelName(level: Level): LevelName {
  return NAME_BY_LEVEL[level]
}

export function compareLevels(a: Level, b: Level): number {
  return a - b
}

/**
 * Whether a message at `level` passes a `threshold`.
 */
export function isLevelEnabled(threshold: Level, level: Level): boolean {
  return level !== Levels.Silent && threshold >= level
}
