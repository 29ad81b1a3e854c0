import { type Level, Levels } from "../ports/level"
import type { Style } from "../ports/style"

const NO_STYLE: Style = Object.freeze({})

const LEVEL_STYLES: Record<Level, Style> = {
  [Levels.Silent]: NO_STYLE,
  [Levels.Error]: { color: "red", bold: true },
  [Levels.Warn]: { color: "yellow", bold: true },
  [Levels.Status]: NO_STYLE,
  [Levels.Info]: { color: "white" },
  [Levels.Debug]: { color: "cyan" },
  [Levels.Trace]: { color: "magenta" },
}

export function styleForLevel(level: Level): Style {
  return LEVEL_STYLES[level]
}
