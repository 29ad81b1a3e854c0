import type { ColorMode } from "../ports/color-mode"

/**
 * Decide whether a writer should emit style sequences.
 */
export function resolveColor(mode: ColorMode, isTerminal: boolean): boolean {
  switch (mode) {
    case "never":
      return false
    case "always":
      return true
    case "auto":
      return isTerminal
  }
}
