export const colorModes = ["never", "always", "auto"] as const

/**
 * User intent for colorizing output.
 *
 * - `never`: plain text, even on a terminal
 * - `always`: styled text, even when redirected to a file or pipe
 * - `auto`: styled text only when the sink is an interactive terminal
 */
export type ColorMode = (typeof colorModes)[number]
