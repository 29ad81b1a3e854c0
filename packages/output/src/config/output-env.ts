import { z } from "zod"
import { InvalidConfigError } from "../core/errors"
import { type ColorMode, colorModes } from "../ports/color-mode"
import { type DiagnosticLevelName, diagnosticLevelNames } from "../ports/diagnostic-logger"
import { type LevelName, levelNames } from "../ports/level"

export const outputEnvSchema = z.object({
  CLOUT_LEVEL: z.enum(levelNames).optional(),
  CLOUT_VERBOSE: z.coerce.number().int().nonnegative().optional(),
  CLOUT_QUIET: z.stringbool().default(false),
  CLOUT_SILENT: z.stringbool().default(false),
  CLOUT_COLOR: z.enum(colorModes).optional(),
  CLOUT_DIAGNOSTICS_LEVEL: z.enum(diagnosticLevelNames).default("warn"),
  NO_COLOR: z.string().optional(),
  FORCE_COLOR: z.string().optional(),
})

export type OutputEnv = z.infer<typeof outputEnvSchema>

export type OutputConfig = {
  level?: LevelName
  verbosity?: number
  quiet: boolean
  silent: boolean
  colorMode?: ColorMode
  diagnosticsLevel: DiagnosticLevelName
}

/**
 * Read output settings from environment variables.
 *
 * Blank values count as unset, except `FORCE_COLOR`, whose mere presence
 * forces color. `CLOUT_COLOR` takes precedence over `FORCE_COLOR`, which
 * takes precedence over `NO_COLOR`.
 *
 * @throws {InvalidConfigError} when a variable does not validate
 */
export function loadOutputConfig(
  env: Record<string, string | undefined> = process.env,
): OutputConfig {
  const result = outputEnvSchema.safeParse(withoutBlanks(env))

  if (!result.success) {
    throw new InvalidConfigError(
      `Output configuration validation failed:\n${z.prettifyError(result.error)}`,
    )
  }

  const parsed = result.data
  const colorMode = resolveColorMode(parsed, env)

  return {
    ...(parsed.CLOUT_LEVEL && { level: parsed.CLOUT_LEVEL }),
    ...(parsed.CLOUT_VERBOSE !== undefined && { verbosity: parsed.CLOUT_VERBOSE }),
    quiet: parsed.CLOUT_QUIET,
    silent: parsed.CLOUT_SILENT,
    ...(colorMode && { colorMode }),
    diagnosticsLevel: parsed.CLOUT_DIAGNOSTICS_LEVEL,
  }
}

function resolveColorMode(
  parsed: OutputEnv,
  raw: Record<string, string | undefined>,
): ColorMode | undefined {
  if (parsed.CLOUT_COLOR) return parsed.CLOUT_COLOR

  if (raw.FORCE_COLOR !== undefined) {
    return raw.FORCE_COLOR === "0" || raw.FORCE_COLOR === "false" ? "never" : "always"
  }

  if (parsed.NO_COLOR) return "never"

  return undefined
}

function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value
  }

  return out
}
