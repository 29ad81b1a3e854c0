export const diagnosticLevelNames = ["debug", "info", "warn", "error"] as const

export type DiagnosticLevelName = (typeof diagnosticLevelNames)[number]

export type DiagnosticMeta = Record<string, unknown> & {
  err?: unknown
}

/**
 * Where the library reports on itself: lifecycle transitions and write
 * failures. Never used for user-facing messages. Implementations must not
 * throw: write failures are reported from stream callbacks.
 */
export interface DiagnosticLogger {
  debug(message: string, meta?: DiagnosticMeta): void
  info(message: string, meta?: DiagnosticMeta): void
  warn(message: string, meta?: DiagnosticMeta): void
  error(message: string, meta?: DiagnosticMeta): void
}
