import type { DiagnosticLogger, DiagnosticMeta } from "../../ports/diagnostic-logger"

export class NullDiagnostics implements DiagnosticLogger {
  debug(_message: string, _meta?: DiagnosticMeta): void {}

  info(_message: string, _meta?: DiagnosticMeta): void {}

  warn(_message: string, _meta?: DiagnosticMeta): void {}

  error(_message: string, _meta?: DiagnosticMeta): void {}
}
