export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Dotted path to the offending part of a value or definition, e.g. `fields.tail`. */
  path?: string;
  data?: Record<string, unknown>;
  related?: Diagnostic[];
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

export function formatDiagnostic(diag: Diagnostic): string {
  const where = diag.path ? ` at ${diag.path}` : "";
  return `${diag.severity} ${diag.code}${where}: ${diag.message}`;
}
