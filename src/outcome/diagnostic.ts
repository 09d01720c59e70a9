import type { Span } from "../core/meta";

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

/** `error[E0101]: Unrecognised statement: "Boil water" (line 7)` */
export function formatDiagnostic(d: Diagnostic): string {
  const where = d.span?.startLine !== undefined ? ` (line ${d.span.startLine})` : "";
  const file = d.span?.file ? `${d.span.file}: ` : "";
  return `${file}${d.severity}[${d.code}]: ${d.message}${where}`;
}
