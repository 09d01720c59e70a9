import { formatDiagnostic, type Diagnostic } from "./diagnostic";

export type FailureReason =
  | "parse-error"
  | "build-error"
  | "run-error"
  | "invalid-config"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}

/** Human-readable lines for a failure: one per diagnostic, or the bare message. */
export function allFailureLines(f: Failure): string[] {
  const diags = allDiagnostics(f);
  return diags.length > 0 ? diags.map(formatDiagnostic) : [`error: ${f.message}`];
}
