import type { Span } from "../core/meta";
import { categoryOf, makeDiagnostic, type DiagnosticCode } from "./codes";
import type { Diagnostic } from "./diagnostic";
import { failure, type Failure, type FailureReason } from "./failure";

const REASONS = {
  Parse: "parse-error",
  Build: "build-error",
  Run: "run-error",
} as const satisfies Record<string, FailureReason>;

/**
 * Thrown inside the reader, builder and runner. The boundary operations
 * catch it and hand back its `failure` as a `Fail` outcome.
 */
export class ChefError extends Error {
  constructor(public readonly failure: Failure) {
    super(failure.message);
    this.name = "ChefError";
  }

  get diagnostic(): Diagnostic | undefined {
    return this.failure.diagnostics[0];
  }

  get code(): string | undefined {
    return this.diagnostic?.code;
  }
}

export function chefError(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): ChefError {
  const diag = makeDiagnostic(code, params, span);
  return new ChefError(
    failure(REASONS[categoryOf(code)], diag.message, {
      diagnostics: [diag],
      context: params,
    })
  );
}
