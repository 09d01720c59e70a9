import type { Span } from "../core/meta";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

export type DiagnosticCategory = "Parse" | "Build" | "Run";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0101: { code: "E0101", severity: "error", category: "Parse", template: "Unrecognised statement: \"{text}\"" },
  E0102: { code: "E0102", severity: "error", category: "Parse", template: "Unrecognised measure: \"{measure}\"" },
  E0103: { code: "E0103", severity: "error", category: "Parse", template: "Malformed recipe title: \"{text}\"" },
  E0104: { code: "E0104", severity: "error", category: "Parse", template: "Recipe \"{recipe}\" has no method" },
  E0105: { code: "E0105", severity: "error", category: "Parse", template: "Malformed ingredient line: \"{text}\"" },
  E0106: { code: "E0106", severity: "error", category: "Parse", template: "Hour count does not agree with \"{unit}\": {hours}" },
  E0107: { code: "E0107", severity: "error", category: "Parse", template: "Invalid {vessel} number in \"{text}\"" },
  E0108: { code: "E0108", severity: "error", category: "Parse", template: "Statement is missing its final period: \"{text}\"" },
  E0109: { code: "E0109", severity: "error", category: "Parse", template: "Program contains no recipes" },
  E0110: { code: "E0110", severity: "error", category: "Parse", template: "Unexpected text in recipe \"{recipe}\": \"{text}\"" },

  E0201: { code: "E0201", severity: "error", category: "Build", template: "Loop \"{verb}\" in recipe \"{recipe}\" is never closed" },
  E0202: { code: "E0202", severity: "error", category: "Build", template: "\"until {keyword}\" in recipe \"{recipe}\" closes no open loop" },
  E0203: { code: "E0203", severity: "error", category: "Build", template: "Recipe \"{recipe}\" serves with unknown recipe \"{name}\"" },
  E0204: { code: "E0204", severity: "error", category: "Build", template: "\"Set aside\" outside of any loop in recipe \"{recipe}\"" },
  E0205: { code: "E0205", severity: "error", category: "Build", template: "Recipe \"{recipe}\" is defined twice" },

  E0301: { code: "E0301", severity: "error", category: "Run", template: "{vessel} is empty" },
  E0302: { code: "E0302", severity: "error", category: "Run", template: "Division by zero: \"{ingredient}\" is 0" },
  E0303: { code: "E0303", severity: "error", category: "Run", template: "Unknown ingredient \"{ingredient}\" in recipe \"{recipe}\"" },
  E0304: { code: "E0304", severity: "error", category: "Run", template: "Input exhausted while reading \"{ingredient}\"" },
  E0305: { code: "E0305", severity: "error", category: "Run", template: "Recipe \"{name}\" is not in the program" },
  E0306: { code: "E0306", severity: "error", category: "Run", template: "Cannot serve {value} as a character" },
  E0307: { code: "E0307", severity: "error", category: "Run", template: "Invalid input token: \"{token}\"" },
  E0310: { code: "E0310", severity: "error", category: "Run", template: "Step limit exceeded: {limit}" },
  E0311: { code: "E0311", severity: "error", category: "Run", template: "Call depth exceeded: {limit}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}

export function categoryOf(code: DiagnosticCode): DiagnosticCategory {
  return DIAGNOSTIC_CODES[code].category;
}
