import type { Span } from "../core/span";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export type DiagnosticCode =
  | "E0001" | "E0002" | "E0003" | "E0004" | "E0005" | "E0006" | "E0007"
  | "E0101" | "E0102" | "E0103" | "E0104" | "E0105" | "E0106" | "E0107"
  | "E0900";

export const DIAGNOSTIC_CODES: Record<DiagnosticCode, DiagCodeDef> = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "unknown token when expecting an expression" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "expected ')'" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Expected ')' or ',' in argument list" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Expected function name in prototype" },
  E0005: { code: "E0005", severity: "error", category: "Syntax", template: "Expected '(' in prototype" },
  E0006: { code: "E0006", severity: "error", category: "Syntax", template: "Expected ')' in prototype" },
  E0007: { code: "E0007", severity: "error", category: "Syntax", template: "Duplicate parameter '{name}' in prototype '{fn}'" },

  E0101: { code: "E0101", severity: "error", category: "Codegen", template: "Unknown variable name '{name}'" },
  E0102: { code: "E0102", severity: "error", category: "Codegen", template: "Unknown function referenced '{name}'" },
  E0103: { code: "E0103", severity: "error", category: "Codegen", template: "Incorrect # arguments passed to '{name}': expected {expected}, got {actual}" },
  E0104: { code: "E0104", severity: "error", category: "Codegen", template: "invalid binary operator '{op}'" },
  E0105: { code: "E0105", severity: "error", category: "Codegen", template: "Function cannot be redefined: '{name}'" },
  E0106: { code: "E0106", severity: "error", category: "Codegen", template: "Function '{name}' redeclared with {actual} parameters, previously {expected}" },
  E0107: { code: "E0107", severity: "error", category: "Codegen", template: "IR verification failed for '{name}': {detail}" },

  E0900: { code: "E0900", severity: "error", category: "Internal", template: "Internal error: {detail}" },
};

export function isDiagnosticCode(code: string): code is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_CODES, code);
}

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def = DIAGNOSTIC_CODES[code];
  if (!def) {
    throw new Error(`Unknown diagnostic code: ${String(code)}`);
  }

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replaceAll(`{${key}}`, String(value));
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
