import type { Span } from "../core/span";
import { formatSpan } from "../core/span";

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

/**
 * One-line rendering, e.g. `repl:1:5: error[E0101]: Unknown variable name 'x'`.
 */
export function formatDiagnostic(diag: Diagnostic): string {
  const where = diag.span ? `${formatSpan(diag.span)}: ` : "";
  return `${where}${diag.severity}[${diag.code}]: ${diag.message}`;
}
