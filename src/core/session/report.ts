// src/core/session/report.ts
// Rendering unit reports for the console

import type { Diagnostic } from "../../outcome/diagnostic";
import { formatDiagnostic } from "../../outcome/diagnostic";
import { allDiagnostics } from "../../outcome/failure";
import { isDone } from "../../outcome/outcome";
import { printFunction } from "../ir/print";
import { SUCCESS_MESSAGES } from "./session";
import type { UnitReport } from "./types";

export function reportDiagnostics(report: UnitReport): Diagnostic[] {
  return isDone(report.outcome) ? [] : allDiagnostics(report.outcome.failure);
}

/**
 * The line(s) the console shows for a unit: the success message (plus the
 * function's IR when `withIR`), or one line per diagnostic.
 */
export function renderReport(report: UnitReport, withIR = false): string {
  const { outcome } = report;
  if (isDone(outcome)) {
    const msg = SUCCESS_MESSAGES[report.kind];
    return withIR ? `${msg}\n${printFunction(outcome.value)}` : msg;
  }
  const diags = reportDiagnostics(report);
  if (diags.length === 0) return `error: ${outcome.failure.message}`;
  return diags.map(formatDiagnostic).join("\n");
}
