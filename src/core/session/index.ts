// src/core/session/index.ts

export { CompilationSession, SUCCESS_MESSAGES } from "./session";
export { renderReport, reportDiagnostics } from "./report";
export type { UnitKind, UnitReport, RunOptions, RunResult } from "./types";
