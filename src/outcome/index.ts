// src/outcome/index.ts

export type { Outcome, Done, Fail, Ok, Err, OutcomeMeta } from "./outcome";
export { isDone, isFail } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure, wrapFailure, isFailureReason, allDiagnostics } from "./failure";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export { formatDiagnostic } from "./diagnostic";
export type { DiagnosticCode } from "./codes";
export { DIAGNOSTIC_CODES, isDiagnosticCode, makeDiagnostic } from "./codes";
export { done, ok, fail, err, diagnosed, internalError, nestedTooDeeply } from "./constructors";
export { match, mapOutcome, flatMapOutcome, traverse, unwrap, unwrapOr } from "./matchers";
