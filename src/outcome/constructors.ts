import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic, type DiagnosticCode } from "./codes";
import type { Span } from "../core/span";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  failureOrReason: Failure | FailureReason,
  message = "",
  opts?: Partial<Omit<Failure, "reason" | "message">>,
  meta: OutcomeMeta = {}
): Fail {
  if (typeof failureOrReason === "string") {
    return fail(failure(failureOrReason, message, opts), meta);
  }
  return fail(failureOrReason, meta);
}

/**
 * Fail with a single coded diagnostic; the failure message is the rendered template.
 */
export function diagnosed(
  reason: FailureReason,
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span,
  context?: Record<string, unknown>
): Fail {
  const diag = makeDiagnostic(code, params, span);
  return fail(
    failure(reason, diag.message, { diagnostics: [diag], context, recoverable: true }),
    { span }
  );
}

export function internalError(detail: string, span?: Span): Fail {
  const diag = makeDiagnostic("E0900", { detail }, span);
  return fail(failure("internal-error", diag.message, { diagnostics: [diag], recoverable: false }), { span });
}

/** A unit whose nesting ran past the call stack. */
export function nestedTooDeeply(span?: Span): Fail {
  return internalError("expression nested too deeply", span);
}
