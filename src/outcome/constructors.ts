import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic, type DiagnosticCode } from "./codes";
import type { Span } from "./diagnostic";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/** A stray closing delimiter at `offset`: text that can never be read as a form. */
export function readError(offset: number, char: string, meta: OutcomeMeta = {}): Fail {
  const span: Span = { start: offset, end: offset + char.length };
  const diag = makeDiagnostic("E0001", { offset, char }, span);
  return fail(
    failure("read-error", diag.message, {
      diagnostics: [diag],
      recoverable: true,
    }),
    { ...meta, span }
  );
}

export function evaluationError(
  reason: FailureReason,
  code: DiagnosticCode,
  params: Record<string, string | number>,
  meta: OutcomeMeta = {}
): Fail {
  const diag = makeDiagnostic(code, params, meta.span);
  return fail(
    failure(reason, diag.message, {
      diagnostics: [diag],
      context: params,
      recoverable: reason !== "internal-error",
    }),
    meta
  );
}
