import type { FailureReason } from "../../outcome/failure";
import type { DiagnosticCode } from "../../outcome/codes";

/**
 * Base class for errors a host evaluator raises from evaluated code.
 *
 * The evaluation engine turns these into `Fail` outcomes carrying `reason`,
 * with a diagnostic built from `code` and `params`. Anything else thrown by an
 * evaluator is reported as an `internal-error`.
 */
export class EvaluatorError extends Error {
  constructor(
    readonly reason: FailureReason,
    readonly code: DiagnosticCode,
    readonly params: Record<string, string | number>,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}
