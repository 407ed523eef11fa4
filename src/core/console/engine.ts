import type { Val } from "../eval/values";
import { VNil } from "../eval/values";
import { Reader } from "../reader/read";
import type { Evaluator } from "./types";
import { EvaluatorError } from "./errors";
import { segment, type Form } from "./segment";
import type { Outcome } from "../../outcome/outcome";
import { done, readError, evaluationError } from "../../outcome/constructors";

/** Implicit sequence construct used to run several forms as one unit. */
export const SEQUENCE_FORM = "progn";

/**
 * Build the unit of code to execute. A single form (or none) runs as written,
 * so top-level definitions keep their meaning. Several forms are wrapped in
 * `(progn ...)`, taken up to the end of the last complete form and closed on
 * a fresh line so a trailing comment cannot swallow the closing paren.
 */
export function composeUnit(text: string, forms: Form[]): string {
  if (forms.length <= 1) return text;
  const last = forms[forms.length - 1];
  return `(${SEQUENCE_FORM}\n${text.slice(0, last.end)}\n)`;
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Evaluate submitted text against `context`.
 *
 * Forms are read one at a time from the composed unit and handed to the
 * evaluator; running out of input ends the loop and the last value is
 * returned. Evaluation errors come back as `Fail` outcomes.
 */
export function evaluate<C>(text: string, context: C, evaluator: Evaluator<C>): Outcome<Val> {
  const started = Date.now();
  const { forms, stop } = segment(text);
  const meta = () => ({ formCount: forms.length, durationMs: Date.now() - started });

  if (stop.tag === "Failure") {
    return readError(stop.offset, stop.char, meta());
  }

  const reader = new Reader(composeUnit(text, forms));
  let value: Val = VNil;

  while (true) {
    const r = reader.next();
    if (r.tag === "Exhausted") {
      return done(value, meta());
    }
    if (r.tag === "Failure") {
      return readError(r.offset, r.char, meta());
    }
    try {
      value = evaluator.exec(r.datum, context);
    } catch (e) {
      if (e instanceof EvaluatorError) {
        return evaluationError(e.reason, e.code, e.params, meta());
      }
      return evaluationError("internal-error", "E0199", { message: describe(e) }, meta());
    }
  }
}
