import type { Datum } from "../reader/datum";
import type { Val } from "../eval/values";

/**
 * Host capability that executes one form against an execution context.
 * Throws on failure; an `EvaluatorError` subclass carries a classified
 * reason, anything else is reported as an internal error.
 */
export interface Evaluator<C> {
  exec(form: Datum, context: C): Val;
}

/** Output sinks supplied by the presentation layer. */
export interface DisplaySurfaces {
  /** Short results: the one-line status area. */
  showInline(text: string): void;
  /** Long results: a separate read-only output view. */
  showAuxiliary(text: string): void;
}

export type DisplayTarget = "inline" | "auxiliary";

export type Rendered = {
  target: DisplayTarget;
  text: string;
};
