import { Reader } from "../reader/read";
import type { ReadResult } from "../reader/read";
import type { Span } from "../../outcome/diagnostic";

export type Form = Span;

export type Segmentation = {
  forms: Form[];
  /** Why the walk ended: end of input (possibly mid-form), or a stray ')'. */
  stop: Exclude<ReadResult, { tag: "Form" }>;
};

/**
 * Delimit the top-level forms of `text` in document order.
 *
 * Comments never produce forms, and anything inside a string or behind a
 * quote prefix is part of its enclosing form. The walk ends at the first
 * position where no complete form can be read.
 */
export function segment(text: string): Segmentation {
  const reader = new Reader(text);
  const forms: Form[] = [];
  while (true) {
    const r = reader.next();
    if (r.tag !== "Form") return { forms, stop: r };
    forms.push(r.span);
  }
}

export function segmentForms(text: string): Form[] {
  return segment(text).forms;
}

export function countForms(text: string): number {
  return segment(text).forms.length;
}
