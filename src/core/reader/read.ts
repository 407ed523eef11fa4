import type { Tok } from "./tokenize";
import { tokenize } from "./tokenize";
import type { Datum, Flo, PrefixHead } from "./datum";
import { sym, flo, vec } from "./datum";
import type { Span } from "../../outcome/diagnostic";

/**
 * Result of reading a single form.
 *
 * `Exhausted` is the normal end-of-input signal: the text has no more forms,
 * or it ends in the middle of one. `Failure` is text that can never become
 * a form: a stray `)` or `]`, or a closer that does not match its opener.
 */
export type ReadResult =
  | { tag: "Form"; datum: Datum; span: Span }
  | { tag: "Exhausted"; offset: number }
  | { tag: "Failure"; message: string; offset: number; char: string };

const NUMBER_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

const SPECIAL_FLOATS: Record<string, number> = {
  "1.0e+INF": Infinity,
  "-1.0e+INF": -Infinity,
  "0.0e+NaN": NaN,
  "-0.0e+NaN": NaN,
};

/**
 * Read a numeric literal. A fraction digit or an exponent makes it a float;
 * `1.` is the integer 1. Returns undefined for anything that is not a number.
 */
export function parseNumber(text: string): number | Flo | undefined {
  if (Object.hasOwn(SPECIAL_FLOATS, text)) return flo(SPECIAL_FLOATS[text]);
  if (!NUMBER_RE.test(text)) return undefined;
  const n = Number(text);
  return /\.\d|e/i.test(text) ? flo(n) : n;
}

type PrefixTok = "Quote" | "Function" | "Backquote" | "Comma" | "CommaAt";

const PREFIX_HEADS: Record<PrefixTok, PrefixHead> = {
  Quote: "quote",
  Function: "function",
  Backquote: "`",
  Comma: ",",
  CommaAt: ",@",
};

class Incomplete {
  constructor(readonly offset: number) {}
}

class Unexpected {
  constructor(readonly offset: number, readonly char: string) {}
}

/**
 * Sequential reader over a piece of source text. Tokenizes once, then hands
 * out one top-level form per call to `next()`.
 */
export class Reader {
  private readonly toks: Tok[];
  private i = 0;

  constructor(private readonly src: string) {
    this.toks = tokenize(src);
  }

  next(): ReadResult {
    if (this.i >= this.toks.length) {
      return { tag: "Exhausted", offset: this.src.length };
    }
    const mark = this.i;
    const start = this.toks[mark].start;
    try {
      const datum = this.parseOne();
      return { tag: "Form", datum, span: { start, end: this.toks[this.i - 1].end } };
    } catch (e) {
      // Cursor stays on the failing form.
      this.i = mark;
      if (e instanceof Incomplete) {
        return { tag: "Exhausted", offset: e.offset };
      }
      if (e instanceof Unexpected) {
        return {
          tag: "Failure",
          message: `read: unexpected '${e.char}' at offset ${e.offset}`,
          offset: e.offset,
          char: e.char,
        };
      }
      throw e;
    }
  }

  private parseOne(): Datum {
    const t = this.toks[this.i];
    if (!t) throw new Incomplete(this.src.length);

    switch (t.tag) {
      case "Quote":
      case "Function":
      case "Backquote":
      case "Comma":
      case "CommaAt": {
        this.i++;
        const d = this.parseOne();
        return [sym(PREFIX_HEADS[t.tag]), d];
      }

      case "LParen":
        return this.parseSeq("RParen");

      case "LBracket":
        return vec(this.parseSeq("RBracket"));

      case "RParen":
        throw new Unexpected(t.start, ")");

      case "RBracket":
        throw new Unexpected(t.start, "]");

      case "Str":
        if (!t.closed) throw new Incomplete(this.src.length);
        this.i++;
        return t.s;

      case "Atom": {
        this.i++;
        return parseNumber(t.s) ?? sym(t.s);
      }
    }
  }

  /** Items up to the matching closer; the other closer inside is an error. */
  private parseSeq(close: "RParen" | "RBracket"): Datum[] {
    this.i++;
    const items: Datum[] = [];
    while (true) {
      const u = this.toks[this.i];
      if (!u) throw new Incomplete(this.src.length);
      if (u.tag === close) { this.i++; return items; }
      items.push(this.parseOne());
    }
  }
}

/** Read the first form of `src`. */
export function readForm(src: string): ReadResult {
  return new Reader(src).next();
}

/**
 * Read every complete form. Stops silently at the first incomplete form and
 * throws on a stray closer.
 */
export function readAll(src: string): Datum[] {
  const reader = new Reader(src);
  const out: Datum[] = [];
  while (true) {
    const r = reader.next();
    if (r.tag === "Exhausted") return out;
    if (r.tag === "Failure") throw new Error(r.message);
    out.push(r.datum);
  }
}
