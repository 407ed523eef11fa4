export type Tok =
  | { tag: "LParen"; start: number; end: number }
  | { tag: "RParen"; start: number; end: number }
  | { tag: "LBracket"; start: number; end: number }
  | { tag: "RBracket"; start: number; end: number }
  | { tag: "Quote"; start: number; end: number }
  | { tag: "Function"; start: number; end: number }
  | { tag: "Backquote"; start: number; end: number }
  | { tag: "Comma"; start: number; end: number }
  | { tag: "CommaAt"; start: number; end: number }
  | { tag: "Str"; s: string; start: number; end: number; closed: boolean }
  | { tag: "Atom"; s: string; start: number; end: number };

const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f";

const DELIMITERS = new Set(["(", ")", "[", "]", "'", "`", ",", ";", "\""]);

const isDelimiter = (c: string) => isWS(c) || DELIMITERS.has(c);

/**
 * Tokenize Lisp source. Every token carries its [start, end) offsets so the
 * reader can report form boundaries in terms of the original text.
 *
 * Line comments (`;` to end of line) produce no tokens. A string that runs
 * off the end of the input is emitted with `closed: false`. The prefixes
 * `'`, `#'`, `` ` ``, `,` and `,@` are tokens of their own.
 */
export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  while (i < src.length) {
    const c = src[i];

    if (c === ";") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    if (isWS(c)) { i++; continue; }

    if (c === "(") { toks.push({ tag: "LParen", start: i, end: i + 1 }); i++; continue; }
    if (c === ")") { toks.push({ tag: "RParen", start: i, end: i + 1 }); i++; continue; }
    if (c === "[") { toks.push({ tag: "LBracket", start: i, end: i + 1 }); i++; continue; }
    if (c === "]") { toks.push({ tag: "RBracket", start: i, end: i + 1 }); i++; continue; }
    if (c === "'") { toks.push({ tag: "Quote", start: i, end: i + 1 }); i++; continue; }
    if (c === "`") { toks.push({ tag: "Backquote", start: i, end: i + 1 }); i++; continue; }
    if (c === ",") {
      if (src[i + 1] === "@") {
        toks.push({ tag: "CommaAt", start: i, end: i + 2 });
        i += 2;
      } else {
        toks.push({ tag: "Comma", start: i, end: i + 1 });
        i++;
      }
      continue;
    }
    if (c === "#" && src[i + 1] === "'") {
      toks.push({ tag: "Function", start: i, end: i + 2 });
      i += 2;
      continue;
    }

    if (c === "\"") {
      const start = i;
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i];
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          const e = src[i + 1];
          if (e === "n") { s += "\n"; i += 2; continue; }
          if (e === "t") { s += "\t"; i += 2; continue; }
          s += e ?? "";
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      toks.push({ tag: "Str", s, start, end: Math.min(i, src.length), closed });
      continue;
    }

    const start = i;
    let a = "";
    while (i < src.length) {
      const d = src[i];
      if (d === "\\" && i + 1 < src.length) {
        a += src[i + 1];
        i += 2;
        continue;
      }
      if (isDelimiter(d)) break;
      a += d;
      i++;
    }
    toks.push({ tag: "Atom", s: a, start, end: i });
  }

  return toks;
}
