import type { Datum } from "../reader/datum";
import { isSym, isFlo, isVec, isPrefixHead, PREFIXES } from "../reader/datum";
import type { Val, ClosureVal } from "../eval/values";

// Printers here never truncate: there is no print-length or print-level
// limit, and shared or circular structure is printed by plain recursion.

export const DEFAULT_PRETTY_WIDTH = 70;

function quoteString(s: string): string {
  return `"${s.replace(/\\/g, "\\\\").replace(/"/g, "\\\"")}"`;
}

/**
 * Numbers print the way they read back: integers bare, floats always with a
 * fraction or exponent (`2.0`, `1e+21`), infinities as `1.0e+INF`.
 */
export function formatNumber(n: number, float: boolean): string {
  if (!float) return String(n);
  if (Number.isNaN(n)) return "0.0e+NaN";
  if (n === Infinity) return "1.0e+INF";
  if (n === -Infinity) return "-1.0e+INF";
  const text = String(n);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/** `'x`, `` `x ``, `,x`, `,@x` and `#'f` for two-element lists headed by a prefix symbol. */
function prefixOf(head: string | undefined, length: number): string | undefined {
  return head !== undefined && length === 2 && isPrefixHead(head) ? PREFIXES[head] : undefined;
}

export function printDatum(d: Datum): string {
  if (typeof d === "number") return String(d);
  if (typeof d === "string") return quoteString(d);
  if (isSym(d)) return d.sym;
  if (isFlo(d)) return formatNumber(d.float, true);
  if (isVec(d)) return `[${d.vec.map(printDatum).join(" ")}]`;
  if (d.length === 0) return "nil";
  const head = d[0];
  const prefix = prefixOf(isSym(head) ? head.sym : undefined, d.length);
  if (prefix) return `${prefix}${printDatum(d[1])}`;
  return `(${d.map(printDatum).join(" ")})`;
}

function listPrefix(items: Val[]): string | undefined {
  const head = items[0];
  return prefixOf(head?.tag === "Sym" ? head.name : undefined, items.length);
}

function lambdaList(c: ClosureVal): string {
  const parts = [...c.params];
  if (c.optional.length > 0) parts.push("&optional", ...c.optional);
  if (c.rest) parts.push("&rest", c.rest);
  return parts.length === 0 ? "nil" : `(${parts.join(" ")})`;
}

/**
 * Canonical single-line representation. With `escape` (the default) strings
 * are quoted so the output reads back; without it they print raw, as `princ`
 * and `concat`-style formatting want.
 */
export function printVal(v: Val, escape = true): string {
  switch (v.tag) {
    case "Nil": return "nil";
    case "T": return "t";
    case "Num": return formatNumber(v.n, v.float);
    case "Str": return escape ? quoteString(v.s) : v.s;
    case "Sym": return v.name;
    case "List": {
      const prefix = listPrefix(v.items);
      if (prefix) return `${prefix}${printVal(v.items[1], escape)}`;
      return `(${v.items.map((x) => printVal(x, escape)).join(" ")})`;
    }
    case "Vector": return `[${v.items.map((x) => printVal(x, escape)).join(" ")}]`;
    case "Closure": {
      const body = v.body.map(printDatum).join(" ");
      return `(lambda ${lambdaList(v)}${body ? ` ${body}` : ""})`;
    }
    case "Native": return `#<subr ${v.name}>`;
  }
}

/**
 * Multi-line layout: a list whose flat form does not fit in `width` columns
 * (counting the current indentation) puts one element per line, aligned one
 * column inside its opening parenthesis.
 */
export function prettyPrint(v: Val, width = DEFAULT_PRETTY_WIDTH): string {
  return layout(v, 0, width);
}

function layout(v: Val, indent: number, width: number): string {
  const flat = printVal(v);
  if (v.tag !== "List" || indent + flat.length <= width) {
    return flat;
  }
  const prefix = listPrefix(v.items);
  if (prefix) {
    return `${prefix}${layout(v.items[1], indent + prefix.length, width)}`;
  }
  const pad = " ".repeat(indent + 1);
  const lines = v.items.map((item, i) => {
    const text = layout(item, indent + 1, width);
    return i === 0 ? `(${text}` : `${pad}${text}`;
  });
  return `${lines.join("\n")})`;
}

/** `format`-style interpolation: %s prints raw, %d an integer, %S readably; %% is a literal %. */
export function formatString(template: string, args: Val[]): string {
  let i = 0;
  return template.replace(/%([sdS%])/g, (_, spec: string) => {
    if (spec === "%") return "%";
    const arg = args[i++];
    if (!arg) return "";
    if (spec === "d" && arg.tag === "Num" && Number.isFinite(arg.n)) return String(Math.trunc(arg.n));
    return printVal(arg, spec === "S");
  });
}
