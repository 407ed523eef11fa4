// Built-in functions of the scratch evaluator. Installed into a context's
// function namespace; special forms live in evaluator.ts.

import type { Val, NativeVal, Applier } from "./values";
import type { NumVal } from "./values";
import { VNil, num, float, str, bool, list, listItems, eq, equal, isCallable, isTruthy } from "./values";
import { WrongTypeError, WrongArityError, UserError } from "./errors";
import { printVal, formatString } from "../printer/print";
import { parseNumber } from "../reader/read";
import { isFlo } from "../reader/datum";

type PrimFn = (args: Val[], apply: Applier) => Val;

function expectNumVal(v: Val): NumVal {
  if (v.tag !== "Num") throw new WrongTypeError("number-or-marker-p", printVal(v));
  return v;
}

function expectNum(v: Val): number {
  return expectNumVal(v).n;
}

/** Arithmetic result: a float when any operand was one. */
function numLike(n: number, operands: NumVal[]): Val {
  return operands.some((x) => x.float) ? float(n) : num(n);
}

const NUMBER_PREFIX_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?/i;

function expectStr(v: Val): string {
  if (v.tag !== "Str") throw new WrongTypeError("stringp", printVal(v));
  return v.s;
}

function expectList(v: Val): Val[] {
  const items = listItems(v);
  if (!items) throw new WrongTypeError("listp", printVal(v));
  return items;
}

function expectFunction(v: Val): Val {
  if (!isCallable(v)) throw new WrongTypeError("functionp", printVal(v));
  return v;
}

function expectInt(v: Val): number {
  const { n, float: isFloat } = expectNumVal(v);
  if (isFloat || !Number.isInteger(n)) throw new WrongTypeError("integerp", printVal(v));
  return n;
}

function compareChain(name: string, test: (a: number, b: number) => boolean): PrimFn {
  return (args) => {
    if (args.length === 0) throw new WrongArityError(name, 0);
    const ns = args.map(expectNum);
    for (let i = 1; i < ns.length; i++) {
      if (!test(ns[i - 1], ns[i])) return VNil;
    }
    return bool(true);
  };
}

export function buildPrims(): Map<string, NativeVal> {
  const prims = new Map<string, NativeVal>();

  function def(name: string, arity: number | "variadic", fn: PrimFn): void {
    prims.set(name, { tag: "Native", name, arity, fn });
  }

  // ─── Arithmetic ───
  def("+", "variadic", (args) => {
    const vs = args.map(expectNumVal);
    return numLike(vs.reduce((a, x) => a + x.n, 0), vs);
  });
  def("*", "variadic", (args) => {
    const vs = args.map(expectNumVal);
    return numLike(vs.reduce((a, x) => a * x.n, 1), vs);
  });
  def("-", "variadic", (args) => {
    const vs = args.map(expectNumVal);
    const ns = vs.map((x) => x.n);
    if (ns.length === 0) return num(0);
    if (ns.length === 1) return numLike(-ns[0], vs);
    return numLike(ns.slice(1).reduce((a, x) => a - x, ns[0]), vs);
  });
  // Integer division truncates and rejects a zero divisor; with any float
  // operand it is IEEE division, so dividing by 0.0 gives an infinity.
  def("/", "variadic", (args) => {
    if (args.length === 0) throw new WrongArityError("/", 0);
    const vs = args.map(expectNumVal);
    const isFloat = vs.some((x) => x.float);
    const divide = (a: number, b: number): number => {
      if (isFloat) return a / b;
      if (b === 0) throw new UserError("Arithmetic error");
      return Math.trunc(a / b);
    };
    const ns = vs.map((x) => x.n);
    if (ns.length === 1) return numLike(divide(1, ns[0]), vs);
    return numLike(ns.slice(1).reduce(divide, ns[0]), vs);
  });
  def("%", 2, (args) => {
    const a = expectInt(args[0]);
    const b = expectInt(args[1]);
    if (b === 0) throw new UserError("Arithmetic error");
    return num(a % b);
  });
  def("1+", 1, (args) => {
    const v = expectNumVal(args[0]);
    return numLike(v.n + 1, [v]);
  });
  def("1-", 1, (args) => {
    const v = expectNumVal(args[0]);
    return numLike(v.n - 1, [v]);
  });
  def("max", "variadic", (args) => {
    if (args.length === 0) throw new WrongArityError("max", 0);
    const vs = args.map(expectNumVal);
    return numLike(Math.max(...vs.map((x) => x.n)), vs);
  });
  def("min", "variadic", (args) => {
    if (args.length === 0) throw new WrongArityError("min", 0);
    const vs = args.map(expectNumVal);
    return numLike(Math.min(...vs.map((x) => x.n)), vs);
  });

  // ─── Comparison ───
  def("=", "variadic", compareChain("=", (a, b) => a === b));
  def("<", "variadic", compareChain("<", (a, b) => a < b));
  def(">", "variadic", compareChain(">", (a, b) => a > b));
  def("<=", "variadic", compareChain("<=", (a, b) => a <= b));
  def(">=", "variadic", compareChain(">=", (a, b) => a >= b));
  def("eq", 2, (args) => bool(eq(args[0], args[1])));
  def("equal", 2, (args) => bool(equal(args[0], args[1])));
  def("not", 1, (args) => bool(!isTruthy(args[0])));
  def("null", 1, (args) => bool(!isTruthy(args[0])));

  // ─── Lists ───
  def("list", "variadic", (args) => list(args));
  def("cons", 2, (args) => {
    const tail = listItems(args[1]);
    if (!tail) throw new WrongTypeError("listp", printVal(args[1]));
    return list([args[0], ...tail]);
  });
  def("car", 1, (args) => expectList(args[0])[0] ?? VNil);
  def("cdr", 1, (args) => list(expectList(args[0]).slice(1)));
  def("nth", 2, (args) => expectList(args[1])[expectInt(args[0])] ?? VNil);
  def("length", 1, (args) => {
    const v = args[0];
    if (v.tag === "Str") return num(v.s.length);
    if (v.tag === "Vector") return num(v.items.length);
    return num(expectList(v).length);
  });
  def("append", "variadic", (args) => list(args.flatMap(expectList)));
  def("reverse", 1, (args) => list([...expectList(args[0])].reverse()));
  def("mapcar", 2, (args, apply) => {
    const fn = expectFunction(args[0]);
    return list(expectList(args[1]).map((x) => apply(fn, [x])));
  });
  def("funcall", "variadic", (args, apply) => {
    if (args.length === 0) throw new WrongArityError("funcall", 0);
    return apply(expectFunction(args[0]), args.slice(1));
  });
  def("apply", "variadic", (args, apply) => {
    if (args.length === 0) throw new WrongArityError("apply", 0);
    const spread = args.length > 1 ? expectList(args[args.length - 1]) : [];
    return apply(expectFunction(args[0]), [...args.slice(1, -1), ...spread]);
  });

  // ─── Strings ───
  def("concat", "variadic", (args) => str(args.map((a) => {
    if (a.tag === "Str") return a.s;
    return expectList(a).map((x) => String.fromCharCode(expectInt(x))).join("");
  }).join("")));
  def("make-string", 2, (args) => {
    const n = expectInt(args[0]);
    if (n < 0) throw new WrongTypeError("wholenump", printVal(args[0]));
    const fill = args[1].tag === "Num" ? String.fromCharCode(expectInt(args[1])) : expectStr(args[1]);
    return str(fill.repeat(n));
  });
  def("number-to-string", 1, (args) => str(printVal(expectNumVal(args[0]))));
  def("string-to-number", 1, (args) => {
    const match = NUMBER_PREFIX_RE.exec(expectStr(args[0]).trimStart());
    const parsed = match ? parseNumber(match[0]) : undefined;
    if (parsed === undefined) return num(0);
    return isFlo(parsed) ? float(parsed.float) : num(parsed);
  });
  def("upcase", 1, (args) => str(expectStr(args[0]).toUpperCase()));
  def("downcase", 1, (args) => str(expectStr(args[0]).toLowerCase()));
  def("substring", "variadic", (args) => {
    if (args.length < 1 || args.length > 3) throw new WrongArityError("substring", args.length);
    const s = expectStr(args[0]);
    const from = args[1] && args[1].tag !== "Nil" ? expectInt(args[1]) : 0;
    const to = args[2] && args[2].tag !== "Nil" ? expectInt(args[2]) : s.length;
    return str(s.slice(from < 0 ? s.length + from : from, to < 0 ? s.length + to : to));
  });
  def("format", "variadic", (args) => {
    if (args.length === 0) throw new WrongArityError("format", 0);
    return str(formatString(expectStr(args[0]), args.slice(1)));
  });
  def("prin1-to-string", 1, (args) => str(printVal(args[0])));

  // ─── Predicates ───
  def("numberp", 1, (args) => bool(args[0].tag === "Num"));
  def("stringp", 1, (args) => bool(args[0].tag === "Str"));
  def("symbolp", 1, (args) => bool(args[0].tag === "Sym" || args[0].tag === "Nil" || args[0].tag === "T"));
  def("listp", 1, (args) => bool(args[0].tag === "List" || args[0].tag === "Nil"));
  def("vectorp", 1, (args) => bool(args[0].tag === "Vector"));
  def("floatp", 1, ([v]) => bool(v.tag === "Num" && v.float));
  def("integerp", 1, ([v]) => bool(v.tag === "Num" && !v.float));
  def("consp", 1, (args) => bool(args[0].tag === "List"));
  def("functionp", 1, (args) => bool(isCallable(args[0])));

  // ─── Misc ───
  def("identity", 1, (args) => args[0]);
  def("error", "variadic", (args) => {
    if (args.length === 0) throw new WrongArityError("error", 0);
    throw new UserError(formatString(expectStr(args[0]), args.slice(1)));
  });

  return prims;
}
