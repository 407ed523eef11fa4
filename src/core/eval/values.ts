import type { Datum } from "../reader/datum";
import { isFlo, isVec } from "../reader/datum";
import type { Env } from "./env";

export type Applier = (proc: Val, args: Val[]) => Val;

export type ClosureVal = {
  tag: "Closure";
  name?: string;
  params: string[];
  optional: string[];
  rest?: string;
  body: Datum[];
  env: Env;
};

export type NativeVal = {
  tag: "Native";
  name: string;
  arity: number | "variadic";
  fn: (args: Val[], apply: Applier) => Val;
};

export type ListVal = { tag: "List"; items: Val[] };

export type NumVal = { tag: "Num"; n: number; float: boolean };

/**
 * Runtime values of the scratch evaluator. The empty list and false are both
 * `Nil`; a `List` always has at least one item. A `Num` remembers whether it
 * is a float, so `2.0` stays distinct from `2`.
 */
export type Val =
  | { tag: "Nil" }
  | { tag: "T" }
  | NumVal
  | { tag: "Str"; s: string }
  | { tag: "Sym"; name: string }
  | ListVal
  | { tag: "Vector"; items: Val[] }
  | ClosureVal
  | NativeVal;

export const VNil: Val = { tag: "Nil" };
export const VT: Val = { tag: "T" };

export const num = (n: number): Val => ({ tag: "Num", n, float: false });
export const float = (n: number): Val => ({ tag: "Num", n, float: true });
export const vector = (items: Val[]): Val => ({ tag: "Vector", items });
export const str = (s: string): Val => ({ tag: "Str", s });
export const symVal = (name: string): Val => {
  if (name === "nil") return VNil;
  if (name === "t") return VT;
  return { tag: "Sym", name };
};
export const bool = (b: boolean): Val => (b ? VT : VNil);

export function list(items: Val[]): Val {
  return items.length === 0 ? VNil : { tag: "List", items };
}

export function isTruthy(v: Val): boolean {
  return v.tag !== "Nil";
}

export function isCallable(v: Val): v is ClosureVal | NativeVal {
  return v.tag === "Closure" || v.tag === "Native";
}

/** Elements of a proper list; `nil` is the empty list. */
export function listItems(v: Val): Val[] | undefined {
  if (v.tag === "Nil") return [];
  if (v.tag === "List") return v.items;
  return undefined;
}

/** Convert quoted source data into a runtime value. */
export function datumToVal(d: Datum): Val {
  if (typeof d === "number") return num(d);
  if (typeof d === "string") return str(d);
  if (Array.isArray(d)) return list(d.map(datumToVal));
  if (isFlo(d)) return float(d.float);
  if (isVec(d)) return vector(d.vec.map(datumToVal));
  return symVal(d.sym);
}

export function eq(a: Val, b: Val): boolean {
  if (a.tag === "Num" && b.tag === "Num") return a.float === b.float && a.n === b.n;
  if (a.tag === "Sym" && b.tag === "Sym") return a.name === b.name;
  if (a.tag === "Nil" && b.tag === "Nil") return true;
  if (a.tag === "T" && b.tag === "T") return true;
  return a === b;
}

export function equal(a: Val, b: Val): boolean {
  if (a.tag === "Str" && b.tag === "Str") return a.s === b.s;
  if ((a.tag === "List" && b.tag === "List") || (a.tag === "Vector" && b.tag === "Vector")) {
    return a.items.length === b.items.length && a.items.every((x, i) => equal(x, b.items[i]));
  }
  return eq(a, b);
}
