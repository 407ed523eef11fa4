export type Sym = { sym: string };

/** A number read with a decimal point or an exponent. */
export type Flo = { float: number };

/** A `[...]` vector literal. */
export type Vec = { vec: Datum[] };

/**
 * Source-level data produced by the reader. Integers are plain numbers and
 * `()` reads as the empty list.
 */
export type Datum =
  | number
  | Flo
  | string
  | Sym
  | Vec
  | Datum[];

export const sym = (s: string): Sym => ({ sym: s });
export const flo = (n: number): Flo => ({ float: n });
export const vec = (items: Datum[]): Vec => ({ vec: items });

export const isSym = (d: Datum): d is Sym => typeof d === "object" && !Array.isArray(d) && "sym" in d;
export const isFlo = (d: Datum): d is Flo => typeof d === "object" && !Array.isArray(d) && "float" in d;
export const isVec = (d: Datum): d is Vec => typeof d === "object" && !Array.isArray(d) && "vec" in d;

/** Reader prefix characters and the symbols their forms are headed by. */
export const PREFIXES = {
  quote: "'",
  function: "#'",
  "`": "`",
  ",": ",",
  ",@": ",@",
} as const;

export type PrefixHead = keyof typeof PREFIXES;

export function isPrefixHead(name: string): name is PrefixHead {
  return Object.hasOwn(PREFIXES, name);
}
