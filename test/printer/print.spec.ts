import { describe, it, expect } from "vitest";
import { formatNumber, formatString, prettyPrint, printDatum, printVal } from "../../src/core/printer/print";
import { float, list, num, str, symVal, vector, VNil, VT } from "../../src/core/eval/values";
import { buildPrims } from "../../src/core/eval/prims";
import { createScratchContext } from "../../src/core/eval/evaluator";
import { flo, sym, vec } from "../../src/core/reader/datum";
import { run } from "../helpers/console";

describe("printVal", () => {
  it("prints atoms and lists readably", () => {
    expect(printVal(list([num(1), str("a\"b"), symVal("foo"), VNil, VT]))).toBe("(1 \"a\\\"b\" foo nil t)");
    expect(printVal(str("back\\slash"))).toBe("\"back\\\\slash\"");
  });

  it("prints strings raw without escaping", () => {
    expect(printVal(list([str("x")]), false)).toBe("(x)");
  });

  it("prints closures as lambda expressions", () => {
    const fn = run("(lambda (x &optional y) (* x 2))", createScratchContext());
    expect(printVal(fn)).toBe("(lambda (x &optional y) (* x 2))");
  });

  it("keeps a fraction on integral floats", () => {
    expect(printVal(float(2))).toBe("2.0");
    expect(printVal(float(2.5))).toBe("2.5");
    expect(printVal(num(2))).toBe("2");
  });

  it("prints vectors in brackets", () => {
    expect(printVal(vector([num(1), list([num(2)]), str("s")]))).toBe("[1 (2) \"s\"]");
    expect(printVal(vector([]))).toBe("[]");
  });

  it("abbreviates quote and backquote forms", () => {
    expect(printVal(list([symVal("quote"), symVal("x")]))).toBe("'x");
    expect(printVal(list([symVal("function"), symVal("car")]))).toBe("#'car");
    expect(printVal(list([symVal("quote"), symVal("x"), symVal("y")]))).toBe("(quote x y)");
  });

  it("prints builtins as subrs", () => {
    const plus = buildPrims().get("+");
    expect(plus && printVal(plus)).toBe("#<subr +>");
  });
});

describe("printDatum", () => {
  it("prints reader data", () => {
    expect(printDatum([sym("quote"), [1, "s"]])).toBe("'(1 \"s\")");
    expect(printDatum([sym("`"), [sym("a"), [sym(","), sym("b")], [sym(",@"), sym("c")]]])).toBe("`(a ,b ,@c)");
    expect(printDatum(vec([1, flo(2)]))).toBe("[1 2.0]");
    expect(printDatum([])).toBe("nil");
  });
});

describe("formatNumber", () => {
  it("prints infinities and NaN the way they read back", () => {
    expect(formatNumber(Infinity, true)).toBe("1.0e+INF");
    expect(formatNumber(-Infinity, true)).toBe("-1.0e+INF");
    expect(formatNumber(NaN, true)).toBe("0.0e+NaN");
  });

  it("leaves exponent notation alone", () => {
    expect(formatNumber(1e21, true)).toBe("1e+21");
    expect(formatNumber(7, false)).toBe("7");
  });
});

describe("prettyPrint", () => {
  it("keeps lists that fit on one line", () => {
    expect(prettyPrint(list([symVal("a"), num(1), str("b")]))).toBe("(a 1 \"b\")");
  });

  it("puts one element per line when a list does not fit", () => {
    const defun = list([
      symVal("defun"),
      symVal("foo"),
      list([symVal("x")]),
      list([symVal("+"), symVal("x"), num(1)]),
    ]);
    expect(prettyPrint(defun, 10)).toBe("(defun\n foo\n (x)\n (+ x 1))");
  });

  it("breaks nested lists relative to their own indentation", () => {
    const nested = list([symVal("a"), list([symVal("bbbb"), symVal("cccc")])]);
    expect(prettyPrint(nested, 8)).toBe("(a\n (bbbb\n  cccc))");
  });
});

describe("formatString", () => {
  it("interpolates %s, %S, %d and %%", () => {
    expect(formatString("%s=%S %d%%", [str("a"), str("b"), num(5)])).toBe("a=\"b\" 5%");
  });

  it("leaves missing arguments empty", () => {
    expect(formatString("[%s]", [])).toBe("[]");
  });
});
