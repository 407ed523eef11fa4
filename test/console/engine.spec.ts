import { describe, it, expect } from "vitest";
import { composeUnit, evaluate } from "../../src/core/console/engine";
import { segmentForms } from "../../src/core/console/segment";
import { createScratchContext, ScratchEvaluator } from "../../src/core/eval/evaluator";
import { VoidVariableError } from "../../src/core/eval/errors";
import { num, VNil } from "../../src/core/eval/values";
import { printVal } from "../../src/core/printer/print";
import { sym } from "../../src/core/reader/datum";
import { isDone, isFail } from "../../src/outcome/outcome";
import { RecordingEvaluator } from "../helpers/console";

describe("composeUnit", () => {
  it("leaves a single form as written", () => {
    expect(composeUnit("(a)", segmentForms("(a)"))).toBe("(a)");
  });

  it("wraps several forms in a sequence, closing on its own line", () => {
    const text = "(a) (b) ; tail";
    expect(composeUnit(text, segmentForms(text))).toBe("(progn\n(a) (b)\n)");
  });

  it("leaves out an incomplete trailing form", () => {
    const text = "(a) (b) (c";
    expect(composeUnit(text, segmentForms(text))).toBe("(progn\n(a) (b)\n)");
  });
});

describe("evaluate", () => {
  const scratch = new ScratchEvaluator();

  it("evaluates a single form", () => {
    const outcome = evaluate("(+ 1 2)", createScratchContext(), scratch);
    expect(isDone(outcome)).toBe(true);
    if (isDone(outcome)) {
      expect(outcome.value).toEqual(num(3));
      expect(outcome.meta.formCount).toBe(1);
    }
  });

  it("evaluates several forms in order and returns the last value", () => {
    const outcome = evaluate("(setq x 1) (setq y 2) (+ x y)", createScratchContext(), scratch);
    expect(isDone(outcome)).toBe(true);
    if (isDone(outcome)) {
      expect(outcome.value).toEqual(num(3));
      expect(outcome.meta.formCount).toBe(3);
    }
  });

  it("runs every form exactly once", () => {
    const ctx = createScratchContext();
    const outcome = evaluate(
      "(setq log nil) (setq log (cons 1 log)) (setq log (cons 2 log)) log",
      ctx,
      scratch
    );
    expect(isDone(outcome) && printVal(outcome.value)).toBe("(2 1)");
  });

  it("hands several forms to the evaluator as one sequence", () => {
    const ev = new RecordingEvaluator();
    const ctx = { name: "buf" };
    evaluate("(a) (b)", ctx, ev);
    expect(ev.forms).toEqual([[sym("progn"), [sym("a")], [sym("b")]]]);
    expect(ev.contexts).toEqual([ctx]);
  });

  it("hands a single form over unwrapped", () => {
    const ev = new RecordingEvaluator();
    evaluate("(defvar v 1)", { name: "buf" }, ev);
    expect(ev.forms).toEqual([[sym("defvar"), sym("v"), 1]]);
  });

  it("returns nil for empty text without calling the evaluator", () => {
    const ev = new RecordingEvaluator(() => num(1));
    const outcome = evaluate("  ; nothing here\n", { name: "buf" }, ev);
    expect(isDone(outcome) && outcome.value).toEqual(VNil);
    expect(ev.forms).toEqual([]);
  });

  it("ignores an incomplete trailing form", () => {
    const ctx = createScratchContext();
    const outcome = evaluate("(setq a 1) (setq b 2) (+ a", ctx, scratch);
    expect(isDone(outcome) && outcome.value).toEqual(num(2));
    expect(isDone(outcome) && outcome.meta.formCount).toBe(2);
  });

  it("ignores a trailing comment after several forms", () => {
    const outcome = evaluate("(+ 1 2) (+ 3 4) ; done", createScratchContext(), scratch);
    expect(isDone(outcome) && outcome.value).toEqual(num(7));
  });

  it("reports a stray paren before evaluating anything", () => {
    const ev = new RecordingEvaluator();
    const outcome = evaluate("(a) )", { name: "buf" }, ev);
    expect(ev.forms).toEqual([]);
    expect(isFail(outcome)).toBe(true);
    if (isFail(outcome)) {
      expect(outcome.failure.reason).toBe("read-error");
      expect(outcome.failure.message).toBe("Unexpected ')' at offset 4");
      expect(outcome.meta.span).toEqual({ start: 4, end: 5 });
    }
  });

  it("reports a stray bracket by its character", () => {
    const ev = new RecordingEvaluator();
    const outcome = evaluate("[a] ]", { name: "buf" }, ev);
    expect(ev.forms).toEqual([]);
    expect(isFail(outcome) && outcome.failure.message).toBe("Unexpected ']' at offset 4");
  });

  it("evaluates backquote templates inside a sequence", () => {
    const outcome = evaluate("(setq b 2 c '(3 4)) `(a ,b ,@c)", createScratchContext(), scratch);
    expect(isDone(outcome) && printVal(outcome.value)).toBe("(a 2 3 4)");
    expect(isDone(outcome) && outcome.meta.formCount).toBe(2);
  });

  it("maps evaluator errors to classified failures", () => {
    const ev = new RecordingEvaluator(() => {
      throw new VoidVariableError("x");
    });
    const outcome = evaluate("x", { name: "buf" }, ev);
    expect(isFail(outcome)).toBe(true);
    if (isFail(outcome)) {
      expect(outcome.failure.reason).toBe("void-variable");
      expect(outcome.failure.message).toBe("Symbol's value as variable is void: x");
      expect(outcome.failure.recoverable).toBe(true);
      expect(outcome.failure.diagnostics[0].code).toBe("E0100");
    }
  });

  it("reports anything else thrown as an internal error", () => {
    const ev = new RecordingEvaluator(() => {
      throw new Error("boom");
    });
    const outcome = evaluate("(a)", { name: "buf" }, ev);
    expect(isFail(outcome)).toBe(true);
    if (isFail(outcome)) {
      expect(outcome.failure.reason).toBe("internal-error");
      expect(outcome.failure.message).toBe("Internal error: boom");
      expect(outcome.failure.recoverable).toBe(false);
    }
  });

  it("keeps side effects of forms that ran before an error", () => {
    const ctx = createScratchContext();
    const outcome = evaluate("(setq seen 1) (car 5) (setq seen 2)", ctx, scratch);
    expect(isFail(outcome) && outcome.failure.message).toBe("Wrong type argument: listp, 5");
    expect(ctx.globals.lookup("seen")).toEqual(num(1));
  });
});
