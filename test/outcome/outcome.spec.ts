import { describe, it, expect } from "vitest";
import type { Span } from "../../src/outcome/diagnostic";
import { isDone, isFail } from "../../src/outcome/outcome";
import { failure } from "../../src/outcome/failure";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import { done, evaluationError, fail, readError } from "../../src/outcome/constructors";
import { match } from "../../src/outcome/matchers";

const sampleSpan: Span = { start: 3, end: 10 };

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const meta = { span: sampleSpan, durationMs: 12, formCount: 2 };
    const outcome = done("value", meta);
    expect(outcome.tag).toBe("Done");
    expect(outcome.value).toBe("value");
    expect(outcome.meta).toEqual(meta);
  });

  it("constructs Fail outcomes with failures", () => {
    const diag = makeDiagnostic("E0104", { message: "err" });
    const failureObj = failure("user-error", "went wrong", {
      diagnostics: [diag],
      recoverable: true,
    });
    const outcome = fail(failureObj, { durationMs: 5 });
    expect(outcome.tag).toBe("Fail");
    expect(outcome.failure).toBe(failureObj);
    expect(outcome.failure.diagnostics).toEqual([diag]);
    expect(outcome.meta.durationMs).toBe(5);
  });

  it("type guards discriminate outcome variants", () => {
    const doneOutcome = done(1);
    const failOutcome = fail(failure("internal-error", "boom"));

    expect(isDone(doneOutcome)).toBe(true);
    expect(isFail(doneOutcome)).toBe(false);
    expect(isFail(failOutcome)).toBe(true);
    expect(isDone(failOutcome)).toBe(false);
  });

  it("pattern matches outcomes exhaustively", () => {
    const doneResult = match(done("ok"), {
      done: (d) => `done:${d.value}`,
      fail: (f) => `fail:${f.failure.message}`,
    });
    expect(doneResult).toBe("done:ok");

    const failResult = match(fail(failure("wrong-type", "bad input")), {
      done: () => "nope",
      fail: (f) => f.failure.reason,
    });
    expect(failResult).toBe("wrong-type");
  });
});

describe("Failure", () => {
  it("defaults diagnostics and recoverable flags", () => {
    const f = failure("user-error", "bad input");
    expect(f.diagnostics).toEqual([]);
    expect(f.recoverable).toBe(false);
    expect(f.context).toBeUndefined();
  });

  it("accepts custom reasons", () => {
    expect(failure("custom:host-busy", "busy").reason).toBe("custom:host-busy");
  });
});

describe("Diagnostics and codes", () => {
  it("creates diagnostics with interpolation and severity", () => {
    const diag = makeDiagnostic("E0103", { name: "car", actual: 0 }, sampleSpan);
    expect(diag.code).toBe("E0103");
    expect(diag.severity).toBe("error");
    expect(diag.message).toBe("Wrong number of arguments: car, 0");
    expect(diag.span).toEqual(sampleSpan);
    expect(diag.data).toEqual({ name: "car", actual: 0 });
  });

  it("exposes all diagnostic codes", () => {
    expect(Object.keys(DIAGNOSTIC_CODES)).toEqual([
      "E0001",
      "E0100",
      "E0101",
      "E0102",
      "E0103",
      "E0104",
      "E0105",
      "E0199",
    ]);
  });
});

describe("Outcome constructor helpers", () => {
  it("creates read errors pointing at the offending paren", () => {
    const outcome = readError(7, ")", { formCount: 1 });
    expect(outcome.failure.reason).toBe("read-error");
    expect(outcome.failure.message).toBe("Unexpected ')' at offset 7");
    expect(outcome.failure.recoverable).toBe(true);
    expect(outcome.failure.diagnostics[0]?.span).toEqual({ start: 7, end: 8 });
    expect(outcome.meta).toEqual({ formCount: 1, span: { start: 7, end: 8 } });
  });

  it("names a stray bracket in read errors", () => {
    const outcome = readError(2, "]");
    expect(outcome.failure.message).toBe("Unexpected ']' at offset 2");
    expect(outcome.failure.diagnostics[0]?.data).toEqual({ offset: 2, char: "]" });
  });

  it("creates evaluation errors from a code and parameters", () => {
    const outcome = evaluationError("void-function", "E0101", { name: "frob" });
    expect(outcome.failure.message).toBe("Symbol's function definition is void: frob");
    expect(outcome.failure.context).toEqual({ name: "frob" });
    expect(outcome.failure.recoverable).toBe(true);

    const internal = evaluationError("internal-error", "E0199", { message: "x" });
    expect(internal.failure.recoverable).toBe(false);
  });
});
