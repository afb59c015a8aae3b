import { describe, it, expect } from "vitest";
import { type Outcome, isDone, isFail } from "../../src/outcome/outcome";
import { AdtError, allDiagnostics, failure, isAdtError, isFailureReason, wrapFailure } from "../../src/outcome/failure";
import { errorDiag, formatDiagnostic, warnDiag } from "../../src/outcome/diagnostic";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import {
  compileError,
  dispatchError,
  done,
  fail,
  malformedDefinition,
  ok,
  synthesisError,
  typeNotFound,
} from "../../src/outcome/constructors";
import { flatMapOutcome, mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/matchers";

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const outcome = done("value", { durationMs: 12, cached: true });
    expect(outcome.tag).toBe("Done");
    expect(outcome.value).toBe("value");
    expect(outcome.meta).toEqual({ durationMs: 12, cached: true });
  });

  it("constructs Fail outcomes with failures", () => {
    const diag = errorDiag("E0001", "err");
    const f = failure("dispatch-error", "NotAnInstance", "nope", { diagnostics: [diag], recoverable: true });
    const outcome = fail(f, { durationMs: 5 });
    expect(outcome.tag).toBe("Fail");
    expect(outcome.failure).toBe(f);
    expect(outcome.failure.diagnostics).toEqual([diag]);
    expect(outcome.meta.durationMs).toBe(5);
  });

  it("type guards discriminate outcome variants", () => {
    const d = ok(1);
    const f = typeNotFound("Nope");
    expect(isDone(d)).toBe(true);
    expect(isFail(d)).toBe(false);
    expect(isFail(f)).toBe(true);
  });

  it("maps and chains successful outcomes and passes failures through", () => {
    const doubled = mapOutcome(done(2), n => n * 2);
    expect(unwrap(doubled)).toBe(4);

    const chained = flatMapOutcome(done(2), n => (n > 1 ? done(`big ${n}`) : typeNotFound("Small")));
    expect(unwrap(chained)).toBe("big 2");

    const missing = typeNotFound("Nope");
    expect(mapOutcome(missing, () => 1)).toBe(missing);
    expect(unwrapOr(missing, 7)).toBe(7);
  });

  it("matches on the outcome tag", () => {
    const render = (o: Outcome<number>) =>
      match(o, { done: d => `value ${d.value}`, fail: f => f.failure.kind });
    expect(render(done(3))).toBe("value 3");
    expect(render(typeNotFound("X"))).toBe("TypeNotFound");
  });

  it("unwrap throws an AdtError carrying the failure", () => {
    const missing = typeNotFound("Nope");
    let caught: unknown;
    try {
      unwrap(missing);
    } catch (e) {
      caught = e;
    }
    expect(isAdtError(caught)).toBe(true);
    if (caught instanceof AdtError) {
      expect(caught.failure).toBe(missing.failure);
      expect(caught.reason).toBe("type-not-found");
      expect(caught.kind).toBe("TypeNotFound");
      expect(caught.message).toBe("Unknown type: Nope");
    }
  });
});

describe("Failures", () => {
  it("wraps failures and collects diagnostics without duplicates", () => {
    const d1 = errorDiag("E0001", "first");
    const d2 = warnDiag("W0001", "second");
    const inner = failure("compile-error", "NonExhaustiveMatch", "inner", { diagnostics: [d1, d2], context: { a: 1 } });
    const outer = wrapFailure(inner, "outer", { b: 2 });

    expect(outer.message).toBe("outer");
    expect(outer.cause).toBe(inner);
    expect(outer.context).toEqual({ a: 1, b: 2 });
    expect(allDiagnostics(outer)).toEqual([d1, d2]);
    expect(isFailureReason(outer, "compile-error")).toBe(true);
  });

  it("marks only run-time failures as recoverable", () => {
    expect(dispatchError("GuardExhaustionFailure", "m").failure.recoverable).toBe(true);
    expect(compileError("NonExhaustiveMatch", "m").failure.recoverable).toBe(false);
    expect(synthesisError("NoMatchingRule", "m").failure.recoverable).toBe(true);
    expect(synthesisError("UnknownVariant", "m").failure.recoverable).toBe(false);
  });

  it("prefixes malformed definitions with E0100", () => {
    const detail = makeDiagnostic("E0105", { name: "Empty" }, "Empty");
    const result = malformedDefinition("Empty", "NoVariants", [detail]);
    expect(result.failure.reason).toBe("malformed-type-definition");
    expect(result.failure.kind).toBe("NoVariants");
    expect(result.failure.message).toBe("Malformed type definition Empty: Sum type Empty declares no variants");
    expect(result.failure.diagnostics.map(d => d.code)).toEqual(["E0100", "E0105"]);
  });
});

describe("Diagnostics", () => {
  it("fills code templates and keeps the path", () => {
    const diag = makeDiagnostic("E0101", { field: "x", owner: "Point" }, "Point.fields[1]");
    expect(diag).toEqual({
      code: "E0101",
      severity: "error",
      message: "Duplicate field x in Point",
      path: "Point.fields[1]",
      data: { field: "x", owner: "Point" },
    });
    expect(formatDiagnostic(diag)).toBe("error E0101 at Point.fields[1]: Duplicate field x in Point");
  });

  it("formats warnings without a path", () => {
    const diag = makeDiagnostic("W0002", { variant: "None", name: "Option" });
    expect(formatDiagnostic(diag)).toBe("warning W0002: No rule produces variant None of Option");
  });

  it("keys every code table entry by its own code", () => {
    for (const [key, def] of Object.entries(DIAGNOSTIC_CODES)) {
      expect(def.code).toBe(key);
      expect(def.severity).toBe(key.startsWith("W") ? "warning" : "error");
    }
  });
});
