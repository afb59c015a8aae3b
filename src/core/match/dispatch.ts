// src/core/match/dispatch.ts
// Run a compiled pattern against a value

import type { Outcome } from "../../outcome/outcome";
import { makeDiagnostic } from "../../outcome/codes";
import { dispatchError, done } from "../../outcome/constructors";
import type { ClockPort } from "../../ports/clock";
import { systemClock } from "../../ports/clock";
import type { EventEmitter } from "../events/types";
import { nullEmitter } from "../events/bus";
import { isInstance } from "../construct/instance";
import { describeValue } from "../construct/typecheck";
import type { PatternCompiler } from "./compiler";
import type { Clause, CompiledPattern } from "./types";

export interface DispatchContext {
  events?: EventEmitter;
  clock?: ClockPort;
}

/**
 * Select and run the first clause whose variant matches and whose guard, if
 * any, holds. Handler exceptions propagate to the caller unchanged.
 */
export function dispatch<R>(ctx: DispatchContext, compiled: CompiledPattern<R>, value: unknown): Outcome<R> {
  const events = ctx.events ?? nullEmitter;
  const clock = ctx.clock ?? systemClock;
  const start = clock.nowMs();
  const { table, clauses } = compiled;

  if (!isInstance(value)) {
    const actual = describeValue(value);
    events.emit({ tag: "DispatchFailed", type: table.type, errorKind: "NotAnInstance" });
    return dispatchError("NotAnInstance", `Cannot match on ${actual}: not an instance of ${table.type}`, {
      diagnostics: [makeDiagnostic("E0402", { actual })],
      context: { type: table.type, actual },
    });
  }

  if (value.tag !== "Variant" || value.type !== table.type) {
    const actual = value.tag === "Variant" ? value.type : `${value.type} (product)`;
    events.emit({ tag: "DispatchFailed", type: table.type, errorKind: "TypeMismatch" });
    return dispatchError("TypeMismatch", `Pattern compiled for ${table.type} applied to ${actual}`, {
      diagnostics: [makeDiagnostic("E0401", { expected: table.type, actual })],
      context: { expected: table.type, actual },
    });
  }

  const row = table.rows.get(value.variant) ?? table.fallback;
  if (!row) {
    events.emit({ tag: "DispatchFailed", type: table.type, variant: value.variant, errorKind: "UnknownVariant" });
    return dispatchError("UnknownVariant", `Variant ${value.variant} is not in the decision table for ${table.type}`, {
      diagnostics: [makeDiagnostic("E0403", { variant: value.variant, name: table.type })],
      context: { type: table.type, variant: value.variant },
    });
  }

  const tried: number[] = [];
  for (const index of row) {
    const clause: Clause<R> | undefined = clauses[index];
    if (!clause) continue;
    tried.push(index);
    if (clause.guard && !clause.guard(value.fields, value)) continue;

    const result = clause.handler(value.fields, value);
    events.emit({
      tag: "PatternDispatched",
      type: table.type,
      variant: value.variant,
      clauseIndex: index,
      durationMs: clock.nowMs() - start,
    });
    return done(result, { durationMs: clock.nowMs() - start });
  }

  events.emit({ tag: "DispatchFailed", type: table.type, variant: value.variant, errorKind: "GuardExhaustionFailure" });
  return dispatchError("GuardExhaustionFailure", `No guard matched for ${table.type}.${value.variant}`, {
    diagnostics: [makeDiagnostic("E0400", { name: table.type, variant: value.variant })],
    context: { type: table.type, variant: value.variant, triedClauses: tried },
  });
}

/**
 * Compile (or fetch from cache) and dispatch in one step.
 */
export function distill<R>(
  compiler: PatternCompiler,
  ctx: DispatchContext,
  typeName: string,
  clauses: readonly Clause<R>[],
  value: unknown
): Outcome<R> {
  const compiled = compiler.compile(typeName, clauses);
  if (compiled.tag === "Fail") return compiled;
  return dispatch(ctx, compiled.value, value);
}
