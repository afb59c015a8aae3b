// src/core/synthesis/synthesis.ts
// Input → sum-type instance through ordered rules

import type { TypeRegistry } from "../../registry/registry";
import type { Outcome } from "../../outcome/outcome";
import { makeDiagnostic } from "../../outcome/codes";
import { done, synthesisError, typeNotFound } from "../../outcome/constructors";
import { systemClock } from "../../ports/clock";
import { nullEmitter } from "../events/bus";
import { type ConstructContext, constructVariant } from "../construct/construct";
import type { VariantInstance } from "../construct/instance";
import type { SynthesisPlan, SynthesisRule } from "./types";

export function rule<I>(
  variant: string,
  when: (input: I) => boolean,
  build: (input: I) => Readonly<Record<string, unknown>>,
  name?: string
): SynthesisRule<I> {
  return name === undefined ? { variant, when, build } : { variant, when, build, name };
}

function ruleName<I>(r: SynthesisRule<I>, index: number): string {
  return r.name ?? `#${index}`;
}

/**
 * Check rules against a sum type. Every rule must name a declared variant.
 * Variants no rule produces are listed, with a warning, but are not an error.
 */
export function compileSynthesis<I>(
  registry: TypeRegistry,
  typeName: string,
  rules: readonly SynthesisRule<I>[]
): Outcome<SynthesisPlan<I>> {
  const entry = registry.entry(typeName);
  if (!entry) return typeNotFound(typeName);

  const def = entry.definition;
  if (def.kind !== "Sum") {
    return synthesisError("KindMismatch", `Cannot synthesize ${typeName}: it is a product type`, {
      diagnostics: [makeDiagnostic("E0602", { name: typeName, actual: "product" })],
      context: { type: typeName },
    });
  }

  const declared = def.variants.map(v => v.name);
  const bad = rules
    .map((r, index) => ({ r, index }))
    .filter(({ r }) => !declared.includes(r.variant));
  if (bad.length > 0) {
    return synthesisError("UnknownVariant", `Synthesis rules for ${typeName} build unknown variant(s): ${bad.map(b => b.r.variant).join(", ")}`, {
      diagnostics: bad.map(({ r, index }) =>
        makeDiagnostic("E0601", { rule: ruleName(r, index), variant: r.variant, name: typeName }, `rules[${index}]`)
      ),
      context: { type: typeName, knownVariants: declared },
    });
  }

  const produced = new Set(rules.map(r => r.variant));
  const unproducible = declared.filter(v => !produced.has(v));

  return done({
    type: typeName,
    fingerprint: entry.fingerprint,
    rules: [...rules],
    unproducible,
    warnings: unproducible.map(variant => makeDiagnostic("W0002", { variant, name: typeName })),
  });
}

/**
 * Apply the first rule whose predicate holds. The built fields go through
 * constructVariant, so a rule that builds bad fields fails validation.
 */
export function synthesize<I>(ctx: ConstructContext, plan: SynthesisPlan<I>, input: I): Outcome<VariantInstance> {
  const events = ctx.events ?? nullEmitter;
  const clock = ctx.clock ?? systemClock;
  const start = clock.nowMs();

  const ruleIndex = plan.rules.findIndex(r => r.when(input));
  const selected = plan.rules[ruleIndex];
  if (ruleIndex < 0 || !selected) {
    events.emit({ tag: "SynthesisFailed", type: plan.type, errorKind: "NoMatchingRule" });
    return synthesisError("NoMatchingRule", `No synthesis rule matched input for ${plan.type}`, {
      diagnostics: [makeDiagnostic("E0600", { name: plan.type })],
      context: { type: plan.type, rulesTried: plan.rules.length },
    });
  }

  const built = constructVariant(ctx, plan.type, selected.variant, selected.build(input));
  if (built.tag === "Fail") {
    events.emit({ tag: "SynthesisFailed", type: plan.type, errorKind: built.failure.kind });
    return built;
  }

  const durationMs = clock.nowMs() - start;
  events.emit({ tag: "InstanceSynthesized", type: plan.type, variant: selected.variant, ruleIndex, durationMs });
  return done(built.value, { durationMs });
}
