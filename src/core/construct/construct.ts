// src/core/construct/construct.ts
// Product and variant construction against the registry

import type { TypeRegistry } from "../../registry/registry";
import type { FieldSpec, SumDefinition } from "../../registry/types";
import type { Outcome } from "../../outcome/outcome";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { ValidationFailureKind } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";
import { done, validationError } from "../../outcome/constructors";
import type { ClockPort } from "../../ports/clock";
import { systemClock } from "../../ports/clock";
import type { EventEmitter } from "../events/types";
import { nullEmitter } from "../events/bus";
import { type ProductInstance, type VariantInstance, sealProduct, sealVariant } from "./instance";
import { type Mismatch, checkValue, describeValue, isPlainRecord, snapshotValue } from "./typecheck";

export interface ConstructContext {
  registry: TypeRegistry;
  events?: EventEmitter;
  clock?: ClockPort;
}

type FieldCheck = {
  unknownFields: string[];
  missingFields: string[];
  mismatches: Mismatch[];
  diagnostics: Diagnostic[];
  fields: Record<string, unknown>;
};

/**
 * Compare supplied values with the declared field list. Extra keys are
 * reported, not dropped.
 */
function checkFields(
  registry: TypeRegistry,
  owner: string,
  specs: readonly FieldSpec[],
  values: Readonly<Record<string, unknown>>
): FieldCheck {
  const declared = new Set(specs.map(s => s.name));
  const unknownFields = Object.keys(values).filter(k => !declared.has(k));
  const missingFields: string[] = [];
  const mismatches: Mismatch[] = [];
  const fields: Record<string, unknown> = {};

  for (const spec of specs) {
    if (!Object.hasOwn(values, spec.name)) {
      missingFields.push(spec.name);
      continue;
    }
    const value = values[spec.name];
    mismatches.push(...checkValue(registry, spec.type, value, spec.name));
    fields[spec.name] = snapshotValue(spec.type, value);
  }

  const diagnostics = [
    ...unknownFields.map(field => makeDiagnostic("E0200", { field, owner }, field)),
    ...missingFields.map(field => makeDiagnostic("E0201", { field, owner }, field)),
    ...mismatches.map(m => makeDiagnostic("E0202", { expected: m.expected, actual: m.actual }, m.path)),
  ];

  return { unknownFields, missingFields, mismatches, diagnostics, fields };
}

function firstKind(check: FieldCheck): ValidationFailureKind | undefined {
  if (check.unknownFields.length > 0) return "UnknownField";
  if (check.missingFields.length > 0) return "MissingField";
  if (check.mismatches.length > 0) return "TypeMismatch";
  return undefined;
}

function summarize(check: FieldCheck): string {
  const parts: string[] = [];
  if (check.unknownFields.length > 0) parts.push(`unknown ${check.unknownFields.join(", ")}`);
  if (check.missingFields.length > 0) parts.push(`missing ${check.missingFields.join(", ")}`);
  for (const m of check.mismatches) {
    parts.push(`${m.path}: expected ${m.expected}, got ${m.actual}`);
  }
  return parts.join("; ");
}

function rejectValues(owner: string, values: unknown): Outcome<never> {
  const actual = describeValue(values);
  return validationError("TypeMismatch", `Field values for ${owner} must be a plain object, got ${actual}`, {
    diagnostics: [makeDiagnostic("E0202", { expected: "field record", actual })],
    context: { type: owner },
  });
}

function report(ctx: ConstructContext, result: Outcome<unknown>, type: string, variant: string | undefined, start: number): void {
  const events = ctx.events ?? nullEmitter;
  if (!events.active) return;

  if (result.tag === "Done") {
    const durationMs = (ctx.clock ?? systemClock).nowMs() - start;
    events.emit(variant === undefined
      ? { tag: "InstanceConstructed", type, durationMs }
      : { tag: "InstanceConstructed", type, variant, durationMs });
  } else {
    events.emit(variant === undefined
      ? { tag: "ValidationFailed", type, errorKind: result.failure.kind }
      : { tag: "ValidationFailed", type, variant, errorKind: result.failure.kind });
  }
}

/**
 * Build a product instance. Every declared field must be present and
 * conform; unknown keys fail with UnknownField.
 */
export function constructProduct(
  ctx: ConstructContext,
  typeName: string,
  values: Readonly<Record<string, unknown>>
): Outcome<ProductInstance> {
  const start = (ctx.clock ?? systemClock).nowMs();
  const result = buildProduct(ctx.registry, typeName, values);
  report(ctx, result, typeName, undefined, start);
  return result;
}

function buildProduct(
  registry: TypeRegistry,
  typeName: string,
  values: Readonly<Record<string, unknown>>
): Outcome<ProductInstance> {
  const found = registry.require(typeName);
  if (found.tag === "Fail") return found;

  const def = found.value;
  if (def.kind !== "Product") {
    return validationError("KindMismatch", `${typeName} is a sum type; construct one of its variants`, {
      diagnostics: [makeDiagnostic("E0204", { name: typeName, actual: "sum", expected: "product" })],
      context: { type: typeName },
    });
  }
  if (!isPlainRecord(values)) return rejectValues(typeName, values);

  const check = checkFields(registry, typeName, def.fields, values);
  const kind = firstKind(check);
  if (kind) {
    return validationError(kind, `Invalid fields for ${typeName}: ${summarize(check)}`, {
      diagnostics: check.diagnostics,
      context: {
        type: typeName,
        unknownFields: check.unknownFields,
        missingFields: check.missingFields,
        mismatches: check.mismatches,
      },
    });
  }

  return done(sealProduct(typeName, check.fields));
}

/**
 * Build a sum-type instance of one variant, with exactly that variant's fields.
 */
export function constructVariant(
  ctx: ConstructContext,
  typeName: string,
  variantName: string,
  values: Readonly<Record<string, unknown>> = {}
): Outcome<VariantInstance> {
  const start = (ctx.clock ?? systemClock).nowMs();
  const result = buildVariant(ctx.registry, typeName, variantName, values);
  report(ctx, result, typeName, variantName, start);
  return result;
}

function unknownVariant(def: SumDefinition, variantName: string): Outcome<never> {
  const knownVariants = def.variants.map(v => v.name);
  return validationError("UnknownVariant", `Unknown variant ${variantName} of ${def.name} (expected one of ${knownVariants.join(", ")})`, {
    diagnostics: [makeDiagnostic("E0203", { variant: variantName, name: def.name })],
    context: { type: def.name, variant: variantName, knownVariants },
  });
}

function buildVariant(
  registry: TypeRegistry,
  typeName: string,
  variantName: string,
  values: Readonly<Record<string, unknown>>
): Outcome<VariantInstance> {
  const found = registry.require(typeName);
  if (found.tag === "Fail") return found;

  const def = found.value;
  if (def.kind !== "Sum") {
    return validationError("KindMismatch", `${typeName} is a product type and has no variants`, {
      diagnostics: [makeDiagnostic("E0204", { name: typeName, actual: "product", expected: "sum" })],
      context: { type: typeName, variant: variantName },
    });
  }

  const spec = def.variants.find(v => v.name === variantName);
  if (!spec) return unknownVariant(def, variantName);
  if (!isPlainRecord(values)) return rejectValues(`${typeName}.${variantName}`, values);

  const owner = `${typeName}.${variantName}`;
  const check = checkFields(registry, owner, spec.fields, values);
  const kind = firstKind(check);
  if (kind) {
    return validationError(kind, `Invalid fields for ${owner}: ${summarize(check)}`, {
      diagnostics: check.diagnostics,
      context: {
        type: typeName,
        variant: variantName,
        unknownFields: check.unknownFields,
        missingFields: check.missingFields,
        mismatches: check.mismatches,
      },
    });
  }

  return done(sealVariant(typeName, variantName, check.fields));
}
