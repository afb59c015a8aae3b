// src/core/construct/instance.ts
// Validated, frozen instances of registered types

import { cellState, isCell, isForced, peek } from "../cell/cell";

export type FieldValues = Readonly<Record<string, unknown>>;

export interface ProductInstance {
  readonly tag: "Product";
  readonly type: string;
  readonly fields: FieldValues;
}

export interface VariantInstance {
  readonly tag: "Variant";
  readonly type: string;
  readonly variant: string;
  readonly fields: FieldValues;
}

export type Instance = ProductInstance | VariantInstance;

// Only objects sealed here count as instances; a look-alike literal does not.
const sealed = new WeakSet<object>();

export function sealProduct(type: string, fields: Record<string, unknown>): ProductInstance {
  const inst: ProductInstance = { tag: "Product", type, fields: Object.freeze(fields) };
  sealed.add(inst);
  return Object.freeze(inst);
}

export function sealVariant(type: string, variant: string, fields: Record<string, unknown>): VariantInstance {
  const inst: VariantInstance = { tag: "Variant", type, variant, fields: Object.freeze(fields) };
  sealed.add(inst);
  return Object.freeze(inst);
}

export function isInstance(value: unknown): value is Instance {
  return typeof value === "object" && value !== null && sealed.has(value);
}

export function isProduct(value: unknown, type?: string): value is ProductInstance {
  return isInstance(value) && value.tag === "Product" && (type === undefined || value.type === type);
}

export function isVariant(value: unknown, type?: string, variant?: string): value is VariantInstance {
  return (
    isInstance(value) &&
    value.tag === "Variant" &&
    (type === undefined || value.type === type) &&
    (variant === undefined || value.variant === variant)
  );
}

/**
 * Own field value, or undefined when the instance has no such field.
 */
export function getField(inst: Instance, name: string): unknown {
  return Object.hasOwn(inst.fields, name) ? inst.fields[name] : undefined;
}

const MAX_SHOW_DEPTH = 8;

/**
 * Render a value for messages and logs. Never forces a lazy cell.
 */
export function showInstance(value: unknown, depth = 0): string {
  if (depth > MAX_SHOW_DEPTH) return "…";

  if (isInstance(value)) {
    const entries = Object.entries(value.fields).map(([k, v]) => `${k}: ${showInstance(v, depth + 1)}`);
    if (value.tag === "Product") {
      return entries.length === 0 ? `${value.type} {}` : `${value.type} { ${entries.join(", ")} }`;
    }
    return entries.length === 0 ? value.variant : `${value.variant}(${entries.join(", ")})`;
  }

  if (isCell(value)) {
    if (isForced(value)) {
      return showInstance(peek(value), depth + 1);
    }
    return `<${cellState(value).toLowerCase()} ${value.id}>`;
  }

  if (Array.isArray(value)) {
    return `[${value.map(v => showInstance(v, depth + 1)).join(", ")}]`;
  }
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value.toString()}n`;
  if (value instanceof Map) {
    const entries = Array.from(value, ([k, v]) => `${String(k)}: ${showInstance(v, depth + 1)}`);
    return `Map { ${entries.join(", ")} }`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value).map(([k, v]) => `${k}: ${showInstance(v, depth + 1)}`);
    return `{ ${entries.join(", ")} }`;
  }
  return String(value);
}
