// src/core/construct/typecheck.ts
// Structural checks of runtime values against type tags

import type { TypeRegistry } from "../../registry/registry";
import { type TypeTag, showTypeTag } from "../../registry/types";
import { isInstance } from "./instance";
import { isCell, isForced, peek } from "../cell/cell";

export type Mismatch = {
  path: string;
  expected: string;
  actual: string;
};

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (isInstance(value)) {
    return value.tag === "Product" ? `instance of ${value.type}` : `instance of ${value.type}.${value.variant}`;
  }
  if (isCell(value)) return "recursion cell";
  if (value instanceof Map) return "Map";
  return typeof value;
}

/**
 * Plain objects only: no instances, cells, arrays or class instances.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  if (isInstance(value) || isCell(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function checkPrim(prim: string, value: unknown): boolean {
  switch (prim) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "bigint":
      return typeof value === "bigint";
    case "null":
      return value === null;
    case "any":
      return true;
    default:
      return false;
  }
}

function checkInstanceOf(registry: TypeRegistry, name: string, value: unknown, path: string): Mismatch[] {
  if (!registry.has(name)) {
    return [{ path, expected: `${name} (undeclared type)`, actual: describeValue(value) }];
  }
  if (isInstance(value) && value.type === name) return [];
  return [{ path, expected: name, actual: describeValue(value) }];
}

/**
 * Every place where `value` fails to satisfy `tag`. Empty means it conforms.
 * An unforced lazy cell in a Rec position conforms; its value is not inspected.
 */
export function checkValue(registry: TypeRegistry, tag: TypeTag, value: unknown, path: string): Mismatch[] {
  switch (tag.tag) {
    case "Prim":
      return checkPrim(tag.prim, value) ? [] : [{ path, expected: tag.prim, actual: describeValue(value) }];

    case "Ref":
      return checkInstanceOf(registry, tag.name, value, path);

    case "Seq":
      if (!Array.isArray(value)) {
        return [{ path, expected: showTypeTag(tag), actual: describeValue(value) }];
      }
      return value.flatMap((el: unknown, i) => checkValue(registry, tag.of, el, `${path}[${i}]`));

    case "MapOf":
      if (value instanceof Map) {
        const out: Mismatch[] = [];
        for (const [key, el] of value) {
          if (typeof key !== "string") {
            out.push({ path: `${path}.<key>`, expected: "string key", actual: describeValue(key) });
          } else {
            out.push(...checkValue(registry, tag.of, el, `${path}.${key}`));
          }
        }
        return out;
      }
      if (!isPlainRecord(value)) {
        return [{ path, expected: showTypeTag(tag), actual: describeValue(value) }];
      }
      return Object.entries(value).flatMap(([key, el]) => checkValue(registry, tag.of, el, `${path}.${key}`));

    case "Rec":
      if (!isCell(value)) {
        return [{ path, expected: showTypeTag(tag), actual: describeValue(value) }];
      }
      if (!isForced(value)) return [];
      return checkInstanceOf(registry, tag.name, peek(value), path);
  }
}

// ─────────────────────────────────────────────────────────────────
// Snapshots
// ─────────────────────────────────────────────────────────────────

/**
 * A Map whose contents are fixed at construction.
 */
export class FrozenMap<K, V> extends Map<K, V> {
  private sealed = false;

  constructor(entries: Iterable<readonly [K, V]>) {
    super();
    for (const [k, v] of entries) super.set(k, v);
    this.sealed = true;
  }

  override set(key: K, value: V): this {
    if (this.sealed) throw new TypeError("Cannot modify a frozen map");
    return super.set(key, value);
  }

  override delete(_key: K): boolean {
    throw new TypeError("Cannot modify a frozen map");
  }

  override clear(): void {
    throw new TypeError("Cannot modify a frozen map");
  }
}

/**
 * Copy a conforming value so later changes to the caller's arrays, records
 * and Maps do not reach the instance. Instances and cells are kept as they are.
 */
export function snapshotValue(tag: TypeTag, value: unknown): unknown {
  switch (tag.tag) {
    case "Seq":
      return Array.isArray(value) ? Object.freeze(value.map((el: unknown) => snapshotValue(tag.of, el))) : value;

    case "MapOf":
      if (value instanceof Map) {
        return Object.freeze(new FrozenMap(Array.from(value, ([k, v]: [unknown, unknown]) => [k, snapshotValue(tag.of, v)] as const)));
      }
      if (isPlainRecord(value)) {
        return Object.freeze(Object.fromEntries(Object.entries(value).map(([k, v]) => [k, snapshotValue(tag.of, v)])));
      }
      return value;

    case "Prim":
    case "Ref":
    case "Rec":
      return value;
  }
}
