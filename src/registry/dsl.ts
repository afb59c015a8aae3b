import type {
  FieldSpec,
  PrimitiveTag,
  ProductDefinition,
  SumDefinition,
  TypeTag,
  VariantSpec,
} from "./types";

function prim(p: PrimitiveTag): TypeTag {
  return { tag: "Prim", prim: p };
}

/**
 * Type tag builders.
 *
 * @example
 * ```ts
 * const List = sum("List", [
 *   variant("Cons", field("head", t.any), field("tail", t.rec("List"))),
 *   variant("Nil"),
 * ]);
 * ```
 */
export const t = {
  string: prim("string"),
  number: prim("number"),
  integer: prim("integer"),
  boolean: prim("boolean"),
  bigint: prim("bigint"),
  null: prim("null"),
  any: prim("any"),
  ref: (name: string): TypeTag => ({ tag: "Ref", name }),
  seq: (of: TypeTag): TypeTag => ({ tag: "Seq", of }),
  mapOf: (of: TypeTag): TypeTag => ({ tag: "MapOf", of }),
  rec: (name: string): TypeTag => ({ tag: "Rec", name }),
} as const;

export function field(name: string, type: TypeTag, doc?: string): FieldSpec {
  return doc === undefined ? { name, type } : { name, type, doc };
}

export function variant(name: string, ...fields: FieldSpec[]): VariantSpec {
  return { name, fields };
}

export function product(name: string, fields: FieldSpec[], doc?: string): ProductDefinition {
  return doc === undefined ? { kind: "Product", name, fields } : { kind: "Product", name, fields, doc };
}

export function sum(name: string, variants: VariantSpec[], doc?: string): SumDefinition {
  return doc === undefined ? { kind: "Sum", name, variants } : { kind: "Sum", name, variants, doc };
}
