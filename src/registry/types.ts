/**
 * Primitive scalar tags. Closed set.
 */
export type PrimitiveTag =
  | "string"
  | "number"      // any JS number, NaN included
  | "integer"     // Number.isInteger
  | "boolean"
  | "bigint"
  | "null"
  | "any";        // accepts every value

export const PRIMITIVE_TAGS: readonly PrimitiveTag[] = [
  "string",
  "number",
  "integer",
  "boolean",
  "bigint",
  "null",
  "any",
];

/**
 * Declared type of a field. Structural, never coerced.
 */
export type TypeTag =
  | { readonly tag: "Prim"; readonly prim: PrimitiveTag }
  | { readonly tag: "Ref"; readonly name: string }      // instance of a named product/sum type
  | { readonly tag: "Seq"; readonly of: TypeTag }       // array
  | { readonly tag: "MapOf"; readonly of: TypeTag }     // string-keyed plain object or Map
  | { readonly tag: "Rec"; readonly name: string };     // RecursionCell holding an instance of `name`

export interface FieldSpec {
  readonly name: string;
  readonly type: TypeTag;
  readonly doc?: string;
}

export interface VariantSpec {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
  readonly doc?: string;
}

export interface ProductDefinition {
  readonly kind: "Product";
  readonly name: string;
  readonly fields: readonly FieldSpec[];
  readonly doc?: string;
}

export interface SumDefinition {
  readonly kind: "Sum";
  readonly name: string;
  readonly variants: readonly VariantSpec[];
  readonly doc?: string;
}

export type TypeDefinition = ProductDefinition | SumDefinition;

export type TypeKind = TypeDefinition["kind"];

/**
 * Registry-side record for an installed definition.
 */
export interface RegisteredType {
  readonly definition: TypeDefinition;
  /** SHA-256 of the definition's canonical JSON */
  readonly fingerprint: string;
  /** 1 on first definition, incremented on every replacement */
  readonly revision: number;
  /** Field specs by variant name; products use the type name as the single key */
  readonly members: ReadonlyMap<string, readonly FieldSpec[]>;
}

/**
 * Name reserved for wildcard match clauses.
 */
export const WILDCARD = "_";

/**
 * Number of fields (product) or variants (sum).
 */
export function memberCount(def: TypeDefinition): number {
  return def.kind === "Product" ? def.fields.length : def.variants.length;
}

export function showTypeTag(t: TypeTag): string {
  switch (t.tag) {
    case "Prim":
      return t.prim;
    case "Ref":
      return t.name;
    case "Seq":
      return `Seq<${showTypeTag(t.of)}>`;
    case "MapOf":
      return `Map<${showTypeTag(t.of)}>`;
    case "Rec":
      return `Rec<${t.name}>`;
  }
}

/**
 * Names of types a tag refers to (Ref and Rec, through Seq/MapOf).
 */
export function referencedTypes(t: TypeTag): string[] {
  switch (t.tag) {
    case "Prim":
      return [];
    case "Ref":
    case "Rec":
      return [t.name];
    case "Seq":
    case "MapOf":
      return referencedTypes(t.of);
  }
}

export function fieldsOf(def: TypeDefinition): readonly FieldSpec[] {
  return def.kind === "Product" ? def.fields : def.variants.flatMap(v => v.fields);
}
