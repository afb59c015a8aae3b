import { TypeRegistry } from "./registry";
import { type TypeDefinition, type TypeKind, fieldsOf, referencedTypes } from "./types";

export function findType(registry: TypeRegistry, name: string): TypeDefinition | undefined {
  return registry.lookup(name);
}

export function filterByKind(registry: TypeRegistry, kind: TypeKind): TypeDefinition[] {
  return registry.getByKind(kind);
}

/**
 * Variant names of a sum type in declaration order; empty for products and unknown names.
 */
export function variantNames(registry: TypeRegistry, name: string): string[] {
  const def = registry.lookup(name);
  return def?.kind === "Sum" ? def.variants.map(v => v.name) : [];
}

/**
 * Types with at least one field (directly or through Seq/MapOf) referring to `name`.
 */
export function typesReferencing(registry: TypeRegistry, name: string): string[] {
  return registry
    .getAll()
    .filter(def => fieldsOf(def).some(f => referencedTypes(f.type).includes(name)))
    .map(def => def.name);
}
