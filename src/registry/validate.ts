import type { TypeRegistry } from "./registry";
import {
  PRIMITIVE_TAGS,
  WILDCARD,
  type FieldSpec,
  type TypeDefinition,
  type TypeTag,
  referencedTypes,
} from "./types";
import type { Diagnostic } from "../outcome/diagnostic";
import { makeDiagnostic } from "../outcome/codes";
import type { DefinitionFailureKind } from "../outcome/failure";

export interface DefinitionCheck {
  valid: boolean;
  /** Kind of the first problem found */
  kind?: DefinitionFailureKind;
  errors: Diagnostic[];
}

export interface ValidationResult {
  valid: boolean;
  errors: Diagnostic[];
}

type Problem = { kind: DefinitionFailureKind; diag: Diagnostic };

function checkName(name: unknown, owner: string, path: string, problems: Problem[]): void {
  if (typeof name !== "string" || name.length === 0) {
    problems.push({ kind: "EmptyName", diag: makeDiagnostic("E0103", { owner }, path) });
  } else if (name === WILDCARD) {
    problems.push({ kind: "ReservedName", diag: makeDiagnostic("E0104", { reserved: WILDCARD, owner }, path) });
  }
}

function tagProblem(t: TypeTag): string | undefined {
  switch (t.tag) {
    case "Prim":
      return PRIMITIVE_TAGS.includes(t.prim) ? undefined : `unknown primitive ${String(t.prim)}`;
    case "Ref":
    case "Rec":
      return typeof t.name === "string" && t.name.length > 0 ? undefined : `${t.tag} needs a type name`;
    case "Seq":
    case "MapOf":
      return t.of ? tagProblem(t.of) : `${t.tag} needs an element type`;
    default:
      return "unrecognized type tag";
  }
}

function checkFields(fields: readonly FieldSpec[], owner: string, path: string, problems: Problem[]): void {
  const seen = new Set<string>();
  fields.forEach((f, i) => {
    const fieldPath = `${path}.fields[${i}]`;
    checkName(f.name, owner, fieldPath, problems);
    if (seen.has(f.name)) {
      problems.push({ kind: "DuplicateField", diag: makeDiagnostic("E0101", { field: f.name, owner }, fieldPath) });
    }
    seen.add(f.name);

    const detail = f.type ? tagProblem(f.type) : "missing type tag";
    if (detail) {
      problems.push({ kind: "InvalidTypeTag", diag: makeDiagnostic("E0106", { owner: `${owner}.${f.name}`, detail }, fieldPath) });
    }
  });
}

/**
 * Check a definition's internal consistency. References to other types are
 * not resolved here; see validateRegistry.
 */
export function validateDefinition(def: TypeDefinition): DefinitionCheck {
  const problems: Problem[] = [];
  const name = def.name;

  checkName(name, "type definition", name || "<unnamed>", problems);

  if (def.kind === "Product") {
    checkFields(def.fields, name, name, problems);
  } else if (def.kind === "Sum") {
    if (def.variants.length === 0) {
      problems.push({ kind: "NoVariants", diag: makeDiagnostic("E0105", { name }, name) });
    }
    const seen = new Set<string>();
    def.variants.forEach((v, i) => {
      const variantPath = `${name}.variants[${i}]`;
      checkName(v.name, name, variantPath, problems);
      if (seen.has(v.name)) {
        problems.push({ kind: "DuplicateVariant", diag: makeDiagnostic("E0102", { variant: v.name, name }, variantPath) });
      }
      seen.add(v.name);
      checkFields(v.fields, `${name}.${v.name}`, variantPath, problems);
    });
  } else {
    problems.push({
      kind: "InvalidTypeTag",
      diag: makeDiagnostic("E0106", { owner: String(name), detail: "kind must be Product or Sum" }, String(name)),
    });
  }

  return {
    valid: problems.length === 0,
    kind: problems[0]?.kind,
    errors: problems.map(p => p.diag),
  };
}

/**
 * Report Ref/Rec tags that name types the registry does not hold.
 */
export function validateRegistry(registry: TypeRegistry): ValidationResult {
  const errors: Diagnostic[] = [];

  for (const def of registry.getAll()) {
    const owners: Array<[string, readonly FieldSpec[]]> =
      def.kind === "Product"
        ? [[def.name, def.fields]]
        : def.variants.map(v => [`${def.name}.${v.name}`, v.fields]);

    for (const [owner, fields] of owners) {
      for (const f of fields) {
        for (const target of referencedTypes(f.type)) {
          if (!registry.has(target)) {
            errors.push(makeDiagnostic("E0111", { owner: `${owner}.${f.name}`, target }));
          }
        }
      }
    }
  }

  return { valid: errors.length === 0, errors };
}
