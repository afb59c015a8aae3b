import {
  type FieldSpec,
  type RegisteredType,
  type TypeDefinition,
  type TypeKind,
  type TypeTag,
  type VariantSpec,
  memberCount,
} from "./types";
import { validateDefinition } from "./validate";
import type { Outcome } from "../outcome/outcome";
import { done, malformedDefinition, typeNotFound } from "../outcome/constructors";
import { unwrap } from "../outcome/matchers";
import { sha256JSON } from "../core/artifacts/hash";
import type { EventEmitter } from "../core/events/types";
import { nullEmitter } from "../core/events/bus";
import { type Logger, silentLogger } from "../core/log/logger";

const frozenTag = (tag: TypeTag): TypeTag => Object.freeze(tag);

function freezeTag(t: TypeTag): TypeTag {
  switch (t.tag) {
    case "Prim":
      return frozenTag({ tag: "Prim", prim: t.prim });
    case "Ref":
      return frozenTag({ tag: "Ref", name: t.name });
    case "Rec":
      return frozenTag({ tag: "Rec", name: t.name });
    case "Seq":
      return frozenTag({ tag: "Seq", of: freezeTag(t.of) });
    case "MapOf":
      return frozenTag({ tag: "MapOf", of: freezeTag(t.of) });
  }
}

function freezeField(f: FieldSpec): FieldSpec {
  const copy: FieldSpec = f.doc === undefined
    ? { name: f.name, type: freezeTag(f.type) }
    : { name: f.name, type: freezeTag(f.type), doc: f.doc };
  return Object.freeze(copy);
}

function freezeVariant(v: VariantSpec): VariantSpec {
  const fields = Object.freeze(v.fields.map(freezeField));
  const copy: VariantSpec = v.doc === undefined ? { name: v.name, fields } : { name: v.name, fields, doc: v.doc };
  return Object.freeze(copy);
}

/**
 * Copy a definition into fresh frozen objects, so later mutation of the
 * caller's object cannot reach the registry.
 */
function freezeDefinition(def: TypeDefinition): TypeDefinition {
  let copy: TypeDefinition;
  if (def.kind === "Product") {
    copy = { kind: "Product", name: def.name, fields: Object.freeze(def.fields.map(freezeField)) };
  } else {
    copy = { kind: "Sum", name: def.name, variants: Object.freeze(def.variants.map(freezeVariant)) };
  }
  if (def.doc !== undefined) {
    copy = { ...copy, doc: def.doc };
  }
  return Object.freeze(copy);
}

function membersOf(def: TypeDefinition): ReadonlyMap<string, readonly FieldSpec[]> {
  if (def.kind === "Product") {
    return new Map([[def.name, def.fields]]);
  }
  return new Map(def.variants.map(v => [v.name, v.fields]));
}

/**
 * Registry of product and sum type definitions.
 *
 * Definitions are checked and frozen before they are installed with a single
 * `Map.set`, so a reader sees either the old definition or the new one.
 * Redefining a name replaces the old definition wholesale; last writer wins.
 */
export class TypeRegistry {
  private entries: Map<string, RegisteredType> = new Map();
  private readonly events: EventEmitter;
  private readonly logger: Logger;

  constructor(options: { events?: EventEmitter; logger?: Logger } = {}) {
    this.events = options.events ?? nullEmitter;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Register or replace a definition. Fails with MalformedTypeDefinition and
   * installs nothing if the definition is inconsistent.
   */
  define(def: TypeDefinition): Outcome<TypeDefinition> {
    const check = validateDefinition(def);
    if (!check.valid) {
      const kind = check.kind ?? "InvalidTypeTag";
      this.events.emit({ tag: "DefinitionRejected", name: String(def.name), errorKind: kind });
      return malformedDefinition(String(def.name), kind, check.errors);
    }

    const definition = freezeDefinition(def);
    const previous = this.entries.get(definition.name);
    const entry: RegisteredType = {
      definition,
      fingerprint: sha256JSON(definition),
      revision: (previous?.revision ?? 0) + 1,
      members: membersOf(definition),
    };
    this.entries.set(definition.name, entry);

    if (previous) {
      this.logger.info("type redefined", {
        name: definition.name,
        revision: entry.revision,
        changed: previous.fingerprint !== entry.fingerprint,
      });
    }
    this.events.emit({
      tag: "TypeDefined",
      name: definition.name,
      kind: definition.kind,
      memberCount: memberCount(definition),
      revision: entry.revision,
    });

    return done(definition);
  }

  /**
   * Define several types in order, stopping at the first failure.
   * Definitions before the failing one stay installed.
   */
  defineAll(defs: readonly TypeDefinition[]): Outcome<TypeDefinition[]> {
    const installed: TypeDefinition[] = [];
    for (const def of defs) {
      const result = this.define(def);
      if (result.tag === "Fail") return result;
      installed.push(result.value);
    }
    return done(installed);
  }

  lookup(name: string): TypeDefinition | undefined {
    return this.entries.get(name)?.definition;
  }

  /**
   * Like lookup, but a missing type is a TypeNotFound failure.
   */
  require(name: string): Outcome<TypeDefinition> {
    const def = this.lookup(name);
    return def ? done(def) : typeNotFound(name);
  }

  entry(name: string): RegisteredType | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  getAll(): TypeDefinition[] {
    return Array.from(this.entries.values(), e => e.definition);
  }

  getByKind(kind: TypeKind): TypeDefinition[] {
    return this.getAll().filter(d => d.kind === kind);
  }

  fingerprint(name: string): string | undefined {
    return this.entries.get(name)?.fingerprint;
  }

  revision(name: string): number {
    return this.entries.get(name)?.revision ?? 0;
  }

  /**
   * Field specs of a sum variant, or of a product when `variant` is omitted.
   */
  fieldsOf(name: string, variant?: string): readonly FieldSpec[] | undefined {
    const entry = this.entries.get(name);
    if (!entry) return undefined;
    return entry.members.get(variant ?? name);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Serialize registry to JSON-compatible object.
   */
  toJSON(): Record<string, TypeDefinition> {
    return Object.fromEntries(Array.from(this.entries, ([name, e]) => [name, e.definition]));
  }

  /**
   * Hydrate registry from JSON definitions. Throws AdtError on the first
   * malformed one.
   */
  static fromJSON(
    data: Record<string, TypeDefinition>,
    options: { events?: EventEmitter; logger?: Logger } = {}
  ): TypeRegistry {
    const registry = new TypeRegistry(options);
    for (const def of Object.values(data)) {
      unwrap(registry.define(def));
    }
    return registry;
  }
}
