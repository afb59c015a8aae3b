// src/core/match/compiler.ts
// Clause list → decision table, with exhaustiveness analysis and caching

import type { TypeRegistry } from "../../registry/registry";
import { type SumDefinition, WILDCARD } from "../../registry/types";
import type { Outcome } from "../../outcome/outcome";
import type { Diagnostic } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";
import { compileError, done, typeNotFound } from "../../outcome/constructors";
import { sha256Text, shortHash } from "../artifacts/hash";
import type { ClockPort } from "../../ports/clock";
import { systemClock } from "../../ports/clock";
import type { EventEmitter } from "../events/types";
import { nullEmitter } from "../events/bus";
import { type Logger, silentLogger } from "../log/logger";
import { type CompilerConfig, DEFAULT_COMPILER_CONFIG } from "../config/config";
import type { Clause, CompiledPattern, CompilerStats, DecisionTable } from "./types";

// ─────────────────────────────────────────────────────────────────
// Signatures
// ─────────────────────────────────────────────────────────────────

export function guardFingerprint(clause: Clause<unknown>): string | undefined {
  if (!clause.guard) return undefined;
  return clause.guardKey ?? shortHash(sha256Text(clause.guard.toString()));
}

// Names may contain the separators used below.
const part = (s: string) => encodeURIComponent(s);

/**
 * Ordered clause shape: variant names, with a guard fingerprint on guarded clauses.
 */
export function clauseSignature(clauses: readonly Clause<unknown>[]): string {
  return clauses
    .map(c => {
      const fp = guardFingerprint(c);
      return fp === undefined ? part(c.variant) : `${part(c.variant)}?${part(fp)}`;
    })
    .join("|");
}

export function tableKey(type: string, fingerprint: string, signature: string): string {
  return `${part(type)}#${shortHash(fingerprint, 16)}:${signature}`;
}

// ─────────────────────────────────────────────────────────────────
// Analysis
// ─────────────────────────────────────────────────────────────────

type Analysis = Pick<DecisionTable, "rows" | "fallback" | "exhaustive" | "unreachable" | "warnings">;

/**
 * Check clauses against a sum definition and build the per-variant rows.
 *
 * A variant is covered by its own unconditional clause or by an unconditional
 * wildcard; guarded clauses never cover. A variant with clauses of its own gets
 * those clauses up to the first unconditional one, and nothing else: when all
 * of them are guarded and none holds, dispatch fails. A variant with no clauses
 * of its own gets the wildcard clauses up to the first unconditional one.
 */
export function analyzeClauses(def: SumDefinition, clauses: readonly Clause<unknown>[]): Outcome<Analysis> {
  const declared = def.variants.map(v => v.name);
  const declaredSet = new Set(declared);

  const unknown = clauses
    .map((c, index) => ({ variant: c.variant, index }))
    .filter(c => c.variant !== WILDCARD && !declaredSet.has(c.variant));
  if (unknown.length > 0) {
    const unknownVariants = Array.from(new Set(unknown.map(u => u.variant)));
    return compileError("UnknownVariant", `Match on ${def.name} names unknown variant(s): ${unknownVariants.join(", ")}`, {
      diagnostics: unknown.map(u => makeDiagnostic("E0302", { variant: u.variant, name: def.name }, `clauses[${u.index}]`)),
      context: { type: def.name, unknownVariants },
    });
  }

  const firstUnconditional = new Map<string, number>();
  const duplicates: Diagnostic[] = [];
  let duplicate: { variant: string; clauses: number[] } | undefined;
  for (const [i, c] of clauses.entries()) {
    if (c.guard) continue;
    const first = firstUnconditional.get(c.variant);
    if (first === undefined) {
      firstUnconditional.set(c.variant, i);
      continue;
    }
    duplicate ??= { variant: c.variant, clauses: [first, i] };
    duplicates.push(makeDiagnostic("E0301", { variant: c.variant }, `clauses[${i}]`));
  }
  if (duplicate) {
    return compileError("DuplicateVariant", `Duplicate unconditional clauses for ${def.name}.${duplicate.variant} at ${duplicate.clauses.join(" and ")}`, {
      diagnostics: duplicates,
      context: { type: def.name, variant: duplicate.variant, clauses: duplicate.clauses },
    });
  }

  const missingVariants = declared.filter(v => !firstUnconditional.has(v));
  if (missingVariants.length > 0 && !firstUnconditional.has(WILDCARD)) {
    return compileError("NonExhaustiveMatch", `Non-exhaustive match on ${def.name}: missing ${missingVariants.join(", ")}`, {
      diagnostics: [makeDiagnostic("E0300", { name: def.name, missing: missingVariants.join(", ") })],
      context: { type: def.name, missingVariants },
    });
  }

  const wildcardRow: number[] = [];
  for (const [i, c] of clauses.entries()) {
    if (c.variant !== WILDCARD) continue;
    wildcardRow.push(i);
    if (!c.guard) break;
  }

  const rows = new Map<string, readonly number[]>();
  const reachable = new Set<number>();
  let usesWildcard = false;
  for (const variant of declared) {
    const row: number[] = [];
    for (const [i, c] of clauses.entries()) {
      if (c.variant !== variant) continue;
      row.push(i);
      if (!c.guard) break;
    }
    if (row.length === 0) {
      row.push(...wildcardRow);
      usesWildcard = true;
    }
    row.forEach(i => reachable.add(i));
    rows.set(variant, row);
  }

  const unreachable = clauses.map((_, i) => i).filter(i => !reachable.has(i));
  const warnings = unreachable.map(i => {
    const variant = clauses[i]?.variant ?? "?";
    return makeDiagnostic("W0001", { index: i, variant }, `clauses[${i}]`);
  });

  return done({
    rows,
    fallback: usesWildcard ? wildcardRow : undefined,
    exhaustive: declared.every(v => firstUnconditional.has(v)),
    unreachable,
    warnings,
  });
}

// ─────────────────────────────────────────────────────────────────
// Compiler
// ─────────────────────────────────────────────────────────────────

export interface PatternCompilerDeps {
  registry: TypeRegistry;
  events?: EventEmitter;
  clock?: ClockPort;
  logger?: Logger;
  config?: Partial<CompilerConfig>;
}

/**
 * Compiles match blocks for one registry. Tables are cached by key for the
 * compiler's lifetime; identical clause shapes at different call sites share
 * one table and the analysis runs once.
 */
export class PatternCompiler {
  private cache: Map<string, DecisionTable> = new Map();
  private readonly stats: CompilerStats = { hits: 0, misses: 0, analyses: 0, evictions: 0 };
  private readonly registry: TypeRegistry;
  private readonly events: EventEmitter;
  private readonly clock: ClockPort;
  private readonly logger: Logger;
  private readonly config: CompilerConfig;

  constructor(deps: PatternCompilerDeps) {
    this.registry = deps.registry;
    this.events = deps.events ?? nullEmitter;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.config = { ...DEFAULT_COMPILER_CONFIG, ...deps.config };
  }

  compile<R>(typeName: string, clauses: readonly Clause<R>[]): Outcome<CompiledPattern<R>> {
    const start = this.clock.nowMs();
    const signature = clauseSignature(clauses);

    const entry = this.registry.entry(typeName);
    if (!entry) {
      const missing = typeNotFound(typeName);
      this.events.emit({ tag: "CompileFailed", type: typeName, signature, errorKind: missing.failure.kind });
      return missing;
    }
    const def = entry.definition;
    if (def.kind !== "Sum") {
      const failed = compileError("KindMismatch", `Cannot match on ${typeName}: it is a product type`, {
        diagnostics: [makeDiagnostic("E0303", { name: typeName, actual: "product" })],
        context: { type: typeName },
      });
      this.events.emit({ tag: "CompileFailed", type: typeName, signature, errorKind: failed.failure.kind });
      return failed;
    }

    const key = tableKey(typeName, entry.fingerprint, signature);
    const hit = this.config.cacheEnabled ? this.cache.get(key) : undefined;
    if (hit) {
      this.stats.hits++;
      const durationMs = this.clock.nowMs() - start;
      this.events.emit({ tag: "PatternCompiled", type: typeName, signature, durationMs, exhaustive: hit.exhaustive, cached: true });
      return done({ table: hit, clauses, cached: true }, { durationMs, cached: true });
    }

    this.stats.misses++;
    this.stats.analyses++;
    const analysis = analyzeClauses(def, clauses);
    if (analysis.tag === "Fail") {
      this.events.emit({ tag: "CompileFailed", type: typeName, signature, errorKind: analysis.failure.kind });
      return analysis;
    }

    const table: DecisionTable = Object.freeze({
      key,
      type: typeName,
      fingerprint: entry.fingerprint,
      signature,
      ...analysis.value,
    });

    if (this.config.warnUnreachable) {
      for (const w of table.warnings) {
        this.logger.warn(w.message, { type: typeName, signature });
      }
    }
    if (this.config.cacheEnabled) {
      this.insert(table);
    }

    const durationMs = this.clock.nowMs() - start;
    this.events.emit({ tag: "PatternCompiled", type: typeName, signature, durationMs, exhaustive: table.exhaustive, cached: false });
    return done({ table, clauses, cached: false }, { durationMs });
  }

  // Tables are complete before insertion; the cache only ever holds finished ones.
  private insert(table: DecisionTable): void {
    this.cache.set(table.key, table);
    const limit = this.config.maxCacheEntries;
    while (limit > 0 && this.cache.size > limit) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
      this.stats.evictions++;
      this.logger.debug("evicted decision table", { key: oldest.value });
    }
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  /**
   * Drop cached tables for one type. Returns how many were removed.
   */
  invalidate(typeName: string): number {
    let removed = 0;
    for (const [key, table] of this.cache) {
      if (table.type === typeName) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): Readonly<CompilerStats> {
    return { ...this.stats };
  }
}
