// src/core/match/types.ts
// Clauses, decision tables and compiled patterns

import type { FieldValues, VariantInstance } from "../construct/instance";
import type { Diagnostic } from "../../outcome/diagnostic";

export type Guard = (fields: FieldValues, instance: VariantInstance) => boolean;

export type Handler<R> = (fields: FieldValues, instance: VariantInstance) => R;

/**
 * One arm of a match block. `variant` is a declared variant name or the
 * wildcard `_`. Guarded clauses are fingerprinted by `guardKey` when given,
 * otherwise by a hash of the guard's source text.
 */
export interface Clause<R> {
  readonly variant: string;
  readonly guard?: Guard;
  readonly guardKey?: string;
  readonly handler: Handler<R>;
}

export interface DecisionTable {
  /** Cache key: type, definition fingerprint, clause signature */
  readonly key: string;
  readonly type: string;
  /** Fingerprint of the definition the table was built against */
  readonly fingerprint: string;
  readonly signature: string;
  /** Per declared variant, the clause indices to try in order */
  readonly rows: ReadonlyMap<string, readonly number[]>;
  /** Wildcard clause indices; absent when every variant has clauses of its own */
  readonly fallback?: readonly number[];
  readonly exhaustive: boolean;
  readonly unreachable: readonly number[];
  readonly warnings: readonly Diagnostic[];
}

/**
 * A shared decision table bound to one call site's handlers and guards.
 */
export interface CompiledPattern<R> {
  readonly table: DecisionTable;
  readonly clauses: readonly Clause<R>[];
  readonly cached: boolean;
}

export type CompilerStats = {
  hits: number;
  misses: number;
  /** Exhaustiveness analyses run; a cache hit runs none */
  analyses: number;
  evictions: number;
};
