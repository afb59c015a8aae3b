// src/core/match/clauses.ts
// Clause builders

import { WILDCARD } from "../../registry/types";
import type { Clause, Guard, Handler } from "./types";

export function on<R>(variant: string, handler: Handler<R>): Clause<R> {
  return { variant, handler };
}

export function when<R>(variant: string, guard: Guard, handler: Handler<R>, guardKey?: string): Clause<R> {
  return guardKey === undefined ? { variant, guard, handler } : { variant, guard, guardKey, handler };
}

/**
 * Wildcard clause: runs for any variant without an unconditional clause of its own.
 */
export function otherwise<R>(handler: Handler<R>): Clause<R> {
  return { variant: WILDCARD, handler };
}

/**
 * Unconditional clauses from a record of handlers, in key order with the
 * wildcard key `_` placed last.
 *
 * @example
 * ```ts
 * clausesFrom({ Some: f => f.value, _: () => 0 })
 * ```
 */
export function clausesFrom<R>(handlers: Readonly<Record<string, Handler<R>>>): Clause<R>[] {
  const clauses: Clause<R>[] = [];
  let wildcard: Handler<R> | undefined;
  for (const [variant, handler] of Object.entries(handlers)) {
    if (variant === WILDCARD) {
      wildcard = handler;
    } else {
      clauses.push(on(variant, handler));
    }
  }
  if (wildcard) clauses.push(otherwise(wildcard));
  return clauses;
}
