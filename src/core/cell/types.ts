// src/core/cell/types.ts
// Recursion cells: eager values and memoized lazy computations

import type { ClockPort } from "../../ports/clock";
import type { EventEmitter } from "../events/types";

export type CellId = string;

/**
 * A deferred computation. Async computations can only be forced with forceAsync.
 */
export type Computation<T> =
  | { mode: "sync"; run: () => T }
  | { mode: "async"; run: () => Promise<T> };

/**
 * Lazy cell state.
 *
 * - Pending: computation not yet run (or last run failed)
 * - Forcing: computation running; async runs keep their in-flight promise
 *   so concurrent forcers join it
 * - Forced: value memoized, computation dropped
 */
export type LazyState<T> =
  | { tag: "Pending"; computation: Computation<T> }
  | { tag: "Forcing"; computation: Computation<T>; inflight?: Promise<T> }
  | { tag: "Forced"; value: T };

export interface EagerCell<T> {
  readonly tag: "Eager";
  readonly id: CellId;
  readonly value: T;
  readonly label?: string;
}

export interface LazyCell<T> {
  readonly tag: "Lazy";
  readonly id: CellId;
  readonly mode: Computation<T>["mode"];
  state: LazyState<T>;
  /** Number of times the computation has been started */
  runs: number;
  readonly label?: string;
  readonly observer?: CellObserver;
}

export type RecursionCell<T> = EagerCell<T> | LazyCell<T>;

export type CellStateTag = "Eager" | LazyState<unknown>["tag"];

/**
 * Where a cell reports force timings. Cells made by AdtRuntime carry one.
 */
export interface CellObserver {
  clock: ClockPort;
  events: EventEmitter;
}

export type CellOptions = {
  label?: string;
  observer?: CellObserver;
};
