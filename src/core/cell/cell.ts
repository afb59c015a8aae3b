// src/core/cell/cell.ts
// Eager and lazy recursion cells with force-once memoization

import type {
  CellId,
  CellOptions,
  CellStateTag,
  Computation,
  EagerCell,
  LazyCell,
  RecursionCell,
} from "./types";
import type { Outcome } from "../../outcome/outcome";
import { AdtError, type Failure } from "../../outcome/failure";
import { computationFailed, done } from "../../outcome/constructors";
import { makeDiagnostic } from "../../outcome/codes";
import { systemClock } from "../../ports/clock";

// ─────────────────────────────────────────────────────────────────
// Cell ID Generation
// ─────────────────────────────────────────────────────────────────

let nextCellId = 0;

export function freshCellId(): CellId {
  return `cell-${nextCellId++}`;
}

/**
 * Reset cell ID counter (for testing).
 */
export function resetCellIds(): void {
  nextCellId = 0;
}

const knownCells = new WeakSet<object>();

// ─────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────

export function eager<T>(value: T, options: Pick<CellOptions, "label"> = {}): EagerCell<T> {
  const cell: EagerCell<T> = { tag: "Eager", id: freshCellId(), value, label: options.label };
  knownCells.add(cell);
  return Object.freeze(cell);
}

function makeLazy<T>(computation: Computation<T>, options: CellOptions): LazyCell<T> {
  const cell: LazyCell<T> = {
    tag: "Lazy",
    id: freshCellId(),
    mode: computation.mode,
    state: { tag: "Pending", computation },
    runs: 0,
    label: options.label,
    observer: options.observer,
  };
  knownCells.add(cell);
  return cell;
}

/**
 * Defer `computation` until the cell is first forced.
 */
export function lazy<T>(computation: () => T, options: CellOptions = {}): LazyCell<T> {
  return makeLazy({ mode: "sync", run: computation }, options);
}

/**
 * Defer an async computation. Force with forceAsync; concurrent forcers share one run.
 */
export function lazyAsync<T>(computation: () => Promise<T>, options: CellOptions = {}): LazyCell<T> {
  return makeLazy<T>({ mode: "async", run: computation }, options);
}

// ─────────────────────────────────────────────────────────────────
// Inspection
// ─────────────────────────────────────────────────────────────────

export function isCell(value: unknown): value is RecursionCell<unknown> {
  return typeof value === "object" && value !== null && knownCells.has(value);
}

export function cellState(cell: RecursionCell<unknown>): CellStateTag {
  return cell.tag === "Eager" ? "Eager" : cell.state.tag;
}

export function isForced(cell: RecursionCell<unknown>): boolean {
  return cell.tag === "Eager" || cell.state.tag === "Forced";
}

/**
 * The cell's value if it is available without running anything.
 */
export function peek<T>(cell: RecursionCell<T>): T | undefined {
  if (cell.tag === "Eager") return cell.value;
  return cell.state.tag === "Forced" ? cell.state.value : undefined;
}

export function cellRuns(cell: RecursionCell<unknown>): number {
  return cell.tag === "Eager" ? 0 : cell.runs;
}

// ─────────────────────────────────────────────────────────────────
// Forcing
// ─────────────────────────────────────────────────────────────────

type SyncRun<T> =
  | { ok: true; outcome: Outcome<T> }
  | { ok: false; failure: Failure; error?: unknown };

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function cellName(cell: LazyCell<unknown>): string {
  return cell.label ? `${cell.id} (${cell.label})` : cell.id;
}

function reentrant(cell: LazyCell<unknown>): Failure {
  return computationFailed("ReentrantForce", `Cell ${cellName(cell)} was forced while its computation was running`, {
    diagnostics: [makeDiagnostic("E0501", { cell: cell.id })],
    context: { cellId: cell.id },
  }).failure;
}

function asyncOnly(cell: LazyCell<unknown>): Failure {
  return computationFailed("AsyncComputation", `Cell ${cellName(cell)} holds an async computation; use forceAsync`, {
    diagnostics: [makeDiagnostic("E0502", { cell: cell.id })],
    context: { cellId: cell.id },
  }).failure;
}

function computationError(cell: LazyCell<unknown>, error: unknown): Failure {
  const message = errorMessage(error);
  return computationFailed("ComputationFailed", `Lazy computation failed in ${cellName(cell)}: ${message}`, {
    diagnostics: [makeDiagnostic("E0500", { cell: cell.id, error: message })],
    context: { cellId: cell.id, attempt: cell.runs, error: message },
  }).failure;
}

function reportFailure(cell: LazyCell<unknown>, f: Failure): void {
  cell.observer?.events.emit({ tag: "LazyForceFailed", cellId: cell.id, errorKind: f.kind });
}

function runSync<T>(cell: RecursionCell<T>): SyncRun<T> {
  if (cell.tag === "Eager") {
    return { ok: true, outcome: done(cell.value) };
  }

  const state = cell.state;
  switch (state.tag) {
    case "Forced":
      return { ok: true, outcome: done(state.value, { cached: true }) };

    case "Forcing":
      return { ok: false, failure: state.computation.mode === "async" ? asyncOnly(cell) : reentrant(cell) };

    case "Pending": {
      const computation = state.computation;
      if (computation.mode === "async") {
        return { ok: false, failure: asyncOnly(cell) };
      }

      const clock = cell.observer?.clock ?? systemClock;
      const start = clock.nowMs();
      cell.runs++;
      cell.state = { tag: "Forcing", computation };

      let value: T;
      try {
        value = computation.run();
      } catch (e) {
        // Back to Pending so a later force can retry
        cell.state = { tag: "Pending", computation };
        const f = computationError(cell, e);
        reportFailure(cell, f);
        return { ok: false, failure: f, error: e };
      }

      cell.state = { tag: "Forced", value };
      const durationMs = clock.nowMs() - start;
      cell.observer?.events.emit({ tag: "LazyForced", cellId: cell.id, durationMs });
      return { ok: true, outcome: done(value, { durationMs }) };
    }
  }
}

/**
 * Force a cell and return its value.
 * Throws AdtError (reason computation-failed) if the computation throws; the
 * cell stays Pending and may be forced again.
 */
export function force<T>(cell: RecursionCell<T>): T {
  const result = runSync(cell);
  if (result.ok) {
    if (result.outcome.tag === "Done") return result.outcome.value;
    throw new AdtError(result.outcome.failure);
  }
  throw new AdtError(result.failure, result.error === undefined ? undefined : { cause: result.error });
}

/**
 * Force a cell, reporting failure as a value.
 */
export function tryForce<T>(cell: RecursionCell<T>): Outcome<T> {
  const result = runSync(cell);
  if (result.ok) return result.outcome;
  return { tag: "Fail", failure: result.failure, meta: {} };
}

function forceNow<T>(cell: RecursionCell<T>): Promise<T> {
  try {
    return Promise.resolve(force(cell));
  } catch (e) {
    return Promise.reject(e);
  }
}

/**
 * Force any cell asynchronously. For an async lazy cell the first caller
 * starts the computation and stores its promise; callers arriving before it
 * settles receive that same promise, so the computation runs once.
 */
export function forceAsync<T>(cell: RecursionCell<T>): Promise<T> {
  if (cell.tag === "Eager") {
    return Promise.resolve(cell.value);
  }

  const state = cell.state;
  if (state.tag === "Forcing" && state.computation.mode === "async") {
    // Forcing without an in-flight promise: the computation is forcing its own cell
    return state.inflight ?? Promise.reject(new AdtError(reentrant(cell)));
  }
  if (state.tag !== "Pending") {
    return forceNow(cell);
  }

  const computation = state.computation;
  if (computation.mode === "sync") {
    return forceNow(cell);
  }
  const clock = cell.observer?.clock ?? systemClock;
  const start = clock.nowMs();
  cell.runs++;
  cell.state = { tag: "Forcing", computation };

  const inflight = (async () => computation.run())().then(
    value => {
      cell.state = { tag: "Forced", value };
      cell.observer?.events.emit({ tag: "LazyForced", cellId: cell.id, durationMs: clock.nowMs() - start });
      return value;
    },
    (e: unknown) => {
      cell.state = { tag: "Pending", computation };
      const f = computationError(cell, e);
      reportFailure(cell, f);
      throw new AdtError(f, { cause: e });
    }
  );
  cell.state = { tag: "Forcing", computation, inflight };
  return inflight;
}
