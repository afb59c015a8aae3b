import { performance } from "node:perf_hooks";

/**
 * Clock port interface.
 * All durations reported by the engine are measured through it, so tests can
 * substitute a manual clock and assert exact values.
 */
export interface ClockPort {
  /**
   * Monotonic time in milliseconds.
   */
  nowMs(): number;
}

export const systemClock: ClockPort = {
  nowMs: () => performance.now(),
};

export interface ManualClock extends ClockPort {
  advance(ms: number): void;
  set(ms: number): void;
}

/**
 * Clock that only moves when told to.
 */
export function manualClock(startMs = 0): ManualClock {
  let now = startMs;
  return {
    nowMs: () => now,
    advance: (ms: number) => {
      now += ms;
    },
    set: (ms: number) => {
      now = ms;
    },
  };
}

/**
 * Run `fn` and report how long it took on `clock`.
 */
export function timed<T>(clock: ClockPort, fn: () => T): { value: T; durationMs: number } {
  const start = clock.nowMs();
  const value = fn();
  return { value, durationMs: clock.nowMs() - start };
}
