import { describe, it, expect } from "vitest";
import { manualClock, systemClock, timed } from "../../src/ports/clock";

describe("clock port", () => {
  it("moves a manual clock only when told", () => {
    const clock = manualClock(10);
    expect(clock.nowMs()).toBe(10);
    clock.advance(5);
    expect(clock.nowMs()).toBe(15);
    clock.set(2);
    expect(clock.nowMs()).toBe(2);
  });

  it("times a function on the given clock", () => {
    const clock = manualClock();
    const result = timed(clock, () => {
      clock.advance(7);
      return "ok";
    });
    expect(result).toEqual({ value: "ok", durationMs: 7 });
  });

  it("never runs the system clock backwards", () => {
    const a = systemClock.nowMs();
    const b = systemClock.nowMs();
    expect(b).toBeGreaterThanOrEqual(a);
  });
});
