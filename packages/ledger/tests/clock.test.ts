/**
 * Tests for ManualClock.
 */

import { describe, it, expect } from "vitest";
import { ManualClock, assertHeight } from "../src/clock.js";
import { LedgerError } from "../src/types.js";

describe("ManualClock", () => {
  it("starts at 0 by default", () => {
    expect(new ManualClock().now()).toBe(0);
  });

  it("ticks forward", () => {
    const clock = new ManualClock(5);
    expect(clock.tick()).toBe(6);
    expect(clock.tick(3)).toBe(9);
    expect(clock.now()).toBe(9);
  });

  it("allows staying at the same height", () => {
    const clock = new ManualClock(4);
    clock.advanceTo(4);
    expect(clock.now()).toBe(4);
  });

  it("refuses to move backwards", () => {
    const clock = new ManualClock(9);
    try {
      clock.advanceTo(5);
      expect.unreachable("expected advanceTo to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("CLOCK_REGRESSION");
    }
    expect(clock.now()).toBe(9);
  });

  it("rejects negative or fractional starting heights", () => {
    expect(() => new ManualClock(-1)).toThrow("Height must be a non-negative integer");
    expect(() => new ManualClock(1.5)).toThrow(LedgerError);
  });
});

describe("assertHeight", () => {
  it("accepts zero", () => {
    expect(() => assertHeight(0)).not.toThrow();
  });

  it("rejects NaN", () => {
    expect(() => assertHeight(Number.NaN)).toThrow(LedgerError);
  });
});
