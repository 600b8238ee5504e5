import { describe, it, expect } from "vitest";
import {
  DAY_MS,
  LOCK_PERIODS,
  formatAmount,
  lockPeriodName,
  parseLockPeriod,
  units,
} from "../../src/ledger/periods.js";

describe("lock periods", () => {
  it("defines the three canonical durations", () => {
    expect(LOCK_PERIODS).toEqual({
      SHORT: 180 * DAY_MS,
      MEDIUM: 365 * DAY_MS,
      LONG: 1825 * DAY_MS,
    });
  });

  it("names only exact durations", () => {
    expect(lockPeriodName(180 * DAY_MS)).toBe("SHORT");
    expect(lockPeriodName(365 * DAY_MS)).toBe("MEDIUM");
    expect(lockPeriodName(1825 * DAY_MS)).toBe("LONG");
    expect(lockPeriodName(181 * DAY_MS)).toBeNull();
    expect(lockPeriodName(180 * DAY_MS - 1)).toBeNull();
  });

  it("parses names in any case and raw milliseconds", () => {
    expect(parseLockPeriod("short")).toBe(LOCK_PERIODS.SHORT);
    expect(parseLockPeriod(" Medium ")).toBe(LOCK_PERIODS.MEDIUM);
    expect(parseLockPeriod("LONG")).toBe(LOCK_PERIODS.LONG);
    expect(parseLockPeriod("15552000000")).toBe(LOCK_PERIODS.SHORT);
    expect(parseLockPeriod(42)).toBe(42);
    expect(parseLockPeriod("forever")).toBeNaN();
  });
});

describe("amounts", () => {
  it("converts decimal units to base units", () => {
    expect(units("1")).toBe(1_000_000_000_000_000_000n);
    expect(units("0.001")).toBe(1_000_000_000_000_000n);
  });

  it("formats base units as decimal units", () => {
    expect(formatAmount(1_500_000_000_000_000_000n)).toBe("1.5");
    expect(formatAmount(0n)).toBe("0");
  });
});
