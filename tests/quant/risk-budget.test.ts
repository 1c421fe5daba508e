/**
 * Risk Budget Sizer Tests
 *
 * Default account: $250,000, 2% base risk, 5% per-trade cap.
 */

import { describe, it, expect } from "vitest";
import {
  classifyStrength,
  computeBudget,
  maxDailyBudget,
  resolveCapital,
} from "../../src/quant/risk-budget.js";
import { parseEngineConfig } from "../../src/config/engine.js";

describe("computeBudget", () => {
  it("should size three core signals at base risk", () => {
    const result = computeBudget({ coreCount: 3, groupsFiring: 1 });
    expect(result.riskBudget).toBe(5000);
    expect(result.baseRisk).toBe(5000);
    expect(result.maxRisk).toBe(12500);
    expect(result.multiplier).toBe(1);
    expect(result.strength).toBe("STRONG");
  });

  it("should scale with core count", () => {
    expect(computeBudget({ coreCount: 4, groupsFiring: 1 }).riskBudget).toBe(7500);
    expect(computeBudget({ coreCount: 5, groupsFiring: 1 }).riskBudget).toBe(10000);
  });

  it("should size unmapped core counts at 1.0", () => {
    const result = computeBudget({ coreCount: 2 });
    expect(result.coreMultiplier).toBe(1);
    expect(result.riskBudget).toBe(5000);
  });

  it("should apply the composite multiplier", () => {
    const result = computeBudget({ coreCount: 4, composite: "MULTI_SIGNAL_STRONG", groupsFiring: 1 });
    expect(result.compositeMultiplier).toBe(1.5);
    expect(result.riskBudget).toBe(11250);
  });

  it("should combine the OpEx composite with the calendar modifier", () => {
    const result = computeBudget({
      coreCount: 3,
      composite: "FEAR_BOUNCE_STRONG_OPEX",
      groupsFiring: 1,
      calendarModifier: 1.5,
    });
    expect(result.riskBudget).toBe(9750);
  });

  it("should add a bonus per extra firing group", () => {
    const result = computeBudget({ coreCount: 3, groupsFiring: 3 });
    expect(result.groupBonus).toBeCloseTo(1.3, 10);
    expect(result.riskBudget).toBe(6500);
  });

  it("should never exceed the per-trade cap", () => {
    const result = computeBudget({
      coreCount: 5,
      composite: "MULTI_SIGNAL_STRONG",
      groupsFiring: 3,
      calendarModifier: 1.5,
    });
    expect(result.riskBudget).toBe(12500);
  });

  it("should size to zero in an FOMC blackout", () => {
    expect(computeBudget({ coreCount: 5, calendarModifier: 0 }).riskBudget).toBe(0);
  });

  it("should use a positive capital override", () => {
    const result = computeBudget({ coreCount: 3, capitalOverride: 100_000 });
    expect(result.capital).toBe(100_000);
    expect(result.riskBudget).toBe(2000);
  });

  it("should floor the core multiplier when non-core groups carry the signal", () => {
    const sizing = parseEngineConfig({ sizing: { coreMultipliers: { "0": 0.5, "3": 1 } } }).sizing;

    const carried = computeBudget(
      { coreCount: 0, wingCount: 2, fundCount: 1, composite: "WING_PANIC", groupsFiring: 2 },
      sizing
    );
    expect(carried.coreMultiplier).toBe(0.8);
    expect(carried.riskBudget).toBe(5060);

    const thin = computeBudget({ coreCount: 0, wingCount: 2, groupsFiring: 1 }, sizing);
    expect(thin.coreMultiplier).toBe(0.5);
    expect(thin.riskBudget).toBe(2500);
  });

  it("should treat negative counts as zero", () => {
    const result = computeBudget({ coreCount: -2, groupsFiring: -1 });
    expect(result.coreCount).toBe(0);
    expect(result.groupBonus).toBe(1);
    expect(result.calendarModifier).toBe(1);
  });

  it("should size to zero on an unusable calendar modifier", () => {
    for (const calendarModifier of [-1, Number.NaN, Infinity]) {
      const result = computeBudget({ coreCount: 5, calendarModifier });
      expect(result.calendarModifier).toBe(0);
      expect(result.riskBudget).toBe(0);
    }
  });
});

describe("resolveCapital", () => {
  it("should fall back to account capital for unusable overrides", () => {
    expect(resolveCapital(undefined)).toBe(250_000);
    expect(resolveCapital(0)).toBe(250_000);
    expect(resolveCapital(-5)).toBe(250_000);
    expect(resolveCapital(Number.NaN)).toBe(250_000);
    expect(resolveCapital(50_000)).toBe(50_000);
  });
});

describe("maxDailyBudget", () => {
  it("should cap daily deployment at 10% of capital", () => {
    expect(maxDailyBudget()).toBe(25_000);
    expect(maxDailyBudget(100_000)).toBe(10_000);
  });
});

describe("classifyStrength", () => {
  it("should grade conviction", () => {
    expect(classifyStrength(0, 0)).toBe("NONE");
    expect(classifyStrength(2, 1)).toBe("MODERATE");
    expect(classifyStrength(0, 1, "FUNDING_STRESS")).toBe("STRONG");
    expect(classifyStrength(3, 2)).toBe("VERY_STRONG");
    expect(classifyStrength(5, 1)).toBe("EXTREME");
    expect(classifyStrength(2, 3)).toBe("EXTREME");
  });
});
