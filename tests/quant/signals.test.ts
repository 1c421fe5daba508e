/**
 * Signal Calculator Tests
 *
 * Each signal is driven across its threshold from a calm snapshot.
 */

import { describe, it, expect } from "vitest";
import {
  computeCreditSignal,
  evaluateSignals,
  SignalCalculator,
  SIGNAL_ORDER,
  signalsInGroup,
} from "../../src/quant/signals.js";
import { ReferenceStore } from "../../src/quant/reference-state.js";
import { parseEngineConfig } from "../../src/config/engine.js";
import type { MarketSnapshot, ReferenceState } from "../../src/types/market.js";
import { CALM, FEAR } from "../helpers/snapshots.js";

const levels = (snapshot: MarketSnapshot, reference: ReferenceState = {}) => {
  const set = evaluateSignals(snapshot, reference);
  return SIGNAL_ORDER.filter((k) => set[k].level !== "OK");
};

describe("evaluateSignals", () => {
  it("should return all 19 signals in catalog order", () => {
    const set = evaluateSignals(CALM);
    expect(Object.keys(set)).toHaveLength(19);
    expect(SIGNAL_ORDER).toHaveLength(19);
    expect(signalsInGroup("core")).toEqual([
      "skewing",
      "rip",
      "skew_25d_rr",
      "contango",
      "credit_spread",
    ]);
  });

  it("should report every signal OK on a calm surface", () => {
    expect(levels(CALM)).toEqual([]);
  });

  it("should fire core fear against the session baseline", () => {
    const set = evaluateSignals(FEAR, { baseline: CALM });

    expect(set.skewing.level).toBe("ACTION");
    expect(set.rip.level).toBe("ACTION");
    expect(set.rip.value).toBe(80);

    expect(set.skew_25d_rr.level).toBe("ACTION");
    expect(set.skew_25d_rr.value).toBe(0.05);
    expect(set.skew_25d_rr.baseline).toBe(0.01);
    expect(set.skew_25d_rr.change).toBe(0.04);

    expect(set.contango.level).toBe("ACTION");
    expect(set.contango.value).toBe(-0.01);
    expect(set.contango.baseline).toBe(0.1);
    expect(set.contango.change).toBe(-1.1);

    expect(levels(FEAR, { baseline: CALM })).toEqual(["skewing", "rip", "skew_25d_rr", "contango"]);
  });

  it("should read a missing baseline as no shift", () => {
    const set = evaluateSignals({ ...CALM, dlt25Iv30d: 0.24 });
    expect(set.skew_25d_rr.change).toBe(0);
    expect(set.skew_25d_rr.level).toBe("OK");
  });

  it("should fire contango collapse relative to baseline even while positive", () => {
    const set = evaluateSignals({ ...CALM, contango: 0.04 }, { baseline: CALM });
    expect(set.contango.change).toBe(-0.6);
    expect(set.contango.level).toBe("ACTION");
  });

  it("should fire wing skew and funding stress on absolute levels", () => {
    const set = evaluateSignals({
      ...CALM,
      dlt95Iv30d: 0.45,
      dlt95Iv10d: 0.4,
      borrow2y: 0.04,
      riskFree30: 0.005,
    });
    expect(set.wing_skew_30d.level).toBe("ACTION");
    expect(set.wing_skew_30d.value).toBe(0.25);
    expect(set.wing_skew_10d.level).toBe("ACTION");
    expect(set.borrow_term.level).toBe("ACTION");
    expect(set.borrow_term.value).toBe(0.01);
    expect(set.borrow_spread.level).toBe("ACTION");
    expect(set.borrow_spread.value).toBe(0.045);
  });

  it("should fire vol momentum against the prior day", () => {
    const previousDay = { ...CALM, iv30d: 0.15, skewing: -0.01, contango: 0.15 };
    const set = evaluateSignals(CALM, { previousDay });

    expect(set.iv_momentum.level).toBe("ACTION");
    expect(set.iv_momentum.value).toBe(0.03);
    expect(set.iv_momentum.previousValue).toBe(0.15);
    expect(set.skewing_change.level).toBe("ACTION");
    expect(set.skewing_change.value).toBe(0.03);
    expect(set.contango_change.level).toBe("ACTION");
    expect(set.contango_change.value).toBe(-0.05);
  });

  it("should raise secondary warnings and info, never ACTION", () => {
    const set = evaluateSignals(
      {
        ...CALM,
        fbfwd30_20: 1.1,
        rSlp30: 1.0,
        fwd30_20: 0.2,
        rDrv30: 0.03,
        confidence: 0.9,
        mwAdj30: 0.002,
        iv10d: 0.2,
      },
      { previousDay: CALM, baseline: CALM }
    );

    expect(set.fbfwd30_20.level).toBe("WARNING");
    expect(set.rSlp30.level).toBe("WARNING");
    expect(set.rSlp30.change).toBe(0.5);
    expect(set.fwd_kink.level).toBe("INFO");
    expect(set.fwd_kink.value).toBe(0.015);
    expect(set.rDrv30.level).toBe("INFO");
    expect(set.model_confidence.level).toBe("WARNING");
    expect(set.mw_adj_30.level).toBe("WARNING");
    expect(set.iv10_iv30.level).toBe("WARNING");
    expect(set.iv10_iv30.value).toBe(1.1111);

    const tiers = signalsInGroup("secondary").map((k) => set[k].tier);
    expect(tiers.every((t) => t > 1)).toBe(true);
  });

  it("should not flag a rising RV derivative while IV moves", () => {
    const set = evaluateSignals(
      { ...CALM, rDrv30: 0.03, iv30d: 0.19 },
      { previousDay: CALM, baseline: CALM }
    );
    expect(set.rDrv30.level).toBe("OK");
  });

  it("should warn when model confidence is absent", () => {
    const { confidence: _omit, ...rest } = CALM;
    const set = evaluateSignals(rest);
    expect(set.model_confidence.value).toBe(0);
    expect(set.model_confidence.level).toBe("WARNING");
  });

  it("should stay neutral on an empty snapshot apart from model confidence", () => {
    const set = evaluateSignals({});
    expect(set.fbfwd30_20.value).toBe(1);
    expect(set.iv10_iv30.value).toBe(1);
    expect(levels({})).toEqual(["model_confidence"]);
  });

  it("should ignore null and non-finite fields", () => {
    const set = evaluateSignals({ ...CALM, rip: null, skewing: Number.NaN, iv10d: undefined });
    expect(set.rip.value).toBe(0);
    expect(set.skewing.value).toBe(0);
    expect(set.iv10_iv30.value).toBe(0);
  });

  it("should apply configured thresholds", () => {
    const thresholds = parseEngineConfig({ signals: { rip: 45 } }).signals;
    const set = evaluateSignals(CALM, {}, undefined, thresholds);
    expect(set.rip.level).toBe("ACTION");
  });
});

describe("credit spread", () => {
  it("should fire when the credit leg lags the reference leg", () => {
    const { credit_spread } = computeCreditSignal(95, 100, 100, 100);
    expect(credit_spread?.value).toBe(-0.05);
    expect(credit_spread?.level).toBe("ACTION");
  });

  it("should stay OK on a small gap", () => {
    const { credit_spread } = computeCreditSignal(99.8, 100, 100, 100);
    expect(credit_spread?.level).toBe("OK");
  });

  it("should return nothing when any input is missing or zero", () => {
    expect(computeCreditSignal(null, 100, 100, 100)).toEqual({});
    expect(computeCreditSignal(95, undefined, 100, 100)).toEqual({});
    expect(computeCreditSignal(95, 100, 0, 100)).toEqual({});
    expect(computeCreditSignal(95, 100, 100, Number.NaN)).toEqual({});
  });

  it("should report credit neutral without a quad and fire with one", () => {
    expect(evaluateSignals(CALM).credit_spread).toMatchObject({ value: 0, level: "OK" });

    const set = evaluateSignals(CALM, {}, {
      current: 95,
      reference: 100,
      currentPrev: 100,
      referencePrev: 100,
    });
    expect(set.credit_spread.level).toBe("ACTION");
    expect(Object.keys(set)).toHaveLength(19);
  });
});

describe("SignalCalculator", () => {
  it("should read each symbol's references from the store", () => {
    const store = new ReferenceStore();
    store.setBaseline("SPX", CALM);
    const calc = new SignalCalculator(store);

    expect(calc.computeSignals("SPX", FEAR).skew_25d_rr.level).toBe("ACTION");
    expect(calc.computeSignals("SPY", FEAR).skew_25d_rr.level).toBe("OK");
  });

  it("should be deterministic for identical inputs", () => {
    const store = new ReferenceStore();
    store.setBaseline("SPX", CALM);
    const calc = new SignalCalculator(store);
    expect(calc.computeSignals("SPX", FEAR)).toEqual(calc.computeSignals("SPX", FEAR));
  });
});
