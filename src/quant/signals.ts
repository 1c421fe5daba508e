/**
 * Signal Calculator — vol-surface fear/stress detection
 *
 * Produces 19 named signals from one symbol's vol-surface snapshot:
 *   - Core fear (5, tier 1): skewing, risk premium, 25d skew shift,
 *     contango collapse, credit-proxy spread
 *   - Wing skew (2, tier 1): crash-wing spread at 30d and 10d
 *   - Funding stress (2, tier 1): borrow term spread, borrow vs risk-free
 *   - Vol momentum (3, tier 1): 1-day change in iv30d, skewing, contango
 *   - Secondary (7, tier 2-3): informational only
 *
 * Shifts are measured against a session baseline and the prior day's
 * snapshot, both handed in by the caller.
 */

import type { CreditQuad, MarketSnapshot, ReferenceState } from "../types/market.js";
import type {
  SignalGroup,
  SignalKey,
  SignalLevel,
  SignalRecord,
  SignalSet,
  SignalTier,
} from "../types/signals.js";
import { DEFAULT_ENGINE_CONFIG, type SignalThresholds } from "../config/engine.js";
import { readField } from "../utils/validation.js";
import type { ReferenceStore } from "./reference-state.js";

// ─── Catalog ────────────────────────────────────────────

export interface SignalDefinition {
  key: SignalKey;
  label: string;
  group: SignalGroup;
  tier: SignalTier;
}

/** Every signal, in display order */
export const SIGNAL_CATALOG: readonly SignalDefinition[] = [
  { key: "skewing", label: "Skewing", group: "core", tier: 1 },
  { key: "rip", label: "Risk Implied Premium", group: "core", tier: 1 },
  { key: "skew_25d_rr", label: "Skew (25d RR)", group: "core", tier: 1 },
  { key: "contango", label: "Contango", group: "core", tier: 1 },
  { key: "credit_spread", label: "Credit Spread", group: "core", tier: 1 },
  { key: "wing_skew_30d", label: "Wing Skew 30d", group: "wing", tier: 1 },
  { key: "wing_skew_10d", label: "Wing Skew 10d", group: "wing", tier: 1 },
  { key: "borrow_term", label: "Borrow Term Spread", group: "funding", tier: 1 },
  { key: "borrow_spread", label: "Borrow vs Risk-Free", group: "funding", tier: 1 },
  { key: "iv_momentum", label: "IV Momentum", group: "momentum", tier: 1 },
  { key: "skewing_change", label: "Skewing Change", group: "momentum", tier: 1 },
  { key: "contango_change", label: "Contango Change", group: "momentum", tier: 1 },
  { key: "fbfwd30_20", label: "Fwd/Bwd Forecast", group: "secondary", tier: 2 },
  { key: "rSlp30", label: "Skew Slope (rSlp30)", group: "secondary", tier: 2 },
  { key: "fwd_kink", label: "Fwd Vol Kink", group: "secondary", tier: 3 },
  { key: "rDrv30", label: "RV Derivative", group: "secondary", tier: 3 },
  { key: "model_confidence", label: "Model Confidence", group: "secondary", tier: 2 },
  { key: "mw_adj_30", label: "Market Width", group: "secondary", tier: 2 },
  { key: "iv10_iv30", label: "IV 10d/30d Ratio", group: "secondary", tier: 2 },
];

const DEFINITIONS = new Map<SignalKey, SignalDefinition>(
  SIGNAL_CATALOG.map((d): [SignalKey, SignalDefinition] => [d.key, d])
);

/** Signal keys in display order */
export const SIGNAL_ORDER: readonly SignalKey[] = SIGNAL_CATALOG.map((d) => d.key);

/** Keys belonging to a group, in display order */
export function signalsInGroup(group: SignalGroup): SignalKey[] {
  return SIGNAL_CATALOG.filter((d) => d.group === group).map((d) => d.key);
}

// ─── Helpers ────────────────────────────────────────────

function round(v: number, places: number = 4): number {
  const f = 10 ** places;
  return Math.round(v * f) / f;
}

type RecordExtras = Pick<SignalRecord, "baseline" | "previousValue" | "change">;

function makeRecord(
  key: SignalKey,
  value: number,
  level: SignalLevel,
  extras: RecordExtras = {}
): SignalRecord {
  const def = DEFINITIONS.get(key);
  return {
    key,
    label: def?.label ?? key,
    group: def?.group ?? "secondary",
    tier: def?.tier ?? 3,
    value,
    level,
    ...extras,
  };
}

function isUsablePrice(v: number | null | undefined): v is number {
  return v !== null && v !== undefined && Number.isFinite(v) && v !== 0;
}

// ─── Credit proxy ───────────────────────────────────────

/**
 * Credit-proxy spread: % change of one reference asset minus % change of
 * the other. Returns an empty mapping if any input is missing or zero.
 */
export function computeCreditSignal(
  current: number | null | undefined,
  reference: number | null | undefined,
  currentPrev: number | null | undefined,
  referencePrev: number | null | undefined,
  thresholds: SignalThresholds = DEFAULT_ENGINE_CONFIG.signals
): Partial<Record<"credit_spread", SignalRecord>> {
  if (
    !isUsablePrice(current) ||
    !isUsablePrice(reference) ||
    !isUsablePrice(currentPrev) ||
    !isUsablePrice(referencePrev)
  ) {
    return {};
  }

  const currentChg = (current - currentPrev) / currentPrev;
  const referenceChg = (reference - referencePrev) / referencePrev;
  const credit = currentChg - referenceChg;

  return {
    credit_spread: makeRecord(
      "credit_spread",
      round(credit),
      credit < thresholds.credit ? "ACTION" : "OK"
    ),
  };
}

// ─── Signal computation ─────────────────────────────────

/**
 * Compute all 19 signals from a snapshot and its reference state.
 * Pure: identical inputs always give identical output, and no input raises.
 * Without a usable credit quad, credit_spread is reported neutral (0, OK).
 */
export function evaluateSignals(
  snapshot: MarketSnapshot,
  reference: ReferenceState = {},
  credit?: CreditQuad,
  thresholds: SignalThresholds = DEFAULT_ENGINE_CONFIG.signals
): SignalSet {
  const t = thresholds;
  const sf = (key: string, fallback: number = 0) => readField(snapshot, key, fallback);
  // Reference reads fall back to the live value, giving a zero change
  const base = (key: string) => readField(reference.baseline, key, sf(key));
  const prev = (key: string) => readField(reference.previousDay, key, sf(key));

  // ── Core fear ─────────────────────────────────────────

  const skewing = sf("skewing");
  const rip = sf("rip");

  const skew = sf("dlt25Iv30d") - sf("dlt75Iv30d");
  const baseSkew = base("dlt25Iv30d") - base("dlt75Iv30d");
  const skewChg = skew - baseSkew;

  const ct = sf("contango");
  const ctBase = base("contango");
  const ctPct = Math.abs(ctBase) > t.contangoBaselineFloor ? (ct - ctBase) / Math.abs(ctBase) : 0;

  const creditRecord = credit
    ? computeCreditSignal(
        credit.current,
        credit.reference,
        credit.currentPrev,
        credit.referencePrev,
        t
      ).credit_spread
    : undefined;

  // ── Wing skew ─────────────────────────────────────────

  const wing30 = sf("dlt95Iv30d") - sf("dlt5Iv30d");
  const wing10 = sf("dlt95Iv10d") - sf("dlt5Iv10d");

  // ── Funding stress ────────────────────────────────────

  const borrow30 = sf("borrow30");
  const borrowTerm = borrow30 - sf("borrow2y");
  const borrowSpread = borrow30 - sf("riskFree30");

  // ── Vol momentum ──────────────────────────────────────

  const iv30 = sf("iv30d");
  const ivMomentum = iv30 - prev("iv30d");
  const skewingChg = skewing - prev("skewing");
  const contangoChg = ct - prev("contango");

  // ── Secondary ─────────────────────────────────────────

  const fb = sf("fbfwd30_20", 1.0);

  const rslp = sf("rSlp30");
  const prevRslp = prev("rSlp30");
  const slopeChg = rslp - prevRslp;

  const kink = Math.abs(sf("fwd30_20") - sf("fwd60_30"));

  const rdrv = sf("rDrv30");
  const prevRdrv = prev("rDrv30");
  const ivFlat = Math.abs(iv30 - base("iv30d")) < t.ivFlatTolerance;

  const confidence = sf("confidence");
  const mwAdj = sf("mwAdj30");

  const iv10 = sf("iv10d");
  const ivRatio = iv30 > t.ivRatioFloor ? iv10 / iv30 : 1.0;

  return {
    skewing: makeRecord("skewing", round(skewing), skewing > t.skewing ? "ACTION" : "OK"),
    rip: makeRecord("rip", round(rip, 2), rip > t.rip ? "ACTION" : "OK"),
    skew_25d_rr: makeRecord(
      "skew_25d_rr",
      round(skew),
      Math.abs(skewChg) > t.skewChange ? "ACTION" : "OK",
      { baseline: round(baseSkew), change: round(skewChg) }
    ),
    contango: makeRecord(
      "contango",
      round(ct),
      ctPct < -t.contangoDrop || ct < 0 ? "ACTION" : "OK",
      { baseline: round(ctBase), change: round(ctPct) }
    ),
    credit_spread: creditRecord ?? makeRecord("credit_spread", 0, "OK"),

    wing_skew_30d: makeRecord(
      "wing_skew_30d",
      round(wing30),
      wing30 > t.wingSkew30d ? "ACTION" : "OK"
    ),
    wing_skew_10d: makeRecord(
      "wing_skew_10d",
      round(wing10),
      wing10 > t.wingSkew10d ? "ACTION" : "OK"
    ),

    borrow_term: makeRecord(
      "borrow_term",
      round(borrowTerm),
      borrowTerm > t.borrowTerm ? "ACTION" : "OK"
    ),
    borrow_spread: makeRecord(
      "borrow_spread",
      round(borrowSpread),
      borrowSpread > t.borrowSpread ? "ACTION" : "OK"
    ),

    iv_momentum: makeRecord(
      "iv_momentum",
      round(ivMomentum),
      ivMomentum > t.ivMomentum ? "ACTION" : "OK",
      { previousValue: round(prev("iv30d")), change: round(ivMomentum) }
    ),
    skewing_change: makeRecord(
      "skewing_change",
      round(skewingChg),
      skewingChg > t.skewingChange ? "ACTION" : "OK",
      { previousValue: round(prev("skewing")), change: round(skewingChg) }
    ),
    contango_change: makeRecord(
      "contango_change",
      round(contangoChg),
      contangoChg < t.contangoChange ? "ACTION" : "OK",
      { previousValue: round(prev("contango")), change: round(contangoChg) }
    ),

    fbfwd30_20: makeRecord(
      "fbfwd30_20",
      round(fb),
      fb > t.fbfwdHigh || fb < t.fbfwdLow ? "WARNING" : "OK"
    ),
    rSlp30: makeRecord(
      "rSlp30",
      round(rslp),
      Math.abs(slopeChg) > t.slopeChange ? "WARNING" : "OK",
      { previousValue: round(prevRslp), change: round(slopeChg) }
    ),
    fwd_kink: makeRecord("fwd_kink", round(kink), kink > t.fwdKink ? "INFO" : "OK"),
    rDrv30: makeRecord(
      "rDrv30",
      round(rdrv),
      rdrv > prevRdrv + t.rvDerivativeRise && ivFlat ? "INFO" : "OK",
      { previousValue: round(prevRdrv) }
    ),
    model_confidence: makeRecord(
      "model_confidence",
      round(confidence),
      confidence < t.modelConfidence ? "WARNING" : "OK"
    ),
    mw_adj_30: makeRecord("mw_adj_30", round(mwAdj), mwAdj > t.marketWidth ? "WARNING" : "OK"),
    iv10_iv30: makeRecord(
      "iv10_iv30",
      round(ivRatio),
      ivRatio > t.ivTermRatio ? "WARNING" : "OK"
    ),
  };
}

// ─── Stateful wrapper ───────────────────────────────────

/**
 * Computes signals for a symbol against the reference pair held in a
 * ReferenceStore. The store is owned by the caller; this class only reads it.
 */
export class SignalCalculator {
  constructor(
    private readonly references: ReferenceStore,
    private readonly thresholds: SignalThresholds = DEFAULT_ENGINE_CONFIG.signals
  ) {}

  computeSignals(symbol: string, snapshot: MarketSnapshot, credit?: CreditQuad): SignalSet {
    return evaluateSignals(snapshot, this.references.get(symbol), credit, this.thresholds);
  }

  computeCreditSignal(
    current: number | null | undefined,
    reference: number | null | undefined,
    currentPrev: number | null | undefined,
    referencePrev: number | null | undefined
  ): Partial<Record<"credit_spread", SignalRecord>> {
    return computeCreditSignal(current, reference, currentPrev, referencePrev, this.thresholds);
  }
}
