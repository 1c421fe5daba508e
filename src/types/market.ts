/**
 * Market data type definitions.
 * Covers vol-surface snapshots, per-symbol reference state, and the
 * credit-proxy price quad consumed by the signal calculator.
 */

/**
 * One symbol's vol-surface summary at one observation time, keyed by
 * provider field name (iv30d, dlt25Iv30d, contango, borrow30, ...).
 * Missing or non-finite fields read as 0.
 */
export type MarketSnapshot = Readonly<Record<string, number | null | undefined>>;

/** Reference snapshots a symbol's signals are measured against */
export interface ReferenceState {
  /** Session baseline, reset once per trading session */
  baseline?: MarketSnapshot;
  /** Prior trading day's snapshot, reset once per day */
  previousDay?: MarketSnapshot;
}

/**
 * Two reference assets' current and previous closes, used for the
 * credit-proxy spread (e.g. a high-yield ETF against a treasury ETF).
 */
export interface CreditQuad {
  current: number | null | undefined;
  reference: number | null | undefined;
  currentPrev: number | null | undefined;
  referencePrev: number | null | undefined;
}

