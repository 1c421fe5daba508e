/**
 * Signal engine type definitions.
 * Covers signal records, calendar context, composite verdicts,
 * risk budgets and structure rankings.
 */

// ─── Signals ────────────────────────────────────────────

/** Ordered from quietest to loudest */
export const SIGNAL_LEVELS = ["OK", "INFO", "WARNING", "ACTION"] as const;
export type SignalLevel = (typeof SIGNAL_LEVELS)[number];

export type SignalTier = 1 | 2 | 3;

export type SignalGroup = "core" | "wing" | "funding" | "momentum" | "secondary";

export type SignalKey =
  // core fear
  | "skewing"
  | "rip"
  | "skew_25d_rr"
  | "contango"
  | "credit_spread"
  // wing skew
  | "wing_skew_30d"
  | "wing_skew_10d"
  // funding stress
  | "borrow_term"
  | "borrow_spread"
  // vol momentum
  | "iv_momentum"
  | "skewing_change"
  | "contango_change"
  // secondary (informational)
  | "fbfwd30_20"
  | "rSlp30"
  | "fwd_kink"
  | "rDrv30"
  | "model_confidence"
  | "mw_adj_30"
  | "iv10_iv30";

export interface SignalRecord {
  key: SignalKey;
  label: string;
  group: SignalGroup;
  tier: SignalTier;
  value: number;
  level: SignalLevel;
  /** Session-baseline value the signal was measured against */
  baseline?: number;
  /** Prior-day value the signal was measured against */
  previousValue?: number;
  /** Change vs baseline / prior day (percentage for contango) */
  change?: number;
}

/** Full output of one signal computation: every key present */
export type SignalSet = Record<SignalKey, SignalRecord>;

/** Any subset of signals, as accepted by the classifier */
export type SignalMap = Readonly<Partial<Record<SignalKey, SignalRecord>>>;

// ─── Calendar ───────────────────────────────────────────

export type CalendarLabel =
  | "FOMC_BLACKOUT"
  | "VIXPIRATION_DISCOUNT"
  | "OPEX_AMPLIFIER"
  | "NORMAL";

export interface CalendarContext {
  /** UTC calendar day, YYYY-MM-DD */
  date: string;
  opexAmplifier: boolean;
  vixpirationDiscount: boolean;
  fomcBlackout: boolean;
  modifier: number;
  label: CalendarLabel;
}

// ─── Composite ──────────────────────────────────────────

export const COMPOSITE_NAMES = [
  "MULTI_SIGNAL_STRONG",
  "FEAR_BOUNCE_STRONG",
  "FEAR_BOUNCE_STRONG_OPEX",
  "FUNDING_STRESS",
  "WING_PANIC",
  "VOL_ACCELERATION",
  "FEAR_BOUNCE_LONG",
  "DIRECTIONAL_BEARISH",
  "DIRECTIONAL_BEARISH_WEAK",
] as const;
export type CompositeName = (typeof COMPOSITE_NAMES)[number];

/** ACTION-level counts per tier-1 group */
export interface GroupCounts {
  core: number;
  wing: number;
  funding: number;
  momentum: number;
  /** Groups meeting their firing minimum (0-4) */
  groupsFiring: number;
}

export interface CompositeResult {
  name: CompositeName | null;
  /** Tier-1 signals at ACTION, in display order */
  tier1Firing: SignalKey[];
  counts: GroupCounts;
  /** Id of the cascade rule that produced the verdict */
  rule: string | null;
}

// ─── Sizing ─────────────────────────────────────────────

export const SIGNAL_STRENGTHS = ["NONE", "MODERATE", "STRONG", "VERY_STRONG", "EXTREME"] as const;
export type SignalStrength = (typeof SIGNAL_STRENGTHS)[number];

export interface RiskBudgetResult {
  riskBudget: number;
  baseRisk: number;
  maxRisk: number;
  multiplier: number;
  coreMultiplier: number;
  compositeMultiplier: number;
  groupBonus: number;
  calendarModifier: number;
  coreCount: number;
  groupsFiring: number;
  composite: CompositeName | null;
  strength: SignalStrength;
  capital: number;
}

// ─── Structures ─────────────────────────────────────────

export const STRUCTURE_IDS = [
  "bull_put_spread",
  "long_call",
  "call_debit_spread",
  "call_ratio_spread",
  "broken_wing_butterfly",
  "put_debit_spread",
  "long_put",
  "bear_call_spread",
  "iron_butterfly",
  "short_iron_condor",
] as const;
export type StructureId = (typeof STRUCTURE_IDS)[number];

export interface StructureScore {
  structure: StructureId;
  label: string;
  score: number;
  /** Conditions that contributed points, or a note that none did */
  reason: string;
}
