/**
 * Risk Budget Sizer
 *
 * Maps signal strength to a dollar risk budget for one trade:
 *
 *   baseRisk   = capital × baseRiskPct
 *   multiplier = coreMultiplier × compositeMultiplier × groupBonus × calendarModifier
 *   riskBudget = min(baseRisk × multiplier, capital × maxRiskPct)
 *
 * Unmapped core counts and composites size at 1.0.
 */

import type { CompositeName, RiskBudgetResult, SignalStrength } from "../types/signals.js";
import { DEFAULT_ENGINE_CONFIG, type SizingConfig } from "../config/engine.js";

export interface BudgetInput {
  coreCount: number;
  composite?: CompositeName | null;
  groupsFiring?: number;
  wingCount?: number;
  fundCount?: number;
  momCount?: number;
  /** Replaces the configured account capital when positive */
  capitalOverride?: number;
  calendarModifier?: number;
}

const GROUP_DRIVEN_COMPOSITES: readonly CompositeName[] = [
  "FUNDING_STRESS",
  "WING_PANIC",
  "VOL_ACCELERATION",
];

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

function nonNegative(v: number | undefined, fallback: number): number {
  return v !== undefined && Number.isFinite(v) && v >= 0 ? v : fallback;
}

/** Capital to size against: a positive override, else the configured account */
export function resolveCapital(
  capitalOverride: number | undefined,
  config: SizingConfig = DEFAULT_ENGINE_CONFIG.sizing
): number {
  return capitalOverride !== undefined && Number.isFinite(capitalOverride) && capitalOverride > 0
    ? capitalOverride
    : config.accountCapital;
}

/**
 * Coarse strength label. Informational only: it never feeds back into sizing.
 */
export function classifyStrength(
  coreCount: number,
  groupsFiring: number,
  composite: CompositeName | null = null
): SignalStrength {
  if (composite === "MULTI_SIGNAL_STRONG" || groupsFiring >= 3 || coreCount >= 5) return "EXTREME";
  if (coreCount >= 4 || (coreCount >= 3 && groupsFiring >= 2)) return "VERY_STRONG";
  if (coreCount >= 3 || (composite !== null && GROUP_DRIVEN_COMPOSITES.includes(composite))) {
    return "STRONG";
  }
  if (coreCount >= 2 || groupsFiring >= 2) return "MODERATE";
  return "NONE";
}

/**
 * Compute the risk budget for a prospective trade.
 * Always returns a budget in [0, capital × maxRiskPct].
 */
export function computeBudget(
  input: BudgetInput,
  config: SizingConfig = DEFAULT_ENGINE_CONFIG.sizing
): RiskBudgetResult {
  const coreCount = nonNegative(input.coreCount, 0);
  const groupsFiring = nonNegative(input.groupsFiring, 0);
  const wingCount = nonNegative(input.wingCount, 0);
  const fundCount = nonNegative(input.fundCount, 0);
  const momCount = nonNegative(input.momCount, 0);
  // No calendar means a normal day; an unusable one never sizes up
  const calendarModifier =
    input.calendarModifier === undefined ? 1.0 : nonNegative(input.calendarModifier, 0);
  const composite = input.composite ?? null;

  const capital = resolveCapital(input.capitalOverride, config);
  const baseRisk = capital * config.baseRiskPct;
  const maxRisk = capital * config.maxRiskPct;

  let coreMultiplier = config.coreMultipliers.get(coreCount) ?? 1.0;
  // Signals carried by the non-core groups still size at the floor
  if (
    coreCount < 2 &&
    coreCount + wingCount + fundCount + momCount >= config.nonCoreFloorMinSignals
  ) {
    coreMultiplier = Math.max(coreMultiplier, config.nonCoreFloor);
  }

  const compositeMultiplier =
    composite !== null ? config.compositeMultipliers.get(composite) ?? 1.0 : 1.0;
  const groupBonus = 1 + Math.max(0, groupsFiring - 1) * config.groupBonusPct;
  const multiplier = coreMultiplier * compositeMultiplier * groupBonus * calendarModifier;

  const riskBudget = Math.max(0, Math.min(round2(baseRisk * multiplier), maxRisk));

  return {
    riskBudget,
    baseRisk: round2(baseRisk),
    maxRisk: round2(maxRisk),
    multiplier,
    coreMultiplier,
    compositeMultiplier,
    groupBonus,
    calendarModifier,
    coreCount,
    groupsFiring,
    composite,
    strength: classifyStrength(coreCount, groupsFiring, composite),
    capital,
  };
}

/** Maximum total risk deployable in one day */
export function maxDailyBudget(
  capitalOverride?: number,
  config: SizingConfig = DEFAULT_ENGINE_CONFIG.sizing
): number {
  return resolveCapital(capitalOverride, config) * config.maxDailyRiskPct;
}
