/**
 * Composite Classifier
 *
 * Fuses tier-1 signals and the calendar overlay into one named verdict.
 * The verdict comes from an ordered rule list evaluated top to bottom;
 * the first rule whose predicate holds decides.
 *
 * Two gates run before any rule:
 *   - fewer than minTier1Firing tier-1 ACTION signals → no verdict
 *   - FOMC blackout → no verdict, whatever else is firing
 */

import type {
  CalendarContext,
  CompositeName,
  CompositeResult,
  GroupCounts,
  SignalGroup,
  SignalKey,
  SignalMap,
} from "../types/signals.js";
import { DEFAULT_ENGINE_CONFIG, type CompositeConfig } from "../config/engine.js";
import { SIGNAL_ORDER, signalsInGroup } from "./signals.js";

const CORE_KEYS = signalsInGroup("core");
const WING_KEYS = signalsInGroup("wing");
const FUNDING_KEYS = signalsInGroup("funding");
const MOMENTUM_KEYS = signalsInGroup("momentum");

/** Groups whose ACTION signals can drive a verdict */
export const TIER1_GROUPS: readonly SignalGroup[] = ["core", "wing", "funding", "momentum"];

/** Inputs every cascade rule sees */
export interface CascadeFacts {
  counts: GroupCounts;
  /** VIX-expiration discount in force (outside the OpEx window) */
  vixDiscount: boolean;
  opexAmplifier: boolean;
}

export interface CompositeRule {
  id: string;
  description: string;
  when: (facts: CascadeFacts) => boolean;
  verdict: (facts: CascadeFacts) => CompositeName;
}

function actionCount(signals: SignalMap, keys: readonly SignalKey[]): number {
  return keys.filter((k) => signals[k]?.level === "ACTION").length;
}

/** Tier-1 signals at ACTION, in display order */
export function tier1Firing(signals: SignalMap): SignalKey[] {
  return SIGNAL_ORDER.filter((k) => {
    const s = signals[k];
    return s !== undefined && s.tier === 1 && s.level === "ACTION";
  });
}

/** ACTION counts per group and how many groups meet their minimum */
export function countGroups(
  signals: SignalMap,
  config: CompositeConfig = DEFAULT_ENGINE_CONFIG.composite
): GroupCounts {
  const core = actionCount(signals, CORE_KEYS);
  const wing = actionCount(signals, WING_KEYS);
  const funding = actionCount(signals, FUNDING_KEYS);
  const momentum = actionCount(signals, MOMENTUM_KEYS);

  const groupsFiring = [
    core >= config.coreGroupMin,
    wing >= config.wingGroupMin,
    funding >= config.fundingGroupMin,
    momentum >= config.momentumGroupMin,
  ].filter(Boolean).length;

  return { core, wing, funding, momentum, groupsFiring };
}

// ─── Rule lists ─────────────────────────────────────────

/** End-of-day / next-day cascade, highest priority first */
export function standardRules(
  config: CompositeConfig = DEFAULT_ENGINE_CONFIG.composite
): readonly CompositeRule[] {
  return [
    {
      id: "multi_group",
      description: `${config.multiGroupMin}+ groups firing`,
      when: (f) => f.counts.groupsFiring >= config.multiGroupMin,
      // Every tier-1 group firing beats the VIX discount
      verdict: (f) =>
        f.vixDiscount && f.counts.groupsFiring < TIER1_GROUPS.length
          ? "FEAR_BOUNCE_STRONG"
          : "MULTI_SIGNAL_STRONG",
    },
    {
      id: "core_strong",
      description: `${config.compositeMin}+ core signals (${config.compositeMinVixDiscount}+ under VIX discount)`,
      when: (f) =>
        f.counts.core >= (f.vixDiscount ? config.compositeMinVixDiscount : config.compositeMin),
      verdict: (f) => (f.opexAmplifier ? "FEAR_BOUNCE_STRONG_OPEX" : "FEAR_BOUNCE_STRONG"),
    },
    {
      id: "funding_stress",
      description: `${config.groupRuleMin}+ funding signals with ${config.pairedGroupMin}+ groups`,
      when: (f) =>
        f.counts.funding >= config.groupRuleMin && f.counts.groupsFiring >= config.pairedGroupMin,
      verdict: () => "FUNDING_STRESS",
    },
    {
      id: "wing_panic",
      description: `${config.groupRuleMin}+ wing signals with ${config.pairedGroupMin}+ groups`,
      when: (f) =>
        f.counts.wing >= config.groupRuleMin && f.counts.groupsFiring >= config.pairedGroupMin,
      verdict: () => "WING_PANIC",
    },
    {
      id: "vol_acceleration",
      description: `${config.groupRuleMin}+ momentum signals with ${config.pairedGroupMin}+ groups`,
      when: (f) =>
        f.counts.momentum >= config.groupRuleMin && f.counts.groupsFiring >= config.pairedGroupMin,
      verdict: () => "VOL_ACCELERATION",
    },
    {
      id: "core_long",
      description: `${config.coreLongMin}+ core signals`,
      when: (f) => f.counts.core >= config.coreLongMin,
      verdict: () => "FEAR_BOUNCE_LONG",
    },
  ];
}

/** Intraday cascade: same inputs read as a bearish lead */
export function intradayRules(
  config: CompositeConfig = DEFAULT_ENGINE_CONFIG.composite
): readonly CompositeRule[] {
  return [
    {
      id: "intraday_strong",
      description: `${config.multiGroupMin}+ groups, or ${config.intradayStrongCoreMin}+ core with ${config.pairedGroupMin}+ groups`,
      when: (f) =>
        f.counts.groupsFiring >= config.multiGroupMin ||
        (f.counts.core >= config.intradayStrongCoreMin &&
          f.counts.groupsFiring >= config.pairedGroupMin),
      verdict: () => "DIRECTIONAL_BEARISH",
    },
    {
      id: "intraday_weak",
      description: `${config.coreLongMin}+ core or ${config.pairedGroupMin}+ groups`,
      when: (f) =>
        f.counts.core >= config.coreLongMin || f.counts.groupsFiring >= config.pairedGroupMin,
      verdict: () => "DIRECTIONAL_BEARISH_WEAK",
    },
  ];
}

/** First matching rule, or null */
export function applyRules(
  rules: readonly CompositeRule[],
  facts: CascadeFacts
): { name: CompositeName; rule: string } | null {
  for (const rule of rules) {
    if (rule.when(facts)) return { name: rule.verdict(facts), rule: rule.id };
  }
  return null;
}

// ─── Classification ─────────────────────────────────────

/**
 * Classify a signal set under a calendar context.
 * Pure and total: the same inputs always give the same verdict.
 */
export function classify(
  signals: SignalMap,
  calendar: CalendarContext,
  intraday: boolean = false,
  config: CompositeConfig = DEFAULT_ENGINE_CONFIG.composite
): CompositeResult {
  const firing = tier1Firing(signals);
  const counts = countGroups(signals, config);
  const none: CompositeResult = { name: null, tier1Firing: firing, counts, rule: null };

  if (firing.length < config.minTier1Firing) return none;
  if (calendar.fomcBlackout) return none;

  const facts: CascadeFacts = {
    counts,
    vixDiscount: calendar.vixpirationDiscount && !calendar.opexAmplifier,
    opexAmplifier: calendar.opexAmplifier,
  };

  const match = applyRules(intraday ? intradayRules(config) : standardRules(config), facts);
  return match ? { ...none, name: match.name, rule: match.rule } : none;
}
