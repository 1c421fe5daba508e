/**
 * Engine configuration — every signal threshold, cascade count, sizing
 * table and structure-scoring weight, with documented defaults.
 *
 * Loaded from an optional JSON file; any field left out takes its default.
 * Lookup tables are parsed into typed maps so callers never coerce keys.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { COMPOSITE_NAMES, STRUCTURE_IDS } from "../types/signals.js";
import type { CompositeName } from "../types/signals.js";
import { agentLogger } from "../utils/logger.js";

const log = agentLogger("config");

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/config when run from source, dist/src/config when built
const FOMC_CALENDAR_CANDIDATES = [
  path.resolve(__dirname, "../../data/fomc-calendar.json"),
  path.resolve(__dirname, "../../../data/fomc-calendar.json"),
];

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Dates must be YYYY-MM-DD");

const FomcCalendarSchema = z.object({
  dates: z.array(IsoDateSchema),
});

function loadFomcCalendar(): string[] {
  const file = FOMC_CALENDAR_CANDIDATES.find((f) => fs.existsSync(f));
  if (!file) throw new Error("FOMC calendar data/fomc-calendar.json not found");
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  return FomcCalendarSchema.parse(raw).dates;
}

/** Maintained FOMC decision dates shipped with the engine */
export const DEFAULT_FOMC_DATES: readonly string[] = loadFomcCalendar();

// ── Signal thresholds ───────────────────────────────────────

export const SignalThresholdsSchema = z.object({
  // Core fear
  skewing: z.number().default(0.05),
  rip: z.number().default(70),
  skewChange: z.number().default(0.01),
  contangoDrop: z.number().default(0.5),
  /** |baseline contango| at or below this makes the pct change 0 */
  contangoBaselineFloor: z.number().default(0.001),
  credit: z.number().default(-0.005),
  // Wing skew (dlt95 - dlt5)
  wingSkew30d: z.number().default(0.19),
  wingSkew10d: z.number().default(0.16),
  // Funding stress
  borrowTerm: z.number().default(0.0075),
  borrowSpread: z.number().default(0.042),
  // Vol momentum (1-day changes)
  ivMomentum: z.number().default(0.005),
  skewingChange: z.number().default(0.02),
  contangoChange: z.number().default(-0.03),
  // Secondary
  fbfwdHigh: z.number().default(1.05),
  fbfwdLow: z.number().default(0.95),
  slopeChange: z.number().default(0.3),
  fwdKink: z.number().default(0.01),
  rvDerivativeRise: z.number().default(0.01),
  ivFlatTolerance: z.number().default(0.005),
  modelConfidence: z.number().default(0.97),
  marketWidth: z.number().default(0.001),
  ivTermRatio: z.number().default(1.05),
  /** iv30d at or below this makes the 10d/30d ratio neutral */
  ivRatioFloor: z.number().default(0.01),
});

export type SignalThresholds = z.infer<typeof SignalThresholdsSchema>;

// ── Composite cascade ───────────────────────────────────────

export const CompositeConfigSchema = z.object({
  /** Tier-1 ACTION signals needed before any verdict */
  minTier1Firing: z.number().int().min(0).default(2),
  /** Per-group ACTION counts for the group to count as firing */
  coreGroupMin: z.number().int().min(1).default(2),
  wingGroupMin: z.number().int().min(1).default(1),
  fundingGroupMin: z.number().int().min(1).default(1),
  momentumGroupMin: z.number().int().min(1).default(1),
  /** Groups firing for the multi-signal rule */
  multiGroupMin: z.number().int().min(1).default(3),
  /** Groups firing alongside the funding/wing/momentum rules */
  pairedGroupMin: z.number().int().min(1).default(2),
  /** Same-group ACTION count for the funding/wing/momentum rules */
  groupRuleMin: z.number().int().min(1).default(2),
  /** Core ACTION count for a strong fear bounce */
  compositeMin: z.number().int().min(1).default(3),
  /** Raised core minimum during a VIX-expiration discount */
  compositeMinVixDiscount: z.number().int().min(1).default(4),
  /** Core ACTION count for the weak fear bounce */
  coreLongMin: z.number().int().min(1).default(2),
  /** Intraday: core count that pairs with pairedGroupMin for the strong call */
  intradayStrongCoreMin: z.number().int().min(1).default(3),
});

export type CompositeConfig = z.infer<typeof CompositeConfigSchema>;

// ── Calendar overlay ────────────────────────────────────────

export const CalendarConfigSchema = z.object({
  fomcDates: z.array(IsoDateSchema).default([...DEFAULT_FOMC_DATES]),
  fomcWindowDays: z.number().int().min(0).default(1),
  vixWindowDays: z.number().int().min(0).default(1),
  opexWindowDays: z.number().int().min(0).default(3),
  fomcModifier: z.number().min(0).default(0),
  vixDiscountModifier: z.number().min(0).default(0.7),
  opexModifier: z.number().min(0).default(1.5),
  normalModifier: z.number().min(0).default(1),
});

export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;

// ── Risk budget sizing ──────────────────────────────────────

function toCoreTable(raw: Record<string, number>): ReadonlyMap<number, number> {
  return new Map(Object.entries(raw).map(([k, v]): [number, number] => [Number(k), v]));
}

function toCompositeTable(
  raw: Partial<Record<CompositeName, number>>
): ReadonlyMap<CompositeName, number> {
  const table = new Map<CompositeName, number>();
  for (const name of COMPOSITE_NAMES) {
    const v = raw[name];
    if (v !== undefined) table.set(name, v);
  }
  return table;
}

export const SizingConfigSchema = z.object({
  accountCapital: z.number().positive().default(250_000),
  baseRiskPct: z.number().min(0).max(1).default(0.02),
  maxRiskPct: z.number().min(0).max(1).default(0.05),
  maxDailyRiskPct: z.number().min(0).max(1).default(0.1),
  groupBonusPct: z.number().min(0).default(0.15),
  /** Floor for the core multiplier when non-core groups carry the signal */
  nonCoreFloor: z.number().min(0).default(0.8),
  /** Total ACTION count across groups that triggers the floor */
  nonCoreFloorMinSignals: z.number().int().min(0).default(3),
  /** Exact core count → multiplier; unmapped counts use 1.0 */
  coreMultipliers: z
    .record(z.string().regex(/^\d+$/, "Core multiplier keys must be integers"), z.number().min(0))
    .default({ "3": 1.0, "4": 1.5, "5": 2.0 })
    .transform(toCoreTable),
  /** Composite → multiplier; unmapped composites and null use 1.0 */
  compositeMultipliers: z
    .record(z.enum(COMPOSITE_NAMES), z.number().min(0))
    .default({
      MULTI_SIGNAL_STRONG: 1.5,
      FEAR_BOUNCE_STRONG: 1.0,
      FEAR_BOUNCE_STRONG_OPEX: 1.3,
      FUNDING_STRESS: 1.2,
      WING_PANIC: 1.1,
      VOL_ACCELERATION: 0.9,
      FEAR_BOUNCE_LONG: 0.7,
    })
    .transform(toCompositeTable),
});

export type SizingConfig = z.infer<typeof SizingConfigSchema>;

// ── Structure selector ──────────────────────────────────────

const BonusTableSchema = z.record(z.enum(STRUCTURE_IDS), z.number());

export const SelectorConfigSchema = z.object({
  /** IV rank used when neither an override nor ivRank1m is present */
  defaultIvRank: z.number().default(50),
  highIvRank: z.number().default(50),
  lowIvRank: z.number().default(30),
  elevatedIvRank: z.number().default(40),
  pinIvRankLow: z.number().default(30),
  pinIvRankHigh: z.number().default(60),
  highSkew: z.number().default(0.02),
  mildSkew: z.number().default(0.01),
  flatSkew: z.number().default(0.01),
  steepContango: z.number().default(0.05),
  positiveContango: z.number().default(0.03),
  flatContango: z.number().default(0.03),
  invertedContango: z.number().default(0.02),
  strongSignalMin: z.number().int().default(4),
  extremeSignalMin: z.number().int().default(5),
  multiGroupMin: z.number().int().default(3),
  quietCoreMax: z.number().int().default(3),
  quietGroupMax: z.number().int().default(1),
  weights: z
    .object({
      bullPutSpread: z
        .object({ highIv: z.number().default(3), steepSkew: z.number().default(2), contango: z.number().default(1) })
        .default({}),
      longCall: z
        .object({ lowIv: z.number().default(3), strongSignal: z.number().default(2), flatContango: z.number().default(1) })
        .default({}),
      callDebitSpread: z
        .object({ base: z.number().default(2.5), midIv: z.number().default(1.5), moderateSkew: z.number().default(1) })
        .default({}),
      callRatioSpread: z
        .object({ strongSignal: z.number().default(3), elevatedIv: z.number().default(1.5), skew: z.number().default(0.5) })
        .default({}),
      brokenWingButterfly: z
        .object({ extremeSignal: z.number().default(3), strongSignal: z.number().default(1.5), pinIv: z.number().default(1) })
        .default({}),
      putDebitSpread: z
        .object({ highIv: z.number().default(2), steepSkew: z.number().default(2), invertedContango: z.number().default(2) })
        .default({}),
      longPut: z
        .object({ lowIv: z.number().default(3), strongSignal: z.number().default(2), invertedContango: z.number().default(1) })
        .default({}),
      bearCallSpread: z
        .object({ highIv: z.number().default(2.5), steepSkew: z.number().default(1.5), invertedContango: z.number().default(2) })
        .default({}),
      ironButterfly: z
        .object({ highIv: z.number().default(3), flatSkew: z.number().default(1.5), contango: z.number().default(1) })
        .default({}),
      shortIronCondor: z
        .object({
          elevatedIv: z.number().default(2),
          containedSkew: z.number().default(1),
          contango: z.number().default(1),
          quietSignals: z.number().default(1),
        })
        .default({}),
    })
    .default({}),
  /** Per-composite score bonuses added before the condition points */
  compositeBonuses: z.record(z.enum(COMPOSITE_NAMES), BonusTableSchema).default({
    FUNDING_STRESS: {
      bull_put_spread: 3.0,
      bear_call_spread: 2.5,
      short_iron_condor: 2.0,
      iron_butterfly: 1.5,
      long_call: -1.0,
      long_put: -1.0,
    },
    WING_PANIC: {
      long_call: 3.0,
      call_debit_spread: 2.5,
      call_ratio_spread: 2.0,
      bull_put_spread: -1.5,
      short_iron_condor: -2.0,
    },
    VOL_ACCELERATION: {
      iron_butterfly: 3.0,
      short_iron_condor: 2.5,
      bull_put_spread: 2.0,
      bear_call_spread: 1.5,
    },
    MULTI_SIGNAL_STRONG: {
      call_ratio_spread: 2.5,
      broken_wing_butterfly: 2.0,
      long_call: 1.5,
    },
    FEAR_BOUNCE_STRONG: { long_call: 1.0, call_debit_spread: 0.5 },
    FEAR_BOUNCE_STRONG_OPEX: { long_call: 1.0, call_debit_spread: 0.5 },
    FEAR_BOUNCE_LONG: {
      call_debit_spread: 1.5,
      bull_put_spread: 1.0,
      call_ratio_spread: -1.0,
      broken_wing_butterfly: -1.0,
    },
  }),
  /** VOL_ACCELERATION bonuses when IV rank is at or below elevatedIvRank */
  volAccelerationLowIvBonuses: BonusTableSchema.default({
    long_call: 2.0,
    call_debit_spread: 1.5,
  }),
});

export type SelectorConfig = z.infer<typeof SelectorConfigSchema>;

// ── Top level ───────────────────────────────────────────────

export const EngineConfigSchema = z.object({
  signals: SignalThresholdsSchema.default({}),
  composite: CompositeConfigSchema.default({}),
  calendar: CalendarConfigSchema.default({}),
  sizing: SizingConfigSchema.default({}),
  selector: SelectorConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/** Validate a raw config object; missing fields take their defaults */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid engine config: ${issues}`);
  }
  return result.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = parseEngineConfig({});

/**
 * Load engine config from a JSON file.
 * A missing file yields the defaults; unreadable or invalid content throws.
 */
export function loadEngineConfig(filePath?: string): EngineConfig {
  if (!filePath) return DEFAULT_ENGINE_CONFIG;

  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    log.warn(`Engine config not found at ${resolved}, using defaults`);
    return DEFAULT_ENGINE_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new Error(`Failed to read engine config ${resolved}: ${String(err)}`);
  }

  try {
    const parsed = parseEngineConfig(raw);
    log.info(`Engine config loaded from ${resolved}`);
    return parsed;
  } catch (err) {
    throw new Error(`${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
