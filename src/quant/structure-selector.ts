/**
 * Structure Selector — rank trade-structure archetypes for current conditions
 *
 * Scores every catalog structure from:
 *   - IV rank (sell premium when rich, buy convexity when cheap)
 *   - 25d skew (dlt25Iv30d - dlt75Iv30d)
 *   - Contango (term-structure slope)
 *   - Core signal count and groups firing (conviction)
 *   - The composite verdict, when one is supplied (per-structure bonus)
 *
 * The sort is stable: equal scores keep catalog order.
 */

import type { MarketSnapshot } from "../types/market.js";
import type { CompositeName, StructureId, StructureScore } from "../types/signals.js";
import { DEFAULT_ENGINE_CONFIG, type SelectorConfig } from "../config/engine.js";
import { readField } from "../utils/validation.js";

// ─── Interfaces ─────────────────────────────────────────

export interface SelectionContext {
  composite?: CompositeName | null;
  groupsFiring?: number;
}

/** Inputs every structure scorer sees */
export interface SelectionFacts {
  ivRank: number;
  skew: number;
  contango: number;
  coreCount: number;
  groupsFiring: number;
}

interface Contribution {
  points: number;
  reason: string;
}

type StructureScorer = (f: SelectionFacts, cfg: SelectorConfig) => Contribution[];

interface CatalogEntry {
  id: StructureId;
  label: string;
  score: StructureScorer;
}

// ─── Formatting ─────────────────────────────────────────

const fmtIv = (v: number) => v.toFixed(0);
const fmtSkew = (v: number) => v.toFixed(4);
const fmtPts = (v: number) => (v >= 0 ? `+${v}` : `${v}`);

/** Collect a contribution when its condition holds and it is worth points */
function award(out: Contribution[], condition: boolean, points: number, reason: string): void {
  if (condition && points !== 0) out.push({ points, reason });
}

// ─── Catalog ────────────────────────────────────────────

/** Declaration order is the tie-break order */
export const STRUCTURE_CATALOG: readonly CatalogEntry[] = [
  {
    id: "bull_put_spread",
    label: "Bull Put Spread",
    score: (f, cfg) => {
      const w = cfg.weights.bullPutSpread;
      const out: Contribution[] = [];
      award(out, f.ivRank > cfg.highIvRank, w.highIv, `IV rank ${fmtIv(f.ivRank)} > ${cfg.highIvRank}`);
      award(out, f.skew > cfg.highSkew, w.steepSkew, `skew ${fmtSkew(f.skew)} > ${cfg.highSkew}`);
      award(out, f.contango > cfg.steepContango, w.contango, `contango ${fmtSkew(f.contango)} > ${cfg.steepContango}`);
      return out;
    },
  },
  {
    id: "long_call",
    label: "Long Call",
    score: (f, cfg) => {
      const w = cfg.weights.longCall;
      const out: Contribution[] = [];
      award(out, f.ivRank < cfg.lowIvRank, w.lowIv, `IV rank ${fmtIv(f.ivRank)} < ${cfg.lowIvRank}`);
      award(out, f.coreCount >= cfg.strongSignalMin, w.strongSignal, `${f.coreCount} core signals`);
      award(out, f.contango < cfg.flatContango, w.flatContango, `contango ${fmtSkew(f.contango)} < ${cfg.flatContango}`);
      return out;
    },
  },
  {
    id: "call_debit_spread",
    label: "Call Debit Spread",
    score: (f, cfg) => {
      const w = cfg.weights.callDebitSpread;
      const out: Contribution[] = [];
      award(out, true, w.base, "balanced baseline");
      award(
        out,
        f.ivRank >= cfg.lowIvRank && f.ivRank <= cfg.highIvRank,
        w.midIv,
        `IV rank ${fmtIv(f.ivRank)} within ${cfg.lowIvRank}-${cfg.highIvRank}`
      );
      award(
        out,
        f.skew >= cfg.mildSkew && f.skew <= cfg.highSkew,
        w.moderateSkew,
        `skew ${fmtSkew(f.skew)} within ${cfg.mildSkew}-${cfg.highSkew}`
      );
      return out;
    },
  },
  {
    id: "call_ratio_spread",
    label: "Call Ratio Spread",
    score: (f, cfg) => {
      const w = cfg.weights.callRatioSpread;
      const out: Contribution[] = [];
      award(
        out,
        f.coreCount >= cfg.strongSignalMin || f.groupsFiring >= cfg.multiGroupMin,
        w.strongSignal,
        `${f.coreCount} core + ${f.groupsFiring} groups`
      );
      award(out, f.ivRank > cfg.elevatedIvRank, w.elevatedIv, `IV rank ${fmtIv(f.ivRank)} > ${cfg.elevatedIvRank}`);
      award(out, f.skew > cfg.mildSkew, w.skew, `skew ${fmtSkew(f.skew)} > ${cfg.mildSkew}`);
      return out;
    },
  },
  {
    id: "broken_wing_butterfly",
    label: "Broken Wing Butterfly",
    score: (f, cfg) => {
      const w = cfg.weights.brokenWingButterfly;
      const out: Contribution[] = [];
      const extreme =
        f.coreCount >= cfg.extremeSignalMin ||
        (f.coreCount >= cfg.strongSignalMin && f.groupsFiring >= cfg.multiGroupMin);
      award(out, extreme, w.extremeSignal, `${f.coreCount} core + ${f.groupsFiring} groups, pin`);
      award(out, !extreme && f.coreCount >= cfg.strongSignalMin, w.strongSignal, `${f.coreCount} core signals`);
      award(
        out,
        f.ivRank > cfg.pinIvRankLow && f.ivRank < cfg.pinIvRankHigh,
        w.pinIv,
        `IV rank ${fmtIv(f.ivRank)} within ${cfg.pinIvRankLow}-${cfg.pinIvRankHigh}`
      );
      return out;
    },
  },
  {
    id: "put_debit_spread",
    label: "Put Debit Spread",
    score: (f, cfg) => {
      const w = cfg.weights.putDebitSpread;
      const out: Contribution[] = [];
      award(out, f.ivRank > cfg.highIvRank, w.highIv, `IV rank ${fmtIv(f.ivRank)} > ${cfg.highIvRank}`);
      award(out, f.skew > cfg.highSkew, w.steepSkew, `skew ${fmtSkew(f.skew)} > ${cfg.highSkew}`);
      award(out, f.contango < cfg.invertedContango, w.invertedContango, `contango ${fmtSkew(f.contango)} < ${cfg.invertedContango}`);
      return out;
    },
  },
  {
    id: "long_put",
    label: "Long Put",
    score: (f, cfg) => {
      const w = cfg.weights.longPut;
      const out: Contribution[] = [];
      award(out, f.ivRank < cfg.lowIvRank, w.lowIv, `IV rank ${fmtIv(f.ivRank)} < ${cfg.lowIvRank}`);
      award(
        out,
        f.coreCount >= cfg.strongSignalMin || f.groupsFiring >= cfg.multiGroupMin,
        w.strongSignal,
        `${f.coreCount} core + ${f.groupsFiring} groups`
      );
      award(out, f.contango < cfg.invertedContango, w.invertedContango, `contango ${fmtSkew(f.contango)} < ${cfg.invertedContango}`);
      return out;
    },
  },
  {
    id: "bear_call_spread",
    label: "Bear Call Spread",
    score: (f, cfg) => {
      const w = cfg.weights.bearCallSpread;
      const out: Contribution[] = [];
      award(out, f.ivRank > cfg.highIvRank, w.highIv, `IV rank ${fmtIv(f.ivRank)} > ${cfg.highIvRank}`);
      award(out, f.skew > cfg.highSkew, w.steepSkew, `skew ${fmtSkew(f.skew)} > ${cfg.highSkew}`);
      award(out, f.contango < cfg.invertedContango, w.invertedContango, `contango ${fmtSkew(f.contango)} < ${cfg.invertedContango}`);
      return out;
    },
  },
  {
    id: "iron_butterfly",
    label: "Iron Butterfly",
    score: (f, cfg) => {
      const w = cfg.weights.ironButterfly;
      const out: Contribution[] = [];
      award(out, f.ivRank > cfg.highIvRank, w.highIv, `IV rank ${fmtIv(f.ivRank)} > ${cfg.highIvRank}`);
      award(out, Math.abs(f.skew) < cfg.flatSkew, w.flatSkew, `|skew| ${fmtSkew(Math.abs(f.skew))} < ${cfg.flatSkew}`);
      award(out, f.contango > cfg.steepContango, w.contango, `contango ${fmtSkew(f.contango)} > ${cfg.steepContango}`);
      return out;
    },
  },
  {
    id: "short_iron_condor",
    label: "Short Iron Condor",
    score: (f, cfg) => {
      const w = cfg.weights.shortIronCondor;
      const out: Contribution[] = [];
      award(out, f.ivRank > cfg.elevatedIvRank, w.elevatedIv, `IV rank ${fmtIv(f.ivRank)} > ${cfg.elevatedIvRank}`);
      award(out, Math.abs(f.skew) < cfg.highSkew, w.containedSkew, `|skew| ${fmtSkew(Math.abs(f.skew))} < ${cfg.highSkew}`);
      award(out, f.contango > cfg.positiveContango, w.contango, `contango ${fmtSkew(f.contango)} > ${cfg.positiveContango}`);
      // Weak signals suggest a range-bound session
      award(
        out,
        f.coreCount <= cfg.quietCoreMax && f.groupsFiring <= cfg.quietGroupMax,
        w.quietSignals,
        `quiet signals (${f.coreCount} core, ${f.groupsFiring} groups)`
      );
      return out;
    },
  },
];

// ─── Composite bonuses ──────────────────────────────────

/** Per-structure bonus for the composite driving the trade */
export function compositeBonuses(
  composite: CompositeName | null | undefined,
  ivRank: number,
  config: SelectorConfig = DEFAULT_ENGINE_CONFIG.selector
): Partial<Record<StructureId, number>> {
  if (!composite) return {};
  // Vol momentum from a low base favours convexity instead of selling
  if (composite === "VOL_ACCELERATION" && ivRank <= config.elevatedIvRank) {
    return config.volAccelerationLowIvBonuses;
  }
  return config.compositeBonuses[composite] ?? {};
}

// ─── Ranking ────────────────────────────────────────────

/** Extract the scoring inputs from a snapshot */
export function selectionFacts(
  snapshot: MarketSnapshot,
  coreCount: number,
  ivRankOverride?: number,
  context: SelectionContext = {},
  config: SelectorConfig = DEFAULT_ENGINE_CONFIG.selector
): SelectionFacts {
  const ivRank =
    ivRankOverride !== undefined && Number.isFinite(ivRankOverride)
      ? ivRankOverride
      : readField(snapshot, "ivRank1m", config.defaultIvRank);

  return {
    ivRank,
    skew: readField(snapshot, "dlt25Iv30d") - readField(snapshot, "dlt75Iv30d"),
    contango: readField(snapshot, "contango"),
    coreCount,
    groupsFiring: context.groupsFiring ?? 0,
  };
}

/**
 * Rank every catalog structure, best first.
 * Each entry's reason names the conditions that scored it.
 */
export function rankStructures(
  snapshot: MarketSnapshot,
  coreCount: number,
  ivRankOverride?: number,
  context: SelectionContext = {},
  config: SelectorConfig = DEFAULT_ENGINE_CONFIG.selector
): StructureScore[] {
  const facts = selectionFacts(snapshot, coreCount, ivRankOverride, context, config);
  const bonuses = compositeBonuses(context.composite, facts.ivRank, config);

  const scored = STRUCTURE_CATALOG.map((entry) => {
    const contributions = entry.score(facts, config);
    const bonus = bonuses[entry.id] ?? 0;
    if (bonus !== 0 && context.composite) {
      contributions.unshift({ points: bonus, reason: `${context.composite} ${fmtPts(bonus)}` });
    }

    const score = contributions.reduce((sum, c) => sum + c.points, 0);
    const reason =
      contributions.length > 0
        ? contributions.map((c) => c.reason).join("; ")
        : "no qualifying conditions";

    return { structure: entry.id, label: entry.label, score, reason };
  });

  // Array.prototype.sort is stable, so ties keep catalog order
  return scored.sort((a, b) => b.score - a.score);
}

/** The single best structure for current conditions */
export function selectTop(
  snapshot: MarketSnapshot,
  coreCount: number,
  ivRankOverride?: number,
  context: SelectionContext = {},
  config: SelectorConfig = DEFAULT_ENGINE_CONFIG.selector
): StructureScore {
  const [top] = rankStructures(snapshot, coreCount, ivRankOverride, context, config);
  return top;
}
