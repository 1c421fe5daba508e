/**
 * Signal Report — plain-text explanation of a decision
 *
 * Renders the full signal table plus the verdict, sizing and best
 * structure, so an operator can see which readings drove the call.
 */

import type {
  CalendarContext,
  CompositeResult,
  RiskBudgetResult,
  SignalKey,
  SignalLevel,
  SignalRecord,
  SignalSet,
  StructureScore,
} from "../types/signals.js";
import { SIGNAL_ORDER, signalsInGroup } from "../quant/signals.js";

/** The parts of a decision the report reads */
export interface ReportInput {
  symbol: string;
  signals: SignalSet;
  calendar: CalendarContext;
  composite: CompositeResult;
  budget: RiskBudgetResult | null;
  structures: readonly StructureScore[];
}

const PERCENT_KEYS: ReadonlySet<SignalKey> = new Set<SignalKey>([
  "skew_25d_rr",
  "credit_spread",
  "fwd_kink",
]);

const STATUS: Record<SignalLevel, string> = {
  ACTION: "! ACTION",
  WARNING: "* WARNING",
  INFO: "i INFO",
  OK: "  OK",
};

const pct = (v: number) => `${v >= 0 ? "+" : ""}${(v * 100).toFixed(1)}%`;
const signed = (v: number) => `${v >= 0 ? "+" : ""}${v.toFixed(4)}`;
const usd = (v: number) =>
  `$${v.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

function formatValue(record: SignalRecord): string {
  if (record.key === "rip") return record.value.toFixed(1);
  if (PERCENT_KEYS.has(record.key)) return pct(record.value);
  return record.value.toFixed(4);
}

function formatReference(record: SignalRecord): string {
  const ref = record.baseline ?? record.previousValue;
  if (ref === undefined) return "";
  return PERCENT_KEYS.has(record.key) ? pct(ref) : ref.toFixed(4);
}

function formatChange(record: SignalRecord): string {
  if (record.change === undefined) return "";
  // contango's change is relative to its baseline
  if (record.key === "contango" || PERCENT_KEYS.has(record.key)) return pct(record.change);
  return signed(record.change);
}

/** One fixed-width table row */
export function formatSignalRow(record: SignalRecord): string {
  return [
    record.label.padEnd(24),
    formatValue(record).padStart(9),
    formatReference(record).padStart(10),
    formatChange(record).padStart(9),
    ` ${STATUS[record.level]}`,
  ].join(" ");
}

/** One-line summary of a decision, for logs and alerts */
export function summarizeDecision(input: ReportInput): string {
  const { symbol, composite, budget, structures } = input;
  if (composite.name === null) {
    return `${symbol}: no composite (${composite.tier1Firing.length} tier-1 firing, ${input.calendar.label})`;
  }
  const top = structures[0];
  const sizing = budget ? ` risk ${usd(budget.riskBudget)}` : "";
  const structure = top ? ` via ${top.label}` : "";
  return `${symbol}: ${composite.name} [${composite.rule ?? "-"}]${sizing}${structure}`;
}

/**
 * Full multi-line report: header, signal table, verdict block.
 */
export function formatSignalReport(input: ReportInput): string[] {
  const { symbol, signals, calendar, composite, budget, structures } = input;
  const lines: string[] = [];

  lines.push(`${symbol} ${calendar.date} [${calendar.label} x${calendar.modifier.toFixed(2)}]`);
  lines.push(
    [
      "SIGNAL".padEnd(24),
      "VALUE".padStart(9),
      "REFERENCE".padStart(10),
      "CHANGE".padStart(9),
      " STATUS",
    ].join(" ")
  );
  for (const key of SIGNAL_ORDER) {
    lines.push(formatSignalRow(signals[key]));
  }

  const core = signalsInGroup("core").filter((k) => signals[k].level === "ACTION");
  const { counts } = composite;
  lines.push(
    `Core ${counts.core}/5 | wing ${counts.wing} | funding ${counts.funding} | momentum ${counts.momentum} | groups ${counts.groupsFiring}`
  );
  if (core.length > 0) lines.push(`Core firing: ${core.join(", ")}`);

  if (composite.name === null) {
    lines.push("No composite verdict");
    return lines;
  }

  lines.push(`>>> ${composite.name} <<<`);
  if (budget) {
    lines.push(
      `Risk budget ${usd(budget.riskBudget)} (x${budget.multiplier.toFixed(2)}, ${budget.strength}, cap ${usd(budget.maxRisk)})`
    );
  }
  const top = structures[0];
  if (top) lines.push(`Structure: ${top.label} (${top.score}) ${top.reason}`);

  return lines;
}
