/**
 * Signal Report Tests
 */

import { describe, it, expect } from "vitest";
import {
  formatSignalReport,
  formatSignalRow,
  summarizeDecision,
  type ReportInput,
} from "../../src/xai/signal-report.js";
import { evaluateSignals } from "../../src/quant/signals.js";
import { classify } from "../../src/quant/composite.js";
import { computeBudget } from "../../src/quant/risk-budget.js";
import { computeOverlay } from "../../src/quant/calendar-overlay.js";
import { CALM, FEAR } from "../helpers/snapshots.js";

function fearReport(): ReportInput {
  const signals = evaluateSignals(FEAR, { baseline: CALM });
  const calendar = computeOverlay("2026-10-05");
  const composite = classify(signals, calendar);
  const budget = computeBudget({ coreCount: composite.counts.core, composite: composite.name });
  return {
    symbol: "SPX",
    signals,
    calendar,
    composite,
    budget,
    structures: [{ structure: "long_call", label: "Long Call", score: 3, reason: "IV rank 20 < 30" }],
  };
}

describe("formatSignalRow", () => {
  it("should render value, reference, change and status columns", () => {
    const { signals } = fearReport();

    expect(formatSignalRow(signals.skewing)).toBe(
      ["Skewing".padEnd(24), "   0.0800", " ".repeat(10), " ".repeat(9), " ! ACTION"].join(" ")
    );
    expect(formatSignalRow(signals.skew_25d_rr)).toBe(
      ["Skew (25d RR)".padEnd(24), "    +5.0%", "     +1.0%", "    +4.0%", " ! ACTION"].join(" ")
    );
    expect(formatSignalRow(signals.contango)).toBe(
      ["Contango".padEnd(24), "  -0.0100", "    0.1000", "  -110.0%", " ! ACTION"].join(" ")
    );
  });

  it("should show risk premium with one decimal", () => {
    const { signals } = fearReport();
    expect(formatSignalRow(signals.rip).slice(25, 34)).toBe("     80.0");
  });
});

describe("summarizeDecision", () => {
  it("should name the verdict, rule, budget and structure", () => {
    expect(summarizeDecision(fearReport())).toBe(
      "SPX: FEAR_BOUNCE_STRONG [core_strong] risk $7,500.00 via Long Call"
    );
  });

  it("should explain a quiet tick", () => {
    const signals = evaluateSignals(CALM);
    const calendar = computeOverlay("2026-10-05");
    const input: ReportInput = {
      symbol: "SPY",
      signals,
      calendar,
      composite: classify(signals, calendar),
      budget: null,
      structures: [],
    };
    expect(summarizeDecision(input)).toBe("SPY: no composite (0 tier-1 firing, NORMAL)");
  });
});

describe("formatSignalReport", () => {
  it("should list every signal between header and verdict", () => {
    const lines = formatSignalReport(fearReport());

    expect(lines[0]).toBe("SPX 2026-10-05 [NORMAL x1.00]");
    expect(lines).toHaveLength(2 + 19 + 5);
    expect(lines[21]).toBe("Core 4/5 | wing 0 | funding 0 | momentum 0 | groups 1");
    expect(lines[22]).toBe("Core firing: skewing, rip, skew_25d_rr, contango");
    expect(lines[23]).toBe(">>> FEAR_BOUNCE_STRONG <<<");
    expect(lines[24]).toBe("Risk budget $7,500.00 (x1.50, VERY_STRONG, cap $12,500.00)");
    expect(lines[25]).toBe("Structure: Long Call (3) IV rank 20 < 30");
  });

  it("should end with no verdict on a quiet tick", () => {
    const signals = evaluateSignals(CALM);
    const calendar = computeOverlay("2026-10-05");
    const lines = formatSignalReport({
      symbol: "SPY",
      signals,
      calendar,
      composite: classify(signals, calendar),
      budget: null,
      structures: [],
    });
    expect(lines[lines.length - 1]).toBe("No composite verdict");
    expect(lines).toHaveLength(2 + 19 + 2);
  });
});
