/**
 * Signal Monitor — per-tick decision pipeline
 *
 * Wires the engine for one poll tick:
 *   1. Signals from the snapshot against the symbol's reference pair
 *   2. Calendar overlay for the tick's date
 *   3. Composite verdict + group counts
 *   4. Risk budget (only when a verdict fires)
 *   5. Ranked trade structures
 *
 * Emits typed events for alerting and persistence collaborators. Data
 * fetching, order building and notification delivery live elsewhere.
 */

import { EventEmitter } from "eventemitter3";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config/engine.js";
import type { Config } from "../config/index.js";
import type { CreditQuad, MarketSnapshot } from "../types/market.js";
import type {
  CalendarContext,
  CompositeResult,
  RiskBudgetResult,
  SignalKey,
  SignalSet,
  StructureScore,
} from "../types/signals.js";
import { computeOverlay } from "../quant/calendar-overlay.js";
import { SignalCalculator, SIGNAL_ORDER } from "../quant/signals.js";
import { ReferenceStore } from "../quant/reference-state.js";
import { classify } from "../quant/composite.js";
import { computeBudget } from "../quant/risk-budget.js";
import { rankStructures } from "../quant/structure-selector.js";
import { formatSignalReport, summarizeDecision } from "../xai/signal-report.js";
import { agentLogger } from "../utils/logger.js";
import { generateId, SymbolSchema } from "../utils/validation.js";

const log = agentLogger("signal-monitor");

/** One symbol's inputs for one poll tick, pre-fetched by the caller */
export interface PollTick {
  symbol: string;
  snapshot: MarketSnapshot;
  date: Date | string;
  credit?: CreditQuad;
  /** Read the verdict as an intraday bearish lead */
  intraday?: boolean;
  ivRank?: number;
  capital?: number;
}

export interface Decision {
  id: string;
  symbol: string;
  timestamp: Date;
  signals: SignalSet;
  calendar: CalendarContext;
  composite: CompositeResult;
  /** Null unless a composite verdict fired */
  budget: RiskBudgetResult | null;
  structures: StructureScore[];
  /** This tick's snapshot became the session baseline */
  baselineSet: boolean;
}

export interface SignalMonitorEvents {
  decision: (decision: Decision) => void;
  action: (decision: Decision) => void;
  warning: (decision: Decision, warnings: SignalKey[]) => void;
  blackout: (decision: Decision) => void;
}

export interface SignalMonitorOptions {
  engine?: EngineConfig;
  references?: ReferenceStore;
  /** Symbols evaluateAll processes; every symbol when unset */
  symbols?: readonly string[];
  /** Use the first snapshot seen per symbol as its baseline (default true) */
  autoBaseline?: boolean;
}

export class SignalMonitor extends EventEmitter<SignalMonitorEvents> {
  readonly references: ReferenceStore;

  private readonly engine: EngineConfig;
  private readonly calculator: SignalCalculator;
  private readonly autoBaseline: boolean;
  private readonly symbols: ReadonlySet<string> | null;

  constructor(options: SignalMonitorOptions = {}) {
    super();
    this.engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
    this.references = options.references ?? new ReferenceStore();
    this.autoBaseline = options.autoBaseline ?? true;
    this.symbols = options.symbols ? new Set(options.symbols) : null;
    this.calculator = new SignalCalculator(this.references, this.engine.signals);
  }

  /** Monitor wired from process config (engine tables + watched symbols) */
  static fromConfig(config: Config, references?: ReferenceStore): SignalMonitor {
    return new SignalMonitor({ engine: config.engine, symbols: config.symbols, references });
  }

  /** True when evaluateAll processes this symbol */
  watches(symbol: string): boolean {
    return this.symbols === null || this.symbols.has(symbol);
  }

  /** Start of session: reset the symbol's baseline */
  startSession(symbol: string, snapshot: MarketSnapshot): void {
    this.references.setBaseline(symbol, snapshot);
  }

  /** New trading day: record the prior day's closing snapshot */
  rollDay(symbol: string, previousDay: MarketSnapshot): void {
    this.references.setPreviousDay(symbol, previousDay);
  }

  /**
   * Evaluate one tick end to end.
   * Never throws for bad market data; listener failures are logged.
   * A malformed symbol is a caller error and throws.
   */
  evaluate(tick: PollTick): Decision {
    const parsed = SymbolSchema.safeParse(tick.symbol);
    if (!parsed.success) {
      throw new Error(
        `Invalid symbol "${tick.symbol}": ${parsed.error.issues.map((i) => i.message).join("; ")}`
      );
    }
    const symbol = parsed.data;
    const { snapshot } = tick;
    const baselineSet = this.autoBaseline && this.references.ensureBaseline(symbol, snapshot);

    const signals = this.calculator.computeSignals(symbol, snapshot, tick.credit);
    const calendar = computeOverlay(tick.date, this.engine.calendar);
    const composite = classify(signals, calendar, tick.intraday ?? false, this.engine.composite);
    const { counts } = composite;

    const budget =
      composite.name !== null
        ? computeBudget(
            {
              coreCount: counts.core,
              composite: composite.name,
              groupsFiring: counts.groupsFiring,
              wingCount: counts.wing,
              fundCount: counts.funding,
              momCount: counts.momentum,
              capitalOverride: tick.capital,
              calendarModifier: calendar.modifier,
            },
            this.engine.sizing
          )
        : null;

    const structures = rankStructures(
      snapshot,
      counts.core,
      tick.ivRank,
      { composite: composite.name, groupsFiring: counts.groupsFiring },
      this.engine.selector
    );

    const decision: Decision = {
      id: generateId(),
      symbol,
      timestamp: new Date(),
      signals,
      calendar,
      composite,
      budget,
      structures,
      baselineSet,
    };

    this.publish(decision);
    return decision;
  }

  /** Evaluate one poll round, skipping symbols this monitor does not watch */
  evaluateAll(ticks: readonly PollTick[]): Decision[] {
    const decisions: Decision[] = [];
    for (const tick of ticks) {
      if (!this.watches(tick.symbol)) {
        log.debug(`Skipping unwatched symbol ${tick.symbol}`);
        continue;
      }
      decisions.push(this.evaluate(tick));
    }
    return decisions;
  }

  private publish(decision: Decision): void {
    log.debug(formatSignalReport(decision).join("\n"));

    this.safeEmit("decision", () => this.emit("decision", decision));

    if (decision.calendar.fomcBlackout && decision.composite.tier1Firing.length > 0) {
      log.info(`${decision.symbol}: FOMC blackout, ${decision.composite.tier1Firing.length} tier-1 suppressed`);
      this.safeEmit("blackout", () => this.emit("blackout", decision));
    }

    if (decision.composite.name !== null) {
      log.info(summarizeDecision(decision));
      this.safeEmit("action", () => this.emit("action", decision));
    }

    const warnings = SIGNAL_ORDER.filter((k) => decision.signals[k].level === "WARNING");
    if (warnings.length > 0) {
      log.info(`${decision.symbol}: ${warnings.length} warning(s): ${warnings.join(", ")}`);
      this.safeEmit("warning", () => this.emit("warning", decision, warnings));
    }
  }

  private safeEmit(event: keyof SignalMonitorEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      log.error(`Listener for "${event}" failed`, { error: String(err) });
    }
  }
}
