/**
 * Per-symbol reference snapshots (session baseline + prior day).
 *
 * Owned by whoever drives the poll loop: it sets the baseline once per
 * session and the prior day once per day. The signal calculator only reads.
 */

import type { MarketSnapshot, ReferenceState } from "../types/market.js";
import { agentLogger } from "../utils/logger.js";

const log = agentLogger("reference-state");

function freeze(snapshot: MarketSnapshot): MarketSnapshot {
  return Object.freeze({ ...snapshot });
}

export class ReferenceStore {
  private states: Map<string, ReferenceState> = new Map();

  /** Reference pair for a symbol; empty when nothing has been set */
  get(symbol: string): ReferenceState {
    return this.states.get(symbol) ?? {};
  }

  has(symbol: string): boolean {
    return this.states.get(symbol)?.baseline !== undefined;
  }

  /** Reset the session baseline */
  setBaseline(symbol: string, snapshot: MarketSnapshot): void {
    this.states.set(symbol, { ...this.get(symbol), baseline: freeze(snapshot) });
    log.info(`Baseline set: ${symbol}`);
  }

  /** Reset the prior-day snapshot */
  setPreviousDay(symbol: string, snapshot: MarketSnapshot): void {
    this.states.set(symbol, { ...this.get(symbol), previousDay: freeze(snapshot) });
    log.info(`Previous day set: ${symbol}`);
  }

  /**
   * Use the first snapshot seen in a session as the baseline, so the
   * first tick never reads as a shift from zero.
   * Returns true when a baseline was set by this call.
   */
  ensureBaseline(symbol: string, snapshot: MarketSnapshot): boolean {
    if (this.has(symbol)) return false;
    this.setBaseline(symbol, snapshot);
    return true;
  }

  /** Drop one symbol's references, or all of them */
  clear(symbol?: string): void {
    if (symbol === undefined) {
      this.states.clear();
    } else {
      this.states.delete(symbol);
    }
  }

  symbols(): string[] {
    return [...this.states.keys()];
  }
}
