/**
 * ╔══════════════════════════════════════════════════════════════╗
 * ║  Vol Signal Engine — Entry Point                             ║
 * ║                                                              ║
 * ║  Vol-surface fear signals, calendar overlay, composite       ║
 * ║  verdicts, risk budgeting and trade-structure ranking.       ║
 * ╚══════════════════════════════════════════════════════════════╝
 */

export * from "./quant/index.js";
export * from "./types/market.js";
export * from "./types/signals.js";

export {
  SignalMonitor,
  type Decision,
  type PollTick,
  type SignalMonitorEvents,
  type SignalMonitorOptions,
} from "./agents/signal-monitor.js";
export {
  formatSignalReport,
  formatSignalRow,
  summarizeDecision,
  type ReportInput,
} from "./xai/signal-report.js";

export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_FOMC_DATES,
  EngineConfigSchema,
  loadEngineConfig,
  parseEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from "./config/engine.js";
export { loadConfig, type Config } from "./config/index.js";
export { parseSnapshot, readField, SymbolSchema } from "./utils/validation.js";
export { agentLogger, logger } from "./utils/logger.js";
