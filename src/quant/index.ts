/**
 * Signal engine — barrel export
 */

export * from "./calendar-overlay.js";
export * from "./signals.js";
export * from "./reference-state.js";
export * from "./composite.js";
export * from "./risk-budget.js";
export * from "./structure-selector.js";
