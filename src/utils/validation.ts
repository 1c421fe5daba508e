/**
 * Input validation utilities.
 */

import { z } from "zod";
import type { MarketSnapshot } from "../types/market.js";

/** Validate a ticker symbol */
export const SymbolSchema = z
  .string()
  .min(1)
  .max(10)
  .regex(/^[A-Z^.]{1,10}$/, "Symbol must be 1-10 uppercase letters");

/** A provider field that may arrive as a number or a numeric string */
const NumericFieldSchema = z.union([
  z.number(),
  z.string().trim().min(1).pipe(z.coerce.number()),
]);

/**
 * Reduce a raw provider row to a snapshot of finite numeric fields.
 * Non-numeric and non-finite fields are dropped, so they read as 0 later.
 */
export function parseSnapshot(raw: unknown): MarketSnapshot {
  const row = z.record(z.string(), z.unknown()).safeParse(raw);
  if (!row.success) return {};

  const snapshot: Record<string, number> = {};
  for (const [key, value] of Object.entries(row.data)) {
    const parsed = NumericFieldSchema.safeParse(value);
    if (parsed.success && Number.isFinite(parsed.data)) {
      snapshot[key] = parsed.data;
    }
  }
  return snapshot;
}

/** Read a snapshot field, falling back when it is absent or non-finite */
export function readField(
  snapshot: MarketSnapshot | undefined,
  key: string,
  fallback: number = 0
): number {
  const v = snapshot?.[key];
  if (v === null || v === undefined || !Number.isFinite(v)) return fallback;
  return v;
}

/** Generate a unique correlation ID for decision tracking */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}
