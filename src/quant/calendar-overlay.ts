/**
 * Calendar Overlay
 *
 * Turns a calendar date into a sizing modifier:
 *   - FOMC blackout: no new risk around policy decisions
 *   - VIX expiration: discount when vol settlement is near but OpEx is not
 *   - Monthly OpEx: amplify around the 3rd-Friday expiration
 *
 * All arithmetic is on UTC calendar days; no market data is involved.
 */

import type { CalendarContext } from "../types/signals.js";
import { DEFAULT_ENGINE_CONFIG, type CalendarConfig } from "../config/engine.js";

const MS_PER_DAY = 86_400_000;
const FRIDAY = 5;
const WEDNESDAY = 3;

/** Whole days since the epoch for a UTC calendar date */
function dayNumber(d: Date): number {
  return Math.floor(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()) / MS_PER_DAY);
}

/**
 * Normalize input to a UTC midnight Date.
 * Strings are read as YYYY-MM-DD calendar days; an unparseable value yields
 * an invalid Date, which the overlay treats as a normal day.
 */
export function toCalendarDay(date: Date | string): Date {
  if (typeof date === "string") {
    const m = /^(\d{4})-(\d{2})-(\d{2})/.exec(date.trim());
    if (!m) return new Date(Number.NaN);
    return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  }
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Format a calendar day as YYYY-MM-DD */
export function formatCalendarDay(d: Date): string {
  return Number.isNaN(d.getTime()) ? "invalid" : d.toISOString().slice(0, 10);
}

/** nth occurrence of a weekday (0 = Sunday) in d's month */
function nthWeekday(d: Date, weekday: number, n: number): Date {
  const first = new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1));
  const offset = (weekday - first.getUTCDay() + 7) % 7;
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1 + offset + (n - 1) * 7));
}

/** Monthly options expiration: 3rd Friday of d's month */
export function monthlyOpex(date: Date | string): Date {
  return nthWeekday(toCalendarDay(date), FRIDAY, 3);
}

/** VIX settlement date: 3rd Wednesday of d's month */
export function vixExpiration(date: Date | string): Date {
  return nthWeekday(toCalendarDay(date), WEDNESDAY, 3);
}

/** Absolute distance in calendar days */
export function daysBetween(a: Date, b: Date): number {
  return Math.abs(dayNumber(a) - dayNumber(b));
}

/** True when d is within windowDays of any listed FOMC date */
export function isFomcBlackout(
  date: Date | string,
  fomcDates: readonly string[],
  windowDays: number = 1
): boolean {
  const day = toCalendarDay(date);
  if (Number.isNaN(day.getTime())) return false;
  return fomcDates.some((f) => {
    const meeting = toCalendarDay(f);
    return !Number.isNaN(meeting.getTime()) && daysBetween(day, meeting) <= windowDays;
  });
}

/**
 * Compute the calendar overlay for a date.
 * Priority: FOMC blackout → VIX discount (only outside the OpEx window)
 * → OpEx amplifier → normal.
 */
export function computeOverlay(
  date: Date | string,
  config: CalendarConfig = DEFAULT_ENGINE_CONFIG.calendar
): CalendarContext {
  const day = toCalendarDay(date);
  const isoDay = formatCalendarDay(day);

  if (Number.isNaN(day.getTime())) {
    return {
      date: isoDay,
      opexAmplifier: false,
      vixpirationDiscount: false,
      fomcBlackout: false,
      modifier: config.normalModifier,
      label: "NORMAL",
    };
  }

  const fomcBlackout = isFomcBlackout(day, config.fomcDates, config.fomcWindowDays);
  const vixpirationDiscount = daysBetween(day, vixExpiration(day)) <= config.vixWindowDays;
  const opexAmplifier = daysBetween(day, monthlyOpex(day)) <= config.opexWindowDays;

  const flags = { date: isoDay, opexAmplifier, vixpirationDiscount, fomcBlackout };

  if (fomcBlackout) {
    return { ...flags, modifier: config.fomcModifier, label: "FOMC_BLACKOUT" };
  }
  if (vixpirationDiscount && !opexAmplifier) {
    return { ...flags, modifier: config.vixDiscountModifier, label: "VIXPIRATION_DISCOUNT" };
  }
  if (opexAmplifier) {
    return { ...flags, modifier: config.opexModifier, label: "OPEX_AMPLIFIER" };
  }
  return { ...flags, modifier: config.normalModifier, label: "NORMAL" };
}
