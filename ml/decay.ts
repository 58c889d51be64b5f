/**
 * Temporal Weighting
 *
 * One convention for every aggregation path:
 *   age    = cutoff - observation date, in whole days (>= 0)
 *   weight = exp(-alpha * age)
 *
 * A match played the day before the cutoff weighs exp(-alpha); one played
 * 30 days earlier weighs exp(-30 * alpha). Weights lie in (0, 1].
 */

import { DEFAULT_ALPHA } from '../src/config.js';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

export function temporalWeight(ageInDays: number, alpha: number = DEFAULT_ALPHA): number {
  if (!Number.isFinite(ageInDays) || ageInDays < 0) {
    throw new RangeError(`Age must be a finite non-negative number of days, got ${ageInDays}`);
  }
  assertAlpha(alpha);
  return Math.exp(-alpha * ageInDays);
}

export function assertAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha <= 0) {
    throw new RangeError(`Decay rate alpha must be a positive number, got ${alpha}`);
  }
}

/**
 * Whole calendar days from `date` to `cutoff` (UTC), negative when the
 * observation is on a later day.
 */
export function ageInDays(date: Date, cutoff: Date): number {
  return Math.round((utcDay(cutoff) - utcDay(date)) / MS_PER_DAY);
}

/** Start of the UTC calendar day, in ms; NaN for an invalid date */
export function utcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function isSameDay(a: Date, b: Date): boolean {
  return utcDay(a) === utcDay(b);
}

/** Strictly earlier calendar day; false for invalid dates */
export function isBeforeDay(date: Date, cutoff: Date): boolean {
  return utcDay(date) < utcDay(cutoff);
}
