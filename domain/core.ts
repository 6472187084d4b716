/**
 * Domain core: structural primitives and limits.
 * Framework-independent. No business assumptions.
 */

/** Date-only string (YYYY-MM-DD). Compared by calendar date only. */
export type DateOnly = string;

/** ISO weekday: 1 = Monday … 7 = Sunday. */
export type IsoWeekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/** Working week: the ISO weekdays that may be business days. */
export type WorkingWeek = ReadonlySet<IsoWeekday>;

/**
 * Nanoseconds since local midnight. The single sub-day tick of the engine;
 * larger units are multiples of it.
 */
export type NanoOfDay = bigint;

/** A calendar date plus a time of day, before or after normalization. */
export interface BusinessPosition {
  readonly date: DateOnly;
  readonly offsetOfDay: NanoOfDay;
}

// --- Limits ---

/** Largest business-day shift handed to the resolver (signed 32-bit). */
export const MAX_SHIFT_DAYS = 2_147_483_647;

/** Largest tick count a single move may carry (signed 64-bit). */
export const MAX_MOVE_TICKS = 2n ** 63n - 1n;

export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

export function isIsoWeekday(n: number): n is IsoWeekday {
  return Number.isInteger(n) && n >= 1 && n <= 7;
}
