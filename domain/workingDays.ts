/**
 * Domain working days: business-day resolver.
 * Built explicitly from a holiday set and a working week. No registry.
 */

import { MAX_SHIFT_DAYS, type DateOnly, type WorkingWeek } from "./core.js";
import { addCalendarDays, isoWeekday } from "./dates.js";
import { OutOfRangeError, ValidationError } from "./errors.js";

/** Capability the move engine consumes. Implementations must be side-effect free. */
export interface BusinessDayResolver {
  /** Not a holiday and the weekday is in the working week. */
  isBusinessDay(date: DateOnly): boolean;
  /**
   * Business day `n` business days away. The start date is first rolled
   * forward to a business day, so n=0 returns date (or the next business day).
   */
  shiftBusinessDays(date: DateOnly, n: number): DateOnly;
}

export interface WorkingDayConfig {
  readonly holidays: ReadonlySet<DateOnly>;
  readonly workingWeek: WorkingWeek;
}

export function createBusinessDayResolver(config: WorkingDayConfig): BusinessDayResolver {
  const { holidays, workingWeek } = config;
  if (workingWeek.size === 0) {
    throw new ValidationError("Working week must contain at least one weekday");
  }
  const daysPerWeek = workingWeek.size;
  const sortedHolidays = [...holidays].sort();

  function isBusinessDay(date: DateOnly): boolean {
    if (holidays.has(date)) return false;
    return workingWeek.has(isoWeekday(date));
  }

  /** Holidays on working weekdays within (fromExclusive, toInclusive]. */
  function holidaysOnWorkdays(fromExclusive: DateOnly, toInclusive: DateOnly): number {
    let n = 0;
    for (const h of sortedHolidays) {
      if (h <= fromExclusive) continue;
      if (h > toInclusive) break;
      if (workingWeek.has(isoWeekday(h))) n++;
    }
    return n;
  }

  function shiftBusinessDays(date: DateOnly, n: number): DateOnly {
    if (!Number.isSafeInteger(n)) {
      throw new ValidationError("Business day shift must be an integer", { n });
    }
    if (Math.abs(n) > MAX_SHIFT_DAYS) {
      throw new OutOfRangeError(`Business day shift exceeds ${MAX_SHIFT_DAYS} days`, { date, n });
    }
    let d = nextBusinessDay(date, { isBusinessDay });
    const step = n < 0 ? -1 : 1;
    let remaining = Math.abs(n);

    while (remaining > 0) {
      // Every 7 consecutive days hold exactly daysPerWeek working weekdays.
      // Keep at least one step for the walk so d ends on a business day.
      const weeks = Math.floor((remaining - 1) / daysPerWeek);
      if (weeks > 0) {
        const target = addCalendarDays(d, step * weeks * 7);
        const skipped =
          step > 0
            ? holidaysOnWorkdays(d, target)
            : holidaysOnWorkdays(addCalendarDays(target, -1), addCalendarDays(d, -1));
        remaining -= weeks * daysPerWeek - skipped;
        d = target;
        continue;
      }
      d = addCalendarDays(d, step);
      if (isBusinessDay(d)) remaining--;
    }
    return d;
  }

  return { isBusinessDay, shiftBusinessDays };
}

type BusinessDayCheck = Pick<BusinessDayResolver, "isBusinessDay">;

/** Business day on or after date. */
export function nextBusinessDay(date: DateOnly, resolver: BusinessDayCheck): DateOnly {
  let d = date;
  while (!resolver.isBusinessDay(d)) d = addCalendarDays(d, 1);
  return d;
}

/** Business day on or before date. */
export function previousBusinessDay(date: DateOnly, resolver: BusinessDayCheck): DateOnly {
  let d = date;
  while (!resolver.isBusinessDay(d)) d = addCalendarDays(d, -1);
  return d;
}

/** Business days in (from, to]. Sign-aware: to < from → negative. */
export function countBusinessDays(
  from: DateOnly,
  to: DateOnly,
  resolver: BusinessDayCheck
): number {
  if (to < from) return -countBusinessDays(to, from, resolver);
  let count = 0;
  let d = from;
  while (d < to) {
    d = addCalendarDays(d, 1);
    if (resolver.isBusinessDay(d)) count++;
  }
  return count;
}
