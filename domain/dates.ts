/**
 * domain/dates.ts
 * Date-only (YYYY-MM-DD) helpers. Gregorian, years 0001–9999.
 *
 * Arithmetic runs on UTC noon so no zone or DST can move the date.
 */

import { MAX_YEAR, MIN_YEAR, type DateOnly, type IsoWeekday } from "./core.js";
import { OutOfRangeError, ValidationError } from "./errors.js";

const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function formatDateOnly(y: number, m: number, d: number): DateOnly {
  return `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
}

function utcNoon(y: number, m: number, d: number): Date {
  const dt = new Date(Date.UTC(2000, 0, 1, 12, 0, 0));
  // Date.UTC maps years 0–99 onto 1900–1999; setUTCFullYear does not
  dt.setUTCFullYear(y, m - 1, d);
  return dt;
}

/** True for an existing calendar date written as YYYY-MM-DD. */
export function isDateOnly(value: unknown): value is DateOnly {
  if (typeof value !== "string") return false;
  const match = DATE_ONLY_PATTERN.exec(value);
  if (!match) return false;
  const y = Number(match[1]);
  const m = Number(match[2]);
  const d = Number(match[3]);
  if (y < MIN_YEAR || y > MAX_YEAR || m < 1 || m > 12 || d < 1) return false;
  const dt = utcNoon(y, m, d);
  return dt.getUTCMonth() === m - 1 && dt.getUTCDate() === d;
}

export function parseDateOnly(date: DateOnly): { y: number; m: number; d: number } {
  if (!isDateOnly(date)) {
    throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`, { date });
  }
  const [ys, ms, ds] = date.split("-");
  return { y: Number(ys), m: Number(ms), d: Number(ds) };
}

export function addCalendarDays(date: DateOnly, days: number): DateOnly {
  const { y, m, d } = parseDateOnly(date);
  const dt = utcNoon(y, m, d);
  dt.setUTCDate(dt.getUTCDate() + days);
  const year = dt.getUTCFullYear();
  if (Number.isNaN(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new OutOfRangeError(`Date ${date} shifted by ${days} days leaves years ${MIN_YEAR}–${MAX_YEAR}`, {
      date,
      days,
    });
  }
  return formatDateOnly(year, dt.getUTCMonth() + 1, dt.getUTCDate());
}

/** ISO weekday 1–7 (Mon=1, Sun=7). */
export function isoWeekday(date: DateOnly): IsoWeekday {
  const { y, m, d } = parseDateOnly(date);
  switch (utcNoon(y, m, d).getUTCDay()) {
    case 0:
      return 7;
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    default:
      return 6;
  }
}
