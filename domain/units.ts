/**
 * Move units. Sub-day units and "days" are business-aware; calendar units
 * pass through to the date-time library.
 */

import { businessDaySpan, type BusinessWindowConfig } from "./businessWindow.js";
import {
  NANOS_PER_HOUR,
  NANOS_PER_MICROSECOND,
  NANOS_PER_MILLISECOND,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
} from "./timeOfDay.js";
import { neverReached } from "./validation.js";

export type BusinessUnit =
  | "nanoseconds"
  | "microseconds"
  | "milliseconds"
  | "seconds"
  | "minutes"
  | "hours"
  | "days";

export type CalendarUnit = "weeks" | "months" | "quarters" | "years";

export type MoveUnit = BusinessUnit | CalendarUnit;

const CALENDAR_UNITS: ReadonlySet<string> = new Set<CalendarUnit>(["weeks", "months", "quarters", "years"]);

export function isCalendarUnit(unit: MoveUnit): unit is CalendarUnit {
  return CALENDAR_UNITS.has(unit);
}

/** Ticks (nanos) per unit. A day is one business day: dayEnd - dayStart. */
export function ticksPerUnit(unit: BusinessUnit, window: BusinessWindowConfig): bigint {
  switch (unit) {
    case "nanoseconds":
      return 1n;
    case "microseconds":
      return NANOS_PER_MICROSECOND;
    case "milliseconds":
      return NANOS_PER_MILLISECOND;
    case "seconds":
      return NANOS_PER_SECOND;
    case "minutes":
      return NANOS_PER_MINUTE;
    case "hours":
      return NANOS_PER_HOUR;
    case "days":
      return businessDaySpan(window);
    default:
      return neverReached(unit, `Unknown unit ${String(unit)}`);
  }
}
