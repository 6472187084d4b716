/**
 * Time of day as nanoseconds since midnight.
 * No zone, no date. Values are always within one calendar day.
 */

import type { NanoOfDay } from "./core.js";
import { ValidationError } from "./errors.js";

export const NANOS_PER_MICROSECOND = 1_000n;
export const NANOS_PER_MILLISECOND = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
export const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE;
export const NANOS_PER_DAY = 24n * NANOS_PER_HOUR;

// HH:mm, HH:mm:ss or HH:mm:ss.f…f (1–9 fraction digits)
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;

export interface TimeParts {
  readonly hour: number;
  readonly minute: number;
  readonly second?: number;
  readonly nanosecond?: number;
}

export function isNanoOfDay(value: bigint): boolean {
  return value >= 0n && value < NANOS_PER_DAY;
}

export function timeOfDayFromParts(parts: TimeParts): NanoOfDay {
  const { hour, minute, second = 0, nanosecond = 0 } = parts;
  const inRange =
    Number.isInteger(hour) && hour >= 0 && hour <= 23 &&
    Number.isInteger(minute) && minute >= 0 && minute <= 59 &&
    Number.isInteger(second) && second >= 0 && second <= 59 &&
    Number.isInteger(nanosecond) && nanosecond >= 0 && nanosecond <= 999_999_999;
  if (!inRange) {
    throw new ValidationError("Time of day out of range", { hour, minute, second, nanosecond });
  }
  return (
    BigInt(hour) * NANOS_PER_HOUR +
    BigInt(minute) * NANOS_PER_MINUTE +
    BigInt(second) * NANOS_PER_SECOND +
    BigInt(nanosecond)
  );
}

/** Parse "HH:mm[:ss[.fraction]]" into nanoseconds of day. */
export function parseTimeOfDay(text: string): NanoOfDay {
  const match = TIME_PATTERN.exec(text.trim());
  if (!match) {
    throw new ValidationError(`Invalid time of day "${text}", expected HH:mm[:ss[.fraction]]`, { text });
  }
  const fraction = match[4] ?? "";
  return timeOfDayFromParts({
    hour: Number(match[1]),
    minute: Number(match[2]),
    second: Number(match[3] ?? "0"),
    nanosecond: Number(fraction.padEnd(9, "0")),
  });
}

export function splitTimeOfDay(nanos: NanoOfDay): Required<TimeParts> {
  if (!isNanoOfDay(nanos)) {
    throw new ValidationError("Nanos of day must be within one calendar day", { nanos: nanos.toString() });
  }
  return {
    hour: Number(nanos / NANOS_PER_HOUR),
    minute: Number((nanos % NANOS_PER_HOUR) / NANOS_PER_MINUTE),
    second: Number((nanos % NANOS_PER_MINUTE) / NANOS_PER_SECOND),
    nanosecond: Number(nanos % NANOS_PER_SECOND),
  };
}

/** HH:mm:ss, plus a 9-digit fraction when it is non-zero. */
export function formatTimeOfDay(nanos: NanoOfDay): string {
  const { hour, minute, second, nanosecond } = splitTimeOfDay(nanos);
  const base = [hour, minute, second].map((n) => String(n).padStart(2, "0")).join(":");
  return nanosecond === 0 ? base : `${base}.${String(nanosecond).padStart(9, "0")}`;
}
