/**
 * BusinessMoment is an immutable point on the business timeline: an instant
 * whose time of day, in its own zone, always lies in [dayStart, dayEnd] on a
 * business day.
 *
 * It composes a luxon DateTime (millisecond precision) with a sub-millisecond
 * nanosecond remainder. Construction snaps forward onto the timeline; sub-day
 * and day moves skip nights, weekends and holidays; weeks, months, quarters and
 * years are plain calendar arithmetic followed by the same snap.
 */

import { DateTime, type DateObjectUnits, type DurationLikeObject, type DurationUnit, type Zone } from "luxon";
import type { BusinessPosition, DateOnly, NanoOfDay } from "./core.js";
import { createBusinessCalendar, type BusinessCalendar } from "./businessCalendar.js";
import { sameBusinessWindow, type BusinessWindowConfig } from "./businessWindow.js";
import { formatDateOnly, parseDateOnly } from "./dates.js";
import { ValidationError } from "./errors.js";
import { NANOS_PER_MILLISECOND, parseTimeOfDay, splitTimeOfDay, timeOfDayFromParts } from "./timeOfDay.js";
import { isCalendarUnit, type CalendarUnit, type MoveUnit } from "./units.js";
import { assert, neverReached } from "./validation.js";

const DEFAULT_CALENDAR = createBusinessCalendar();
const NANOS_PER_MS = Number(NANOS_PER_MILLISECOND);
const MS_PER_MINUTE = 60_000;
// Overlaps last at most a few hours; offsets this far either side bracket one.
const OVERLAP_SEARCH_MS = 6 * 3_600_000;

export type InstantInput = DateTime | Date | string;

/** Local wall-clock fields. `time` is "HH:mm[:ss[.fraction]]" or nanos of day. */
export interface LocalMomentFields {
  readonly date: DateOnly;
  readonly time: string | NanoOfDay;
  /** IANA name or fixed offset ("UTC", "Europe/Paris", "UTC+2"). Defaults to UTC. */
  readonly zone?: string;
}

function requireValid(dt: DateTime, context: string): DateTime {
  if (!dt.isValid) {
    throw new ValidationError(`${context}: ${dt.invalidExplanation ?? dt.invalidReason ?? "invalid date-time"}`, {
      reason: dt.invalidReason,
    });
  }
  return dt;
}

function toDateTime(instant: InstantInput): DateTime {
  if (instant instanceof DateTime) return requireValid(instant, "Invalid instant");
  if (instant instanceof Date) return requireValid(DateTime.fromJSDate(instant), "Invalid instant");
  return requireValid(DateTime.fromISO(instant, { setZone: true }), `Invalid ISO instant "${instant}"`);
}

function calendarDuration(unit: CalendarUnit, n: number): DurationLikeObject {
  switch (unit) {
    case "weeks":
      return { weeks: n };
    case "months":
      return { months: n };
    case "quarters":
      return { quarters: n };
    case "years":
      return { years: n };
    default:
      return neverReached(unit);
  }
}

function toBigInt(amount: number | bigint): bigint {
  if (typeof amount === "bigint") return amount;
  assert(Number.isSafeInteger(amount), "Amount must be an integer", { amount });
  return BigInt(amount);
}

function positionOf(dt: DateTime, nanoOfMillisecond: number): BusinessPosition {
  return {
    date: formatDateOnly(dt.year, dt.month, dt.day),
    offsetOfDay: timeOfDayFromParts({
      hour: dt.hour,
      minute: dt.minute,
      second: dt.second,
      nanosecond: dt.millisecond * NANOS_PER_MS + nanoOfMillisecond,
    }),
  };
}

export class BusinessMoment {
  private constructor(
    private readonly dateTime: DateTime,
    /** Nanoseconds below the luxon millisecond, 0–999999. */
    readonly nanoOfMillisecond: number,
    readonly calendar: BusinessCalendar
  ) {}

  /** Snap an instant onto the business timeline of `calendar`. */
  static of(instant: InstantInput, calendar: BusinessCalendar = DEFAULT_CALENDAR, nanoOfMillisecond = 0): BusinessMoment {
    assert(
      Number.isInteger(nanoOfMillisecond) && nanoOfMillisecond >= 0 && nanoOfMillisecond < NANOS_PER_MS,
      "nanoOfMillisecond must be an integer in 0–999999",
      { nanoOfMillisecond }
    );
    return BusinessMoment.snap(toDateTime(instant), nanoOfMillisecond, calendar);
  }

  /** Build from local date and time in a zone, with nanosecond precision. */
  static at(fields: LocalMomentFields, calendar: BusinessCalendar = DEFAULT_CALENDAR): BusinessMoment {
    const offsetOfDay = typeof fields.time === "string" ? parseTimeOfDay(fields.time) : fields.time;
    const local = BusinessMoment.fromPosition({ date: fields.date, offsetOfDay }, fields.zone ?? "UTC", calendar);
    return BusinessMoment.snap(local.dateTime, local.nanoOfMillisecond, calendar);
  }

  static now(calendar: BusinessCalendar = DEFAULT_CALENDAR, zone?: string): BusinessMoment {
    const now = DateTime.now();
    return BusinessMoment.of(zone === undefined ? now : now.setZone(zone), calendar);
  }

  private static snap(dt: DateTime, nanoOfMillisecond: number, calendar: BusinessCalendar): BusinessMoment {
    const position = positionOf(dt, nanoOfMillisecond);
    const normalized = calendar.normalize(position);
    if (normalized === position) return new BusinessMoment(dt, nanoOfMillisecond, calendar);
    return BusinessMoment.fromPosition(normalized, dt.zone, calendar);
  }

  private static fromPosition(position: BusinessPosition, zone: Zone | string, calendar: BusinessCalendar): BusinessMoment {
    const { y, m, d } = parseDateOnly(position.date);
    const { hour, minute, second, nanosecond } = splitTimeOfDay(position.offsetOfDay);
    const dt = DateTime.fromObject(
      { year: y, month: m, day: d, hour, minute, second, millisecond: Math.floor(nanosecond / NANOS_PER_MS) },
      { zone }
    );
    return new BusinessMoment(requireValid(dt, "Invalid local date-time"), nanosecond % NANOS_PER_MS, calendar);
  }

  // --- Accessors ---

  get window(): BusinessWindowConfig {
    return this.calendar.window;
  }

  get position(): BusinessPosition {
    return positionOf(this.dateTime, this.nanoOfMillisecond);
  }

  get date(): DateOnly {
    return this.position.date;
  }

  get offsetOfDay(): NanoOfDay {
    return this.position.offsetOfDay;
  }

  get zone(): string {
    return this.dateTime.zone.name;
  }

  get year(): number {
    return this.dateTime.year;
  }

  get month(): number {
    return this.dateTime.month;
  }

  get day(): number {
    return this.dateTime.day;
  }

  /** ISO weekday, 1 = Monday. */
  get weekday(): number {
    return this.dateTime.weekday;
  }

  get hour(): number {
    return this.dateTime.hour;
  }

  get minute(): number {
    return this.dateTime.minute;
  }

  get second(): number {
    return this.dateTime.second;
  }

  get millisecond(): number {
    return this.dateTime.millisecond;
  }

  /** Nanoseconds within the second, 0–999999999. */
  get nanosecond(): number {
    return this.dateTime.millisecond * NANOS_PER_MS + this.nanoOfMillisecond;
  }

  // --- Arithmetic ---

  plus(amount: number | bigint, unit: MoveUnit): BusinessMoment {
    if (isCalendarUnit(unit)) {
      const n = Number(toBigInt(amount));
      assert(Number.isSafeInteger(n), "Calendar amount out of range", { amount: String(amount) });
      const moved = requireValid(this.dateTime.plus(calendarDuration(unit, n)), "Calendar move left the supported range");
      return BusinessMoment.snap(moved, this.nanoOfMillisecond, this.calendar);
    }
    const units = toBigInt(amount);
    if (units === 0n) return this;
    const { endDate, endOffsetOfDay } = this.calendar.move(this.position, units, unit);
    return BusinessMoment.fromPosition({ date: endDate, offsetOfDay: endOffsetOfDay }, this.dateTime.zone, this.calendar);
  }

  minus(amount: number | bigint, unit: MoveUnit): BusinessMoment {
    return this.plus(-toBigInt(amount), unit);
  }

  // --- Pass-through to the date-time value, then snap ---

  set(values: DateObjectUnits): BusinessMoment {
    return BusinessMoment.snap(requireValid(this.dateTime.set(values), "Invalid field values"), this.nanoOfMillisecond, this.calendar);
  }

  withZoneSameInstant(zone: string): BusinessMoment {
    return BusinessMoment.snap(requireValid(this.dateTime.setZone(zone), `Invalid zone "${zone}"`), this.nanoOfMillisecond, this.calendar);
  }

  withZoneSameLocal(zone: string): BusinessMoment {
    const moved = this.dateTime.setZone(zone, { keepLocalTime: true });
    return BusinessMoment.snap(requireValid(moved, `Invalid zone "${zone}"`), this.nanoOfMillisecond, this.calendar);
  }

  /** At a DST overlap, the same wall time under the earlier of the two offsets. */
  withEarlierOffsetAtOverlap(): BusinessMoment {
    return this.withOverlapOffset("earlier");
  }

  /** At a DST overlap, the same wall time under the later of the two offsets. */
  withLaterOffsetAtOverlap(): BusinessMoment {
    return this.withOverlapOffset("later");
  }

  private withOverlapOffset(pick: "earlier" | "later"): BusinessMoment {
    const { zone } = this.dateTime;
    const instant = this.dateTime.toMillis();
    const wallClock = instant + this.dateTime.offset * MS_PER_MINUTE;
    const candidates = [zone.offset(instant - OVERLAP_SEARCH_MS), zone.offset(instant + OVERLAP_SEARCH_MS)]
      .map((offset) => wallClock - offset * MS_PER_MINUTE)
      .filter((candidate) => candidate + zone.offset(candidate) * MS_PER_MINUTE === wallClock);
    const chosen = pick === "earlier" ? Math.min(instant, ...candidates) : Math.max(instant, ...candidates);
    if (chosen === instant) return this;
    return BusinessMoment.snap(DateTime.fromMillis(chosen, { zone }), this.nanoOfMillisecond, this.calendar);
  }

  /** Whole calendar units from this moment to `other` (not business-aware). */
  until(other: BusinessMoment, unit: DurationUnit): number {
    return Math.trunc(other.dateTime.diff(this.dateTime, unit).as(unit));
  }

  /** Business nanoseconds from this moment to `other`; negative when `other` is earlier. */
  businessDurationUntil(other: BusinessMoment): bigint {
    assert(other.zone === this.zone, "Business duration needs both moments in the same zone", {
      zone: this.zone,
      otherZone: other.zone,
    });
    assert(sameBusinessWindow(this.window, other.window), "Business duration needs equal business windows");
    return this.calendar.businessDurationBetween(this.position, other.position);
  }

  // --- Comparison and output ---

  compare(other: BusinessMoment): number {
    const diff = this.dateTime.toMillis() - other.dateTime.toMillis();
    if (diff !== 0) return diff < 0 ? -1 : 1;
    return Math.sign(this.nanoOfMillisecond - other.nanoOfMillisecond);
  }

  /** Same instant, same zone and an interchangeable window. */
  equals(other: BusinessMoment): boolean {
    return (
      this.compare(other) === 0 &&
      this.zone === other.zone &&
      sameBusinessWindow(this.window, other.window)
    );
  }

  toDateTime(): DateTime {
    return this.dateTime;
  }

  toJSDate(): Date {
    return this.dateTime.toJSDate();
  }

  toMillis(): number {
    return this.dateTime.toMillis();
  }

  /** ISO-8601 with offset; nine fraction digits when below a millisecond. */
  toISO(): string {
    const fraction = String(this.nanosecond).padStart(9, "0");
    const shown = this.nanoOfMillisecond === 0 ? fraction.slice(0, 3) : fraction;
    return `${this.dateTime.toFormat("yyyy-MM-dd'T'HH:mm:ss")}.${shown}${this.dateTime.toFormat("ZZ")}`;
  }

  toString(): string {
    return this.toISO();
  }

  toJSON(): string {
    return this.toISO();
  }
}
