/**
 * Business window: day start/end, holidays and working week.
 * Immutable once created; shared by every moment derived from it.
 */

import { z } from "zod";
import { isIsoWeekday, type DateOnly, type NanoOfDay, type WorkingWeek } from "./core.js";
import { isDateOnly } from "./dates.js";
import { ConfigurationError, DomainError } from "./errors.js";
import { isNanoOfDay, parseTimeOfDay } from "./timeOfDay.js";

export const DEFAULT_DAY_START = "09:00";
export const DEFAULT_DAY_END = "17:00";

export interface BusinessWindowConfig {
  /** Business day start, nanos since midnight. */
  readonly dayStart: NanoOfDay;
  /** Business day end, nanos since midnight. Always > dayStart. */
  readonly dayEnd: NanoOfDay;
  readonly holidays: ReadonlySet<DateOnly>;
  readonly workingWeek: WorkingWeek;
}

/** Caller-facing input. Every field is optional and defaults to 09:00–17:00, Mon–Fri, no holidays. */
export interface BusinessWindowInput {
  readonly dayStart?: string | bigint;
  readonly dayEnd?: string | bigint;
  readonly holidays?: Iterable<DateOnly>;
  readonly workdays?: Iterable<number>;
}

const TimeOfDaySchema = z.union([
  z.string().transform((text, ctx) => {
    try {
      return parseTimeOfDay(text);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof DomainError ? err.message : `Invalid time of day "${text}"`,
      });
      return z.NEVER;
    }
  }),
  z.bigint().refine(isNanoOfDay, "Time of day must be within one calendar day"),
]);

const IsoWeekdaySchema = z
  .number()
  .int()
  .refine(isIsoWeekday, "Weekday must be 1 (Mon) … 7 (Sun)");

export const BusinessWindowSchema = z
  .object({
    dayStart: TimeOfDaySchema.default(DEFAULT_DAY_START),
    dayEnd: TimeOfDaySchema.default(DEFAULT_DAY_END),
    holidays: z.array(z.string().refine(isDateOnly, "Holiday must be a YYYY-MM-DD date")).default([]),
    workdays: z.array(IsoWeekdaySchema).min(1, "Working week needs at least one weekday").default([1, 2, 3, 4, 5]),
  })
  .refine((w) => w.dayEnd > w.dayStart, {
    message: "business day end time must be after start time",
    path: ["dayEnd"],
  });

// Windows built by createBusinessWindow; anything else is re-validated.
const validatedWindows = new WeakSet<BusinessWindowConfig>();

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `- ${i.path.join(".") || "(root)"}: ${i.message}`).join("\n");
}

/** Validate input and build a frozen window. Throws ConfigurationError. */
export function createBusinessWindow(input: BusinessWindowInput = {}): BusinessWindowConfig {
  const parsed = BusinessWindowSchema.safeParse({
    dayStart: input.dayStart,
    dayEnd: input.dayEnd,
    holidays: input.holidays === undefined ? undefined : Array.from(input.holidays),
    workdays: input.workdays === undefined ? undefined : Array.from(input.workdays),
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid business window:\n${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  const { dayStart, dayEnd, holidays, workdays } = parsed.data;
  const window: BusinessWindowConfig = Object.freeze({
    dayStart,
    dayEnd,
    holidays: new Set(holidays),
    workingWeek: new Set(workdays),
  });
  validatedWindows.add(window);
  return window;
}

function isWindowConfig(value: BusinessWindowConfig | BusinessWindowInput): value is BusinessWindowConfig {
  return "workingWeek" in value;
}

/**
 * The window itself when createBusinessWindow built it, otherwise a validated
 * copy. Hand-built configs go through the same checks. Throws ConfigurationError.
 */
export function resolveBusinessWindow(value: BusinessWindowConfig | BusinessWindowInput = {}): BusinessWindowConfig {
  if (!isWindowConfig(value)) return createBusinessWindow(value);
  if (validatedWindows.has(value)) return value;
  return createBusinessWindow({
    dayStart: value.dayStart,
    dayEnd: value.dayEnd,
    holidays: value.holidays,
    workdays: value.workingWeek,
  });
}

/** Nanos in one business day (dayEnd - dayStart). */
export function businessDaySpan(window: BusinessWindowConfig): bigint {
  return window.dayEnd - window.dayStart;
}

function sameSet<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) if (!b.has(v)) return false;
  return true;
}

/** Windows are interchangeable only if all four fields compare equal. */
export function sameBusinessWindow(a: BusinessWindowConfig, b: BusinessWindowConfig): boolean {
  return (
    a === b ||
    (a.dayStart === b.dayStart &&
      a.dayEnd === b.dayEnd &&
      sameSet(a.holidays, b.holidays) &&
      sameSet(a.workingWeek, b.workingWeek))
  );
}
