/**
 * Environment configuration: default business window and zone.
 * Swap holidays or hours per deployment without touching the domain.
 */

import { IANAZone } from "luxon";
import { z } from "zod";
import {
  createBusinessCalendar,
  type BusinessCalendar,
  type BusinessCalendarOptions,
} from "../domain/businessCalendar.js";
import { DEFAULT_DAY_END, DEFAULT_DAY_START, type BusinessWindowInput } from "../domain/businessWindow.js";
import { ConfigurationError } from "../domain/errors.js";

const commaList = (value: string): string[] =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

export const BusinessEnvSchema = z.object({
  BUSINESS_DAY_START: z.string().trim().min(1).default(DEFAULT_DAY_START),
  BUSINESS_DAY_END: z.string().trim().min(1).default(DEFAULT_DAY_END),
  // Comma-separated YYYY-MM-DD dates
  BUSINESS_HOLIDAYS: z.string().default("").transform(commaList),
  // Comma-separated ISO weekdays, 1 = Monday
  BUSINESS_WORKDAYS: z
    .string()
    .default("1,2,3,4,5")
    .transform(commaList)
    .pipe(z.array(z.coerce.number().int().min(1).max(7)).min(1, "at least one weekday is required")),
  BUSINESS_TIME_ZONE: z
    .string()
    .trim()
    .default("UTC")
    .refine((zone) => zone === "UTC" || IANAZone.isValidZone(zone), "unknown IANA time zone"),
});

export type BusinessEnv = z.infer<typeof BusinessEnvSchema>;

export function loadBusinessEnv(source: Record<string, string | undefined> = process.env): BusinessEnv {
  const parsed = BusinessEnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `- ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationError(["Environment validation failed.", issues].join("\n"), {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function windowInputFromEnv(env: BusinessEnv): BusinessWindowInput {
  return {
    dayStart: env.BUSINESS_DAY_START,
    dayEnd: env.BUSINESS_DAY_END,
    holidays: env.BUSINESS_HOLIDAYS,
    workdays: env.BUSINESS_WORKDAYS,
  };
}

/** Calendar and default zone described by the environment. */
export function createCalendarFromEnv(
  source: Record<string, string | undefined> = process.env,
  options: BusinessCalendarOptions = {}
): { calendar: BusinessCalendar; zone: string } {
  const env = loadBusinessEnv(source);
  return {
    calendar: createBusinessCalendar(windowInputFromEnv(env), options),
    zone: env.BUSINESS_TIME_ZONE,
  };
}
