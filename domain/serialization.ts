/**
 * Serialized form of a BusinessMoment: the instant, its zone and the full
 * business window. Round-trips exactly.
 */

import { DateTime } from "luxon";
import { z } from "zod";
import { createBusinessCalendar, type BusinessCalendarOptions } from "./businessCalendar.js";
import { BusinessMoment } from "./businessMoment.js";
import { ValidationError } from "./errors.js";
import { formatTimeOfDay } from "./timeOfDay.js";

export const SerializedBusinessMomentSchema = z.object({
  instant: z.string().min(1),
  zone: z.string().min(1),
  nanoOfMillisecond: z.number().int().min(0).max(999_999).default(0),
  window: z.object({
    dayStart: z.string(),
    dayEnd: z.string(),
    holidays: z.array(z.string()),
    workdays: z.array(z.number().int()),
  }),
});

export type SerializedBusinessMoment = z.infer<typeof SerializedBusinessMomentSchema>;

export function serializeBusinessMoment(moment: BusinessMoment): SerializedBusinessMoment {
  const { dayStart, dayEnd, holidays, workingWeek } = moment.window;
  return {
    instant: moment.toDateTime().toFormat("yyyy-MM-dd'T'HH:mm:ss.SSSZZ"),
    zone: moment.zone,
    nanoOfMillisecond: moment.nanoOfMillisecond,
    window: {
      dayStart: formatTimeOfDay(dayStart),
      dayEnd: formatTimeOfDay(dayEnd),
      holidays: [...holidays].sort(),
      workdays: [...workingWeek].sort((a, b) => a - b),
    },
  };
}

/**
 * Rebuild a moment from its serialized form. Window problems surface as
 * ConfigurationError, a malformed payload as ValidationError.
 */
export function deserializeBusinessMoment(
  payload: unknown,
  options: BusinessCalendarOptions = {}
): BusinessMoment {
  const parsed = SerializedBusinessMomentSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ValidationError(`Invalid serialized business moment:\n${issues}`, { issues: parsed.error.issues });
  }
  const { instant, zone, nanoOfMillisecond, window } = parsed.data;
  const calendar = createBusinessCalendar(window, options);
  const dt = DateTime.fromISO(instant, { setZone: true }).setZone(zone);
  return BusinessMoment.of(dt, calendar, nanoOfMillisecond);
}
