/**
 * Day-boundary normalization: snap-forward policy.
 *
 * Before hours on a business day → dayStart of that day.
 * After hours, weekend or holiday → dayStart of the next business day.
 * Inside [dayStart, dayEnd] (both ends included) → unchanged.
 */

import type { BusinessPosition } from "./core.js";
import type { BusinessWindowConfig } from "./businessWindow.js";
import { isDateOnly } from "./dates.js";
import { isNanoOfDay } from "./timeOfDay.js";
import { assert } from "./validation.js";
import type { BusinessDayResolver } from "./workingDays.js";

export function normalizePosition(
  position: BusinessPosition,
  window: BusinessWindowConfig,
  resolver: BusinessDayResolver
): BusinessPosition {
  const { date, offsetOfDay } = position;
  const { dayStart, dayEnd } = window;
  assert(isDateOnly(date), `Invalid date "${date}"`, { date });
  assert(isNanoOfDay(offsetOfDay), "Offset of day must be within one calendar day", {
    offsetOfDay: offsetOfDay.toString(),
  });

  if (!resolver.isBusinessDay(date)) {
    return { date: resolver.shiftBusinessDays(date, 0), offsetOfDay: dayStart };
  }
  if (offsetOfDay > dayEnd) {
    return { date: resolver.shiftBusinessDays(date, 1), offsetOfDay: dayStart };
  }
  if (offsetOfDay < dayStart) {
    return { date, offsetOfDay: dayStart };
  }
  return position;
}

export function isNormalized(position: BusinessPosition, window: BusinessWindowConfig, resolver: BusinessDayResolver): boolean {
  return (
    resolver.isBusinessDay(position.date) &&
    position.offsetOfDay >= window.dayStart &&
    position.offsetOfDay <= window.dayEnd
  );
}
