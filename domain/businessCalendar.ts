/**
 * Business calendar: wires a window to its resolver.
 * Callers build one and pass it along.
 */

import type { BusinessPosition, DateOnly } from "./core.js";
import {
  businessDaySpan,
  resolveBusinessWindow,
  type BusinessWindowConfig,
  type BusinessWindowInput,
} from "./businessWindow.js";
import { moveBusinessTime, type MoveResult } from "./moveEngine.js";
import { normalizePosition } from "./normalizer.js";
import { ticksPerUnit, type BusinessUnit } from "./units.js";
import { countBusinessDays, createBusinessDayResolver, type BusinessDayResolver } from "./workingDays.js";

/** Structural logger; console satisfies it. */
export interface CalendarLogger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export interface BusinessCalendarOptions {
  /** Use a caller-supplied resolver instead of one built from the window. */
  readonly resolver?: BusinessDayResolver;
  readonly logger?: CalendarLogger;
}

export interface BusinessCalendar {
  readonly window: BusinessWindowConfig;
  readonly resolver: BusinessDayResolver;
  isBusinessDay(date: DateOnly): boolean;
  normalize(position: BusinessPosition): BusinessPosition;
  /** Move by offsetUnits × ticksPerUnit(unit) of business time. */
  move(position: BusinessPosition, offsetUnits: bigint, unit: BusinessUnit): MoveResult;
  /** Move by offsetUnits × unitSize ticks (nanos) of business time. */
  moveTicks(position: BusinessPosition, offsetUnits: bigint, unitSize: bigint): MoveResult;
  ticksPerUnit(unit: BusinessUnit): bigint;
  /** Business nanos from `from` to `to`, negative when `to` comes first. Both are normalized first. */
  businessDurationBetween(from: BusinessPosition, to: BusinessPosition): bigint;
}

export function comparePositions(a: BusinessPosition, b: BusinessPosition): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.offsetOfDay === b.offsetOfDay) return 0;
  return a.offsetOfDay < b.offsetOfDay ? -1 : 1;
}

export function createBusinessCalendar(
  window: BusinessWindowConfig | BusinessWindowInput = {},
  options: BusinessCalendarOptions = {}
): BusinessCalendar {
  const config = resolveBusinessWindow(window);
  const resolver = options.resolver ?? createBusinessDayResolver(config);
  const { logger } = options;

  function normalize(position: BusinessPosition): BusinessPosition {
    return normalizePosition(position, config, resolver);
  }

  function moveTicks(position: BusinessPosition, offsetUnits: bigint, unitSize: bigint): MoveResult {
    const result = moveBusinessTime(
      { startDate: position.date, startOffset: position.offsetOfDay, offsetUnits, unitSize },
      config,
      resolver
    );
    logger?.debug("business move", {
      startDate: position.date,
      startOffset: position.offsetOfDay.toString(),
      ticks: (offsetUnits * unitSize).toString(),
      days: result.days,
      remainder: result.remainder.toString(),
      endDate: result.endDate,
      endOffsetOfDay: result.endOffsetOfDay.toString(),
    });
    return result;
  }

  function businessDurationBetween(from: BusinessPosition, to: BusinessPosition): bigint {
    const a = normalize(from);
    const b = normalize(to);
    if (comparePositions(a, b) > 0) return -businessDurationBetween(b, a);
    if (a.date === b.date) return b.offsetOfDay - a.offsetOfDay;
    const days = countBusinessDays(a.date, b.date, resolver);
    return (
      config.dayEnd - a.offsetOfDay +
      BigInt(days - 1) * businessDaySpan(config) +
      (b.offsetOfDay - config.dayStart)
    );
  }

  return {
    window: config,
    resolver,
    isBusinessDay: (date) => resolver.isBusinessDay(date),
    normalize,
    move: (position, offsetUnits, unit) => moveTicks(position, offsetUnits, ticksPerUnit(unit, config)),
    moveTicks,
    ticksPerUnit: (unit) => ticksPerUnit(unit, config),
    businessDurationBetween,
  };
}
