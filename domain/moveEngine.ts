/**
 * Business-time displacement.
 *
 * Moves a (date, nanos-of-day) position by a signed tick count, counting only
 * time inside [dayStart, dayEnd] on business days. Exact bigint arithmetic;
 * the window is closed at both ends.
 */

import { MAX_MOVE_TICKS, MAX_SHIFT_DAYS, type DateOnly, type NanoOfDay } from "./core.js";
import { businessDaySpan, type BusinessWindowConfig } from "./businessWindow.js";
import { isDateOnly } from "./dates.js";
import { OutOfRangeError } from "./errors.js";
import { isNanoOfDay } from "./timeOfDay.js";
import { assert, invariant } from "./validation.js";
import type { BusinessDayResolver } from "./workingDays.js";

export interface MoveRequest {
  readonly startDate: DateOnly;
  readonly startOffset: NanoOfDay;
  /** Signed number of units to move. */
  readonly offsetUnits: bigint;
  /** Ticks (nanos) per unit. Must be positive. */
  readonly unitSize: bigint;
}

export interface MoveResult {
  readonly endDate: DateOnly;
  /** Always within [dayStart, dayEnd]. */
  readonly endOffsetOfDay: NanoOfDay;
  /** Business days handed to the resolver. */
  readonly days: number;
  /** Remainder: from dayStart when >= 0, from dayEnd when < 0. */
  readonly remainder: bigint;
}

const max = (a: bigint, b: bigint): bigint => (a > b ? a : b);

export function moveBusinessTime(
  request: MoveRequest,
  window: BusinessWindowConfig,
  resolver: BusinessDayResolver
): MoveResult {
  const { startDate, startOffset, offsetUnits, unitSize } = request;
  const { dayStart, dayEnd } = window;
  assert(isDateOnly(startDate), `Invalid start date "${startDate}"`, { startDate });
  assert(isNanoOfDay(startOffset), "Start offset must be within one calendar day", {
    startOffset: startOffset.toString(),
  });
  assert(unitSize > 0n, "Unit size must be positive", { unitSize: unitSize.toString() });

  let total = offsetUnits * unitSize;
  if (total > MAX_MOVE_TICKS || total < -MAX_MOVE_TICKS) {
    throw new OutOfRangeError("Move exceeds the signed 64-bit tick range", {
      offsetUnits: offsetUnits.toString(),
      unitSize: unitSize.toString(),
    });
  }

  const span = businessDaySpan(window);
  const isWorkingDay = resolver.isBusinessDay(startDate);
  let days = 0n;
  let remainder: bigint;

  // bigint division truncates toward zero. Forward: total - 1 >= -1, so only
  // total = 0 differs from floor and yields (0, 0) = dayStart of today.
  if (total >= 0n) {
    if (isWorkingDay) {
      if (startOffset > dayEnd) {
        // after hours: current business moment is next day at dayStart
        days += 1n;
      } else {
        total += max(0n, startOffset - dayStart);
      }
    }
    days += (total - 1n) / span;
    remainder = ((total - 1n) % span) + 1n;
  } else {
    if (!isWorkingDay) {
      // rolled forward to the next business day's dayStart: a full day to its dayEnd
      total -= span;
    } else if (startOffset < dayStart) {
      // before hours: current business moment is previous day at dayEnd
      days -= 1n;
    } else {
      total -= max(0n, dayEnd - startOffset);
    }
    days += (total + 1n) / span;
    remainder = ((total + 1n) % span) - 1n;
  }

  if (days > BigInt(MAX_SHIFT_DAYS) || days < -BigInt(MAX_SHIFT_DAYS)) {
    throw new OutOfRangeError(`Move spans more than ${MAX_SHIFT_DAYS} business days`, {
      days: days.toString(),
    });
  }
  const dayShift = Number(days);
  const endDate =
    dayShift === 0 && isWorkingDay ? startDate : resolver.shiftBusinessDays(startDate, dayShift);
  invariant(resolver.isBusinessDay(endDate), "Resolver returned a non-business day", {
    startDate,
    days: dayShift,
    endDate,
  });

  const endOffsetOfDay = remainder >= 0n ? dayStart + remainder : dayEnd + remainder;
  return { endDate, endOffsetOfDay, days: dayShift, remainder };
}
