export type { BusinessPosition, DateOnly, IsoWeekday, NanoOfDay, WorkingWeek } from "./domain/core.js";
export { MAX_MOVE_TICKS, MAX_SHIFT_DAYS } from "./domain/core.js";
export {
  ConfigurationError,
  DomainError,
  InvariantViolation,
  OutOfRangeError,
  ValidationError,
  type ErrorMetadata,
} from "./domain/errors.js";
export { addCalendarDays, isDateOnly, isoWeekday } from "./domain/dates.js";
export {
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MICROSECOND,
  NANOS_PER_MILLISECOND,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  formatTimeOfDay,
  parseTimeOfDay,
  timeOfDayFromParts,
} from "./domain/timeOfDay.js";
export {
  businessDaySpan,
  createBusinessWindow,
  resolveBusinessWindow,
  sameBusinessWindow,
  type BusinessWindowConfig,
  type BusinessWindowInput,
} from "./domain/businessWindow.js";
export {
  countBusinessDays,
  createBusinessDayResolver,
  nextBusinessDay,
  previousBusinessDay,
  type BusinessDayResolver,
} from "./domain/workingDays.js";
export { moveBusinessTime, type MoveRequest, type MoveResult } from "./domain/moveEngine.js";
export { isNormalized, normalizePosition } from "./domain/normalizer.js";
export { ticksPerUnit, type BusinessUnit, type CalendarUnit, type MoveUnit } from "./domain/units.js";
export {
  createBusinessCalendar,
  type BusinessCalendar,
  type BusinessCalendarOptions,
  type CalendarLogger,
} from "./domain/businessCalendar.js";
export { BusinessMoment, type InstantInput, type LocalMomentFields } from "./domain/businessMoment.js";
export {
  deserializeBusinessMoment,
  serializeBusinessMoment,
  type SerializedBusinessMoment,
} from "./domain/serialization.js";
export { createCalendarFromEnv, loadBusinessEnv, windowInputFromEnv, type BusinessEnv } from "./config/env.js";
