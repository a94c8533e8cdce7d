/**
 * Meeting availability resolution engine
 */

export { Interval } from './interval.js';
export { BusinessHoursPolicy } from './business-hours.js';
export { BusyIndex } from './busy-index.js';
export { resolve, normalizeRequest } from './slot-resolver.js';
export {
  confirmed,
  conflict,
  isConfirmed,
  outcomesEqual,
  serializeOutcome,
} from './outcome.js';
export type {
  ConfirmedOutcome,
  ConflictOutcome,
  SchedulingOutcome,
  SerializedOutcome,
} from './outcome.js';
