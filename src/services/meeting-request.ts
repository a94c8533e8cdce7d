/**
 * Meeting request builder
 * Turns a loosely structured meeting intent into a request the resolver accepts
 */

import { DateTime } from 'luxon';
import type { MeetingRequest } from '../types/index.js';
import type { BusinessHoursPolicy } from '../scheduling/index.js';
import { MeetingIntentSchema } from '../schemas/analysis.js';
import { invalidInputError, invalidPolicyError } from '../utils/error.js';
import { parseClockTime } from '../utils/datetime.js';

export interface BuildRequestContext {
  /** Organizer's IANA timezone */
  timezone: string;
  /** Reference instant for defaulting */
  now: DateTime;
  policy: BusinessHoursPolicy;
  /** HH:mm used when the intent names no date or time */
  defaultStartTime: string;
}

// Accepted wall-clock spellings, tried in order
const TIME_FORMATS = ['H:mm', 'h:mm a', 'h:mma', 'h a', 'ha'];

/**
 * Parse a time of day such as "14:00", "2:30 PM" or "2pm"
 */
export function parseTimeOfDay(value: string): { hour: number; minute: number } {
  const normalized = value.trim().toUpperCase().replace(/\./g, '');
  for (const format of TIME_FORMATS) {
    const parsed = DateTime.fromFormat(normalized, format, { locale: 'en-US' });
    if (parsed.isValid) {
      return { hour: parsed.hour, minute: parsed.minute };
    }
  }
  throw invalidInputError(`Unrecognized meeting time: "${value}"`, { value });
}

/**
 * Parse a yyyy-MM-dd date as the start of that day in the given zone
 */
export function parseMeetingDate(value: string, timezone: string): DateTime {
  const parsed = DateTime.fromFormat(value.trim(), 'yyyy-MM-dd', { zone: timezone });
  if (!parsed.isValid) {
    throw invalidInputError(`Unrecognized meeting date: "${value}". Expected YYYY-MM-DD`, { value });
  }
  return parsed;
}

/**
 * First allowed working day strictly after `now`, at the given time of day
 */
export function nextWorkingDayAt(
  now: DateTime,
  policy: BusinessHoursPolicy,
  time: { hour: number; minute: number }
): DateTime {
  let day = now.setZone(policy.timezone).startOf('day').plus({ days: 1 });
  for (let i = 0; i < 7; i++) {
    if (policy.windowFor(day) !== null) {
      return day.set({ ...time, second: 0, millisecond: 0 });
    }
    day = day.plus({ days: 1 });
  }
  throw invalidPolicyError('No allowed working day within a week');
}

/**
 * Validate a raw meeting intent and anchor it in the organizer's zone.
 * A missing date or time falls back to the next working day at the default start time.
 */
export function buildMeetingRequest(raw: unknown, context: BuildRequestContext): MeetingRequest {
  const parsed = MeetingIntentSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidInputError('Invalid meeting intent', {
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
  }
  const intent = parsed.data;

  let start: DateTime;
  if (intent.preferredDate !== null && intent.preferredTime !== null) {
    const day = parseMeetingDate(intent.preferredDate, context.timezone);
    start = day.set({ ...parseTimeOfDay(intent.preferredTime), second: 0, millisecond: 0 });
  } else {
    start = nextWorkingDayAt(context.now, context.policy, parseClockTime(context.defaultStartTime));
  }

  return {
    purpose: intent.purpose,
    start,
    durationMinutes: intent.durationMinutes,
    attendees: [...intent.attendees],
  };
}
