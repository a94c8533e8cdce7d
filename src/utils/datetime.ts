/**
 * Date/Time utilities using Luxon
 */

import { DateTime } from 'luxon';
import type { DayOfWeek } from '../types/index.js';
import { invalidInputError } from './error.js';

/**
 * Luxon weekday numbers (Monday = 1 ... Sunday = 7) by day name
 */
export const WEEKDAY_NUMBERS: Record<DayOfWeek, number> = {
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
  sunday: 7,
};

const DISPLAY_LOCALE = 'en-US';

/**
 * Parse an ISO datetime string to Luxon DateTime
 *
 * Naive datetime strings (without offset or Z suffix) are interpreted in the
 * given timezone. Strings with explicit offsets are parsed with that offset,
 * then converted to the timezone.
 */
export function parseDateTime(isoString: string, timezone: string): DateTime {
  const dt = DateTime.fromISO(isoString, { zone: timezone });
  if (!dt.isValid) {
    throw invalidInputError(`Invalid datetime: ${isoString}`, {
      value: isoString,
      reason: dt.invalidReason,
    });
  }
  return dt;
}

/**
 * Convert a Luxon DateTime to ISO string
 */
export function toISOString(dt: DateTime): string {
  return dt.toISO() ?? dt.toString();
}

/**
 * Parse an "HH:mm" wall-clock time into hour and minute
 */
export function parseClockTime(value: string): { hour: number; minute: number } {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw invalidInputError(`Invalid time of day: "${value}". Expected HH:mm`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw invalidInputError(`Invalid time of day: "${value}". Expected HH:mm`);
  }
  return { hour, minute };
}

/**
 * Check that a zone name is a usable IANA timezone
 */
export function isValidTimezone(zone: string): boolean {
  return DateTime.now().setZone(zone).isValid;
}

/**
 * Get current time in the given timezone
 */
export function now(timezone: string): DateTime {
  return DateTime.now().setZone(timezone);
}

/**
 * Format a start time for reply text (e.g., "January 05, 2024 at 11:00 AM")
 */
export function formatMeetingTime(dt: DateTime, timezone: string): string {
  return dt.setZone(timezone).setLocale(DISPLAY_LOCALE).toFormat("MMMM dd, yyyy 'at' hh:mm a");
}

/**
 * Format a time range (e.g., "Mon, Jan 15: 11:00 AM - 11:30 AM")
 */
export function formatTimeRange(start: DateTime, end: DateTime, timezone: string): string {
  const startDt = start.setZone(timezone).setLocale(DISPLAY_LOCALE);
  const endDt = end.setZone(timezone).setLocale(DISPLAY_LOCALE);

  if (startDt.hasSame(endDt, 'day')) {
    return `${startDt.toFormat('EEE, MMM d')}: ${startDt.toFormat('h:mm a')} - ${endDt.toFormat('h:mm a')}`;
  }

  return `${startDt.toFormat('EEE, MMM d h:mm a')} - ${endDt.toFormat('EEE, MMM d h:mm a')}`;
}
