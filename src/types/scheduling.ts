/**
 * Scheduling types
 * Inputs and options of the meeting availability resolver
 */

import type { DateTime } from 'luxon';

export type DayOfWeek =
  | 'sunday'
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday';

/**
 * Working hours configuration
 */
export interface WorkingHours {
  /** Start time (HH:mm format, e.g., "09:00") */
  start: string;
  /** End time (HH:mm format, e.g., "17:00") */
  end: string;
  /** Working days */
  days: DayOfWeek[];
}

/**
 * Why a requested interval could not be booked
 */
export type ConflictReason = 'outside_business_hours' | 'calendar_conflict';

/**
 * A validated meeting request, anchored in the organizer's zone
 */
export interface MeetingRequest {
  purpose: string;
  /** Requested start */
  start: DateTime;
  /** Requested end; when absent or equal to start, start + durationMinutes is used */
  end?: DateTime;
  durationMinutes: number;
  /** Opaque attendee identifiers, passed through to the calendar */
  attendees: string[];
}

export interface ResolverOptions {
  /** Alternatives offered on conflict */
  maxAlternatives: number;
  /** Number of allowed-day windows searched before giving up */
  searchHorizonDays: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  maxAlternatives: 2,
  searchHorizonDays: 14,
};
