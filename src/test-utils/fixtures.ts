/**
 * Shared helpers for scheduling tests
 */

import { DateTime } from 'luxon';
import { expect } from 'vitest';
import { BusinessHoursPolicy } from '../scheduling/business-hours.js';
import { Interval } from '../scheduling/interval.js';
import type { MeetingRequest } from '../types/index.js';
import { AssistantError } from '../utils/error.js';
import type { ErrorCode } from '../utils/error.js';

export const TZ = 'America/New_York';

/** Naive ISO string read in the test timezone */
export function at(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: TZ });
}

export function slot(start: string, end: string): Interval {
  return Interval.of(at(start), at(end));
}

export function weekdayPolicy(): BusinessHoursPolicy {
  return new BusinessHoursPolicy(
    {
      start: '09:00',
      end: '17:00',
      days: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
    },
    TZ
  );
}

export function request(start: string, end?: string, durationMinutes: number = 30): MeetingRequest {
  return {
    purpose: 'Project sync',
    start: at(start),
    end: end === undefined ? undefined : at(end),
    durationMinutes,
    attendees: ['guest@example.com'],
  };
}

/** ISO pairs of a list of intervals, for narrow equality checks */
export function isoPairs(intervals: readonly Interval[]): Array<{ start: string; end: string }> {
  return intervals.map(interval => interval.toISO());
}

export function expectErrorCode(fn: () => unknown, code: ErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(AssistantError);
  if (caught instanceof AssistantError) {
    expect(caught.code).toBe(code);
  }
}
