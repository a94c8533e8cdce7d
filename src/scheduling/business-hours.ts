/**
 * Business-hours policy
 * Decides which intervals fall inside allowed scheduling time
 */

import type { DateTime } from 'luxon';
import type { DayOfWeek, WorkingHours } from '../types/index.js';
import { invalidPolicyError } from '../utils/error.js';
import { WEEKDAY_NUMBERS, isValidTimezone, parseClockTime } from '../utils/datetime.js';
import { Interval } from './interval.js';

/**
 * Daily [start, end) window on a set of weekdays, in one timezone.
 * Immutable once constructed.
 */
export class BusinessHoursPolicy {
  readonly timezone: string;
  readonly start: string;
  readonly end: string;
  readonly days: readonly DayOfWeek[];

  private readonly startTime: { hour: number; minute: number };
  private readonly endTime: { hour: number; minute: number };
  private readonly weekdays: ReadonlySet<number>;

  constructor(hours: WorkingHours, timezone: string) {
    if (!isValidTimezone(timezone)) {
      throw invalidPolicyError(`Unknown timezone: ${timezone}`, { timezone });
    }

    const startTime = parseClockTime(hours.start);
    const endTime = parseClockTime(hours.end);
    if (startTime.hour * 60 + startTime.minute >= endTime.hour * 60 + endTime.minute) {
      throw invalidPolicyError(
        `Working hours start (${hours.start}) must be before end (${hours.end})`,
        { start: hours.start, end: hours.end }
      );
    }
    if (hours.days.length === 0) {
      throw invalidPolicyError('At least one working day is required');
    }

    this.timezone = timezone;
    this.start = hours.start;
    this.end = hours.end;
    this.days = Object.freeze([...hours.days]);
    this.startTime = startTime;
    this.endTime = endTime;
    this.weekdays = new Set(hours.days.map(day => WEEKDAY_NUMBERS[day]));
  }

  /**
   * The allowed window of the calendar day containing `day`, or null when
   * that weekday is not allowed
   */
  windowFor(day: DateTime): Interval | null {
    const local = day.setZone(this.timezone).startOf('day');
    if (!this.weekdays.has(local.weekday)) {
      return null;
    }

    const start = local.set({ ...this.startTime, second: 0, millisecond: 0 });
    const end = local.set({ ...this.endTime, second: 0, millisecond: 0 });
    // A DST gap can swallow a window that starts or ends inside it
    if (end <= start) {
      return null;
    }
    return Interval.of(start, end);
  }

  /**
   * True iff the whole interval lies inside one allowed day's window.
   * Intervals that cross midnight or stick out of the window are rejected.
   */
  isAllowed(interval: Interval): boolean {
    const window = this.windowFor(interval.start);
    return window !== null && window.contains(interval);
  }

  /**
   * Earliest instant >= from that lies in an allowed window.
   * An instant already inside a window is returned unchanged.
   */
  nextAllowedStart(from: DateTime): DateTime {
    const local = from.setZone(this.timezone);
    let day = local.startOf('day');

    // Every allowed weekday recurs within a week, so eight days always suffice
    for (let i = 0; i <= 7; i++) {
      const window = this.windowFor(day);
      if (window && local < window.end) {
        return local >= window.start ? local : window.start;
      }
      day = day.plus({ days: 1 });
    }

    throw invalidPolicyError('No allowed window found within a week', {
      from: local.toISO(),
    });
  }

  /**
   * Start of the first allowed window that begins strictly after `from`
   */
  followingWindowStart(from: DateTime): DateTime {
    const local = from.setZone(this.timezone);
    let day = local.startOf('day');

    for (let i = 0; i <= 8; i++) {
      const window = this.windowFor(day);
      if (window && window.start > local) {
        return window.start;
      }
      day = day.plus({ days: 1 });
    }

    throw invalidPolicyError('No allowed window found within a week', {
      from: local.toISO(),
    });
  }

  /**
   * End of the `windowCount`-th allowed window, counting the window that
   * contains `from` (or the first one after it) as the first
   */
  horizonEnd(from: DateTime, windowCount: number): DateTime {
    const local = from.setZone(this.timezone);
    let day = local.startOf('day');
    let seen = 0;
    let last = this.nextAllowedStart(local);

    for (let i = 0; i <= windowCount * 7 + 7; i++) {
      const window = this.windowFor(day);
      if (window && local < window.end) {
        seen++;
        last = window.end;
        if (seen >= windowCount) {
          break;
        }
      }
      day = day.plus({ days: 1 });
    }

    return last;
  }

  toJSON(): WorkingHours & { timezone: string } {
    return {
      start: this.start,
      end: this.end,
      days: [...this.days],
      timezone: this.timezone,
    };
  }
}
