/**
 * Time window model
 *
 * Instants are luxon DateTimes carried in the organizer's zone; an Interval is
 * a half-open [start, end) pair of them.
 */

import { DateTime, Duration } from 'luxon';
import type { DurationLike } from 'luxon';
import { invalidIntervalError } from '../utils/error.js';

/**
 * Half-open interval [start, end) with end strictly after start
 */
export class Interval {
  private constructor(
    readonly start: DateTime,
    readonly end: DateTime
  ) {}

  /**
   * Construct an interval, failing with INVALID_INTERVAL unless end > start
   */
  static of(start: DateTime, end: DateTime): Interval {
    if (!start.isValid || !end.isValid || end.toMillis() <= start.toMillis()) {
      throw invalidIntervalError(describe(start), describe(end));
    }
    return new Interval(start, end.setZone(start.zone));
  }

  /**
   * Construct an interval that starts at `start` and lasts `duration`
   */
  static after(start: DateTime, duration: DurationLike): Interval {
    return Interval.of(start, start.plus(duration));
  }

  /**
   * Parse two ISO strings in the given zone
   */
  static fromISO(start: string, end: string, zone: string): Interval {
    return Interval.of(
      DateTime.fromISO(start, { zone }),
      DateTime.fromISO(end, { zone })
    );
  }

  /**
   * Like fromISO, but null instead of throwing on unparseable or empty input
   */
  static tryFromISO(start: string, end: string, zone: string): Interval | null {
    const startDt = DateTime.fromISO(start, { zone });
    const endDt = DateTime.fromISO(end, { zone });
    if (!startDt.isValid || !endDt.isValid || endDt <= startDt) {
      return null;
    }
    return Interval.of(startDt, endDt);
  }

  /**
   * True iff the two intervals share some time; sharing an endpoint is not overlap
   */
  overlaps(other: Interval): boolean {
    return this.start < other.end && other.start < this.end;
  }

  contains(other: Interval): boolean {
    return this.start <= other.start && other.end <= this.end;
  }

  duration(): Duration {
    return this.end.diff(this.start);
  }

  durationMinutes(): number {
    return this.duration().as('minutes');
  }

  /**
   * Smallest interval covering both
   */
  span(other: Interval): Interval {
    const start = this.start <= other.start ? this.start : other.start;
    const end = this.end >= other.end ? this.end : other.end;
    return new Interval(start, end);
  }

  equals(other: Interval): boolean {
    return (
      this.start.toMillis() === other.start.toMillis() &&
      this.end.toMillis() === other.end.toMillis()
    );
  }

  setZone(zone: string): Interval {
    return new Interval(this.start.setZone(zone), this.end.setZone(zone));
  }

  toISO(): { start: string; end: string } {
    return { start: toISO(this.start), end: toISO(this.end) };
  }

  toString(): string {
    return `[${toISO(this.start)}, ${toISO(this.end)})`;
  }
}

function toISO(dt: DateTime): string {
  return dt.toISO() ?? dt.toString();
}

function describe(dt: DateTime): string {
  return dt.isValid ? toISO(dt) : `invalid (${dt.invalidReason ?? 'unknown'})`;
}
