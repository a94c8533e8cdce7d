/**
 * Slot resolver
 *
 * Decides whether a meeting request can be booked as asked and, when it
 * cannot, searches forward for the nearest free slots of the same length.
 * Pure: the busy index is only read, and identical inputs give identical
 * outcomes.
 */

import type { DateTime, Duration } from 'luxon';
import type { ConflictReason, MeetingRequest, ResolverOptions } from '../types/index.js';
import { DEFAULT_RESOLVER_OPTIONS } from '../types/index.js';
import { invalidDurationError, invalidIntervalError } from '../utils/error.js';
import type { BusinessHoursPolicy } from './business-hours.js';
import type { BusyIndex } from './busy-index.js';
import { Interval } from './interval.js';
import { conflict, confirmed } from './outcome.js';
import type { SchedulingOutcome } from './outcome.js';

/**
 * Turn a request into the interval it asks for.
 * A missing end, or one equal to the start, becomes start + duration.
 */
export function normalizeRequest(request: MeetingRequest): Interval {
  if (!Number.isFinite(request.durationMinutes) || request.durationMinutes <= 0) {
    throw invalidDurationError(request.durationMinutes);
  }

  const { start, end } = request;
  if (end === undefined || end.toMillis() === start.toMillis()) {
    return Interval.after(start, { minutes: request.durationMinutes });
  }
  if (end < start) {
    throw invalidIntervalError(start.toISO() ?? start.toString(), end.toISO() ?? end.toString());
  }
  return Interval.of(start, end);
}

/**
 * Resolve a meeting request against the organizer's busy time and working hours
 */
export function resolve(
  request: MeetingRequest,
  busy: BusyIndex,
  policy: BusinessHoursPolicy,
  options: Partial<ResolverOptions> = {}
): SchedulingOutcome {
  const { maxAlternatives, searchHorizonDays } = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
  const requested = normalizeRequest(request).setZone(policy.timezone);

  let reason: ConflictReason;
  if (!policy.isAllowed(requested)) {
    reason = 'outside_business_hours';
  } else if (busy.overlapsAny(requested)) {
    reason = 'calendar_conflict';
  } else {
    return confirmed(requested);
  }

  const allowedStart = policy.nextAllowedStart(requested.start);
  const blocking = busy.overlapping(requested);
  const lastBlocking = blocking[blocking.length - 1];
  const searchFrom =
    lastBlocking !== undefined && lastBlocking.end > allowedStart ? lastBlocking.end : allowedStart;
  const horizon = policy.horizonEnd(requested.start, searchHorizonDays);

  const alternatives = findAlternatives({
    from: searchFrom,
    length: requested.duration(),
    horizon,
    count: maxAlternatives,
    busy,
    policy,
  });

  return conflict(reason, alternatives);
}

/**
 * Walk forward from `from` collecting free, allowed slots of the given length.
 * A slot blocked by busy time moves on by one slot length; a slot outside
 * working hours moves to the next allowed window.
 */
function findAlternatives(params: {
  from: DateTime;
  length: Duration;
  horizon: DateTime;
  count: number;
  busy: BusyIndex;
  policy: BusinessHoursPolicy;
}): Interval[] {
  const { length, horizon, count, busy, policy } = params;
  const found: Interval[] = [];
  let cursor = params.from;

  while (found.length < count && cursor < horizon) {
    const candidate = Interval.after(cursor, length);

    if (!policy.isAllowed(candidate)) {
      const next = policy.nextAllowedStart(cursor);
      // Inside a window but running past its end: jump to the next window
      cursor = next > cursor ? next : policy.followingWindowStart(cursor);
      continue;
    }

    if (busy.overlapsAny(candidate)) {
      cursor = cursor.plus(length);
      continue;
    }

    found.push(candidate);
    cursor = candidate.end;
  }

  return found;
}
