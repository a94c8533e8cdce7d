/**
 * Scheduling outcome
 *
 * The resolver's verdict, handed to the calendar-write and reply steps.
 * A confirmed outcome becomes exactly one calendar event; a conflict becomes
 * a reply offering its alternatives and never claims a booking.
 */

import type { ConflictReason } from '../types/index.js';
import type { Interval } from './interval.js';

export interface ConfirmedOutcome {
  readonly kind: 'confirmed';
  readonly interval: Interval;
}

export interface ConflictOutcome {
  readonly kind: 'conflict';
  readonly reason: ConflictReason;
  /** Chronological, at most the resolver's maxAlternatives */
  readonly alternatives: readonly Interval[];
}

export type SchedulingOutcome = ConfirmedOutcome | ConflictOutcome;

export function confirmed(interval: Interval): ConfirmedOutcome {
  const outcome: ConfirmedOutcome = { kind: 'confirmed', interval };
  return Object.freeze(outcome);
}

export function conflict(reason: ConflictReason, alternatives: readonly Interval[]): ConflictOutcome {
  const outcome: ConflictOutcome = {
    kind: 'conflict',
    reason,
    alternatives: Object.freeze([...alternatives]),
  };
  return Object.freeze(outcome);
}

export function isConfirmed(outcome: SchedulingOutcome): outcome is ConfirmedOutcome {
  return outcome.kind === 'confirmed';
}

/**
 * Structural equality, used to check resolver determinism
 */
export function outcomesEqual(a: SchedulingOutcome, b: SchedulingOutcome): boolean {
  if (a.kind === 'confirmed' || b.kind === 'confirmed') {
    return a.kind === 'confirmed' && b.kind === 'confirmed' && a.interval.equals(b.interval);
  }
  return (
    a.reason === b.reason &&
    a.alternatives.length === b.alternatives.length &&
    a.alternatives.every((alt, i) => {
      const other = b.alternatives[i];
      return other !== undefined && alt.equals(other);
    })
  );
}

/**
 * JSON shape of an outcome, times as ISO 8601 strings
 */
export type SerializedOutcome =
  | { status: 'confirmed'; start: string; end: string }
  | {
      status: 'conflict';
      reason: ConflictReason;
      alternatives: Array<{ start: string; end: string }>;
    };

export function serializeOutcome(outcome: SchedulingOutcome): SerializedOutcome {
  if (outcome.kind === 'confirmed') {
    return { status: 'confirmed', ...outcome.interval.toISO() };
  }
  return {
    status: 'conflict',
    reason: outcome.reason,
    alternatives: outcome.alternatives.map(alt => alt.toISO()),
  };
}
