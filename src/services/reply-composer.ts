/**
 * Reply composer
 * Phrases a scheduling outcome for the reply draft
 */

import type { SchedulingOutcome } from '../scheduling/index.js';
import { formatMeetingTime } from '../utils/datetime.js';

/**
 * A meeting request whose date or time could not be read
 */
export interface UnreadableTime {
  kind: 'unreadable_time';
}

export type ReplyAddendum = SchedulingOutcome | UnreadableTime;

export interface ReplyContext {
  timezone: string;
  /** Working days searched, quoted when no alternative was found */
  searchHorizonDays: number;
}

/**
 * The sentence(s) describing an outcome
 */
export function describeOutcome(outcome: ReplyAddendum, context: ReplyContext): string {
  if (outcome.kind === 'unreadable_time') {
    return "I couldn't work out the requested meeting time. Could you suggest a date and time that suits you?";
  }

  if (outcome.kind === 'confirmed') {
    return `Meeting scheduled for ${formatMeetingTime(outcome.interval.start, context.timezone)}. Calendar invite sent!`;
  }

  if (outcome.alternatives.length === 0) {
    return `No suitable alternative times found in the next ${context.searchHorizonDays} working days.`;
  }

  const lead =
    outcome.reason === 'outside_business_hours'
      ? 'The requested time is outside working hours. Here are some alternatives:'
      : 'The requested time is not available. Here are some alternatives:';
  const lines = outcome.alternatives.map(alt => `• ${formatMeetingTime(alt.start, context.timezone)}`);
  return [lead, ...lines].join('\n');
}

/**
 * Append the outcome to the suggested reply body
 */
export function composeReply(
  base: string,
  outcome: ReplyAddendum | null,
  context: ReplyContext
): string {
  const parts = [base.trim()];
  if (outcome) {
    parts.push(describeOutcome(outcome, context));
  }
  return parts.filter(part => part.length > 0).join('\n\n');
}

/**
 * Reply subject without a doubled "Re:" prefix
 */
export function replySubject(subject: string): string {
  const trimmed = subject.trim();
  return /^re:/i.test(trimmed) ? trimmed : `Re: ${trimmed}`;
}
