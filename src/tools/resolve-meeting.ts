/**
 * resolve_meeting Tool
 * Resolves a meeting request against working hours and live busy time
 */

import type { CreatedEvent, MeetingRequest } from '../types/index.js';
import type { SchedulingService } from '../services/scheduling-service.js';
import { AvailabilitySnapshot } from '../services/scheduling-service.js';
import { describeOutcome } from '../services/reply-composer.js';
import { isConfirmed, serializeOutcome } from '../scheduling/index.js';
import type { SchedulingOutcome, SerializedOutcome } from '../scheduling/index.js';
import type { ResolveMeetingInput } from '../schemas/tool-inputs.js';
import { formatTimeRange, parseDateTime } from '../utils/datetime.js';

export interface ResolveMeetingResult {
  outcome: SchedulingOutcome;
  event?: CreatedEvent;
}

/**
 * Execute resolve_meeting tool
 */
export async function executeResolveMeeting(
  input: ResolveMeetingInput,
  scheduling: SchedulingService
): Promise<ResolveMeetingResult> {
  const timezone = scheduling.timezone;
  const request: MeetingRequest = {
    purpose: input.purpose,
    start: parseDateTime(input.startTime, timezone),
    end: input.endTime ? parseDateTime(input.endTime, timezone) : undefined,
    durationMinutes: input.durationMinutes,
    attendees: input.attendees,
  };

  const snapshot = new AvailabilitySnapshot();
  const outcome = await scheduling.resolveRequest(request, snapshot);

  if (input.book && isConfirmed(outcome)) {
    const event = await scheduling.book(outcome, request, snapshot);
    return { outcome, event };
  }
  return { outcome };
}

/**
 * Format result for MCP response
 */
export function formatResolveMeetingResult(
  result: ResolveMeetingResult,
  scheduling: SchedulingService
): string {
  const { outcome, event } = result;
  const timezone = scheduling.timezone;
  const lines: string[] = [];

  if (isConfirmed(outcome)) {
    const when = formatTimeRange(outcome.interval.start, outcome.interval.end, timezone);
    lines.push(event ? `✅ **Booked:** ${when}` : `✅ **Available:** ${when}`);
    if (event) {
      lines.push(`   Event ID: ${event.id}`);
      if (event.htmlLink) {
        lines.push(`   Link: ${event.htmlLink}`);
      }
    }
  } else {
    const label = outcome.reason === 'outside_business_hours' ? 'Outside working hours' : 'Calendar conflict';
    lines.push(`⚠️ **${label}**`);
    lines.push('');
    if (outcome.alternatives.length > 0) {
      lines.push('**Alternatives:**');
      for (const alt of outcome.alternatives) {
        lines.push(`   • ${formatTimeRange(alt.start, alt.end, timezone)}`);
      }
    } else {
      lines.push(
        describeOutcome(outcome, {
          timezone,
          searchHorizonDays: scheduling.options.searchHorizonDays,
        })
      );
    }
  }

  const serialized: SerializedOutcome = serializeOutcome(outcome);
  lines.push('');
  lines.push('```json');
  lines.push(JSON.stringify({ ...serialized, eventId: event?.id }, null, 2));
  lines.push('```');
  return lines.join('\n');
}
