/**
 * check_availability Tool
 * Checks one slot against working hours and busy time
 */

import type { AvailabilityCheck, SchedulingService } from '../services/scheduling-service.js';
import type { CheckAvailabilityInput } from '../schemas/tool-inputs.js';
import { Interval } from '../scheduling/index.js';
import { formatTimeRange, parseDateTime } from '../utils/datetime.js';

/**
 * Execute check_availability tool
 */
export async function executeCheckAvailability(
  input: CheckAvailabilityInput,
  scheduling: SchedulingService
): Promise<AvailabilityCheck> {
  const timezone = scheduling.timezone;
  const interval = Interval.of(
    parseDateTime(input.startTime, timezone),
    parseDateTime(input.endTime, timezone)
  );
  return scheduling.checkAvailability(interval);
}

/**
 * Format result for MCP response
 */
export function formatCheckAvailabilityResult(result: AvailabilityCheck, timezone: string): string {
  const lines: string[] = [];
  const when = formatTimeRange(result.interval.start, result.interval.end, timezone);

  lines.push(result.available ? `🟢 **Available:** ${when}` : `🔴 **Not available:** ${when}`);
  if (!result.withinBusinessHours) {
    lines.push('   Outside working hours');
  }
  if (result.conflicts.length > 0) {
    lines.push(`   Busy (${result.conflicts.length}):`);
    for (const busy of result.conflicts) {
      lines.push(`   • ${formatTimeRange(busy.start, busy.end, timezone)}`);
    }
  }
  return lines.join('\n');
}
