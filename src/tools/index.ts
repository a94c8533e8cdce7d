/**
 * MCP Tool Registry
 * Tool definitions and handlers
 */

export * from './resolve-meeting.js';
export * from './check-availability.js';
export * from './process-inbox.js';

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { InboxService } from '../services/inbox-service.js';
import type { SchedulingService } from '../services/scheduling-service.js';
import {
  CheckAvailabilityInputSchema,
  ProcessInboxInputSchema,
  ResolveMeetingInputSchema,
} from '../schemas/tool-inputs.js';
import { AssistantError, formatErrorForMCP } from '../utils/error.js';
import { executeResolveMeeting, formatResolveMeetingResult } from './resolve-meeting.js';
import { executeCheckAvailability, formatCheckAvailabilityResult } from './check-availability.js';
import { executeProcessInbox, formatProcessInboxResult } from './process-inbox.js';

/**
 * Tool definitions for MCP registration
 */
export const toolDefinitions = [
  {
    name: 'resolve_meeting',
    description:
      'Check whether a meeting can be booked at the requested time within working hours. On conflict, returns up to two of the nearest free alternatives of the same length. Set book=true to create the event (with invites) when the time is free.',
    inputSchema: zodToJsonSchema(ResolveMeetingInputSchema),
  },
  {
    name: 'check_availability',
    description:
      'Check a single time slot against working hours and the calendar. Returns whether it is free and which busy periods it overlaps.',
    inputSchema: zodToJsonSchema(CheckAvailabilityInputSchema),
  },
  {
    name: 'process_inbox',
    description:
      'Process unread inbox messages: classify each, resolve meeting requests against the calendar, book confirmed meetings and store reply drafts. Use dryRun to preview without creating events or drafts.',
    inputSchema: zodToJsonSchema(ProcessInboxInputSchema),
  },
];

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/**
 * Tool handler function type
 */
export type ToolHandler = (args: unknown) => Promise<ToolResult>;

/**
 * Convert a thrown error into an MCP error result
 */
export function toToolError(error: unknown): ToolResult {
  let text: string;
  if (error instanceof z.ZodError) {
    const issues = error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    text = `Validation error: ${issues}`;
  } else if (error instanceof AssistantError) {
    text = formatErrorForMCP(error);
  } else {
    text = `Error: ${error instanceof Error ? error.message : 'Unknown error'}`;
  }
  return { content: [{ type: 'text', text }], isError: true };
}

function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Create tool handlers with injected services
 */
export function createToolHandlers(
  scheduling: SchedulingService,
  inbox: InboxService
): Record<string, ToolHandler> {
  return {
    resolve_meeting: async (args) => {
      const input = ResolveMeetingInputSchema.parse(args);
      const result = await executeResolveMeeting(input, scheduling);
      return textResult(formatResolveMeetingResult(result, scheduling));
    },

    check_availability: async (args) => {
      const input = CheckAvailabilityInputSchema.parse(args);
      const result = await executeCheckAvailability(input, scheduling);
      return textResult(formatCheckAvailabilityResult(result, scheduling.timezone));
    },

    process_inbox: async (args) => {
      const input = ProcessInboxInputSchema.parse(args);
      const report = await executeProcessInbox(input, inbox);
      return textResult(formatProcessInboxResult(report));
    },
  };
}
