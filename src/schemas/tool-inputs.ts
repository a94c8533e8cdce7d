/**
 * Zod schemas for MCP tool inputs
 */

import { z } from 'zod';
import { AttendeeListSchema, ISODateTimeSchema } from './common.js';

// ─────────────────────────────────────────────────────────────────────────────
// resolve_meeting
// ─────────────────────────────────────────────────────────────────────────────

export const ResolveMeetingInputSchema = z.object({
  purpose: z.string().min(1).max(500).describe('Meeting title / purpose'),
  startTime: ISODateTimeSchema.describe(
    'Requested start (ISO 8601). Times without an offset are read in the organizer timezone'
  ),
  endTime: ISODateTimeSchema.optional()
    .describe('Requested end (ISO 8601). Defaults to start + durationMinutes'),
  durationMinutes: z.number().int().positive().max(24 * 60).optional().default(30)
    .describe('Meeting length in minutes'),
  attendees: AttendeeListSchema.optional().default([])
    .describe('Attendee email addresses'),
  book: z.boolean().optional().default(false)
    .describe('Create the calendar event when the requested time is free'),
});

export type ResolveMeetingInput = z.infer<typeof ResolveMeetingInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// check_availability
// ─────────────────────────────────────────────────────────────────────────────

export const CheckAvailabilityInputSchema = z.object({
  startTime: ISODateTimeSchema.describe('Start of the slot (ISO 8601)'),
  endTime: ISODateTimeSchema.describe('End of the slot (ISO 8601)'),
});

export type CheckAvailabilityInput = z.infer<typeof CheckAvailabilityInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// process_inbox
// ─────────────────────────────────────────────────────────────────────────────

export const ProcessInboxInputSchema = z.object({
  maxMessages: z.number().int().positive().max(100).optional()
    .describe('Maximum unread messages to process (default: MAX_UNREAD)'),
  dryRun: z.boolean().optional()
    .describe('Classify and resolve only; create no events or drafts (default: DRY_RUN)'),
});

export type ProcessInboxInput = z.infer<typeof ProcessInboxInputSchema>;
