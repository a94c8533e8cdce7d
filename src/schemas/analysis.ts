/**
 * Zod schemas for the classifier's JSON verdict and the meeting intent it carries
 */

import { z } from 'zod';
import type { MeetingIntent, MessageAnalysis } from '../types/index.js';

/**
 * Meeting intent as produced by extraction (camelCase)
 */
export const MeetingIntentSchema = z.object({
  purpose: z.string().trim().min(1, 'Meeting purpose is required'),
  preferredDate: z.string().trim().min(1).nullable().default(null),
  preferredTime: z.string().trim().min(1).nullable().default(null),
  durationMinutes: z.number().int().positive().default(30),
  attendees: z.array(z.string()).default([]),
});

const RawMeetingRequestSchema = z.object({
  has_meeting_request: z.boolean().default(false),
  purpose: z.string().default(''),
  preferred_date: z.string().nullable().optional(),
  preferred_time: z.string().nullable().optional(),
  duration_minutes: z.number().int().positive().nullable().optional(),
  attendees: z.array(z.string()).nullable().optional(),
});

/**
 * The model's reply, snake_case as the prompt asks for it
 */
export const RawMessageAnalysisSchema = z.object({
  needs_response: z.boolean(),
  response_priority: z.enum(['high', 'medium', 'low']).catch('low'),
  email_type: z
    .enum(['business', 'personal', 'spam', 'marketing', 'automated', 'unknown'])
    .catch('unknown'),
  reasoning: z.string().default(''),
  suggested_response: z.string().default(''),
  meeting_request: RawMeetingRequestSchema.nullable().optional(),
});

export type RawMessageAnalysis = z.infer<typeof RawMessageAnalysisSchema>;

function emptyToNull(value: string | null | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

/**
 * Map a validated model reply to our MessageAnalysis format
 */
export function toMessageAnalysis(raw: RawMessageAnalysis): MessageAnalysis {
  const request = raw.meeting_request;
  let meetingIntent: MeetingIntent | null = null;

  if (request?.has_meeting_request) {
    meetingIntent = {
      purpose: request.purpose.trim() || 'Meeting',
      preferredDate: emptyToNull(request.preferred_date),
      preferredTime: emptyToNull(request.preferred_time),
      durationMinutes: request.duration_minutes ?? 30,
      attendees: request.attendees ?? [],
    };
  }

  return {
    needsResponse: raw.needs_response,
    priority: raw.response_priority,
    messageType: raw.email_type,
    reasoning: raw.reasoning,
    suggestedResponse: raw.suggested_response,
    meetingIntent,
  };
}
