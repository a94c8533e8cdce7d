/**
 * Prompt templates for message classification
 */

import type { MailMessage } from '../types/index.js';

export const CLASSIFIER_SYSTEM_PROMPT =
  'You are an expert email assistant. Always respond with valid JSON only. No additional text or explanations.';

/**
 * Build the user prompt for one message, body truncated to maxBodyChars
 */
export function buildClassificationPrompt(message: MailMessage, maxBodyChars: number): string {
  return `Analyze this email and determine if it needs a response. Return ONLY valid JSON.

EMAIL:
Subject: ${message.subject}
From: ${message.sender}
Body: ${message.body.slice(0, maxBodyChars)}

ANALYSIS RULES:
- Marketing/promotional emails = NO response
- Newsletters/automated notifications = NO response
- Direct questions/requests = RESPONSE needed
- Meeting invitations = RESPONSE needed
- Personal messages from real people = RESPONSE needed

If the email asks for a meeting, fill in meeting_request. Write preferred_date as
YYYY-MM-DD and preferred_time as HH:MM (24-hour), or null when the email does not say.

Return this exact JSON structure:
{
  "needs_response": false,
  "response_priority": "low",
  "email_type": "marketing",
  "reasoning": "This appears to be a promotional/marketing email",
  "suggested_response": "",
  "meeting_request": {
    "has_meeting_request": false,
    "purpose": "",
    "preferred_date": null,
    "preferred_time": null,
    "duration_minutes": 30,
    "attendees": []
  }
}

Only set needs_response: true for genuine personal/business communications.`;
}
