/**
 * Google data mapping
 * Converts between Gmail / Calendar API payloads and our mail and slot types
 */

import type { calendar_v3, gmail_v1 } from 'googleapis';
import type {
  CreateMeetingParams,
  DraftParams,
  MailMessage,
  TimeSlot,
} from '../../types/index.js';
import { AssistantError, ErrorCodes } from '../../utils/error.js';

type GoogleEvent = calendar_v3.Schema$Event;
type FreeBusyResponse = calendar_v3.Schema$FreeBusyResponse;
type MessagePart = gmail_v1.Schema$MessagePart;
type MessageHeader = gmail_v1.Schema$MessagePartHeader;

// ─────────────────────────────────────────────────────────────────────────────
// Calendar Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Busy slots of one calendar from a free/busy response
 */
export function mapFreeBusy(response: FreeBusyResponse, calendarId: string): TimeSlot[] {
  const calendarData = response.calendars?.[calendarId];
  if (!calendarData) {
    return [];
  }

  const failure = calendarData.errors?.[0];
  if (failure) {
    throw new AssistantError(
      `Free/busy lookup failed for ${calendarId}: ${failure.reason ?? 'unknown reason'}`,
      failure.reason === 'notFound' ? ErrorCodes.RESOURCE_NOT_FOUND : ErrorCodes.PROVIDER_UNAVAILABLE,
      { provider: 'google-calendar', details: { calendarId, reason: failure.reason } }
    );
  }

  const slots: TimeSlot[] = [];
  for (const slot of calendarData.busy ?? []) {
    if (slot.start && slot.end) {
      slots.push({ start: slot.start, end: slot.end });
    }
  }
  return slots;
}

/**
 * Convert meeting parameters to a Google event body
 */
export function toGoogleEvent(params: CreateMeetingParams): GoogleEvent {
  return {
    summary: params.summary,
    description: params.description,
    start: { dateTime: params.start, timeZone: params.timezone },
    end: { dateTime: params.end, timeZone: params.timezone },
    attendees: params.attendees.map(email => ({ email })),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Gmail Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Header value by name (case-insensitive), or '' when absent
 */
export function getHeader(headers: MessageHeader[] | undefined, name: string): string {
  const wanted = name.toLowerCase();
  const header = headers?.find(h => h.name?.toLowerCase() === wanted);
  return header?.value ?? '';
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf8');
}

/**
 * First text/plain body in a MIME tree, depth first
 */
export function extractPlainText(part: MessagePart | undefined): string {
  if (!part) {
    return '';
  }
  if (part.mimeType === 'text/plain' && part.body?.data) {
    return decodeBase64Url(part.body.data);
  }
  for (const child of part.parts ?? []) {
    const text = extractPlainText(child);
    if (text) {
      return text;
    }
  }
  return '';
}

/**
 * Map a full Gmail message to our MailMessage format
 */
export function mapGmailMessage(message: gmail_v1.Schema$Message): MailMessage {
  const headers = message.payload?.headers ?? undefined;
  return {
    id: message.id ?? '',
    threadId: message.threadId ?? '',
    subject: getHeader(headers, 'Subject'),
    sender: getHeader(headers, 'From'),
    date: getHeader(headers, 'Date'),
    body: extractPlainText(message.payload),
  };
}

function isPrintableAscii(value: string): boolean {
  return /^[\x20-\x7e]*$/.test(value);
}

/**
 * RFC 2047 encoded-word for header values outside printable ASCII
 */
function encodeHeaderValue(value: string): string {
  if (isPrintableAscii(value)) {
    return value;
  }
  return `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

/**
 * Address header with only the display name encoded; the address stays literal
 */
function encodeAddressHeader(value: string): string {
  const named = /^\s*(.*?)\s*<([^<>]+)>\s*$/.exec(value);
  if (!named) {
    return encodeHeaderValue(value.trim());
  }
  const name = named[1] ?? '';
  const address = named[2] ?? '';
  if (!name) {
    return `<${address}>`;
  }
  const display = isPrintableAscii(name) ? name : encodeHeaderValue(name.replace(/^"(.*)"$/, '$1'));
  return `${display} <${address}>`;
}

/**
 * Build the base64url-encoded RFC 822 message Gmail expects for a draft
 */
export function buildRawMessage(draft: DraftParams): string {
  const lines = [
    `To: ${encodeAddressHeader(draft.to)}`,
    `Subject: ${encodeHeaderValue(draft.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 8bit',
    '',
    draft.body,
  ];
  return Buffer.from(lines.join('\r\n'), 'utf8').toString('base64url');
}
