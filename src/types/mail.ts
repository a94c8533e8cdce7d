/**
 * Mail and classifier types
 */

/**
 * An unread message as read from the mailbox
 */
export interface MailMessage {
  id: string;
  threadId: string;
  subject: string;
  /** Raw From header, e.g. "Ada <ada@example.com>" */
  sender: string;
  /** Raw Date header */
  date: string;
  body: string;
}

export type ResponsePriority = 'high' | 'medium' | 'low';

export type MessageType =
  | 'business'
  | 'personal'
  | 'spam'
  | 'marketing'
  | 'automated'
  | 'unknown';

/**
 * Meeting parameters as extracted from free text, before validation
 */
export interface MeetingIntent {
  purpose: string;
  /** Date as written by the extractor, expected yyyy-MM-dd */
  preferredDate: string | null;
  /** Time as written by the extractor, e.g. "14:00" or "2:30 PM" */
  preferredTime: string | null;
  durationMinutes: number;
  attendees: string[];
}

/**
 * Classifier verdict for one message
 */
export interface MessageAnalysis {
  needsResponse: boolean;
  priority: ResponsePriority;
  messageType: MessageType;
  reasoning: string;
  suggestedResponse: string;
  meetingIntent: MeetingIntent | null;
}

/**
 * A reply to be stored as a draft
 */
export interface DraftParams {
  threadId: string;
  to: string;
  subject: string;
  body: string;
}
