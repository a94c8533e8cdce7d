/**
 * Provider configuration and interface types
 */

import type { DraftParams, MailMessage, MessageAnalysis } from './mail.js';

export type ProviderType = 'gmail' | 'google-calendar' | 'openai';

/**
 * A time slot (start and end times, ISO 8601)
 */
export interface TimeSlot {
  start: string;
  end: string;
}

/**
 * Pre-authorized OAuth credentials
 */
export interface GoogleCredentials {
  accessToken: string;
  refreshToken: string;
  tokenExpiry?: string;
}

/**
 * Google (Gmail + Calendar) provider configuration
 */
export interface GoogleProviderConfig {
  /** OAuth client ID */
  clientId?: string;
  /** OAuth client secret */
  clientSecret?: string;
  /** OAuth redirect URI */
  redirectUri?: string;
  /** Pre-authorized credentials */
  credentials?: GoogleCredentials;
  /** Calendar to read busy time from and book into */
  calendarId: string;
}

/**
 * OpenAI classifier configuration
 */
export interface OpenAIClassifierConfig {
  apiKey?: string;
  model: string;
  baseUrl: string;
  temperature: number;
  /** Characters of the body sent to the model */
  maxBodyChars: number;
}

/**
 * Parameters for booking a confirmed meeting
 */
export interface CreateMeetingParams {
  summary: string;
  /** ISO 8601 start, with offset */
  start: string;
  /** ISO 8601 end, with offset */
  end: string;
  /** IANA zone the event is recorded in */
  timezone: string;
  attendees: string[];
  description?: string;
}

export interface CreatedEvent {
  id: string;
  htmlLink?: string;
}

/**
 * Mailbox access: read unread messages, store reply drafts
 */
export interface IMailProvider {
  readonly providerType: ProviderType;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  /** Unread messages in the inbox, newest first */
  listUnread(maxResults: number): Promise<MailMessage[]>;

  /** Store a reply draft; returns the draft ID */
  createDraft(draft: DraftParams): Promise<string>;
}

/**
 * Calendar access: read busy time, book meetings
 */
export interface ICalendarProvider {
  readonly providerType: ProviderType;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  /** Busy slots overlapping [startTime, endTime) */
  getBusySlots(startTime: string, endTime: string): Promise<TimeSlot[]>;

  /** Create one event and send invites */
  createMeeting(params: CreateMeetingParams): Promise<CreatedEvent>;
}

/**
 * Decides whether a message needs a reply and extracts meeting intent
 */
export interface IMessageClassifier {
  classify(message: MailMessage): Promise<MessageAnalysis>;
}
