/**
 * In-process stand-ins for the mail, calendar and classifier providers
 */

import type {
  CreatedEvent,
  CreateMeetingParams,
  DraftParams,
  ICalendarProvider,
  IMailProvider,
  IMessageClassifier,
  MailMessage,
  MessageAnalysis,
  ProviderType,
  TimeSlot,
} from '../types/index.js';

export class FakeCalendar implements ICalendarProvider {
  readonly providerType: ProviderType = 'google-calendar';
  readonly busyQueries: Array<{ start: string; end: string }> = [];
  readonly created: CreateMeetingParams[] = [];
  private connected = false;

  constructor(private busy: TimeSlot[] = []) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async getBusySlots(startTime: string, endTime: string): Promise<TimeSlot[]> {
    this.busyQueries.push({ start: startTime, end: endTime });
    const from = Date.parse(startTime);
    const to = Date.parse(endTime);
    return this.busy.filter(slot => Date.parse(slot.start) < to && from < Date.parse(slot.end));
  }

  async createMeeting(params: CreateMeetingParams): Promise<CreatedEvent> {
    this.created.push(params);
    // Later reads see the new event, as the real calendar would
    this.busy.push({ start: params.start, end: params.end });
    return { id: `event-${this.created.length}` };
  }
}

export class FakeMailbox implements IMailProvider {
  readonly providerType: ProviderType = 'gmail';
  readonly drafts: DraftParams[] = [];
  failDraftFor: string | null = null;
  private connected = false;

  constructor(private messages: MailMessage[] = []) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async listUnread(maxResults: number): Promise<MailMessage[]> {
    return this.messages.slice(0, maxResults);
  }

  async createDraft(draft: DraftParams): Promise<string> {
    if (draft.threadId === this.failDraftFor) {
      throw new Error('draft storage unavailable');
    }
    this.drafts.push(draft);
    return `draft-${this.drafts.length}`;
  }
}

/**
 * Classifier answering from a table keyed by message ID
 */
export class ScriptedClassifier implements IMessageClassifier {
  readonly seen: string[] = [];

  constructor(private verdicts: Record<string, MessageAnalysis | Error>) {}

  async classify(message: MailMessage): Promise<MessageAnalysis> {
    this.seen.push(message.id);
    const verdict = this.verdicts[message.id];
    if (verdict === undefined) {
      throw new Error(`No verdict scripted for ${message.id}`);
    }
    if (verdict instanceof Error) {
      throw verdict;
    }
    return verdict;
  }
}

export function mailMessage(id: string, overrides: Partial<MailMessage> = {}): MailMessage {
  return {
    id,
    threadId: `thread-${id}`,
    subject: `Subject ${id}`,
    sender: 'Ada Example <ada@example.com>',
    date: 'Fri, 12 Jan 2024 09:00:00 -0500',
    body: 'Hello',
    ...overrides,
  };
}

export function noReplyNeeded(reasoning: string = 'Newsletter'): MessageAnalysis {
  return {
    needsResponse: false,
    priority: 'low',
    messageType: 'marketing',
    reasoning,
    suggestedResponse: '',
    meetingIntent: null,
  };
}

export function meetingVerdict(
  preferredDate: string | null,
  preferredTime: string | null,
  overrides: Partial<MessageAnalysis> = {}
): MessageAnalysis {
  return {
    needsResponse: true,
    priority: 'high',
    messageType: 'business',
    reasoning: 'Meeting request',
    suggestedResponse: 'Thanks for reaching out.',
    meetingIntent: {
      purpose: 'Project sync',
      preferredDate,
      preferredTime,
      durationMinutes: 30,
      attendees: [],
    },
    ...overrides,
  };
}
