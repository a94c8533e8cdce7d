/**
 * Google Calendar and Gmail provider implementations
 */

import type { OAuth2Client } from 'google-auth-library';
import type {
  CreatedEvent,
  CreateMeetingParams,
  DraftParams,
  GoogleProviderConfig,
  ICalendarProvider,
  IMailProvider,
  MailMessage,
  ProviderType,
  TimeSlot,
} from '../../types/index.js';
import { BaseProvider } from '../base.js';
import type { ProviderLogger } from '../base.js';
import { AssistantError, ErrorCodes } from '../../utils/error.js';
import { createOAuth2Client, ensureValidCredentials } from './auth.js';
import { GoogleCalendarClient } from './calendar-client.js';
import { GmailClient, UNREAD_INBOX_QUERY } from './gmail-client.js';
import { buildRawMessage, mapFreeBusy, mapGmailMessage, toGoogleEvent } from './mapper.js';

/**
 * Google Calendar provider: busy time and event creation
 */
export class GoogleCalendarProvider extends BaseProvider implements ICalendarProvider {
  private readonly config: GoogleProviderConfig;
  private oauth2Client: OAuth2Client;
  private client: GoogleCalendarClient | null = null;

  constructor(config: GoogleProviderConfig, logger?: ProviderLogger) {
    super(logger);
    this.config = config;
    this.oauth2Client = createOAuth2Client(config);
  }

  get providerType(): ProviderType {
    return 'google-calendar';
  }

  get displayName(): string {
    return `Google Calendar (${this.config.calendarId})`;
  }

  async connect(): Promise<void> {
    this.logger.info(`Connecting to ${this.displayName}...`);

    try {
      await ensureValidCredentials(this.oauth2Client);
      this.client = new GoogleCalendarClient(this.oauth2Client);

      // Test access to the configured calendar
      await this.client.getCalendar(this.config.calendarId);

      this._connected = true;
      this.logger.info(`Connected to ${this.displayName}`);
    } catch (error) {
      this._connected = false;
      throw this.wrapError(error, 'connect');
    }
  }

  async disconnect(): Promise<void> {
    this.client = null;
    await super.disconnect();
  }

  private getClient(): GoogleCalendarClient {
    if (!this.client) {
      throw new AssistantError(
        'Google Calendar client not initialized. Call connect() first.',
        ErrorCodes.PROVIDER_NOT_CONFIGURED,
        { provider: this.providerType }
      );
    }
    return this.client;
  }

  async getBusySlots(startTime: string, endTime: string): Promise<TimeSlot[]> {
    return this.executeWithErrorHandling('getBusySlots', async () => {
      const calendarId = this.config.calendarId;
      const response = await this.getClient().getFreeBusy({
        timeMin: startTime,
        timeMax: endTime,
        calendarIds: [calendarId],
      });
      const slots = mapFreeBusy(response, calendarId);
      this.logger.debug(`Fetched ${slots.length} busy slots between ${startTime} and ${endTime}`);
      return slots;
    });
  }

  async createMeeting(params: CreateMeetingParams): Promise<CreatedEvent> {
    return this.executeWithErrorHandling('createMeeting', async () => {
      const event = await this.getClient().createEvent(
        this.config.calendarId,
        toGoogleEvent(params),
        { sendUpdates: 'all' }
      );
      if (!event.id) {
        throw new AssistantError('Calendar returned an event without an ID', ErrorCodes.PROVIDER_UNAVAILABLE, {
          provider: this.providerType,
        });
      }
      this.logger.info(`Created event ${event.id}: ${params.summary}`);
      return { id: event.id, htmlLink: event.htmlLink ?? undefined };
    });
  }
}

/**
 * Gmail provider: unread messages and reply drafts
 */
export class GmailProvider extends BaseProvider implements IMailProvider {
  private oauth2Client: OAuth2Client;
  private client: GmailClient | null = null;
  private emailAddress: string | null = null;

  constructor(config: GoogleProviderConfig, logger?: ProviderLogger) {
    super(logger);
    this.oauth2Client = createOAuth2Client(config);
  }

  get providerType(): ProviderType {
    return 'gmail';
  }

  get displayName(): string {
    return this.emailAddress ? `Gmail (${this.emailAddress})` : 'Gmail';
  }

  async connect(): Promise<void> {
    this.logger.info('Connecting to Gmail...');

    try {
      await ensureValidCredentials(this.oauth2Client);
      this.client = new GmailClient(this.oauth2Client);

      const profile = await this.client.getProfile();
      this.emailAddress = profile.emailAddress ?? null;

      this._connected = true;
      this.logger.info(`Connected to ${this.displayName}`);
    } catch (error) {
      this._connected = false;
      throw this.wrapError(error, 'connect');
    }
  }

  async disconnect(): Promise<void> {
    this.client = null;
    await super.disconnect();
  }

  private getClient(): GmailClient {
    if (!this.client) {
      throw new AssistantError(
        'Gmail client not initialized. Call connect() first.',
        ErrorCodes.PROVIDER_NOT_CONFIGURED,
        { provider: this.providerType }
      );
    }
    return this.client;
  }

  async listUnread(maxResults: number): Promise<MailMessage[]> {
    return this.executeWithErrorHandling('listUnread', async () => {
      const client = this.getClient();
      const ids = await client.listMessageIds(UNREAD_INBOX_QUERY, maxResults);

      // One at a time, in list order
      const messages: MailMessage[] = [];
      for (const id of ids) {
        messages.push(mapGmailMessage(await client.getMessage(id)));
      }
      this.logger.debug(`Fetched ${messages.length} unread messages`);
      return messages;
    });
  }

  async createDraft(draft: DraftParams): Promise<string> {
    return this.executeWithErrorHandling('createDraft', async () => {
      const created = await this.getClient().createDraft(buildRawMessage(draft), draft.threadId);
      if (!created.id) {
        throw new AssistantError('Gmail returned a draft without an ID', ErrorCodes.PROVIDER_UNAVAILABLE, {
          provider: this.providerType,
        });
      }
      return created.id;
    });
  }
}
