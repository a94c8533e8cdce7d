/**
 * Inbox Service
 * Runs the classify → extract → resolve → act loop over unread mail
 */

import type { DateTime } from 'luxon';
import type {
  IMailProvider,
  IMessageClassifier,
  MailMessage,
  MeetingIntent,
  MeetingRequest,
  MessageType,
} from '../types/index.js';
import { isConfirmed, serializeOutcome } from '../scheduling/index.js';
import type { SerializedOutcome } from '../scheduling/index.js';
import type { ProviderLogger } from '../providers/base.js';
import { defaultLogger } from '../providers/base.js';
import { AssistantError, ErrorCodes, wrapError } from '../utils/error.js';
import type { ErrorCode } from '../utils/error.js';
import { now } from '../utils/datetime.js';
import { extractEmailAddress } from '../utils/validation.js';
import { buildMeetingRequest } from './meeting-request.js';
import { composeReply, replySubject } from './reply-composer.js';
import type { ReplyAddendum } from './reply-composer.js';
import { AvailabilitySnapshot } from './scheduling-service.js';
import type { SchedulingService } from './scheduling-service.js';

export interface InboxSettings {
  maxUnread: number;
  dryRun: boolean;
  /** HH:mm start used when a meeting request names no date or time */
  defaultMeetingTime: string;
}

export interface InboxRunOptions {
  maxMessages?: number;
  dryRun?: boolean;
}

export type MessageStatus = 'skipped' | 'drafted' | 'planned' | 'failed';

/**
 * What happened to one message
 */
export interface MessageResult {
  messageId: string;
  subject: string;
  sender: string;
  status: MessageStatus;
  messageType?: MessageType;
  reasoning?: string;
  outcome?: SerializedOutcome;
  eventId?: string;
  draftId?: string;
  reply?: string;
  error?: { code: ErrorCode; message: string };
}

export interface InboxRunReport {
  dryRun: boolean;
  processed: number;
  draftsCreated: number;
  meetingsCreated: number;
  failed: number;
  results: MessageResult[];
}

export class InboxService {
  constructor(
    private mail: IMailProvider,
    private classifier: IMessageClassifier,
    private scheduling: SchedulingService,
    private settings: InboxSettings,
    private logger: ProviderLogger = defaultLogger,
    private clock: () => DateTime = () => now(scheduling.timezone)
  ) {}

  /**
   * Process unread messages one at a time. Busy time read or booked while
   * handling one message is visible to every later message of the run.
   */
  async processInbox(options: InboxRunOptions = {}): Promise<InboxRunReport> {
    const dryRun = options.dryRun ?? this.settings.dryRun;
    const maxMessages = options.maxMessages ?? this.settings.maxUnread;

    this.logger.info(`Getting up to ${maxMessages} unread messages${dryRun ? ' (dry run)' : ''}...`);
    const messages = await this.mail.listUnread(maxMessages);

    const report: InboxRunReport = {
      dryRun,
      processed: 0,
      draftsCreated: 0,
      meetingsCreated: 0,
      failed: 0,
      results: [],
    };

    if (messages.length === 0) {
      this.logger.info('No unread messages found.');
      return report;
    }

    const snapshot = new AvailabilitySnapshot();

    for (const message of messages) {
      const result = await this.processMessage(message, snapshot, dryRun);
      report.processed++;
      report.results.push(result);
      if (result.draftId) report.draftsCreated++;
      if (result.eventId) report.meetingsCreated++;
      if (result.status === 'failed') report.failed++;
    }

    this.logger.info(
      `Done! Created ${report.draftsCreated} draft responses and ${report.meetingsCreated} meetings.`
    );
    return report;
  }

  /**
   * Handle one message; failures are recorded on the result, not thrown
   */
  async processMessage(
    message: MailMessage,
    snapshot: AvailabilitySnapshot,
    dryRun: boolean
  ): Promise<MessageResult> {
    const result: MessageResult = {
      messageId: message.id,
      subject: message.subject,
      sender: message.sender,
      status: 'skipped',
    };

    try {
      this.logger.info(`Analyzing: ${message.subject.slice(0, 50)}`);
      const analysis = await this.classifier.classify(message);
      result.messageType = analysis.messageType;
      result.reasoning = analysis.reasoning;

      if (!analysis.needsResponse) {
        this.logger.info(`Skipped: ${analysis.reasoning}`);
        return result;
      }

      let outcome: ReplyAddendum | null = null;
      const request = analysis.meetingIntent ? this.readRequest(analysis.meetingIntent, message) : null;
      if (request === 'unreadable') {
        outcome = { kind: 'unreadable_time' };
      } else if (request) {
        const resolved = await this.scheduling.resolveRequest(request, snapshot);
        outcome = resolved;
        result.outcome = serializeOutcome(resolved);

        if (isConfirmed(resolved)) {
          const senderAddress = extractEmailAddress(message.sender);
          const attendees = senderAddress
            ? [senderAddress, ...request.attendees.filter(a => a.toLowerCase() !== senderAddress)]
            : request.attendees;

          if (dryRun) {
            snapshot.busy.insert(resolved.interval);
          } else {
            const event = await this.scheduling.book(resolved, { ...request, attendees }, snapshot);
            result.eventId = event.id;
          }
        }
      }

      const reply = composeReply(analysis.suggestedResponse, outcome, {
        timezone: this.scheduling.timezone,
        searchHorizonDays: this.scheduling.options.searchHorizonDays,
      });
      result.reply = reply;

      if (dryRun) {
        result.status = 'planned';
        return result;
      }

      result.draftId = await this.mail.createDraft({
        threadId: message.threadId,
        to: message.sender,
        subject: replySubject(message.subject),
        body: reply,
      });
      result.status = 'drafted';
      this.logger.info(`Draft response created for "${message.subject}"`);
      return result;
    } catch (error) {
      const wrapped = wrapError(error, { operation: `process message ${message.id}` });
      this.logger.error(`Failed to process message ${message.id}: ${wrapped.toUserMessage()}`);
      result.status = 'failed';
      result.error = { code: wrapped.code, message: wrapped.message };
      return result;
    }
  }

  /**
   * Build the meeting request of a verdict; a date or time that cannot be
   * parsed yields 'unreadable' so the reply can ask for one
   */
  private readRequest(intent: MeetingIntent, message: MailMessage): MeetingRequest | 'unreadable' {
    try {
      return buildMeetingRequest(intent, {
        timezone: this.scheduling.timezone,
        now: this.clock(),
        policy: this.scheduling.policy,
        defaultStartTime: this.settings.defaultMeetingTime,
      });
    } catch (error) {
      if (error instanceof AssistantError && error.code === ErrorCodes.INVALID_INPUT) {
        this.logger.warn(`Could not read the meeting time of message ${message.id}: ${error.message}`);
        return 'unreadable';
      }
      throw error;
    }
  }
}
