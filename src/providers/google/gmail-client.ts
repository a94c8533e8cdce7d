/**
 * Gmail API client wrapper
 */

import { google, gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { toAssistantError } from './errors.js';

type Gmail = gmail_v1.Gmail;
type Message = gmail_v1.Schema$Message;
type Draft = gmail_v1.Schema$Draft;

export const UNREAD_INBOX_QUERY = 'is:unread in:inbox';

export class GmailClient {
  private gmail: Gmail;

  constructor(auth: OAuth2Client) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  /**
   * Mailbox profile of the authenticated user
   */
  async getProfile(): Promise<gmail_v1.Schema$Profile> {
    try {
      const response = await this.gmail.users.getProfile({ userId: 'me' });
      return response.data;
    } catch (error) {
      throw toAssistantError(error, 'gmail', 'getProfile');
    }
  }

  /**
   * List message IDs matching a search query
   */
  async listMessageIds(query: string, maxResults: number): Promise<string[]> {
    try {
      const response = await this.gmail.users.messages.list({
        userId: 'me',
        q: query,
        maxResults,
      });
      const ids: string[] = [];
      for (const message of response.data.messages ?? []) {
        if (message.id) {
          ids.push(message.id);
        }
      }
      return ids;
    } catch (error) {
      throw toAssistantError(error, 'gmail', 'listMessages');
    }
  }

  /**
   * Get a full message, headers and MIME parts included
   */
  async getMessage(id: string): Promise<Message> {
    try {
      const response = await this.gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'full',
      });
      return response.data;
    } catch (error) {
      throw toAssistantError(error, 'gmail', 'getMessage', id);
    }
  }

  /**
   * Store a draft from a base64url-encoded RFC 822 message
   */
  async createDraft(raw: string, threadId?: string): Promise<Draft> {
    try {
      const response = await this.gmail.users.drafts.create({
        userId: 'me',
        requestBody: {
          message: { raw, threadId },
        },
      });
      return response.data;
    } catch (error) {
      throw toAssistantError(error, 'gmail', 'createDraft');
    }
  }
}
