/**
 * Google Calendar API client wrapper
 */

import { google, calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { toAssistantError } from './errors.js';

type Calendar = calendar_v3.Calendar;
type Event = calendar_v3.Schema$Event;
type FreeBusyResponse = calendar_v3.Schema$FreeBusyResponse;

export class GoogleCalendarClient {
  private calendar: Calendar;

  constructor(auth: OAuth2Client) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  /**
   * Fetch calendar metadata (used to verify access on connect)
   */
  async getCalendar(calendarId: string): Promise<calendar_v3.Schema$Calendar> {
    try {
      const response = await this.calendar.calendars.get({ calendarId });
      return response.data;
    } catch (error) {
      throw toAssistantError(error, 'google-calendar', 'getCalendar', calendarId);
    }
  }

  /**
   * Query free/busy information for a set of calendars
   */
  async getFreeBusy(params: {
    timeMin: string;
    timeMax: string;
    calendarIds: string[];
    timeZone?: string;
  }): Promise<FreeBusyResponse> {
    try {
      const response = await this.calendar.freebusy.query({
        requestBody: {
          timeMin: params.timeMin,
          timeMax: params.timeMax,
          timeZone: params.timeZone,
          items: params.calendarIds.map(id => ({ id })),
        },
      });
      return response.data;
    } catch (error) {
      throw toAssistantError(error, 'google-calendar', 'getFreeBusy');
    }
  }

  /**
   * Create a new event, notifying attendees
   */
  async createEvent(
    calendarId: string,
    event: Event,
    options?: { sendUpdates?: 'all' | 'externalOnly' | 'none' }
  ): Promise<Event> {
    try {
      const response = await this.calendar.events.insert({
        calendarId,
        requestBody: event,
        sendUpdates: options?.sendUpdates ?? 'all',
      });
      return response.data;
    } catch (error) {
      throw toAssistantError(error, 'google-calendar', 'createEvent');
    }
  }
}
