import { describe, it, expect } from 'vitest';
import {
  buildRawMessage,
  extractPlainText,
  getHeader,
  mapFreeBusy,
  mapGmailMessage,
  toGoogleEvent,
} from './mapper.js';
import { AssistantError, ErrorCodes } from '../../utils/error.js';

describe('mapFreeBusy', () => {
  it('returns the busy slots of the requested calendar', () => {
    const slots = mapFreeBusy(
      {
        calendars: {
          primary: {
            busy: [
              { start: '2024-01-15T15:00:00Z', end: '2024-01-15T16:00:00Z' },
              { start: null, end: '2024-01-15T18:00:00Z' },
            ],
          },
          other: { busy: [{ start: '2024-01-15T12:00:00Z', end: '2024-01-15T13:00:00Z' }] },
        },
      },
      'primary'
    );

    expect(slots).toEqual([{ start: '2024-01-15T15:00:00Z', end: '2024-01-15T16:00:00Z' }]);
  });

  it('returns nothing for a calendar missing from the response', () => {
    expect(mapFreeBusy({ calendars: {} }, 'primary')).toEqual([]);
  });

  it('raises the lookup error of a calendar', () => {
    let caught: unknown;
    try {
      mapFreeBusy({ calendars: { team: { errors: [{ domain: 'global', reason: 'notFound' }] } } }, 'team');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AssistantError);
    if (caught instanceof AssistantError) {
      expect(caught.code).toBe(ErrorCodes.RESOURCE_NOT_FOUND);
      expect(caught.message).toBe('Free/busy lookup failed for team: notFound');
    }
  });
});

describe('toGoogleEvent', () => {
  it('maps meeting parameters to an event body', () => {
    expect(
      toGoogleEvent({
        summary: 'Project sync',
        start: '2024-01-15T10:00:00.000-05:00',
        end: '2024-01-15T10:30:00.000-05:00',
        timezone: 'America/New_York',
        attendees: ['ada@example.com', 'bob@example.com'],
        description: 'Booked from email',
      })
    ).toEqual({
      summary: 'Project sync',
      description: 'Booked from email',
      start: { dateTime: '2024-01-15T10:00:00.000-05:00', timeZone: 'America/New_York' },
      end: { dateTime: '2024-01-15T10:30:00.000-05:00', timeZone: 'America/New_York' },
      attendees: [{ email: 'ada@example.com' }, { email: 'bob@example.com' }],
    });
  });
});

describe('Gmail mapping', () => {
  const headers = [
    { name: 'Subject', value: 'Lunch?' },
    { name: 'from', value: 'Ada <ada@example.com>' },
    { name: 'Date', value: 'Fri, 12 Jan 2024 09:00:00 -0500' },
  ];

  it('finds headers regardless of case', () => {
    expect(getHeader(headers, 'From')).toBe('Ada <ada@example.com>');
    expect(getHeader(headers, 'Cc')).toBe('');
  });

  it('prefers the text/plain part of a multipart body', () => {
    const text = extractPlainText({
      mimeType: 'multipart/alternative',
      parts: [
        { mimeType: 'text/html', body: { data: 'PHA-SGVsbG88L3A-' } },
        { mimeType: 'text/plain', body: { data: 'SGVsbG8gdGhlcmU' } },
      ],
    });
    expect(text).toBe('Hello there');
  });

  it('returns an empty body when there is no text part', () => {
    expect(extractPlainText({ mimeType: 'text/html', body: { data: 'PHA-SGVsbG88L3A-' } })).toBe('');
    expect(extractPlainText(undefined)).toBe('');
  });

  it('maps a full message', () => {
    expect(
      mapGmailMessage({
        id: 'msg-1',
        threadId: 'thread-1',
        payload: {
          mimeType: 'text/plain',
          headers,
          body: { data: 'UGxhaW4gYm9keSDinJM' },
        },
      })
    ).toEqual({
      id: 'msg-1',
      threadId: 'thread-1',
      subject: 'Lunch?',
      sender: 'Ada <ada@example.com>',
      date: 'Fri, 12 Jan 2024 09:00:00 -0500',
      body: 'Plain body ✓',
    });
  });
});

describe('buildRawMessage', () => {
  it('encodes an RFC 822 message as base64url', () => {
    const raw = buildRawMessage({
      threadId: 'thread-1',
      to: 'Ada <ada@example.com>',
      subject: 'Re: Lunch?',
      body: 'Sounds good.\n\nMeeting scheduled.',
    });

    expect(raw).not.toMatch(/[+/=]/);
    expect(Buffer.from(raw, 'base64url').toString('utf8')).toBe(
      [
        'To: Ada <ada@example.com>',
        'Subject: Re: Lunch?',
        'MIME-Version: 1.0',
        'Content-Type: text/plain; charset="UTF-8"',
        'Content-Transfer-Encoding: 8bit',
        '',
        'Sounds good.\n\nMeeting scheduled.',
      ].join('\r\n')
    );
  });

  it('encodes a non-ASCII subject as an encoded word', () => {
    const raw = buildRawMessage({ threadId: 't', to: 'ada@example.com', subject: 'Re: Café', body: 'x' });
    const decoded = Buffer.from(raw, 'base64url').toString('utf8');
    expect(decoded.split('\r\n')[1]).toBe('Subject: =?UTF-8?B?UmU6IENhZsOp?=');
  });

  it('encodes only the display name of a non-ASCII recipient', () => {
    const raw = buildRawMessage({ threadId: 't', to: 'José Díaz <jose@example.com>', subject: 'Re: Hi', body: 'x' });
    const decoded = Buffer.from(raw, 'base64url').toString('utf8');
    expect(decoded.split('\r\n')[0]).toBe('To: =?UTF-8?B?Sm9zw6kgRMOtYXo=?= <jose@example.com>');
  });

  it('drops the quotes around a quoted display name before encoding', () => {
    const raw = buildRawMessage({ threadId: 't', to: '"José Díaz" <jose@example.com>', subject: 'Re: Hi', body: 'x' });
    const decoded = Buffer.from(raw, 'base64url').toString('utf8');
    expect(decoded.split('\r\n')[0]).toBe('To: =?UTF-8?B?Sm9zw6kgRMOtYXo=?= <jose@example.com>');
  });
});
