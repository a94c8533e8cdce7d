import { describe, it, expect } from 'vitest';
import { composeReply, describeOutcome, replySubject } from './reply-composer.js';
import { conflict, confirmed } from '../scheduling/index.js';
import { TZ, slot } from '../test-utils/fixtures.js';

const context = { timezone: TZ, searchHorizonDays: 14 };

describe('describeOutcome', () => {
  it('announces a confirmed meeting', () => {
    const outcome = confirmed(slot('2024-01-15T10:00', '2024-01-15T10:30'));
    expect(describeOutcome(outcome, context)).toBe(
      'Meeting scheduled for January 15, 2024 at 10:00 AM. Calendar invite sent!'
    );
  });

  it('lists alternatives for a calendar conflict', () => {
    const outcome = conflict('calendar_conflict', [
      slot('2024-01-15T11:00', '2024-01-15T11:30'),
      slot('2024-01-15T14:30', '2024-01-15T15:00'),
    ]);
    expect(describeOutcome(outcome, context)).toBe(
      [
        'The requested time is not available. Here are some alternatives:',
        '• January 15, 2024 at 11:00 AM',
        '• January 15, 2024 at 02:30 PM',
      ].join('\n')
    );
  });

  it('says when the requested time is outside working hours', () => {
    const outcome = conflict('outside_business_hours', [slot('2024-01-15T09:00', '2024-01-15T10:00')]);
    expect(describeOutcome(outcome, context)).toBe(
      'The requested time is outside working hours. Here are some alternatives:\n• January 15, 2024 at 09:00 AM'
    );
  });

  it('never claims a booking when nothing was found', () => {
    const outcome = conflict('calendar_conflict', []);
    expect(describeOutcome(outcome, { timezone: TZ, searchHorizonDays: 5 })).toBe(
      'No suitable alternative times found in the next 5 working days.'
    );
  });
});

describe('composeReply', () => {
  it('appends the outcome to the suggested response', () => {
    const outcome = confirmed(slot('2024-01-16T14:00', '2024-01-16T14:30'));
    expect(composeReply('Happy to meet.', outcome, context)).toBe(
      'Happy to meet.\n\nMeeting scheduled for January 16, 2024 at 02:00 PM. Calendar invite sent!'
    );
  });

  it('asks for a time when the request could not be read', () => {
    expect(composeReply('Happy to meet.', { kind: 'unreadable_time' }, context)).toBe(
      "Happy to meet.\n\nI couldn't work out the requested meeting time. Could you suggest a date and time that suits you?"
    );
  });

  it('returns the suggested response alone without an outcome', () => {
    expect(composeReply('  Thanks, will do.  ', null, context)).toBe('Thanks, will do.');
  });

  it('drops an empty suggested response', () => {
    const outcome = conflict('calendar_conflict', []);
    expect(composeReply('', outcome, context)).toBe(
      'No suitable alternative times found in the next 14 working days.'
    );
  });
});

describe('replySubject', () => {
  it('prefixes Re:', () => {
    expect(replySubject('Project sync')).toBe('Re: Project sync');
  });

  it('does not double an existing prefix', () => {
    expect(replySubject('RE: Project sync')).toBe('RE: Project sync');
    expect(replySubject('re: lunch')).toBe('re: lunch');
  });
});
