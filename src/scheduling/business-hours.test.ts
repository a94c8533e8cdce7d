import { describe, it, expect } from 'vitest';
import { BusinessHoursPolicy } from './business-hours.js';
import { ErrorCodes } from '../utils/error.js';
import { TZ, at, expectErrorCode, slot, weekdayPolicy } from '../test-utils/fixtures.js';

describe('BusinessHoursPolicy', () => {
  const policy = weekdayPolicy();

  describe('construction', () => {
    it('rejects a start that is not before the end', () => {
      expectErrorCode(
        () => new BusinessHoursPolicy({ start: '17:00', end: '09:00', days: ['monday'] }, TZ),
        ErrorCodes.INVALID_POLICY
      );
      expectErrorCode(
        () => new BusinessHoursPolicy({ start: '09:00', end: '09:00', days: ['monday'] }, TZ),
        ErrorCodes.INVALID_POLICY
      );
    });

    it('rejects an empty weekday set', () => {
      expectErrorCode(
        () => new BusinessHoursPolicy({ start: '09:00', end: '17:00', days: [] }, TZ),
        ErrorCodes.INVALID_POLICY
      );
    });

    it('rejects an unknown timezone', () => {
      expectErrorCode(
        () => new BusinessHoursPolicy({ start: '09:00', end: '17:00', days: ['monday'] }, 'Mars/Olympus'),
        ErrorCodes.INVALID_POLICY
      );
    });

    it('rejects malformed clock times', () => {
      expectErrorCode(
        () => new BusinessHoursPolicy({ start: '9am', end: '17:00', days: ['monday'] }, TZ),
        ErrorCodes.INVALID_INPUT
      );
    });
  });

  describe('isAllowed', () => {
    it('accepts an interval inside a weekday window', () => {
      expect(policy.isAllowed(slot('2024-01-15T10:00', '2024-01-15T10:30'))).toBe(true);
    });

    it('accepts intervals touching the window edges', () => {
      expect(policy.isAllowed(slot('2024-01-15T09:00', '2024-01-15T09:30'))).toBe(true);
      expect(policy.isAllowed(slot('2024-01-15T16:30', '2024-01-15T17:00'))).toBe(true);
    });

    it('rejects intervals partially outside the window', () => {
      expect(policy.isAllowed(slot('2024-01-15T08:45', '2024-01-15T09:15'))).toBe(false);
      expect(policy.isAllowed(slot('2024-01-15T16:45', '2024-01-15T17:15'))).toBe(false);
    });

    it('rejects intervals on disallowed weekdays', () => {
      expect(policy.isAllowed(slot('2024-01-13T14:00', '2024-01-13T14:30'))).toBe(false);
    });

    it('rejects intervals spanning midnight', () => {
      const allDay = new BusinessHoursPolicy(
        { start: '00:00', end: '23:59', days: ['monday', 'tuesday'] },
        TZ
      );
      expect(allDay.isAllowed(slot('2024-01-15T23:30', '2024-01-16T00:30'))).toBe(false);
    });
  });

  describe('nextAllowedStart', () => {
    it('returns an instant inside a window unchanged', () => {
      expect(policy.nextAllowedStart(at('2024-01-15T10:30')).toISO()).toBe(
        '2024-01-15T10:30:00.000-05:00'
      );
    });

    it('moves an early instant to the same day opening', () => {
      expect(policy.nextAllowedStart(at('2024-01-15T08:00')).toISO()).toBe(
        '2024-01-15T09:00:00.000-05:00'
      );
    });

    it('moves an instant after closing to the next day', () => {
      expect(policy.nextAllowedStart(at('2024-01-15T17:00')).toISO()).toBe(
        '2024-01-16T09:00:00.000-05:00'
      );
    });

    it('skips disallowed weekdays', () => {
      expect(policy.nextAllowedStart(at('2024-01-12T18:00')).toISO()).toBe(
        '2024-01-15T09:00:00.000-05:00'
      );
      expect(policy.nextAllowedStart(at('2024-01-13T14:00')).toISO()).toBe(
        '2024-01-15T09:00:00.000-05:00'
      );
    });

    it('reads instants given in another zone in the policy zone', () => {
      // 13:00 UTC is 08:00 in New York
      const utc = at('2024-01-15T08:00').setZone('UTC');
      expect(policy.nextAllowedStart(utc).toISO()).toBe('2024-01-15T09:00:00.000-05:00');
    });

    it('uses the local opening time after a daylight-saving change', () => {
      expect(policy.nextAllowedStart(at('2024-03-08T17:30')).toISO()).toBe(
        '2024-03-11T09:00:00.000-04:00'
      );
    });
  });

  describe('followingWindowStart', () => {
    it('skips the window the instant is in', () => {
      expect(policy.followingWindowStart(at('2024-01-15T16:45')).toISO()).toBe(
        '2024-01-16T09:00:00.000-05:00'
      );
    });

    it('returns the same day opening before hours', () => {
      expect(policy.followingWindowStart(at('2024-01-15T07:00')).toISO()).toBe(
        '2024-01-15T09:00:00.000-05:00'
      );
    });
  });

  describe('horizonEnd', () => {
    it('counts the current window as the first', () => {
      expect(policy.horizonEnd(at('2024-01-15T10:00'), 1).toISO()).toBe(
        '2024-01-15T17:00:00.000-05:00'
      );
    });

    it('counts only allowed days', () => {
      // Fri, Mon, Tue
      expect(policy.horizonEnd(at('2024-01-12T10:00'), 3).toISO()).toBe(
        '2024-01-16T17:00:00.000-05:00'
      );
    });

    it('starts counting at the next window when called after hours', () => {
      expect(policy.horizonEnd(at('2024-01-15T18:00'), 1).toISO()).toBe(
        '2024-01-16T17:00:00.000-05:00'
      );
    });
  });

  it('serializes its configuration', () => {
    expect(policy.toJSON()).toEqual({
      start: '09:00',
      end: '17:00',
      days: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
      timezone: TZ,
    });
  });
});
