import { describe, it, expect } from 'vitest';
import { Interval } from './interval.js';
import { ErrorCodes } from '../utils/error.js';
import { at, expectErrorCode, slot } from '../test-utils/fixtures.js';

describe('Interval', () => {
  it('constructs a half-open interval', () => {
    const interval = slot('2024-01-15T10:00', '2024-01-15T11:00');
    expect(interval.toISO()).toEqual({
      start: '2024-01-15T10:00:00.000-05:00',
      end: '2024-01-15T11:00:00.000-05:00',
    });
    expect(interval.durationMinutes()).toBe(60);
  });

  it('rejects an end equal to the start', () => {
    expectErrorCode(
      () => Interval.of(at('2024-01-15T10:00'), at('2024-01-15T10:00')),
      ErrorCodes.INVALID_INTERVAL
    );
  });

  it('rejects an end before the start', () => {
    expectErrorCode(
      () => Interval.of(at('2024-01-15T11:00'), at('2024-01-15T10:00')),
      ErrorCodes.INVALID_INTERVAL
    );
  });

  it('rejects unparseable instants', () => {
    expectErrorCode(
      () => Interval.fromISO('not-a-date', '2024-01-15T10:00', 'America/New_York'),
      ErrorCodes.INVALID_INTERVAL
    );
  });

  describe('overlaps', () => {
    const morning = slot('2024-01-15T09:00', '2024-01-15T10:00');

    it('detects partial overlap in both directions', () => {
      const later = slot('2024-01-15T09:30', '2024-01-15T10:30');
      expect(morning.overlaps(later)).toBe(true);
      expect(later.overlaps(morning)).toBe(true);
    });

    it('treats shared endpoints as non-overlapping', () => {
      const next = slot('2024-01-15T10:00', '2024-01-15T11:00');
      expect(morning.overlaps(next)).toBe(false);
      expect(next.overlaps(morning)).toBe(false);
    });

    it('is symmetric for every pair', () => {
      const intervals = [
        morning,
        slot('2024-01-15T08:00', '2024-01-15T09:00'),
        slot('2024-01-15T08:30', '2024-01-15T12:00'),
        slot('2024-01-15T09:15', '2024-01-15T09:45'),
        slot('2024-01-15T10:00', '2024-01-15T10:30'),
        slot('2024-01-15T13:00', '2024-01-15T14:00'),
      ];
      for (const a of intervals) {
        for (const b of intervals) {
          expect(a.overlaps(b)).toBe(b.overlaps(a));
        }
      }
    });

    it('detects containment', () => {
      const inner = slot('2024-01-15T09:15', '2024-01-15T09:45');
      expect(morning.overlaps(inner)).toBe(true);
      expect(morning.contains(inner)).toBe(true);
      expect(inner.contains(morning)).toBe(false);
    });
  });

  it('keeps exact elapsed time across a daylight-saving change', () => {
    // 2024-03-10 02:00 jumps to 03:00 in New York
    const interval = Interval.after(at('2024-03-10T01:30'), { minutes: 60 });
    expect(interval.end.toISO()).toBe('2024-03-10T03:30:00.000-04:00');
    expect(interval.durationMinutes()).toBe(60);
  });

  it('spans two intervals', () => {
    const a = slot('2024-01-15T09:00', '2024-01-15T10:00');
    const b = slot('2024-01-15T09:30', '2024-01-15T11:00');
    expect(a.span(b).equals(slot('2024-01-15T09:00', '2024-01-15T11:00'))).toBe(true);
  });
});
