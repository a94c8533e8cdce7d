import { describe, it, expect } from 'vitest';
import { BusyIndex } from './busy-index.js';
import { isoPairs, slot } from '../test-utils/fixtures.js';

describe('BusyIndex', () => {
  it('keeps intervals sorted regardless of insertion order', () => {
    const index = BusyIndex.from([
      slot('2024-01-15T14:00', '2024-01-15T15:00'),
      slot('2024-01-15T09:00', '2024-01-15T10:00'),
      slot('2024-01-15T11:00', '2024-01-15T12:00'),
    ]);

    expect(isoPairs(index.toArray()).map(pair => pair.start)).toEqual([
      '2024-01-15T09:00:00.000-05:00',
      '2024-01-15T11:00:00.000-05:00',
      '2024-01-15T14:00:00.000-05:00',
    ]);
  });

  it('merges overlapping intervals', () => {
    const index = BusyIndex.from([
      slot('2024-01-15T09:00', '2024-01-15T10:30'),
      slot('2024-01-15T10:00', '2024-01-15T11:00'),
    ]);

    expect(index.size).toBe(1);
    expect(isoPairs(index.toArray())).toEqual([
      { start: '2024-01-15T09:00:00.000-05:00', end: '2024-01-15T11:00:00.000-05:00' },
    ]);
  });

  it('coalesces touching intervals', () => {
    const index = BusyIndex.from([
      slot('2024-01-15T09:00', '2024-01-15T10:00'),
      slot('2024-01-15T10:00', '2024-01-15T11:00'),
    ]);

    expect(index.size).toBe(1);
    expect(index.toArray()[0]?.equals(slot('2024-01-15T09:00', '2024-01-15T11:00'))).toBe(true);
  });

  it('bridges several neighbours with one insertion', () => {
    const index = BusyIndex.from([
      slot('2024-01-15T09:00', '2024-01-15T09:30'),
      slot('2024-01-15T10:00', '2024-01-15T10:30'),
      slot('2024-01-15T11:00', '2024-01-15T11:30'),
      slot('2024-01-15T15:00', '2024-01-15T16:00'),
    ]);

    index.insert(slot('2024-01-15T09:15', '2024-01-15T11:00'));

    expect(isoPairs(index.toArray())).toEqual([
      { start: '2024-01-15T09:00:00.000-05:00', end: '2024-01-15T11:30:00.000-05:00' },
      { start: '2024-01-15T15:00:00.000-05:00', end: '2024-01-15T16:00:00.000-05:00' },
    ]);
  });

  it('is idempotent under repeated insertion', () => {
    const base = [
      slot('2024-01-15T09:00', '2024-01-15T10:00'),
      slot('2024-01-15T13:00', '2024-01-15T14:00'),
    ];
    const meeting = slot('2024-01-15T11:00', '2024-01-15T11:30');

    const once = BusyIndex.from(base);
    once.insert(meeting);
    const twice = BusyIndex.from(base);
    twice.insert(meeting);
    twice.insert(meeting);

    expect(twice.equals(once)).toBe(true);
    expect(twice.size).toBe(3);
  });

  it('leaves the index unchanged when inserting a covered interval', () => {
    const index = BusyIndex.from([slot('2024-01-15T09:00', '2024-01-15T12:00')]);
    index.insert(slot('2024-01-15T10:00', '2024-01-15T11:00'));
    expect(isoPairs(index.toArray())).toEqual([
      { start: '2024-01-15T09:00:00.000-05:00', end: '2024-01-15T12:00:00.000-05:00' },
    ]);
  });

  describe('overlap queries', () => {
    const index = BusyIndex.from([
      slot('2024-01-15T09:00', '2024-01-15T10:00'),
      slot('2024-01-15T11:00', '2024-01-15T12:00'),
      slot('2024-01-15T14:00', '2024-01-15T15:00'),
    ]);

    it('finds an overlapping busy interval', () => {
      expect(index.overlapsAny(slot('2024-01-15T11:30', '2024-01-15T12:30'))).toBe(true);
    });

    it('ignores intervals that only touch busy time', () => {
      expect(index.overlapsAny(slot('2024-01-15T10:00', '2024-01-15T11:00'))).toBe(false);
      expect(index.overlapsAny(slot('2024-01-15T12:00', '2024-01-15T14:00'))).toBe(false);
    });

    it('answers false before, between and after busy time', () => {
      expect(index.overlapsAny(slot('2024-01-15T07:00', '2024-01-15T08:00'))).toBe(false);
      expect(index.overlapsAny(slot('2024-01-15T12:30', '2024-01-15T13:30'))).toBe(false);
      expect(index.overlapsAny(slot('2024-01-15T16:00', '2024-01-15T17:00'))).toBe(false);
    });

    it('lists every overlapping interval in order', () => {
      const hits = index.overlapping(slot('2024-01-15T09:30', '2024-01-15T14:30'));
      expect(isoPairs(hits).map(pair => pair.start)).toEqual([
        '2024-01-15T09:00:00.000-05:00',
        '2024-01-15T11:00:00.000-05:00',
        '2024-01-15T14:00:00.000-05:00',
      ]);
    });

    it('answers false on an empty index', () => {
      expect(new BusyIndex().overlapsAny(slot('2024-01-15T09:00', '2024-01-15T10:00'))).toBe(false);
    });
  });
});
