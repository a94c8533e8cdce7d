/**
 * Free/busy index
 *
 * Sorted, non-overlapping busy intervals of the organizer. Touching intervals
 * are coalesced, so the ends are sorted as well as the starts and overlap
 * queries can binary search.
 */

import { Interval } from './interval.js';

export class BusyIndex {
  private readonly intervals: Interval[] = [];

  /**
   * Build an index from intervals in any order
   */
  static from(intervals: Iterable<Interval>): BusyIndex {
    const index = new BusyIndex();
    for (const interval of intervals) {
      index.insert(interval);
    }
    return index;
  }

  get size(): number {
    return this.intervals.length;
  }

  toArray(): readonly Interval[] {
    return [...this.intervals];
  }

  /**
   * True iff any busy interval overlaps the query
   */
  overlapsAny(query: Interval): boolean {
    const i = this.firstEndingAfter(query.start);
    const candidate = this.intervals[i];
    return candidate !== undefined && candidate.start < query.end;
  }

  /**
   * Busy intervals overlapping the query, in order
   */
  overlapping(query: Interval): Interval[] {
    const result: Interval[] = [];
    for (let i = this.firstEndingAfter(query.start); i < this.intervals.length; i++) {
      const interval = this.intervals[i];
      if (interval === undefined || interval.start >= query.end) {
        break;
      }
      result.push(interval);
    }
    return result;
  }

  /**
   * Insert a busy interval, merging it with every neighbour it overlaps or touches.
   * Inserting an interval already covered leaves the index unchanged.
   */
  insert(interval: Interval): void {
    // First entry whose end reaches the new start (touching counts)
    const lo = this.lowerBound(entry => entry.end >= interval.start);
    // First entry starting strictly after the new end
    const hi = this.lowerBound(entry => entry.start > interval.end);

    let merged = interval;
    for (let i = lo; i < hi; i++) {
      const entry = this.intervals[i];
      if (entry !== undefined) {
        merged = merged.span(entry);
      }
    }

    this.intervals.splice(lo, hi - lo, merged);
  }

  equals(other: BusyIndex): boolean {
    if (other.size !== this.size) {
      return false;
    }
    const theirs = other.toArray();
    return this.intervals.every((interval, i) => {
      const counterpart = theirs[i];
      return counterpart !== undefined && interval.equals(counterpart);
    });
  }

  private firstEndingAfter(instant: Interval['start']): number {
    return this.lowerBound(entry => entry.end > instant);
  }

  /**
   * Index of the first entry satisfying a predicate that is monotone over the list
   */
  private lowerBound(predicate: (entry: Interval) => boolean): number {
    let low = 0;
    let high = this.intervals.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const entry = this.intervals[mid];
      if (entry !== undefined && predicate(entry)) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }
    return low;
  }
}
