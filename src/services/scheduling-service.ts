/**
 * Scheduling Service
 * Sequences calendar I/O around the pure resolver: hydrates busy time,
 * resolves requests and books confirmed meetings
 */

import type {
  CreatedEvent,
  ICalendarProvider,
  MeetingRequest,
  ResolverOptions,
} from '../types/index.js';
import {
  BusinessHoursPolicy,
  BusyIndex,
  Interval,
  normalizeRequest,
  resolve,
} from '../scheduling/index.js';
import type { ConfirmedOutcome, SchedulingOutcome } from '../scheduling/index.js';
import type { ProviderLogger } from '../providers/base.js';
import { defaultLogger } from '../providers/base.js';
import { toISOString } from '../utils/datetime.js';

/**
 * Busy time known within one run, plus the ranges already read from the calendar
 */
export class AvailabilitySnapshot {
  readonly busy: BusyIndex;
  private readonly fetched: Interval[] = [];

  constructor(busy: BusyIndex = new BusyIndex()) {
    this.busy = busy;
  }

  covers(window: Interval): boolean {
    return this.fetched.some(range => range.contains(window));
  }

  markFetched(window: Interval): void {
    this.fetched.push(window);
  }
}

/**
 * Result of checking one interval
 */
export interface AvailabilityCheck {
  interval: Interval;
  withinBusinessHours: boolean;
  conflicts: Interval[];
  available: boolean;
}

export class SchedulingService {
  constructor(
    private calendar: ICalendarProvider,
    readonly policy: BusinessHoursPolicy,
    readonly options: ResolverOptions,
    private logger: ProviderLogger = defaultLogger
  ) {}

  get timezone(): string {
    return this.policy.timezone;
  }

  /**
   * Range of busy time the resolver may read for a request:
   * from one day before the requested start to the end of the search horizon
   */
  searchWindow(request: MeetingRequest): Interval {
    const requested = normalizeRequest(request).setZone(this.timezone);
    const horizon = this.policy.horizonEnd(requested.start, this.options.searchHorizonDays);
    const end = horizon > requested.end ? horizon : requested.end;
    return Interval.of(requested.start.minus({ days: 1 }), end);
  }

  /**
   * Read busy time for a window into the snapshot, unless already read
   */
  async hydrate(snapshot: AvailabilitySnapshot, window: Interval): Promise<void> {
    if (snapshot.covers(window)) {
      return;
    }

    const slots = await this.calendar.getBusySlots(toISOString(window.start), toISOString(window.end));
    let inserted = 0;
    for (const slot of slots) {
      const busy = Interval.tryFromISO(slot.start, slot.end, this.timezone);
      if (busy === null) {
        this.logger.warn(`Ignoring empty or invalid busy slot ${slot.start} - ${slot.end}`);
        continue;
      }
      snapshot.busy.insert(busy);
      inserted++;
    }

    snapshot.markFetched(window);
    this.logger.debug(`Hydrated ${inserted} busy slots for ${window.toString()}`);
  }

  /**
   * Resolve a request against live calendar data
   */
  async resolveRequest(
    request: MeetingRequest,
    snapshot: AvailabilitySnapshot = new AvailabilitySnapshot()
  ): Promise<SchedulingOutcome> {
    await this.hydrate(snapshot, this.searchWindow(request));
    return resolve(request, snapshot.busy, this.policy, this.options);
  }

  /**
   * Create the calendar event of a confirmed outcome and record it as busy
   */
  async book(
    outcome: ConfirmedOutcome,
    request: MeetingRequest,
    snapshot: AvailabilitySnapshot,
    description?: string
  ): Promise<CreatedEvent> {
    const { start, end } = outcome.interval.toISO();
    const event = await this.calendar.createMeeting({
      summary: request.purpose,
      start,
      end,
      timezone: this.timezone,
      attendees: request.attendees,
      description,
    });
    snapshot.busy.insert(outcome.interval);
    return event;
  }

  /**
   * Check one interval against working hours and live busy time
   */
  async checkAvailability(interval: Interval): Promise<AvailabilityCheck> {
    const local = interval.setZone(this.timezone);
    const snapshot = new AvailabilitySnapshot();
    await this.hydrate(snapshot, local);

    const withinBusinessHours = this.policy.isAllowed(local);
    const conflicts = snapshot.busy.overlapping(local);
    return {
      interval: local,
      withinBusinessHours,
      conflicts,
      available: withinBusinessHours && conflicts.length === 0,
    };
  }
}
