/**
 * Service exports
 */

export {
  buildMeetingRequest,
  nextWorkingDayAt,
  parseMeetingDate,
  parseTimeOfDay,
} from './meeting-request.js';
export type { BuildRequestContext } from './meeting-request.js';

export { composeReply, describeOutcome, replySubject } from './reply-composer.js';
export type { ReplyAddendum, ReplyContext, UnreadableTime } from './reply-composer.js';

export { AvailabilitySnapshot, SchedulingService } from './scheduling-service.js';
export type { AvailabilityCheck } from './scheduling-service.js';

export { InboxService } from './inbox-service.js';
export type {
  InboxRunOptions,
  InboxRunReport,
  InboxSettings,
  MessageResult,
  MessageStatus,
} from './inbox-service.js';
