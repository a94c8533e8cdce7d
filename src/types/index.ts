/**
 * Type exports for the inbox assistant
 */

// Scheduling types
export type {
  DayOfWeek,
  WorkingHours,
  ConflictReason,
  MeetingRequest,
  ResolverOptions,
} from './scheduling.js';

export { DEFAULT_RESOLVER_OPTIONS } from './scheduling.js';

// Mail types
export type {
  MailMessage,
  ResponsePriority,
  MessageType,
  MeetingIntent,
  MessageAnalysis,
  DraftParams,
} from './mail.js';

// Provider types
export type {
  ProviderType,
  TimeSlot,
  GoogleCredentials,
  GoogleProviderConfig,
  OpenAIClassifierConfig,
  CreatedEvent,
  CreateMeetingParams,
  IMailProvider,
  ICalendarProvider,
  IMessageClassifier,
} from './provider.js';
