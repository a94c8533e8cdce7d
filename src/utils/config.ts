/**
 * Configuration loading and validation for the inbox assistant
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type {
  GoogleProviderConfig,
  OpenAIClassifierConfig,
  ResolverOptions,
  WorkingHours,
} from '../types/index.js';
import { ClockTimeSchema, WorkingHoursSchema } from '../schemas/common.js';
import { AssistantError, ErrorCodes } from './error.js';
import { isValidTimezone } from './datetime.js';

// Load environment variables
loadEnv();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  logLevel: LogLevel;
}

/**
 * Scheduling configuration
 */
export interface SchedulingConfig {
  /** Organizer's IANA timezone */
  timezone: string;
  workingHours: WorkingHours;
  resolver: ResolverOptions;
  /** Start time used when a request names no date or time (HH:mm) */
  defaultMeetingTime: string;
}

/**
 * Inbox processing configuration
 */
export interface InboxConfig {
  maxUnread: number;
  /** Classify and resolve, but create no events or drafts */
  dryRun: boolean;
}

/**
 * Full application configuration
 */
export interface AppConfig {
  server: ServerConfig;
  scheduling: SchedulingConfig;
  inbox: InboxConfig;
  google: GoogleProviderConfig;
  openai: OpenAIClassifierConfig;
}

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Get environment variable with optional default
 */
function getEnv(key: string): string | undefined;
function getEnv(key: string, defaultValue: string): string;
function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Get boolean environment variable
 */
function getBoolEnv(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get positive integer environment variable
 */
function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw configurationError(`${key} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function configurationError(message: string): AssistantError {
  return new AssistantError(message, ErrorCodes.CONFIGURATION_ERROR);
}

/**
 * Load working hours from environment
 */
function loadWorkingHours(): WorkingHours {
  const days = getEnv('WORKING_DAYS', 'monday,tuesday,wednesday,thursday,friday')
    .split(',')
    .map(d => d.trim().toLowerCase())
    .filter(d => d.length > 0);

  const parsed = WorkingHoursSchema.safeParse({
    start: getEnv('WORKING_HOURS_START', '09:00'),
    end: getEnv('WORKING_HOURS_END', '17:00'),
    days,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw configurationError(`Invalid working hours configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Start time used for meeting requests that name no date or time
 */
function loadDefaultMeetingTime(): string {
  const value = getEnv('DEFAULT_MEETING_TIME', '14:00');
  const parsed = ClockTimeSchema.safeParse(value);
  if (!parsed.success) {
    throw configurationError(`DEFAULT_MEETING_TIME must be in HH:mm format: ${value}`);
  }
  return parsed.data;
}

/**
 * Load Google provider configuration from environment
 */
function loadGoogleConfig(): GoogleProviderConfig {
  const accessToken = getEnv('GOOGLE_ACCESS_TOKEN');
  const refreshToken = getEnv('GOOGLE_REFRESH_TOKEN');

  return {
    clientId: getEnv('GOOGLE_CLIENT_ID'),
    clientSecret: getEnv('GOOGLE_CLIENT_SECRET'),
    redirectUri: getEnv('GOOGLE_REDIRECT_URI'),
    calendarId: getEnv('GOOGLE_CALENDAR_ID', 'primary'),
    credentials:
      accessToken && refreshToken
        ? {
            accessToken,
            refreshToken,
            tokenExpiry: getEnv('GOOGLE_TOKEN_EXPIRY'),
          }
        : undefined,
  };
}

/**
 * Load full application configuration
 */
export function loadConfig(): AppConfig {
  const timezone = getEnv('ASSISTANT_TIMEZONE', 'America/New_York');
  if (!isValidTimezone(timezone)) {
    throw configurationError(`ASSISTANT_TIMEZONE is not a valid IANA timezone: ${timezone}`);
  }

  const logLevel = LogLevelSchema.safeParse(getEnv('LOG_LEVEL', 'info'));

  return {
    server: {
      name: getEnv('MCP_SERVER_NAME', 'inbox-assistant'),
      version: getEnv('MCP_SERVER_VERSION', '1.0.0'),
      logLevel: logLevel.success ? logLevel.data : 'info',
    },
    scheduling: {
      timezone,
      workingHours: loadWorkingHours(),
      resolver: {
        maxAlternatives: getNumberEnv('MAX_ALTERNATIVES', 2),
        searchHorizonDays: getNumberEnv('SEARCH_HORIZON_DAYS', 14),
      },
      defaultMeetingTime: loadDefaultMeetingTime(),
    },
    inbox: {
      maxUnread: getNumberEnv('MAX_UNREAD', 20),
      dryRun: getBoolEnv('DRY_RUN', false),
    },
    google: loadGoogleConfig(),
    openai: {
      apiKey: getEnv('OPENAI_API_KEY'),
      model: getEnv('OPENAI_MODEL', 'gpt-4o-mini'),
      baseUrl: getEnv('OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      temperature: 0.1,
      maxBodyChars: getNumberEnv('CLASSIFIER_MAX_BODY_CHARS', 800),
    },
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get configuration (loads once)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
