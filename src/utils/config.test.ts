import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { getConfig, loadConfig, resetConfig } from './config.js';
import { ErrorCodes } from './error.js';
import { expectErrorCode } from '../test-utils/fixtures.js';

const KEYS = [
  'ASSISTANT_TIMEZONE',
  'WORKING_HOURS_START',
  'WORKING_HOURS_END',
  'WORKING_DAYS',
  'SEARCH_HORIZON_DAYS',
  'MAX_ALTERNATIVES',
  'DEFAULT_MEETING_TIME',
  'MAX_UNREAD',
  'DRY_RUN',
  'LOG_LEVEL',
  'GOOGLE_CLIENT_ID',
  'GOOGLE_CLIENT_SECRET',
  'GOOGLE_REDIRECT_URI',
  'GOOGLE_ACCESS_TOKEN',
  'GOOGLE_REFRESH_TOKEN',
  'GOOGLE_TOKEN_EXPIRY',
  'GOOGLE_CALENDAR_ID',
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'OPENAI_BASE_URL',
  'CLASSIFIER_MAX_BODY_CHARS',
];

beforeEach(() => {
  for (const key of KEYS) {
    vi.stubEnv(key, '');
  }
  resetConfig();
});

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfig();
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig();

    expect(config.scheduling).toEqual({
      timezone: 'America/New_York',
      workingHours: {
        start: '09:00',
        end: '17:00',
        days: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
      },
      resolver: { maxAlternatives: 2, searchHorizonDays: 14 },
      defaultMeetingTime: '14:00',
    });
    expect(config.inbox).toEqual({ maxUnread: 20, dryRun: false });
    expect(config.server.logLevel).toBe('info');
    expect(config.google.calendarId).toBe('primary');
    expect(config.google.credentials).toBeUndefined();
    expect(config.openai).toEqual({
      apiKey: undefined,
      model: 'gpt-4o-mini',
      baseUrl: 'https://api.openai.com/v1',
      temperature: 0.1,
      maxBodyChars: 800,
    });
  });

  it('reads overrides from the environment', () => {
    vi.stubEnv('ASSISTANT_TIMEZONE', 'Europe/Berlin');
    vi.stubEnv('WORKING_HOURS_START', '08:30');
    vi.stubEnv('WORKING_DAYS', 'Monday, wednesday');
    vi.stubEnv('MAX_ALTERNATIVES', '3');
    vi.stubEnv('SEARCH_HORIZON_DAYS', '5');
    vi.stubEnv('DRY_RUN', 'true');
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('GOOGLE_ACCESS_TOKEN', 'test-access');
    vi.stubEnv('GOOGLE_REFRESH_TOKEN', 'test-refresh');

    const config = loadConfig();

    expect(config.scheduling.timezone).toBe('Europe/Berlin');
    expect(config.scheduling.workingHours).toEqual({
      start: '08:30',
      end: '17:00',
      days: ['monday', 'wednesday'],
    });
    expect(config.scheduling.resolver).toEqual({ maxAlternatives: 3, searchHorizonDays: 5 });
    expect(config.inbox.dryRun).toBe(true);
    expect(config.server.logLevel).toBe('debug');
    expect(config.google.credentials).toEqual({
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      tokenExpiry: undefined,
    });
  });

  it('falls back to info for an unknown log level', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    expect(loadConfig().server.logLevel).toBe('info');
  });

  it('rejects an unknown timezone', () => {
    vi.stubEnv('ASSISTANT_TIMEZONE', 'Mars/Olympus_Mons');
    expectErrorCode(() => loadConfig(), ErrorCodes.CONFIGURATION_ERROR);
  });

  it('rejects an unknown working day', () => {
    vi.stubEnv('WORKING_DAYS', 'monday,funday');
    expectErrorCode(() => loadConfig(), ErrorCodes.CONFIGURATION_ERROR);
  });

  it('rejects a malformed working hours time', () => {
    vi.stubEnv('WORKING_HOURS_END', '5pm');
    expectErrorCode(() => loadConfig(), ErrorCodes.CONFIGURATION_ERROR);
  });

  it('rejects a malformed default meeting time', () => {
    vi.stubEnv('DEFAULT_MEETING_TIME', '2pm');
    expectErrorCode(() => loadConfig(), ErrorCodes.CONFIGURATION_ERROR);
  });

  it('rejects a non-positive count', () => {
    vi.stubEnv('MAX_ALTERNATIVES', '0');
    expectErrorCode(() => loadConfig(), ErrorCodes.CONFIGURATION_ERROR);
  });
});

describe('getConfig', () => {
  it('loads once until reset', () => {
    const first = getConfig();
    vi.stubEnv('MAX_UNREAD', '5');
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().inbox.maxUnread).toBe(5);
  });
});
