/**
 * Provider wiring
 */

import type { AppConfig } from '../utils/config.js';
import type { ICalendarProvider, IMailProvider, IMessageClassifier } from '../types/index.js';
import type { ProviderLogger } from './base.js';
import { GmailProvider, GoogleCalendarProvider } from './google/index.js';
import { OpenAIClassifier } from './openai/classifier.js';

export { BaseProvider, createLogger, defaultLogger, silentLogger } from './base.js';
export type { ProviderLogger } from './base.js';
export { GmailProvider, GoogleCalendarProvider } from './google/index.js';
export { OpenAIClassifier } from './openai/classifier.js';

export interface Providers {
  mail: IMailProvider;
  calendar: ICalendarProvider;
  classifier: IMessageClassifier;
}

/**
 * Build the configured providers (not yet connected)
 */
export function createProviders(config: AppConfig, logger: ProviderLogger): Providers {
  return {
    mail: new GmailProvider(config.google, logger),
    calendar: new GoogleCalendarProvider(config.google, logger),
    classifier: new OpenAIClassifier(config.openai, logger),
  };
}

/**
 * Connect mail and calendar providers
 */
export async function connectProviders(providers: Providers, logger: ProviderLogger): Promise<void> {
  await providers.calendar.connect();
  await providers.mail.connect();
  logger.info('All providers connected');
}

/**
 * Disconnect providers, logging rather than throwing on failure
 */
export async function disconnectProviders(providers: Providers, logger: ProviderLogger): Promise<void> {
  for (const provider of [providers.mail, providers.calendar]) {
    try {
      await provider.disconnect();
    } catch (error) {
      logger.error(`Error disconnecting ${provider.providerType}:`, error);
    }
  }
}
