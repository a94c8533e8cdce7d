/**
 * Abstract base class for mail and calendar providers
 */

import type { ProviderType } from '../types/index.js';
import type { LogLevel } from '../utils/config.js';
import { AssistantError, ErrorCodes, wrapError } from '../utils/error.js';

/**
 * Logger interface for providers and services
 */
export interface ProviderLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger writing to stderr, so stdout stays free for the MCP transport
 */
export function createLogger(level: LogLevel = 'info'): ProviderLogger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.error(`[DEBUG] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.error(`[INFO] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.error(`[WARN] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`[ERROR] ${msg}`, ...args);
    },
  };
}

/**
 * Default console logger
 */
export const defaultLogger: ProviderLogger = createLogger('info');

/**
 * Logger that drops everything (tests, dry runs of library callers)
 */
export const silentLogger: ProviderLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Shared connection lifecycle and error wrapping for providers
 */
export abstract class BaseProvider {
  protected _connected: boolean = false;
  protected logger: ProviderLogger;

  constructor(logger?: ProviderLogger) {
    this.logger = logger ?? defaultLogger;
  }

  abstract get providerType(): ProviderType;

  abstract get displayName(): string;

  /**
   * Connect to the provider - must be implemented by subclasses
   */
  abstract connect(): Promise<void>;

  async disconnect(): Promise<void> {
    this._connected = false;
    this.logger.info(`Disconnected from ${this.displayName}`);
  }

  isConnected(): boolean {
    return this._connected;
  }

  /**
   * Ensure connected before making API calls
   */
  protected ensureConnected(): void {
    if (!this._connected) {
      throw new AssistantError(
        `Provider ${this.displayName} is not connected`,
        ErrorCodes.PROVIDER_NOT_CONFIGURED,
        { provider: this.providerType }
      );
    }
  }

  /**
   * Wrap errors with provider context
   */
  protected wrapError(error: unknown, operation: string): AssistantError {
    return wrapError(error, {
      provider: this.providerType,
      operation,
    });
  }

  /**
   * Execute with error handling
   */
  protected async executeWithErrorHandling<T>(
    operation: string,
    fn: () => Promise<T>
  ): Promise<T> {
    this.ensureConnected();
    try {
      return await fn();
    } catch (error) {
      throw this.wrapError(error, operation);
    }
  }
}
