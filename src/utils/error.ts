/**
 * Error handling utilities for the inbox assistant
 */

import type { ProviderType } from '../types/index.js';

/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  // Authentication errors
  AUTH_EXPIRED: 'AUTH_EXPIRED',
  AUTH_FAILED: 'AUTH_FAILED',
  AUTH_MISSING: 'AUTH_MISSING',

  // Provider errors
  PROVIDER_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  PROVIDER_NOT_CONFIGURED: 'PROVIDER_NOT_CONFIGURED',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  RESOURCE_NOT_FOUND: 'RESOURCE_NOT_FOUND',
  RATE_LIMITED: 'RATE_LIMITED',
  CLASSIFIER_ERROR: 'CLASSIFIER_ERROR',

  // Scheduling input errors
  INVALID_INTERVAL: 'INVALID_INTERVAL',
  INVALID_DURATION: 'INVALID_DURATION',
  INVALID_POLICY: 'INVALID_POLICY',

  // Input validation
  INVALID_INPUT: 'INVALID_INPUT',

  // Network errors
  NETWORK_ERROR: 'NETWORK_ERROR',

  // Internal errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom error class for the inbox assistant
 */
export class AssistantError extends Error {
  public readonly code: ErrorCode;
  public readonly provider?: ProviderType;
  public readonly retryable: boolean;
  public readonly retryAfter?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      provider?: ProviderType;
      retryable?: boolean;
      retryAfter?: number;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AssistantError';
    this.code = code;
    this.provider = options?.provider;
    this.retryable = options?.retryable ?? false;
    this.retryAfter = options?.retryAfter;
    this.details = options?.details;
  }

  /**
   * Convert to a JSON-serializable object for MCP responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      provider: this.provider,
      retryable: this.retryable,
      retryAfter: this.retryAfter,
      details: this.details,
    };
  }

  toUserMessage(): string {
    const prefix = this.provider ? `[${this.provider}] ` : '';
    return `${prefix}${this.message}`;
  }
}

/**
 * Create an invalid interval error (end at or before start)
 */
export function invalidIntervalError(start: string, end: string): AssistantError {
  return new AssistantError(
    `Interval end must be after its start (start: ${start}, end: ${end})`,
    ErrorCodes.INVALID_INTERVAL,
    { details: { start, end } }
  );
}

/**
 * Create an invalid duration error
 */
export function invalidDurationError(durationMinutes: number): AssistantError {
  return new AssistantError(
    `Meeting duration must be positive, got ${durationMinutes} minutes`,
    ErrorCodes.INVALID_DURATION,
    { details: { durationMinutes } }
  );
}

export function invalidPolicyError(
  message: string,
  details?: Record<string, unknown>
): AssistantError {
  return new AssistantError(message, ErrorCodes.INVALID_POLICY, { details });
}

/**
 * Create an invalid input error
 */
export function invalidInputError(
  message: string,
  details?: Record<string, unknown>
): AssistantError {
  return new AssistantError(message, ErrorCodes.INVALID_INPUT, { details });
}

/**
 * Wrap an unknown error as AssistantError
 */
export function wrapError(
  error: unknown,
  context?: {
    provider?: ProviderType;
    operation?: string;
  }
): AssistantError {
  if (error instanceof AssistantError) {
    return error;
  }

  const message =
    error instanceof Error
      ? error.message
      : typeof error === 'string'
        ? error
        : 'An unexpected error occurred';

  return new AssistantError(
    context?.operation ? `${context.operation}: ${message}` : message,
    ErrorCodes.INTERNAL_ERROR,
    {
      provider: context?.provider,
      cause: error instanceof Error ? error : undefined,
    }
  );
}

/**
 * Format an AssistantError for MCP response
 */
export function formatErrorForMCP(error: AssistantError): string {
  const lines: string[] = [];

  lines.push(`Error: ${error.message}`);
  lines.push(`Code: ${error.code}`);

  if (error.provider) {
    lines.push(`Provider: ${error.provider}`);
  }

  if (error.retryable) {
    lines.push('This error is retryable.');
    if (error.retryAfter) {
      lines.push(`Retry after: ${error.retryAfter} seconds`);
    }
  }

  if (error.details) {
    lines.push(`Details: ${JSON.stringify(error.details)}`);
  }

  return lines.join('\n');
}
