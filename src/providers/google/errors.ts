/**
 * Google API error mapping
 */

import type { ProviderType } from '../../types/index.js';
import { AssistantError, ErrorCodes } from '../../utils/error.js';

/**
 * Shape of the gaxios errors thrown by googleapis
 */
interface GoogleApiErrorLike {
  code?: number | string;
  errors?: Array<{ reason?: string; message?: string }>;
  message?: string;
}

function isGoogleApiError(error: unknown): error is GoogleApiErrorLike {
  return typeof error === 'object' && error !== null;
}

/**
 * Convert a Google API error to our error format
 */
export function toAssistantError(
  error: unknown,
  provider: ProviderType,
  operation: string,
  resourceId?: string
): AssistantError {
  if (error instanceof AssistantError) {
    return error;
  }

  const apiError: GoogleApiErrorLike = isGoogleApiError(error) ? error : {};
  const statusCode = typeof apiError.code === 'number' ? apiError.code : Number(apiError.code);
  const reason = apiError.errors?.[0]?.reason;
  const message = apiError.message ?? (typeof error === 'string' ? error : 'Unknown error');
  const cause = error instanceof Error ? error : undefined;

  switch (statusCode) {
    case 401:
      return new AssistantError(`Authentication failed: ${message}`, ErrorCodes.AUTH_FAILED, {
        provider,
        cause,
      });

    case 403:
      if (reason === 'rateLimitExceeded' || reason === 'userRateLimitExceeded') {
        return new AssistantError('Rate limit exceeded', ErrorCodes.RATE_LIMITED, {
          provider,
          retryable: true,
          retryAfter: 60,
          cause,
        });
      }
      return new AssistantError(`Permission denied: ${message}`, ErrorCodes.PERMISSION_DENIED, {
        provider,
        cause,
      });

    case 404:
      return new AssistantError(
        resourceId ? `Not found: ${resourceId}` : 'Resource not found',
        ErrorCodes.RESOURCE_NOT_FOUND,
        { provider, details: { resourceId }, cause }
      );

    case 429:
      return new AssistantError('Too many requests', ErrorCodes.RATE_LIMITED, {
        provider,
        retryable: true,
        retryAfter: 60,
        cause,
      });

    default:
      return new AssistantError(`${operation} failed: ${message}`, ErrorCodes.PROVIDER_UNAVAILABLE, {
        provider,
        retryable: !isNaN(statusCode) && statusCode >= 500,
        details: { statusCode: isNaN(statusCode) ? undefined : statusCode, reason },
        cause,
      });
  }
}
