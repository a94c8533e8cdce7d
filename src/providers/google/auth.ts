/**
 * Google OAuth authentication handling (Gmail + Calendar)
 */

import { google } from 'googleapis';
import type { OAuth2Client, Credentials } from 'google-auth-library';
import type { GoogleProviderConfig } from '../../types/index.js';
import { AssistantError, ErrorCodes } from '../../utils/error.js';

/**
 * Required OAuth scopes: read mail, write drafts, read and write the calendar
 */
const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/gmail.compose',
  'https://www.googleapis.com/auth/calendar',
];

/**
 * Create an OAuth2 client from configuration
 */
export function createOAuth2Client(config: GoogleProviderConfig): OAuth2Client {
  const oauth2Client = new google.auth.OAuth2(
    config.clientId,
    config.clientSecret,
    config.redirectUri
  );

  // If we have pre-authorized credentials, set them
  if (config.credentials) {
    const credentials: Credentials = {
      access_token: config.credentials.accessToken,
      refresh_token: config.credentials.refreshToken,
      expiry_date: config.credentials.tokenExpiry
        ? new Date(config.credentials.tokenExpiry).getTime()
        : undefined,
    };
    oauth2Client.setCredentials(credentials);
  }

  return oauth2Client;
}

/**
 * Check if tokens are expired or will expire soon
 */
export function isTokenExpired(oauth2Client: OAuth2Client, bufferMs: number = 60000): boolean {
  const credentials = oauth2Client.credentials;
  if (!credentials.expiry_date) {
    return true;
  }
  return credentials.expiry_date <= Date.now() + bufferMs;
}

/**
 * Refresh the access token
 */
export async function refreshAccessToken(oauth2Client: OAuth2Client): Promise<Credentials> {
  try {
    const { credentials } = await oauth2Client.refreshAccessToken();
    oauth2Client.setCredentials(credentials);
    return credentials;
  } catch (error) {
    throw new AssistantError(
      'Failed to refresh Google access token. Please re-authenticate.',
      ErrorCodes.AUTH_EXPIRED,
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Ensure we have valid credentials, refreshing if necessary
 */
export async function ensureValidCredentials(oauth2Client: OAuth2Client): Promise<void> {
  const credentials = oauth2Client.credentials;

  if (!credentials.access_token) {
    throw new AssistantError(
      'No Google access token available. Set GOOGLE_ACCESS_TOKEN and GOOGLE_REFRESH_TOKEN.',
      ErrorCodes.AUTH_MISSING
    );
  }

  if (isTokenExpired(oauth2Client)) {
    if (!credentials.refresh_token) {
      throw new AssistantError(
        'Access token expired and no refresh token available. Please re-authenticate.',
        ErrorCodes.AUTH_EXPIRED
      );
    }
    await refreshAccessToken(oauth2Client);
  }
}
