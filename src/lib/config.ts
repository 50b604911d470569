/**
 * Configuration module - loads environment variables
 *
 * Entry points load .env first (`import 'dotenv/config'`), then call
 * loadConfig() once and pass the values down explicitly.
 */

import * as path from 'path';

export const GMAIL_READONLY_SCOPES = ['https://www.googleapis.com/auth/gmail.readonly'];

export interface MailboxConfig {
  apiBaseUrl: string;
  userId: string;
  messageLimit: number;
  requestTimeoutMs: number;
  timeZone: string;          // IANA zone, or "local"
  credentialsPath: string;   // OAuth client secrets downloaded from Cloud Console
  tokenPath: string;         // saved authorized_user token
  scopes: string[];
}

const DEFAULTS = {
  apiBaseUrl: 'https://gmail.googleapis.com/gmail/v1',
  userId: 'me',
  messageLimit: 10,
  requestTimeoutMs: 30_000,
  timeZone: 'UTC',
  credentialsPath: 'credentials.json',
  tokenPath: path.join('.tokens', 'token.json'),
};

export function isValidTimeZone(zone: string): boolean {
  if (zone === 'local') return true;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.warn(`config: ignoring ${key}=${raw} (expected a positive integer), using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MailboxConfig {
  let timeZone = env.GMAIL_TIMEZONE || DEFAULTS.timeZone;
  if (!isValidTimeZone(timeZone)) {
    console.warn(`config: unknown time zone GMAIL_TIMEZONE=${timeZone}, using ${DEFAULTS.timeZone}`);
    timeZone = DEFAULTS.timeZone;
  }

  return {
    apiBaseUrl: env.GMAIL_API_BASE_URL || DEFAULTS.apiBaseUrl,
    userId: env.GMAIL_USER_ID || DEFAULTS.userId,
    messageLimit: positiveInt(env, 'GMAIL_MESSAGE_LIMIT', DEFAULTS.messageLimit),
    requestTimeoutMs: positiveInt(env, 'GMAIL_REQUEST_TIMEOUT_MS', DEFAULTS.requestTimeoutMs),
    timeZone,
    credentialsPath: path.resolve(env.GMAIL_CREDENTIALS_PATH || DEFAULTS.credentialsPath),
    tokenPath: path.resolve(env.GMAIL_TOKEN_PATH || DEFAULTS.tokenPath),
    scopes: GMAIL_READONLY_SCOPES,
  };
}
