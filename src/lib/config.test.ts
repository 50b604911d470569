import { describe, it, expect, vi, afterEach } from 'vitest';
import * as path from 'path';
import { GMAIL_READONLY_SCOPES, isValidTimeZone, loadConfig } from './config';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiBaseUrl: 'https://gmail.googleapis.com/gmail/v1',
      userId: 'me',
      messageLimit: 10,
      requestTimeoutMs: 30000,
      timeZone: 'UTC',
      credentialsPath: path.resolve('credentials.json'),
      tokenPath: path.resolve('.tokens', 'token.json'),
      scopes: GMAIL_READONLY_SCOPES,
    });
  });

  it('reads overrides from the environment', () => {
    const cfg = loadConfig({
      GMAIL_API_BASE_URL: 'http://localhost:8080/gmail/v1',
      GMAIL_MESSAGE_LIMIT: '25',
      GMAIL_REQUEST_TIMEOUT_MS: '5000',
      GMAIL_TIMEZONE: 'Europe/Berlin',
      GMAIL_TOKEN_PATH: '/tmp/test-token.json',
    });

    expect(cfg.apiBaseUrl).toBe('http://localhost:8080/gmail/v1');
    expect(cfg.messageLimit).toBe(25);
    expect(cfg.requestTimeoutMs).toBe(5000);
    expect(cfg.timeZone).toBe('Europe/Berlin');
    expect(cfg.tokenPath).toBe('/tmp/test-token.json');
  });

  it('warns and keeps the default for invalid numbers and zones', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const cfg = loadConfig({ GMAIL_MESSAGE_LIMIT: '0', GMAIL_TIMEZONE: 'Mars/Olympus' });

    expect(cfg.messageLimit).toBe(10);
    expect(cfg.timeZone).toBe('UTC');
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('only ever asks for the read-only scope', () => {
    expect(loadConfig({}).scopes).toEqual(['https://www.googleapis.com/auth/gmail.readonly']);
  });
});

describe('isValidTimeZone', () => {
  it('accepts IANA names and "local"', () => {
    expect(isValidTimeZone('UTC')).toBe(true);
    expect(isValidTimeZone('America/New_York')).toBe(true);
    expect(isValidTimeZone('local')).toBe(true);
  });

  it('rejects unknown zones', () => {
    expect(isValidTimeZone('Not/AZone')).toBe(false);
  });
});
