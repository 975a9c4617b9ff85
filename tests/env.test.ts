/**
 * Unit tests for environment configuration
 * Run with: npm test
 */
import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadEnv, maskToken } from '../src/config/env';

describe('loadEnv', () => {
  it('requires BOT_TOKEN', () => {
    expect(() => loadEnv({})).toThrow('Missing required environment variable: BOT_TOKEN');
    expect(() => loadEnv({ BOT_TOKEN: '   ' })).toThrow('Missing required environment variable: BOT_TOKEN');
  });

  it('fills defaults for optional settings', () => {
    const env = loadEnv({ BOT_TOKEN: 'test-secret' });
    expect(env).toMatchObject({
      BOT_TOKEN: 'test-secret',
      DISPLAY_TIMEZONE: 'UTC',
      TRANSPORT_TIMEOUT_MS: 15000,
      WIZARD_SESSION_TTL_MINUTES: 30,
      LOG_LEVEL: 'info',
    });
    expect(path.isAbsolute(env.DATA_FILE)).toBe(true);
    expect(path.basename(env.DATA_FILE)).toBe('bot_data.json');
  });

  it('reads overrides', () => {
    const env = loadEnv({
      BOT_TOKEN: 'test-secret',
      DATA_FILE: '/var/lib/bot/data.json',
      DISPLAY_TIMEZONE: 'Europe/Berlin',
      TRANSPORT_TIMEOUT_MS: '5000',
      LOG_LEVEL: 'DEBUG',
    });
    expect(env.DATA_FILE).toBe('/var/lib/bot/data.json');
    expect(env.DISPLAY_TIMEZONE).toBe('Europe/Berlin');
    expect(env.TRANSPORT_TIMEOUT_MS).toBe(5000);
    expect(env.LOG_LEVEL).toBe('debug');
  });

  it('rejects non-positive numbers', () => {
    expect(() => loadEnv({ BOT_TOKEN: 'test-secret', WIZARD_SESSION_TTL_MINUTES: '0' })).toThrow(
      'Invalid value for WIZARD_SESSION_TTL_MINUTES: "0" (expected a positive integer)'
    );
  });
});

describe('maskToken', () => {
  it('keeps only the ends of the token', () => {
    expect(maskToken('123456:test-secret-value')).toBe('123456...alue');
    expect(maskToken('test-secret')).toBe('test...');
  });
});
