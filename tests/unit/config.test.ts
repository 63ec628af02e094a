import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigError,
  getFastMode,
  getRequiredDropboxConfig,
  getRequiredInstagramConfig,
  getSchedulerCooldownMs,
  getTimezone,
} from '../../src/config/index.js';
import { getLoggingConfig } from '../../src/logging/config.js';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('rejects an unknown time zone', () => {
    vi.stubEnv('TIMEZONE', 'Mars/Olympus_Mons');
    expect(() => getTimezone()).toThrow(ConfigError);
    expect(() => getTimezone()).toThrow('TIMEZONE: TIMEZONE must be a valid IANA time zone');
  });

  it('reads blank values as unset', () => {
    vi.stubEnv('TIMEZONE', '');
    vi.stubEnv('SCHEDULER_COOLDOWN_MS', '');
    expect(getTimezone()).toBe('America/New_York');
    expect(getSchedulerCooldownMs()).toBe(30000);
  });

  it('coerces numbers and booleans', () => {
    vi.stubEnv('SCHEDULER_COOLDOWN_MS', '1500');
    vi.stubEnv('FAST_MODE', '1');
    expect(getSchedulerCooldownMs()).toBe(1500);
    expect(getFastMode()).toBe(true);
  });

  it('names every missing storage credential', () => {
    vi.stubEnv('DROPBOX_APP_KEY', 'test-key');
    vi.stubEnv('DROPBOX_APP_SECRET', '');
    vi.stubEnv('DROPBOX_REFRESH_TOKEN', '');
    expect(() => getRequiredDropboxConfig()).toThrow(
      'Dropbox credentials are required but not configured: DROPBOX_APP_SECRET, DROPBOX_REFRESH_TOKEN'
    );
  });

  it('builds the provider configs', () => {
    vi.stubEnv('DROPBOX_APP_KEY', 'test-key');
    vi.stubEnv('DROPBOX_APP_SECRET', 'test-secret');
    vi.stubEnv('DROPBOX_REFRESH_TOKEN', 'test-refresh');
    vi.stubEnv('DROPBOX_FOLDER_PATH', '');
    vi.stubEnv('FACEBOOK_ACCESS_TOKEN', 'test-token');
    vi.stubEnv('INSTAGRAM_BUSINESS_ACCOUNT_ID', '17841400000000000');
    vi.stubEnv('GRAPH_API_VERSION', '');

    expect(getRequiredDropboxConfig()).toEqual({
      appKey: 'test-key',
      appSecret: 'test-secret',
      refreshToken: 'test-refresh',
      folderPath: '/slotpost',
    });
    expect(getRequiredInstagramConfig()).toEqual({
      accessToken: 'test-token',
      businessAccountId: '17841400000000000',
      graphApiVersion: 'v20.0',
    });
  });

  it('rejects a non-numeric account id', () => {
    vi.stubEnv('INSTAGRAM_BUSINESS_ACCOUNT_ID', 'my-account');
    expect(() => getRequiredInstagramConfig()).toThrow('INSTAGRAM_BUSINESS_ACCOUNT_ID must be numeric');
  });
});

describe('getLoggingConfig', () => {
  it('defaults to JSON on stderr', () => {
    expect(getLoggingConfig({})).toEqual({ level: 'info', destination: 'stderr', format: 'json' });
  });

  it('quiets down under NODE_ENV=test', () => {
    expect(getLoggingConfig({ NODE_ENV: 'test' }).level).toBe('warn');
  });

  it('honours explicit settings', () => {
    expect(getLoggingConfig({ LOG_LEVEL: 'DEBUG', LOG_DESTINATION: 'stdout', LOG_PRETTY: 'true' })).toEqual({
      level: 'debug',
      destination: 'stdout',
      format: 'pretty',
    });
  });

  it('ignores an unknown level and rejects an unknown format', () => {
    expect(getLoggingConfig({ LOG_LEVEL: 'loud' }).level).toBe('info');
    expect(() => getLoggingConfig({ LOG_FORMAT: 'xml' })).toThrow('LOG_FORMAT must be "json" or "pretty", got "xml"');
  });
});
