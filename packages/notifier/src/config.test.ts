// Tests for environment configuration

import { describe, it, expect } from 'vitest';
import { ConfigError } from '@engine-watch/runtime';
import { DEFAULT_FEED_URL, DEFAULT_SITE_URL, loadConfig } from './config.js';

const REQUIRED = {
  TCEC_CONFIG_URL: 'https://example.test/users.json',
  TCEC_NOTIFY_WEBHOOK: 'https://example.test/hooks/notify',
};

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the environment to be rejected');
}

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig(REQUIRED)).toEqual({
      configUrl: 'https://example.test/users.json',
      notifyWebhook: 'https://example.test/hooks/notify',
      logWebhook: undefined,
      feedUrl: DEFAULT_FEED_URL,
      siteUrl: DEFAULT_SITE_URL,
      pollIntervalMs: 30000,
      stateFile: 'state.bin',
      databaseUrl: undefined,
    });
  });

  it('reads optional settings', () => {
    const config = loadConfig({
      ...REQUIRED,
      TCEC_LOG_WEBHOOK: 'https://example.test/hooks/log',
      TCEC_FEED_URL: 'https://example.test/live.pgn',
      TCEC_POLL_INTERVAL_MS: '5000',
      TCEC_STATE_FILE: '/var/lib/engine-watch/state.bin',
      TCEC_DATABASE_URL: 'postgres://localhost/engine_watch',
    });

    expect(config).toMatchObject({
      logWebhook: 'https://example.test/hooks/log',
      feedUrl: 'https://example.test/live.pgn',
      pollIntervalMs: 5000,
      stateFile: '/var/lib/engine-watch/state.bin',
      databaseUrl: 'postgres://localhost/engine_watch',
    });
  });

  it('treats empty variables as unset', () => {
    const config = loadConfig({ ...REQUIRED, TCEC_LOG_WEBHOOK: '', TCEC_POLL_INTERVAL_MS: '' });
    expect(config.logWebhook).toBeUndefined();
    expect(config.pollIntervalMs).toBe(30000);
  });

  it('lists every missing variable', () => {
    const error = configError({});
    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.issues).toEqual(['TCEC_CONFIG_URL: Required', 'TCEC_NOTIFY_WEBHOOK: Required']);
    expect(error.message).toBe(
      'Invalid environment: TCEC_CONFIG_URL: Required; TCEC_NOTIFY_WEBHOOK: Required'
    );
  });

  it('rejects a URL that does not parse', () => {
    expect(configError({ ...REQUIRED, TCEC_SITE_URL: 'tcec' }).issues).toEqual([
      'TCEC_SITE_URL: Invalid url',
    ]);
  });

  it('rejects a poll interval that is not positive', () => {
    expect(configError({ ...REQUIRED, TCEC_POLL_INTERVAL_MS: '0' }).issues).toEqual([
      'TCEC_POLL_INTERVAL_MS: Number must be greater than 0',
    ]);
  });
});
