import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigError } from '../types/index.js';
import { getConfig, loadConfig, resetConfig } from './index.js';

const CONFIG_KEYS = [
  'ENFORCEMENT_LIST_URL',
  'SCRAPER_TIMEOUT_MS',
  'SCRAPER_RETRIES',
  'SCRAPER_RETRY_DELAY_MS',
  'SCRAPER_USER_AGENT',
  'POSTGRES_HOST',
  'POSTGRES_PORT',
  'POSTGRES_DB',
  'POSTGRES_USER',
  'POSTGRES_PASSWORD',
  'PUBLISHER',
  'POST_MAX_LENGTH',
  'POST_IMAGE_CARDS',
  'MASTODON_BASE_URL',
  'MASTODON_ACCESS_TOKEN',
  'MASTODON_VISIBILITY',
  'LOG_LEVEL',
  'LOG_FORMAT',
];

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of CONFIG_KEYS) {
      delete process.env[key];
    }
    resetConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
  });

  it('should load config with default values', () => {
    const config = loadConfig();

    expect(config.source.listUrl).toBe('https://ico.org.uk/action-weve-taken/enforcement/');
    expect(config.source.timeoutMs).toBe(30000);
    expect(config.source.retries).toBe(3);
    expect(config.postgres.host).toBe('localhost');
    expect(config.postgres.port).toBe(5432);
    expect(config.postgres.database).toBe('enforcement_watch');
    expect(config.publisher.kind).toBe('log');
    expect(config.publisher.maxLength).toBe(500);
    expect(config.publisher.imageCards).toBe(true);
    expect(config.publisher.mastodon.accessToken).toBeUndefined();
    expect(config.publisher.mastodon.visibility).toBe('public');
    expect(config.logLevel).toBe('info');
    expect(config.logFormat).toBe('pretty');
  });

  it('should override defaults with environment variables', () => {
    process.env.ENFORCEMENT_LIST_URL = 'https://regulator.example/action-weve-taken/enforcement/';
    process.env.PUBLISHER = 'mastodon';
    process.env.MASTODON_BASE_URL = 'https://social.example';
    process.env.MASTODON_ACCESS_TOKEN = 'test-secret';
    process.env.MASTODON_VISIBILITY = 'unlisted';

    const config = loadConfig();

    expect(config.source.listUrl).toBe('https://regulator.example/action-weve-taken/enforcement/');
    expect(config.publisher.kind).toBe('mastodon');
    expect(config.publisher.mastodon).toEqual({
      baseUrl: 'https://social.example',
      accessToken: 'test-secret',
      visibility: 'unlisted',
    });
  });

  it('should parse numeric environment variables', () => {
    process.env.POSTGRES_PORT = '5433';
    process.env.SCRAPER_RETRIES = '5';
    process.env.POST_MAX_LENGTH = '280';

    const config = loadConfig();

    expect(config.postgres.port).toBe(5433);
    expect(config.source.retries).toBe(5);
    expect(config.publisher.maxLength).toBe(280);
  });

  it('should reject non-numeric values for numeric settings', () => {
    process.env.POSTGRES_PORT = 'five';

    expect(() => loadConfig()).toThrow('Environment variable POSTGRES_PORT must be a number');
  });

  it('should turn image cards off unless the flag reads true', () => {
    process.env.POST_IMAGE_CARDS = 'false';
    expect(loadConfig().publisher.imageCards).toBe(false);

    process.env.POST_IMAGE_CARDS = 'TRUE';
    expect(loadConfig().publisher.imageCards).toBe(true);

    process.env.POST_IMAGE_CARDS = 'no';
    expect(loadConfig().publisher.imageCards).toBe(false);
  });

  it('should validate config schema', () => {
    process.env.POST_MAX_LENGTH = '50'; // Below minimum of 100

    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('should validate log level', () => {
    process.env.LOG_LEVEL = 'invalid';

    expect(() => loadConfig()).toThrow(/logLevel/);
  });

  it('should require an access token for the mastodon publisher', () => {
    process.env.PUBLISHER = 'mastodon';
    process.env.MASTODON_ACCESS_TOKEN = '   ';

    expect(() => loadConfig()).toThrow(
      'Invalid configuration: publisher.mastodon.accessToken: MASTODON_ACCESS_TOKEN is required when PUBLISHER=mastodon'
    );
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should return the same instance until reset', () => {
    const first = getConfig();

    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
