import { config as dotenvConfig } from 'dotenv';
import { Config, ConfigError, ConfigSchema } from '../types/index.js';

dotenvConfig();

const DEFAULT_USER_AGENT = 'enforcement-watch/1.0 (+https://example.org/enforcement-watch)';

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOptionalString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function getEnvBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === 'true';
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

export function loadConfig(): Config {
  const rawConfig = {
    source: {
      listUrl: getEnvString(
        'ENFORCEMENT_LIST_URL',
        'https://ico.org.uk/action-weve-taken/enforcement/'
      ),
      timeoutMs: getEnvNumber('SCRAPER_TIMEOUT_MS', 30000),
      retries: getEnvNumber('SCRAPER_RETRIES', 3),
      retryDelayMs: getEnvNumber('SCRAPER_RETRY_DELAY_MS', 1000),
      userAgent: getEnvString('SCRAPER_USER_AGENT', DEFAULT_USER_AGENT),
    },
    postgres: {
      host: getEnvString('POSTGRES_HOST', 'localhost'),
      port: getEnvNumber('POSTGRES_PORT', 5432),
      database: getEnvString('POSTGRES_DB', 'enforcement_watch'),
      user: getEnvString('POSTGRES_USER', 'postgres'),
      password: getEnvString('POSTGRES_PASSWORD', 'postgres'),
    },
    publisher: {
      kind: getEnvString('PUBLISHER', 'log'),
      maxLength: getEnvNumber('POST_MAX_LENGTH', 500),
      imageCards: getEnvBoolean('POST_IMAGE_CARDS', true),
      mastodon: {
        baseUrl: getEnvString('MASTODON_BASE_URL', 'https://mastodon.social'),
        accessToken: getEnvOptionalString('MASTODON_ACCESS_TOKEN'),
        visibility: getEnvString('MASTODON_VISIBILITY', 'public'),
      },
    },
    logLevel: getEnvString('LOG_LEVEL', 'info'),
    logFormat: getEnvString('LOG_FORMAT', 'pretty'),
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`, parsed.error.issues);
  }
  return parsed.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
