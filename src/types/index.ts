import { z } from 'zod';

// ============================================================
// Configuration Types
// ============================================================

export const ConfigSchema = z
  .object({
    source: z.object({
      listUrl: z.string().url(),
      timeoutMs: z.number().min(1000).max(300000),
      retries: z.number().min(1).max(10),
      retryDelayMs: z.number().min(0).max(60000),
      userAgent: z.string().min(1),
    }),
    postgres: z.object({
      host: z.string(),
      port: z.number(),
      database: z.string(),
      user: z.string(),
      password: z.string(),
    }),
    publisher: z.object({
      kind: z.enum(['log', 'mastodon']),
      maxLength: z.number().min(100).max(5000),
      imageCards: z.boolean(),
      mastodon: z.object({
        baseUrl: z.string().url(),
        accessToken: z.string().optional(),
        visibility: z.enum(['public', 'unlisted', 'private', 'direct']),
      }),
    }),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
    logFormat: z.enum(['pretty', 'json']),
  })
  .superRefine((config, ctx) => {
    if (config.publisher.kind === 'mastodon' && !config.publisher.mastodon.accessToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['publisher', 'mastodon', 'accessToken'],
        message: 'MASTODON_ACCESS_TOKEN is required when PUBLISHER=mastodon',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================
// Error Types
// ============================================================

export class WatchError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'WatchError';
  }
}

/**
 * The source could not be retrieved. Fatal to the run.
 */
export class FetchError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

/**
 * A single candidate lacks usable identity fields. Skipped, never fatal.
 */
export class NormalizationError extends WatchError {
  constructor(
    message: string,
    public field?: string,
    details?: unknown
  ) {
    super(message, 'NORMALIZATION_ERROR', details);
    this.name = 'NormalizationError';
  }
}

/**
 * The durable store rejected a read or write. Fatal to the run.
 */
export class StoreError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORE_ERROR', details);
    this.name = 'StoreError';
  }
}

/**
 * A post could not be delivered. Recorded as a delivery gap.
 */
export class PublishError extends WatchError {
  constructor(
    message: string,
    public status?: number,
    details?: unknown
  ) {
    super(message, 'PUBLISH_ERROR', details);
    this.name = 'PublishError';
  }
}

export class ConfigError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
