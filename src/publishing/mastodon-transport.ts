import { z } from 'zod';
import { Config, PublishError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import type { PublishImage, PublishOptions, PublishTransport } from './types.js';

const logger = createChildLogger('mastodon');

const MediaAttachmentSchema = z.object({ id: z.string() });

export interface MastodonTransportOptions {
  baseUrl: string;
  accessToken: string;
  visibility: Config['publisher']['mastodon']['visibility'];
  maxLength: number;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Posts statuses through the Mastodon REST API
 */
export class MastodonTransport implements PublishTransport {
  readonly name = 'mastodon';
  readonly maxLength: number;
  private statusesUrl: string;
  private mediaUrl: string;

  constructor(private options: MastodonTransportOptions) {
    this.maxLength = options.maxLength;
    this.statusesUrl = new URL('/api/v1/statuses', options.baseUrl).href;
    this.mediaUrl = new URL('/api/v2/media', options.baseUrl).href;
  }

  async publish(text: string, options: PublishOptions = {}): Promise<void> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.accessToken}`,
      'Content-Type': 'application/json',
    };
    if (options.idempotencyKey) {
      headers['Idempotency-Key'] = options.idempotencyKey;
    }

    const mediaId = options.image ? await this.uploadImage(options.image) : undefined;
    const body: Record<string, unknown> = { status: text, visibility: this.options.visibility };
    if (mediaId) {
      body.media_ids = [mediaId];
    }

    const response = await this.request(this.statusesUrl, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      throw new PublishError(
        `Mastodon rejected status: HTTP ${response.status} ${await this.errorBody(response)}`.trim(),
        response.status
      );
    }

    logger.debug({ status: response.status, length: text.length, mediaId }, 'Status posted');
  }

  /**
   * Upload an attachment; on failure the status goes out without it
   */
  private async uploadImage(image: PublishImage): Promise<string | undefined> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(image.data)], { type: image.mimeType }), 'card.png');
    form.append('description', image.description);

    try {
      const response = await this.request(this.mediaUrl, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.options.accessToken}` },
        body: form,
      });
      if (!response.ok) {
        throw new PublishError(
          `Mastodon rejected media: HTTP ${response.status} ${await this.errorBody(response)}`.trim(),
          response.status
        );
      }

      const media = MediaAttachmentSchema.parse(await response.json());
      return media.id;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Image upload failed; posting without it');
      return undefined;
    }
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout ?? 30000);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      throw new PublishError(`Mastodon request failed: ${errorMessage(error)}`, undefined, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async errorBody(response: Response): Promise<string> {
    try {
      return (await response.text()).slice(0, 200);
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'Could not read error response body');
      return '';
    }
  }
}
