import { createChildLogger } from '../utils/logger.js';
import type { PublishOptions, PublishTransport } from './types.js';

const logger = createChildLogger('log-transport');

/**
 * Writes posts to the log instead of a network. Used when no social
 * account is configured.
 */
export class LogTransport implements PublishTransport {
  readonly name = 'log';

  constructor(readonly maxLength: number) {}

  async publish(text: string, options: PublishOptions = {}): Promise<void> {
    const { image } = options;
    logger.info(
      {
        idempotencyKey: options.idempotencyKey,
        length: text.length,
        text,
        image: image
          ? { mimeType: image.mimeType, bytes: image.data.length, alt: image.description }
          : undefined,
      },
      'Post'
    );
  }
}
