import { Config, ConfigError } from '../types/index.js';
import { LogTransport } from './log-transport.js';
import { MastodonTransport } from './mastodon-transport.js';
import type { PublishTransport } from './types.js';

export * from './types.js';
export { LogTransport } from './log-transport.js';
export { MastodonTransport } from './mastodon-transport.js';
export type { MastodonTransportOptions } from './mastodon-transport.js';

/**
 * Build the transport selected by configuration
 */
export function createTransport(config: Config['publisher']): PublishTransport {
  switch (config.kind) {
    case 'log':
      return new LogTransport(config.maxLength);
    case 'mastodon': {
      const { accessToken } = config.mastodon;
      if (!accessToken) {
        throw new ConfigError('MASTODON_ACCESS_TOKEN is required when PUBLISHER=mastodon');
      }
      return new MastodonTransport({
        baseUrl: config.mastodon.baseUrl,
        accessToken,
        visibility: config.mastodon.visibility,
        maxLength: config.maxLength,
      });
    }
  }
}
