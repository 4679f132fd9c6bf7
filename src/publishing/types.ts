/**
 * Types for outbound publishing transports
 */

/**
 * Picture attached to a post
 */
export interface PublishImage {
  data: Buffer;
  mimeType: string;
  /** Alt text */
  description: string;
}

export interface PublishOptions {
  /** Lets transports that support it reject a repeated submission */
  idempotencyKey?: string;
  image?: PublishImage;
}

/**
 * A sink for public posts. Resolves when the post is accepted and throws
 * a PublishError otherwise.
 */
export interface PublishTransport {
  readonly name: string;
  /** Longest text the destination accepts */
  readonly maxLength: number;
  publish(text: string, options?: PublishOptions): Promise<void>;
}
