import { createHash } from 'crypto';

/**
 * Generate SHA-256 hash of a string
 */
export function hashString(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

