/**
 * Text sanitization utilities for scraped page text
 */

/**
 * Strip control characters and collapse all runs of whitespace to one space
 */
export function sanitizeText(text: string): string {
  let sanitized = text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '');

  // Byte order marks and zero-width characters
  sanitized = sanitized.replace(/[\uFEFF\uFFFE\u200B-\u200D]/g, '');

  sanitized = sanitized.normalize('NFC');

  // \s also covers non-breaking spaces
  sanitized = sanitized.replace(/\s+/g, ' ');

  return sanitized.trim();
}

/**
 * Canonical comparison form: compatibility-normalized, lower-cased, single-spaced
 */
export function foldForComparison(text: string): string {
  return sanitizeText(text.normalize('NFKC')).toLowerCase();
}

/**
 * Shorten text to at most `limit` characters, preferring a word boundary, ending with an ellipsis.
 * Counts code points, so surrogate pairs are never split.
 */
export function truncateText(text: string, limit: number): string {
  const chars = Array.from(text);
  if (chars.length <= limit) {
    return text;
  }
  if (limit <= 1) {
    return '…'.slice(0, Math.max(limit, 0));
  }

  let cut = chars.slice(0, limit - 1).join('');
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace !== -1 && characterCount(cut.slice(0, lastSpace)) > limit / 2) {
    cut = cut.slice(0, lastSpace);
  }
  return `${cut.trimEnd()}…`;
}

/**
 * Length in code points
 */
export function characterCount(text: string): number {
  return Array.from(text).length;
}
