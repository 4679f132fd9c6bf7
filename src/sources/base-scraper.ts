import { FetchError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { sanitizeText } from '../utils/text-sanitizer.js';

const logger = createChildLogger('base-scraper');

/**
 * Configuration options for scrapers
 */
export interface ScraperOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
  /** User agent string */
  userAgent?: string;
  /** Retry count on failure */
  retries?: number;
  /** Delay between retries in milliseconds, multiplied by the attempt number */
  retryDelay?: number;
}

/**
 * Default scraper options
 */
const DEFAULT_OPTIONS: Required<ScraperOptions> = {
  timeout: 30000,
  userAgent: 'enforcement-watch/1.0',
  retries: 3,
  retryDelay: 1000,
};

export interface FetchedPage {
  content: string;
  status: number;
  contentType?: string;
}

const MAX_CODE_POINT = 0x10ffff;

/**
 * Character for a numeric entity; out-of-range entities are kept as written
 */
function fromCodePoint(code: number, entity: string): string {
  return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : entity;
}

/**
 * Shared HTTP and HTML helpers for regulator page scrapers
 */
export abstract class BaseScraper {
  protected options: Required<ScraperOptions>;

  constructor(options: ScraperOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Fetch content from a URL with retry logic
   */
  protected async fetchWithRetry(url: string): Promise<FetchedPage> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.options.retries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

      try {
        logger.debug({ url, attempt }, 'Fetching URL');

        const response = await fetch(url, {
          headers: {
            'User-Agent': this.options.userAgent,
            Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          },
          signal: controller.signal,
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }

        const content = await response.text();
        const contentType = response.headers.get('content-type') || undefined;

        logger.debug({ url, status: response.status, contentLength: content.length }, 'Fetch successful');

        return {
          content,
          status: response.status,
          contentType,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn({ url, attempt, error: lastError.message }, 'Fetch attempt failed');

        if (attempt < this.options.retries) {
          await this.sleep(this.options.retryDelay * attempt);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw new FetchError(
      `Failed to fetch ${url} after ${this.options.retries} attempts: ${lastError?.message}`,
      { url, cause: lastError }
    );
  }

  /**
   * Extract text content from HTML
   */
  protected extractTextFromHtml(html: string): string {
    let text = html.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '');
    text = text.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '');
    text = text.replace(/<[^>]+>/g, ' ');
    text = this.decodeHtmlEntities(text);
    return sanitizeText(text);
  }

  /**
   * Decode common HTML entities
   */
  protected decodeHtmlEntities(text: string): string {
    const entities: Record<string, string> = {
      '&lt;': '<',
      '&gt;': '>',
      '&quot;': '"',
      '&#39;': "'",
      '&apos;': "'",
      '&nbsp;': ' ',
      '&pound;': '£',
      '&ndash;': '–',
      '&mdash;': '—',
      '&rsquo;': '’',
      '&lsquo;': '‘',
    };

    let decoded = text;
    for (const [entity, char] of Object.entries(entities)) {
      decoded = decoded.replace(new RegExp(entity, 'g'), char);
    }

    decoded = decoded.replace(/&#(\d+);/g, (entity, code: string) =>
      fromCodePoint(parseInt(code, 10), entity)
    );
    decoded = decoded.replace(/&#x([0-9a-f]+);/gi, (entity, code: string) =>
      fromCodePoint(parseInt(code, 16), entity)
    );

    // Last, so that "&amp;lt;" decodes to "&lt;" and not "<"
    return decoded.replace(/&amp;/g, '&');
  }

  /**
   * Resolve a relative URL to absolute
   */
  protected resolveUrl(relativeUrl: string, baseUrl: string): string {
    try {
      return new URL(relativeUrl, baseUrl).href;
    } catch {
      const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
      const rel = relativeUrl.startsWith('/') ? relativeUrl : '/' + relativeUrl;
      return base + rel;
    }
  }

  /**
   * Sleep for a specified duration
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
