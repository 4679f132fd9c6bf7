import type { RawCandidate } from '../enforcement/types.js';
import { createChildLogger } from '../utils/logger.js';
import { BaseScraper, ScraperOptions } from './base-scraper.js';
import type { SourceAdapter } from './types.js';

const logger = createChildLogger('ico-scraper');

const DETAIL_PATH = '/action-weve-taken/enforcement/';
const DEFINITION_PATTERN = /<dt[^>]*>([\s\S]*?)<\/dt>\s*<dd[^>]*>([\s\S]*?)<\/dd>/gi;
const PDF_LINK_PATTERN = /href=["']([^"']*\/media\/action-weve-taken\/[^"']*\.pdf)["']/gi;

/**
 * Scraper for the ICO "action we've taken" enforcement listing
 *
 * The list page links to one detail page per action. Each detail page has
 * an h1 naming the organisation, a "Date" definition term, an
 * article-content block whose first paragraph summarises the action, and
 * usually a link to the notice PDF.
 */
export class IcoEnforcementScraper extends BaseScraper implements SourceAdapter {
  readonly name = 'ico-enforcement';

  constructor(
    private listUrl: string,
    options: ScraperOptions = {}
  ) {
    super(options);
  }

  /**
   * Fetch the list page and every detail page it links to
   */
  async fetchCandidates(): Promise<RawCandidate[]> {
    const { content } = await this.fetchWithRetry(this.listUrl);
    const detailUrls = this.extractDetailLinks(content, this.listUrl);

    logger.info({ listUrl: this.listUrl, detailPages: detailUrls.length }, 'Scraped enforcement list page');

    const candidates: RawCandidate[] = [];
    for (const url of detailUrls) {
      const page = await this.fetchWithRetry(url);
      candidates.push(this.parseDetailPage(page.content, url));
    }
    return candidates;
  }

  /**
   * Links to enforcement detail pages, in page order, without the list page itself
   */
  extractDetailLinks(content: string, baseUrl: string): string[] {
    const listKey = this.pageKey(baseUrl);
    const seen = new Set<string>();
    const urls: string[] = [];

    const linkPattern = /<a[^>]+href=["']([^"']+)["']/gi;
    let match: RegExpExecArray | null;

    while ((match = linkPattern.exec(content)) !== null) {
      const href = this.decodeHtmlEntities(match[1]);
      if (href.startsWith('#') || href.startsWith('mailto:')) {
        continue;
      }

      const url = this.resolveUrl(href, baseUrl);
      const key = this.pageKey(url);
      if (!key.includes(DETAIL_PATH) || key === listKey || seen.has(key)) {
        continue;
      }

      seen.add(key);
      urls.push(url);
    }

    logger.debug({ linkCount: urls.length }, 'Extracted enforcement links');

    return urls;
  }

  /**
   * Pull the raw fields out of a detail page. Missing fields are left out;
   * deciding whether the entry is usable belongs to the normalizer.
   */
  parseDetailPage(content: string, url: string): RawCandidate {
    const candidate: RawCandidate = { url };

    const headings = [...content.matchAll(/<h1[^>]*>([\s\S]*?)<\/h1>/gi)];
    if (headings.length === 1) {
      candidate.title = this.extractTextFromHtml(headings[0][1]);
    } else {
      logger.info({ url, headings: headings.length }, 'Expected exactly one h1');
    }

    // Case-sensitive; "Last updated" terms must not match
    const dateMatch = [...content.matchAll(DEFINITION_PATTERN)].find((definition) =>
      /\bDate\b/.test(this.extractTextFromHtml(definition[1]))
    );
    if (dateMatch) {
      candidate.date = this.extractTextFromHtml(dateMatch[2]);
    }

    const description = this.extractDescription(content);
    if (description) {
      candidate.description = description;
    }

    const pdfUrls = [
      ...new Set(
        [...content.matchAll(PDF_LINK_PATTERN)].map((pdf) =>
          this.resolveUrl(this.decodeHtmlEntities(pdf[1]), url)
        )
      ),
    ];
    if (pdfUrls.length === 1) {
      candidate.pdfUrl = pdfUrls[0];
    } else if (pdfUrls.length > 1) {
      logger.warn({ url, pdfUrls }, 'Multiple notice PDFs on page; ignoring them');
    } else {
      logger.info({ url }, "Couldn't find a notice PDF on page");
    }

    return candidate;
  }

  private extractDescription(content: string): string | undefined {
    const opening = content.match(/<div[^>]+class=["'][^"']*\barticle-content\b[^"']*["'][^>]*>/i);
    if (!opening || opening.index === undefined) {
      return undefined;
    }

    const body = this.elementContent(content.slice(opening.index + opening[0].length), 'div');
    const paragraph = body.match(/<p(?:\s[^>]*)?>([\s\S]*?)<\/p>/i);
    if (!paragraph) {
      return undefined;
    }

    const text = this.extractTextFromHtml(paragraph[1]);
    return text === '' ? undefined : text;
  }

  /**
   * Markup up to the tag that closes an element whose opening tag was
   * just consumed, counting nested elements of the same name
   */
  private elementContent(rest: string, tagName: string): string {
    const tagPattern = new RegExp(`<(/?)${tagName}\\b[^>]*>`, 'gi');
    let depth = 1;
    let match: RegExpExecArray | null;

    while ((match = tagPattern.exec(rest)) !== null) {
      depth += match[1] === '/' ? -1 : 1;
      if (depth === 0) {
        return rest.slice(0, match.index);
      }
    }
    return rest;
  }

  /**
   * URL without query, fragment or trailing slash, for comparing pages
   */
  private pageKey(url: string): string {
    try {
      const parsed = new URL(url);
      return `${parsed.origin}${parsed.pathname.replace(/\/+$/, '')}`.toLowerCase();
    } catch {
      return url.toLowerCase();
    }
  }
}

/**
 * Create the ICO enforcement scraper
 */
export function createIcoScraper(listUrl: string, options: ScraperOptions = {}): IcoEnforcementScraper {
  return new IcoEnforcementScraper(listUrl, options);
}
