export type { SourceAdapter } from './types.js';
export { BaseScraper } from './base-scraper.js';
export type { ScraperOptions, FetchedPage } from './base-scraper.js';
export { IcoEnforcementScraper, createIcoScraper } from './ico-scraper.js';
