/**
 * Types for the crawl module
 */
import type { FetchContext } from '../fetch/fetcher.js';
import type { FetchError, HttpVersion } from '../fetch/types.js';
import type { LogoStrategy } from '../finders/types.js';

export type CrawlStatus = 'found' | 'not_found' | 'unreachable' | 'parse_error';

export const CRAWL_STATUSES: readonly CrawlStatus[] = [
  'found',
  'not_found',
  'unreachable',
  'parse_error',
];

/** One output row per input domain. */
export interface CrawlResult {
  readonly domain: string;
  readonly status: CrawlStatus;
  readonly logoUrl?: string;
  readonly faviconUrl?: string;
  /** Strategy that produced the logo. */
  readonly source?: LogoStrategy;
  /** Page the result came from, after redirects. */
  readonly finalUrl?: string;
  readonly protocol?: HttpVersion;
  /** Set when status is `unreachable`. */
  readonly error?: FetchError;
}

export interface CrawlContext extends FetchContext {
  /** Ceiling for parse + detection, added to the fetch allowance of the domain budget. */
  parseBudgetMs?: number;
  includeFavicon?: boolean;
  /** Try about.<domain> and <domain>/about when the landing page has no logo. */
  probeAboutPages?: boolean;
}

export interface CrawlOptions {
  concurrency?: number;
  /** Yield results in input order (default) instead of completion order. */
  preserveOrder?: boolean;
}

export type StatusCounts = Record<CrawlStatus, number>;

export interface CrawlSummary {
  total: number;
  counts: StatusCounts;
  durationMs: number;
}
