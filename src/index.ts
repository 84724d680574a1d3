/**
 * logo-crawler - find the logo and favicon of a domain from its landing page
 */

// Crawl
export {
  crawlDomain,
  crawlDomains,
  aboutPageUrls,
  domainBudgetMs,
  formatSummary,
} from './crawl/crawler.js';
export type {
  CrawlContext,
  CrawlOptions,
  CrawlResult,
  CrawlStatus,
  CrawlSummary,
} from './crawl/types.js';

// Fetch
export { fetchDomain, fetchPage } from './fetch/fetcher.js';
export type { FetchContext } from './fetch/fetcher.js';
export { SessionPool, httpRequest } from './fetch/http-client.js';
export { IdentityPool, DEFAULT_IDENTITIES } from './fetch/identity-pool.js';
export type { FetchError, FetchResult, HttpVersion, Identity } from './fetch/types.js';

// Document and detection
export { DocumentModel, parseDocument } from './document/document-model.js';
export { resolveLogo, runChain, selectCandidate } from './chain/strategy-chain.js';
export type { LogoResolution } from './chain/strategy-chain.js';
export {
  LOGO_FINDERS,
  findExplicitLogos,
  findMetaTagLogos,
  findSvgLogos,
  findFavicon,
  findFaviconCandidates,
  resolveUrl,
  svgDataUri,
} from './finders/index.js';
export type { LogoCandidate, LogoFinder, LogoStrategy } from './finders/index.js';

// Metrics
export {
  computeMetrics,
  evaluate,
  classifyOutcome,
  formatMetricsReport,
  parseResultsCsv,
  parseTruthCsv,
} from './metrics/metrics.js';
export type { Metrics, ValidationLabel } from './metrics/metrics.js';

// Config and I/O
export { loadConfig, CrawlerConfigSchema } from './config.js';
export type { CrawlerConfig } from './config.js';
export { readDomains, normalizeDomain, formatResultRow } from './output/csv.js';
