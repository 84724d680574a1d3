/**
 * Crawl orchestrator: per-domain fetch → parse → detect, run over a bounded
 * pool of concurrent domain tasks.
 */
import { parseDocument } from '../document/document-model.js';
import { resolveLogo } from '../chain/strategy-chain.js';
import { fetchPage, domainUrl } from '../fetch/fetcher.js';
import { DEFAULT_DNS_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS } from '../fetch/http-client.js';
import type { FetchError } from '../fetch/types.js';
import { domainLogger, type Log } from '../logger.js';
import {
  CRAWL_STATUSES,
  type CrawlContext,
  type CrawlOptions,
  type CrawlResult,
  type CrawlSummary,
  type StatusCounts,
} from './types.js';

export const DEFAULT_PARSE_BUDGET_MS = 2000;
export const DEFAULT_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 50;

const ABOUT_PAGES: readonly ((domain: string) => string)[] = [
  (domain) => `https://about.${domain}/`,
  (domain) => `https://${domain}/about`,
];

// Root failures that no other page of the domain can get past.
const ROOT_FATAL_ERRORS: ReadonlySet<FetchError> = new Set(['dns_failure', 'blocked_address']);

/** Landing pages tried after the root page comes back without a logo. */
export function aboutPageUrls(domain: string): string[] {
  return ABOUT_PAGES.map((page) => page(domain));
}

/**
 * Wall-clock allowance for one domain: two fetch attempts plus the DNS lookup
 * for every page probed, and the parse ceiling.
 */
export function domainBudgetMs(ctx: CrawlContext): number {
  const pages = ctx.probeAboutPages ? 1 + ABOUT_PAGES.length : 1;
  const perPage =
    2 * (ctx.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS) +
    (ctx.dnsTimeoutMs ?? DEFAULT_DNS_TIMEOUT_MS);
  return pages * perPage + (ctx.parseBudgetMs ?? DEFAULT_PARSE_BUDGET_MS);
}

async function crawlPage(
  domain: string,
  url: string,
  ctx: CrawlContext,
  log: Log
): Promise<CrawlResult> {
  const fetched = await fetchPage(domain, url, { ...ctx, log });
  if (!fetched.ok) {
    return {
      domain,
      status: 'unreachable',
      finalUrl: fetched.finalUrl,
      error: fetched.error,
      ...(fetched.protocol ? { protocol: fetched.protocol } : {}),
    };
  }

  const document = parseDocument(fetched.body, log);
  const resolution = resolveLogo(document, fetched.finalUrl, {
    includeFavicon: ctx.includeFavicon,
    log,
  });

  return {
    domain,
    status: resolution.status,
    ...(resolution.logoUrl ? { logoUrl: resolution.logoUrl } : {}),
    ...(resolution.faviconUrl ? { faviconUrl: resolution.faviconUrl } : {}),
    ...(resolution.source ? { source: resolution.source } : {}),
    finalUrl: fetched.finalUrl,
    protocol: fetched.protocol,
  };
}

async function runDomain(domain: string, ctx: CrawlContext, log: Log): Promise<CrawlResult> {
  try {
    const root = await crawlPage(domain, domainUrl(domain), ctx, log);
    if (root.status === 'found' || !ctx.probeAboutPages) return root;
    if (root.error && ROOT_FATAL_ERRORS.has(root.error)) return root;

    for (const url of aboutPageUrls(domain)) {
      const probe = await crawlPage(domain, url, ctx, log);
      if (probe.status === 'found') {
        log.debug({ url, logoUrl: probe.logoUrl }, 'Logo found on about page');
        return root.faviconUrl ? { ...probe, faviconUrl: root.faviconUrl } : probe;
      }
    }
    return root;
  } catch (e) {
    log.error({ err: e }, 'Unexpected failure while crawling domain');
    return { domain, status: 'unreachable', error: 'network_error' };
  }
}

/**
 * Crawl one domain. Never throws: every failure becomes a result row, and a
 * task that outlives its budget is reported `unreachable` with `timeout`.
 */
export async function crawlDomain(domain: string, ctx: CrawlContext): Promise<CrawlResult> {
  const log = ctx.log ?? domainLogger(domain);
  const budgetMs = domainBudgetMs(ctx);

  let timeoutId: NodeJS.Timeout | undefined;
  const budget = new Promise<CrawlResult>((resolve) => {
    timeoutId = setTimeout(() => {
      log.warn({ budgetMs }, 'Domain exceeded its time budget');
      resolve({ domain, status: 'unreachable', error: 'timeout' });
    }, budgetMs);
  });

  try {
    const result = await Promise.race([runDomain(domain, ctx, log), budget]);
    log.info({ status: result.status, logoUrl: result.logoUrl }, 'Domain crawled');
    return result;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Crawl many domains with sliding-window concurrency control.
 * Uses a Map-based inflight tracker so that each finished domain immediately
 * frees a slot for the next one. With `preserveOrder`, finished results wait
 * in a buffer until every earlier domain has been yielded.
 */
export async function* crawlDomains(
  domains: Iterable<string>,
  ctx: CrawlContext,
  options: CrawlOptions = {}
): AsyncGenerator<CrawlResult> {
  const concurrency = Math.min(
    Math.max(Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY), 1),
    MAX_CONCURRENCY
  );
  const preserveOrder = options.preserveOrder ?? true;
  const pending = domains[Symbol.iterator]();

  let nextId = 0;
  let nextToYield = 0;
  const inflight = new Map<number, Promise<{ id: number; result: CrawlResult }>>();
  const finished = new Map<number, CrawlResult>();

  function enqueue(): void {
    while (inflight.size < concurrency) {
      const entry = pending.next();
      if (entry.done) break;
      const id = nextId++;
      inflight.set(id, crawlDomain(entry.value, ctx).then((result) => ({ id, result })));
    }
  }

  // Fill initial window
  enqueue();

  while (inflight.size > 0) {
    const settled = await Promise.race(inflight.values());
    inflight.delete(settled.id);

    if (preserveOrder) {
      finished.set(settled.id, settled.result);
      for (let ready = finished.get(nextToYield); ready; ready = finished.get(nextToYield)) {
        finished.delete(nextToYield);
        nextToYield++;
        yield ready;
      }
    } else {
      yield settled.result;
    }

    // Refill window
    enqueue();
  }
}

export function emptyStatusCounts(): StatusCounts {
  return { found: 0, not_found: 0, unreachable: 0, parse_error: 0 };
}

export function formatSummary(summary: CrawlSummary): string {
  const counts = CRAWL_STATUSES.map((status) => `${status}=${summary.counts[status]}`);
  const seconds = (summary.durationMs / 1000).toFixed(1);
  return `Crawled ${summary.total} domains in ${seconds}s: ${counts.join(' ')}`;
}
