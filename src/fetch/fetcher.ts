/**
 * Page retrieval for a domain: HTTP/2 first, then exactly one HTTP/1.1 retry
 * under a different identity.
 */
import {
  httpRequest,
  resolveHost,
  DEFAULT_DNS_TIMEOUT_MS,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type HttpResponse,
  type SessionPool,
} from './http-client.js';
import type { IdentityPool } from './identity-pool.js';
import type {
  FetchAttempt,
  FetchError,
  FetchFailure,
  FetchResult,
  HttpVersion,
  Identity,
} from './types.js';
import { logger, type Log } from '../logger.js';

/** Handles the fetcher needs; created once at startup and passed in explicitly. */
export interface FetchContext {
  pool: SessionPool;
  identities: IdentityPool;
  timeoutMs?: number;
  dnsTimeoutMs?: number;
  maxRedirects?: number;
  log?: Log;
}

/** Errors a second attempt cannot fix: the target itself is off limits or oversized. */
const TERMINAL_ERRORS: ReadonlySet<FetchError> = new Set<FetchError>([
  'blocked_address',
  'response_too_large',
]);

/** Landing page for a bare domain. */
export function domainUrl(domain: string): string {
  return `https://${domain}/`;
}

/**
 * Whether a failed HTTP/2 attempt earns the HTTP/1.1 retry.
 *
 * Transport failures, TLS failures and every HTTP error status qualify: 421 and
 * 505 are how servers refuse HTTP/2, and 403/429 are usually identity blocks
 * that a different UA and fingerprint can get past.
 */
export function shouldFallback(response: HttpResponse): boolean {
  if (response.success) return false;
  return response.error === undefined || !TERMINAL_ERRORS.has(response.error);
}

function failResult(
  domain: string,
  url: string,
  startTime: number,
  attempts: FetchAttempt[],
  error: FetchError,
  fields: Partial<Pick<FetchFailure, 'finalUrl' | 'statusCode' | 'protocol' | 'errorDetails'>> = {}
): FetchFailure {
  return {
    ok: false,
    domain,
    requestedUrl: url,
    finalUrl: fields.finalUrl ?? url,
    statusCode: fields.statusCode ?? null,
    protocol: fields.protocol ?? null,
    attempts,
    latencyMs: Date.now() - startTime,
    error,
    errorDetails: fields.errorDetails,
  };
}

async function attempt(
  url: string,
  identity: Identity,
  httpVersion: HttpVersion,
  ctx: FetchContext,
  attempts: FetchAttempt[]
): Promise<HttpResponse> {
  const started = Date.now();
  const response = await httpRequest(ctx.pool, url, {
    identity,
    httpVersion,
    timeoutMs: ctx.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    maxRedirects: ctx.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
  });
  attempts.push({
    identity: identity.name,
    protocol: httpVersion,
    statusCode: response.statusCode === 0 ? null : response.statusCode,
    ...(response.error ? { error: response.error } : {}),
    latencyMs: Date.now() - started,
  });
  return response;
}

/**
 * Fetch one page of a domain.
 *
 * The host is resolved up front so dead domains fail fast as `dns_failure`
 * without spending two HTTP attempts. Never throws.
 */
export async function fetchPage(
  domain: string,
  url: string,
  ctx: FetchContext
): Promise<FetchResult> {
  const startTime = Date.now();
  const log = ctx.log ?? logger;
  const attempts: FetchAttempt[] = [];

  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch (e) {
    log.debug({ url, err: e }, 'Unparseable page URL');
    return failResult(domain, url, startTime, attempts, 'dns_failure', {
      errorDetails: `Invalid host in ${url}`,
    });
  }

  const host = await resolveHost(hostname, ctx.dnsTimeoutMs ?? DEFAULT_DNS_TIMEOUT_MS);
  if (host.kind === 'unresolved') {
    log.info({ url, reason: host.reason }, 'Host does not resolve');
    return failResult(domain, url, startTime, attempts, 'dns_failure', {
      errorDetails: host.reason === 'timeout' ? 'DNS lookup timed out' : 'No A/AAAA records',
    });
  }
  if (host.kind === 'private') {
    log.warn({ url, address: host.address }, 'Host resolves to a private address');
    return failResult(domain, url, startTime, attempts, 'blocked_address', {
      errorDetails: `Resolves to private address ${host.address}`,
    });
  }

  const primaryIdentity = ctx.identities.next();
  let response = await attempt(url, primaryIdentity, 'h2', ctx, attempts);

  if (shouldFallback(response)) {
    const fallbackIdentity = ctx.identities.next(primaryIdentity);
    log.info(
      {
        url,
        statusCode: response.statusCode,
        error: response.error,
        identity: fallbackIdentity.name,
      },
      'HTTP/2 attempt failed, retrying over HTTP/1.1'
    );
    response = await attempt(url, fallbackIdentity, 'h1', ctx, attempts);
  }

  if (!response.success) {
    return failResult(domain, url, startTime, attempts, response.error ?? 'network_error', {
      finalUrl: response.finalUrl,
      statusCode: response.statusCode === 0 ? null : response.statusCode,
      protocol: response.protocol,
      errorDetails: response.errorDetails,
    });
  }

  const latencyMs = Date.now() - startTime;
  log.debug(
    { url, finalUrl: response.finalUrl, protocol: response.protocol, latencyMs },
    'Page fetched'
  );

  return {
    ok: true,
    domain,
    requestedUrl: url,
    finalUrl: response.finalUrl,
    statusCode: response.statusCode,
    protocol: response.protocol,
    attempts,
    latencyMs,
    body: response.html ?? '',
  };
}

/** `fetch(domain)`: the domain's landing page. */
export function fetchDomain(domain: string, ctx: FetchContext): Promise<FetchResult> {
  return fetchPage(domain, domainUrl(domain), ctx);
}
