/**
 * httpcloak transport: browser TLS fingerprints, explicit HTTP/2 or HTTP/1.1,
 * manual redirect handling and a session pool shared by all domain tasks.
 */
import httpcloak from 'httpcloak';
import { promises as dns } from 'dns';
import { isIP } from 'net';
import { logger } from '../logger.js';
import type { FetchError, HttpVersion, Identity } from './types.js';

/** Configuration constants */
const SESSION_TIMEOUT_SEC = 10;
const SESSION_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const SESSION_MAX_REQUESTS = 10000;
const DEFAULT_MAX_SESSIONS = 20;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;
export const DEFAULT_DNS_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const DEFAULT_HEADERS: Record<string, string> = {
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
  'Upgrade-Insecure-Requests': '1',
};

/**
 * Check if an IP address is private/internal.
 */
export function isPrivateIP(ip: string): boolean {
  const ipv4Private = [
    /^0\./, // "this network"
    /^127\./, // loopback
    /^10\./,
    /^172\.(1[6-9]|2[0-9]|3[01])\./,
    /^192\.168\./,
    /^169\.254\./, // link-local
  ];
  const ipv6Private = [/^::$/, /^::1$/, /^fe80:/i, /^fc00:/i, /^fd00:/i];

  if (ip.toLowerCase().startsWith('::ffff:')) {
    const ipv4Part = ip.substring(7);
    return ipv4Private.some((pattern) => pattern.test(ipv4Part));
  }

  const patterns = ip.includes(':') ? ipv6Private : ipv4Private;
  return patterns.some((pattern) => pattern.test(ip));
}

export type HostResolution =
  | { kind: 'resolved'; addresses: string[] }
  | { kind: 'unresolved'; reason: 'not_found' | 'timeout' }
  | { kind: 'private'; address: string };

/**
 * Resolve A and AAAA records concurrently, bounded by `timeoutMs`.
 * IP literals are checked directly since resolve4/resolve6 return nothing for them.
 */
export async function resolveHost(
  hostname: string,
  timeoutMs: number = DEFAULT_DNS_TIMEOUT_MS
): Promise<HostResolution> {
  if (isIP(hostname)) {
    return isPrivateIP(hostname)
      ? { kind: 'private', address: hostname }
      : { kind: 'resolved', addresses: [hostname] };
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
  });

  try {
    const settled = await Promise.race([
      Promise.allSettled([dns.resolve4(hostname), dns.resolve6(hostname)]),
      timeout,
    ]);
    if (settled === 'timeout') {
      logger.debug({ hostname, timeoutMs }, 'DNS resolution timed out');
      return { kind: 'unresolved', reason: 'timeout' };
    }

    const addresses = settled.flatMap((result) =>
      result.status === 'fulfilled' ? result.value : []
    );
    if (addresses.length === 0) {
      logger.debug({ hostname }, 'DNS resolution failed for both IPv4 and IPv6');
      return { kind: 'unresolved', reason: 'not_found' };
    }

    const privateAddress = addresses.find(isPrivateIP);
    if (privateAddress) return { kind: 'private', address: privateAddress };

    return { kind: 'resolved', addresses };
  } finally {
    clearTimeout(timer);
  }
}

type SessionOptions = NonNullable<ConstructorParameters<typeof httpcloak.Session>[0]>;

/** Redirects are followed here, not inside httpcloak, so every hop is checked and counted. */
type PinnedSessionOptions = SessionOptions & {
  httpVersion: HttpVersion;
  allowRedirects: boolean;
};

function createSession(
  preset: string,
  httpVersion: HttpVersion,
  proxy?: string
): httpcloak.Session {
  const options: PinnedSessionOptions = {
    preset,
    timeout: SESSION_TIMEOUT_SEC,
    httpVersion,
    allowRedirects: false,
    ...(proxy ? { proxy } : {}),
  };
  return new httpcloak.Session(options);
}

/**
 * Redact credentials from a proxy URL for safe logging.
 */
export function redactProxyUrl(proxy: string): string {
  try {
    const url = new URL(proxy);
    if (url.password) url.password = '***';
    if (url.username) url.username = '***';
    return url.toString();
  } catch {
    return '<invalid-proxy-url>';
  }
}

interface PooledSession {
  session: httpcloak.Session;
  created: number;
  lastAccessed: number;
  requestCount: number;
  inFlightRequests: number;
}

export interface SessionLease {
  session: httpcloak.Session;
  release: () => void;
}

export interface SessionPoolOptions {
  proxy?: string;
  maxSessions?: number;
}

/**
 * Process-wide cache of httpcloak sessions keyed by preset and protocol.
 *
 * Created once at startup and handed to the fetcher. Sessions are recycled
 * after an hour or 10K requests once idle, and the least recently used idle
 * session is evicted when the pool is full.
 */
export class SessionPool {
  private readonly sessions = new Map<string, PooledSession>();
  private readonly maxSessions: number;
  readonly proxy?: string;

  constructor(options: SessionPoolOptions = {}) {
    this.proxy = options.proxy;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
  }

  get size(): number {
    return this.sessions.size;
  }

  acquire(preset: string, httpVersion: HttpVersion): SessionLease {
    const key = `${preset}|${httpVersion}`;
    let entry = this.sessions.get(key);

    if (entry && this.needsRecycling(entry) && entry.inFlightRequests === 0) {
      logger.debug(
        { key, age: Math.floor((Date.now() - entry.created) / 1000), requests: entry.requestCount },
        'Recycling aged httpcloak session'
      );
      this.close(entry);
      this.sessions.delete(key);
      entry = undefined;
    }

    if (!entry) {
      if (this.sessions.size >= this.maxSessions) this.evictLru();

      logger.debug(
        { key, proxy: this.proxy ? redactProxyUrl(this.proxy) : undefined },
        'Creating httpcloak session'
      );
      const now = Date.now();
      entry = {
        session: createSession(preset, httpVersion, this.proxy),
        created: now,
        lastAccessed: now,
        requestCount: 0,
        inFlightRequests: 0,
      };
      this.sessions.set(key, entry);
    }

    const leased = entry;
    leased.requestCount++;
    leased.inFlightRequests++;
    leased.lastAccessed = Date.now();

    let released = false;
    return {
      session: leased.session,
      release: () => {
        if (released) return;
        released = true;
        leased.inFlightRequests--;
      },
    };
  }

  /** Close every session. Call once on shutdown. */
  closeAll(): void {
    for (const entry of this.sessions.values()) {
      this.close(entry);
    }
    this.sessions.clear();
  }

  private needsRecycling(entry: PooledSession): boolean {
    return (
      Date.now() - entry.created > SESSION_MAX_AGE_MS || entry.requestCount >= SESSION_MAX_REQUESTS
    );
  }

  private evictLru(): void {
    let oldestKey: string | undefined;
    let oldestAccessed = Infinity;

    for (const [key, entry] of this.sessions) {
      if (entry.inFlightRequests === 0 && entry.lastAccessed < oldestAccessed) {
        oldestAccessed = entry.lastAccessed;
        oldestKey = key;
      }
    }

    // Every session busy: let the pool grow past the cap until one frees up.
    if (oldestKey === undefined) return;

    const evicted = this.sessions.get(oldestKey);
    this.sessions.delete(oldestKey);
    if (evicted) this.close(evicted);
    logger.debug({ key: oldestKey }, 'Evicted LRU session');
  }

  private close(entry: PooledSession): void {
    try {
      entry.session.close();
    } catch (error) {
      logger.warn({ error: String(error) }, 'Error closing httpcloak session');
    }
  }
}

export interface HttpRequestOptions {
  identity: Identity;
  httpVersion: HttpVersion;
  /** Budget for the whole attempt, redirects included. */
  timeoutMs?: number;
  maxRedirects?: number;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  html?: string;
  headers: Record<string, string>;
  finalUrl: string;
  protocol: HttpVersion;
  redirects: number;
  error?: FetchError;
  errorDetails?: string;
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error(`Request timeout after ${timeoutMs}ms for ${url}`)),
      timeoutMs
    );
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

/** Lower-case header names and collapse repeated headers to their first value. */
export function normalizeHeaders(
  raw: Record<string, string | string[] | undefined> | undefined
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw ?? {})) {
    const first = Array.isArray(value) ? value[0] : value;
    if (first !== undefined) headers[name.toLowerCase()] = first;
  }
  return headers;
}

/** Map a thrown transport error onto the fetch error taxonomy. */
export function classifyTransportError(error: unknown): FetchError {
  const message = String(error);
  if (/timeout|timed out|deadline exceeded/i.test(message)) return 'timeout';
  if (
    /ENOTFOUND|EAI_AGAIN|no such host|could not resolve|name (or service|resolution)/i.test(message)
  ) {
    return 'dns_failure';
  }
  if (/tls|ssl|certificate|handshake|x509/i.test(message)) return 'tls_failure';
  return 'network_error';
}

/** Transport the server actually spoke, when httpcloak reports it. */
function negotiatedProtocol(response: object, requested: HttpVersion): HttpVersion {
  if ('protocol' in response && typeof response.protocol === 'string') {
    const value = response.protocol.toLowerCase();
    if (value.includes('2')) return 'h2';
    if (value.includes('1')) return 'h1';
  }
  return requested;
}

/** Resolve a Location header against the current URL; only http(s) targets are followed. */
function resolveRedirect(currentUrl: string, location: string): string | null {
  try {
    const next = new URL(location, currentUrl);
    return next.protocol === 'http:' || next.protocol === 'https:' ? next.href : null;
  } catch {
    return null;
  }
}

/**
 * GET a URL through a pooled session, following up to `maxRedirects` redirects.
 *
 * The caller checks the initial host; redirect targets are re-checked here so a
 * public page cannot bounce the crawler into a private network.
 * Never throws: transport failures come back as `success: false` with an error code.
 */
export async function httpRequest(
  pool: SessionPool,
  url: string,
  options: HttpRequestOptions
): Promise<HttpResponse> {
  const { identity, httpVersion } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  const headers = { ...DEFAULT_HEADERS, 'User-Agent': identity.userAgent, ...options.headers };
  const deadline = Date.now() + timeoutMs;

  let currentUrl = url;
  let redirects = 0;

  const fail = (error: FetchError, statusCode: number, errorDetails?: string): HttpResponse => ({
    success: false,
    statusCode,
    headers: {},
    finalUrl: currentUrl,
    protocol: httpVersion,
    redirects,
    error,
    errorDetails,
  });

  let lease: SessionLease | undefined;
  try {
    lease = pool.acquire(identity.preset, httpVersion);
    const { session } = lease;

    while (true) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return fail('timeout', 0, `Attempt exceeded ${timeoutMs}ms`);

      logger.debug(
        { url: currentUrl, httpVersion, identity: identity.name },
        'Making httpcloak request'
      );

      const timeout = createRequestTimeout(currentUrl, remaining);
      let response: httpcloak.Response;
      try {
        response = await Promise.race([session.get(currentUrl, { headers }), timeout.promise]);
      } finally {
        timeout.cancel();
      }

      const responseHeaders = normalizeHeaders(response.headers);
      const location = responseHeaders['location'];

      if (REDIRECT_STATUSES.has(response.statusCode) && location) {
        if (redirects >= maxRedirects) {
          return fail(
            'too_many_redirects',
            response.statusCode,
            `More than ${maxRedirects} redirects`
          );
        }
        const next = resolveRedirect(currentUrl, location);
        if (!next) {
          return fail('network_error', response.statusCode, `Unfollowable redirect: ${location}`);
        }

        const host = await resolveHost(new URL(next).hostname, Math.max(deadline - Date.now(), 1));
        if (host.kind === 'private') {
          return fail(
            'blocked_address',
            response.statusCode,
            `Redirect into private address ${host.address}`
          );
        }

        logger.debug(
          { from: currentUrl, to: next, statusCode: response.statusCode },
          'Following redirect'
        );
        currentUrl = next;
        redirects++;
        continue;
      }

      const contentLength = parseInt(responseHeaders['content-length'] ?? '', 10);
      if (!isNaN(contentLength) && contentLength > MAX_RESPONSE_SIZE) {
        logger.warn(
          { url: currentUrl, contentLength, limit: MAX_RESPONSE_SIZE },
          'Content-Length exceeds size limit'
        );
        return fail('response_too_large', response.statusCode);
      }

      // httpcloak exposes text as a property on some builds and as a method on others
      const textValue = response.text as string | (() => string);
      const html = typeof textValue === 'function' ? textValue() : textValue;

      if (html && html.length > MAX_RESPONSE_SIZE) {
        logger.warn(
          { url: currentUrl, size: html.length, limit: MAX_RESPONSE_SIZE },
          'Response exceeds size limit'
        );
        return fail('response_too_large', response.statusCode);
      }

      const success = response.statusCode >= 200 && response.statusCode < 300;
      const protocol = negotiatedProtocol(response, httpVersion);

      logger.debug(
        {
          url: currentUrl,
          statusCode: response.statusCode,
          protocol,
          bodyLength: html?.length ?? 0,
        },
        'httpcloak request complete'
      );

      return {
        success,
        statusCode: response.statusCode,
        html,
        headers: responseHeaders,
        finalUrl: currentUrl,
        protocol,
        redirects,
        ...(success ? {} : { error: 'http_status_error' as const }),
      };
    }
  } catch (error) {
    logger.warn({ url: currentUrl, httpVersion, error: String(error) }, 'httpcloak request failed');
    return fail(classifyTransportError(error), 0, String(error));
  } finally {
    lease?.release();
  }
}
