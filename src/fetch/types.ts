/**
 * Shared types for the fetch module
 */

/** Transport requested for an attempt: h2 offers HTTP/2 over ALPN, h1 pins HTTP/1.1. */
export type HttpVersion = 'h2' | 'h1';

export type FetchError =
  | 'timeout'
  | 'dns_failure'
  | 'tls_failure'
  | 'http_status_error'
  | 'too_many_redirects'
  | 'response_too_large'
  | 'blocked_address'
  | 'network_error';

/** A client identity: the UA header plus the TLS fingerprint preset of the same browser. */
export interface Identity {
  name: string;
  userAgent: string;
  preset: string;
}

/** One request attempt, kept on the FetchResult for diagnostics. */
export interface FetchAttempt {
  identity: string;
  protocol: HttpVersion;
  statusCode: number | null;
  error?: FetchError;
  latencyMs: number;
}

interface FetchResultBase {
  domain: string;
  requestedUrl: string;
  /** URL after redirects (the requested URL when the fetch never got a response). */
  finalUrl: string;
  statusCode: number | null;
  protocol: HttpVersion | null;
  attempts: FetchAttempt[];
  latencyMs: number;
}

export interface FetchSuccess extends FetchResultBase {
  ok: true;
  protocol: HttpVersion;
  body: string;
  error?: undefined;
}

export interface FetchFailure extends FetchResultBase {
  ok: false;
  body?: undefined;
  error: FetchError;
  errorDetails?: string;
}

/** Either a body or an error classification, never both. */
export type FetchResult = FetchSuccess | FetchFailure;
