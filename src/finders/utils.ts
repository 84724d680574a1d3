/**
 * Helpers shared by the finder strategies
 */
import { attrValue, classTokens } from '../document/document-model.js';
import { logger } from '../logger.js';
import type { CandidateSource, LogoCandidate } from './types.js';

export const LOGO_KEYWORD = 'logo';

/** How far up the tree an enclosing logo container is looked for. */
export const MAX_ANCESTOR_DEPTH = 3;

/**
 * Resolve a URL found in markup against the page URL.
 *
 * Handles protocol-relative (`//cdn…`), root-relative (`/img…`) and
 * document-relative (`img…`) forms; absolute URLs come back unchanged.
 * Returns null for empty or malformed values and for anything that is not
 * http(s) or an inline image.
 */
export function resolveUrl(raw: string | null | undefined, baseUrl: string): string | null {
  const value = raw?.trim();
  if (!value) return null;

  if (/^data:/i.test(value)) {
    return /^data:image\//i.test(value) ? value : null;
  }

  try {
    // Protocol-relative references always get https, whatever the page scheme.
    const resolved = value.startsWith('//') ? new URL(`https:${value}`) : new URL(value, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    return resolved.href;
  } catch (e) {
    logger.debug({ url: value, baseUrl, error: String(e) }, 'URL resolution failed');
    return null;
  }
}

export function isHttpUrl(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

/** Lower-cased last path segment of an http(s) URL; empty for data URIs. */
export function fileName(url: string): string {
  if (!isHttpUrl(url)) return '';
  try {
    const segments = new URL(url).pathname.split('/');
    return decodeURIComponent(segments[segments.length - 1] ?? '').toLowerCase();
  } catch {
    return '';
  }
}

export type IdentityMatch = 'exact' | 'partial' | null;

/**
 * Compare an element's class tokens and id against a keyword: `exact` when a
 * token or the id equals it, `partial` when one merely contains it.
 */
export function identityMatch(element: Element, keyword: string = LOGO_KEYWORD): IdentityMatch {
  const tokens = classTokens(element);
  const id = (attrValue(element, 'id') ?? '').toLowerCase();

  if (tokens.includes(keyword) || id === keyword) return 'exact';
  if (id.includes(keyword) || tokens.some((token) => token.includes(keyword))) return 'partial';
  return null;
}

/** Ancestors of an element, nearest first, stopping below <body>. */
export function ancestors(element: Element, depth: number = MAX_ANCESTOR_DEPTH): Element[] {
  const found: Element[] = [];
  let current = element.parentElement;
  while (current && found.length < depth) {
    const tag = current.tagName.toLowerCase();
    if (tag === 'body' || tag === 'html') break;
    found.push(current);
    current = current.parentElement;
  }
  return found;
}

/** First URL of a srcset attribute. */
export function firstSrcsetUrl(srcset: string | null): string | null {
  const first = srcset?.split(',')[0]?.trim().split(/\s+/)[0];
  return first ? first : null;
}

/**
 * Order candidates by rank, keeping document order among equals, and drop
 * repeats of a URL already taken at a better rank.
 */
export function rankCandidates<S extends CandidateSource>(
  candidates: LogoCandidate<S>[]
): LogoCandidate<S>[] {
  const seen = new Set<string>();
  return [...candidates]
    .sort((a, b) => a.rank - b.rank)
    .filter((candidate) => {
      if (seen.has(candidate.url)) return false;
      seen.add(candidate.url);
      return true;
    });
}
