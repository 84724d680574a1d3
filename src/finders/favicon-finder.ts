/**
 * Favicon lookup, reported alongside the logo but never part of the chain.
 */
import { attrValue, type DocumentModel } from '../document/document-model.js';
import type { LogoCandidate } from './types.js';
import { rankCandidates, resolveUrl } from './utils.js';

export const FAVICON_RANK = {
  SVG_ICON: 0,
  ICON: 1,
  APPLE_TOUCH_ICON: 2,
  APPLE_TOUCH_ICON_PRECOMPOSED: 3,
  MASK_ICON: 4,
} as const;

function relTokens(link: Element): string[] {
  return (attrValue(link, 'rel') ?? '').toLowerCase().split(/\s+/).filter(Boolean);
}

function isSvgIcon(link: Element, url: string): boolean {
  const type = (attrValue(link, 'type') ?? '').toLowerCase();
  return type === 'image/svg+xml' || /\.svg(?:[?#]|$)/i.test(url);
}

function rankIcon(link: Element, url: string): number | null {
  const rel = relTokens(link);
  if (rel.includes('icon')) {
    return isSvgIcon(link, url) ? FAVICON_RANK.SVG_ICON : FAVICON_RANK.ICON;
  }
  if (rel.includes('apple-touch-icon')) return FAVICON_RANK.APPLE_TOUCH_ICON;
  if (rel.includes('apple-touch-icon-precomposed')) {
    return FAVICON_RANK.APPLE_TOUCH_ICON_PRECOMPOSED;
  }
  if (rel.includes('mask-icon')) return FAVICON_RANK.MASK_ICON;
  return null;
}

/**
 * Largest edge declared in a `sizes` attribute (`"16x16 32x32"` → 32).
 * `any` counts as unbounded; missing or unparseable sizes count as 0.
 */
export function declaredSize(sizes: string | null): number {
  if (!sizes) return 0;
  let largest = 0;
  for (const token of sizes.toLowerCase().split(/\s+/)) {
    if (token === 'any') return Number.POSITIVE_INFINITY;
    const match = token.match(/^(\d+)x(\d+)$/);
    if (match) largest = Math.max(largest, Number(match[1]), Number(match[2]));
  }
  return largest;
}

export function findFaviconCandidates(
  document: DocumentModel,
  baseUrl: string
): LogoCandidate<'favicon'>[] {
  const sized: { candidate: LogoCandidate<'favicon'>; size: number }[] = [];

  for (const link of document.byTag('link')) {
    const rawUrl = attrValue(link, 'href');
    const url = resolveUrl(rawUrl, baseUrl);
    if (!rawUrl || !url) continue;

    const rank = rankIcon(link, url);
    if (rank === null) continue;

    sized.push({
      candidate: { url, rawUrl, sourceStrategy: 'favicon', rank },
      size: declaredSize(attrValue(link, 'sizes')),
    });
  }

  // Larger first within a rank; the stable sort keeps document order among equals
  const bySize = [...sized].sort((a, b) => (a.size === b.size ? 0 : a.size > b.size ? -1 : 1));
  return rankCandidates(bySize.map((entry) => entry.candidate));
}

export function findFavicon(document: DocumentModel, baseUrl: string): string | undefined {
  return findFaviconCandidates(document, baseUrl)[0]?.url;
}
