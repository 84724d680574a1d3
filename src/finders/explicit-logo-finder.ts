/**
 * Strategy 1: images explicitly labeled as logos.
 */
import { attrValue, type DocumentModel } from '../document/document-model.js';
import type { LogoCandidate } from './types.js';
import {
  LOGO_KEYWORD,
  ancestors,
  fileName,
  firstSrcsetUrl,
  identityMatch,
  rankCandidates,
  resolveUrl,
} from './utils.js';

/** Container keyword of the `<a class="navbar-brand"><img alt="Acme logo"></a>` pattern. */
const BRAND_KEYWORD = 'brand';

export const EXPLICIT_RANK = {
  OWN_EXACT: 0,
  CONTAINER_EXACT: 1,
  OWN_PARTIAL: 2,
  BRAND_CONTAINER_WITH_ALT: 3,
  CONTAINER_PARTIAL: 4,
  ALT_TEXT: 5,
  FILE_NAME: 6,
  PRELOAD_FILE_NAME: 7,
} as const;

type ContainerMatch = 'exact' | 'partial' | 'brand' | null;

/** Strongest logo/brand signal among the nearest ancestors. */
function containerMatch(element: Element): ContainerMatch {
  let best: ContainerMatch = null;
  for (const ancestor of ancestors(element)) {
    const match = identityMatch(ancestor);
    if (match === 'exact') return 'exact';
    if (match === 'partial') best = 'partial';
    else if (best === null && identityMatch(ancestor, BRAND_KEYWORD)) best = 'brand';
  }
  return best;
}

/** Lazy-loading attributes win over src, which often holds a placeholder. */
function imageSource(img: Element): string | null {
  return (
    attrValue(img, 'data-src') ??
    attrValue(img, 'src') ??
    firstSrcsetUrl(attrValue(img, 'srcset'))
  );
}

export function rankImage(img: Element, resolvedUrl: string): number | null {
  const own = identityMatch(img);
  if (own === 'exact') return EXPLICIT_RANK.OWN_EXACT;

  const container = containerMatch(img);
  if (container === 'exact') return EXPLICIT_RANK.CONTAINER_EXACT;
  if (own === 'partial') return EXPLICIT_RANK.OWN_PARTIAL;

  const altMentionsLogo = (attrValue(img, 'alt') ?? '').toLowerCase().includes(LOGO_KEYWORD);
  if (altMentionsLogo && (container === 'partial' || container === 'brand')) {
    return EXPLICIT_RANK.BRAND_CONTAINER_WITH_ALT;
  }
  if (container === 'partial') return EXPLICIT_RANK.CONTAINER_PARTIAL;
  if (altMentionsLogo) return EXPLICIT_RANK.ALT_TEXT;
  if (fileName(resolvedUrl).includes(LOGO_KEYWORD)) return EXPLICIT_RANK.FILE_NAME;

  return null;
}

function isImagePreload(link: Element): boolean {
  const rel = (attrValue(link, 'rel') ?? '').toLowerCase().split(/\s+/);
  return rel.includes('preload') && (attrValue(link, 'as') ?? '').toLowerCase() === 'image';
}

export function findExplicitLogos(document: DocumentModel, baseUrl: string): LogoCandidate[] {
  const candidates: LogoCandidate[] = [];

  for (const img of document.byTag('img')) {
    const rawUrl = imageSource(img);
    const url = resolveUrl(rawUrl, baseUrl);
    if (!rawUrl || !url) continue;

    const rank = rankImage(img, url);
    if (rank === null) continue;

    candidates.push({ url, rawUrl, sourceStrategy: 'explicit-logo', rank });
  }

  for (const link of document.byTag('link')) {
    if (!isImagePreload(link)) continue;

    const rawUrl = attrValue(link, 'href');
    const url = resolveUrl(rawUrl, baseUrl);
    if (!rawUrl || !url || !fileName(url).includes(LOGO_KEYWORD)) continue;

    candidates.push({
      url,
      rawUrl,
      sourceStrategy: 'explicit-logo',
      rank: EXPLICIT_RANK.PRELOAD_FILE_NAME,
    });
  }

  return rankCandidates(candidates);
}
