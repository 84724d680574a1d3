/**
 * Strategy 3: inline SVG logos.
 */
import { attrValue, type DocumentModel } from '../document/document-model.js';
import type { LogoCandidate } from './types.js';
import { LOGO_KEYWORD, ancestors, identityMatch, rankCandidates, resolveUrl } from './utils.js';

const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

export const SVG_RANK = {
  OWN_EXACT: 0,
  OWN_PARTIAL: 1,
  CONTAINER: 2,
} as const;

/**
 * Inline SVG markup as a `data:` URI: whitespace collapsed, the SVG namespace
 * declared on the root so the image renders standalone.
 */
export function svgDataUri(markup: string): string {
  let collapsed = markup.replace(/\s+/g, ' ').replace(/>\s+</g, '><').trim();

  const openingTag = collapsed.match(/^<svg\b[^>]*>/i)?.[0] ?? '';
  if (!/\sxmlns\s*=/i.test(openingTag)) {
    collapsed = collapsed.replace(/^<svg\b/i, `<svg xmlns="${SVG_NAMESPACE}"`);
  }

  return `data:image/svg+xml,${encodeURIComponent(collapsed)}`;
}

function mentionsLogo(value: string | null | undefined): boolean {
  return (value ?? '').toLowerCase().includes(LOGO_KEYWORD);
}

export function rankSvg(svg: Element): number | null {
  const own = identityMatch(svg);
  if (own === 'exact') return SVG_RANK.OWN_EXACT;

  const title = svg.querySelector('title');
  if (
    own === 'partial' ||
    mentionsLogo(attrValue(svg, 'aria-label')) ||
    mentionsLogo(title?.textContent)
  ) {
    return SVG_RANK.OWN_PARTIAL;
  }

  if (ancestors(svg).some((ancestor) => identityMatch(ancestor) !== null)) {
    return SVG_RANK.CONTAINER;
  }

  return null;
}

/**
 * Resource an SVG pulls in from outside the page: a `<use>` pointing at
 * another file (in-page `#fragment` references don't count) or an `<image>`.
 */
function externalReference(svg: Element): string | null {
  for (const use of Array.from(svg.querySelectorAll('use'))) {
    const href = attrValue(use, 'href') ?? attrValue(use, 'xlink:href');
    if (href && !href.startsWith('#')) return href;
  }
  for (const image of Array.from(svg.querySelectorAll('image'))) {
    const href = attrValue(image, 'href') ?? attrValue(image, 'xlink:href');
    if (href) return href;
  }
  return null;
}

export function findSvgLogos(document: DocumentModel, baseUrl: string): LogoCandidate[] {
  const candidates: LogoCandidate[] = [];

  for (const svg of document.byTag('svg')) {
    // Nested <svg> elements are part of their outer image
    if (svg.parentElement?.closest('svg')) continue;

    const rank = rankSvg(svg);
    if (rank === null) continue;

    const reference = externalReference(svg);
    const referenceUrl = resolveUrl(reference, baseUrl);
    if (reference && referenceUrl) {
      candidates.push({ url: referenceUrl, rawUrl: reference, sourceStrategy: 'svg-logo', rank });
      continue;
    }

    const url = svgDataUri(document.svgMarkup(svg));
    candidates.push({ url, rawUrl: url, sourceStrategy: 'svg-logo', rank });
  }

  return rankCandidates(candidates);
}
