/**
 * Ordered fallback over the logo finders: the first strategy with any
 * candidate decides the result.
 */
import type { DocumentModel } from '../document/document-model.js';
import { findFavicon } from '../finders/favicon-finder.js';
import { LOGO_FINDERS } from '../finders/index.js';
import type { LogoCandidate, LogoFinder, LogoStrategy } from '../finders/types.js';
import { logger, type Log } from '../logger.js';

export type LogoStatus = 'found' | 'not_found' | 'parse_error';

export interface LogoResolution {
  status: LogoStatus;
  logoUrl?: string;
  faviconUrl?: string;
  source?: LogoStrategy;
  candidate?: LogoCandidate;
}

export interface ResolveOptions {
  includeFavicon?: boolean;
  finders?: readonly LogoFinder[];
  log?: Log;
}

/** Lowest rank wins; the earliest candidate wins a tie. */
export function selectCandidate(candidates: readonly LogoCandidate[]): LogoCandidate | undefined {
  let best: LogoCandidate | undefined;
  for (const candidate of candidates) {
    if (!best || candidate.rank < best.rank) best = candidate;
  }
  return best;
}

/**
 * Run finders in order and stop at the first that yields anything. A finder
 * that throws is logged and treated as having found nothing.
 */
export function runChain(
  document: DocumentModel,
  baseUrl: string,
  finders: readonly LogoFinder[] = LOGO_FINDERS,
  log: Log = logger
): LogoCandidate | undefined {
  for (const finder of finders) {
    let candidates: LogoCandidate[];
    try {
      candidates = finder.find(document, baseUrl);
    } catch (e) {
      log.warn({ strategy: finder.strategy, err: e }, 'Logo finder failed');
      continue;
    }

    const selected = selectCandidate(candidates);
    if (selected) {
      log.debug(
        { strategy: finder.strategy, url: selected.url, rank: selected.rank },
        'Logo candidate selected'
      );
      return selected;
    }
  }
  return undefined;
}

/**
 * Logo (and favicon) of a parsed page, with candidate URLs resolved against
 * the page's final URL.
 */
export function resolveLogo(
  document: DocumentModel,
  finalUrl: string,
  options: ResolveOptions = {}
): LogoResolution {
  if (document.isEmpty) return { status: 'parse_error' };

  const log = options.log ?? logger;
  const faviconUrl =
    options.includeFavicon === false ? undefined : findFavicon(document, finalUrl);
  const favicon = faviconUrl ? { faviconUrl } : {};

  const candidate = runChain(document, finalUrl, options.finders ?? LOGO_FINDERS, log);
  if (!candidate) return { status: 'not_found', ...favicon };

  return {
    status: 'found',
    logoUrl: candidate.url,
    source: candidate.sourceStrategy,
    candidate,
    ...favicon,
  };
}
