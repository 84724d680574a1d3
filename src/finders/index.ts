/**
 * Logo finder strategies, in chain order
 */
import { findExplicitLogos } from './explicit-logo-finder.js';
import { findMetaTagLogos } from './meta-tag-finder.js';
import { findSvgLogos } from './svg-logo-finder.js';
import type { LogoFinder } from './types.js';

export const LOGO_FINDERS: readonly LogoFinder[] = [
  { strategy: 'explicit-logo', find: findExplicitLogos },
  { strategy: 'meta-tag', find: findMetaTagLogos },
  { strategy: 'svg-logo', find: findSvgLogos },
];

export { findExplicitLogos, findMetaTagLogos, findSvgLogos };
export { svgDataUri } from './svg-logo-finder.js';
export { findFavicon, findFaviconCandidates } from './favicon-finder.js';
export { resolveUrl } from './utils.js';
export type {
  CandidateSource,
  FindCandidates,
  LogoCandidate,
  LogoFinder,
  LogoStrategy,
} from './types.js';
