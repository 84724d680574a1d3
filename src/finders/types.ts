/**
 * Types for the logo finder strategies
 */
import type { DocumentModel } from '../document/document-model.js';

/** Strategies of the logo chain, in priority order. */
export type LogoStrategy = 'explicit-logo' | 'meta-tag' | 'svg-logo';

export type CandidateSource = LogoStrategy | 'favicon';

export interface LogoCandidate<S extends CandidateSource = LogoStrategy> {
  /** Absolute URL (http, https or data:image). */
  url: string;
  /** The value as it appeared in the markup. */
  rawUrl: string;
  sourceStrategy: S;
  /** Lower is more confident. */
  rank: number;
}

/** Pure detector: candidates sorted by rank, then document order. */
export type FindCandidates<S extends CandidateSource = LogoStrategy> = (
  document: DocumentModel,
  baseUrl: string
) => LogoCandidate<S>[];

export interface LogoFinder {
  strategy: LogoStrategy;
  find: FindCandidates;
}
