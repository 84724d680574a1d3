/**
 * Strategy 2: logo-bearing metadata (Open Graph, schema.org, touch icons).
 */
import { attrValue, type DocumentModel } from '../document/document-model.js';
import { logger } from '../logger.js';
import type { LogoCandidate } from './types.js';
import { isHttpUrl, rankCandidates, resolveUrl } from './utils.js';

type MetaReader = (document: DocumentModel) => string[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `content` of <meta> tags whose property or name equals `key`. */
function metaContent(key: string): MetaReader {
  return (document) =>
    document
      .byTag('meta')
      .filter((meta) =>
        [attrValue(meta, 'property'), attrValue(meta, 'name')].some(
          (value) => value?.toLowerCase() === key
        )
      )
      .flatMap((meta) => attrValue(meta, 'content') ?? []);
}

/** `href` of <link> tags whose rel list contains `rel`. */
function linkHref(rel: string): MetaReader {
  return (document) =>
    document
      .byTag('link')
      .filter((link) => (attrValue(link, 'rel') ?? '').toLowerCase().split(/\s+/).includes(rel))
      .flatMap((link) => attrValue(link, 'href') ?? []);
}

/** Microdata `itemprop="logo"` on meta, link or img elements. */
function itempropLogo(document: DocumentModel): string[] {
  return document
    .select('[itemprop]')
    .filter((element) =>
      (attrValue(element, 'itemprop') ?? '').toLowerCase().split(/\s+/).includes('logo')
    )
    .flatMap(
      (element) =>
        attrValue(element, 'content') ??
        attrValue(element, 'href') ??
        attrValue(element, 'src') ??
        []
    );
}

/**
 * Flatten a parsed JSON-LD blob into individual items.
 * Handles top-level arrays and @graph structures.
 */
function flattenJsonLdItems(data: unknown): Record<string, unknown>[] {
  if (Array.isArray(data)) return data.flatMap(flattenJsonLdItems);
  if (!isRecord(data)) return [];
  if (Array.isArray(data['@graph'])) return data['@graph'].flatMap(flattenJsonLdItems);
  return [data];
}

/** A schema.org ImageObject-or-URL value: string, `{url}`, `{contentUrl}`, or a list of them. */
function imageValueUrls(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.flatMap(imageValueUrls);
  if (!isRecord(value)) return [];

  const url = value.url ?? value.contentUrl;
  return typeof url === 'string' ? [url] : [];
}

/** `logo` of Organization-like items, and of their publisher/brand. */
export function jsonLdLogos(document: DocumentModel): string[] {
  const logos: string[] = [];

  for (const script of document.select('script[type="application/ld+json"]')) {
    const text = script.textContent?.trim();
    if (!text) continue;

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      logger.debug({ error: String(e) }, 'Skipping malformed JSON-LD block');
      continue;
    }

    for (const item of flattenJsonLdItems(data)) {
      logos.push(...imageValueUrls(item.logo));
      for (const owner of [item.publisher, item.brand]) {
        if (isRecord(owner)) logos.push(...imageValueUrls(owner.logo));
      }
    }
  }

  return logos;
}

/** Recognized sources, most official first; a source's index is its rank. */
export const META_SOURCES: readonly { name: string; read: MetaReader }[] = [
  { name: 'og:logo', read: metaContent('og:logo') },
  { name: 'json-ld logo', read: jsonLdLogos },
  { name: 'itemprop logo', read: itempropLogo },
  { name: 'og:image', read: metaContent('og:image') },
  { name: 'og:image:url', read: metaContent('og:image:url') },
  { name: 'og:image:secure_url', read: metaContent('og:image:secure_url') },
  { name: 'twitter:image', read: metaContent('twitter:image') },
  { name: 'twitter:image:src', read: metaContent('twitter:image:src') },
  { name: 'apple-touch-icon', read: linkHref('apple-touch-icon') },
  { name: 'apple-touch-icon-precomposed', read: linkHref('apple-touch-icon-precomposed') },
];

export function findMetaTagLogos(document: DocumentModel, baseUrl: string): LogoCandidate[] {
  const candidates: LogoCandidate[] = [];

  META_SOURCES.forEach((source, rank) => {
    for (const rawUrl of source.read(document)) {
      const url = resolveUrl(rawUrl, baseUrl);
      // Social previews must point at a fetchable resource
      if (!url || !isHttpUrl(url)) continue;
      candidates.push({ url, rawUrl, sourceStrategy: 'meta-tag', rank });
    }
  });

  return rankCandidates(candidates);
}
