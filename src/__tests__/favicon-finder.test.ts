import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { parseDocument } from '../document/document-model.js';
import {
  FAVICON_RANK,
  declaredSize,
  findFavicon,
  findFaviconCandidates,
} from '../finders/favicon-finder.js';

const BASE = 'https://example.com/blog/post';

function head(links: string) {
  return parseDocument(`<html><head>${links}</head><body></body></html>`);
}

describe('finders/favicon-finder', () => {
  describe('declaredSize', () => {
    it('returns the largest declared edge', () => {
      expect(declaredSize('16x16 32x32')).toBe(32);
      expect(declaredSize('48X48')).toBe(48);
    });

    it('treats "any" as unbounded', () => {
      expect(declaredSize('any')).toBe(Number.POSITIVE_INFINITY);
    });

    it('treats missing or unparseable sizes as zero', () => {
      expect(declaredSize(null)).toBe(0);
      expect(declaredSize('large')).toBe(0);
    });
  });

  it('orders icons by kind, then by declared size', () => {
    const document = head(
      [
        '<link rel="icon" href="/favicon-16.png" sizes="16x16">',
        '<link rel="icon" href="/favicon-32.png" sizes="32x32">',
        '<link rel="apple-touch-icon" href="/apple.png">',
        '<link rel="mask-icon" href="/mask.svg">',
        '<link rel="icon" type="image/svg+xml" href="/icon.svg">',
        '<link rel="stylesheet" href="/site.css">',
      ].join('')
    );

    expect(findFaviconCandidates(document, BASE).map((c) => [c.rank, c.url])).toEqual([
      [FAVICON_RANK.SVG_ICON, 'https://example.com/icon.svg'],
      [FAVICON_RANK.ICON, 'https://example.com/favicon-32.png'],
      [FAVICON_RANK.ICON, 'https://example.com/favicon-16.png'],
      [FAVICON_RANK.APPLE_TOUCH_ICON, 'https://example.com/apple.png'],
      [FAVICON_RANK.MASK_ICON, 'https://example.com/mask.svg'],
    ]);
  });

  it('recognizes svg icons by extension', () => {
    const [candidate] = findFaviconCandidates(head('<link rel="icon" href="/i.svg?v=1">'), BASE);
    expect(candidate?.rank).toBe(FAVICON_RANK.SVG_ICON);
  });

  it('accepts "shortcut icon"', () => {
    const [candidate] = findFaviconCandidates(
      head('<link rel="shortcut icon" href="favicon.ico">'),
      BASE
    );
    expect(candidate).toEqual({
      url: 'https://example.com/blog/favicon.ico',
      rawUrl: 'favicon.ico',
      sourceStrategy: 'favicon',
      rank: FAVICON_RANK.ICON,
    });
  });

  it('puts a scalable icon ahead of fixed sizes', () => {
    const document = head(
      '<link rel="icon" href="/a.png" sizes="16x16"><link rel="icon" href="/b.png" sizes="any">'
    );
    expect(findFavicon(document, BASE)).toBe('https://example.com/b.png');
  });

  it('ranks precomposed touch icons after plain ones', () => {
    const document = head(
      '<link rel="apple-touch-icon-precomposed" href="/pre.png">' +
        '<link rel="apple-touch-icon" href="/touch.png">'
    );
    expect(findFaviconCandidates(document, BASE).map((c) => c.url)).toEqual([
      'https://example.com/touch.png',
      'https://example.com/pre.png',
    ]);
  });

  it('returns undefined when no icon is declared', () => {
    expect(findFavicon(head('<title>none</title>'), BASE)).toBeUndefined();
  });
});
