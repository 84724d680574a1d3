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
import { META_SOURCES, findMetaTagLogos, jsonLdLogos } from '../finders/meta-tag-finder.js';

const BASE = 'https://www.example.com/home';

function page(head: string, body = ''): string {
  return `<html><head>${head}</head><body>${body}</body></html>`;
}

function rankOf(name: string): number {
  return META_SOURCES.findIndex((source) => source.name === name);
}

describe('finders/meta-tag-finder', () => {
  it('lists sources from most to least official', () => {
    expect(META_SOURCES.map((source) => source.name)).toEqual([
      'og:logo',
      'json-ld logo',
      'itemprop logo',
      'og:image',
      'og:image:url',
      'og:image:secure_url',
      'twitter:image',
      'twitter:image:src',
      'apple-touch-icon',
      'apple-touch-icon-precomposed',
    ]);
  });

  it('resolves og:image against the page URL', () => {
    const document = parseDocument(page('<meta property="og:image" content="/social/card.png">'));

    expect(findMetaTagLogos(document, BASE)).toEqual([
      {
        url: 'https://www.example.com/social/card.png',
        rawUrl: '/social/card.png',
        sourceStrategy: 'meta-tag',
        rank: 3,
      },
    ]);
  });

  it('prefers og:logo over og:image', () => {
    const document = parseDocument(
      page(
        '<meta property="og:image" content="https://cdn.example.com/card.png">' +
          '<meta property="og:logo" content="https://cdn.example.com/logo.png">'
      )
    );

    const [best] = findMetaTagLogos(document, BASE);
    expect(best?.url).toBe('https://cdn.example.com/logo.png');
    expect(best?.rank).toBe(rankOf('og:logo'));
  });

  it('matches property and name attributes without regard to case', () => {
    const document = parseDocument(
      page(
        '<meta property="OG:IMAGE" content="https://cdn.example.com/og.png">' +
          '<meta name="twitter:image" content="https://cdn.example.com/tw.png">'
      )
    );

    expect(findMetaTagLogos(document, BASE).map((c) => [c.rank, c.url])).toEqual([
      [rankOf('og:image'), 'https://cdn.example.com/og.png'],
      [rankOf('twitter:image'), 'https://cdn.example.com/tw.png'],
    ]);
  });

  it('reads microdata logos', () => {
    const document = parseDocument(
      page('', '<div itemscope><img itemprop="logo" src="/micro.png"></div>')
    );

    const [best] = findMetaTagLogos(document, BASE);
    expect(best?.url).toBe('https://www.example.com/micro.png');
    expect(best?.rank).toBe(rankOf('itemprop logo'));
  });

  it('reads Apple touch icons', () => {
    const document = parseDocument(
      page('<link rel="apple-touch-icon" sizes="180x180" href="/apple-touch-icon.png">')
    );

    const [best] = findMetaTagLogos(document, BASE);
    expect(best?.url).toBe('https://www.example.com/apple-touch-icon.png');
    expect(best?.rank).toBe(rankOf('apple-touch-icon'));
  });

  it('keeps only http(s) URLs', () => {
    const document = parseDocument(
      page(
        '<meta property="og:image" content="data:image/png;base64,AAAA">' +
          '<meta property="og:image:url" content="ftp://files.example.com/logo.png">'
      )
    );

    expect(findMetaTagLogos(document, BASE)).toEqual([]);
  });

  it('returns nothing without metadata', () => {
    expect(findMetaTagLogos(parseDocument(page('<title>Plain</title>')), BASE)).toEqual([]);
  });

  describe('JSON-LD', () => {
    function jsonLd(data: unknown): string {
      return page(`<script type="application/ld+json">${JSON.stringify(data)}</script>`);
    }

    it('reads an Organization logo inside @graph', () => {
      const document = parseDocument(
        jsonLd({
          '@context': 'https://schema.org',
          '@graph': [
            { '@type': 'WebSite', name: 'Example' },
            {
              '@type': 'Organization',
              logo: { '@type': 'ImageObject', url: 'https://example.com/org-logo.png' },
            },
          ],
        })
      );

      expect(findMetaTagLogos(document, BASE)).toEqual([
        {
          url: 'https://example.com/org-logo.png',
          rawUrl: 'https://example.com/org-logo.png',
          sourceStrategy: 'meta-tag',
          rank: rankOf('json-ld logo'),
        },
      ]);
    });

    it('reads publisher and brand logos', () => {
      const document = parseDocument(
        jsonLd([
          { '@type': 'Article', publisher: { '@type': 'Organization', logo: '/pub-logo.png' } },
          { '@type': 'Product', brand: { logo: { contentUrl: '/brand-logo.png' } } },
        ])
      );

      expect(jsonLdLogos(document)).toEqual(['/pub-logo.png', '/brand-logo.png']);
    });

    it('reads every entry of a logo list', () => {
      const document = parseDocument(jsonLd({ logo: ['/a.png', { url: '/b.png' }, 42] }));

      expect(jsonLdLogos(document)).toEqual(['/a.png', '/b.png']);
    });

    it('skips malformed blocks and keeps reading', () => {
      const document = parseDocument(
        page(
          '<script type="application/ld+json">{ not json</script>' +
            '<script type="application/ld+json">{"logo":"/ok.png"}</script>'
        )
      );

      expect(jsonLdLogos(document)).toEqual(['/ok.png']);
    });
  });
});
