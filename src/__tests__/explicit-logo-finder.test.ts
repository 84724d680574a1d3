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
import { EXPLICIT_RANK, findExplicitLogos } from '../finders/explicit-logo-finder.js';

const BASE = 'https://example.com/';

function find(body: string) {
  return findExplicitLogos(parseDocument(`<html><body>${body}</body></html>`), BASE);
}

describe('finders/explicit-logo-finder', () => {
  it('ranks an image with class "logo" first', () => {
    expect(find('<img class="logo" src="/a.png">')).toEqual([
      {
        url: 'https://example.com/a.png',
        rawUrl: '/a.png',
        sourceStrategy: 'explicit-logo',
        rank: EXPLICIT_RANK.OWN_EXACT,
      },
    ]);
  });

  it.each([
    ['own id "logo"', '<img id="logo" src="/x.png">', EXPLICIT_RANK.OWN_EXACT],
    [
      'container with class "logo"',
      '<div class="logo"><a href="/"><img src="/x.png"></a></div>',
      EXPLICIT_RANK.CONTAINER_EXACT,
    ],
    ['own partial class', '<img class="header-logo" src="/x.png">', EXPLICIT_RANK.OWN_PARTIAL],
    [
      'brand container with logo alt text',
      '<a class="navbar-brand" href="/"><img src="/x.png" alt="Acme logo"></a>',
      EXPLICIT_RANK.BRAND_CONTAINER_WITH_ALT,
    ],
    [
      'partial logo container with logo alt text',
      '<div class="site-logo-wrap"><img src="/x.png" alt="Logo"></div>',
      EXPLICIT_RANK.BRAND_CONTAINER_WITH_ALT,
    ],
    [
      'partial logo container',
      '<div class="site-logo-wrap"><img src="/x.png"></div>',
      EXPLICIT_RANK.CONTAINER_PARTIAL,
    ],
    ['alt text', '<img src="/x.png" alt="Company Logo">', EXPLICIT_RANK.ALT_TEXT],
    ['file name', '<img src="/assets/logo-dark.svg">', EXPLICIT_RANK.FILE_NAME],
    [
      'image preload',
      '<link rel="preload" as="image" href="/preload-logo.webp">',
      EXPLICIT_RANK.PRELOAD_FILE_NAME,
    ],
  ])('detects %s', (_label, body, rank) => {
    const [candidate] = find(body);
    expect(candidate?.rank).toBe(rank);
  });

  it('ignores images without a logo signal', () => {
    expect(find('<img src="/hero.jpg" alt="Hero">')).toEqual([]);
  });

  it('ignores a brand container when the alt text does not mention a logo', () => {
    expect(find('<a class="navbar-brand" href="/"><img src="/g.png" alt="Acme"></a>')).toEqual(
      []
    );
  });

  it('ignores preloads of other resources', () => {
    expect(find('<link rel="preload" as="font" href="/logo-font.woff2">')).toEqual([]);
  });

  it('looks no more than three levels up for a container', () => {
    const body =
      '<div class="logo"><div><div><div><img src="/deep.png"></div></div></div></div>';
    expect(find(body)).toEqual([]);
  });

  it('prefers data-src over a placeholder src', () => {
    const [candidate] = find(
      '<img class="logo" src="data:image/gif;base64,R0lGOD" data-src="/real-logo.png">'
    );
    expect(candidate?.url).toBe('https://example.com/real-logo.png');
    expect(candidate?.rawUrl).toBe('/real-logo.png');
  });

  it('falls back to the first srcset entry', () => {
    const [candidate] = find('<img class="logo" srcset="/s1.png 1x, /s2.png 2x">');
    expect(candidate?.url).toBe('https://example.com/s1.png');
  });

  it('keeps inline image sources', () => {
    const [candidate] = find('<img class="logo" src="data:image/png;base64,AAAA">');
    expect(candidate?.url).toBe('data:image/png;base64,AAAA');
  });

  it('skips images with no usable source', () => {
    expect(find('<img class="logo"><img class="logo" src="javascript:alert(1)">')).toEqual([]);
  });

  it('orders candidates by rank, then document order', () => {
    const body = [
      '<img src="/first-logo.png">',
      '<img class="logo" src="/primary.png">',
      '<img src="/x.png" alt="logo">',
      '<img class="logo" src="/secondary.png">',
    ].join('');

    expect(find(body).map((candidate) => [candidate.rank, candidate.url])).toEqual([
      [0, 'https://example.com/primary.png'],
      [0, 'https://example.com/secondary.png'],
      [5, 'https://example.com/x.png'],
      [6, 'https://example.com/first-logo.png'],
    ]);
  });

  it('reports each URL once at its best rank', () => {
    const body = '<img src="/logo.png"><img class="logo" src="/logo.png">';
    expect(find(body)).toEqual([
      {
        url: 'https://example.com/logo.png',
        rawUrl: '/logo.png',
        sourceStrategy: 'explicit-logo',
        rank: 0,
      },
    ]);
  });

  it('returns nothing for the empty document', () => {
    expect(findExplicitLogos(parseDocument(''), BASE)).toEqual([]);
  });
});
