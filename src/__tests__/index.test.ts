import { describe, it, expect } from 'vitest';

const EXPECTED_EXPORTS = [
  'crawlDomain',
  'crawlDomains',
  'fetchPage',
  'fetchDomain',
  'SessionPool',
  'IdentityPool',
  'parseDocument',
  'resolveLogo',
  'findExplicitLogos',
  'findMetaTagLogos',
  'findSvgLogos',
  'findFavicon',
  'svgDataUri',
  'computeMetrics',
  'evaluate',
  'loadConfig',
  'readDomains',
] as const;

describe('public API exports', () => {
  it.each(EXPECTED_EXPORTS)('exports %s as a function', async (name) => {
    const mod = await import('../index.js');
    expect(typeof mod[name]).toBe('function');
  });

  it('exports the finders in chain order', async () => {
    const { LOGO_FINDERS } = await import('../index.js');
    expect(LOGO_FINDERS.map((finder) => finder.strategy)).toEqual([
      'explicit-logo',
      'meta-tag',
      'svg-logo',
    ]);
  });
});
