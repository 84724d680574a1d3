/**
 * Browser identities used to disguise crawler requests.
 */
import type { Identity } from './types.js';

/**
 * Built-in identities. Presets name httpcloak TLS fingerprints; the UA of each
 * entry is the one that browser sends, so headers and handshake agree.
 */
export const DEFAULT_IDENTITIES: readonly Identity[] = [
  {
    name: 'chrome-windows',
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36',
    preset: 'chrome-143',
  },
  {
    name: 'chrome-macos',
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36',
    preset: 'chrome-143',
  },
  {
    name: 'firefox-linux',
    userAgent: 'Mozilla/5.0 (X11; Linux x86_64; rv:133.0) Gecko/20100101 Firefox/133.0',
    preset: 'firefox-133',
  },
  {
    name: 'android-chrome',
    userAgent:
      'Mozilla/5.0 (Linux; Android 13; Pixel 7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Mobile Safari/537.36',
    preset: 'android-chrome-143',
  },
  {
    name: 'ios-safari',
    userAgent:
      'Mozilla/5.0 (iPhone; CPU iPhone OS 18_1 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.1 Mobile/15E148 Safari/604.1',
    preset: 'ios-safari-18',
  },
];

/**
 * Random selection over a fixed identity list.
 *
 * Stateless for callers: the only ordering guarantee is that `next(previous)`
 * never hands back `previous`, so a retry always changes identity.
 */
export class IdentityPool {
  private readonly identities: readonly Identity[];

  constructor(
    identities: readonly Identity[] = DEFAULT_IDENTITIES,
    private readonly random: () => number = Math.random
  ) {
    const unique = new Map(identities.map((identity) => [identity.name, identity]));
    if (unique.size < 2) {
      throw new Error('Identity pool needs at least two distinct identities');
    }
    this.identities = [...unique.values()];
  }

  get size(): number {
    return this.identities.length;
  }

  next(previous?: Identity): Identity {
    const choices = previous
      ? this.identities.filter((identity) => identity.name !== previous.name)
      : this.identities;
    const index = Math.min(Math.floor(this.random() * choices.length), choices.length - 1);
    return choices[index];
  }
}
