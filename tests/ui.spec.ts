import { describe, it, expect } from 'vitest';
import {
  boldMD, clip, escapeMD, renderAll, renderCoins, renderConcepts, renderFreshTrends, renderGoogleTrends, renderNews,
  renderReddit, renderStatus, renderTwitter, welcomeText,
} from '../src/ui.js';
import { emptySnapshot } from '../src/trends_cache.js';

describe('markdown escaping', () => {
  it('escapes legacy markdown entity markers', () => {
    expect(escapeMD('a_b*c`d[e]')).toBe('a\\_b\\*c\\`d\\[e]');
  });

  it('closes bold around a star and leaves other markers literal', () => {
    expect(boldMD('Is 2*2 really_4?')).toBe('*Is 2*\\**2 really_4?*');
    expect(boldMD('*lead')).toBe('\\**lead*');
    expect(boldMD('**')).toBe('\\*\\*');
  });

  it('keeps bold titles parseable when they carry markers', () => {
    const snap = {
      ...emptySnapshot(),
      reddit: [{ title: 'Is 2*2 really_4?', score: 1, subreddit: 'my_sub', url: '' }],
      coins: [{ name: 'Star*Coin', symbol: 'st_r', marketCapRank: 5, priceBtc: 0 }],
    };
    expect(renderReddit(snap).split('\n').slice(2)).toEqual(['1. *Is 2*\\**2 really_4?...*', '   ⬆️ 1 | r/my\\_sub']);
    expect(renderCoins(snap).split('\n')[2]).toBe('1. *Star*\\**Coin* ($ST\\_R)');
  });

  it('clips by code point', () => {
    expect(clip('😀😀😀', 2)).toBe('😀😀');
    expect(clip('abc', 10)).toBe('abc');
  });
});

describe('renderers', () => {
  it('renders google trends with the update clock', () => {
    const snap = { ...emptySnapshot(), google: ['Solar_Eclipse', 'Coffee'], lastUpdate: new Date(2024, 0, 1, 9, 5, 3) };
    expect(renderGoogleTrends(snap)).toBe(
      '📊 *Google Trending Searches*\n🕐 Updated: 09:05:03\n\n1. Solar\\_Eclipse\n2. Coffee\n\n💡 Use /generate to create coin ideas!',
    );
  });

  it('numbers at most ten twitter trends', () => {
    const snap = { ...emptySnapshot(), twitter: Array.from({ length: 12 }, (_, i) => `t${i + 1}`) };
    const lines = renderTwitter(snap).split('\n');
    expect(lines[0]).toBe('🐦 *Trending on Twitter/X*');
    expect(lines).toHaveLength(12);
    expect(lines[11]).toBe('10. t10');
  });

  it('renders reddit posts with clipped titles', () => {
    const snap = {
      ...emptySnapshot(),
      reddit: [
        { title: 'A'.repeat(70), score: 12, subreddit: 'solana', url: '' },
        { title: 'Short', score: 3, subreddit: 'CryptoMoonShots', url: '' },
      ],
    };
    expect(renderReddit(snap)).toBe(
      `🔥 *Trending on Crypto Reddit*\n\n1. *${'A'.repeat(60)}...*\n   ⬆️ 12 | r/solana\n\n2. *Short...*\n   ⬆️ 3 | r/CryptoMoonShots`,
    );
  });

  it('renders coins with N/A for an unknown rank', () => {
    const snap = {
      ...emptySnapshot(),
      coins: [
        { name: 'Demo Coin', symbol: 'dmo', marketCapRank: 101, priceBtc: 0 },
        { name: 'Other', symbol: 'oth', marketCapRank: null, priceBtc: 0 },
      ],
    };
    expect(renderCoins(snap)).toBe(
      '💎 *Trending Coins (CoinGecko)*\n\n1. *Demo Coin* ($DMO)\n   📊 Rank: #101\n\n2. *Other* ($OTH)\n   📊 Rank: #N/A',
    );
  });

  it('separates headlines with blank lines', () => {
    expect(renderNews({ ...emptySnapshot(), news: ['H1', 'H2'] })).toBe('📰 *Latest Crypto News*\n\n1. H1\n\n2. H2');
  });

  it('digests only the sources that have data', () => {
    const snap = {
      ...emptySnapshot(),
      twitter: ['a', 'b', 'c', 'd'],
      reddit: [{ title: 'Hello', score: 9, subreddit: 's', url: '' }],
    };
    expect(renderAll(snap)).toBe(
      '🌐 *ALL TRENDING DATA*\n\n🐦 *Twitter:* a, b, c\n\n🔥 *Reddit:* Hello... (9↑)\n\nUse specific commands for more details!',
    );
  });

  it('renders concept cards and the next steps', () => {
    const text = renderConcepts([{
      trend: 'Solar Eclipse',
      source: '📊 Google',
      name: 'SolarCoin',
      ticker: 'SOLA',
      description: 'The official memecoin of Solar Eclipse! 🚀',
      generatedAt: '2024-01-01 00:00:00',
    }]);
    expect(text).toBe([
      '🚀 *Generated Coin Concepts*',
      '',
      '*1. SolarCoin* ($SOLA)',
      '📝 The official memecoin of Solar Eclipse! 🚀',
      '📊 Based on: Solar Eclipse...',
      '🔍 Source: 📊 Google',
      '',
      '⚠️ *Next Steps:*',
      '1. Review the concept',
      '2. Create logo (Canva/AI)',
      '3. Deploy on pump.fun',
      '4. Market on Twitter/Telegram',
    ].join('\n'));
  });

  it('lists at most five fresh trends', () => {
    expect(renderFreshTrends(['a', 'b', 'c', 'd', 'e', 'f'])).toBe(
      '🔥 *New Trending Topics Detected!*\n\n• a\n• b\n• c\n• d\n• e\n\nUse /generate to create coin ideas!',
    );
  });

  it('states the refresh cadence in the welcome text', () => {
    expect(welcomeText(30).split('\n').at(-1)).toBe('💡 *Tip:* I update all sources every 30 minutes!');
  });

  it('says never before the first update', () => {
    expect(renderGoogleTrends({ ...emptySnapshot(), google: ['x'] }).split('\n')[1]).toBe('🕐 Updated: never');
  });

  it('renders the status table', () => {
    const text = renderStatus({
      lastUpdate: null,
      rows: [{ source: 'google', items: 2, success: 1, fail: 1, lastError: 'HTTP 500' }],
      subscribers: 3,
    });
    expect(text).toBe('🩺 *Status*\n🕐 Last update: never\n\n• google: 2 items (ok 1 / fail 1) - last error: HTTP 500\n\n🔔 Auto-notify subscribers: 3');
  });
});
