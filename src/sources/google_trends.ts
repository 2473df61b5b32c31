import { getOk } from '../http.js';
import { DEMO_GOOGLE } from './demo.js';
import { cdataTitles, tracked } from './text.js';
import type { SourceDeps } from './types.js';

export const GOOGLE_FALLBACK_TRENDS = [
  'Bitcoin', 'Ethereum', 'Solana', 'AI Technology',
  'Cryptocurrency News', 'Memecoin', 'DeFi',
  'NFT Market', 'Blockchain', 'Web3',
];

export function googleTrendsUrl(geo: string) {
  return `https://trends.google.com/trends/trendingsearches/daily/rss?geo=${encodeURIComponent(geo)}`;
}

/** First title is the feed's own; the next ten are trending searches. */
export function parseGoogleTrendsRss(xml: string): string[] {
  const titles = cdataTitles(xml);
  return titles.length > 1 ? titles.slice(1, 11) : [];
}

export async function fetchGoogleTrends(deps: SourceDeps): Promise<string[]> {
  if (deps.settings.DEMO_MODE) return [...DEMO_GOOGLE];
  return tracked('google', deps.log, async () => {
    const xml = await getOk(deps.http, googleTrendsUrl(deps.settings.GOOGLE_TRENDS_GEO));
    const trends = parseGoogleTrendsRss(xml);
    if (!trends.length) throw new Error('no trends in feed');
    return trends;
  }, () => [...GOOGLE_FALLBACK_TRENDS]);
}
