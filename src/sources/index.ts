import { fetchCoingeckoTrending } from './coingecko.js';
import { fetchGoogleTrends } from './google_trends.js';
import { fetchCryptoNews } from './news.js';
import { fetchTwitterTrends } from './nitter.js';
import { fetchRedditTrending } from './reddit.js';
import { fetchYoutubeTrending } from './youtube.js';
import type { RedditPost, SourceDeps, TrendingCoin } from './types.js';

export type { RedditPost, SourceDeps, SourceKey, TrendingCoin } from './types.js';

export type Fetchers = {
  google: () => Promise<string[]>;
  twitter: () => Promise<string[]>;
  youtube: () => Promise<string[]>;
  reddit: () => Promise<RedditPost[]>;
  coins: () => Promise<TrendingCoin[]>;
  news: () => Promise<string[]>;
};

export function createFetchers(deps: SourceDeps): Fetchers {
  return {
    google: () => fetchGoogleTrends(deps),
    twitter: () => fetchTwitterTrends(deps),
    youtube: () => fetchYoutubeTrending(deps),
    reddit: () => fetchRedditTrending(deps),
    coins: () => fetchCoingeckoTrending(deps),
    news: () => fetchCryptoNews(deps),
  };
}
