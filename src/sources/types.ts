import type { HttpClient } from '../http.js';
import type { Logger } from '../observability/log.js';
import type { Settings } from '../config/settings.js';

export type RedditPost = { title: string; score: number; subreddit: string; url: string };

export type TrendingCoin = { name: string; symbol: string; marketCapRank: number | null; priceBtc: number };

export type SourceKey = 'google' | 'twitter' | 'youtube' | 'reddit' | 'coins' | 'news';

export type SourceDeps = {
  http: HttpClient;
  settings: Settings;
  log: Logger;
  sleep?: (ms: number) => Promise<void>;
};
