import type { Fetchers, RedditPost, SourceKey, TrendingCoin } from './sources/index.js';
import type { Logger } from './observability/log.js';
import { botMetrics } from './metrics.js';

export type TrendSnapshot = {
  google: string[];
  twitter: string[];
  youtube: string[];
  reddit: RedditPost[];
  coins: TrendingCoin[];
  news: string[];
  lastUpdate: Date | null;
};

export const ALL_SOURCES: readonly SourceKey[] = ['google', 'twitter', 'youtube', 'reddit', 'coins', 'news'];

export function emptySnapshot(): TrendSnapshot {
  return { google: [], twitter: [], youtube: [], reddit: [], coins: [], news: [], lastUpdate: null };
}

export function totalItems(s: TrendSnapshot): number {
  return ALL_SOURCES.reduce((n, k) => n + s[k].length, 0);
}

function settled<T>(r: PromiseSettledResult<T[]>): T[] {
  return r.status === 'fulfilled' ? r.value : [];
}

export class TrendCache {
  private data: TrendSnapshot = emptySnapshot();
  private inflight: Promise<TrendSnapshot> | null = null;

  constructor(private fetchers: Fetchers, private log: Logger, private now: () => Date = () => new Date()) {}

  snapshot(): TrendSnapshot {
    return this.data;
  }

  isEmpty(keys: readonly SourceKey[] = ALL_SOURCES): boolean {
    return keys.every(k => this.data[k].length === 0);
  }

  /** Runs every fetcher concurrently; callers arriving mid-run share it. */
  refresh(): Promise<TrendSnapshot> {
    if (!this.inflight) {
      this.inflight = this.runRefresh().finally(() => { this.inflight = null; });
    }
    return this.inflight;
  }

  private async runRefresh(): Promise<TrendSnapshot> {
    this.log.info('trends.refresh.start');
    const f = this.fetchers;
    const [google, reddit, coins, youtube, twitter, news] = await Promise.allSettled([
      f.google(), f.reddit(), f.coins(), f.youtube(), f.twitter(), f.news(),
    ]);
    for (const [source, r] of [['google', google], ['reddit', reddit], ['coins', coins], ['youtube', youtube], ['twitter', twitter], ['news', news]] as const) {
      if (r.status === 'rejected') this.log.error('trends.source_rejected', { source, error: r.reason });
    }
    this.data = {
      google: settled(google),
      reddit: settled(reddit),
      coins: settled(coins),
      youtube: settled(youtube),
      twitter: settled(twitter),
      news: settled(news),
      lastUpdate: this.now(),
    };
    botMetrics.refreshes_total++;
    this.log.info('trends.refresh.done', { total: totalItems(this.data) });
    return this.data;
  }
}
