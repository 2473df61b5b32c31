import { getOk } from '../http.js';
import { DEMO_NEWS } from './demo.js';
import { cdataTitles, tracked } from './text.js';
import type { SourceDeps } from './types.js';

export const NEWS_RSS_URL = 'https://cointelegraph.com/rss';

export function parseNewsRss(xml: string): string[] {
  const titles = cdataTitles(xml);
  return titles.length > 1 ? titles.slice(1, 11) : [];
}

export async function fetchCryptoNews(deps: SourceDeps): Promise<string[]> {
  if (deps.settings.DEMO_MODE) return [...DEMO_NEWS];
  return tracked('news', deps.log, async () => parseNewsRss(await getOk(deps.http, NEWS_RSS_URL)));
}
