import { getOk } from '../http.js';
import { DEMO_YOUTUBE } from './demo.js';
import { decodeJsonString, matchAll, tracked } from './text.js';
import type { SourceDeps } from './types.js';

export const YOUTUBE_TRENDING_URL = 'https://www.youtube.com/feed/trending';

const RUN_TITLE_RE = /"title":\{"runs":\[\{"text":"([^"]+)"\}\]/g;

export function parseYoutubeTrending(html: string): string[] {
  return matchAll(RUN_TITLE_RE, html)
    .map(decodeJsonString)
    // short strings and "YouTube ..." are page chrome, not videos
    .filter(t => t.length > 10 && !t.startsWith('YouTube'))
    .slice(0, 15);
}

export async function fetchYoutubeTrending(deps: SourceDeps): Promise<string[]> {
  if (deps.settings.DEMO_MODE) return [...DEMO_YOUTUBE];
  return tracked('youtube', deps.log, async () => parseYoutubeTrending(await getOk(deps.http, YOUTUBE_TRENDING_URL)));
}
