import { asArray, field, parseJson } from '../http.js';
import { DEMO_REDDIT } from './demo.js';
import { sleep as defaultSleep, tracked } from './text.js';
import type { RedditPost, SourceDeps } from './types.js';

export function subredditHotUrl(subreddit: string) {
  return `https://www.reddit.com/r/${encodeURIComponent(subreddit)}/hot.json?limit=5`;
}

export function parseRedditListing(json: unknown, subreddit: string): RedditPost[] {
  const children = asArray(field(field(json, 'data'), 'children'));
  return children.map(child => {
    const d = field(child, 'data');
    const title = field(d, 'title');
    const score = field(d, 'score');
    const permalink = field(d, 'permalink');
    return {
      title: typeof title === 'string' ? title : '',
      score: typeof score === 'number' && Number.isFinite(score) ? score : 0,
      subreddit,
      url: `https://reddit.com${typeof permalink === 'string' ? permalink : ''}`,
    };
  });
}

/** Highest score first; posts with equal scores keep fetch order. */
export function topPosts(posts: RedditPost[], n = 10): RedditPost[] {
  return [...posts].sort((a, b) => b.score - a.score).slice(0, n);
}

export async function fetchRedditTrending(deps: SourceDeps): Promise<RedditPost[]> {
  if (deps.settings.DEMO_MODE) return DEMO_REDDIT.map(p => ({ ...p }));
  const sleep = deps.sleep ?? defaultSleep;
  return tracked('reddit', deps.log, async () => {
    const all: RedditPost[] = [];
    for (const subreddit of deps.settings.REDDIT_SUBREDDITS) {
      try {
        const res = await deps.http.get(subredditHotUrl(subreddit));
        if (res.status === 200) all.push(...parseRedditListing(parseJson(res.body), subreddit));
        else deps.log.warn('source.reddit.status', { subreddit, status: res.status });
        await sleep(deps.settings.REDDIT_DELAY_MS);
      } catch (e) {
        deps.log.warn('source.reddit.subreddit_failed', { subreddit, error: e });
      }
    }
    return topPosts(all);
  });
}
