import { getOk } from '../http.js';
import { DEMO_TWITTER } from './demo.js';
import { decodeEntities, matchAll, tracked } from './text.js';
import type { SourceDeps } from './types.js';

const TREND_RE = /<span class="trend-name">([^<]+)<\/span>/g;

export function parseNitterExplore(html: string): string[] {
  return matchAll(TREND_RE, html).map(decodeEntities);
}

// Instances are tried in order; the first one that yields any trend wins.
export async function fetchTwitterTrends(deps: SourceDeps): Promise<string[]> {
  if (deps.settings.DEMO_MODE) return [...DEMO_TWITTER];
  return tracked('twitter', deps.log, async () => {
    for (const instance of deps.settings.NITTER_INSTANCES) {
      try {
        const html = await getOk(deps.http, `${instance}/explore`);
        const trends = parseNitterExplore(html);
        if (trends.length) {
          deps.log.info('source.twitter.instance', { instance, items: trends.length });
          return trends.slice(0, 10);
        }
      } catch (e) {
        deps.log.warn('source.twitter.instance_failed', { instance, error: e });
      }
    }
    throw new Error('no nitter instance returned trends');
  });
}
