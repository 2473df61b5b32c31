import { recordSourceFailure, recordSourceSuccess } from '../metrics.js';
import type { Logger } from '../observability/log.js';
import type { SourceKey } from './types.js';

const CDATA_TITLE_RE = /<title><!\[CDATA\[(.*?)\]\]><\/title>/g;

export function matchAll(re: RegExp, text: string): string[] {
  return Array.from(text.matchAll(re), m => m[1] ?? '');
}

export function cdataTitles(xml: string): string[] {
  return matchAll(CDATA_TITLE_RE, xml);
}

const ENTITIES: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'", '#39': "'" };

export function decodeEntities(s: string): string {
  return s.replace(/&(amp|lt|gt|quot|apos|#39);/g, (m, name: string) => ENTITIES[name] ?? m);
}

/** Decodes `\uXXXX` style escapes found inside embedded JSON; returns the input when it is not a valid JSON string body. */
export function decodeJsonString(s: string): string {
  try {
    const v: unknown = JSON.parse(`"${s}"`);
    return typeof v === 'string' ? v : s;
  } catch {
    return s;
  }
}

/**
 * Runs one source fetch, recording metrics. A thrown error is logged and
 * replaced by `fallback`.
 */
export async function tracked<T>(source: SourceKey, log: Logger, run: () => Promise<T[]>, fallback: () => T[] = () => []): Promise<T[]> {
  const t0 = Date.now();
  try {
    const items = await run();
    recordSourceSuccess(source, Date.now() - t0, items.length);
    log.info('source.ok', { source, items: items.length });
    return items;
  } catch (e) {
    recordSourceFailure(source, Date.now() - t0, e);
    const fb = fallback();
    log.warn('source.failed', { source, error: e, fallback: fb.length });
    return fb;
  }
}

export const sleep = (ms: number) => new Promise<void>(res => setTimeout(res, ms));
