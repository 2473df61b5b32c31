import { setTimeout as delay } from 'node:timers/promises';
import type { TrendCache } from './trends_cache.js';
import type { SubscriptionStore } from './subscriptions.js';
import type { Logger } from './observability/log.js';
import { renderFreshTrends } from './ui.js';
import { botMetrics } from './metrics.js';

export type Sender = (chatId: number, text: string) => Promise<unknown>;
type Stopper = () => void;

export type MonitorDeps = {
  cache: TrendCache;
  subs: SubscriptionStore;
  send: Sender;
  log: Logger;
};

/** Entries of `next` absent from `prev`, in `next` order, without duplicates. */
export function freshTrends(prev: readonly string[], next: readonly string[]): string[] {
  const seen = new Set(prev);
  const out: string[] = [];
  for (const t of next) {
    if (seen.has(t)) continue;
    seen.add(t);
    out.push(t);
  }
  return out;
}

export async function runMonitorPass(deps: MonitorDeps): Promise<{ fresh: string[]; notified: number }> {
  const before = deps.cache.snapshot().google;
  const after = (await deps.cache.refresh()).google;
  const fresh = freshTrends(before, after);
  if (!fresh.length) return { fresh, notified: 0 };
  const text = renderFreshTrends(fresh);
  let notified = 0;
  for (const userId of await deps.subs.listAutoNotify()) {
    try {
      await deps.send(userId, text);
      notified++;
      botMetrics.notifications_sent_total++;
    } catch (e) {
      botMetrics.notifications_failed_total++;
      deps.log.warn('monitor.notify_failed', { userId, error: e });
    }
  }
  deps.log.info('monitor.fresh', { fresh: fresh.length, notified });
  return { fresh, notified };
}

async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (e) {
    if (signal.aborted) return false;
    throw e;
  }
}

export function startTrendMonitor(deps: MonitorDeps & { intervalMs: number; retryMs: number }): Stopper {
  const controller = new AbortController();
  const { signal } = controller;
  const loop = async () => {
    deps.log.info('monitor.start', { intervalMs: deps.intervalMs });
    await deps.cache.refresh();
    while (!signal.aborted) {
      try {
        if (!(await pause(deps.intervalMs, signal))) return;
        await runMonitorPass(deps);
      } catch (e) {
        deps.log.error('monitor.iteration_failed', { error: e });
        if (!(await pause(deps.retryMs, signal))) return;
      }
    }
  };
  loop().catch(e => deps.log.error('monitor.stopped', { error: e }));
  return () => controller.abort();
}
