type SourceStat = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  totalLatencyMs: number;
  lastItems: number;
  lastError?: string;
};

export type SourceMetrics = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  avgLatencyMs: number;
  lastItems: number;
  lastError?: string;
};

const stats = new Map<string, SourceStat>();

function ensure(source: string): SourceStat {
  let s = stats.get(source);
  if (!s) {
    s = { success: 0, fail: 0, lastLatencyMs: 0, totalLatencyMs: 0, lastItems: 0 };
    stats.set(source, s);
  }
  return s;
}

export function recordSourceSuccess(source: string, latencyMs: number, items: number) {
  const s = ensure(source);
  s.success += 1;
  s.lastLatencyMs = Math.max(0, Math.round(latencyMs));
  s.totalLatencyMs += latencyMs;
  s.lastItems = items;
}

export function recordSourceFailure(source: string, latencyMs: number, error?: unknown) {
  const s = ensure(source);
  s.fail += 1;
  s.lastLatencyMs = Math.max(0, Math.round(latencyMs));
  s.totalLatencyMs += latencyMs;
  s.lastItems = 0;
  s.lastError = error instanceof Error ? error.message : String(error ?? 'error');
}

export function getSourceMetrics(): Record<string, SourceMetrics> {
  const out: Record<string, SourceMetrics> = {};
  for (const [k, v] of stats) {
    const count = v.success + v.fail;
    out[k] = {
      success: v.success,
      fail: v.fail,
      lastLatencyMs: v.lastLatencyMs,
      avgLatencyMs: count > 0 ? Math.round(v.totalLatencyMs / count) : 0,
      lastItems: v.lastItems,
      lastError: v.lastError,
    };
  }
  return out;
}

export function resetSourceMetrics() {
  stats.clear();
}

// --- Bot (Telegram) counters (in-memory only)
export const botMetrics = {
  commands_total: 0,
  refreshes_total: 0,
  notifications_sent_total: 0,
  notifications_failed_total: 0,
};

export function getBotMetrics() {
  return { ...botMetrics };
}
