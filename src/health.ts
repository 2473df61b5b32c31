import http from 'node:http';
import { getBotMetrics, getSourceMetrics } from './metrics.js';
import type { TrendCache } from './trends_cache.js';
import type { Logger } from './observability/log.js';

export function createHealthServer(deps: { cache: TrendCache; startedAt?: number }) {
  const started = deps.startedAt ?? Date.now();
  return http.createServer((req, res) => {
    const url = req.url ?? '/';
    if (url.startsWith('/live') || url.startsWith('/healthz')) {
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.end('ok');
      return;
    }
    if (url.startsWith('/ready')) {
      // ready once the first refresh has landed
      if (deps.cache.snapshot().lastUpdate) {
        res.writeHead(200, { 'content-type': 'text/plain' });
        res.end('ready');
      } else {
        res.writeHead(503, { 'content-type': 'text/plain', 'Retry-After': '30' });
        res.end('not ready');
      }
      return;
    }
    if (url.startsWith('/metrics')) {
      const mem = process.memoryUsage();
      const lastUpdate = deps.cache.snapshot().lastUpdate;
      const payload = {
        uptimeSec: Math.round((Date.now() - started) / 1000),
        rss: mem.rss, heapUsed: mem.heapUsed, heapTotal: mem.heapTotal,
        node: process.version,
        lastUpdate: lastUpdate ? lastUpdate.toISOString() : null,
        sources: getSourceMetrics(),
        bot: getBotMetrics(),
      };
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify(payload));
      return;
    }
    res.writeHead(404, { 'content-type': 'text/plain' });
    res.end('not found');
  });
}

export function startHealthServer(deps: { cache: TrendCache; log: Logger; port: number }) {
  const srv = createHealthServer({ cache: deps.cache });
  srv.listen(deps.port, () => deps.log.info('health.listening', { port: deps.port }));
  return srv;
}
