import type { NextFunction } from 'grammy';

export class SlidingWindowLimiter {
  private hits = new Map<number, number[]>();
  private lastSweep = 0;
  constructor(private windowMs: number, private perWindow: number) {}

  /** Users with hits inside the current window. */
  get size(): number {
    return this.hits.size;
  }

  allow(key: number, now = Date.now()): boolean {
    if (now - this.lastSweep >= this.windowMs) this.sweep(now);
    const recent = (this.hits.get(key) ?? []).filter(ts => now - ts < this.windowMs);
    if (recent.length >= this.perWindow) {
      this.hits.set(key, recent);
      return false;
    }
    recent.push(now);
    this.hits.set(key, recent);
    return true;
  }

  // drop users whose newest hit has left the window
  private sweep(now: number) {
    this.lastSweep = now;
    for (const [key, ts] of this.hits) {
      const newest = ts[ts.length - 1];
      if (newest === undefined || now - newest >= this.windowMs) this.hits.delete(key);
    }
  }
}

/** The part of grammY's context the guard reads. */
export type GuardCtx = {
  from?: { id: number };
  msg?: { text?: string };
  reply(text: string): Promise<unknown>;
};

/** Per-user command rate limit for the bot. Updates without a sender pass through. */
export function rateGuard(limiter: SlidingWindowLimiter) {
  return async (ctx: GuardCtx, next: NextFunction) => {
    const uid = ctx.from?.id;
    if (uid !== undefined && ctx.msg?.text?.startsWith('/') && !limiter.allow(uid)) {
      await ctx.reply('Rate limit: try again in a few seconds.');
      return;
    }
    await next();
  };
}
