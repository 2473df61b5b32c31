import { describe, it, expect } from 'vitest';
import { createAutoHandler, createHandlers, COMMAND_MENU } from '../src/commands.js';
import { TrendCache } from '../src/trends_cache.js';
import { MemorySubscriptions } from '../src/subscriptions.js';
import { ctxStub, memoryLogger, staticFetchers } from './helpers/fakes.js';

type Data = Parameters<typeof staticFetchers>[0];

function setup(data: Data = {}) {
  const fetchers = staticFetchers(data);
  const cache = new TrendCache(fetchers, memoryLogger(), () => new Date(2024, 0, 1, 9, 5, 3));
  const subs = new MemorySubscriptions();
  const handlers = createHandlers({ cache, subs, refreshIntervalMs: 30 * 60_000, rand: () => 0 });
  const run = async (text: string, userId?: number) => {
    const ctx = ctxStub(text, userId);
    const name = text.split(' ')[0]?.slice(1) ?? '';
    const handler = handlers[name];
    if (!handler) throw new Error(`no handler for ${name}`);
    await handler(ctx);
    return ctx;
  };
  return { fetchers, cache, subs, run };
}

describe('trend commands', () => {
  it('/trends fetches on first access and renders markdown', async () => {
    const { run, fetchers } = setup({ google: ['Solar Eclipse'] });
    const ctx = await run('/trends');
    expect(ctx.texts()).toEqual([
      '⏳ Fetching trends for the first time...',
      '📊 *Google Trending Searches*\n🕐 Updated: 09:05:03\n\n1. Solar Eclipse\n\n💡 Use /generate to create coin ideas!',
    ]);
    expect(ctx.outputs[1]?.opts).toEqual({ parse_mode: 'Markdown' });

    const again = await run('/trends');
    expect(again.texts()).toHaveLength(1);
    expect(fetchers.calls).toBe(1);
  });

  it('/trends reports an empty feed', async () => {
    const { run } = setup();
    expect((await run('/trends')).texts()).toEqual([
      '⏳ Fetching trends for the first time...',
      '❌ No trends available. Try /refresh',
    ]);
  });

  it('each source command has its own empty message', async () => {
    const { run } = setup();
    expect((await run('/twitter')).texts()[1]).toBe('❌ Twitter trends unavailable. Try /refresh in a moment.');
    expect((await run('/youtube')).texts()[1]).toBe('❌ YouTube trends unavailable.');
    expect((await run('/reddit')).texts()[1]).toBe('❌ No Reddit trends available.');
    expect((await run('/coins')).texts()[1]).toBe('❌ No trending coins available.');
    expect((await run('/news')).texts()[1]).toBe('❌ News unavailable.');
  });

  it('/all always renders the digest frame', async () => {
    const { run } = setup();
    expect((await run('/all')).texts()).toEqual([
      '⏳ Fetching ALL trends...',
      '🌐 *ALL TRENDING DATA*\n\nUse specific commands for more details!',
    ]);
  });

  it('/refresh reports before and after', async () => {
    const { run, fetchers } = setup({ google: ['g'] });
    expect((await run('/refresh')).texts()).toEqual([
      '🔄 Refreshing all trend data...',
      '✅ Data refreshed! Use /trends or /generate',
    ]);
    expect(fetchers.calls).toBe(1);
  });

  it('/start mentions the refresh cadence', async () => {
    const { run } = setup();
    const ctx = await run('/start');
    expect(ctx.texts()[0]).toContain('every 30 minutes!');
  });
});

describe('/generate', () => {
  it('mints concepts from cached trends', async () => {
    const { run } = setup({ twitter: ['Moon Landing'] });
    const ctx = await run('/generate');
    const texts = ctx.texts();
    expect(texts[0]).toBe('⏳ Fetching trends first...');
    expect(texts[1]).toBe('🎨 Generating coin ideas from ALL sources...');
    expect(texts[2]?.split('\n').slice(0, 6)).toEqual([
      '🚀 *Generated Coin Concepts*',
      '',
      '*1. MoonCoin* ($MOON)',
      '📝 The official memecoin of Moon Landing! 🚀',
      '📊 Based on: Moon Landing...',
      '🔍 Source: 🐦 Twitter',
    ]);
  });

  it('says so when there is nothing to build from', async () => {
    const { run } = setup({ news: ['only news'] });
    expect((await run('/generate')).texts()).toEqual([
      '⏳ Fetching trends first...',
      '🎨 Generating coin ideas from ALL sources...',
      '❌ No trends available to generate ideas.',
    ]);
  });
});

describe('/auto', () => {
  const usage = 'Usage: /auto `on` or /auto `off`';

  it('rejects anything but a single on/off', async () => {
    const { run } = setup();
    expect((await run('/auto')).texts()).toEqual([usage]);
    expect((await run('/auto maybe')).texts()).toEqual([usage]);
    expect((await run('/auto on now')).texts()).toEqual([usage]);
  });

  it('toggles the caller opt-in, case-insensitively', async () => {
    const { run, subs } = setup();
    expect((await run('/auto ON', 7)).texts()).toEqual([
      "🔔 Auto-notifications *ENABLED*!\nI'll notify you when new trending topics appear.",
    ]);
    expect(await subs.isAutoNotify(7)).toBe(true);
    expect((await run('/auto off', 7)).texts()).toEqual(['🔕 Auto-notifications *DISABLED*.']);
    expect(await subs.listAutoNotify()).toEqual([]);
  });

  it('needs a sender', async () => {
    const { subs } = setup();
    const ctx = ctxStub('/auto on');
    ctx.from = undefined;
    await createAutoHandler(subs)(ctx);
    expect(ctx.texts()).toEqual(['Auto-notifications need a user account.']);
    expect(await subs.listAutoNotify()).toEqual([]);
  });
});

describe('/status', () => {
  it('counts items and subscribers', async () => {
    const { run, cache, subs } = setup({ google: ['a', 'b'] });
    await cache.refresh();
    await subs.setAutoNotify(1, true);
    const text = (await run('/status')).texts()[0] ?? '';
    expect(text.split('\n').slice(0, 2)).toEqual(['🩺 *Status*', '🕐 Last update: 09:05:03']);
    expect(text.split('\n').at(-1)).toBe('🔔 Auto-notify subscribers: 1');
  });
});

describe('command menu', () => {
  it('lists every menu entry as a registered handler', () => {
    const { cache, subs } = setup();
    const handlers = createHandlers({ cache, subs, refreshIntervalMs: 1 });
    for (const { command } of COMMAND_MENU) expect(handlers[command]).toBeTypeOf('function');
  });
});
