import type { Bot } from 'grammy';
import type { TrendCache, TrendSnapshot } from './trends_cache.js';
import { ALL_SOURCES } from './trends_cache.js';
import type { SubscriptionStore } from './subscriptions.js';
import type { SourceKey } from './sources/index.js';
import type { Rand } from './coin_ideas.js';
import { conceptsFromSnapshot } from './coin_ideas.js';
import { botMetrics, getSourceMetrics } from './metrics.js';
import {
  renderAll, renderCoins, renderConcepts, renderGoogleTrends, renderNews, renderReddit,
  renderStatus, renderTwitter, renderYoutube, welcomeText,
} from './ui.js';

export type ReplyOpts = { parse_mode?: 'Markdown' };

/** The part of grammY's command context the handlers touch. */
export type CommandCtx = {
  match?: string;
  from?: { id: number };
  reply(text: string, opts?: ReplyOpts): Promise<unknown>;
};

export type Handler = (ctx: CommandCtx) => Promise<unknown>;

export type CommandDeps = {
  cache: TrendCache;
  subs: SubscriptionStore;
  refreshIntervalMs: number;
  rand?: Rand;
  now?: () => Date;
};

const MD: ReplyOpts = { parse_mode: 'Markdown' };

export const COMMAND_MENU: ReadonlyArray<{ command: string; description: string }> = [
  { command: 'trends', description: '📊 Google/general trends' },
  { command: 'twitter', description: '🐦 Twitter trending' },
  { command: 'youtube', description: '📺 YouTube trending' },
  { command: 'all', description: '🌐 All sources at once' },
  { command: 'generate', description: '🎨 Generate coin ideas' },
  { command: 'reddit', description: '🔥 Reddit posts' },
  { command: 'coins', description: '💎 Trending coins' },
  { command: 'news', description: '📰 Crypto news' },
  { command: 'refresh', description: '🔄 Refresh data' },
  { command: 'status', description: '🩺 Source health' },
];

type SourceView = {
  keys: readonly SourceKey[];
  fetching: string;
  empty: string;
  hasData: (s: TrendSnapshot) => boolean;
  render: (s: TrendSnapshot) => string;
};

// Fetch on first access, then render whatever the cache holds.
export function createSourceHandler(cache: TrendCache, view: SourceView): Handler {
  return async (ctx) => {
    if (cache.isEmpty(view.keys)) {
      await ctx.reply(view.fetching);
      await cache.refresh();
    }
    const snap = cache.snapshot();
    if (!view.hasData(snap)) return ctx.reply(view.empty);
    return ctx.reply(view.render(snap), MD);
  };
}

export function createGenerateHandler(deps: CommandDeps): Handler {
  const { cache } = deps;
  return async (ctx) => {
    if (cache.isEmpty(['google', 'reddit', 'youtube', 'twitter'])) {
      await ctx.reply('⏳ Fetching trends first...');
      await cache.refresh();
    }
    await ctx.reply('🎨 Generating coin ideas from ALL sources...');
    const concepts = conceptsFromSnapshot(cache.snapshot(), deps.rand, deps.now?.());
    if (!concepts.length) return ctx.reply('❌ No trends available to generate ideas.');
    return ctx.reply(renderConcepts(concepts), MD);
  };
}

export function createRefreshHandler(cache: TrendCache): Handler {
  return async (ctx) => {
    await ctx.reply('🔄 Refreshing all trend data...');
    await cache.refresh();
    return ctx.reply('✅ Data refreshed! Use /trends or /generate');
  };
}

export function createAutoHandler(subs: SubscriptionStore): Handler {
  return async (ctx) => {
    const args = (ctx.match ?? '').trim().split(/\s+/).filter(Boolean);
    const arg = args.length === 1 ? args[0]?.toLowerCase() : undefined;
    if (arg !== 'on' && arg !== 'off') {
      return ctx.reply('Usage: /auto `on` or /auto `off`', MD);
    }
    const uid = ctx.from?.id;
    if (uid === undefined) return ctx.reply('Auto-notifications need a user account.');
    const on = arg === 'on';
    await subs.setAutoNotify(uid, on);
    if (on) {
      return ctx.reply("🔔 Auto-notifications *ENABLED*!\nI'll notify you when new trending topics appear.", MD);
    }
    return ctx.reply('🔕 Auto-notifications *DISABLED*.', MD);
  };
}

export function createStatusHandler(deps: CommandDeps): Handler {
  return async (ctx) => {
    const snap = deps.cache.snapshot();
    const metrics = getSourceMetrics();
    const rows = ALL_SOURCES.map(source => {
      const m = metrics[source];
      return { source, items: snap[source].length, success: m?.success ?? 0, fail: m?.fail ?? 0, lastError: m?.lastError };
    });
    const subscribers = (await deps.subs.listAutoNotify()).length;
    return ctx.reply(renderStatus({ lastUpdate: snap.lastUpdate, rows, subscribers }), MD);
  };
}

export function createHandlers(deps: CommandDeps): Record<string, Handler> {
  const { cache } = deps;
  const welcome: Handler = (ctx) => ctx.reply(welcomeText(Math.round(deps.refreshIntervalMs / 60_000)), MD);
  return {
    start: welcome,
    help: welcome,
    trends: createSourceHandler(cache, {
      keys: ['google'],
      fetching: '⏳ Fetching trends for the first time...',
      empty: '❌ No trends available. Try /refresh',
      hasData: s => s.google.length > 0,
      render: renderGoogleTrends,
    }),
    twitter: createSourceHandler(cache, {
      keys: ['twitter'],
      fetching: '⏳ Fetching Twitter trends...',
      empty: '❌ Twitter trends unavailable. Try /refresh in a moment.',
      hasData: s => s.twitter.length > 0,
      render: renderTwitter,
    }),
    youtube: createSourceHandler(cache, {
      keys: ['youtube'],
      fetching: '⏳ Fetching YouTube trends...',
      empty: '❌ YouTube trends unavailable.',
      hasData: s => s.youtube.length > 0,
      render: renderYoutube,
    }),
    reddit: createSourceHandler(cache, {
      keys: ['reddit'],
      fetching: '⏳ Fetching Reddit trends...',
      empty: '❌ No Reddit trends available.',
      hasData: s => s.reddit.length > 0,
      render: renderReddit,
    }),
    coins: createSourceHandler(cache, {
      keys: ['coins'],
      fetching: '⏳ Fetching trending coins...',
      empty: '❌ No trending coins available.',
      hasData: s => s.coins.length > 0,
      render: renderCoins,
    }),
    news: createSourceHandler(cache, {
      keys: ['news'],
      fetching: '⏳ Fetching crypto news...',
      empty: '❌ News unavailable.',
      hasData: s => s.news.length > 0,
      render: renderNews,
    }),
    all: createSourceHandler(cache, {
      keys: ALL_SOURCES,
      fetching: '⏳ Fetching ALL trends...',
      empty: '❌ No trends available. Try /refresh',
      hasData: () => true,
      render: renderAll,
    }),
    generate: createGenerateHandler(deps),
    refresh: createRefreshHandler(cache),
    auto: createAutoHandler(deps.subs),
    status: createStatusHandler(deps),
  };
}

export function registerCommands(bot: Bot, deps: CommandDeps) {
  for (const [name, handler] of Object.entries(createHandlers(deps))) {
    bot.command(name, async (ctx) => {
      botMetrics.commands_total++;
      await handler(ctx);
    });
  }
}
