import { Bot } from 'grammy';
import type { Settings } from './config/settings.js';
import { createHttpClient } from './http.js';
import type { Logger } from './observability/log.js';
import { createFetchers } from './sources/index.js';
import { TrendCache } from './trends_cache.js';
import { createSubscriptionStore, type SubscriptionStore } from './subscriptions.js';
import { COMMAND_MENU, registerCommands } from './commands.js';
import { rateGuard, SlidingWindowLimiter } from './security/rate_guard.js';

export type App = { bot: Bot; cache: TrendCache; subs: SubscriptionStore };

export function createApp(settings: Settings, log: Logger): App {
  const http = createHttpClient({ timeoutMs: settings.FETCH_TIMEOUT_MS, userAgent: settings.HTTP_USER_AGENT });
  const cache = new TrendCache(createFetchers({ http, settings, log }), log);
  const subs = createSubscriptionStore(settings.REDIS_URL);

  const bot = new Bot(settings.TELEGRAM_BOT_TOKEN);
  bot.use(rateGuard(new SlidingWindowLimiter(settings.RATE_WINDOW_MS, settings.RATE_PER_USER)));
  registerCommands(bot, { cache, subs, refreshIntervalMs: settings.REFRESH_INTERVAL_MS });
  bot.catch(err => log.error('bot.error', { update: err.ctx.update.update_id, error: err.error }));
  return { bot, cache, subs };
}

export async function registerMenu(bot: Bot) {
  await bot.api.setMyCommands([...COMMAND_MENU]);
}
