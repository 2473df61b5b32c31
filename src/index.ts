import './env.js';
import { readSettings } from './config/settings.js';
import { log } from './observability/log.js';
import { createApp, registerMenu } from './app.js';
import { startTrendMonitor } from './monitor.js';
import { startHealthServer } from './health.js';

const settings = readSettings();
if (!settings.TELEGRAM_BOT_TOKEN) {
  log.error('startup.missing_token', { hint: 'Please set TELEGRAM_BOT_TOKEN' });
  process.exit(1);
}

const { bot, cache, subs } = createApp(settings, log);
const health = startHealthServer({ cache, log, port: settings.HEALTH_PORT });

let stopMonitor: (() => void) | undefined;

const shutdown = (signal: string) => {
  log.info('shutdown', { signal });
  stopMonitor?.();
  health.close();
  bot.stop().catch(e => log.error('shutdown.bot_stop_failed', { error: e }));
};
process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

bot.start({
  allowed_updates: ['message'],
  onStart: (me) => {
    log.info('bot.started', { username: me.username, demo: settings.DEMO_MODE });
    registerMenu(bot).catch(e => log.warn('bot.menu_failed', { error: e }));
    stopMonitor = startTrendMonitor({
      cache,
      subs,
      log,
      send: (chatId, text) => bot.api.sendMessage(chatId, text, { parse_mode: 'Markdown' }),
      intervalMs: settings.REFRESH_INTERVAL_MS,
      retryMs: settings.MONITOR_RETRY_MS,
    });
  },
}).catch(e => {
  log.error('bot.start_failed', { error: e });
  process.exit(1);
});
