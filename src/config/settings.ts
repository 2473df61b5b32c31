export type Settings = {
  TELEGRAM_BOT_TOKEN: string;
  REFRESH_INTERVAL_MS: number;
  MONITOR_RETRY_MS: number;
  FETCH_TIMEOUT_MS: number;
  REDDIT_DELAY_MS: number;
  GOOGLE_TRENDS_GEO: string;
  NITTER_INSTANCES: string[];
  REDDIT_SUBREDDITS: string[];
  HTTP_USER_AGENT: string;
  REDIS_URL: string;
  HEALTH_PORT: number;
  DEMO_MODE: boolean;
  JSON_LOGS: boolean;
  RATE_WINDOW_MS: number;
  RATE_PER_USER: number;
};

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const DEFAULT_NITTER = ['https://nitter.net', 'https://nitter.privacydev.net', 'https://nitter.poast.org'];
const DEFAULT_SUBREDDITS = ['cryptocurrency', 'solana', 'CryptoMoonShots'];

function list(v: string | undefined, dflt: string[]): string[] {
  const out = (v ?? '').split(',').map(s => s.trim()).filter(Boolean);
  return out.length ? out : dflt;
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const num = (k: string, d: number) => {
    const raw = env[k];
    if (raw === undefined || raw.trim() === '') return d;
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 ? n : d;
  };
  return {
    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN ?? '',
    REFRESH_INTERVAL_MS: num('REFRESH_INTERVAL_MS', 30 * 60_000),
    MONITOR_RETRY_MS: num('MONITOR_RETRY_MS', 5 * 60_000),
    FETCH_TIMEOUT_MS: num('FETCH_TIMEOUT_MS', 10_000),
    REDDIT_DELAY_MS: num('REDDIT_DELAY_MS', 2_000),
    GOOGLE_TRENDS_GEO: (env.GOOGLE_TRENDS_GEO || 'US').trim(),
    NITTER_INSTANCES: list(env.NITTER_INSTANCES, DEFAULT_NITTER).map(s => s.replace(/\/+$/, '')),
    REDDIT_SUBREDDITS: list(env.REDDIT_SUBREDDITS, DEFAULT_SUBREDDITS),
    HTTP_USER_AGENT: env.HTTP_USER_AGENT || DEFAULT_USER_AGENT,
    REDIS_URL: env.REDIS_URL || '',
    HEALTH_PORT: num('HEALTH_PORT', 3000),
    DEMO_MODE: env.DEMO_MODE === 'true',
    JSON_LOGS: env.JSON_LOGS === 'true',
    RATE_WINDOW_MS: num('RATE_WINDOW_MS', 10_000),
    RATE_PER_USER: Math.max(1, num('RATE_PER_USER', 5)),
  };
}
