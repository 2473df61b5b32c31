import { maskText } from '../security/log_mask.js';

export type LogLevel = 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

export type Logger = {
  info: (at: string, fields?: LogFields) => void;
  warn: (at: string, fields?: LogFields) => void;
  error: (at: string, fields?: LogFields) => void;
};

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function plain(fields: LogFields): string {
  return Object.entries(fields)
    .map(([k, v]) => `${k}=${v instanceof Error ? errorText(v) : typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
}

export function createLogger(opts: { json?: boolean; secrets?: string[]; sink?: (level: LogLevel, line: string) => void } = {}): Logger {
  const json = () => opts.json ?? process.env.JSON_LOGS === 'true';
  // env is read per line so the default logger picks up .env loaded after import
  const secrets = () => (opts.secrets ?? [process.env.TELEGRAM_BOT_TOKEN ?? '']).filter(Boolean);
  const sink = opts.sink ?? ((level: LogLevel, line: string) => {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  });
  const emit = (level: LogLevel, at: string, fields: LogFields = {}) => {
    let line: string;
    if (json()) {
      const normalized: LogFields = {};
      for (const [k, v] of Object.entries(fields)) normalized[k] = v instanceof Error ? errorText(v) : v;
      line = JSON.stringify({ ts: new Date().toISOString(), level, at, ...normalized });
    } else {
      const rest = plain(fields);
      line = `[${level}] ${at}${rest ? ' ' + rest : ''}`;
    }
    sink(level, maskText(line, secrets()));
  };
  return {
    info: (at, fields) => emit('info', at, fields),
    warn: (at, fields) => emit('warn', at, fields),
    error: (at, fields) => emit('error', at, fields),
  };
}

export const log: Logger = createLogger();
