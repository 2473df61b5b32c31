import { describe, it, expect } from 'vitest';
import { createLogger, type LogLevel } from '../src/observability/log.js';
import { mask, maskText } from '../src/security/log_mask.js';

function capture(opts: { json: boolean; secrets?: string[] }) {
  const lines: Array<[LogLevel, string]> = [];
  const log = createLogger({ ...opts, sink: (level, line) => { lines.push([level, line]); } });
  return { log, lines };
}

describe('logger', () => {
  it('writes one json object per line', () => {
    const { log, lines } = capture({ json: true, secrets: [] });
    log.warn('source.failed', { source: 'google', error: new Error('HTTP 503') });
    expect(lines).toHaveLength(1);
    const [level, line] = lines[0] ?? ['info', ''];
    expect(level).toBe('warn');
    const parsed: unknown = JSON.parse(line);
    expect(parsed).toMatchObject({ level: 'warn', at: 'source.failed', source: 'google', error: 'HTTP 503' });
  });

  it('writes a short human line otherwise', () => {
    const { log, lines } = capture({ json: false, secrets: [] });
    log.info('trends.refresh.done', { total: 42, src: 'all' });
    log.error('boot');
    expect(lines).toEqual([
      ['info', '[info] trends.refresh.done total=42 src=all'],
      ['error', '[error] boot'],
    ]);
  });

  it('redacts configured secrets', () => {
    const { log, lines } = capture({ json: false, secrets: ['test-secret'] });
    log.error('startup', { url: 'https://api.example/bottest-secret/getMe' });
    expect(lines[0]?.[1]).toBe('[error] startup url=https://api.example/bot[REDACTED]/getMe');
  });
});

describe('maskText', () => {
  it('redacts anything shaped like a bot token', () => {
    const token = `123456789:${'A'.repeat(35)}`;
    expect(maskText(`token=${token}`)).toBe('token=[REDACTED]');
  });

  it('shortens long hex strings', () => {
    const hex = `0x${'a'.repeat(40)}`;
    expect(maskText(hex)).toBe('0xaaaaaa…aaaaaaaa');
    expect(mask('short')).toBe('short');
  });
});
