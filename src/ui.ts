import type { CoinConcept } from './coin_ideas.js';
import { formatClock } from './coin_ideas.js';
import type { TrendSnapshot } from './trends_cache.js';

// Telegram legacy Markdown only treats these as entity markers
const MD_CHARS = /([_*`\[])/g;
export function escapeMD(s: string) { return s.replace(MD_CHARS, '\\$1'); }

/**
 * Bold span for legacy Markdown. Escapes are not honoured inside an entity and
 * only `*` can end it, so the span is closed around each `*`, which is
 * escaped outside; other characters stay literal.
 */
export function boldMD(s: string): string {
  return s.split('*').map(part => (part ? `*${part}*` : '')).join('\\*');
}

/** Cuts to `n` code points so emoji are never split. */
export function clip(s: string, n: number): string {
  return Array.from(s).slice(0, n).join('');
}

const numbered = (items: string[]) => items.map((t, i) => `${i + 1}. ${escapeMD(t)}`);

export function welcomeText(refreshMinutes: number): string {
  return [
    '🤖 *Trend Monitor & Coin Generator Bot*',
    '',
    'I monitor trending topics from FREE sources and generate memecoin ideas!',
    '',
    '*Commands:*',
    '/trends - Show Google/general trends',
    '/twitter - Show Twitter/X trending topics',
    '/youtube - Show YouTube trending videos',
    '/reddit - Show trending Reddit posts',
    '/coins - Show trending coins (CoinGecko)',
    '/news - Show latest crypto news',
    '/all - Show ALL trends from all sources',
    '/generate - Generate coin ideas from trends',
    '/auto `on/off` - Auto-notify for new trends',
    '/refresh - Manually refresh trend data',
    '/status - Show source health',
    '/help - Show this message',
    '',
    '*Data Sources (100% FREE):*',
    '📊 Google Trends',
    '🐦 Twitter/X (via Nitter)',
    '📺 YouTube Trending',
    '🔥 Reddit Crypto Subs',
    '💎 CoinGecko Trending',
    '📰 Crypto News (CoinTelegraph)',
    '',
    `💡 *Tip:* I update all sources every ${refreshMinutes} minutes!`,
  ].join('\n');
}

export function renderGoogleTrends(s: TrendSnapshot): string {
  return [
    '📊 *Google Trending Searches*',
    `🕐 Updated: ${s.lastUpdate ? formatClock(s.lastUpdate) : 'never'}`,
    '',
    ...numbered(s.google.slice(0, 10)),
    '',
    '💡 Use /generate to create coin ideas!',
  ].join('\n');
}

export function renderTwitter(s: TrendSnapshot): string {
  return ['🐦 *Trending on Twitter/X*', '', ...numbered(s.twitter.slice(0, 10))].join('\n');
}

export function renderYoutube(s: TrendSnapshot): string {
  return ['📺 *Trending on YouTube*', '', ...numbered(s.youtube.slice(0, 10))].join('\n');
}

export function renderReddit(s: TrendSnapshot): string {
  const rows = s.reddit.slice(0, 5).map((p, i) =>
    `${i + 1}. ${boldMD(`${clip(p.title, 60)}...`)}\n   ⬆️ ${p.score} | r/${escapeMD(p.subreddit)}`);
  return ['🔥 *Trending on Crypto Reddit*', '', rows.join('\n\n')].join('\n');
}

export function renderCoins(s: TrendSnapshot): string {
  const rows = s.coins.slice(0, 10).map((c, i) =>
    `${i + 1}. ${boldMD(c.name)} ($${escapeMD(c.symbol.toUpperCase())})\n   📊 Rank: #${c.marketCapRank ?? 'N/A'}`);
  return ['💎 *Trending Coins (CoinGecko)*', '', rows.join('\n\n')].join('\n');
}

export function renderNews(s: TrendSnapshot): string {
  return ['📰 *Latest Crypto News*', '', numbered(s.news.slice(0, 8)).join('\n\n')].join('\n');
}

export function renderAll(s: TrendSnapshot): string {
  const parts: string[] = ['🌐 *ALL TRENDING DATA*'];
  const [yt] = s.youtube;
  const [post] = s.reddit;
  const [headline] = s.news;
  if (s.twitter.length) parts.push(`🐦 *Twitter:* ${escapeMD(s.twitter.slice(0, 3).join(', '))}`);
  if (yt !== undefined) parts.push(`📺 *YouTube:* ${escapeMD(clip(yt, 50))}...`);
  if (s.google.length) parts.push(`📊 *Google:* ${escapeMD(s.google.slice(0, 3).join(', '))}`);
  if (post !== undefined) parts.push(`🔥 *Reddit:* ${escapeMD(clip(post.title, 50))}... (${post.score}↑)`);
  if (s.coins.length) parts.push(`💎 *Coins:* ${escapeMD(s.coins.slice(0, 3).map(c => c.name).join(', '))}`);
  if (headline !== undefined) parts.push(`📰 *News:* ${escapeMD(clip(headline, 60))}...`);
  parts.push('Use specific commands for more details!');
  return parts.join('\n\n');
}

export function renderConcepts(concepts: CoinConcept[]): string {
  const cards = concepts.slice(0, 7).map((c, i) => [
    `${boldMD(`${i + 1}. ${c.name}`)} ($${escapeMD(c.ticker)})`,
    `📝 ${escapeMD(c.description)}`,
    `📊 Based on: ${escapeMD(clip(c.trend, 40))}...`,
    `🔍 Source: ${c.source}`,
  ].join('\n'));
  return [
    '🚀 *Generated Coin Concepts*',
    '',
    cards.join('\n\n'),
    '',
    '⚠️ *Next Steps:*',
    '1. Review the concept',
    '2. Create logo (Canva/AI)',
    '3. Deploy on pump.fun',
    '4. Market on Twitter/Telegram',
  ].join('\n');
}

export function renderFreshTrends(fresh: string[]): string {
  return [
    '🔥 *New Trending Topics Detected!*',
    '',
    ...fresh.slice(0, 5).map(t => `• ${escapeMD(t)}`),
    '',
    'Use /generate to create coin ideas!',
  ].join('\n');
}

export type SourceStatusRow = { source: string; items: number; success: number; fail: number; lastError?: string };

export function renderStatus(o: { lastUpdate: Date | null; rows: SourceStatusRow[]; subscribers: number }): string {
  const head = `🩺 *Status*\n🕐 Last update: ${o.lastUpdate ? formatClock(o.lastUpdate) : 'never'}`;
  const rows = o.rows.map(r => {
    const err = r.lastError ? ` - last error: ${escapeMD(clip(r.lastError, 60))}` : '';
    return `• ${r.source}: ${r.items} items (ok ${r.success} / fail ${r.fail})${err}`;
  });
  return [head, '', ...rows, '', `🔔 Auto-notify subscribers: ${o.subscribers}`].join('\n');
}
