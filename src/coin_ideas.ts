import type { TrendSnapshot } from './trends_cache.js';

export type Rand = () => number;

export type CoinConcept = {
  trend: string;
  source: string;
  name: string;
  ticker: string;
  description: string;
  generatedAt: string;
};

export const SOURCE_LABELS = {
  twitter: '🐦 Twitter',
  youtube: '📺 YouTube',
  google: '📊 Google',
  reddit: '🔥 Reddit',
} as const;

export function pick<T>(items: readonly T[], rand: Rand = Math.random): T {
  if (!items.length) throw new Error('pick from empty list');
  const i = Math.min(items.length - 1, Math.max(0, Math.floor(rand() * items.length)));
  return items[i];
}

export function words(text: string): string[] {
  return text.replace(/[^a-zA-Z0-9\s]/g, '').split(/\s+/).filter(Boolean);
}

export function nameCandidates(trend: string): string[] {
  const w = words(trend);
  const [w0] = w;
  if (!w0) {
    return ['TrendCoin', 'TrendToken', trend, 'TrendInu', 'BabyTrend', 'MoonTrend'];
  }
  return [
    `${w0}Coin`,
    `${w0}Token`,
    w.length >= 2 ? w.slice(0, 2).join('') : trend,
    `${w0}Inu`,
    `Baby${w0}`,
    `${w0}Moon`,
  ];
}

export function generateCoinName(trend: string, rand: Rand = Math.random): string {
  return pick(nameCandidates(trend), rand);
}

export function generateTicker(name: string): string {
  const letters = name.toUpperCase().replace(/[^A-Z]/g, '');
  if (letters.length >= 3) return letters.slice(0, 4);
  // code points, so an emoji name is never cut mid-surrogate
  return Array.from(name).slice(0, 4).join('').toUpperCase().replace(/ /g, '');
}

export function descriptionTemplates(trend: string): string[] {
  return [
    `The official memecoin of ${trend}! 🚀`,
    `Riding the ${trend} wave to the moon! 🌙`,
    `${trend} holders unite! Community-driven token.`,
    `Inspired by ${trend}. Fair launch, no presale!`,
    `The ${trend} revolution starts here! 💎🙌`,
  ];
}

const pad = (n: number) => String(n).padStart(2, '0');

export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${formatClock(d)}`;
}

export function formatClock(d: Date): string {
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function generateCoinConcept(trend: string, source: string, rand: Rand = Math.random, now: Date = new Date()): CoinConcept {
  const name = generateCoinName(trend, rand);
  return {
    trend,
    source,
    name,
    ticker: generateTicker(name),
    description: pick(descriptionTemplates(trend), rand),
    generatedAt: formatTimestamp(now),
  };
}

/** Two ideas each from Twitter, YouTube and Google, then one from the top Reddit post. */
export function conceptsFromSnapshot(s: TrendSnapshot, rand: Rand = Math.random, now: Date = new Date()): CoinConcept[] {
  const out: CoinConcept[] = [];
  for (const t of s.twitter.slice(0, 2)) out.push(generateCoinConcept(t, SOURCE_LABELS.twitter, rand, now));
  for (const t of s.youtube.slice(0, 2)) out.push(generateCoinConcept(t, SOURCE_LABELS.youtube, rand, now));
  for (const t of s.google.slice(0, 2)) out.push(generateCoinConcept(t, SOURCE_LABELS.google, rand, now));
  for (const post of s.reddit.slice(0, 1)) {
    const trend = post.title.split(/\s+/).filter(Boolean).slice(0, 3).join(' ');
    out.push(generateCoinConcept(trend, SOURCE_LABELS.reddit, rand, now));
  }
  return out;
}
