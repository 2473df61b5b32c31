import type { RedditPost, TrendingCoin } from './types.js';

// Offline data served when DEMO_MODE=true
export const DEMO_GOOGLE = ['Solar Eclipse', 'Playoff Schedule', 'Quantum Chip', 'Space Launch', 'Coffee Prices'];

export const DEMO_TWITTER = ['#DemoDay', 'Moon Landing', 'Frogs Everywhere', 'Tabs vs Spaces'];

export const DEMO_YOUTUBE = ['Building a Treehouse in 24 Hours', 'Cooking Pasta on a Volcano', 'The Longest Domino Run Ever'];

export const DEMO_REDDIT: RedditPost[] = [
  { title: 'Demo post about validator uptime this week', score: 420, subreddit: 'solana', url: 'https://reddit.com/r/solana/comments/demo1/' },
  { title: 'Weekly discussion thread', score: 77, subreddit: 'cryptocurrency', url: 'https://reddit.com/r/cryptocurrency/comments/demo2/' },
];

export const DEMO_COINS: TrendingCoin[] = [
  { name: 'Demo Coin', symbol: 'dmo', marketCapRank: 101, priceBtc: 0.00001 },
  { name: 'Sample Token', symbol: 'smpl', marketCapRank: null, priceBtc: 0 },
];

export const DEMO_NEWS = ['Demo headline: markets drift sideways', 'Demo headline: new testnet goes live'];
