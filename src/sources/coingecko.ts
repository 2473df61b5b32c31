import { asArray, field, getOk, parseJson } from '../http.js';
import { DEMO_COINS } from './demo.js';
import { tracked } from './text.js';
import type { SourceDeps, TrendingCoin } from './types.js';

export const COINGECKO_TRENDING_URL = 'https://api.coingecko.com/api/v3/search/trending';

export function parseCoingeckoTrending(json: unknown): TrendingCoin[] {
  return asArray(field(json, 'coins')).slice(0, 10).map(coin => {
    const item = field(coin, 'item');
    const name = field(item, 'name');
    const symbol = field(item, 'symbol');
    const rank = field(item, 'market_cap_rank');
    const priceBtc = field(item, 'price_btc');
    return {
      name: typeof name === 'string' ? name : '',
      symbol: typeof symbol === 'string' ? symbol : '',
      marketCapRank: typeof rank === 'number' ? rank : null,
      priceBtc: typeof priceBtc === 'number' ? priceBtc : 0,
    };
  });
}

export async function fetchCoingeckoTrending(deps: SourceDeps): Promise<TrendingCoin[]> {
  if (deps.settings.DEMO_MODE) return DEMO_COINS.map(c => ({ ...c }));
  return tracked('coins', deps.log, async () =>
    parseCoingeckoTrending(parseJson(await getOk(deps.http, COINGECKO_TRENDING_URL, { accept: 'application/json' }))));
}
