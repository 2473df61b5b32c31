import { Redis } from 'ioredis';

export interface SubscriptionStore {
  setAutoNotify(userId: number, on: boolean): Promise<void>;
  isAutoNotify(userId: number): Promise<boolean>;
  listAutoNotify(): Promise<number[]>;
}

export class MemorySubscriptions implements SubscriptionStore {
  private prefs = new Map<number, { autoNotify: boolean }>();
  async setAutoNotify(userId: number, on: boolean) {
    const cur = this.prefs.get(userId) ?? { autoNotify: false };
    this.prefs.set(userId, { ...cur, autoNotify: on });
  }
  async isAutoNotify(userId: number) {
    return this.prefs.get(userId)?.autoNotify ?? false;
  }
  async listAutoNotify() {
    return [...this.prefs].filter(([, p]) => p.autoNotify).map(([id]) => id);
  }
}

/** The subset of ioredis used for the opted-in set. */
export type RedisSetClient = {
  sadd(key: string, member: string): Promise<number>;
  srem(key: string, member: string): Promise<number>;
  sismember(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
};

export const AUTO_NOTIFY_KEY = 'trendmint:auto_notify';

export class RedisSubscriptions implements SubscriptionStore {
  constructor(private client: RedisSetClient, private key = AUTO_NOTIFY_KEY) {}
  async setAutoNotify(userId: number, on: boolean) {
    if (on) await this.client.sadd(this.key, String(userId));
    else await this.client.srem(this.key, String(userId));
  }
  async isAutoNotify(userId: number) {
    return (await this.client.sismember(this.key, String(userId))) === 1;
  }
  async listAutoNotify() {
    const raw = await this.client.smembers(this.key);
    return raw.map(Number).filter(Number.isFinite);
  }
}

export function createSubscriptionStore(redisUrl: string): SubscriptionStore {
  return redisUrl ? new RedisSubscriptions(new Redis(redisUrl)) : new MemorySubscriptions();
}
