import type Redis from 'ioredis';
import { z } from 'zod';
import { normalizeSymbol } from '@libs/market-data';

export interface CachedPrice {
  symbol: string;
  price: number;
  observedAt: number;
  openPrice: number | null;
  previousClose: number | null;
  /** Epoch milliseconds when the entry was fetched from the feed. */
  cachedAt: number;
}

/** Second cache tier, shared across processes and longer lived than memory. */
export interface SlowPriceStore {
  read(symbol: string): Promise<CachedPrice | null>;
  write(entry: CachedPrice): Promise<void>;
}

export const getSlowPriceKey = (symbol: string): string => `price:slow:${normalizeSymbol(symbol)}`;

const cachedPriceSchema = z.object({
  symbol: z.string(),
  price: z.number().positive(),
  observedAt: z.number(),
  openPrice: z.number().nullable(),
  previousClose: z.number().nullable(),
  cachedAt: z.number(),
});

export class RedisSlowPriceStore implements SlowPriceStore {
  constructor(
    private readonly redis: Pick<Redis, 'get' | 'set'>,
    private readonly retentionSeconds: number,
  ) {}

  async read(symbol: string): Promise<CachedPrice | null> {
    const raw = await this.redis.get(getSlowPriceKey(symbol));
    if (!raw) return null;
    const parsed = cachedPriceSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Malformed cached price for ${symbol}`);
    }
    return parsed.data;
  }

  async write(entry: CachedPrice): Promise<void> {
    await this.redis.set(getSlowPriceKey(entry.symbol), JSON.stringify(entry), 'EX', this.retentionSeconds);
  }
}
