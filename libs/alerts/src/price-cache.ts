import { Logger } from '@nestjs/common';
import { withTimeout } from '@libs/core';
import { PriceFeed, PriceQuote } from '@libs/market-data';
import { PriceUnavailableError, errorMessage } from './errors';
import { CachedPrice, SlowPriceStore } from './slow-price.store';
import { PriceObservation } from './types';
import { WindowTracker } from './window-tracker';

export interface PriceCacheOptions {
  fastTtlSeconds: number;
  slowTtlSeconds: number;
  fetchTimeoutMs: number;
}

/** The lookup the evaluation cycle depends on. */
export interface PriceSource {
  get(symbol: string, now: number): Promise<PriceObservation>;
}

const toObservation = (entry: CachedPrice, stale: boolean): PriceObservation => ({
  symbol: entry.symbol,
  price: entry.price,
  observedAt: entry.observedAt,
  openPrice: entry.openPrice,
  previousClose: entry.previousClose,
  stale,
});

const isUsableQuote = (quote: PriceQuote): boolean =>
  Number.isFinite(quote.price) && quote.price > 0 && Number.isFinite(quote.asOf);

/**
 * Three-tier price lookup: process memory, the slow store, then the feed.
 * Concurrent lookups of one symbol share a single in-flight resolution.
 *
 * `get` and `refresh` are the engine's paths and feed the window tracker;
 * `lookup` is read-only and leaves every tier and the windows untouched.
 */
export class PriceCache implements PriceSource {
  private readonly logger = new Logger(PriceCache.name);
  private readonly fast = new Map<string, CachedPrice>();
  private readonly inFlight = new Map<string, Promise<PriceObservation>>();

  constructor(
    private readonly feed: PriceFeed,
    private readonly slowStore: SlowPriceStore,
    private readonly windowTracker: WindowTracker,
    private readonly options: PriceCacheOptions,
  ) {}

  async get(symbol: string, now: number): Promise<PriceObservation> {
    const fast = this.freshFast(symbol, now);
    if (fast) return toObservation(fast, false);
    return this.coalesce(symbol, () => this.resolve(symbol, now));
  }

  /** Always asks the feed, skipping both cache tiers on the way in. */
  async refresh(symbol: string, now: number): Promise<PriceObservation> {
    return this.coalesce(symbol, async () => {
      try {
        return await this.store(await this.fetchEntry(symbol, now));
      } catch (error) {
        throw new PriceUnavailableError(symbol, errorMessage(error));
      }
    });
  }

  async lookup(symbol: string, now: number): Promise<PriceObservation> {
    const fast = this.freshFast(symbol, now);
    if (fast) return toObservation(fast, false);

    const slow = await this.readSlow(symbol);
    if (slow && now - slow.cachedAt < this.options.slowTtlSeconds * 1000) {
      return toObservation(slow, false);
    }

    try {
      return toObservation(await this.fetchEntry(symbol, now), false);
    } catch (error) {
      if (slow) return toObservation(slow, true);
      throw new PriceUnavailableError(symbol, errorMessage(error));
    }
  }

  private freshFast(symbol: string, now: number): CachedPrice | null {
    const fast = this.fast.get(symbol);
    return fast && now - fast.cachedAt < this.options.fastTtlSeconds * 1000 ? fast : null;
  }

  private coalesce(symbol: string, resolve: () => Promise<PriceObservation>): Promise<PriceObservation> {
    const pending = this.inFlight.get(symbol);
    if (pending) return pending;

    const resolution = resolve().finally(() => {
      this.inFlight.delete(symbol);
    });
    this.inFlight.set(symbol, resolution);
    return resolution;
  }

  private async resolve(symbol: string, now: number): Promise<PriceObservation> {
    const slow = await this.readSlow(symbol);
    if (slow && now - slow.cachedAt < this.options.slowTtlSeconds * 1000) {
      this.fast.set(symbol, slow);
      return toObservation(slow, false);
    }

    try {
      return await this.store(await this.fetchEntry(symbol, now));
    } catch (error) {
      const message = errorMessage(error);
      if (slow) {
        this.logger.warn(
          JSON.stringify({
            event: 'price_served_stale',
            symbol,
            ageSeconds: Math.round((now - slow.cachedAt) / 1000),
            reason: message,
          }),
        );
        return toObservation(slow, true);
      }
      throw new PriceUnavailableError(symbol, message);
    }
  }

  private async fetchEntry(symbol: string, now: number): Promise<CachedPrice> {
    const quote = await withTimeout(
      this.feed.fetch(symbol),
      this.options.fetchTimeoutMs,
      `${this.feed.name} fetch ${symbol}`,
    );
    if (!isUsableQuote(quote)) {
      throw new Error(`Unusable quote from ${this.feed.name}`);
    }
    return {
      symbol,
      price: quote.price,
      observedAt: quote.asOf,
      openPrice: quote.openPrice,
      previousClose: quote.previousClose,
      cachedAt: now,
    };
  }

  private async store(entry: CachedPrice): Promise<PriceObservation> {
    this.fast.set(entry.symbol, entry);
    await this.writeSlow(entry);
    const observation = toObservation(entry, false);
    this.windowTracker.observe(observation);
    return observation;
  }

  private async readSlow(symbol: string): Promise<CachedPrice | null> {
    try {
      return await this.slowStore.read(symbol);
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'slow_cache_read_failed', symbol, reason: errorMessage(error) }));
      return null;
    }
  }

  private async writeSlow(entry: CachedPrice): Promise<void> {
    try {
      await this.slowStore.write(entry);
    } catch (error) {
      this.logger.warn(
        JSON.stringify({ event: 'slow_cache_write_failed', symbol: entry.symbol, reason: errorMessage(error) }),
      );
    }
  }
}
