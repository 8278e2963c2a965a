import { Logger } from '@nestjs/common';
import { NoWindowDataError } from './errors';
import { PriceObservation, WindowStats } from './types';

interface WindowEntry {
  price: number;
  observedAt: number;
}

/**
 * Observations of one symbol over a sliding duration. Extremes come from two
 * monotonic deques so a query costs amortised O(1) as long as queries arrive
 * in non-decreasing time order.
 */
export class RollingWindow {
  private readonly entries: WindowEntry[] = [];
  private readonly maxDeque: WindowEntry[] = [];
  private readonly minDeque: WindowEntry[] = [];

  constructor(readonly durationMinutes: number) {}

  get durationMs(): number {
    return this.durationMinutes * 60_000;
  }

  get newestAt(): number | null {
    const last = this.entries[this.entries.length - 1];
    return last ? last.observedAt : null;
  }

  push(price: number, observedAt: number): boolean {
    const newest = this.newestAt;
    if (newest !== null && observedAt <= newest) {
      return false;
    }

    const entry: WindowEntry = { price, observedAt };
    this.entries.push(entry);

    while (this.maxDeque.length > 0 && this.maxDeque[this.maxDeque.length - 1].price <= price) {
      this.maxDeque.pop();
    }
    this.maxDeque.push(entry);

    while (this.minDeque.length > 0 && this.minDeque[this.minDeque.length - 1].price >= price) {
      this.minDeque.pop();
    }
    this.minDeque.push(entry);

    return true;
  }

  evict(now: number): void {
    const cutoff = now - this.durationMs;
    while (this.entries.length > 0 && this.entries[0].observedAt < cutoff) {
      this.entries.shift();
    }
    while (this.maxDeque.length > 0 && this.maxDeque[0].observedAt < cutoff) {
      this.maxDeque.shift();
    }
    while (this.minDeque.length > 0 && this.minDeque[0].observedAt < cutoff) {
      this.minDeque.shift();
    }
  }

  /** Extremes over `[now - duration, now]`, or null when nothing falls inside. */
  stats(now: number): WindowStats | null {
    this.evict(now);
    const newest = this.newestAt;
    if (newest === null) return null;

    if (newest <= now) {
      return { high: this.maxDeque[0].price, low: this.minDeque[0].price };
    }

    // Entries newer than `now` are excluded, which the deques cannot express.
    let high = Number.NEGATIVE_INFINITY;
    let low = Number.POSITIVE_INFINITY;
    for (const entry of this.entries) {
      if (entry.observedAt > now) break;
      high = Math.max(high, entry.price);
      low = Math.min(low, entry.price);
    }
    return Number.isFinite(high) ? { high, low } : null;
  }
}

export class WindowTracker {
  private readonly logger = new Logger(WindowTracker.name);
  private readonly windows = new Map<string, Map<number, RollingWindow>>();

  /** Ensures windows exist for every duration an active alert references. */
  track(symbol: string, durationsMinutes: Iterable<number>): void {
    let bySymbol = this.windows.get(symbol);
    if (!bySymbol) {
      bySymbol = new Map();
      this.windows.set(symbol, bySymbol);
    }
    for (const duration of durationsMinutes) {
      if (!Number.isInteger(duration) || duration <= 0) {
        throw new RangeError(`Window duration must be a positive integer, got ${duration}`);
      }
      if (!bySymbol.has(duration)) {
        bySymbol.set(duration, new RollingWindow(duration));
      }
    }
  }

  /**
   * Appends the observation to every tracked window of its symbol. Returns
   * false when the symbol is untracked or the timestamp does not advance.
   */
  observe(observation: PriceObservation): boolean {
    const bySymbol = this.windows.get(observation.symbol);
    if (!bySymbol || bySymbol.size === 0) return false;
    if (!Number.isFinite(observation.price) || observation.price <= 0) return false;

    let accepted = false;
    for (const window of bySymbol.values()) {
      accepted = window.push(observation.price, observation.observedAt) || accepted;
    }
    if (!accepted) {
      this.logger.debug(
        JSON.stringify({
          event: 'window_observation_rejected',
          symbol: observation.symbol,
          observedAt: observation.observedAt,
        }),
      );
    }
    return accepted;
  }

  highLow(symbol: string, durationMinutes: number, now: number): WindowStats {
    const window = this.windows.get(symbol)?.get(durationMinutes);
    const stats = window ? window.stats(now) : null;
    if (!stats) {
      throw new NoWindowDataError(symbol, durationMinutes);
    }
    return stats;
  }

  /** Drops windows of symbols that no longer have active alerts. */
  retain(symbols: Iterable<string>): void {
    const keep = new Set(symbols);
    for (const symbol of [...this.windows.keys()]) {
      if (!keep.has(symbol)) {
        this.windows.delete(symbol);
      }
    }
  }

  trackedSymbols(): string[] {
    return [...this.windows.keys()];
  }

  trackedDurations(symbol: string): number[] {
    return [...(this.windows.get(symbol)?.keys() ?? [])].sort((a, b) => a - b);
  }
}
