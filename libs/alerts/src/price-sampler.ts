import { Logger } from '@nestjs/common';
import { runWithConcurrency } from '@libs/core';
import { errorMessage } from './errors';
import type { SymbolFailure } from './evaluation-cycle';
import { MarketCalendar } from './market-calendar';
import { PriceObservation } from './types';
import { WindowTracker } from './window-tracker';

export interface PriceRefresher {
  refresh(symbol: string, now: number): Promise<PriceObservation>;
}

export interface PriceSamplerDeps {
  priceCache: PriceRefresher;
  windowTracker: WindowTracker;
  calendar: MarketCalendar;
}

export interface SampleReport {
  sampledAt: Date;
  skipped: boolean;
  symbols: number;
  sampled: number;
  failures: SymbolFailure[];
}

/**
 * Keeps the rolling windows dense between evaluation cycles: every symbol
 * with a tracked window gets a fresh feed observation per sampling tick.
 * Symbols are whatever the last evaluation cycle registered.
 */
export class PriceSampler {
  private readonly logger = new Logger(PriceSampler.name);

  constructor(
    private readonly deps: PriceSamplerDeps,
    private readonly fetchConcurrency: number,
  ) {}

  async sample(now: Date): Promise<SampleReport> {
    const report: SampleReport = { sampledAt: now, skipped: false, symbols: 0, sampled: 0, failures: [] };
    if (!this.deps.calendar.isTradingNow(now)) {
      report.skipped = true;
      return report;
    }

    const { windowTracker } = this.deps;
    const symbols = windowTracker
      .trackedSymbols()
      .filter((symbol) => windowTracker.trackedDurations(symbol).length > 0);
    report.symbols = symbols.length;

    await runWithConcurrency(symbols, this.fetchConcurrency, async (symbol) => {
      try {
        await this.deps.priceCache.refresh(symbol, now.getTime());
        report.sampled += 1;
      } catch (error) {
        report.failures.push({ symbol, reason: errorMessage(error) });
      }
    });

    if (report.failures.length > 0) {
      this.logger.warn(
        JSON.stringify({
          event: 'price_sample_failed',
          sampled: report.sampled,
          failedSymbols: report.failures.map((failure) => failure.symbol),
        }),
      );
    }
    return report;
  }
}
