import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { PriceFeed, PriceQuote } from './price-feed';
import { normalizeSymbol, toExchangeSymbol } from './symbol-mapper';
import { isRetryableHttpError } from './utils/http.util';
import { retry } from './utils/retry.util';

/** The slice of an axios instance the feed uses. */
export interface ChartHttpClient {
  get(url: string, config?: { params?: Record<string, string>; timeout?: number }): Promise<{ data: unknown }>;
}

export interface YahooPriceFeedOptions {
  exchangeSuffix: string;
  retryAttempts: number;
  retryBaseDelayMs?: number;
  /** Total time a fetch may take, retries and backoff included. */
  timeoutMs: number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const finiteNumber = z.number().finite();

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string().optional(),
            regularMarketPrice: z.number().nullable().optional(),
            regularMarketTime: z.number().nullable().optional(),
            previousClose: z.number().nullable().optional(),
            chartPreviousClose: z.number().nullable().optional(),
          }),
          indicators: z
            .object({
              quote: z.array(z.object({ open: z.array(z.number().nullable()).optional() })).optional(),
            })
            .optional(),
        }),
      )
      .nullable()
      .optional(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .nullable()
      .optional(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof chartResponseSchema>['chart']['result']>[number];

const positiveOrNull = (value: number | null | undefined): number | null => {
  const parsed = finiteNumber.safeParse(value);
  return parsed.success && parsed.data > 0 ? parsed.data : null;
};

export class YahooPriceFeed implements PriceFeed {
  readonly name = 'yahoo';
  private readonly logger = new Logger(YahooPriceFeed.name);

  constructor(
    private readonly client: ChartHttpClient,
    private readonly options: YahooPriceFeedOptions,
  ) {}

  async fetch(symbol: string): Promise<PriceQuote> {
    const canonical = normalizeSymbol(symbol);
    const vendorSymbol = toExchangeSymbol(canonical, this.options.exchangeSuffix);

    const response = await retry(
      ({ timeoutMs }) =>
        this.client.get(`/v8/finance/chart/${encodeURIComponent(vendorSymbol)}`, {
          params: { interval: '1m', range: '1d' },
          timeout: timeoutMs,
        }),
      {
        attempts: this.options.retryAttempts,
        baseDelayMs: this.options.retryBaseDelayMs ?? 250,
        maxDelayMs: 2_000,
        budgetMs: this.options.timeoutMs,
        shouldRetry: isRetryableHttpError,
        clock: this.options.clock,
        sleep: this.options.sleep,
      },
    );

    const parsed = chartResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.warn(
        JSON.stringify({ event: 'price_feed_invalid_payload', symbol: vendorSymbol, issues: parsed.error.issues.length }),
      );
      throw new Error(`Unexpected chart payload for ${vendorSymbol}`);
    }

    const { result, error } = parsed.data.chart;
    const first = result?.[0];
    if (!first) {
      const reason = error?.description ?? error?.code ?? 'empty result';
      throw new Error(`No chart data for ${vendorSymbol}: ${reason}`);
    }

    return this.toQuote(canonical, first);
  }

  private toQuote(symbol: string, result: ChartResult): PriceQuote {
    const price = positiveOrNull(result.meta.regularMarketPrice);
    if (price === null) {
      throw new Error(`No market price for ${symbol}`);
    }
    const time = positiveOrNull(result.meta.regularMarketTime);
    if (time === null) {
      throw new Error(`No market time for ${symbol}`);
    }

    const opens = result.indicators?.quote?.[0]?.open ?? [];
    const openPrice = opens.map((value) => positiveOrNull(value)).find((value) => value !== null) ?? null;

    return {
      symbol,
      price,
      asOf: time * 1000,
      openPrice,
      previousClose: positiveOrNull(result.meta.previousClose ?? result.meta.chartPreviousClose),
    };
  }
}
