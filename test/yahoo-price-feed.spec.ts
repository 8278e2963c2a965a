import { describe, expect, it, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { YahooPriceFeed } from '@libs/market-data';

const chart = (meta: Record<string, unknown>, opens: Array<number | null> = [null, 3505.2, 3510]) => ({
  data: {
    chart: {
      result: [{ meta, indicators: { quote: [{ open: opens }] } }],
      error: null,
    },
  },
});

const meta = {
  symbol: 'TCS.NS',
  regularMarketPrice: 3521.5,
  regularMarketTime: 1_760_852_400,
  previousClose: 3500,
  chartPreviousClose: 3490,
};

const createFeed = (get: ReturnType<typeof vi.fn>) =>
  new YahooPriceFeed(
    { get },
    { exchangeSuffix: '.NS', retryAttempts: 2, retryBaseDelayMs: 1, timeoutMs: 5000, clock: () => 0 },
  );

/** A client that uses up its whole per-request timeout on a simulated clock, then times out. */
const timingOutClient = (clock: { now: number }) =>
  vi.fn(async (_url: string, config?: { timeout?: number }) => {
    clock.now += Math.min(2000, config?.timeout ?? 2000);
    throw new AxiosError('timeout exceeded', 'ECONNABORTED');
  });

const budgetedFeed = (
  get: ReturnType<typeof timingOutClient>,
  clock: { now: number },
  retryBaseDelayMs: number,
  timeoutMs: number,
) =>
  new YahooPriceFeed(
    { get },
    {
      exchangeSuffix: '.NS',
      retryAttempts: 3,
      retryBaseDelayMs,
      timeoutMs,
      clock: () => clock.now,
      sleep: async (ms) => {
        clock.now += ms;
      },
    },
  );

describe('YahooPriceFeed', () => {
  it('maps the chart payload onto a quote', async () => {
    const get = vi.fn().mockResolvedValue(chart(meta));

    await expect(createFeed(get).fetch(' tcs ')).resolves.toEqual({
      symbol: 'TCS',
      price: 3521.5,
      asOf: 1_760_852_400_000,
      openPrice: 3505.2,
      previousClose: 3500,
    });
    expect(get).toHaveBeenCalledWith('/v8/finance/chart/TCS.NS', {
      params: { interval: '1m', range: '1d' },
      timeout: 2500,
    });
  });

  it('falls back to the chart previous close and tolerates a missing open', async () => {
    const get = vi.fn().mockResolvedValue(chart({ ...meta, previousClose: null }, [null, null]));

    await expect(createFeed(get).fetch('TCS.NS')).resolves.toMatchObject({
      openPrice: null,
      previousClose: 3490,
    });
  });

  it('leaves index symbols unqualified', async () => {
    const get = vi.fn().mockResolvedValue(chart({ ...meta, symbol: '^NSEI' }));

    await createFeed(get).fetch('^nsei');

    expect(get).toHaveBeenCalledWith('/v8/finance/chart/%5ENSEI', {
      params: { interval: '1m', range: '1d' },
      timeout: 2500,
    });
  });

  it('retries transient network failures', async () => {
    const get = vi
      .fn()
      .mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'))
      .mockResolvedValueOnce(chart(meta));

    await expect(createFeed(get).fetch('TCS')).resolves.toMatchObject({ price: 3521.5 });
    expect(get).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    const notFound = new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', undefined, undefined, {
      status: 404,
      statusText: 'Not Found',
      data: {},
      headers: {},
      config: { headers: new AxiosHeaders() },
    });
    const get = vi.fn().mockRejectedValue(notFound);

    await expect(createFeed(get).fetch('NOPE')).rejects.toThrow('Request failed with status code 404');
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('rejects payloads of the wrong shape', async () => {
    const get = vi.fn().mockResolvedValue({ data: { chart: 'nope' } });

    await expect(createFeed(get).fetch('TCS')).rejects.toThrow('Unexpected chart payload for TCS.NS');
  });

  it('surfaces the vendor error when there is no result', async () => {
    const get = vi.fn().mockResolvedValue({
      data: { chart: { result: null, error: { code: 'Not Found', description: 'No data found, symbol may be delisted' } } },
    });

    await expect(createFeed(get).fetch('GONE')).rejects.toThrow(
      'No chart data for GONE.NS: No data found, symbol may be delisted',
    );
  });

  it('rejects quotes without a market price', async () => {
    const get = vi.fn().mockResolvedValue(chart({ ...meta, regularMarketPrice: null }));

    await expect(createFeed(get).fetch('TCS')).rejects.toThrow('No market price for TCS');
  });

  it('keeps every attempt and backoff inside the configured timeout', async () => {
    const clock = { now: 0 };
    const get = timingOutClient(clock);

    await expect(budgetedFeed(get, clock, 250, 5000).fetch('TCS')).rejects.toThrow('timeout exceeded');

    expect(get.mock.calls.map(([, config]) => config?.timeout)).toEqual([1666, 1542, 1042]);
    expect(clock.now).toBe(5000);
  });

  it('stops retrying once the backoff would outlast the budget', async () => {
    const clock = { now: 0 };
    const get = timingOutClient(clock);

    await expect(budgetedFeed(get, clock, 600, 1000).fetch('TCS')).rejects.toThrow('timeout exceeded');

    expect(get.mock.calls.map(([, config]) => config?.timeout)).toEqual([333, 33]);
    expect(clock.now).toBe(966);
  });
});
