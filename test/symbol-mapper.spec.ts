import { describe, expect, it } from 'vitest';
import { normalizeSymbol, toExchangeSymbol } from '@libs/market-data';

describe('exchange symbol mapping', () => {
  it('normalizes case and whitespace', () => {
    expect(normalizeSymbol('  reliance.ns ')).toBe('RELIANCE.NS');
  });

  it('qualifies bare tickers with the exchange suffix', () => {
    expect(toExchangeSymbol('tcs', '.NS')).toBe('TCS.NS');
    expect(toExchangeSymbol('tcs', 'bo')).toBe('TCS.BO');
  });

  it('keeps qualified symbols and indices as they are', () => {
    expect(toExchangeSymbol('infy.bo', '.NS')).toBe('INFY.BO');
    expect(toExchangeSymbol('^nsei', '.NS')).toBe('^NSEI');
  });

  it('leaves the ticker alone without a suffix', () => {
    expect(toExchangeSymbol('AAPL', '')).toBe('AAPL');
    expect(toExchangeSymbol('   ', '.NS')).toBe('');
  });
});
