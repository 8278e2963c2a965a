export const PRICE_FEED = 'PRICE_FEED';

export interface PriceQuote {
  symbol: string;
  price: number;
  /** Epoch milliseconds of the last trade the vendor reports. */
  asOf: number;
  openPrice: number | null;
  previousClose: number | null;
}

/**
 * Vendor-neutral contract the alert engine needs from a price source. `fetch`
 * rejects when the vendor cannot produce a usable quote.
 */
export interface PriceFeed {
  readonly name: string;
  fetch(symbol: string): Promise<PriceQuote>;
}
