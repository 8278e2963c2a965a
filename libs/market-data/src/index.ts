export * from './market-data.module';
export * from './price-feed';
export * from './symbol-mapper';
export * from './yahoo-price.feed';
export * from './utils/http.util';
export * from './utils/retry.util';
