import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PRICE_FEED, PriceFeed } from './price-feed';
import { createHttpClient } from './utils/http.util';
import { YahooPriceFeed } from './yahoo-price.feed';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PRICE_FEED,
      inject: [ConfigService],
      useFactory: (config: ConfigService): PriceFeed => {
        const timeoutMs = Number(config.get<number>('PRICE_FEED_TIMEOUT_MS', 5000));
        return new YahooPriceFeed(
          createHttpClient(config.get<string>('PRICE_FEED_BASE_URL', 'https://query1.finance.yahoo.com'), timeoutMs),
          {
            exchangeSuffix: config.get<string>('SYMBOL_EXCHANGE_SUFFIX', '.NS'),
            retryAttempts: Number(config.get<number>('PRICE_FEED_RETRY_ATTEMPTS', 2)),
            timeoutMs,
          },
        );
      },
    },
  ],
  exports: [PRICE_FEED],
})
export class MarketDataModule {}
