import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CoreModule, RedisService } from '@libs/core';
import { MarketDataModule, PRICE_FEED, PriceFeed } from '@libs/market-data';
import { ALERT_EVENT_LOG, ALERT_REPOSITORY, AlertStore } from './alert.repository';
import { CooldownGate } from './cooldown-gate';
import { ENGINE_CONFIG, EngineConfig, loadEngineConfig } from './engine.config';
import { MarketCalendar } from './market-calendar';
import { PriceCache } from './price-cache';
import { RedisAlertEventLog, RedisAlertRepository } from './redis-alert.repository';
import { SessionReferenceStore } from './session-reference.store';
import { RedisSlowPriceStore } from './slow-price.store';
import { WindowTracker } from './window-tracker';

@Module({
  imports: [CoreModule, MarketDataModule],
  providers: [
    {
      provide: ENGINE_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService): EngineConfig => loadEngineConfig(config),
    },
    {
      provide: ALERT_REPOSITORY,
      inject: [RedisService],
      useFactory: (redis: RedisService): AlertStore => new RedisAlertRepository(redis),
    },
    {
      provide: ALERT_EVENT_LOG,
      inject: [RedisService, ENGINE_CONFIG],
      useFactory: (redis: RedisService, config: EngineConfig) =>
        new RedisAlertEventLog(redis, config.eventHistoryLimit),
    },
    {
      provide: WindowTracker,
      useFactory: () => new WindowTracker(),
    },
    {
      provide: SessionReferenceStore,
      useFactory: () => new SessionReferenceStore(),
    },
    {
      provide: MarketCalendar,
      inject: [ENGINE_CONFIG],
      useFactory: (config: EngineConfig) => new MarketCalendar(config.calendar),
    },
    {
      provide: PriceCache,
      inject: [PRICE_FEED, RedisService, WindowTracker, ENGINE_CONFIG],
      useFactory: (feed: PriceFeed, redis: RedisService, windowTracker: WindowTracker, config: EngineConfig) =>
        new PriceCache(feed, new RedisSlowPriceStore(redis, config.slowCacheRetentionSeconds), windowTracker, {
          fastTtlSeconds: config.fastCacheTtlSeconds,
          slowTtlSeconds: config.slowCacheTtlSeconds,
          fetchTimeoutMs: config.fetchTimeoutMs,
        }),
    },
    {
      provide: CooldownGate,
      inject: [ALERT_REPOSITORY, ENGINE_CONFIG],
      useFactory: (repository: AlertStore, config: EngineConfig) =>
        new CooldownGate(repository, {
          cooldownSeconds: config.cooldownSeconds,
          writeTimeoutMs: config.repositoryTimeoutMs,
        }),
    },
  ],
  exports: [
    ENGINE_CONFIG,
    ALERT_REPOSITORY,
    ALERT_EVENT_LOG,
    WindowTracker,
    SessionReferenceStore,
    MarketCalendar,
    PriceCache,
    CooldownGate,
  ],
})
export class AlertsModule {}
