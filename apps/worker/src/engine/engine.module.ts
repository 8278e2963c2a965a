import { Module } from '@nestjs/common';
import {
  ALERT_EVENT_LOG,
  ALERT_REPOSITORY,
  AlertsModule,
  CooldownGate,
  ENGINE_CONFIG,
  EvaluationCycle,
  MarketCalendar,
  NOTIFICATION_SINK,
  PriceCache,
  PriceSampler,
  SessionReferenceStore,
  WindowTracker,
} from '@libs/alerts';
import type { AlertEventLog, AlertRepository, EngineConfig, NotificationSink } from '@libs/alerts';
import { TelegramModule } from '@libs/telegram';
import { TelegramNotificationSink } from '../notifications/telegram-notification.sink';
import { EVALUATION_CYCLE, PRICE_SAMPLER } from './engine.constants';
import { EvaluationSchedulerService } from './evaluation-scheduler.service';

@Module({
  imports: [AlertsModule, TelegramModule],
  providers: [
    TelegramNotificationSink,
    { provide: NOTIFICATION_SINK, useExisting: TelegramNotificationSink },
    {
      provide: EVALUATION_CYCLE,
      inject: [
        ALERT_REPOSITORY,
        PriceCache,
        WindowTracker,
        MarketCalendar,
        CooldownGate,
        SessionReferenceStore,
        NOTIFICATION_SINK,
        ALERT_EVENT_LOG,
        ENGINE_CONFIG,
      ],
      useFactory: (
        repository: AlertRepository,
        priceCache: PriceCache,
        windowTracker: WindowTracker,
        calendar: MarketCalendar,
        cooldownGate: CooldownGate,
        sessionReferences: SessionReferenceStore,
        sink: NotificationSink,
        eventLog: AlertEventLog,
        config: EngineConfig,
      ) =>
        new EvaluationCycle(
          { repository, priceCache, windowTracker, calendar, cooldownGate, sessionReferences, sink, eventLog },
          {
            fetchConcurrency: config.fetchConcurrency,
            deadlineMs: config.cycleDeadlineMs,
            repositoryTimeoutMs: config.repositoryTimeoutMs,
            sendTimeoutMs: config.sendTimeoutMs,
            gapReference: config.gapReference,
          },
        ),
    },
    {
      provide: PRICE_SAMPLER,
      inject: [PriceCache, WindowTracker, MarketCalendar, ENGINE_CONFIG],
      useFactory: (
        priceCache: PriceCache,
        windowTracker: WindowTracker,
        calendar: MarketCalendar,
        config: EngineConfig,
      ) => new PriceSampler({ priceCache, windowTracker, calendar }, config.fetchConcurrency),
    },
    EvaluationSchedulerService,
  ],
  exports: [EvaluationSchedulerService, AlertsModule],
})
export class EngineModule {}
