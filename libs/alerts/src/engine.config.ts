import { ConfigService } from '@nestjs/config';
import { envSchema } from '@libs/core';
import { MarketCalendarOptions, WeekdayCode, isWeekdayCode } from './market-calendar';
import { GapReferenceMode } from './types';

export const ENGINE_CONFIG = 'ENGINE_CONFIG';

/** Slack over the feed's own retry budget before the cache gives up on a fetch. */
export const FETCH_TIMEOUT_GRACE_MS = 500;

export interface EngineConfig {
  enabled: boolean;
  evaluationIntervalSeconds: number;
  sampleIntervalSeconds: number;
  cooldownSeconds: number;
  fetchConcurrency: number;
  cycleDeadlineMs: number;
  repositoryTimeoutMs: number;
  sendTimeoutMs: number;
  eventHistoryLimit: number;
  fastCacheTtlSeconds: number;
  slowCacheTtlSeconds: number;
  slowCacheRetentionSeconds: number;
  fetchTimeoutMs: number;
  rollingWindowDurationsMinutes: number[];
  gapReference: GapReferenceMode;
  calendar: MarketCalendarOptions;
}

const engineEnvSchema = envSchema.pick({
  ALERT_ENGINE_ENABLED: true,
  ALERT_EVALUATION_INTERVAL_SECONDS: true,
  PRICE_SAMPLE_INTERVAL_SECONDS: true,
  ALERT_COOLDOWN_SECONDS: true,
  ALERT_FETCH_CONCURRENCY: true,
  ALERT_CYCLE_DEADLINE_SECONDS: true,
  ALERT_REPOSITORY_TIMEOUT_MS: true,
  ALERT_EVENT_HISTORY_LIMIT: true,
  NOTIFICATION_SEND_TIMEOUT_MS: true,
  PRICE_FAST_CACHE_TTL_SECONDS: true,
  PRICE_SLOW_CACHE_TTL_SECONDS: true,
  PRICE_SLOW_CACHE_RETENTION_SECONDS: true,
  PRICE_FEED_TIMEOUT_MS: true,
  ROLLING_WINDOW_DURATIONS_MINUTES: true,
  SESSION_OPEN_WINDOW_MINUTES: true,
  GAP_REFERENCE: true,
  MARKET_TIME_ZONE: true,
  MARKET_OPEN: true,
  MARKET_CLOSE: true,
  MARKET_TRADING_DAYS: true,
  MARKET_HOLIDAYS: true,
});

const parseDurations = (values: readonly string[]): number[] => {
  const durations = values.map((value) => Number(value));
  const invalid = values.filter((_, index) => !Number.isInteger(durations[index]) || durations[index] <= 0);
  if (invalid.length > 0) {
    throw new Error(`ROLLING_WINDOW_DURATIONS_MINUTES has invalid entries: ${invalid.join(', ')}`);
  }
  return [...new Set(durations)].sort((a, b) => a - b);
};

const parseTradingDays = (values: readonly string[]): WeekdayCode[] => {
  const codes = values.map((value) => value.trim().toUpperCase().slice(0, 3));
  const days = codes.filter(isWeekdayCode);
  if (days.length !== codes.length || days.length === 0) {
    throw new Error(`MARKET_TRADING_DAYS must list weekday codes (MON..SUN), got ${values.join(',')}`);
  }
  return days;
};

/**
 * Reads the engine settings from configuration. Works whether or not the
 * global env validation ran, since the schema accepts raw strings too.
 */
export const loadEngineConfig = (config: Pick<ConfigService, 'get'>): EngineConfig => {
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(engineEnvSchema.shape)) {
    raw[key] = config.get<unknown>(key);
  }
  const env = engineEnvSchema.parse(raw);
  const intervalSeconds = env.ALERT_EVALUATION_INTERVAL_SECONDS;
  // Any half-open window at least one interval long contains a tick.
  if (intervalSeconds > env.SESSION_OPEN_WINDOW_MINUTES * 60) {
    throw new Error(
      `ALERT_EVALUATION_INTERVAL_SECONDS (${intervalSeconds}) must not exceed the ${env.SESSION_OPEN_WINDOW_MINUTES}-minute session-open window`,
    );
  }

  return {
    enabled: env.ALERT_ENGINE_ENABLED,
    evaluationIntervalSeconds: intervalSeconds,
    sampleIntervalSeconds: env.PRICE_SAMPLE_INTERVAL_SECONDS,
    cooldownSeconds: env.ALERT_COOLDOWN_SECONDS,
    fetchConcurrency: env.ALERT_FETCH_CONCURRENCY,
    cycleDeadlineMs: (env.ALERT_CYCLE_DEADLINE_SECONDS ?? intervalSeconds * 2) * 1000,
    repositoryTimeoutMs: env.ALERT_REPOSITORY_TIMEOUT_MS,
    sendTimeoutMs: env.NOTIFICATION_SEND_TIMEOUT_MS,
    eventHistoryLimit: env.ALERT_EVENT_HISTORY_LIMIT,
    fastCacheTtlSeconds: env.PRICE_FAST_CACHE_TTL_SECONDS,
    slowCacheTtlSeconds: env.PRICE_SLOW_CACHE_TTL_SECONDS,
    slowCacheRetentionSeconds: env.PRICE_SLOW_CACHE_RETENTION_SECONDS,
    fetchTimeoutMs: env.PRICE_FEED_TIMEOUT_MS + FETCH_TIMEOUT_GRACE_MS,
    rollingWindowDurationsMinutes: parseDurations(env.ROLLING_WINDOW_DURATIONS_MINUTES),
    gapReference: env.GAP_REFERENCE,
    calendar: {
      timeZone: env.MARKET_TIME_ZONE,
      open: env.MARKET_OPEN,
      close: env.MARKET_CLOSE,
      tradingDays: parseTradingDays(env.MARKET_TRADING_DAYS),
      holidays: env.MARKET_HOLIDAYS,
      sessionOpenWindowMinutes: env.SESSION_OPEN_WINDOW_MINUTES,
    },
  };
};
