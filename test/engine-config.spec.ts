import { ConfigService } from '@nestjs/config';
import { describe, expect, it } from 'vitest';
import { loadEngineConfig } from '@libs/alerts';

describe('loadEngineConfig', () => {
  it('falls back to the defaults', () => {
    const config = loadEngineConfig(new ConfigService({}));

    expect(config).toMatchObject({
      enabled: true,
      evaluationIntervalSeconds: 300,
      sampleIntervalSeconds: 60,
      fetchTimeoutMs: 5500,
      cooldownSeconds: 3600,
      fetchConcurrency: 4,
      cycleDeadlineMs: 600_000,
      rollingWindowDurationsMinutes: [60, 120],
      gapReference: 'PREVIOUS_CLOSE',
      calendar: {
        timeZone: 'Asia/Kolkata',
        open: '09:15',
        close: '15:30',
        tradingDays: ['MON', 'TUE', 'WED', 'THU', 'FRI'],
        holidays: [],
        sessionOpenWindowMinutes: 5,
      },
    });
  });

  it('parses raw environment strings', () => {
    const config = loadEngineConfig(
      new ConfigService({
        ALERT_EVALUATION_INTERVAL_SECONDS: '60',
        ALERT_CYCLE_DEADLINE_SECONDS: '45',
        ALERT_ENGINE_ENABLED: 'off',
        ROLLING_WINDOW_DURATIONS_MINUTES: '120, 30,120',
        MARKET_TRADING_DAYS: 'mon,tuesday',
        MARKET_HOLIDAYS: '2026-10-20,2026-11-09',
      }),
    );

    expect(config.enabled).toBe(false);
    expect(config.cycleDeadlineMs).toBe(45_000);
    expect(config.rollingWindowDurationsMinutes).toEqual([30, 120]);
    expect(config.calendar.tradingDays).toEqual(['MON', 'TUE']);
    expect(config.calendar.holidays).toEqual(['2026-10-20', '2026-11-09']);
  });

  it('treats an empty deadline as unset', () => {
    const config = loadEngineConfig(
      new ConfigService({ ALERT_EVALUATION_INTERVAL_SECONDS: '30', ALERT_CYCLE_DEADLINE_SECONDS: '' }),
    );

    expect(config.cycleDeadlineMs).toBe(60_000);
  });

  it('rejects unknown trading days and bad durations', () => {
    expect(() => loadEngineConfig(new ConfigService({ MARKET_TRADING_DAYS: 'MON,FUNDAY' }))).toThrow(
      'MARKET_TRADING_DAYS must list weekday codes (MON..SUN), got MON,FUNDAY',
    );
    expect(() => loadEngineConfig(new ConfigService({ ROLLING_WINDOW_DURATIONS_MINUTES: '60,abc' }))).toThrow(
      'ROLLING_WINDOW_DURATIONS_MINUTES has invalid entries: abc',
    );
  });

  it('rejects an interval that could skip the whole session-open window', () => {
    expect(() =>
      loadEngineConfig(
        new ConfigService({ ALERT_EVALUATION_INTERVAL_SECONDS: '600', SESSION_OPEN_WINDOW_MINUTES: '5' }),
      ),
    ).toThrow('ALERT_EVALUATION_INTERVAL_SECONDS (600) must not exceed the 5-minute session-open window');

    const config = loadEngineConfig(
      new ConfigService({ ALERT_EVALUATION_INTERVAL_SECONDS: '600', SESSION_OPEN_WINDOW_MINUTES: '10' }),
    );
    expect(config.evaluationIntervalSeconds).toBe(600);
  });
});
