import { afterEach, describe, expect, it, vi } from 'vitest';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { CycleReport, EngineConfig, SampleReport } from '@libs/alerts';
import { EvaluationSchedulerService } from '../apps/worker/src/engine/evaluation-scheduler.service';

const report = (startedAt: Date): CycleReport => ({
  startedAt,
  finishedAt: startedAt,
  durationMs: 0,
  status: 'SKIPPED',
  skipReason: 'MARKET_CLOSED',
  activeAlerts: 0,
  symbols: 0,
  fetched: 0,
  stale: 0,
  abandoned: 0,
  evaluated: 0,
  fired: 0,
  suppressed: 0,
  dispatched: 0,
  missingAlerts: 0,
  deliveryFailures: 0,
  cooldownWriteFailures: 0,
  failures: [],
});

const sampleReport = (sampledAt: Date): SampleReport => ({
  sampledAt,
  skipped: false,
  symbols: 1,
  sampled: 1,
  failures: [],
});

const idleSampler = () => ({ sample: vi.fn(async (now: Date) => sampleReport(now)) });

const config = (overrides: Partial<EngineConfig> = {}): EngineConfig => ({
  enabled: true,
  evaluationIntervalSeconds: 300,
  sampleIntervalSeconds: 60,
  cooldownSeconds: 3600,
  fetchConcurrency: 4,
  cycleDeadlineMs: 600_000,
  repositoryTimeoutMs: 3000,
  sendTimeoutMs: 10_000,
  eventHistoryLimit: 50,
  fastCacheTtlSeconds: 60,
  slowCacheTtlSeconds: 300,
  slowCacheRetentionSeconds: 86_400,
  fetchTimeoutMs: 5000,
  rollingWindowDurationsMinutes: [60, 120],
  gapReference: 'PREVIOUS_CLOSE',
  calendar: {
    timeZone: 'Asia/Kolkata',
    open: '09:15',
    close: '15:30',
    tradingDays: ['MON', 'TUE', 'WED', 'THU', 'FRI'],
    sessionOpenWindowMinutes: 5,
  },
  ...overrides,
});

describe('EvaluationSchedulerService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('drops a tick that arrives while a cycle is running', async () => {
    let release: (value: CycleReport) => void = () => undefined;
    const cycle = {
      run: vi.fn(
        () =>
          new Promise<CycleReport>((resolve) => {
            release = resolve;
          }),
      ),
    };
    const scheduler = new EvaluationSchedulerService(cycle as never, idleSampler() as never, config(), new SchedulerRegistry());
    const now = new Date('2026-10-19T05:00:00Z');

    const first = scheduler.tick(now);
    const second = await scheduler.tick(now);
    release(report(now));

    expect(second).toEqual({ status: 'DROPPED' });
    await expect(first).resolves.toEqual({ status: 'RAN', report: report(now) });
    expect(cycle.run).toHaveBeenCalledTimes(1);
    expect(scheduler.snapshot()).toMatchObject({ running: false, ticks: 1, droppedTicks: 1 });
  });

  it('contains a failing cycle and re-arms', async () => {
    const cycle = {
      run: vi
        .fn()
        .mockRejectedValueOnce(new Error('tracker exploded'))
        .mockImplementation(async (now: Date) => report(now)),
    };
    const scheduler = new EvaluationSchedulerService(cycle as never, idleSampler() as never, config(), new SchedulerRegistry());
    const now = new Date('2026-10-19T05:00:00Z');

    await expect(scheduler.tick(now)).resolves.toEqual({ status: 'FAILED', error: 'tracker exploded' });
    expect(scheduler.snapshot()).toMatchObject({ failedTicks: 1, lastError: 'tracker exploded' });

    await expect(scheduler.tick(now)).resolves.toMatchObject({ status: 'RAN' });
    expect(scheduler.snapshot()).toMatchObject({
      running: false,
      lastError: null,
      lastRunAt: '2026-10-19T05:00:00.000Z',
    });
  });

  it('registers nothing when the engine is disabled', () => {
    const registry = new SchedulerRegistry();
    const cycle = { run: vi.fn() };
    const scheduler = new EvaluationSchedulerService(cycle as never, idleSampler() as never, config({ enabled: false }), registry);

    scheduler.onModuleInit();

    expect(registry.getIntervals()).toEqual([]);
    expect(cycle.run).not.toHaveBeenCalled();
  });

  it('runs immediately, then on every interval until destroyed', async () => {
    vi.useFakeTimers();
    const registry = new SchedulerRegistry();
    const cycle = { run: vi.fn(async (now: Date) => report(now)) };
    const scheduler = new EvaluationSchedulerService(
      cycle as never,
      idleSampler() as never,
      config({ evaluationIntervalSeconds: 60 }),
      registry,
    );

    scheduler.onModuleInit();
    expect(registry.getIntervals()).toEqual(['alert-evaluation', 'alert-price-sampling']);
    await vi.advanceTimersByTimeAsync(0);
    expect(cycle.run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(cycle.run).toHaveBeenCalledTimes(3);

    scheduler.onModuleDestroy();
    expect(registry.getIntervals()).toEqual([]);
    await vi.advanceTimersByTimeAsync(120_000);
    expect(cycle.run).toHaveBeenCalledTimes(3);
  });

  it('samples prices once a minute between five-minute cycles', async () => {
    vi.useFakeTimers();
    const registry = new SchedulerRegistry();
    const cycle = { run: vi.fn(async (now: Date) => report(now)) };
    const sampler = idleSampler();
    const scheduler = new EvaluationSchedulerService(cycle as never, sampler as never, config(), registry);

    scheduler.onModuleInit();
    await vi.advanceTimersByTimeAsync(600_000);

    expect(cycle.run).toHaveBeenCalledTimes(3);
    // A sample landing on the same instant as a cycle tick may be dropped.
    const { samples, droppedSamples, failedSamples } = scheduler.snapshot().sampling;
    expect(samples + droppedSamples).toBe(10);
    expect(sampler.sample).toHaveBeenCalledTimes(samples);
    expect(samples).toBeGreaterThanOrEqual(8);
    expect(failedSamples).toBe(0);

    scheduler.onModuleDestroy();
    expect(registry.getIntervals()).toEqual([]);
  });

  it('drops a sample while a cycle is running', async () => {
    let release: (value: CycleReport) => void = () => undefined;
    const cycle = {
      run: vi.fn(
        () =>
          new Promise<CycleReport>((resolve) => {
            release = resolve;
          }),
      ),
    };
    const sampler = idleSampler();
    const scheduler = new EvaluationSchedulerService(cycle as never, sampler as never, config(), new SchedulerRegistry());
    const now = new Date('2026-10-19T05:00:00Z');

    const running = scheduler.tick(now);
    await expect(scheduler.sampleTick(now)).resolves.toEqual({ status: 'DROPPED' });
    release(report(now));
    await running;

    expect(sampler.sample).not.toHaveBeenCalled();
    expect(scheduler.snapshot().sampling).toMatchObject({ samples: 0, droppedSamples: 1 });
  });

  it('starts a cycle only after the in-flight sample settles', async () => {
    const order: string[] = [];
    let finishSample: () => void = () => undefined;
    const sampler = {
      sample: vi.fn(
        (now: Date) =>
          new Promise<SampleReport>((resolve) => {
            finishSample = () => {
              order.push('sample');
              resolve(sampleReport(now));
            };
          }),
      ),
    };
    const cycle = {
      run: vi.fn(async (now: Date) => {
        order.push('cycle');
        return report(now);
      }),
    };
    const scheduler = new EvaluationSchedulerService(cycle as never, sampler as never, config(), new SchedulerRegistry());
    const now = new Date('2026-10-19T05:00:00Z');

    const sampling = scheduler.sampleTick(now);
    const ticking = scheduler.tick(now);
    await Promise.resolve();
    expect(cycle.run).not.toHaveBeenCalled();

    finishSample();
    await expect(sampling).resolves.toEqual({ status: 'RAN', report: sampleReport(now) });
    await expect(ticking).resolves.toEqual({ status: 'RAN', report: report(now) });
    expect(order).toEqual(['sample', 'cycle']);
  });

  it('contains a failing sample', async () => {
    const sampler = { sample: vi.fn().mockRejectedValue(new Error('tracker offline')) };
    const scheduler = new EvaluationSchedulerService(
      { run: vi.fn() } as never,
      sampler as never,
      config(),
      new SchedulerRegistry(),
    );

    await expect(scheduler.sampleTick(new Date('2026-10-19T05:00:00Z'))).resolves.toEqual({
      status: 'FAILED',
      error: 'tracker offline',
    });
    expect(scheduler.snapshot().sampling).toMatchObject({ running: false, failedSamples: 1 });
  });
});
