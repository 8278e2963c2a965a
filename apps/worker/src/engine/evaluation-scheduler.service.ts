import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ENGINE_CONFIG } from '@libs/alerts';
import type { CycleReport, EngineConfig, EvaluationCycle, PriceSampler, SampleReport } from '@libs/alerts';
import {
  EVALUATION_CYCLE,
  EVALUATION_INTERVAL_NAME,
  PRICE_SAMPLER,
  SAMPLING_INTERVAL_NAME,
} from './engine.constants';

export type TickOutcome =
  | { status: 'RAN'; report: CycleReport }
  | { status: 'DROPPED' }
  | { status: 'FAILED'; error: string };

export type SampleOutcome =
  | { status: 'RAN'; report: SampleReport }
  | { status: 'DROPPED' }
  | { status: 'FAILED'; error: string };

export interface SchedulerSnapshot {
  enabled: boolean;
  running: boolean;
  intervalSeconds: number;
  ticks: number;
  droppedTicks: number;
  failedTicks: number;
  lastRunAt: string | null;
  lastError: string | null;
  lastReport: CycleReport | null;
  sampling: {
    running: boolean;
    intervalSeconds: number;
    samples: number;
    droppedSamples: number;
    failedSamples: number;
    lastSampledAt: string | null;
  };
}

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : 'Unknown error');

/**
 * Drives the evaluation cycle on a fixed interval, plus a shorter sampling
 * interval that keeps the rolling windows fed between cycles. A tick that
 * arrives while the previous cycle is still running is dropped, never run
 * concurrently. A sample never overlaps anything; an evaluation waits for an
 * in-flight sample to settle before it starts.
 */
@Injectable()
export class EvaluationSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(EvaluationSchedulerService.name);
  private isRunning = false;
  private ticks = 0;
  private droppedTicks = 0;
  private failedTicks = 0;
  private lastRunAt: Date | null = null;
  private lastError: string | null = null;
  private lastReport: CycleReport | null = null;

  private activeSample: Promise<SampleOutcome> | null = null;
  private samples = 0;
  private droppedSamples = 0;
  private failedSamples = 0;
  private lastSampledAt: Date | null = null;

  constructor(
    @Inject(EVALUATION_CYCLE) private readonly cycle: EvaluationCycle,
    @Inject(PRICE_SAMPLER) private readonly sampler: PriceSampler,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit(): void {
    if (!this.config.enabled) {
      this.logger.log('Alert engine disabled (ALERT_ENGINE_ENABLED=false).');
      return;
    }

    const intervalMs = this.config.evaluationIntervalSeconds * 1000;
    const handle = setInterval(() => {
      void this.tick();
    }, intervalMs);
    this.schedulerRegistry.addInterval(EVALUATION_INTERVAL_NAME, handle);

    const sampleHandle = setInterval(() => {
      void this.sampleTick();
    }, this.config.sampleIntervalSeconds * 1000);
    this.schedulerRegistry.addInterval(SAMPLING_INTERVAL_NAME, sampleHandle);

    this.logger.log(
      `Alert engine scheduled every ${this.config.evaluationIntervalSeconds}s, sampling every ${this.config.sampleIntervalSeconds}s.`,
    );

    void this.tick();
  }

  onModuleDestroy(): void {
    for (const name of [EVALUATION_INTERVAL_NAME, SAMPLING_INTERVAL_NAME]) {
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
      }
    }
  }

  async tick(now: Date = new Date()): Promise<TickOutcome> {
    if (this.isRunning) {
      this.droppedTicks += 1;
      this.logger.warn('Alert evaluation tick dropped because the previous cycle is still running.');
      return { status: 'DROPPED' };
    }

    this.isRunning = true;
    this.ticks += 1;
    this.lastRunAt = now;
    try {
      if (this.activeSample) {
        await this.activeSample;
      }
      const report = await this.cycle.run(now);
      this.lastReport = report;
      this.lastError = null;
      return { status: 'RAN', report };
    } catch (error) {
      const message = messageOf(error);
      this.failedTicks += 1;
      this.lastError = message;
      this.logger.error(`Alert evaluation cycle failed: ${message}`);
      return { status: 'FAILED', error: message };
    } finally {
      this.isRunning = false;
    }
  }

  async sampleTick(now: Date = new Date()): Promise<SampleOutcome> {
    if (this.isRunning || this.activeSample) {
      this.droppedSamples += 1;
      this.logger.debug(JSON.stringify({ event: 'price_sample_dropped', at: now.toISOString() }));
      return { status: 'DROPPED' };
    }

    this.samples += 1;
    this.lastSampledAt = now;
    const run = this.runSample(now);
    this.activeSample = run;
    try {
      return await run;
    } finally {
      this.activeSample = null;
    }
  }

  snapshot(): SchedulerSnapshot {
    return {
      enabled: this.config.enabled,
      running: this.isRunning,
      intervalSeconds: this.config.evaluationIntervalSeconds,
      ticks: this.ticks,
      droppedTicks: this.droppedTicks,
      failedTicks: this.failedTicks,
      lastRunAt: this.lastRunAt ? this.lastRunAt.toISOString() : null,
      lastError: this.lastError,
      lastReport: this.lastReport,
      sampling: {
        running: this.activeSample !== null,
        intervalSeconds: this.config.sampleIntervalSeconds,
        samples: this.samples,
        droppedSamples: this.droppedSamples,
        failedSamples: this.failedSamples,
        lastSampledAt: this.lastSampledAt ? this.lastSampledAt.toISOString() : null,
      },
    };
  }

  private async runSample(now: Date): Promise<SampleOutcome> {
    try {
      const report = await this.sampler.sample(now);
      return { status: 'RAN', report };
    } catch (error) {
      const message = messageOf(error);
      this.failedSamples += 1;
      this.logger.error(`Price sampling failed: ${message}`);
      return { status: 'FAILED', error: message };
    }
  }
}
