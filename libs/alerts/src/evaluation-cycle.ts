import { Logger } from '@nestjs/common';
import { runWithConcurrency, withTimeout } from '@libs/core';
import { AlertEventLog, AlertRepository } from './alert.repository';
import { ConditionResult, evaluateCondition } from './condition-evaluator';
import { CooldownGate } from './cooldown-gate';
import { NoWindowDataError, errorMessage } from './errors';
import { MarketCalendar } from './market-calendar';
import { NotificationSink } from './notification-sink';
import { PriceSource } from './price-cache';
import { SessionReferenceStore, gapBaseline } from './session-reference.store';
import {
  AlertDefinition,
  AlertEvent,
  GapReferenceMode,
  PriceObservation,
  SessionReference,
  WindowStats,
  isGapKind,
  isWindowKind,
} from './types';
import { WindowTracker } from './window-tracker';

export type CycleState = 'IDLE' | 'GATING' | 'FETCHING' | 'EVALUATING' | 'DISPATCHING';

export type CycleStatus = 'COMPLETED' | 'SKIPPED' | 'DEADLINE_EXCEEDED';

export type CycleSkipReason = 'MARKET_CLOSED' | 'REPOSITORY_UNAVAILABLE' | 'NO_ACTIVE_ALERTS';

export interface SymbolFailure {
  symbol: string;
  reason: string;
}

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  status: CycleStatus;
  skipReason: CycleSkipReason | null;
  activeAlerts: number;
  symbols: number;
  fetched: number;
  stale: number;
  abandoned: number;
  evaluated: number;
  fired: number;
  suppressed: number;
  dispatched: number;
  missingAlerts: number;
  deliveryFailures: number;
  cooldownWriteFailures: number;
  failures: SymbolFailure[];
}

export interface EvaluationCycleDeps {
  repository: AlertRepository;
  priceCache: PriceSource;
  windowTracker: WindowTracker;
  calendar: MarketCalendar;
  cooldownGate: CooldownGate;
  sessionReferences: SessionReferenceStore;
  sink: NotificationSink;
  eventLog: AlertEventLog;
}

export interface EvaluationCycleOptions {
  fetchConcurrency: number;
  deadlineMs: number;
  repositoryTimeoutMs: number;
  sendTimeoutMs: number;
  gapReference: GapReferenceMode;
}

interface DispatchIntent {
  alert: AlertDefinition;
  observation: PriceObservation;
  result: Extract<ConditionResult, { fired: true }>;
}

const emptyReport = (startedAt: Date): CycleReport => ({
  startedAt,
  finishedAt: startedAt,
  durationMs: 0,
  status: 'COMPLETED',
  skipReason: null,
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

/**
 * One pass over every active alert. `now` fixes the evaluation time for the
 * whole pass; `clock` only measures the hard deadline.
 */
export class EvaluationCycle {
  private readonly logger = new Logger(EvaluationCycle.name);
  private currentState: CycleState = 'IDLE';

  constructor(
    private readonly deps: EvaluationCycleDeps,
    private readonly options: EvaluationCycleOptions,
    private readonly clock: () => number = Date.now,
  ) {}

  get state(): CycleState {
    return this.currentState;
  }

  async run(now: Date): Promise<CycleReport> {
    const report = emptyReport(now);
    const startedClock = this.clock();
    const deadline = startedClock + this.options.deadlineMs;

    try {
      this.currentState = 'GATING';
      if (!this.deps.calendar.isTradingNow(now)) {
        return this.skip(report, 'MARKET_CLOSED', startedClock);
      }

      let alerts: AlertDefinition[];
      try {
        alerts = await withTimeout(
          this.deps.repository.listActive(),
          this.options.repositoryTimeoutMs,
          'listActive',
        );
      } catch (error) {
        this.logger.warn(JSON.stringify({ event: 'alert_listing_failed', reason: errorMessage(error) }));
        return this.skip(report, 'REPOSITORY_UNAVAILABLE', startedClock);
      }

      report.activeAlerts = alerts.length;
      const bySymbol = this.groupBySymbol(alerts);
      this.deps.windowTracker.retain(bySymbol.keys());
      if (alerts.length === 0) {
        return this.skip(report, 'NO_ACTIVE_ALERTS', startedClock);
      }

      this.deps.cooldownGate.hydrate(alerts);
      const sessionDate = this.deps.calendar.sessionDate(now);
      this.deps.sessionReferences.prune(sessionDate);
      report.symbols = bySymbol.size;

      this.currentState = 'FETCHING';
      const observations = await this.fetchAll([...bySymbol.keys()], now.getTime(), deadline, report);

      this.currentState = 'EVALUATING';
      const intents = this.evaluateAll(bySymbol, observations, now, sessionDate, deadline, report);

      this.currentState = 'DISPATCHING';
      for (const intent of intents) {
        if (this.clock() >= deadline) {
          report.abandoned += 1;
          continue;
        }
        await this.dispatch(intent, now, report);
      }

      if (report.abandoned > 0) {
        report.status = 'DEADLINE_EXCEEDED';
      }
      return this.finish(report, startedClock);
    } finally {
      this.currentState = 'IDLE';
    }
  }

  private groupBySymbol(alerts: readonly AlertDefinition[]): Map<string, AlertDefinition[]> {
    const grouped = new Map<string, AlertDefinition[]>();
    for (const alert of alerts) {
      const bucket = grouped.get(alert.symbol);
      if (bucket) {
        bucket.push(alert);
      } else {
        grouped.set(alert.symbol, [alert]);
      }
    }

    for (const [symbol, bucket] of grouped) {
      const durations = bucket.flatMap((alert) => (isWindowKind(alert.kind) ? [alert.kind.durationMinutes] : []));
      this.deps.windowTracker.track(symbol, durations);
    }
    return grouped;
  }

  private async fetchAll(
    symbols: string[],
    nowMs: number,
    deadline: number,
    report: CycleReport,
  ): Promise<Map<string, PriceObservation>> {
    const observations = new Map<string, PriceObservation>();

    await runWithConcurrency(symbols, this.options.fetchConcurrency, async (symbol) => {
      if (this.clock() >= deadline) {
        report.abandoned += 1;
        return;
      }
      try {
        const observation = await this.deps.priceCache.get(symbol, nowMs);
        observations.set(symbol, observation);
        report.fetched += 1;
      } catch (error) {
        const reason = errorMessage(error);
        report.failures.push({ symbol, reason });
        this.logger.warn(JSON.stringify({ event: 'symbol_fetch_failed', symbol, reason }));
      }
    });

    return observations;
  }

  private evaluateAll(
    bySymbol: Map<string, AlertDefinition[]>,
    observations: Map<string, PriceObservation>,
    now: Date,
    sessionDate: string,
    deadline: number,
    report: CycleReport,
  ): DispatchIntent[] {
    const intents: DispatchIntent[] = [];
    const nowMs = now.getTime();
    const inOpenWindow = this.deps.calendar.isSessionOpenWindow(now);
    const sessionOpenMs = this.deps.calendar.sessionOpen(now).getTime();

    for (const [symbol, alerts] of bySymbol) {
      const observation = observations.get(symbol);
      if (!observation) continue;
      if (this.clock() >= deadline) {
        report.abandoned += 1;
        continue;
      }
      if (observation.stale) {
        report.stale += 1;
        continue;
      }

      const sessionReference = this.sessionReference(observation, sessionDate, sessionOpenMs, nowMs);
      const baseline = gapBaseline(sessionReference, this.options.gapReference);

      for (const alert of alerts) {
        report.evaluated += 1;
        const window = isWindowKind(alert.kind)
          ? this.windowStats(symbol, alert.kind.durationMinutes, nowMs)
          : null;

        const result = evaluateCondition({
          kind: alert.kind,
          thresholdPercent: alert.thresholdPercent,
          price: observation.price,
          reference: isGapKind(alert.kind) ? baseline : null,
          window,
          inSessionOpenWindow: inOpenWindow,
          firedThisSession: isGapKind(alert.kind) && this.firedInSession(alert, sessionDate),
        });

        if (!result.fired) continue;
        report.fired += 1;

        if (!this.deps.cooldownGate.allow(alert.id, nowMs)) {
          report.suppressed += 1;
          continue;
        }
        intents.push({ alert, observation, result });
      }
    }

    return intents;
  }

  /**
   * Only a quote observed in today's session may become its reference. Until
   * one arrives the gap baseline stays unknown and gaps are not evaluated.
   */
  private sessionReference(
    observation: PriceObservation,
    sessionDate: string,
    sessionOpenMs: number,
    nowMs: number,
  ): SessionReference | null {
    const { sessionReferences, calendar } = this.deps;
    const current =
      observation.observedAt >= sessionOpenMs &&
      calendar.sessionDate(new Date(observation.observedAt)) === sessionDate;
    if (current) {
      return sessionReferences.capture(observation, sessionDate, nowMs);
    }

    const existing = sessionReferences.get(observation.symbol, sessionDate);
    if (!existing) {
      this.logger.debug(
        JSON.stringify({
          event: 'session_reference_deferred',
          symbol: observation.symbol,
          observedAt: new Date(observation.observedAt).toISOString(),
        }),
      );
    }
    return existing;
  }

  private windowStats(symbol: string, durationMinutes: number, nowMs: number): WindowStats | null {
    try {
      return this.deps.windowTracker.highLow(symbol, durationMinutes, nowMs);
    } catch (error) {
      if (error instanceof NoWindowDataError) return null;
      throw error;
    }
  }

  private firedInSession(alert: AlertDefinition, sessionDate: string): boolean {
    const last = this.deps.cooldownGate.lastRecordedAt(alert.id) ?? alert.lastTriggeredAt?.getTime() ?? null;
    return last !== null && this.deps.calendar.sessionDate(new Date(last)) === sessionDate;
  }

  private async dispatch(intent: DispatchIntent, now: Date, report: CycleReport): Promise<void> {
    const { alert, observation, result } = intent;
    let cooldownRecorded = false;
    let failure: string | null = null;

    try {
      const outcome = await this.deps.cooldownGate.record(alert.id, now.getTime());
      if (outcome === 'SUPPRESSED') {
        report.suppressed += 1;
        return;
      }
      if (outcome === 'ALERT_MISSING') {
        report.missingAlerts += 1;
        this.logger.log(JSON.stringify({ event: 'alert_removed_before_dispatch', alertId: alert.id }));
        return;
      }
      cooldownRecorded = true;
    } catch (error) {
      report.cooldownWriteFailures += 1;
      failure = errorMessage(error);
      this.logger.warn(JSON.stringify({ event: 'cooldown_record_failed', alertId: alert.id, reason: failure }));
    }

    let notificationSent = false;
    try {
      await withTimeout(
        this.deps.sink.send(alert.ownerKey, {
          alertId: alert.id,
          symbol: alert.symbol,
          kind: alert.kind,
          thresholdPercent: alert.thresholdPercent,
          movePercent: result.movePercent,
          price: observation.price,
          reference: result.reference,
          triggeredAt: now,
        }),
        this.options.sendTimeoutMs,
        'notification send',
      );
      notificationSent = true;
      report.dispatched += 1;
    } catch (error) {
      report.deliveryFailures += 1;
      failure = errorMessage(error);
      this.logger.warn(
        JSON.stringify({ event: 'notification_failed', alertId: alert.id, ownerKey: alert.ownerKey, reason: failure }),
      );
    }

    const event: AlertEvent = {
      alertId: alert.id,
      symbol: alert.symbol,
      kind: alert.kind,
      thresholdPercent: alert.thresholdPercent,
      triggeredAt: now,
      price: observation.price,
      reference: result.reference,
      movePercent: result.movePercent,
      notificationSent,
      cooldownRecorded,
      error: failure,
    };
    try {
      await withTimeout(this.deps.eventLog.append(event), this.options.repositoryTimeoutMs, 'appendEvent');
    } catch (error) {
      this.logger.warn(
        JSON.stringify({ event: 'alert_event_append_failed', alertId: alert.id, reason: errorMessage(error) }),
      );
    }
  }

  private skip(report: CycleReport, reason: CycleSkipReason, startedClock: number): CycleReport {
    report.status = 'SKIPPED';
    report.skipReason = reason;
    return this.finish(report, startedClock);
  }

  private finish(report: CycleReport, startedClock: number): CycleReport {
    report.durationMs = Math.max(0, this.clock() - startedClock);
    report.finishedAt = new Date(report.startedAt.getTime() + report.durationMs);
    const { failures, startedAt, finishedAt, ...counts } = report;
    const summary = JSON.stringify({
      event: 'alert_cycle_summary',
      ...counts,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      failedSymbols: failures.map((failure) => failure.symbol),
    });
    if (report.skipReason === 'MARKET_CLOSED') {
      this.logger.debug(summary);
    } else {
      this.logger.log(summary);
    }
    return report;
  }
}
