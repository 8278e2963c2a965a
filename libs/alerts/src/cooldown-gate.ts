import { withTimeout } from '@libs/core';
import { AlertRepository } from './alert.repository';
import { RepositoryUnavailableError, errorMessage } from './errors';
import { AlertDefinition } from './types';

export interface CooldownGateOptions {
  cooldownSeconds: number;
  writeTimeoutMs: number;
}

export type CooldownRecordOutcome = 'RECORDED' | 'SUPPRESSED' | 'ALERT_MISSING';

/**
 * Per-alert suppression window. Local state is only advanced after the
 * repository confirms the write, so a lost write can cause a duplicate on the
 * next cycle but never a silently dropped alert.
 */
export class CooldownGate {
  private readonly lastRecorded = new Map<string, number>();

  constructor(
    private readonly repository: Pick<AlertRepository, 'recordTrigger'>,
    private readonly options: CooldownGateOptions,
  ) {}

  get cooldownMs(): number {
    return this.options.cooldownSeconds * 1000;
  }

  /** Merges durable trigger times and forgets alerts that are gone. */
  hydrate(alerts: readonly AlertDefinition[]): void {
    const ids = new Set<string>();
    for (const alert of alerts) {
      ids.add(alert.id);
      const durable = alert.lastTriggeredAt?.getTime();
      if (durable === undefined || !Number.isFinite(durable)) continue;
      const local = this.lastRecorded.get(alert.id);
      if (local === undefined || durable > local) {
        this.lastRecorded.set(alert.id, durable);
      }
    }
    for (const id of [...this.lastRecorded.keys()]) {
      if (!ids.has(id)) this.lastRecorded.delete(id);
    }
  }

  allow(alertId: string, now: number): boolean {
    const last = this.lastRecorded.get(alertId);
    return last === undefined || now - last >= this.cooldownMs;
  }

  lastRecordedAt(alertId: string): number | null {
    return this.lastRecorded.get(alertId) ?? null;
  }

  async record(alertId: string, now: number): Promise<CooldownRecordOutcome> {
    if (!this.allow(alertId, now)) {
      return 'SUPPRESSED';
    }

    let result: Awaited<ReturnType<AlertRepository['recordTrigger']>>;
    try {
      result = await withTimeout(
        this.repository.recordTrigger(alertId, new Date(now)),
        this.options.writeTimeoutMs,
        'recordTrigger',
      );
    } catch (error) {
      throw new RepositoryUnavailableError('recordTrigger', errorMessage(error));
    }

    if (result === 'NOT_FOUND') {
      this.lastRecorded.delete(alertId);
      return 'ALERT_MISSING';
    }

    this.lastRecorded.set(alertId, now);
    return 'RECORDED';
  }
}
