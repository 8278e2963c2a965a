import { AlertDefinition, AlertEvent, AlertKind } from './types';

export const ALERT_REPOSITORY = 'ALERT_REPOSITORY';
export const ALERT_EVENT_LOG = 'ALERT_EVENT_LOG';

export type TriggerRecordResult = 'RECORDED' | 'NOT_FOUND';

/** What the evaluation engine needs from the alert store. */
export interface AlertRepository {
  listActive(): Promise<AlertDefinition[]>;
  /** Persists `lastTriggeredAt`; `NOT_FOUND` when the alert was deleted meanwhile. */
  recordTrigger(alertId: string, at: Date): Promise<TriggerRecordResult>;
}

export interface NewAlert {
  ownerKey: string;
  symbol: string;
  kind: AlertKind;
  thresholdPercent: number;
}

/** Full store used by the management endpoints. */
export interface AlertStore extends AlertRepository {
  create(input: NewAlert, createdAt: Date): Promise<AlertDefinition>;
  get(alertId: string): Promise<AlertDefinition | null>;
  listByOwner(ownerKey: string): Promise<AlertDefinition[]>;
  remove(alertId: string): Promise<boolean>;
}

export interface AlertEventLog {
  append(event: AlertEvent): Promise<void>;
  /** Newest first. */
  list(alertId: string, limit?: number): Promise<AlertEvent[]>;
}
