import { describeAlertKind } from '@libs/alerts';
import type { AlertDefinition, AlertEvent, AlertKind } from '@libs/alerts';

export interface AlertView {
  id: string;
  ownerKey: string;
  symbol: string;
  kind: AlertKind;
  description: string;
  thresholdPercent: number;
  createdAt: string;
  lastTriggeredAt: string | null;
}

export interface AlertEventView extends Omit<AlertEvent, 'triggeredAt'> {
  triggeredAt: string;
}

export const toAlertView = (alert: AlertDefinition): AlertView => ({
  id: alert.id,
  ownerKey: alert.ownerKey,
  symbol: alert.symbol,
  kind: alert.kind,
  description: `${describeAlertKind(alert.kind)} ${alert.thresholdPercent}%`,
  thresholdPercent: alert.thresholdPercent,
  createdAt: alert.createdAt.toISOString(),
  lastTriggeredAt: alert.lastTriggeredAt ? alert.lastTriggeredAt.toISOString() : null,
});

export const toAlertEventView = (event: AlertEvent): AlertEventView => ({
  ...event,
  triggeredAt: event.triggeredAt.toISOString(),
});
