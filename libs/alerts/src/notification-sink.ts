import { AlertKind } from './types';

export const NOTIFICATION_SINK = 'NOTIFICATION_SINK';

export interface AlertNotification {
  alertId: string;
  symbol: string;
  kind: AlertKind;
  thresholdPercent: number;
  movePercent: number;
  price: number;
  reference: number;
  triggeredAt: Date;
}

/** Delivers one notification; rejects with `DeliveryFailureError` when it cannot. */
export interface NotificationSink {
  send(ownerKey: string, notification: AlertNotification): Promise<void>;
}
