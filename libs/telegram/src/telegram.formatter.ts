import { AlertKind, AlertNotification, describeAlertKind } from '@libs/alerts';

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');

const formatPrice = (value: number): string => value.toFixed(2);

const formatPercent = (value: number): string => `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;

const formatUtcTimestamp = (date: Date): string => `${date.toISOString().slice(0, 19).replace('T', ' ')} (UTC)`;

const headerFor = (kind: AlertKind): string => {
  switch (kind.type) {
    case 'GAP_UP':
    case 'SPIKE_WINDOW':
      return '🔺';
    case 'GAP_DOWN':
    case 'DROP_WINDOW':
      return '🔻';
  }
};

const referenceLabel = (kind: AlertKind): string => {
  switch (kind.type) {
    case 'GAP_UP':
    case 'GAP_DOWN':
      return 'Session reference';
    case 'DROP_WINDOW':
      return 'Window high';
    case 'SPIKE_WINDOW':
      return 'Window low';
  }
};

export const formatAlertMessage = (notification: AlertNotification): string => {
  const { kind } = notification;
  const lines = [
    `${headerFor(kind)} <b>${escapeHtml(notification.symbol)}</b> · ${escapeHtml(describeAlertKind(kind))}`,
    `<b>Threshold:</b> ${notification.thresholdPercent}%`,
    `<b>Move:</b> ${formatPercent(notification.movePercent)}`,
    `<b>Price:</b> ${formatPrice(notification.price)}`,
    `<b>${referenceLabel(kind)}:</b> ${formatPrice(notification.reference)}`,
    `<b>Alert:</b> #${escapeHtml(notification.alertId)}`,
    `<b>Time:</b> ${formatUtcTimestamp(notification.triggeredAt)}`,
  ];
  return lines.join('\n');
};
