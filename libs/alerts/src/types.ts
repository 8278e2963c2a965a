export type GapKind = { type: 'GAP_UP' } | { type: 'GAP_DOWN' };

export type WindowKind =
  | { type: 'DROP_WINDOW'; durationMinutes: number }
  | { type: 'SPIKE_WINDOW'; durationMinutes: number };

export type AlertKind = GapKind | WindowKind;

export interface AlertDefinition {
  id: string;
  ownerKey: string;
  symbol: string;
  kind: AlertKind;
  thresholdPercent: number;
  createdAt: Date;
  lastTriggeredAt: Date | null;
}

export interface PriceObservation {
  readonly symbol: string;
  readonly price: number;
  /** Epoch milliseconds. */
  readonly observedAt: number;
  readonly openPrice: number | null;
  readonly previousClose: number | null;
  readonly stale: boolean;
}

export interface WindowStats {
  high: number;
  low: number;
}

export interface SessionReference {
  readonly symbol: string;
  /** ISO date (yyyy-MM-dd) in the market time zone. */
  readonly sessionDate: string;
  readonly openPrice: number;
  readonly previousClose: number | null;
  readonly capturedAt: number;
}

export type GapReferenceMode = 'PREVIOUS_CLOSE' | 'SESSION_OPEN';

export interface AlertEvent {
  alertId: string;
  symbol: string;
  kind: AlertKind;
  thresholdPercent: number;
  triggeredAt: Date;
  price: number;
  reference: number;
  movePercent: number;
  notificationSent: boolean;
  cooldownRecorded: boolean;
  error: string | null;
}

export const isGapKind = (kind: AlertKind): kind is GapKind =>
  kind.type === 'GAP_UP' || kind.type === 'GAP_DOWN';

export const isWindowKind = (kind: AlertKind): kind is WindowKind => !isGapKind(kind);

export const assertNever = (value: never): never => {
  throw new Error(`Unhandled alert kind: ${JSON.stringify(value)}`);
};

export const describeAlertKind = (kind: AlertKind): string => {
  switch (kind.type) {
    case 'GAP_UP':
      return 'Gap up';
    case 'GAP_DOWN':
      return 'Gap down';
    case 'DROP_WINDOW':
      return `Drop within ${formatDuration(kind.durationMinutes)}`;
    case 'SPIKE_WINDOW':
      return `Spike within ${formatDuration(kind.durationMinutes)}`;
    default:
      return assertNever(kind);
  }
};

const formatDuration = (minutes: number): string => {
  if (minutes % 60 === 0) {
    const hours = minutes / 60;
    return hours === 1 ? '1 hour' : `${hours} hours`;
  }
  return `${minutes} min`;
};

export const sameKind = (a: AlertKind, b: AlertKind): boolean => {
  if (a.type !== b.type) return false;
  if (isWindowKind(a) && isWindowKind(b)) return a.durationMinutes === b.durationMinutes;
  return true;
};
