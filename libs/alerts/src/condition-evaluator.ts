import { AlertKind, WindowStats, assertNever } from './types';

/** Absolute tolerance so that boundary prices compare as equal. */
export const PRICE_EPSILON = 1e-9;

export interface ConditionInput {
  kind: AlertKind;
  thresholdPercent: number;
  price: number;
  /** Session baseline, used by gap kinds only. */
  reference: number | null;
  /** Window extremes for the kind's duration, used by window kinds only. */
  window: WindowStats | null;
  inSessionOpenWindow: boolean;
  firedThisSession: boolean;
}

export type NotFiredReason =
  | 'INVALID_PRICE'
  | 'INVALID_THRESHOLD'
  | 'NO_REFERENCE'
  | 'NO_WINDOW_DATA'
  | 'OUTSIDE_OPEN_WINDOW'
  | 'ALREADY_FIRED_THIS_SESSION'
  | 'THRESHOLD_NOT_MET'
  | 'AT_EXTREME';

export type ConditionResult =
  | { fired: true; movePercent: number; reference: number; targetPrice: number }
  | { fired: false; reason: NotFiredReason; movePercent: number | null; reference: number | null };

const isPositive = (value: number | null): value is number =>
  value !== null && Number.isFinite(value) && value > 0;

export const percentMove = (price: number, reference: number): number =>
  ((price - reference) / reference) * 100;

const notFired = (
  reason: NotFiredReason,
  movePercent: number | null = null,
  reference: number | null = null,
): ConditionResult => ({ fired: false, reason, movePercent, reference });

const atOrAbove = (price: number, target: number): boolean => price >= target - PRICE_EPSILON;
const atOrBelow = (price: number, target: number): boolean => price <= target + PRICE_EPSILON;

const upward = (price: number, reference: number, threshold: number): ConditionResult => {
  const targetPrice = reference * (1 + threshold / 100);
  const movePercent = percentMove(price, reference);
  return atOrAbove(price, targetPrice)
    ? { fired: true, movePercent, reference, targetPrice }
    : notFired('THRESHOLD_NOT_MET', movePercent, reference);
};

const downward = (price: number, reference: number, threshold: number): ConditionResult => {
  const targetPrice = reference * (1 - threshold / 100);
  const movePercent = percentMove(price, reference);
  return atOrBelow(price, targetPrice)
    ? { fired: true, movePercent, reference, targetPrice }
    : notFired('THRESHOLD_NOT_MET', movePercent, reference);
};

/**
 * Decides whether an alert's condition holds. Pure: never reads the clock or
 * any shared state, and never throws on missing data.
 */
export const evaluateCondition = (input: ConditionInput): ConditionResult => {
  const { kind, thresholdPercent, price } = input;

  if (!isPositive(price)) return notFired('INVALID_PRICE');
  if (!isPositive(thresholdPercent)) return notFired('INVALID_THRESHOLD');

  switch (kind.type) {
    case 'GAP_UP':
    case 'GAP_DOWN': {
      if (!input.inSessionOpenWindow) return notFired('OUTSIDE_OPEN_WINDOW');
      if (input.firedThisSession) return notFired('ALREADY_FIRED_THIS_SESSION');
      if (!isPositive(input.reference)) return notFired('NO_REFERENCE');
      return kind.type === 'GAP_UP'
        ? upward(price, input.reference, thresholdPercent)
        : downward(price, input.reference, thresholdPercent);
    }
    case 'SPIKE_WINDOW': {
      const low = input.window?.low ?? null;
      if (!isPositive(low)) return notFired('NO_WINDOW_DATA');
      if (price <= low) return notFired('AT_EXTREME', percentMove(price, low), low);
      return upward(price, low, thresholdPercent);
    }
    case 'DROP_WINDOW': {
      const high = input.window?.high ?? null;
      if (!isPositive(high)) return notFired('NO_WINDOW_DATA');
      if (price >= high) return notFired('AT_EXTREME', percentMove(price, high), high);
      return downward(price, high, thresholdPercent);
    }
    default:
      return assertNever(kind);
  }
};
