import { GapReferenceMode, PriceObservation, SessionReference } from './types';

/** One opening reference per symbol per trading day, never rewritten once captured. */
export class SessionReferenceStore {
  private readonly references = new Map<string, SessionReference>();

  get(symbol: string, sessionDate: string): SessionReference | null {
    const reference = this.references.get(symbol);
    return reference && reference.sessionDate === sessionDate ? reference : null;
  }

  capture(observation: PriceObservation, sessionDate: string, capturedAt: number): SessionReference {
    const existing = this.get(observation.symbol, sessionDate);
    if (existing) return existing;

    const reference: SessionReference = {
      symbol: observation.symbol,
      sessionDate,
      openPrice: observation.openPrice ?? observation.price,
      previousClose: observation.previousClose,
      capturedAt,
    };
    this.references.set(observation.symbol, reference);
    return reference;
  }

  /** Discards references from earlier sessions. */
  prune(sessionDate: string): void {
    for (const [symbol, reference] of [...this.references.entries()]) {
      if (reference.sessionDate !== sessionDate) {
        this.references.delete(symbol);
      }
    }
  }
}

export const gapBaseline = (reference: SessionReference | null, mode: GapReferenceMode): number | null => {
  if (!reference) return null;
  if (mode === 'SESSION_OPEN') return reference.openPrice;
  return reference.previousClose ?? reference.openPrice;
};
