import type {
  AlertDefinition,
  AlertEvent,
  AlertEventLog,
  AlertNotification,
  AlertStore,
  CachedPrice,
  NewAlert,
  NotificationSink,
  SlowPriceStore,
  TriggerRecordResult,
} from '@libs/alerts';
import { DeliveryFailureError } from '@libs/alerts';
import type { PriceFeed, PriceQuote } from '@libs/market-data';

/** Local wall-clock time in the Indian market zone. */
export const ist = (date: string, time: string): Date => new Date(`${date}T${time}:00+05:30`);

export const MINUTE = 60_000;

export class InMemoryAlertStore implements AlertStore {
  readonly alerts = new Map<string, AlertDefinition>();
  readonly recordCalls: Array<{ alertId: string; at: Date }> = [];
  failListing = false;
  failRecording = false;
  private sequence = 0;

  seed(alert: Omit<AlertDefinition, 'id' | 'createdAt' | 'lastTriggeredAt'> & Partial<AlertDefinition>): AlertDefinition {
    this.sequence += 1;
    const stored: AlertDefinition = {
      id: alert.id ?? String(this.sequence),
      createdAt: alert.createdAt ?? new Date(0),
      lastTriggeredAt: alert.lastTriggeredAt ?? null,
      ownerKey: alert.ownerKey,
      symbol: alert.symbol,
      kind: alert.kind,
      thresholdPercent: alert.thresholdPercent,
    };
    this.alerts.set(stored.id, stored);
    return stored;
  }

  async listActive(): Promise<AlertDefinition[]> {
    if (this.failListing) throw new Error('store offline');
    return [...this.alerts.values()].map((alert) => ({ ...alert }));
  }

  async recordTrigger(alertId: string, at: Date): Promise<TriggerRecordResult> {
    this.recordCalls.push({ alertId, at });
    if (this.failRecording) throw new Error('write rejected');
    const alert = this.alerts.get(alertId);
    if (!alert) return 'NOT_FOUND';
    alert.lastTriggeredAt = at;
    return 'RECORDED';
  }

  async create(input: NewAlert, createdAt: Date): Promise<AlertDefinition> {
    return this.seed({ ...input, createdAt });
  }

  async get(alertId: string): Promise<AlertDefinition | null> {
    return this.alerts.get(alertId) ?? null;
  }

  async listByOwner(ownerKey: string): Promise<AlertDefinition[]> {
    return [...this.alerts.values()].filter((alert) => alert.ownerKey === ownerKey);
  }

  async remove(alertId: string): Promise<boolean> {
    return this.alerts.delete(alertId);
  }
}

export class InMemoryEventLog implements AlertEventLog {
  readonly events: AlertEvent[] = [];

  async append(event: AlertEvent): Promise<void> {
    this.events.unshift(event);
  }

  async list(alertId: string, limit = 50): Promise<AlertEvent[]> {
    return this.events.filter((event) => event.alertId === alertId).slice(0, limit);
  }
}

export class RecordingSink implements NotificationSink {
  readonly sent: Array<{ ownerKey: string; notification: AlertNotification }> = [];
  readonly failingOwners = new Set<string>();

  async send(ownerKey: string, notification: AlertNotification): Promise<void> {
    if (this.failingOwners.has(ownerKey)) {
      throw new DeliveryFailureError(ownerKey, 'chat not found');
    }
    this.sent.push({ ownerKey, notification });
  }
}

export class StubPriceFeed implements PriceFeed {
  readonly name = 'stub';
  readonly calls: string[] = [];
  private readonly responses = new Map<string, PriceQuote | Error>();

  setQuote(quote: Omit<PriceQuote, 'openPrice' | 'previousClose'> & Partial<PriceQuote>): void {
    this.responses.set(quote.symbol, {
      openPrice: null,
      previousClose: null,
      ...quote,
    });
  }

  fail(symbol: string, message = 'feed down'): void {
    this.responses.set(symbol, new Error(message));
  }

  async fetch(symbol: string): Promise<PriceQuote> {
    this.calls.push(symbol);
    const response = this.responses.get(symbol);
    if (!response) throw new Error(`no quote for ${symbol}`);
    if (response instanceof Error) throw response;
    return response;
  }
}

export class InMemorySlowPriceStore implements SlowPriceStore {
  readonly entries = new Map<string, CachedPrice>();
  failReads = false;
  failWrites = false;

  async read(symbol: string): Promise<CachedPrice | null> {
    if (this.failReads) throw new Error('redis read timeout');
    return this.entries.get(symbol) ?? null;
  }

  async write(entry: CachedPrice): Promise<void> {
    if (this.failWrites) throw new Error('redis write timeout');
    this.entries.set(entry.symbol, entry);
  }
}
