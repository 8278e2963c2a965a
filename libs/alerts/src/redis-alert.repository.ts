import { Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { z } from 'zod';
import { AlertEventLog, AlertStore, NewAlert, TriggerRecordResult } from './alert.repository';
import { alertKindSchema } from './alert.schemas';
import { RepositoryUnavailableError, errorMessage } from './errors';
import { AlertDefinition, AlertEvent, AlertKind, isWindowKind } from './types';

export const ALERT_SEQUENCE_KEY = 'alert:seq';
export const ACTIVE_ALERTS_KEY = 'alert:active';
export const alertKey = (alertId: string): string => `alert:def:${alertId}`;
export const ownerAlertsKey = (ownerKey: string): string => `alert:owner:${ownerKey}`;
export const alertEventsKey = (alertId: string): string => `alert:events:${alertId}`;

// Only touches the hash when it still exists, so a deleted alert is not resurrected.
const RECORD_TRIGGER_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  redis.call('HSET', KEYS[1], 'lastTriggeredAt', ARGV[1])
  return 1
end
return 0
`;

const epochMs = z.coerce.number().int().nonnegative();

const alertHashSchema = z.object({
  id: z.string().min(1),
  ownerKey: z.string().min(1),
  symbol: z.string().min(1),
  kind: z.string().min(1),
  thresholdPercent: z.coerce.number().positive(),
  createdAt: epochMs,
  lastTriggeredAt: z.string().optional(),
});

const parseKind = (raw: string): AlertKind | null => {
  try {
    const parsed = alertKindSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
};

export const toAlertHash = (alert: AlertDefinition): Record<string, string> => ({
  id: alert.id,
  ownerKey: alert.ownerKey,
  symbol: alert.symbol,
  kind: JSON.stringify(isWindowKind(alert.kind) ? alert.kind : { type: alert.kind.type }),
  thresholdPercent: String(alert.thresholdPercent),
  createdAt: String(alert.createdAt.getTime()),
  ...(alert.lastTriggeredAt ? { lastTriggeredAt: String(alert.lastTriggeredAt.getTime()) } : {}),
});

export const fromAlertHash = (hash: Record<string, string>): AlertDefinition | null => {
  const parsed = alertHashSchema.safeParse(hash);
  if (!parsed.success) return null;
  const kind = parseKind(parsed.data.kind);
  if (!kind) return null;

  const lastTriggered = epochMs.safeParse(parsed.data.lastTriggeredAt);
  return {
    id: parsed.data.id,
    ownerKey: parsed.data.ownerKey,
    symbol: parsed.data.symbol,
    kind,
    thresholdPercent: parsed.data.thresholdPercent,
    createdAt: new Date(parsed.data.createdAt),
    lastTriggeredAt:
      parsed.data.lastTriggeredAt && lastTriggered.success ? new Date(lastTriggered.data) : null,
  };
};

/**
 * Alert definitions as Redis hashes, indexed by an `active` set and one set
 * per owner. Ids come from a counter so they stay short enough to type.
 */
export class RedisAlertRepository implements AlertStore {
  private readonly logger = new Logger(RedisAlertRepository.name);

  constructor(private readonly redis: Redis) {}

  async listActive(): Promise<AlertDefinition[]> {
    return this.guard('listActive', async () => this.loadMany(await this.redis.smembers(ACTIVE_ALERTS_KEY)));
  }

  async listByOwner(ownerKey: string): Promise<AlertDefinition[]> {
    return this.guard('listByOwner', async () =>
      this.loadMany(await this.redis.smembers(ownerAlertsKey(ownerKey))),
    );
  }

  async get(alertId: string): Promise<AlertDefinition | null> {
    return this.guard('get', async () => {
      const hash = await this.redis.hgetall(alertKey(alertId));
      return Object.keys(hash).length === 0 ? null : fromAlertHash(hash);
    });
  }

  async create(input: NewAlert, createdAt: Date): Promise<AlertDefinition> {
    return this.guard('create', async () => {
      const id = String(await this.redis.incr(ALERT_SEQUENCE_KEY));
      const alert: AlertDefinition = { id, ...input, createdAt, lastTriggeredAt: null };
      await this.redis
        .multi()
        .hset(alertKey(id), toAlertHash(alert))
        .sadd(ACTIVE_ALERTS_KEY, id)
        .sadd(ownerAlertsKey(input.ownerKey), id)
        .exec();
      return alert;
    });
  }

  async remove(alertId: string): Promise<boolean> {
    return this.guard('remove', async () => {
      const ownerKey = await this.redis.hget(alertKey(alertId), 'ownerKey');
      if (ownerKey === null) return false;
      await this.redis
        .multi()
        .del(alertKey(alertId), alertEventsKey(alertId))
        .srem(ACTIVE_ALERTS_KEY, alertId)
        .srem(ownerAlertsKey(ownerKey), alertId)
        .exec();
      return true;
    });
  }

  async recordTrigger(alertId: string, at: Date): Promise<TriggerRecordResult> {
    return this.guard('recordTrigger', async () => {
      const updated = await this.redis.eval(RECORD_TRIGGER_SCRIPT, 1, alertKey(alertId), String(at.getTime()));
      return updated === 1 ? 'RECORDED' : 'NOT_FOUND';
    });
  }

  private async loadMany(ids: string[]): Promise<AlertDefinition[]> {
    if (ids.length === 0) return [];
    const pipeline = this.redis.pipeline();
    for (const id of ids) {
      pipeline.hgetall(alertKey(id));
    }
    const results = (await pipeline.exec()) ?? [];

    const alerts: AlertDefinition[] = [];
    results.forEach(([error, value], index) => {
      if (error) {
        throw error;
      }
      const hash = z.record(z.string()).safeParse(value);
      if (!hash.success || Object.keys(hash.data).length === 0) {
        return;
      }
      const alert = fromAlertHash(hash.data);
      if (!alert) {
        this.logger.warn(JSON.stringify({ event: 'alert_definition_invalid', alertId: ids[index] }));
        return;
      }
      alerts.push(alert);
    });
    return alerts.sort((a, b) => Number(a.id) - Number(b.id));
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new RepositoryUnavailableError(operation, errorMessage(error));
    }
  }
}

const alertEventSchema = z.object({
  alertId: z.string(),
  symbol: z.string(),
  kind: alertKindSchema,
  thresholdPercent: z.number(),
  triggeredAt: z.coerce.date(),
  price: z.number(),
  reference: z.number(),
  movePercent: z.number(),
  notificationSent: z.boolean(),
  cooldownRecorded: z.boolean(),
  error: z.string().nullable(),
});

/** Capped per-alert trigger history, newest first. */
export class RedisAlertEventLog implements AlertEventLog {
  private readonly logger = new Logger(RedisAlertEventLog.name);

  constructor(
    private readonly redis: Redis,
    private readonly historyLimit: number,
  ) {}

  async append(event: AlertEvent): Promise<void> {
    const key = alertEventsKey(event.alertId);
    await this.redis
      .multi()
      .lpush(key, JSON.stringify({ ...event, triggeredAt: event.triggeredAt.toISOString() }))
      .ltrim(key, 0, this.historyLimit - 1)
      .exec();
  }

  async list(alertId: string, limit = this.historyLimit): Promise<AlertEvent[]> {
    const raw = await this.redis.lrange(alertEventsKey(alertId), 0, Math.max(0, limit - 1));
    const events: AlertEvent[] = [];
    for (const entry of raw) {
      try {
        const parsed = alertEventSchema.safeParse(JSON.parse(entry));
        if (parsed.success) {
          events.push(parsed.data);
          continue;
        }
      } catch (error) {
        this.logger.debug(`Unparseable alert event for ${alertId}: ${errorMessage(error)}`);
        continue;
      }
      this.logger.debug(`Skipping malformed alert event for ${alertId}`);
    }
    return events;
  }
}
