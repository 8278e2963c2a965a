import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ALERT_EVENT_LOG,
  ALERT_REPOSITORY,
  ENGINE_CONFIG,
  RepositoryUnavailableError,
  isWindowKind,
  sameKind,
} from '@libs/alerts';
import type {
  AlertDefinition,
  AlertEvent,
  AlertEventLog,
  AlertKind,
  AlertStore,
  CreateAlertInput,
  CreateAlertSetInput,
  EngineConfig,
} from '@libs/alerts';
import { toExchangeSymbol } from '@libs/market-data';

@Injectable()
export class AlertsService {
  private readonly logger = new Logger(AlertsService.name);
  private readonly exchangeSuffix: string;

  constructor(
    @Inject(ALERT_REPOSITORY) private readonly store: AlertStore,
    @Inject(ALERT_EVENT_LOG) private readonly eventLog: AlertEventLog,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    configService: ConfigService,
  ) {
    this.exchangeSuffix = configService.get<string>('SYMBOL_EXCHANGE_SUFFIX', '.NS');
  }

  async createAlert(input: CreateAlertInput, now: Date = new Date()): Promise<AlertDefinition> {
    this.assertSupportedKind(input.kind);
    const symbol = toExchangeSymbol(input.symbol, this.exchangeSuffix);

    return this.guard(async () => {
      const existing = await this.store.listByOwner(input.ownerKey);
      if (existing.some((alert) => alert.symbol === symbol && sameKind(alert.kind, input.kind))) {
        throw new ConflictException(`An identical alert for ${symbol} already exists`);
      }
      const alert = await this.store.create(
        { ownerKey: input.ownerKey, symbol, kind: input.kind, thresholdPercent: input.thresholdPercent },
        now,
      );
      this.logger.log(JSON.stringify({ event: 'alert_created', alertId: alert.id, symbol, kind: alert.kind.type }));
      return alert;
    });
  }

  /**
   * Creates the gap alert plus one window alert per configured duration. A
   * negative threshold watches for falls, a positive one for rises. Kinds the
   * owner already watches on the symbol are left alone.
   */
  async createAlertSet(input: CreateAlertSetInput, now: Date = new Date()): Promise<AlertDefinition[]> {
    const symbol = toExchangeSymbol(input.symbol, this.exchangeSuffix);
    const falling = input.thresholdPercent < 0;
    const thresholdPercent = Math.abs(input.thresholdPercent);

    const kinds: AlertKind[] = [
      { type: falling ? 'GAP_DOWN' : 'GAP_UP' },
      ...this.config.rollingWindowDurationsMinutes.map(
        (durationMinutes): AlertKind =>
          falling ? { type: 'DROP_WINDOW', durationMinutes } : { type: 'SPIKE_WINDOW', durationMinutes },
      ),
    ];

    return this.guard(async () => {
      const existing = (await this.store.listByOwner(input.ownerKey)).filter((alert) => alert.symbol === symbol);
      const missing = kinds.filter((kind) => !existing.some((alert) => sameKind(alert.kind, kind)));
      if (missing.length === 0) {
        throw new ConflictException(`All alerts of this set for ${symbol} already exist`);
      }

      const created: AlertDefinition[] = [];
      for (const kind of missing) {
        created.push(await this.store.create({ ownerKey: input.ownerKey, symbol, kind, thresholdPercent }, now));
      }
      this.logger.log(
        JSON.stringify({ event: 'alert_set_created', symbol, alertIds: created.map((alert) => alert.id) }),
      );
      return created;
    });
  }

  async listAlerts(ownerKey: string): Promise<AlertDefinition[]> {
    return this.guard(() => this.store.listByOwner(ownerKey));
  }

  async removeAlert(alertId: string, ownerKey: string): Promise<void> {
    await this.guard(async () => {
      const alert = await this.store.get(alertId);
      if (!alert || alert.ownerKey !== ownerKey) {
        throw new NotFoundException(`Alert #${alertId} not found`);
      }
      await this.store.remove(alertId);
      this.logger.log(JSON.stringify({ event: 'alert_removed', alertId }));
    });
  }

  async listEvents(alertId: string, limit?: number): Promise<AlertEvent[]> {
    return this.guard(async () => {
      const alert = await this.store.get(alertId);
      if (!alert) {
        throw new NotFoundException(`Alert #${alertId} not found`);
      }
      return this.eventLog.list(alertId, limit);
    });
  }

  private assertSupportedKind(kind: AlertKind): void {
    if (isWindowKind(kind) && !this.config.rollingWindowDurationsMinutes.includes(kind.durationMinutes)) {
      throw new BadRequestException(
        `Unsupported window duration ${kind.durationMinutes}m; supported: ${this.config.rollingWindowDurationsMinutes.join(', ')}`,
      );
    }
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RepositoryUnavailableError) {
        this.logger.warn(error.message);
        throw new ServiceUnavailableException('Alert store unavailable');
      }
      throw error;
    }
  }
}
