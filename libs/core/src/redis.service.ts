import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { createRedisConnection } from './redis.connection';

/**
 * Shared ioredis client for the alert store, cooldown marks and the slow
 * price tier. Connection errors are logged once per outage instead of once
 * per reconnect attempt.
 */
@Injectable()
export class RedisService extends Redis implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private outageReason: string | null = null;

  constructor(configService: ConfigService) {
    super(createRedisConnection(configService));
    this.on('error', (error: Error) => {
      if (this.outageReason !== error.message) {
        this.logger.warn(JSON.stringify({ event: 'redis_connection_error', reason: error.message }));
      }
      this.outageReason = error.message;
    });
    this.on('ready', () => {
      if (this.outageReason !== null) {
        this.logger.log(JSON.stringify({ event: 'redis_connection_restored' }));
      }
      this.outageReason = null;
    });
  }

  async isHealthy(): Promise<boolean> {
    try {
      return (await this.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: 'redis_ping_failed',
          reason: error instanceof Error ? error.message : 'Unknown error',
        }),
      );
      return false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.status === 'end') return;
    await this.quit();
  }
}
