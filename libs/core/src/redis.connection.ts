import { ConfigService } from '@nestjs/config';
import { RedisOptions } from 'ioredis';

const DEFAULT_REDIS_PORT = 6379;

const parseRedisUrl = (redisUrl: string): RedisOptions => {
  const url = new URL(redisUrl);
  const options: RedisOptions = {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
  };

  if (url.username) {
    options.username = decodeURIComponent(url.username);
  }

  if (url.password) {
    options.password = decodeURIComponent(url.password);
  }

  if (url.pathname && url.pathname !== '/') {
    const db = Number(url.pathname.replace('/', ''));
    if (!Number.isNaN(db)) {
      options.db = db;
    }
  }

  if (url.protocol === 'rediss:') {
    options.tls = {};
  }

  return options;
};

/**
 * Builds ioredis options from either `REDIS_URL` or the discrete host/port
 * keys. Every command is bounded by `REDIS_COMMAND_TIMEOUT_MS` and namespaced
 * under `REDIS_KEY_PREFIX`, including the keys passed to Lua scripts.
 */
export const createRedisConnection = (configService: ConfigService): RedisOptions => {
  const redisUrl = configService.get<string>('REDIS_URL');
  const base: RedisOptions = redisUrl
    ? parseRedisUrl(redisUrl)
    : {
        host: configService.get<string>('REDIS_HOST', 'localhost'),
        port: Number(configService.get<number>('REDIS_PORT', DEFAULT_REDIS_PORT)),
        password: configService.get<string>('REDIS_PASSWORD') || undefined,
      };

  return {
    ...base,
    keyPrefix: configService.get<string>('REDIS_KEY_PREFIX', 'stock-alerts:'),
    commandTimeout: Number(configService.get<number>('REDIS_COMMAND_TIMEOUT_MS', 2000)),
    maxRetriesPerRequest: 1,
  };
};
