export * from './core.module';
export * from './env.schema';
export * from './redis.connection';
export * from './redis.service';
export * from './utils/concurrency.util';
export * from './utils/timeout.util';
export * from './utils/log-level.util';
