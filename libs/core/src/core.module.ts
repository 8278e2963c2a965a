import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RedisService } from './redis.service';
import { envSchemaWithRefinements } from './env.schema';
import type { Env } from './env.schema';

/**
 * Global configuration plus the shared Redis client. Outside tests the whole
 * environment is validated at boot, so a bad schedule or market window stops
 * the worker before the first cycle.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: ['.env.local', '.env'],
      validate:
        process.env.NODE_ENV === 'test' ? undefined : (config): Env => envSchemaWithRefinements.parse(config),
    }),
  ],
  providers: [RedisService],
  exports: [ConfigModule, RedisService],
})
export class CoreModule {}
