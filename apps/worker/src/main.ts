import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { resolveLogLevels } from '@libs/core';
import { WorkerModule } from './worker.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(WorkerModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const parsePort = (value?: string | number): number | null => {
    if (value === undefined || value === '') {
      return null;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
  };
  const port = parsePort(configService.get<string | number>('PORT')) ?? 3001;
  const host = '0.0.0.0';
  const logger = new Logger('WorkerBootstrap');

  await app.listen(port, host);
  logger.log(`${configService.get<string>('APP_NAME', 'stock-alert-engine')} listening on ${host}:${port}`);
}

void bootstrap();
