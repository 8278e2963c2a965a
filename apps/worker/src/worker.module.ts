import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CoreModule } from '@libs/core';
import { AlertsController } from './alerts/alerts.controller';
import { AlertsService } from './alerts/alerts.service';
import { PricesController } from './alerts/prices.controller';
import { EngineModule } from './engine/engine.module';
import { HealthController } from './health.controller';

@Module({
  imports: [CoreModule, EngineModule, ScheduleModule.forRoot()],
  controllers: [HealthController, AlertsController, PricesController],
  providers: [AlertsService],
})
export class WorkerModule {}
