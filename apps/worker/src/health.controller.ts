import { Controller, Get } from '@nestjs/common';
import { RedisService } from '@libs/core';
import { MarketCalendar } from '@libs/alerts';
import type { MarketPhase } from '@libs/alerts';
import { EvaluationSchedulerService } from './engine/evaluation-scheduler.service';
import type { SchedulerSnapshot } from './engine/evaluation-scheduler.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly redisService: RedisService,
    private readonly calendar: MarketCalendar,
    private readonly scheduler: EvaluationSchedulerService,
  ) {}

  @Get()
  health(): { ok: true } {
    return { ok: true };
  }

  @Get('engine')
  async engine(): Promise<{
    ok: true;
    redis: 'up' | 'down';
    market: { timeZone: string; phase: MarketPhase; sessionDate: string; nextOpen: string | null };
    scheduler: SchedulerSnapshot;
  }> {
    const now = new Date();
    const redis = (await this.redisService.isHealthy()) ? 'up' : 'down';

    const nextOpen = this.calendar.nextOpen(now);
    return {
      ok: true,
      redis,
      market: {
        timeZone: this.calendar.timeZone,
        phase: this.calendar.phase(now),
        sessionDate: this.calendar.sessionDate(now),
        nextOpen: nextOpen ? nextOpen.toISOString() : null,
      },
      scheduler: this.scheduler.snapshot(),
    };
  }
}
