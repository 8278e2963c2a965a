import { BadRequestException, Body, Controller, Delete, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { createAlertSchema, createAlertSetSchema, ownerKeySchema } from '@libs/alerts';
import { z } from 'zod';
import { AlertsService } from './alerts.service';
import { toAlertEventView, toAlertView } from './alert.presenter';
import type { AlertEventView, AlertView } from './alert.presenter';

const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BadRequestException(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    );
  }
  return parsed.data;
};

const limitSchema = z.coerce.number().int().min(1).max(500).optional();

@Controller('alerts')
export class AlertsController {
  constructor(private readonly alertsService: AlertsService) {}

  @Post()
  async create(@Body() body: unknown): Promise<{ ok: true; alert: AlertView }> {
    const input = parseOrThrow(createAlertSchema, body);
    const alert = await this.alertsService.createAlert(input);
    return { ok: true, alert: toAlertView(alert) };
  }

  @Post('set')
  async createSet(@Body() body: unknown): Promise<{ ok: true; alerts: AlertView[] }> {
    const input = parseOrThrow(createAlertSetSchema, body);
    const alerts = await this.alertsService.createAlertSet(input);
    return { ok: true, alerts: alerts.map(toAlertView) };
  }

  @Get()
  async list(@Query('ownerKey') ownerKey?: string): Promise<{ ok: true; alerts: AlertView[] }> {
    const owner = parseOrThrow(ownerKeySchema, ownerKey);
    const alerts = await this.alertsService.listAlerts(owner);
    return { ok: true, alerts: alerts.map(toAlertView) };
  }

  @Delete(':id')
  @HttpCode(200)
  async remove(@Param('id') id: string, @Query('ownerKey') ownerKey?: string): Promise<{ ok: true }> {
    const owner = parseOrThrow(ownerKeySchema, ownerKey);
    await this.alertsService.removeAlert(id, owner);
    return { ok: true };
  }

  @Get(':id/events')
  async events(
    @Param('id') id: string,
    @Query('limit') limit?: string,
  ): Promise<{ ok: true; events: AlertEventView[] }> {
    const take = parseOrThrow(limitSchema, limit);
    const events = await this.alertsService.listEvents(id, take);
    return { ok: true, events: events.map(toAlertEventView) };
  }
}
