import { Injectable } from '@nestjs/common';
import { DeliveryFailureError } from '@libs/alerts';
import type { AlertNotification, NotificationSink } from '@libs/alerts';
import { TelegramService, formatAlertMessage } from '@libs/telegram';

/** Owner keys are Telegram chat ids. */
@Injectable()
export class TelegramNotificationSink implements NotificationSink {
  constructor(private readonly telegramService: TelegramService) {}

  async send(ownerKey: string, notification: AlertNotification): Promise<void> {
    try {
      await this.telegramService.sendMessage(ownerKey, formatAlertMessage(notification), 'HTML');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new DeliveryFailureError(ownerKey, message);
    }
  }
}
