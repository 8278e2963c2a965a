import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import type { ParseMode } from 'telegraf/types';

const PARSE_MODES: readonly ParseMode[] = ['HTML', 'MarkdownV2', 'Markdown'];

export const resolveParseMode = (value: string | undefined): ParseMode => {
  const normalized = (value || 'HTML').trim().toUpperCase();
  return PARSE_MODES.find((mode) => mode.toUpperCase() === normalized) ?? 'HTML';
};

@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);
  private readonly bot: Telegraf;
  private readonly parseMode: ParseMode;
  private readonly disableWebPreview: boolean;

  constructor(configService: ConfigService) {
    const token = configService.get<string>('TELEGRAM_BOT_TOKEN');
    if (!token) throw new Error('TELEGRAM_BOT_TOKEN is required');

    this.parseMode = resolveParseMode(configService.get<string>('TELEGRAM_PARSE_MODE'));
    this.disableWebPreview = configService.get<boolean>('TELEGRAM_DISABLE_WEB_PAGE_PREVIEW', true);
    this.bot = new Telegraf(token);
  }

  async sendMessage(chatId: string, message: string, parseMode?: ParseMode): Promise<number> {
    const response = await this.bot.telegram.sendMessage(chatId, message, {
      parse_mode: parseMode ?? this.parseMode,
      link_preview_options: { is_disabled: this.disableWebPreview },
    });
    this.logger.debug(`Delivered message ${response.message_id} to ${chatId}`);
    return response.message_id;
  }
}
