import TelegramBot from 'node-telegram-bot-api';
import { SinkDeliveryError, errorMessage } from '../../domain/errors';
import { INotificationChannel } from '../../domain/interfaces/services.interface';
import { MarketEvent } from '../../domain/types/event.types';
import { Logger } from '../../shared/logger';
import { formatTelegramMessage } from '../notifications/event.formatter';

/** Send-only bot: pushes event alerts to one chat, never polls for updates. */
export class TelegramBotService implements INotificationChannel {
  readonly name = 'telegram';
  private readonly bot: TelegramBot;
  private readonly logger = new Logger(TelegramBotService.name);

  constructor(
    token: string,
    private readonly chatId: number,
  ) {
    if (!token) {
      throw new Error('Telegram Bot Token is not provided!');
    }
    this.bot = new TelegramBot(token, { polling: false });
    this.logger.info(`Telegram alerts go to chat ${chatId}`);
  }

  async send(event: MarketEvent): Promise<void> {
    try {
      await this.bot.sendMessage(this.chatId, formatTelegramMessage(event), {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
    } catch (error) {
      throw new SinkDeliveryError(`telegram:${this.chatId}`, errorMessage(error));
    }
  }
}
