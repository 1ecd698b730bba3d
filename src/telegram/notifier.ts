import { Telegram } from 'telegraf';
import { TelegramConfig } from '../config/app';
import { Notifier } from '../types';
import { classifyError, formatError, retryWithBackoff } from '../utils/errors';

export class TelegramNotifier implements Notifier {
  private telegram: Telegram;
  private chatId: string;

  constructor(config: TelegramConfig) {
    this.telegram = new Telegram(config.botToken);
    this.chatId = config.chatId;
  }

  async sendMessage(text: string): Promise<void> {
    try {
      await retryWithBackoff(
        () => this.telegram.sendMessage(this.chatId, text),
        {
          maxRetries: 2,
          onRetry: (error, attempt) => {
            console.warn(`Retrying Telegram message (attempt ${attempt}): ${error.message}`);
          },
        }
      );
    } catch (error) {
      const appError = classifyError(error, { chatId: this.chatId });
      console.error('Failed to send Telegram message:', formatError(appError));
      throw appError;
    }
  }
}
