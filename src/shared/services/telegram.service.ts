import axios, { type AxiosInstance } from 'axios';
import { envConfig } from '@/config/env';
import { logger } from '@/utils/logger';
import { ToolError } from '@/features/workflows/workflows.errors';
import type { DeliveryResult, MessagingChannel, SendOptions } from './messaging.types';

interface TelegramResponse {
  ok: boolean;
  description?: string;
  result?: { message_id: number; chat: { id: number | string } };
}

export class TelegramChannel implements MessagingChannel {
  constructor(
    private readonly client: Pick<AxiosInstance, 'request'> = axios.create({ timeout: 30000 }),
    private readonly token: string | undefined = envConfig.TELEGRAM_BOT_TOKEN,
    private readonly apiUrl: string = envConfig.TELEGRAM_API_URL,
  ) {}

  async send(identity: string, text: string, options: SendOptions = {}): Promise<DeliveryResult> {
    const token = this.token;
    if (!token) {
      throw new ToolError('DeliveryFailed', 'Telegram is not configured. Set TELEGRAM_BOT_TOKEN in the environment.');
    }

    const parseMode = options.parseMode && options.parseMode !== 'None' ? options.parseMode : undefined;

    let data: TelegramResponse;
    try {
      const response = await this.client.request<TelegramResponse>({
        method: 'POST',
        url: `${this.apiUrl}/bot${token}/sendMessage`,
        data: { chat_id: identity, text, parse_mode: parseMode },
        signal: options.signal,
        validateStatus: () => true,
      });
      data = response.data;
    } catch (error) {
      // The request URL carries the bot token; only the scrubbed message is logged.
      const reason = (error instanceof Error ? error.message : String(error)).split(token).join('***');
      const code = axios.isAxiosError(error) ? error.code : undefined;
      logger.warn({ chatId: identity, reason, code }, 'Telegram request failed');
      throw new ToolError('DeliveryFailed', `Telegram request failed: ${reason}`, { chatId: identity });
    }

    if (!data?.ok || !data.result) {
      throw new ToolError('DeliveryFailed', `Telegram rejected the message: ${data?.description ?? 'unknown error'}`, {
        chatId: identity,
      });
    }

    return { messageId: data.result.message_id, chatId: String(data.result.chat.id) };
  }
}

export const telegramChannel = new TelegramChannel();
