export type ParseMode = 'Markdown' | 'MarkdownV2' | 'HTML' | 'None';

export interface SendOptions {
  parseMode?: ParseMode;
  signal?: AbortSignal;
}

export interface DeliveryResult {
  messageId: number | string;
  chatId: string;
}

export interface MessagingChannel {
  send(identity: string, text: string, options?: SendOptions): Promise<DeliveryResult>;
}
