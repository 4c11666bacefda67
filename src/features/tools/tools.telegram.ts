import { ValidationError } from '@/features/workflows/workflows.errors';
import type { ToolOfType } from '@/features/agents/agents.types';
import type { MessagingChannel } from '@/shared/services/messaging.types';
import type { ToolHandler, ToolParams, ToolScope } from './tools.types';

const readText = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    return value.trim() === '' ? undefined : value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
};

export class TelegramToolHandler implements ToolHandler<'TELEGRAM'> {
  constructor(private readonly channel: MessagingChannel) {}

  async invoke(tool: ToolOfType<'TELEGRAM'>, params: ToolParams, scope: ToolScope) {
    const chatId = readText(params.chat_id) ?? readText(tool.config.chatId);
    if (!chatId) {
      throw new ValidationError(`${tool.toolId} needs a chat_id parameter or a configured chatId`);
    }
    const text = readText(params.message) ?? readText(params.text);
    if (!text) {
      throw new ValidationError(`${tool.toolId} needs a message or text parameter`);
    }

    const delivery = await this.channel.send(chatId, text, { parseMode: tool.config.parseMode, signal: scope.signal });
    return { success: true, messageId: delivery.messageId, chatId: delivery.chatId, status: 'sent' };
  }
}
