import { envConfig } from '@/config/env';
import type { ChatMessage } from '@/features/llm/llm.types';
import { SessionModel } from './sessions.model';

export const getHistory = async (userId: string, agentId: string): Promise<ChatMessage[]> => {
  const session = await SessionModel.findOne({ userId, agentId }).lean();
  if (!session) {
    return [];
  }
  return session.history
    .slice(-envConfig.CHAT_HISTORY_LIMIT)
    .map((entry) => ({ role: entry.role, content: entry.content }));
};

export const appendExchange = async (
  userId: string,
  agentId: string,
  message: string,
  reply: string,
): Promise<void> => {
  const at = new Date();
  await SessionModel.updateOne(
    { userId, agentId },
    {
      $push: {
        history: {
          $each: [
            { role: 'user', content: message, at },
            { role: 'assistant', content: reply, at },
          ],
          $slice: -envConfig.CHAT_HISTORY_LIMIT,
        },
      },
    },
    { upsert: true },
  );
};

export const clearHistory = async (userId: string, agentId: string): Promise<void> => {
  await SessionModel.deleteOne({ userId, agentId });
};
