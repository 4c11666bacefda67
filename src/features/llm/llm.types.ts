import type { LlmConfig } from '@/features/agents/agents.types';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LlmRequest {
  systemPrompt: string;
  conversationHistory: ChatMessage[];
  userPrompt: string;
  modelConfig: LlmConfig;
  signal?: AbortSignal;
}

export interface LlmInvoker {
  complete(request: LlmRequest): Promise<string>;
}
