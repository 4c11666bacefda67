import axios from 'axios';
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { envConfig } from '@/config/env';
import { logger } from '@/utils/logger';
import { ProviderError } from '@/features/workflows/workflows.errors';
import type { ChatMessage, LlmInvoker, LlmRequest } from './llm.types';

type OpenAiCompatibleProvider = 'openai' | 'deepseek';

interface GeminiResponse {
  candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
}

const toOpenAiMessage = (message: ChatMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
};

const buildMessages = (request: LlmRequest): ChatMessage[] => {
  const messages: ChatMessage[] = [];
  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  messages.push(...request.conversationHistory);
  messages.push({ role: 'user', content: request.userPrompt });
  return messages;
};

const describeError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};

export class LlmService implements LlmInvoker {
  private readonly clients = new Map<OpenAiCompatibleProvider, OpenAI>();

  async complete(request: LlmRequest): Promise<string> {
    const { provider, model } = request.modelConfig;
    try {
      const text =
        provider === 'gemini' ? await this.completeGemini(request) : await this.completeOpenAi(provider, request);
      return text.trim();
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      logger.warn({ err: error, provider, model }, 'LLM completion failed');
      throw new ProviderError(`${provider} completion failed: ${describeError(error)}`, { provider, model });
    }
  }

  private getClient(provider: OpenAiCompatibleProvider): OpenAI {
    const existing = this.clients.get(provider);
    if (existing) {
      return existing;
    }

    const apiKey = provider === 'deepseek' ? envConfig.DEEPSEEK_API_KEY : envConfig.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ProviderError(`${provider} is not configured. Set its API key in the environment.`, { provider });
    }

    const client = new OpenAI({
      apiKey,
      baseURL: provider === 'deepseek' ? envConfig.DEEPSEEK_BASE_URL : undefined,
    });
    this.clients.set(provider, client);
    logger.info({ provider }, 'LLM client initialized');
    return client;
  }

  private async completeOpenAi(provider: OpenAiCompatibleProvider, request: LlmRequest): Promise<string> {
    const client = this.getClient(provider);
    const { model, temperature, max_tokens: maxTokens } = request.modelConfig;
    const completion = await client.chat.completions.create(
      {
        model,
        messages: buildMessages(request).map(toOpenAiMessage),
        temperature,
        max_tokens: maxTokens,
      },
      { signal: request.signal },
    );
    return completion.choices[0]?.message?.content ?? '';
  }

  private async completeGemini(request: LlmRequest): Promise<string> {
    if (!envConfig.GEMINI_API_KEY) {
      throw new ProviderError('gemini is not configured. Set GEMINI_API_KEY in the environment.', {
        provider: 'gemini',
      });
    }

    const { model, temperature, max_tokens: maxTokens } = request.modelConfig;
    const contents = [...request.conversationHistory, { role: 'user', content: request.userPrompt }]
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));

    const response = await axios.post<GeminiResponse>(
      `${envConfig.GEMINI_BASE_URL}/models/${encodeURIComponent(model)}:generateContent`,
      {
        contents,
        systemInstruction: request.systemPrompt ? { parts: [{ text: request.systemPrompt }] } : undefined,
        generationConfig: { temperature, maxOutputTokens: maxTokens },
      },
      {
        params: { key: envConfig.GEMINI_API_KEY },
        signal: request.signal,
      },
    );

    const parts = response.data.candidates?.[0]?.content?.parts ?? [];
    return parts.map((part) => part.text ?? '').join('');
  }
}

export const llmService = new LlmService();
