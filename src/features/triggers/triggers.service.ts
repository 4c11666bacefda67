import { logger } from '@/utils/logger';
import type { AgentDefinition } from '@/features/agents/agents.types';
import { llmService } from '@/features/llm/llm.service';
import { executeRun } from '@/features/runs/runs.service';
import { appendExchange, getHistory } from '@/features/sessions/sessions.service';
import type { RunResult } from '@/features/workflows/workflows.types';
import { resolveMessageTrigger } from './triggers.resolver';

export interface ChatReply {
  reply: string;
  workflowId?: string;
  runId?: string;
  status?: RunResult['status'];
}

/**
 * Routes one chat message: the first workflow whose trigger matches runs,
 * otherwise the agent answers with a plain completion.
 */
export const handleChatMessage = async (agent: AgentDefinition, userId: string, message: string): Promise<ChatReply> => {
  const history = await getHistory(userId, agent.agentId);
  const trigger = resolveMessageTrigger(agent, { userId, message, conversationHistory: history });

  let reply: ChatReply;
  if (trigger) {
    const result = await executeRun({ ...trigger, owner: agent.owner, source: 'chat' });
    reply = {
      reply: result.responses.join('\n'),
      workflowId: result.workflowId,
      runId: result.runId,
      status: result.status,
    };
  } else {
    logger.debug({ agentId: agent.agentId }, 'No workflow matched, answering directly');
    const text = await llmService.complete({
      systemPrompt: agent.systemPrompt,
      conversationHistory: history,
      userPrompt: message,
      modelConfig: agent.llmConfig,
    });
    reply = { reply: text };
  }

  await appendExchange(userId, agent.agentId, message, reply.reply);
  return reply;
};
