import type { AgentDefinition } from '@/features/agents/agents.types';
import type { ChatMessage } from '@/features/llm/llm.types';
import type { ParsedTrigger, ResolvedTrigger } from './triggers.types';

const SCHEDULE_PREFIX = 'schedule:';
const MESSAGE_PREFIX = 'message:';

/**
 * Trigger strings:
 * - `schedule:<scheduleId>` fires on that schedule's ticks
 * - `message` or `message:*` matches any inbound message
 * - `message:<regex>` is tested case-insensitively (an invalid regex is used as a keyword)
 * - anything else is a case-insensitive keyword the message must contain
 */
export const parseTrigger = (trigger: string): ParsedTrigger => {
  const value = trigger.trim();
  if (value.startsWith(SCHEDULE_PREFIX)) {
    return { kind: 'schedule', scheduleId: value.slice(SCHEDULE_PREFIX.length).trim() };
  }
  if (value === 'message' || value === `${MESSAGE_PREFIX}*`) {
    return { kind: 'any-message' };
  }
  if (value.startsWith(MESSAGE_PREFIX)) {
    const source = value.slice(MESSAGE_PREFIX.length).trim();
    try {
      return { kind: 'pattern', pattern: new RegExp(source, 'i') };
    } catch {
      return { kind: 'keyword', keyword: source.toLowerCase() };
    }
  }
  return { kind: 'keyword', keyword: value.toLowerCase() };
};

export const matchesMessage = (trigger: ParsedTrigger, message: string): boolean => {
  switch (trigger.kind) {
    case 'schedule':
      return false;
    case 'any-message':
      return true;
    case 'pattern':
      return trigger.pattern.test(message);
    case 'keyword':
      return trigger.keyword !== '' && message.toLowerCase().includes(trigger.keyword);
  }
};

export interface MessageTriggerInput {
  userId: string;
  message: string;
  conversationHistory?: ChatMessage[];
}

/** First workflow, in declaration order, whose trigger matches the message. */
export const resolveMessageTrigger = (agent: AgentDefinition, input: MessageTriggerInput): ResolvedTrigger | null => {
  const workflow = agent.workflows.find((candidate) => matchesMessage(parseTrigger(candidate.trigger), input.message));
  if (!workflow) {
    return null;
  }
  return {
    agentId: agent.agentId,
    workflowId: workflow.workflowId,
    initialContext: {
      user_id: input.userId,
      message: input.message,
      conversation_history: input.conversationHistory ?? [],
    },
  };
};

export const resolveScheduleTrigger = (
  agent: AgentDefinition,
  scheduleId: string,
  executionTime: Date,
): ResolvedTrigger | null => {
  const schedule = agent.schedules.find((candidate) => candidate.scheduleId === scheduleId);
  const workflow =
    agent.workflows.find((candidate) => candidate.workflowId === schedule?.workflowId) ??
    agent.workflows.find((candidate) => {
      const trigger = parseTrigger(candidate.trigger);
      return trigger.kind === 'schedule' && trigger.scheduleId === scheduleId;
    });
  if (!workflow) {
    return null;
  }
  return {
    agentId: agent.agentId,
    workflowId: workflow.workflowId,
    initialContext: {
      user_id: `system_scheduler_${scheduleId}`,
      scheduled_execution: true,
      schedule_id: scheduleId,
      execution_time: executionTime.toISOString(),
    },
  };
};
