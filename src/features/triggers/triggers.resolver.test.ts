import { describe, it, expect } from 'vitest';
import { buildAgent } from '@/testing/fakes';
import { matchesMessage, parseTrigger, resolveMessageTrigger, resolveScheduleTrigger } from './triggers.resolver';

const reply = [{ nodeId: 'reply', type: 'send_response' as const, message: 'ok' }];

const agent = buildAgent({
  workflows: [
    { workflowId: 'orders', trigger: 'message:^order\\s+#?\\d+', nodes: reply },
    { workflowId: 'help', trigger: 'help', nodes: reply },
    { workflowId: 'digest', trigger: 'schedule:daily', nodes: reply },
    { workflowId: 'fallback', trigger: 'message', nodes: reply },
  ],
  schedules: [{ scheduleId: 'weekly', cron: '0 9 * * 1', workflowId: 'help' }],
});

describe('parseTrigger', () => {
  it('recognizes every trigger form', () => {
    expect(parseTrigger('schedule: daily')).toEqual({ kind: 'schedule', scheduleId: 'daily' });
    expect(parseTrigger('message')).toEqual({ kind: 'any-message' });
    expect(parseTrigger('message:*')).toEqual({ kind: 'any-message' });
    expect(parseTrigger('message:^hi')).toEqual({ kind: 'pattern', pattern: /^hi/i });
    expect(parseTrigger('Help')).toEqual({ kind: 'keyword', keyword: 'help' });
  });

  it('falls back to a keyword when the pattern is not a valid regex', () => {
    expect(parseTrigger('message:(unclosed')).toEqual({ kind: 'keyword', keyword: '(unclosed' });
  });
});

describe('matchesMessage', () => {
  it('never matches schedules or empty keywords', () => {
    expect(matchesMessage({ kind: 'schedule', scheduleId: 'daily' }, 'daily')).toBe(false);
    expect(matchesMessage({ kind: 'keyword', keyword: '' }, 'anything')).toBe(false);
  });
});

describe('resolveMessageTrigger', () => {
  it('picks the first matching workflow in declaration order', () => {
    expect(resolveMessageTrigger(agent, { userId: 'u1', message: 'Order #42 status?' })?.workflowId).toBe('orders');
    expect(resolveMessageTrigger(agent, { userId: 'u1', message: 'I need HELP' })?.workflowId).toBe('help');
    expect(resolveMessageTrigger(agent, { userId: 'u1', message: 'hello' })?.workflowId).toBe('fallback');
  });

  it('builds the initial context from the message', () => {
    const history = [{ role: 'user' as const, content: 'earlier' }];

    expect(resolveMessageTrigger(agent, { userId: 'u1', message: 'help me', conversationHistory: history })).toEqual({
      agentId: 'agent-1',
      workflowId: 'help',
      initialContext: { user_id: 'u1', message: 'help me', conversation_history: history },
    });
  });

  it('returns null when nothing matches', () => {
    const quiet = buildAgent({ workflows: [{ workflowId: 'help', trigger: 'help', nodes: reply }] });
    expect(resolveMessageTrigger(quiet, { userId: 'u1', message: 'hello' })).toBeNull();
  });
});

describe('resolveScheduleTrigger', () => {
  const at = new Date('2024-05-06T09:00:00Z');

  it('uses the schedule workflow and a system user', () => {
    expect(resolveScheduleTrigger(agent, 'weekly', at)).toEqual({
      agentId: 'agent-1',
      workflowId: 'help',
      initialContext: {
        user_id: 'system_scheduler_weekly',
        scheduled_execution: true,
        schedule_id: 'weekly',
        execution_time: '2024-05-06T09:00:00.000Z',
      },
    });
  });

  it('falls back to a workflow whose trigger names the schedule', () => {
    expect(resolveScheduleTrigger(agent, 'daily', at)?.workflowId).toBe('digest');
    expect(resolveScheduleTrigger(agent, 'monthly', at)).toBeNull();
  });
});
