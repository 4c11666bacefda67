import { describe, it, expect } from 'vitest';
import { buildAgent } from '@/testing/fakes';
import { validateAgentDefinition } from './agents.validation';

describe('validateAgentDefinition', () => {
  it('accepts a consistent agent', () => {
    const agent = buildAgent({
      tools: [{ toolId: 'db', name: 'Database', type: 'DATABASE' }],
      workflows: [
        {
          workflowId: 'main',
          trigger: 'message',
          nodes: [
            { nodeId: 'lookup', type: 'tool_call', toolId: 'db' },
            { nodeId: 'check', type: 'conditional_logic', condition: 'true', true_branch: 'lookup' },
          ],
        },
      ],
      schedules: [{ scheduleId: 'daily', cron: '0 9 * * *', workflowId: 'main' }],
    });

    expect(validateAgentDefinition(agent)).toEqual([]);
  });

  it('reports broken references and duplicates', () => {
    const agent = buildAgent({
      workflows: [
        {
          workflowId: 'main',
          trigger: 'message',
          nodes: [
            { nodeId: 'fetch', type: 'tool_call', toolId: 'stocks' },
            { nodeId: 'fetch', type: 'conditional_logic', condition: 'true', false_branch: 'nowhere' },
          ],
        },
      ],
      schedules: [{ scheduleId: 'daily', cron: '0 9 * * *', workflowId: 'ghost' }],
    });

    expect(validateAgentDefinition(agent)).toEqual([
      {
        kind: 'DefinitionError',
        path: 'schedules.daily',
        message: 'Schedule "daily" references unknown workflow "ghost"',
      },
      { kind: 'DefinitionError', path: 'workflows.main.nodes', message: 'Duplicate nodeId "fetch"' },
      {
        kind: 'UnknownToolReference',
        path: 'workflows.main.nodes.fetch',
        message: 'Node "fetch" references unknown tool "stocks"',
      },
      {
        kind: 'DefinitionError',
        path: 'workflows.main.nodes.fetch',
        message: 'Node "fetch" branches to unknown node "nowhere"',
      },
    ]);
  });
});
