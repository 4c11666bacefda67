import { describe, it, expect } from 'vitest';
import type { AgentDefinition, AgentInput } from '@/features/agents/agents.types';
import { ToolInvokerService } from '@/features/tools/tools.invoker';
import {
  MemoryAgentStore,
  MemoryDocumentStore,
  RecordingChannel,
  ScriptedLlm,
  buildAgent,
  noSleep,
} from '@/testing/fakes';
import { WorkflowEngine } from './workflows.engine';

type NodeInput = NonNullable<AgentInput['workflows']>[number]['nodes'][number];

const FAILURE = 'Something went wrong.';

const agentWith = (nodes: NodeInput[]): AgentDefinition =>
  buildAgent({
    tools: [
      {
        toolId: 'veritabani_islemleri',
        name: 'Database',
        type: 'DATABASE',
        config: { operations: ['insert_document', 'find_documents'] },
      },
    ],
    workflows: [{ workflowId: 'main', trigger: 'message', nodes }],
  });

const setup = (agent: AgentDefinition, replies: ConstructorParameters<typeof ScriptedLlm>[0] = ['ok']) => {
  const llm = new ScriptedLlm(replies);
  const store = new MemoryDocumentStore();
  const engine = new WorkflowEngine({
    agents: new MemoryAgentStore([agent]),
    llm,
    tools: new ToolInvokerService({ store, channel: new RecordingChannel() }),
    store,
    failureMessage: FAILURE,
    sleep: noSleep,
    now: () => new Date('2024-05-01T10:00:00Z'),
  });
  return { engine, llm, store };
};

describe('WorkflowEngine', () => {
  it('runs an LLM prompt, a database insert and a response in order', async () => {
    const agent = agentWith([
      { nodeId: 'ozet', type: 'llm_prompt', prompt: 'Summarize: $message', output_variable: 'temel_bilgiler' },
      {
        nodeId: 'kaydet',
        type: 'tool_call',
        toolId: 'veritabani_islemleri',
        params: { operation: 'insert_document', document: { ozet: '$temel_bilgiler' } },
        output_variable: 'kayit_sonucu',
      },
      { nodeId: 'yanit', type: 'send_response', message: '$kayit_sonucu' },
    ]);
    const { engine, llm, store } = setup(agent, ['Ada, 36, Izmir']);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1', message: 'I am Ada' });

    expect(result.status).toBe('completed');
    expect(result.steps).toBe(3);
    expect(result.records.map((record) => record.nodeId)).toEqual(['ozet', 'kaydet', 'yanit']);
    expect(result.responses).toEqual(['{"success":true,"inserted_id":"doc-1"}']);
    expect(result.context.kayit_sonucu).toEqual({ success: true, inserted_id: 'doc-1' });
    expect(llm.requests[0].userPrompt).toBe('Summarize: I am Ada');
    expect(store.documents('records')).toEqual([
      { ozet: 'Ada, 36, Izmir', agent_id: 'agent-1', user_id: 'u1', _id: 'doc-1' },
    ]);
  });

  it('seeds run variables without mutating the caller context', async () => {
    const agent = agentWith([{ nodeId: 'reply', type: 'send_response', message: 'Today is $current_date' }]);
    const { engine } = setup(agent);
    const initial = { user_id: 'u1' };

    const result = await engine.runWorkflow('agent-1', 'main', initial, { runId: 'run-7' });

    expect(result.responses).toEqual(['Today is 2024-05-01']);
    expect(result.context).toEqual({ user_id: 'u1', current_date: '2024-05-01', agent_id: 'agent-1', run_id: 'run-7' });
    expect(initial).toEqual({ user_id: 'u1' });
  });

  it('follows backward jumps until the condition turns false', async () => {
    const agent = agentWith([
      { nodeId: 'save', type: 'data_store', action: 'insert', data: { tick: true } },
      { nodeId: 'tally', type: 'data_store', action: 'count', output_variable: 'n' },
      { nodeId: 'check', type: 'conditional_logic', condition: '$n < 3', true_branch: 'save', false_branch: 'done' },
      { nodeId: 'done', type: 'send_response', message: 'Saved $n' },
    ]);
    const { engine } = setup(agent);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1' });

    expect(result.status).toBe('completed');
    expect(result.steps).toBe(10);
    expect(result.responses).toEqual(['Saved 3']);
  });

  it('stops a runaway loop with StepLimitExceeded', async () => {
    const agent = agentWith([
      { nodeId: 'loop', type: 'conditional_logic', condition: 'true', true_branch: 'loop', continue_on_error: true },
    ]);
    const { engine } = setup(agent);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1' }, { maxSteps: 5 });

    expect(result.status).toBe('failed');
    expect(result.steps).toBe(5);
    expect(result.error?.kind).toBe('StepLimitExceeded');
    expect(result.responses).toEqual([FAILURE]);
  });

  it('fails on an unknown tool reference before running any node', async () => {
    const agent = agentWith([
      { nodeId: 'greet', type: 'send_response', message: 'hi' },
      { nodeId: 'fetch', type: 'tool_call', toolId: 'stocks', continue_on_error: true },
    ]);
    const { engine } = setup(agent);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1' });

    expect(result.status).toBe('failed');
    expect(result.error?.kind).toBe('UnknownToolReference');
    expect(result.records).toEqual([]);
    expect(result.responses).toEqual([FAILURE]);
  });

  it('keeps going with an error marker under continue_on_error', async () => {
    const agent = agentWith([
      {
        nodeId: 'wipe',
        type: 'tool_call',
        toolId: 'veritabani_islemleri',
        params: { operation: 'delete_document' },
        continue_on_error: true,
        output_variable: 'result',
      },
      { nodeId: 'reply', type: 'send_response', message: 'Failed: $result.kind' },
    ]);
    const { engine } = setup(agent);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1' });

    expect(result.status).toBe('completed');
    expect(result.responses).toEqual(['Failed: ToolError']);
    expect(result.context.result).toEqual({
      error: true,
      kind: 'ToolError',
      message: 'Operation "delete_document" is not enabled for veritabani_islemleri',
    });
  });

  it('stores a malformed tool-call marker as plain text', async () => {
    const agent = agentWith([
      { nodeId: 'ask', type: 'llm_prompt', prompt: 'Hello', output_variable: 'answer' },
      { nodeId: 'reply', type: 'send_response', message: '$answer' },
    ]);
    const { engine, store } = setup(agent, ['[TOOL_CALL: foo {bad json}]']);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1' });

    expect(result.status).toBe('completed');
    expect(result.context.answer).toBe('[TOOL_CALL: foo {bad json}]');
    expect(result.responses).toEqual(['[TOOL_CALL: foo {bad json}]']);
    expect(store.collections.size).toBe(0);
  });

  it('halts when a condition has no branch for its outcome', async () => {
    const agent = agentWith([
      { nodeId: 'check', type: 'conditional_logic', condition: '$vip', true_branch: 'reply' },
      { nodeId: 'reply', type: 'send_response', message: 'Welcome back' },
    ]);
    const { engine } = setup(agent);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1', vip: false });

    expect(result.status).toBe('halted');
    expect(result.haltReason).toBe('Node check has no false branch');
    expect(result.responses).toEqual([]);
  });

  it('stops between nodes once the run is cancelled', async () => {
    const controller = new AbortController();
    const agent = agentWith([
      { nodeId: 'ask', type: 'llm_prompt', prompt: 'Hello' },
      { nodeId: 'reply', type: 'send_response', message: 'never sent' },
    ]);
    const { engine } = setup(agent, [
      () => {
        controller.abort();
        return 'first';
      },
    ]);

    const result = await engine.runWorkflow('agent-1', 'main', { user_id: 'u1' }, { signal: controller.signal });

    expect(result.status).toBe('halted');
    expect(result.haltReason).toBe('cancelled');
    expect(result.steps).toBe(1);
  });

  it('delivers the failure message through the responder', async () => {
    const agent = agentWith([{ nodeId: 'reply', type: 'send_response', message: 'hi' }]);
    const { engine } = setup(agent);
    const delivered: string[] = [];

    const result = await engine.runWorkflow(
      'agent-1',
      'main',
      {},
      {
        respond: async (message) => {
          delivered.push(message);
        },
      },
    );

    expect(result.status).toBe('failed');
    expect(result.error?.kind).toBe('ValidationError');
    expect(delivered).toEqual([FAILURE]);
  });

  it('records a retried response once, after it is delivered', async () => {
    const agent = agentWith([{ nodeId: 'reply', type: 'send_response', message: 'hello', max_retries: 1 }]);
    const { engine } = setup(agent);
    let calls = 0;

    const result = await engine.runWorkflow(
      'agent-1',
      'main',
      { user_id: 'u1' },
      {
        respond: async () => {
          calls += 1;
          if (calls === 1) {
            throw new Error('chat unreachable');
          }
        },
      },
    );

    expect(result.status).toBe('completed');
    expect(calls).toBe(2);
    expect(result.responses).toEqual(['hello']);
    expect(result.records.map((record) => record.outcome)).toEqual(['retried', 'success']);
  });

  it('accepts scheduled runs without a user', async () => {
    const agent = agentWith([{ nodeId: 'reply', type: 'send_response', message: 'tick' }]);
    const { engine } = setup(agent);

    const result = await engine.runWorkflow('agent-1', 'main', { scheduled_execution: true });

    expect(result.status).toBe('completed');
    expect(result.responses).toEqual(['tick']);
  });

  it('fails on an unknown agent or workflow', async () => {
    const { engine } = setup(agentWith([{ nodeId: 'reply', type: 'send_response', message: 'hi' }]));

    const missingAgent = await engine.runWorkflow('agent-9', 'main', { user_id: 'u1' });
    expect(missingAgent.error).toEqual({
      kind: 'DefinitionError',
      message: 'Agent "agent-9" not found',
      details: { agentId: 'agent-9' },
    });

    const missingWorkflow = await engine.runWorkflow('agent-1', 'other', { user_id: 'u1' });
    expect(missingWorkflow.error?.message).toBe('Workflow "other" not found');
  });
});
