import { describe, it, expect, vi } from 'vitest';
import type { ToolInvoker } from '@/features/tools/tools.types';
import { ScriptedLlm, buildAgent } from '@/testing/fakes';
import { completeWithToolInterception, continuationPrompt, findToolCall } from './llm.tool-calls';
import type { LlmRequest } from './llm.types';

const agent = buildAgent({
  tools: [{ toolId: 'weather', name: 'Weather', type: 'FUNCTION', config: { functionName: 'weather' } }],
});

const request: LlmRequest = {
  systemPrompt: 'You are a helpful assistant.',
  conversationHistory: [{ role: 'user', content: 'hi' }],
  userPrompt: 'What is the weather in Izmir?',
  modelConfig: agent.llmConfig,
};

describe('findToolCall', () => {
  it('finds nothing in plain text', () => {
    expect(findToolCall('No tools needed.')).toEqual({ kind: 'none' });
  });

  it('parses the tool id, params and span', () => {
    const text = 'Checking. [TOOL_CALL: weather, {"city": "Izmir"}] tail';
    const scan = findToolCall(text);
    expect(scan).toEqual({ kind: 'call', toolId: 'weather', params: { city: 'Izmir' }, start: 10, end: 49 });
  });

  it('keeps braces that sit inside JSON strings', () => {
    const scan = findToolCall('[TOOL_CALL: search, {"q": "a}b"}]');
    expect(scan.kind === 'call' && scan.params).toEqual({ q: 'a}b' });
  });

  it('reports invalid JSON as a malformed marker', () => {
    const scan = findToolCall('[TOOL_CALL: foo {bad json}]');
    expect(scan.kind).toBe('malformed');
    if (scan.kind === 'malformed') {
      expect(scan.error.kind).toBe('MalformedToolCallMarker');
      expect(scan.error.message).toMatch(/^Tool call for foo ignored: invalid JSON/);
      expect(scan.error.details).toEqual({ raw: '[TOOL_CALL: foo {bad json}]' });
    }
  });

  it('reports a marker without a params object', () => {
    const scan = findToolCall('[TOOL_CALL: weather]');
    expect(scan.kind === 'malformed' && scan.error.message).toBe(
      'Tool call for weather ignored: parameters must be a JSON object',
    );
  });

  it('reports a marker that is never closed', () => {
    const scan = findToolCall('[TOOL_CALL: weather, {"city": "Izmir"}');
    expect(scan.kind === 'malformed' && scan.error.message).toBe(
      'Tool call for weather ignored: missing closing "]"',
    );
  });
});

describe('completeWithToolInterception', () => {
  it('returns plain completions untouched', async () => {
    const llm = new ScriptedLlm(['Sunny.']);
    const invoke = vi.fn<ToolInvoker['invoke']>();

    const result = await completeWithToolInterception(llm, { invoke }, request, { agent });

    expect(result).toEqual({ text: 'Sunny.' });
    expect(invoke).not.toHaveBeenCalled();
  });

  it('invokes the tool and splices the continuation after the prefix', async () => {
    const llm = new ScriptedLlm(['Checking. [TOOL_CALL: weather, {"city": "Izmir"}] ignored', 'It is 21 degrees.']);
    const invoke = vi.fn<ToolInvoker['invoke']>().mockResolvedValue({ temp: 21 });

    const result = await completeWithToolInterception(llm, { invoke }, request, { agent, userId: 'u1' });

    expect(result.text).toBe('Checking.\nIt is 21 degrees.');
    expect(result.toolCall).toEqual({ toolId: 'weather', result: { temp: 21 } });
    expect(invoke).toHaveBeenCalledWith(agent.tools[0], { city: 'Izmir' }, { agent, userId: 'u1' });

    const second = llm.requests[1];
    expect(second.userPrompt).toBe('Tool weather returned: {"temp":21}\nContinue your answer using this result.');
    expect(second.conversationHistory).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'user', content: 'What is the weather in Izmir?' },
      { role: 'assistant', content: 'Checking. [TOOL_CALL: weather, {"city": "Izmir"}] ignored' },
    ]);
  });

  it('returns only the continuation when the marker opens the reply', async () => {
    const llm = new ScriptedLlm(['[TOOL_CALL: weather, {}]', 'Done.']);
    const invoke = vi.fn<ToolInvoker['invoke']>().mockResolvedValue(undefined);

    const result = await completeWithToolInterception(llm, { invoke }, request, { agent });

    expect(result.text).toBe('Done.');
    expect(llm.requests[1].userPrompt).toBe(continuationPrompt('weather', null));
  });

  it('leaves a malformed marker as text with a note', async () => {
    const llm = new ScriptedLlm(['[TOOL_CALL: foo {bad json}]']);
    const invoke = vi.fn<ToolInvoker['invoke']>();

    const result = await completeWithToolInterception(llm, { invoke }, request, { agent });

    expect(result.text).toBe('[TOOL_CALL: foo {bad json}]');
    expect(result.note).toMatch(/^MalformedToolCallMarker: /);
    expect(invoke).not.toHaveBeenCalled();
    expect(llm.requests).toHaveLength(1);
  });

  it('leaves a marker for an undeclared tool as text', async () => {
    const llm = new ScriptedLlm(['[TOOL_CALL: stocks, {"symbol": "ACME"}]']);
    const invoke = vi.fn<ToolInvoker['invoke']>();

    const result = await completeWithToolInterception(llm, { invoke }, request, { agent });

    expect(result).toEqual({
      text: '[TOOL_CALL: stocks, {"symbol": "ACME"}]',
      note: 'Tool-call marker names unknown tool "stocks"',
    });
  });
});
