import { describe, it, expect, vi } from 'vitest';
import { toolSpecSchema } from './tools.registry';
import { MemoryDocumentStore, RecordingChannel, buildAgent } from '@/testing/fakes';
import { FunctionRegistry, createDefaultFunctions } from './tools.function';
import { ToolInvokerService } from './tools.invoker';

const agent = buildAgent();
const scope = { agent, userId: 'u1' };

const setup = () => {
  const channel = new RecordingChannel();
  const request = vi.fn().mockResolvedValue({ status: 200, data: '{"ok":true}' });
  const functions = createDefaultFunctions(() => new Date('2024-05-01T10:00:00Z')).register('echo', (params) => params);
  const invoker = new ToolInvokerService({ store: new MemoryDocumentStore(), channel, http: { request }, functions });
  return { invoker, channel, request };
};

describe('ToolInvokerService', () => {
  it('sends telegram messages to the configured chat', async () => {
    const { invoker, channel } = setup();
    const tool = toolSpecSchema.parse({ toolId: 'notify', name: 'Notify', type: 'TELEGRAM', config: { chatId: 42 } });

    const result = await invoker.invoke(tool, { message: 'Order shipped' }, scope);

    expect(result).toEqual({ success: true, messageId: 1, chatId: '42', status: 'sent' });
    expect(channel.sent).toEqual([
      { identity: '42', text: 'Order shipped', options: { parseMode: 'Markdown', signal: undefined } },
    ]);
  });

  it('prefers the chat_id parameter and requires some text', async () => {
    const { invoker, channel } = setup();
    const tool = toolSpecSchema.parse({ toolId: 'notify', name: 'Notify', type: 'TELEGRAM' });

    await invoker.invoke(tool, { chat_id: 'chat-7', text: 'hi' }, scope);
    expect(channel.sent[0].identity).toBe('chat-7');

    await expect(invoker.invoke(tool, { chat_id: 'chat-7', message: '  ' }, scope)).rejects.toMatchObject({
      kind: 'ValidationError',
      message: 'notify needs a message or text parameter',
    });
    await expect(invoker.invoke(tool, { message: 'hi' }, scope)).rejects.toMatchObject({
      message: 'notify needs a chat_id parameter or a configured chatId',
    });
  });

  it('calls registered functions', async () => {
    const { invoker } = setup();
    const clock = toolSpecSchema.parse({
      toolId: 'clock',
      name: 'Clock',
      type: 'FUNCTION',
      config: { functionName: 'current_time' },
    });
    const echo = toolSpecSchema.parse({ toolId: 'echo', name: 'Echo', type: 'FUNCTION', config: { functionName: 'echo' } });

    await expect(invoker.invoke(clock, {}, scope)).resolves.toEqual({
      iso: '2024-05-01T10:00:00.000Z',
      date: '2024-05-01',
      timestamp: 1714557600000,
    });
    await expect(invoker.invoke(echo, { a: 1 }, scope)).resolves.toEqual({ a: 1 });
  });

  it('rejects functions nobody registered', async () => {
    const invoker = new ToolInvokerService({
      store: new MemoryDocumentStore(),
      channel: new RecordingChannel(),
      functions: new FunctionRegistry(),
    });
    const tool = toolSpecSchema.parse({
      toolId: 'clock',
      name: 'Clock',
      type: 'FUNCTION',
      config: { functionName: 'current_time' },
    });

    await expect(invoker.invoke(tool, {}, scope)).rejects.toMatchObject({
      reason: 'UnsupportedOperation',
      message: 'Function "current_time" is not registered',
    });
  });

  it('routes API tools through the shared HTTP client', async () => {
    const { invoker, request } = setup();
    const tool = toolSpecSchema.parse({
      toolId: 'status',
      name: 'Status',
      type: 'API',
      config: { endpoint: 'https://status.example.com/v1' },
    });

    await expect(invoker.invoke(tool, {}, scope)).resolves.toEqual({ ok: true });
    expect(request).toHaveBeenCalledTimes(1);
  });
});
