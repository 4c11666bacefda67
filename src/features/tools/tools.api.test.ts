import { AxiosError } from 'axios';
import { describe, it, expect, vi } from 'vitest';
import type { ToolOfType } from '@/features/agents/agents.types';
import { buildAgent } from '@/testing/fakes';
import { ApiToolHandler, cleanParams } from './tools.api';

const scope = { agent: buildAgent(), userId: 'u1' };

const weatherTool = (config: Partial<ToolOfType<'API'>['config']> = {}): ToolOfType<'API'> => ({
  toolId: 'weather',
  name: 'Weather',
  description: '',
  type: 'API',
  config: { endpoint: 'https://api.example.com/weather', method: 'GET', timeout: 30, ...config },
});

describe('ApiToolHandler', () => {
  it('sends GET params as the query string with bearer auth', async () => {
    const request = vi.fn().mockResolvedValue({ status: 200, data: '{"temp":21}' });
    const handler = new ApiToolHandler({ request });

    const result = await handler.invoke(
      weatherTool({ auth: { type: 'bearer', key: 'test-secret' } }),
      { city: 'Izmir' },
      scope,
    );

    expect(result).toEqual({ temp: 21 });
    expect(request).toHaveBeenCalledWith(
      expect.objectContaining({
        url: 'https://api.example.com/weather',
        method: 'GET',
        params: { city: 'Izmir' },
        data: undefined,
        timeout: 30000,
        headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
      }),
    );
  });

  it('sends a JSON body for POST and wraps non-JSON replies', async () => {
    const request = vi.fn().mockResolvedValue({ status: 202, data: 'accepted' });
    const handler = new ApiToolHandler({ request });

    const result = await handler.invoke(
      weatherTool({ method: 'POST', auth: { type: 'apiKey', key: 'test-key' } }),
      { city: 'Izmir' },
      scope,
    );

    expect(result).toEqual({ text: 'accepted' });
    expect(request).toHaveBeenCalledWith(
      expect.objectContaining({
        params: undefined,
        data: { city: 'Izmir' },
        headers: { Accept: 'application/json', 'X-API-Key': 'test-key' },
      }),
    );
  });

  it('maps a non-2xx status to an UpstreamStatus tool error', async () => {
    const request = vi.fn().mockResolvedValue({ status: 503, data: 'unavailable' });
    const handler = new ApiToolHandler({ request });

    await expect(handler.invoke(weatherTool(), {}, scope)).rejects.toMatchObject({
      kind: 'ToolError',
      reason: 'UpstreamStatus',
      message: 'weather returned HTTP 503',
      details: { reason: 'UpstreamStatus', toolId: 'weather', status: 503 },
    });
  });

  it('maps an aborted connection to a timeout', async () => {
    const request = vi.fn().mockRejectedValue(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));
    const handler = new ApiToolHandler({ request });

    await expect(handler.invoke(weatherTool(), {}, scope)).rejects.toMatchObject({
      kind: 'TimeoutError',
      message: 'weather did not respond within 30s',
    });
  });

  it('maps other transport errors to FetchFailed', async () => {
    const request = vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));
    const handler = new ApiToolHandler({ request });

    await expect(handler.invoke(weatherTool(), {}, scope)).rejects.toMatchObject({
      kind: 'ToolError',
      reason: 'FetchFailed',
      message: 'weather request failed: getaddrinfo ENOTFOUND',
    });
  });

  it('refuses local endpoints before sending anything', async () => {
    const request = vi.fn();
    const handler = new ApiToolHandler({ request });

    await expect(
      handler.invoke(weatherTool({ endpoint: 'http://localhost:8080/admin' }), {}, scope),
    ).rejects.toMatchObject({ kind: 'ValidationError', message: 'Requests to local addresses are not allowed' });
    expect(request).not.toHaveBeenCalled();
  });
});

describe('cleanParams', () => {
  it('caps long strings and rejects odd parameter names', () => {
    expect(cleanParams({ q: 'x'.repeat(1500), n: 2 })).toEqual({ q: 'x'.repeat(1000), n: 2 });
    expect(() => cleanParams({ 'bad key': 1 })).toThrow('Invalid parameter name "bad key"');
  });
});
