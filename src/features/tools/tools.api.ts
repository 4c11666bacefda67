import axios, { type AxiosResponse } from 'axios';
import { TimeoutError, ToolError, ValidationError } from '@/features/workflows/workflows.errors';
import type { ToolOfType } from '@/features/agents/agents.types';
import type { HttpClient, ToolHandler, ToolParams, ToolScope } from './tools.types';

const PARAM_KEY = /^[A-Za-z0-9_.-]+$/;
const MAX_PARAM_LENGTH = 1000;
const BLOCKED_HOSTS = new Set(['localhost', '127.0.0.1', '0.0.0.0', '::1', '[::1]']);
const BODYLESS_METHODS = new Set(['GET', 'DELETE']);

type ApiToolSpec = ToolOfType<'API'>;

const assertSafeEndpoint = (endpoint: string): URL => {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ValidationError(`Invalid endpoint URL: ${endpoint}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`Unsupported URL scheme ${url.protocol}`, { endpoint });
  }
  if (BLOCKED_HOSTS.has(url.hostname.toLowerCase())) {
    throw new ValidationError('Requests to local addresses are not allowed', { endpoint });
  }
  return url;
};

export const cleanParams = (params: ToolParams): ToolParams => {
  const cleaned: ToolParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (!PARAM_KEY.test(key)) {
      throw new ValidationError(`Invalid parameter name "${key}"`);
    }
    cleaned[key] = typeof value === 'string' ? value.slice(0, MAX_PARAM_LENGTH) : value;
  }
  return cleaned;
};

const buildHeaders = (config: ApiToolSpec['config']): Record<string, string> => {
  const headers: Record<string, string> = { Accept: 'application/json', ...config.headers };
  if (config.auth?.type === 'bearer') {
    headers[config.auth.header ?? 'Authorization'] = `Bearer ${config.auth.key}`;
  } else if (config.auth?.type === 'apiKey') {
    headers[config.auth.header ?? 'X-API-Key'] = config.auth.key;
  }
  return headers;
};

const parseBody = (data: unknown): unknown => {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch {
    return { text: data };
  }
};

export class ApiToolHandler implements ToolHandler<'API'> {
  constructor(private readonly http: HttpClient) {}

  async invoke(tool: ApiToolSpec, params: ToolParams, scope: ToolScope): Promise<unknown> {
    const { config } = tool;
    const url = assertSafeEndpoint(config.endpoint);
    const payload = cleanParams(params);
    const sendsBody = !BODYLESS_METHODS.has(config.method);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        url: url.toString(),
        method: config.method,
        headers: buildHeaders(config),
        params: sendsBody ? undefined : payload,
        data: sendsBody ? payload : undefined,
        timeout: config.timeout * 1000,
        responseType: 'text',
        signal: scope.signal,
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        throw new TimeoutError(`${tool.toolId} did not respond within ${config.timeout}s`, { toolId: tool.toolId });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ToolError('FetchFailed', `${tool.toolId} request failed: ${reason}`, { toolId: tool.toolId });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ToolError('UpstreamStatus', `${tool.toolId} returned HTTP ${response.status}`, {
        toolId: tool.toolId,
        status: response.status,
      });
    }

    return parseBody(response.data);
  }
}
