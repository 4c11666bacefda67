import type { AxiosInstance } from 'axios';
import type { AgentDefinition, ToolOfType, ToolSpec } from '@/features/agents/agents.types';
import type { ToolType } from './tools.registry';

export type ToolParams = Record<string, unknown>;

export type HttpClient = Pick<AxiosInstance, 'request'>;

export interface ToolScope {
  agent: AgentDefinition;
  userId?: string;
  /** Aborted when the calling node times out. */
  signal?: AbortSignal;
}

export interface ToolInvoker {
  invoke(tool: ToolSpec, params: ToolParams, scope: ToolScope): Promise<unknown>;
}

export interface ToolHandler<T extends ToolType> {
  invoke(tool: ToolOfType<T>, params: ToolParams, scope: ToolScope): Promise<unknown>;
}
