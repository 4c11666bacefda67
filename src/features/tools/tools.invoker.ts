import axios from 'axios';
import { logger } from '@/utils/logger';
import { ToolError } from '@/features/workflows/workflows.errors';
import type { ToolSpec } from '@/features/agents/agents.types';
import type { DocumentStore } from '@/features/data-store/data-store.types';
import type { MessagingChannel } from '@/shared/services/messaging.types';
import { ApiToolHandler } from './tools.api';
import { DatabaseToolHandler } from './tools.database';
import { FunctionRegistry, FunctionToolHandler, createDefaultFunctions } from './tools.function';
import { RssToolHandler } from './tools.rss';
import { TelegramToolHandler } from './tools.telegram';
import type { HttpClient, ToolInvoker, ToolParams, ToolScope } from './tools.types';

export interface ToolInvokerDeps {
  store: DocumentStore;
  channel: MessagingChannel;
  http?: HttpClient;
  functions?: FunctionRegistry;
}

/**
 * Dispatches a tool spec to its handler. Each call makes exactly one external
 * request; retries belong to the node executor.
 */
export class ToolInvokerService implements ToolInvoker {
  private readonly api: ApiToolHandler;
  private readonly rss: RssToolHandler;
  private readonly database: DatabaseToolHandler;
  private readonly telegram: TelegramToolHandler;
  private readonly functions: FunctionToolHandler;

  constructor(deps: ToolInvokerDeps) {
    const http = deps.http ?? axios.create();
    this.api = new ApiToolHandler(http);
    this.rss = new RssToolHandler(http);
    this.database = new DatabaseToolHandler(deps.store);
    this.telegram = new TelegramToolHandler(deps.channel);
    this.functions = new FunctionToolHandler(deps.functions ?? createDefaultFunctions());
  }

  async invoke(tool: ToolSpec, params: ToolParams, scope: ToolScope): Promise<unknown> {
    logger.debug({ toolId: tool.toolId, type: tool.type, agentId: scope.agent.agentId }, 'Invoking tool');

    switch (tool.type) {
      case 'API':
        return this.api.invoke(tool, params, scope);
      case 'RSS':
        return this.rss.invoke(tool, params, scope);
      case 'DATABASE':
        return this.database.invoke(tool, params, scope);
      case 'TELEGRAM':
        return this.telegram.invoke(tool, params, scope);
      case 'FUNCTION':
        return this.functions.invoke(tool, params, scope);
      default: {
        const unsupported: never = tool;
        throw new ToolError('UnsupportedOperation', `Unsupported tool type in ${JSON.stringify(unsupported)}`);
      }
    }
  }
}
