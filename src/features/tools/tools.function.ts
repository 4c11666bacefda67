import { ToolError } from '@/features/workflows/workflows.errors';
import type { ToolOfType } from '@/features/agents/agents.types';
import type { ToolHandler, ToolParams, ToolScope } from './tools.types';

export type RegisteredFunction = (params: ToolParams, scope: ToolScope) => unknown | Promise<unknown>;

export class FunctionRegistry {
  private readonly functions = new Map<string, RegisteredFunction>();

  register(name: string, fn: RegisteredFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  get(name: string): RegisteredFunction | undefined {
    return this.functions.get(name);
  }
}

export const createDefaultFunctions = (now: () => Date = () => new Date()): FunctionRegistry =>
  new FunctionRegistry().register('current_time', () => {
    const date = now();
    return {
      iso: date.toISOString(),
      date: date.toISOString().slice(0, 10),
      timestamp: date.getTime(),
    };
  });

export class FunctionToolHandler implements ToolHandler<'FUNCTION'> {
  constructor(private readonly registry: FunctionRegistry) {}

  async invoke(tool: ToolOfType<'FUNCTION'>, params: ToolParams, scope: ToolScope): Promise<unknown> {
    const fn = this.registry.get(tool.config.functionName);
    if (!fn) {
      throw new ToolError('UnsupportedOperation', `Function "${tool.config.functionName}" is not registered`, {
        toolId: tool.toolId,
      });
    }
    return fn(params, scope);
  }
}
