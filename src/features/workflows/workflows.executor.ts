import type { NodeOfType, WorkflowNode } from '@/features/agents/agents.types';
import type { DataScope, DocumentStore, StoredDocument } from '@/features/data-store/data-store.types';
import type { ChatMessage, LlmInvoker } from '@/features/llm/llm.types';
import { completeWithToolInterception } from '@/features/llm/llm.tool-calls';
import type { ToolInvoker, ToolScope } from '@/features/tools/tools.types';
import type { Logger } from '@/utils/logger';
import { evaluateCondition } from './workflows.condition';
import { isPlainObject, resolveTemplate, stringifyValue, truncate } from './workflows.context';
import {
  TimeoutError,
  UnknownToolReferenceError,
  ValidationError,
  type WorkflowError,
  toWorkflowError,
} from './workflows.errors';
import type { ErrorMarker, ExecutionScope, NodeResult, VariableContext } from './workflows.types';

const SECRET_KEY_PARTS = ['password', 'secret', 'token', 'api_key', 'apikey', 'authorization'];

interface AttemptResult extends NodeResult {
  note?: string;
}

export interface NodeExecutorDeps {
  llm: LlmInvoker;
  tools: ToolInvoker;
  store: DocumentStore;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const isSecretKey = (key: string): boolean => {
  const normalized = key.toLowerCase();
  return normalized === 'key' || SECRET_KEY_PARTS.some((part) => normalized.includes(part));
};

/** Drops null/undefined values and secret-looking keys at every depth. */
export const sanitizeOutput = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.filter((item: unknown) => item !== null && item !== undefined).map(sanitizeOutput);
  }
  if (isPlainObject(value)) {
    const clean: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === null || item === undefined || isSecretKey(key)) {
        continue;
      }
      clean[key] = sanitizeOutput(item);
    }
    return clean;
  }
  return value;
};

export const errorMarker = (error: WorkflowError): ErrorMarker => ({
  error: true,
  kind: error.kind,
  message: error.message,
});

const readUserId = (context: VariableContext): string | undefined => {
  const userId = context.user_id;
  if (typeof userId === 'string' && userId !== '') return userId;
  if (typeof userId === 'number') return String(userId);
  return undefined;
};

const readHistory = (context: VariableContext): ChatMessage[] => {
  const history = context.conversation_history;
  if (!Array.isArray(history)) {
    return [];
  }
  const messages: ChatMessage[] = [];
  for (const entry of history) {
    if (!isPlainObject(entry) || typeof entry.content !== 'string') continue;
    if (entry.role === 'user' || entry.role === 'assistant' || entry.role === 'system') {
      messages.push({ role: entry.role, content: entry.content });
    }
  }
  return messages;
};

const requireResolved = (field: string, value: unknown, unresolved: string[]): void => {
  if (unresolved.length > 0) {
    throw new ValidationError(`${field} has unresolved variables: ${unresolved.map((path) => `$${path}`).join(', ')}`, {
      field,
      unresolved,
    });
  }
  if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
    throw new ValidationError(`${field} is empty`, { field });
  }
};

/**
 * Runs `work` under a deadline. On expiry the signal is aborted and the
 * attempt is awaited until it settles, so a retry never overlaps it; its late
 * outcome is discarded.
 */
const withTimeout = async <T>(
  seconds: number | undefined,
  label: string,
  log: Logger,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> => {
  const controller = new AbortController();
  if (!seconds) {
    return work(controller.signal);
  }

  const running = work(controller.signal);
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), seconds * 1000);
  });

  try {
    const settled = await Promise.race([running.then((value) => ({ value })), expired]);
    if (settled) {
      return settled.value;
    }
  } finally {
    clearTimeout(timer);
  }

  controller.abort();
  await running.then(
    () => log.debug({ label }, 'Timed-out attempt finished late; result discarded'),
    (error: unknown) =>
      log.debug({ label, reason: error instanceof Error ? error.message : String(error) }, 'Timed-out attempt settled'),
  );
  throw new TimeoutError(`${label} timed out after ${seconds}s`, { timeout: seconds });
};

export class NodeExecutor {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: NodeExecutorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Runs one node under its retry, timeout and error policy. Every attempt is
   * recorded; the returned directive tells the engine where to go next.
   */
  async execute(node: WorkflowNode, scope: ExecutionScope): Promise<NodeResult> {
    const attempts = (node.max_retries ?? 0) + 1;
    const retryDelayMs = (node.retry_delay ?? 0) * 1000;

    for (let attempt = 1; ; attempt += 1) {
      const startedAt = new Date();
      try {
        const result = await withTimeout(node.timeout, `Node ${node.nodeId}`, scope.logger, (signal) =>
          this.dispatch(node, scope, signal),
        );
        scope.record({
          nodeId: node.nodeId,
          type: node.type,
          attempt,
          startedAt,
          endedAt: new Date(),
          outcome: 'success',
          output: truncate(stringifyValue(result.output)),
          note: result.note,
        });
        return { output: result.output, directive: result.directive };
      } catch (caught) {
        const error = toWorkflowError(caught);
        const retrying = !error.fatal && attempt < attempts;
        scope.record({
          nodeId: node.nodeId,
          type: node.type,
          attempt,
          startedAt,
          endedAt: new Date(),
          outcome: retrying ? 'retried' : 'error',
          error: { kind: error.kind, message: error.message },
        });

        if (retrying) {
          scope.logger.warn({ nodeId: node.nodeId, attempt, kind: error.kind }, 'Node attempt failed, retrying');
          if (retryDelayMs > 0) {
            await this.sleep(retryDelayMs);
          }
          continue;
        }

        if (node.continue_on_error && !error.fatal) {
          scope.logger.warn({ nodeId: node.nodeId, kind: error.kind }, 'Node failed, continuing');
          return { output: errorMarker(error), directive: { type: 'continue' } };
        }
        return { output: undefined, directive: { type: 'fail', error } };
      }
    }
  }

  private dispatch(node: WorkflowNode, scope: ExecutionScope, signal: AbortSignal): Promise<AttemptResult> {
    switch (node.type) {
      case 'llm_prompt':
        return this.runPrompt(node, scope, signal);
      case 'tool_call':
        return this.runToolCall(node, scope, signal);
      case 'data_store':
        return this.runDataStore(node, scope, signal);
      case 'conditional_logic':
        return this.runCondition(node, scope);
      case 'send_response':
        return this.runResponse(node, scope);
      default: {
        const unknownNode: never = node;
        throw new ValidationError(`Unsupported node ${JSON.stringify(unknownNode)}`);
      }
    }
  }

  private toolScope(scope: ExecutionScope, signal: AbortSignal): ToolScope {
    return { agent: scope.agent, userId: readUserId(scope.context), signal };
  }

  private async runPrompt(
    node: NodeOfType<'llm_prompt'>,
    scope: ExecutionScope,
    signal: AbortSignal,
  ): Promise<AttemptResult> {
    const { value, unresolved } = resolveTemplate(node.prompt, scope.context);
    const prompt = stringifyValue(value);
    if (node.validate_input) {
      requireResolved('prompt', prompt, unresolved);
    }

    const completion = await completeWithToolInterception(
      this.deps.llm,
      this.deps.tools,
      {
        systemPrompt: scope.agent.systemPrompt,
        conversationHistory: readHistory(scope.context),
        userPrompt: prompt,
        modelConfig: scope.agent.llmConfig,
        signal,
      },
      this.toolScope(scope, signal),
    );

    return { output: completion.text, directive: { type: 'continue' }, note: completion.note };
  }

  private async runToolCall(
    node: NodeOfType<'tool_call'>,
    scope: ExecutionScope,
    signal: AbortSignal,
  ): Promise<AttemptResult> {
    const tool = scope.agent.tools.find((candidate) => candidate.toolId === node.toolId);
    if (!tool) {
      throw new UnknownToolReferenceError(node.toolId, node.nodeId);
    }

    const { value, unresolved } = resolveTemplate(node.params ?? {}, scope.context);
    const params = isPlainObject(value) ? value : {};
    if (node.validate_input) {
      requireResolved('params', params, unresolved);
      for (const [key, param] of Object.entries(params)) {
        if (typeof param === 'string' && param.trim() === '') {
          throw new ValidationError(`Parameter "${key}" is empty`, { field: key });
        }
      }
    }

    const result = await this.deps.tools.invoke(tool, params, this.toolScope(scope, signal));
    return {
      output: node.sanitize_output ? sanitizeOutput(result) : result,
      directive: { type: 'continue' },
    };
  }

  private async runDataStore(
    node: NodeOfType<'data_store'>,
    scope: ExecutionScope,
    signal: AbortSignal,
  ): Promise<AttemptResult> {
    const collection = scope.agent.dataSchema.collectionName;
    if (node.collection && node.collection !== collection) {
      throw new ValidationError(`Node ${node.nodeId} can only use the "${collection}" collection`, {
        collection: node.collection,
      });
    }
    const userId = readUserId(scope.context);
    if (!userId) {
      throw new ValidationError('data_store nodes require a user_id in the context');
    }
    const dataScope: DataScope = { agentId: scope.agent.agentId, userId };

    const query = resolveTemplate(node.query ?? {}, scope.context).value;
    const filter = isPlainObject(query) ? query : {};
    const pipeline = resolveTemplate(node.pipeline ?? [], scope.context).value;
    const continueWith = (output: unknown): AttemptResult => ({ output, directive: { type: 'continue' } });

    const readData = (): StoredDocument => {
      const { value: data, unresolved } = resolveTemplate(node.data, scope.context);
      if (node.validate_input) {
        requireResolved('data', data, unresolved);
      }
      if (isPlainObject(data)) return data;
      if (typeof data === 'string') return { value: data };
      throw new ValidationError(`${node.action} needs an object or string "data" field`);
    };

    switch (node.action) {
      case 'insert':
      case 'append': {
        const { insertedId } = await this.deps.store.insert(collection, dataScope, readData(), { signal });
        return continueWith({ success: true, inserted_id: insertedId });
      }
      case 'update': {
        const result = await this.deps.store.update(collection, dataScope, filter, readData(), { signal });
        return continueWith({ matched_count: result.matchedCount, modified_count: result.modifiedCount });
      }
      case 'find':
        return continueWith(
          await this.deps.store.find(collection, dataScope, filter, { limit: node.limit, sort: node.sort, signal }),
        );
      case 'aggregate':
        return continueWith(
          await this.deps.store.aggregate(
            collection,
            dataScope,
            Array.isArray(pipeline) ? pipeline.filter(isPlainObject) : [],
            { signal },
          ),
        );
      case 'delete': {
        const { deletedCount } = await this.deps.store.delete(collection, dataScope, filter, { signal });
        return continueWith({ deleted_count: deletedCount });
      }
      case 'count':
        return continueWith(await this.deps.store.count(collection, dataScope, filter, { signal }));
      default: {
        const unknownAction: never = node.action;
        throw new ValidationError(`Unsupported data_store action ${String(unknownAction)}`);
      }
    }
  }

  private async runCondition(node: NodeOfType<'conditional_logic'>, scope: ExecutionScope): Promise<AttemptResult> {
    if (node.validate_input) {
      requireResolved('condition', node.condition, []);
    }
    const outcome = evaluateCondition(node.condition, scope.context);
    const target = outcome ? node.true_branch : node.false_branch;
    if (!target) {
      return {
        output: outcome,
        directive: { type: 'halt', reason: `Node ${node.nodeId} has no ${outcome ? 'true' : 'false'} branch` },
      };
    }
    return { output: outcome, directive: { type: 'jump', nodeId: target } };
  }

  private async runResponse(node: NodeOfType<'send_response'>, scope: ExecutionScope): Promise<AttemptResult> {
    const { value, unresolved } = resolveTemplate(node.message, scope.context);
    const message = stringifyValue(value);
    if (node.validate_input) {
      requireResolved('message', message, unresolved);
    }
    await scope.respond(message);
    return { output: message, directive: { type: 'complete' } };
  }
}
