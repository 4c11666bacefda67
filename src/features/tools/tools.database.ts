import { ToolError, ValidationError } from '@/features/workflows/workflows.errors';
import { isPlainObject } from '@/features/workflows/workflows.context';
import type { ToolOfType } from '@/features/agents/agents.types';
import type { DataScope, DocumentStore, StoredDocument } from '@/features/data-store/data-store.types';
import { DATABASE_OPERATIONS, type DatabaseOperation } from './tools.registry';
import type { ToolHandler, ToolParams, ToolScope } from './tools.types';

const isDatabaseOperation = (value: string): value is DatabaseOperation =>
  DATABASE_OPERATIONS.some((operation) => operation === value);

const objectParam = (params: ToolParams, ...names: string[]): StoredDocument | undefined => {
  for (const name of names) {
    const value = params[name];
    if (isPlainObject(value)) {
      return value;
    }
  }
  return undefined;
};

const requireObject = (params: ToolParams, operation: string, ...names: string[]): StoredDocument => {
  const value = objectParam(params, ...names);
  if (!value) {
    throw new ValidationError(`${operation} requires an object "${names[0]}" parameter`);
  }
  return value;
};

export class DatabaseToolHandler implements ToolHandler<'DATABASE'> {
  constructor(private readonly store: DocumentStore) {}

  async invoke(tool: ToolOfType<'DATABASE'>, params: ToolParams, scope: ToolScope): Promise<unknown> {
    const requested = String(params.operation ?? tool.config.operation ?? 'find_documents');
    if (!isDatabaseOperation(requested)) {
      throw new ToolError('UnsupportedOperation', `Unsupported database operation "${requested}"`, {
        toolId: tool.toolId,
      });
    }
    if (tool.config.operations && !tool.config.operations.includes(requested)) {
      throw new ToolError('UnsupportedOperation', `Operation "${requested}" is not enabled for ${tool.toolId}`, {
        toolId: tool.toolId,
      });
    }

    const collection = scope.agent.dataSchema.collectionName;
    if (typeof params.collection === 'string' && params.collection !== collection) {
      throw new ValidationError(`Tool ${tool.toolId} can only access the "${collection}" collection`);
    }
    if (!scope.userId) {
      throw new ValidationError('Database operations require a user_id in the context');
    }
    const dataScope: DataScope = { agentId: scope.agent.agentId, userId: scope.userId };
    const query = objectParam(params, 'query', 'filter') ?? {};
    const signal = scope.signal;

    switch (requested) {
      case 'insert_document': {
        const document = requireObject(params, requested, 'document', 'data');
        const { insertedId } = await this.store.insert(collection, dataScope, document, { signal });
        return { success: true, inserted_id: insertedId };
      }
      case 'find_documents': {
        const limit = typeof params.limit === 'number' ? params.limit : undefined;
        const sort = objectParam(params, 'sort');
        const documents = await this.store.find(collection, dataScope, query, {
          limit,
          sort: sort ? toSort(sort) : undefined,
          signal,
        });
        return { documents, count: documents.length };
      }
      case 'update_document': {
        const update = requireObject(params, requested, 'update', 'data');
        const result = await this.store.update(collection, dataScope, query, update, { signal });
        return { matched_count: result.matchedCount, modified_count: result.modifiedCount };
      }
      case 'delete_document': {
        const { deletedCount } = await this.store.delete(collection, dataScope, query, { signal });
        return { deleted_count: deletedCount };
      }
      case 'count_documents':
        return { count: await this.store.count(collection, dataScope, query, { signal }) };
      case 'aggregate': {
        const pipeline = Array.isArray(params.pipeline) ? params.pipeline.filter(isPlainObject) : [];
        return { documents: await this.store.aggregate(collection, dataScope, pipeline, { signal }) };
      }
      default: {
        const unreachable: never = requested;
        throw new ToolError('UnsupportedOperation', `Unsupported database operation "${String(unreachable)}"`);
      }
    }
  }
}

const toSort = (sort: StoredDocument): Record<string, 1 | -1> => {
  const normalized: Record<string, 1 | -1> = {};
  for (const [field, direction] of Object.entries(sort)) {
    normalized[field] = direction === -1 || direction === 'desc' ? -1 : 1;
  }
  return normalized;
};
