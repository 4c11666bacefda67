import mongoose, { type mongo } from 'mongoose';
import { ValidationError } from '@/features/workflows/workflows.errors';
import { isPlainObject } from '@/features/workflows/workflows.context';
import type { DataScope, DocumentStore, FindOptions, StoreOptions, StoredDocument } from './data-store.types';

const ALLOWED_STAGES = ['$match', '$project', '$group', '$sort', '$limit', '$skip', '$unwind', '$addFields', '$count'];
const SCOPE_FIELDS = ['agent_id', 'user_id'];

export const scopeFilter = (scope: DataScope): StoredDocument => ({
  agent_id: scope.agentId,
  user_id: scope.userId,
});

export const scopedQuery = (scope: DataScope, query: StoredDocument): StoredDocument => ({
  ...query,
  ...scopeFilter(scope),
});

/**
 * Prepends the scope `$match`. Only stages that work on the scoped documents
 * themselves are accepted, so nothing can read or write another collection.
 */
export const scopedPipeline = (scope: DataScope, pipeline: StoredDocument[]): StoredDocument[] => {
  for (const stage of pipeline) {
    const forbidden = Object.keys(stage).find((operator) => !ALLOWED_STAGES.includes(operator));
    if (forbidden) {
      throw new ValidationError(`Aggregation stage ${forbidden} is not allowed`, { stage: forbidden });
    }
  }
  return [{ $match: scopeFilter(scope) }, ...pipeline];
};

const isScopePath = (path: unknown): boolean =>
  typeof path === 'string' && SCOPE_FIELDS.some((field) => path === field || path.startsWith(`${field}.`));

const withoutScopeFields = (operator: string, fields: StoredDocument): StoredDocument =>
  Object.fromEntries(
    Object.entries(fields).filter(
      ([key, value]) => !isScopePath(key) && !(operator === '$rename' && isScopePath(value)),
    ),
  );

/**
 * Plain field maps become a `$set`. Scope fields (and paths under them) can
 * never be written, renamed or renamed onto, and `updated_at` is always stamped.
 */
export const normalizeUpdate = (update: StoredDocument, now: Date = new Date()): StoredDocument => {
  const hasOperators = Object.keys(update).some((key) => key.startsWith('$'));
  const operators: StoredDocument = hasOperators ? { ...update } : { $set: update };

  for (const [operator, fields] of Object.entries(operators)) {
    if (!isPlainObject(fields)) {
      continue;
    }
    const kept = withoutScopeFields(operator, fields);
    if (Object.keys(kept).length > 0) {
      operators[operator] = kept;
    } else {
      delete operators[operator];
    }
  }

  const set = operators.$set;
  operators.$set = {
    ...(isPlainObject(set) ? set : {}),
    updated_at: now.toISOString(),
  };
  return operators;
};

const serialize = (document: mongo.Document): StoredDocument => {
  const { _id: id, ...rest } = document;
  return id === undefined ? rest : { _id: String(id), ...rest };
};

export class MongoDocumentStore implements DocumentStore {
  private collection(name: string, options: StoreOptions): mongo.Collection<mongo.Document> {
    options.signal?.throwIfAborted();
    return mongoose.connection.collection(name);
  }

  async insert(
    collection: string,
    scope: DataScope,
    document: StoredDocument,
    options: StoreOptions = {},
  ): Promise<{ insertedId: string }> {
    const result = await this.collection(collection, options).insertOne({
      ...document,
      ...scopeFilter(scope),
      created_at: new Date().toISOString(),
    });
    return { insertedId: String(result.insertedId) };
  }

  async find(
    collection: string,
    scope: DataScope,
    query: StoredDocument,
    options: FindOptions = {},
  ): Promise<StoredDocument[]> {
    let cursor = this.collection(collection, options).find(scopedQuery(scope, query));
    if (options.sort) {
      cursor = cursor.sort(options.sort);
    }
    if (options.limit) {
      cursor = cursor.limit(options.limit);
    }
    const documents = await cursor.toArray();
    return documents.map(serialize);
  }

  async update(
    collection: string,
    scope: DataScope,
    query: StoredDocument,
    update: StoredDocument,
    options: StoreOptions = {},
  ): Promise<{ matchedCount: number; modifiedCount: number }> {
    const result = await this.collection(collection, options).updateOne(
      scopedQuery(scope, query),
      normalizeUpdate(update),
    );
    return { matchedCount: result.matchedCount, modifiedCount: result.modifiedCount };
  }

  async delete(
    collection: string,
    scope: DataScope,
    query: StoredDocument,
    options: StoreOptions = {},
  ): Promise<{ deletedCount: number }> {
    const result = await this.collection(collection, options).deleteMany(scopedQuery(scope, query));
    return { deletedCount: result.deletedCount };
  }

  async count(
    collection: string,
    scope: DataScope,
    query: StoredDocument,
    options: StoreOptions = {},
  ): Promise<number> {
    return this.collection(collection, options).countDocuments(scopedQuery(scope, query));
  }

  async aggregate(
    collection: string,
    scope: DataScope,
    pipeline: StoredDocument[],
    options: StoreOptions = {},
  ): Promise<StoredDocument[]> {
    const documents = await this.collection(collection, options).aggregate(scopedPipeline(scope, pipeline)).toArray();
    return documents.map(serialize);
  }
}

export const mongoDocumentStore = new MongoDocumentStore();
