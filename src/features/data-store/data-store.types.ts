export type StoredDocument = Record<string, unknown>;

/** Every operation is confined to one agent's documents for one user. */
export interface DataScope {
  agentId: string;
  userId: string;
}

/** A store call checks `signal` before it touches the collection. */
export interface StoreOptions {
  signal?: AbortSignal;
}

export interface FindOptions extends StoreOptions {
  limit?: number;
  sort?: Record<string, 1 | -1>;
}

export interface DocumentStore {
  insert(
    collection: string,
    scope: DataScope,
    document: StoredDocument,
    options?: StoreOptions,
  ): Promise<{ insertedId: string }>;
  find(collection: string, scope: DataScope, query: StoredDocument, options?: FindOptions): Promise<StoredDocument[]>;
  update(
    collection: string,
    scope: DataScope,
    query: StoredDocument,
    update: StoredDocument,
    options?: StoreOptions,
  ): Promise<{ matchedCount: number; modifiedCount: number }>;
  delete(
    collection: string,
    scope: DataScope,
    query: StoredDocument,
    options?: StoreOptions,
  ): Promise<{ deletedCount: number }>;
  count(collection: string, scope: DataScope, query: StoredDocument, options?: StoreOptions): Promise<number>;
  aggregate(
    collection: string,
    scope: DataScope,
    pipeline: StoredDocument[],
    options?: StoreOptions,
  ): Promise<StoredDocument[]>;
}
