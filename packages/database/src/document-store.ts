export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [field: string]: DocumentValue };

export type DocumentData = { [field: string]: DocumentValue };

export interface StoredDocument {
  id: string;
  data: DocumentData;
  /** Changes on every write; live queries diff on it. */
  version: number;
}

export interface WhereClause {
  field: string;
  value: string | number | boolean | null;
}

export interface QueryOptions {
  where?: WhereClause[];
  orderBy?: { field: string; direction?: "asc" | "desc" };
  limit?: number;
}

export interface SetOptions {
  merge?: boolean;
}

export type DocumentChangeType = "added" | "modified" | "removed";

export interface DocumentChange {
  type: DocumentChangeType;
  doc: StoredDocument;
}

export type ChangeListener = (changes: DocumentChange[]) => void;
export type ErrorListener = (error: Error) => void;
export type Unsubscribe = () => void;

/**
 * Reads observe committed data. Writes are buffered and applied together when
 * the transaction function resolves; nothing is applied if it throws.
 */
export interface DocumentTransaction {
  get(collection: string, id: string): Promise<StoredDocument | null>;
  set(collection: string, id: string, data: DocumentData, options?: SetOptions): void;
  update(collection: string, id: string, patch: DocumentData): void;
  delete(collection: string, id: string): void;
}

export interface DocumentStore {
  readonly kind: "postgres" | "memory";
  get(collection: string, id: string): Promise<StoredDocument | null>;
  set(collection: string, id: string, data: DocumentData, options?: SetOptions): Promise<void>;
  add(collection: string, data: DocumentData): Promise<string>;
  /** Shallow merge into an existing document; resolves null when it does not exist. */
  update(collection: string, id: string, patch: DocumentData): Promise<StoredDocument | null>;
  delete(collection: string, id: string): Promise<boolean>;
  query(collection: string, options?: QueryOptions): Promise<StoredDocument[]>;
  /** Retries the whole function on {@link TransactionConflictError}. */
  runTransaction<T>(fn: (tx: DocumentTransaction) => Promise<T>): Promise<T>;
  /**
   * Live query. The first delivery reports every document in the window as
   * `added`; later deliveries are relative to the previous window.
   */
  subscribe(
    collection: string,
    options: QueryOptions,
    onChanges: ChangeListener,
    onError?: ErrorListener,
  ): Unsubscribe;
  subscriptionCount(): number;
  close(): Promise<void>;
}

export class TransactionConflictError extends Error {
  constructor(message = "Transaction conflicted with a concurrent write", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransactionConflictError";
  }
}

export class TransactionAbortedError extends Error {
  constructor(readonly attempts: number, options?: { cause?: unknown }) {
    super(`Transaction aborted after ${attempts} attempts`, options);
    this.name = "TransactionAbortedError";
  }
}

export class DocumentNotFoundError extends Error {
  constructor(readonly collection: string, readonly id: string) {
    super(`Document ${collection}/${id} does not exist`);
    this.name = "DocumentNotFoundError";
  }
}
