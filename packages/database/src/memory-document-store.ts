import { randomUUID } from "crypto";
import {
  ChangeListener,
  DocumentData,
  DocumentNotFoundError,
  DocumentStore,
  DocumentTransaction,
  ErrorListener,
  QueryOptions,
  SetOptions,
  StoredDocument,
  TransactionConflictError,
  Unsubscribe,
} from "./document-store";
import { applyQuery, LiveQueryWindow } from "./live-query";
import { runWithTransactionRetry, TransactionRetryOptions } from "./transaction-retry";

export interface MemoryDocumentStoreOptions extends TransactionRetryOptions {
  log?: (message: string) => void;
}

type MemoryEntry = {
  data: DocumentData;
  version: number;
};

type PendingWrite =
  | { kind: "set"; collection: string; id: string; data: DocumentData; merge: boolean }
  | { kind: "update"; collection: string; id: string; patch: DocumentData }
  | { kind: "delete"; collection: string; id: string };

type MemoryLiveQuery = {
  collection: string;
  options: QueryOptions;
  window: LiveQueryWindow;
  onChanges: ChangeListener;
  onError?: ErrorListener;
};

class MemoryTransaction implements DocumentTransaction {
  readonly reads = new Map<string, { collection: string; id: string; version: number }>();
  readonly writes: PendingWrite[] = [];

  constructor(private readonly store: MemoryDocumentStore) {}

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    const doc = this.store.readSync(collection, id);
    this.reads.set(`${collection}/${id}`, { collection, id, version: doc?.version ?? 0 });
    return doc;
  }

  set(collection: string, id: string, data: DocumentData, options?: SetOptions): void {
    this.writes.push({ kind: "set", collection, id, data: structuredClone(data), merge: Boolean(options?.merge) });
  }

  update(collection: string, id: string, patch: DocumentData): void {
    this.writes.push({ kind: "update", collection, id, patch: structuredClone(patch) });
  }

  delete(collection: string, id: string): void {
    this.writes.push({ kind: "delete", collection, id });
  }
}

export class MemoryDocumentStore implements DocumentStore {
  readonly kind = "memory" as const;
  private readonly collections = new Map<string, Map<string, MemoryEntry>>();
  private readonly liveQueries = new Set<MemoryLiveQuery>();
  private readonly log: (message: string) => void;
  private transactionTail: Promise<void> = Promise.resolve();
  private versionSeq = 0;

  constructor(private readonly options: MemoryDocumentStoreOptions = {}) {
    this.log = options.log || (() => undefined);
  }

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    return this.readSync(collection, id);
  }

  async set(collection: string, id: string, data: DocumentData, options?: SetOptions): Promise<void> {
    this.applyWrites([{ kind: "set", collection, id, data: structuredClone(data), merge: Boolean(options?.merge) }]);
  }

  async add(collection: string, data: DocumentData): Promise<string> {
    const id = randomUUID().replace(/-/g, "").slice(0, 20);
    await this.set(collection, id, data);
    return id;
  }

  async update(collection: string, id: string, patch: DocumentData): Promise<StoredDocument | null> {
    if (!this.bucket(collection).has(id)) return null;
    this.applyWrites([{ kind: "update", collection, id, patch: structuredClone(patch) }]);
    return this.readSync(collection, id);
  }

  async delete(collection: string, id: string): Promise<boolean> {
    if (!this.bucket(collection).has(id)) return false;
    this.applyWrites([{ kind: "delete", collection, id }]);
    return true;
  }

  async query(collection: string, options: QueryOptions = {}): Promise<StoredDocument[]> {
    return this.querySync(collection, options);
  }

  runTransaction<T>(fn: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    return runWithTransactionRetry(() => this.serialized(() => this.attemptTransaction(fn)), this.options);
  }

  subscribe(
    collection: string,
    options: QueryOptions,
    onChanges: ChangeListener,
    onError?: ErrorListener,
  ): Unsubscribe {
    const live: MemoryLiveQuery = { collection, options, window: new LiveQueryWindow(), onChanges, onError };
    this.liveQueries.add(live);
    this.deliver(live, true);
    return () => {
      this.liveQueries.delete(live);
    };
  }

  subscriptionCount(): number {
    return this.liveQueries.size;
  }

  async close(): Promise<void> {
    this.liveQueries.clear();
  }

  readSync(collection: string, id: string): StoredDocument | null {
    const entry = this.bucket(collection).get(id);
    if (!entry) return null;
    return { id, data: structuredClone(entry.data), version: entry.version };
  }

  private querySync(collection: string, options: QueryOptions): StoredDocument[] {
    const docs: StoredDocument[] = [];
    for (const [id, entry] of this.bucket(collection)) {
      docs.push({ id, data: structuredClone(entry.data), version: entry.version });
    }
    return applyQuery(docs, options);
  }

  private serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = this.transactionTail.then(task);
    this.transactionTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async attemptTransaction<T>(fn: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    const tx = new MemoryTransaction(this);
    const result = await fn(tx);

    for (const read of tx.reads.values()) {
      const current = this.bucket(read.collection).get(read.id)?.version ?? 0;
      if (current !== read.version) {
        throw new TransactionConflictError(`${read.collection}/${read.id} changed during the transaction`);
      }
    }

    this.applyWrites(tx.writes);
    return result;
  }

  private applyWrites(writes: PendingWrite[]): void {
    const staged = new Map<string, Map<string, MemoryEntry | null>>();
    const stagedBucket = (collection: string): Map<string, MemoryEntry | null> => {
      let bucket = staged.get(collection);
      if (!bucket) {
        bucket = new Map();
        staged.set(collection, bucket);
      }
      return bucket;
    };
    const current = (collection: string, id: string): MemoryEntry | undefined => {
      const bucket = stagedBucket(collection);
      if (bucket.has(id)) return bucket.get(id) ?? undefined;
      return this.bucket(collection).get(id);
    };

    for (const write of writes) {
      const existing = current(write.collection, write.id);
      if (write.kind === "delete") {
        stagedBucket(write.collection).set(write.id, null);
      } else if (write.kind === "update") {
        if (!existing) throw new DocumentNotFoundError(write.collection, write.id);
        stagedBucket(write.collection).set(write.id, {
          data: { ...existing.data, ...write.patch },
          version: this.nextVersion(),
        });
      } else {
        const data = write.merge && existing ? { ...existing.data, ...write.data } : write.data;
        stagedBucket(write.collection).set(write.id, { data, version: this.nextVersion() });
      }
    }

    for (const [collection, entries] of staged) {
      const bucket = this.bucket(collection);
      for (const [id, entry] of entries) {
        if (entry) bucket.set(id, entry);
        else bucket.delete(id);
      }
    }

    for (const collection of staged.keys()) this.notify(collection);
  }

  private notify(collection: string): void {
    for (const live of Array.from(this.liveQueries)) {
      if (live.collection === collection) this.deliver(live, false);
    }
  }

  private deliver(live: MemoryLiveQuery, initial: boolean): void {
    const changes = live.window.diff(this.querySync(live.collection, live.options), initial);
    if (changes.length === 0) return;
    try {
      live.onChanges(changes);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (live.onError) live.onError(failure);
      else this.log(`live query listener on ${live.collection} failed: ${failure.message}`);
    }
  }

  private bucket(collection: string): Map<string, MemoryEntry> {
    let bucket = this.collections.get(collection);
    if (!bucket) {
      bucket = new Map();
      this.collections.set(collection, bucket);
    }
    return bucket;
  }

  private nextVersion(): number {
    this.versionSeq += 1;
    return this.versionSeq;
  }
}
