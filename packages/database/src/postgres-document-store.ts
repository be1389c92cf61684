import { randomUUID } from "crypto";
import { Notification, Pool, PoolClient } from "pg";
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
import { LiveQueryWindow } from "./live-query";
import { MIGRATIONS } from "./migrations";
import { runWithTransactionRetry, TransactionRetryOptions } from "./transaction-retry";

export const DOCUMENT_CHANGES_CHANNEL = "document_changes";

// serialization_failure, deadlock_detected, unique_violation
const RETRYABLE_CODES = new Set(["40001", "40P01", "23505"]);

export interface PostgresDocumentStoreOptions extends TransactionRetryOptions {
  connectionString?: string;
  pool?: Pool;
  log?: (message: string) => void;
  autoMigrate?: boolean;
}

type DocumentRow = {
  id: string;
  data: DocumentData;
  version: string | number;
};

type RunQuery = (text: string, values: unknown[]) => Promise<{ rowCount: number | null }>;

type PendingWrite =
  | { kind: "set"; collection: string; id: string; data: DocumentData; merge: boolean }
  | { kind: "update"; collection: string; id: string; patch: DocumentData }
  | { kind: "delete"; collection: string; id: string };

type PostgresLiveQuery = {
  collection: string;
  options: QueryOptions;
  window: LiveQueryWindow;
  onChanges: ChangeListener;
  onError?: ErrorListener;
  active: boolean;
  primed: boolean;
  chain: Promise<void>;
};

function toStoredDocument(row: DocumentRow): StoredDocument {
  return { id: String(row.id), data: row.data, version: Number(row.version) };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

async function writeDocument(run: RunQuery, write: PendingWrite): Promise<void> {
  if (write.kind === "delete") {
    await run("delete from documents where collection = $1 and id = $2", [write.collection, write.id]);
    return;
  }

  if (write.kind === "update") {
    const result = await run(
      "update documents set data = data || $3::jsonb, version = nextval('document_versions'), updated_at = now() where collection = $1 and id = $2",
      [write.collection, write.id, JSON.stringify(write.patch)],
    );
    if (result.rowCount === 0) throw new DocumentNotFoundError(write.collection, write.id);
    return;
  }

  const onConflict = write.merge
    ? "data = documents.data || excluded.data"
    : "data = excluded.data";
  await run(
    `insert into documents (collection, id, data, version) values ($1, $2, $3::jsonb, nextval('document_versions'))
     on conflict (collection, id) do update set ${onConflict}, version = excluded.version, updated_at = now()`,
    [write.collection, write.id, JSON.stringify(write.data)],
  );
}

class PostgresTransaction implements DocumentTransaction {
  private readonly writes: PendingWrite[] = [];

  constructor(private readonly client: PoolClient) {}

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    const result = await this.client.query<DocumentRow>(
      "select id, data, version from documents where collection = $1 and id = $2 for update",
      [collection, id],
    );
    const row = result.rows[0];
    return row ? toStoredDocument(row) : null;
  }

  set(collection: string, id: string, data: DocumentData, options?: SetOptions): void {
    this.writes.push({ kind: "set", collection, id, data, merge: Boolean(options?.merge) });
  }

  update(collection: string, id: string, patch: DocumentData): void {
    this.writes.push({ kind: "update", collection, id, patch });
  }

  delete(collection: string, id: string): void {
    this.writes.push({ kind: "delete", collection, id });
  }

  async flush(): Promise<void> {
    for (const write of this.writes) await writeDocument((text, values) => this.client.query(text, values), write);
  }
}

export class PostgresDocumentStore implements DocumentStore {
  readonly kind = "postgres" as const;
  private readonly pool: Pool;
  private readonly log: (message: string) => void;
  private readonly autoMigrate: boolean;
  private readonly liveQueries = new Set<PostgresLiveQuery>();
  private initPromise?: Promise<void>;
  private listenerPromise?: Promise<PoolClient>;
  private closed = false;

  constructor(private readonly options: PostgresDocumentStoreOptions) {
    if (!options.pool && !options.connectionString) {
      throw new Error("PostgresDocumentStore needs a pool or a connection string");
    }
    this.pool = options.pool || new Pool({ connectionString: options.connectionString });
    this.log = options.log || (() => undefined);
    this.autoMigrate = options.autoMigrate ?? true;
  }

  async init(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.autoMigrate
        ? this.migrateUp().then((ran) => {
          if (ran.length > 0) this.log(`Applied migrations: ${ran.join(", ")}`);
        })
        : Promise.resolve();
    }
    await this.initPromise;
  }

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    await this.init();
    const result = await this.pool.query<DocumentRow>(
      "select id, data, version from documents where collection = $1 and id = $2",
      [collection, id],
    );
    const row = result.rows[0];
    return row ? toStoredDocument(row) : null;
  }

  async set(collection: string, id: string, data: DocumentData, options?: SetOptions): Promise<void> {
    await this.init();
    await writeDocument(
      (text, values) => this.pool.query(text, values),
      { kind: "set", collection, id, data, merge: Boolean(options?.merge) },
    );
  }

  async add(collection: string, data: DocumentData): Promise<string> {
    const id = randomUUID().replace(/-/g, "").slice(0, 20);
    await this.set(collection, id, data);
    return id;
  }

  async update(collection: string, id: string, patch: DocumentData): Promise<StoredDocument | null> {
    await this.init();
    const result = await this.pool.query<DocumentRow>(
      "update documents set data = data || $3::jsonb, version = nextval('document_versions'), updated_at = now() where collection = $1 and id = $2 returning id, data, version",
      [collection, id, JSON.stringify(patch)],
    );
    const row = result.rows[0];
    return row ? toStoredDocument(row) : null;
  }

  async delete(collection: string, id: string): Promise<boolean> {
    await this.init();
    const result = await this.pool.query(
      "delete from documents where collection = $1 and id = $2",
      [collection, id],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async query(collection: string, options: QueryOptions = {}): Promise<StoredDocument[]> {
    await this.init();
    const params: unknown[] = [collection];
    const clauses = ["collection = $1"];

    for (const clause of options.where || []) {
      params.push(clause.field, JSON.stringify(clause.value));
      clauses.push(`data -> $${params.length - 1}::text = $${params.length}::jsonb`);
    }

    let orderSql = "order by id asc";
    if (options.orderBy) {
      params.push(options.orderBy.field);
      const fieldParam = `$${params.length}::text`;
      const direction = options.orderBy.direction === "desc" ? "desc" : "asc";
      clauses.push(`data ? ${fieldParam}`);
      orderSql = `order by data -> ${fieldParam} ${direction}, id asc`;
    }

    let limitSql = "";
    if (options.limit !== undefined) {
      params.push(Math.max(0, Math.floor(options.limit)));
      limitSql = `limit $${params.length}`;
    }

    const result = await this.pool.query<DocumentRow>(
      `select id, data, version from documents where ${clauses.join(" and ")} ${orderSql} ${limitSql}`,
      params,
    );
    return result.rows.map(toStoredDocument);
  }

  async runTransaction<T>(fn: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    await this.init();
    return runWithTransactionRetry(() => this.attemptTransaction(fn), this.options);
  }

  subscribe(
    collection: string,
    options: QueryOptions,
    onChanges: ChangeListener,
    onError?: ErrorListener,
  ): Unsubscribe {
    const live: PostgresLiveQuery = {
      collection,
      options,
      window: new LiveQueryWindow(),
      onChanges,
      onError,
      active: true,
      primed: false,
      chain: Promise.resolve(),
    };
    this.liveQueries.add(live);

    live.chain = this.ensureListener()
      .then(() => this.refresh(live))
      .catch((error: unknown) => this.reportLiveError(live, error));

    return () => {
      live.active = false;
      this.liveQueries.delete(live);
    };
  }

  subscriptionCount(): number {
    return this.liveQueries.size;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const live of this.liveQueries) live.active = false;
    this.liveQueries.clear();
    if (this.listenerPromise) {
      const listener = await this.listenerPromise.catch(() => null);
      listener?.release();
    }
    await this.pool.end();
  }

  async migrateUp(): Promise<string[]> {
    await this.ensureMigrationTable();
    const appliedRows = await this.pool.query<{ migration_id: string }>("select migration_id from schema_migrations");
    const applied = new Set(appliedRows.rows.map((row) => String(row.migration_id)));
    const ran: string[] = [];

    for (const migration of MIGRATIONS) {
      if (applied.has(migration.id)) continue;
      await this.inClientTransaction(async (client) => {
        for (const statement of migration.up) await client.query(statement);
        await client.query("insert into schema_migrations (migration_id, applied_at) values ($1, now())", [migration.id]);
      });
      ran.push(migration.id);
    }

    return ran;
  }

  async rollbackLastMigration(): Promise<string | null> {
    await this.ensureMigrationTable();
    const rows = await this.pool.query<{ migration_id: string }>(
      "select migration_id from schema_migrations order by applied_at desc, migration_id desc limit 1",
    );
    const migrationId = rows.rows[0]?.migration_id ? String(rows.rows[0].migration_id) : null;
    if (!migrationId) return null;

    const migration = MIGRATIONS.find((item) => item.id === migrationId);
    if (!migration) throw new Error(`Unknown migration id ${migrationId}`);

    await this.inClientTransaction(async (client) => {
      for (const statement of migration.down) await client.query(statement);
      await client.query("delete from schema_migrations where migration_id = $1", [migrationId]);
    });
    return migrationId;
  }

  async migrationStatus(): Promise<Array<{ id: string; applied: boolean }>> {
    await this.ensureMigrationTable();
    const rows = await this.pool.query<{ migration_id: string }>("select migration_id from schema_migrations");
    const applied = new Set(rows.rows.map((row) => String(row.migration_id)));
    return MIGRATIONS.map((migration) => ({ id: migration.id, applied: applied.has(migration.id) }));
  }

  private async attemptTransaction<T>(fn: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("begin isolation level serializable");
      const tx = new PostgresTransaction(client);
      const result = await fn(tx);
      await tx.flush();
      await client.query("commit");
      return result;
    } catch (error) {
      await client.query("rollback").catch((rollbackError: unknown) => {
        this.log(`rollback failed: ${String(rollbackError)}`);
      });
      const code = errorCode(error);
      if (code && RETRYABLE_CODES.has(code)) {
        throw new TransactionConflictError(`Transaction conflict (${code})`, { cause: error });
      }
      throw error;
    } finally {
      client.release();
    }
  }

  private async inClientTransaction(work: (client: PoolClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("begin");
      await work(client);
      await client.query("commit");
    } catch (error) {
      await client.query("rollback");
      throw error;
    } finally {
      client.release();
    }
  }

  private async ensureMigrationTable(): Promise<void> {
    await this.pool.query(`
      create table if not exists schema_migrations (
        migration_id text primary key,
        applied_at timestamptz not null
      );
    `);
  }

  private ensureListener(): Promise<PoolClient> {
    if (!this.listenerPromise) {
      this.listenerPromise = this.init()
        .then(() => this.pool.connect())
        .then(async (client) => {
          client.on("notification", (message: Notification) => this.onNotification(message));
          client.on("error", (error: Error) => {
            for (const live of this.liveQueries) this.reportLiveError(live, error);
          });
          await client.query(`listen ${DOCUMENT_CHANGES_CHANNEL}`);
          this.log(`Listening for ${DOCUMENT_CHANGES_CHANNEL}`);
          return client;
        });
      void this.listenerPromise.catch(() => {
        this.listenerPromise = undefined;
      });
    }
    return this.listenerPromise;
  }

  private onNotification(message: Notification): void {
    if (message.channel !== DOCUMENT_CHANGES_CHANNEL || !message.payload) return;

    let collection: string | undefined;
    try {
      const parsed: unknown = JSON.parse(message.payload);
      if (typeof parsed === "object" && parsed !== null && "collection" in parsed && typeof parsed.collection === "string") {
        collection = parsed.collection;
      }
    } catch (error) {
      this.log(`Ignoring malformed change notification: ${String(error)}`);
      return;
    }
    if (!collection) return;

    for (const live of this.liveQueries) {
      if (live.collection !== collection) continue;
      live.chain = live.chain
        .then(() => this.refresh(live))
        .catch((error: unknown) => this.reportLiveError(live, error));
    }
  }

  private async refresh(live: PostgresLiveQuery): Promise<void> {
    if (!live.active) return;
    const docs = await this.query(live.collection, live.options);
    const changes = live.window.diff(docs, !live.primed);
    live.primed = true;
    if (live.active && changes.length > 0) live.onChanges(changes);
  }

  private reportLiveError(live: PostgresLiveQuery, error: unknown): void {
    const failure = error instanceof Error ? error : new Error(String(error));
    if (live.onError) live.onError(failure);
    else this.log(`live query on ${live.collection} failed: ${failure.message}`);
  }
}
