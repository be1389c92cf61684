import { DocumentStore } from "./document-store";
import { MemoryDocumentStore } from "./memory-document-store";
import { PostgresDocumentStore } from "./postgres-document-store";
import { TransactionRetryOptions } from "./transaction-retry";

export * from "./document-store";
export * from "./live-query";
export * from "./memory-document-store";
export * from "./migrations";
export * from "./postgres-document-store";
export * from "./transaction-retry";

export interface DocumentStoreOptions extends TransactionRetryOptions {
  connectionString?: string;
  log?: (message: string) => void;
}

export function createDocumentStore(options: DocumentStoreOptions): DocumentStore {
  const log = options.log || (() => undefined);
  if (!options.connectionString) {
    log("No database configured, falling back to the in-memory document store");
    return new MemoryDocumentStore(options);
  }
  return new PostgresDocumentStore(options);
}
