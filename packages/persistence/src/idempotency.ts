import { CacheOptions, KeyValueCache, NamespacedCache } from "./cache";

export interface IdempotencyStoreOptions extends CacheOptions {
  ttlSeconds?: number;
  cache?: KeyValueCache;
}

export interface RememberedOutcome<TResponse> {
  response: TResponse;
  storedAtIso: string;
}

export function normalizeIdempotencyKey(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Remembers the response of a successful run for `ttlSeconds`. Callers pass a
 * `parse` guard because stored responses come back as untyped JSON.
 */
export class IdempotencyStore {
  private readonly cache: KeyValueCache;
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly log: (message: string) => void;
  private readonly running = new Map<string, Promise<unknown>>();

  constructor(options: IdempotencyStoreOptions) {
    this.ttlSeconds = options.ttlSeconds ?? 300;
    this.now = options.now || Date.now;
    this.log = options.log || (() => undefined);
    this.cache = options.cache || new NamespacedCache({ ...options, namespace: `${options.namespace}:idempotency` });
  }

  /** Concurrent calls with the same key share one run. Failed runs are forgotten. */
  async execute<TResponse>(
    key: string,
    handler: () => Promise<TResponse>,
    parse: (raw: unknown) => TResponse | null,
  ): Promise<TResponse> {
    const slot = normalizeIdempotencyKey(key);
    const remembered = await this.lookup(slot, parse);
    if (remembered) return remembered.response;

    const inFlight = this.running.get(slot);
    if (inFlight) {
      const shared = parse(await inFlight);
      if (shared) return shared;
    }

    const run = this.runAndRemember(slot, handler);
    this.running.set(slot, run);
    try {
      return await run;
    } finally {
      if (this.running.get(slot) === run) this.running.delete(slot);
    }
  }

  async lookup<TResponse>(
    key: string,
    parse: (raw: unknown) => TResponse | null,
  ): Promise<RememberedOutcome<TResponse> | null> {
    const slot = normalizeIdempotencyKey(key);
    const raw = await this.cache.get(slot);
    if (!raw) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      // Unreadable entries count as misses; the next successful run overwrites them.
      this.log(`ignoring unreadable idempotency entry ${slot}: ${String(error)}`);
      return null;
    }
    if (typeof decoded !== "object" || decoded === null || !("response" in decoded)) return null;
    const response = parse(decoded.response);
    if (!response) return null;
    const storedAtIso = "storedAtIso" in decoded && typeof decoded.storedAtIso === "string" ? decoded.storedAtIso : "";
    return { response, storedAtIso };
  }

  close(): Promise<void> {
    return this.cache.close();
  }

  private async runAndRemember<TResponse>(slot: string, handler: () => Promise<TResponse>): Promise<TResponse> {
    const response = await handler();
    const outcome: RememberedOutcome<TResponse> = { response, storedAtIso: new Date(this.now()).toISOString() };
    await this.cache.set(slot, JSON.stringify(outcome), this.ttlSeconds);
    return response;
  }
}
