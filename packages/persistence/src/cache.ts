import Redis from "ioredis";

export interface KeyValueCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}

export interface CacheOptions {
  namespace: string;
  redisUrl?: string;
  log?: (message: string) => void;
  now?: () => number;
}

interface MemoryEntry {
  value: string;
  expiresAtUnixMs: number;
}

export class MemoryCache implements KeyValueCache {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAtUnixMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAtUnixMs: this.now() + ttlSeconds * 1000 });
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Keys are prefixed with `namespace`. Redis is used when `redisUrl` is set and
 * the first connection succeeds; every write is mirrored into memory so reads
 * keep working while Redis errors.
 */
export class NamespacedCache implements KeyValueCache {
  private readonly memory: MemoryCache;
  private redis?: Redis;
  private connecting?: Promise<void>;

  constructor(private readonly options: CacheOptions) {
    this.memory = new MemoryCache(options.now);
  }

  async get(key: string): Promise<string | null> {
    const scoped = this.scope(key);
    const redis = await this.connection();
    if (redis) {
      try {
        return await redis.get(scoped);
      } catch (error) {
        this.log(`redis read of ${scoped} failed, serving from memory: ${String(error)}`);
      }
    }
    return this.memory.get(scoped);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const scoped = this.scope(key);
    await this.memory.set(scoped, value, ttlSeconds);

    const redis = await this.connection();
    if (!redis) return;
    try {
      await redis.set(scoped, value, "EX", ttlSeconds);
    } catch (error) {
      this.log(`redis write of ${scoped} failed: ${String(error)}`);
    }
  }

  async close(): Promise<void> {
    await this.memory.close();
    const redis = this.redis;
    this.redis = undefined;
    if (redis) await redis.quit();
  }

  private async connection(): Promise<Redis | undefined> {
    if (!this.connecting) this.connecting = this.connect();
    await this.connecting;
    return this.redis;
  }

  private async connect(): Promise<void> {
    if (!this.options.redisUrl) return;

    const redis = new Redis(this.options.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
    try {
      await redis.connect();
      this.redis = redis;
      this.log(`redis cache ready for ${this.options.namespace}`);
    } catch (error) {
      redis.disconnect();
      this.log(`redis unavailable for ${this.options.namespace}, caching in memory: ${String(error)}`);
    }
  }

  private scope(key: string): string {
    return `${this.options.namespace}:${key}`;
  }

  private log(message: string): void {
    this.options.log?.(message);
  }
}
