import { CategoryRecord } from "@orderdesk/types";

export interface CategoryCacheState {
  data: CategoryRecord[] | null;
  lastRefreshed: number;
  ttlMs: number;
}

/**
 * Process-wide category list with a fixed time to live. A stale read refills
 * from the loader before returning; writers call `invalidate()`.
 */
export class CategoryCache {
  private data: CategoryRecord[] | null = null;
  private lastRefreshed = 0;
  private generation = 0;

  constructor(
    private readonly loader: () => Promise<CategoryRecord[]>,
    readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(): Promise<CategoryRecord[]> {
    if (this.data && this.now() - this.lastRefreshed < this.ttlMs) return this.data;

    const generation = this.generation;
    const fresh = await this.loader();
    // An invalidation while loading means `fresh` may predate the write.
    if (generation === this.generation) {
      this.data = fresh;
      this.lastRefreshed = this.now();
    }
    return fresh;
  }

  invalidate(): void {
    this.generation += 1;
    this.data = null;
    this.lastRefreshed = 0;
  }

  state(): CategoryCacheState {
    return { data: this.data, lastRefreshed: this.lastRefreshed, ttlMs: this.ttlMs };
  }
}
