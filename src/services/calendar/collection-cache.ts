// src/services/calendar/collection-cache.ts
import type { CalendarCollection } from '../../models/index.js';

/**
 * Interface for cache entries
 */
interface CacheEntry<T> {
  data: T;
  timestamp: number;
}

export type CollectionSnapshot = readonly CalendarCollection[];

/**
 * In-process cache of discovered collections.
 *
 * The snapshot is frozen and replaced as a whole, so readers never see a
 * partially refreshed set. Concurrent refreshes share one discovery call.
 */
export class CollectionCache {
  private entry: CacheEntry<CollectionSnapshot> | null = null;
  private pending: Promise<CollectionSnapshot> | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {}

  /**
   * Returns the current snapshot if it has not expired
   */
  get(): CollectionSnapshot | undefined {
    if (this.entry && this.now() - this.entry.timestamp < this.ttlMs) {
      return this.entry.data;
    }
    return undefined;
  }

  /**
   * Returns the fresh snapshot, or runs the loader and swaps in its result
   */
  async load(
    loader: () => Promise<CalendarCollection[]>,
    options: { force?: boolean } = {},
  ): Promise<CollectionSnapshot> {
    const cached = options.force ? undefined : this.get();
    if (cached) return cached;

    if (!this.pending) {
      this.pending = loader()
        .then((collections) => {
          const data: CollectionSnapshot = Object.freeze(
            collections.map((collection) => Object.freeze({ ...collection })),
          );
          this.entry = { data, timestamp: this.now() };
          return data;
        })
        .finally(() => {
          this.pending = null;
        });
    }

    return this.pending;
  }
}
