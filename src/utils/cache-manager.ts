import { logger } from '../core/logger';

/**
 * Snapshot cache keyed by source identity. Entries never expire on their own;
 * they are dropped only through `delete`/`clear` (an explicit reload).
 * Concurrent loads of the same key share one in-flight promise; invalidation
 * also drops in-flight loads.
 */
export class SnapshotCache<T> {
    private cache: Map<string, CacheEntry<T>> = new Map();
    private pending: Map<string, Promise<T>> = new Map();

    set(key: string, value: T): void {
      this.cache.set(key, {
        value,
        loadedAt: Date.now(),
        hits: 0,
      });
    }

    get(key: string): T | null {
      const entry = this.cache.get(key);

      if (!entry) return null;

      entry.hits++;
      return entry.value;
    }

    has(key: string): boolean {
      return this.cache.has(key);
    }

    async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
      const cached = this.get(key);
      if (cached !== null) return cached;

      const inFlight = this.pending.get(key);
      if (inFlight) return inFlight;

      // A load superseded by delete/clear resolves for its own callers but is not cached
      const promise: Promise<T> = load()
        .then(value => {
          if (this.pending.get(key) === promise) this.set(key, value);
          return value;
        })
        .finally(() => {
          if (this.pending.get(key) === promise) this.pending.delete(key);
        });

      this.pending.set(key, promise);
      return promise;
    }

    delete(key: string): boolean {
      const pending = this.pending.delete(key);
      return this.cache.delete(key) || pending;
    }

    clear(): void {
      const size = this.cache.size;
      const inFlight = this.pending.size;
      this.cache.clear();
      this.pending.clear();
      logger.debug('Snapshot cache cleared', { entries: size, inFlight });
    }

    getStats(): CacheStats {
      let totalHits = 0;

      this.cache.forEach(entry => {
        totalHits += entry.hits;
      });

      return {
        size: this.cache.size,
        pending: this.pending.size,
        totalHits,
        avgHits: this.cache.size > 0 ? totalHits / this.cache.size : 0,
      };
    }
  }

  interface CacheEntry<T> {
    value: T;
    loadedAt: number;
    hits: number;
  }

  export interface CacheStats {
    size: number;
    pending: number;
    totalHits: number;
    avgHits: number;
  }
