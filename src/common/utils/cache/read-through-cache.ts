import NodeCache from 'node-cache';

import type { ICacheStats, ReadThroughCacheOptions } from './cache.interfaces';

/**
 * TTL cache over node-cache that loads missing keys on demand.
 * Concurrent misses for one key share a single loader call; failed loads are not cached.
 */
export class ReadThroughCache<T> {
  private readonly cache: NodeCache;
  private readonly maxKeys: number | undefined;
  private readonly inFlight: Map<string, Promise<T>> = new Map<string, Promise<T>>();

  public constructor(options: ReadThroughCacheOptions) {
    this.maxKeys = options.maxKeys;
    this.cache = new NodeCache({
      stdTTL: options.ttlSec,
      checkperiod: options.checkperiod ?? 0,
      useClones: false,
    });
  }

  public async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const cached: T | undefined = this.cache.get<T>(key);

    if (cached !== undefined) {
      return cached;
    }

    const pending: Promise<T> | undefined = this.inFlight.get(key);

    if (pending !== undefined) {
      return pending;
    }

    const load: Promise<T> = loader()
      .then((value: T): T => {
        this.set(key, value);
        return value;
      })
      .finally((): void => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, load);

    return load;
  }

  public peek(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  public stats(): ICacheStats {
    const nodeStats = this.cache.getStats();
    return {
      keys: nodeStats.keys,
      hits: nodeStats.hits,
      misses: nodeStats.misses,
    };
  }

  private set(key: string, value: T): void {
    if (this.maxKeys !== undefined && !this.cache.has(key)) {
      const allKeys: string[] = this.cache.keys();

      while (allKeys.length >= this.maxKeys) {
        const oldestKey: string | undefined = allKeys.shift();

        if (oldestKey === undefined) {
          break;
        }

        this.cache.del(oldestKey);
      }
    }

    this.cache.set(key, value);
  }
}
