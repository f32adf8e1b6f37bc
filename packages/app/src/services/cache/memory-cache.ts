/**
 * In-memory cache implementation
 */

import type { Logger } from '@riskband/logger';
import type { CacheService, CacheStats } from './types.js';

export interface MemoryCacheConfig {
  logger: Logger;
  /** Entry lifetime in milliseconds */
  defaultTTL?: number;
  /** Size budget in estimated bytes */
  maxSize?: number;
  /** Clock override for tests */
  now?: () => number;
}

interface CacheEntry<V> {
  value: V;
  expires: number;
  size: number;
}

/**
 * Simple in-memory cache with TTL support.
 *
 * Expired entries are removed lazily on access, so the cache holds no timers
 * and never keeps the process alive.
 */
export class MemoryCache<V> implements CacheService<V> {
  private readonly logger: Logger;
  private readonly cache = new Map<string, CacheEntry<V>>();
  private readonly stats: CacheStats = {
    hits: 0,
    misses: 0,
    sets: 0,
    deletes: 0,
    evictions: 0,
    size: 0,
    keys: 0,
  };
  private readonly defaultTTL: number;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(config: MemoryCacheConfig) {
    this.logger = config.logger;
    this.defaultTTL = config.defaultTTL ?? 3600000; // 1 hour
    this.maxSize = config.maxSize ?? 100 * 1024 * 1024; // 100MB
    this.now = config.now ?? Date.now;
  }

  async get(key: string): Promise<V | null> {
    const entry = this.cache.get(key);

    if (!entry) {
      this.stats.misses++;
      return null;
    }

    if (entry.expires <= this.now()) {
      this.remove(key, entry);
      this.stats.misses++;
      this.stats.evictions++;
      return null;
    }

    this.stats.hits++;
    return entry.value;
  }

  async set(key: string, value: V, ttl?: number): Promise<void> {
    const size = this.estimateSize(value);

    const existing = this.cache.get(key);
    if (existing) {
      this.remove(key, existing);
    }

    if (this.stats.size + size > this.maxSize) {
      this.evictEntries(size);
    }

    this.cache.set(key, {
      value,
      expires: this.now() + (ttl ?? this.defaultTTL),
      size,
    });
    this.stats.sets++;
    this.stats.keys++;
    this.stats.size += size;

    this.logger.debug('Cache set', {
      key,
      size,
      ttl: ttl ?? this.defaultTTL,
    });
  }

  async delete(key: string): Promise<void> {
    const entry = this.cache.get(key);
    if (entry) {
      this.remove(key, entry);
      this.stats.deletes++;

      this.logger.debug('Cache delete', { key });
    }
  }

  async has(key: string): Promise<boolean> {
    const entry = this.cache.get(key);
    if (!entry) return false;

    if (entry.expires <= this.now()) {
      this.remove(key, entry);
      this.stats.evictions++;
      return false;
    }

    return true;
  }

  async clear(): Promise<void> {
    const count = this.cache.size;
    this.cache.clear();
    this.stats.size = 0;
    this.stats.keys = 0;

    this.logger.debug('Cache cleared', { count });
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  async keys(): Promise<string[]> {
    return Array.from(this.cache.keys());
  }

  private remove(key: string, entry: CacheEntry<V>): void {
    this.cache.delete(key);
    this.stats.size -= entry.size;
    this.stats.keys--;
  }

  /**
   * Evict oldest entries until `requiredSize` fits (FIFO)
   */
  private evictEntries(requiredSize: number): void {
    let evicted = 0;

    for (const [key, entry] of this.cache) {
      if (this.stats.size + requiredSize <= this.maxSize) {
        break;
      }
      this.remove(key, entry);
      this.stats.evictions++;
      evicted++;
    }

    this.logger.debug('Cache eviction', { evicted, size: this.stats.size });
  }

  /**
   * Estimate size of value in bytes
   */
  private estimateSize(value: unknown): number {
    if (value === null || value === undefined) return 0;
    if (typeof value === 'boolean') return 4;
    if (typeof value === 'number') return 8;
    if (typeof value === 'string') return value.length * 2;

    try {
      return JSON.stringify(value).length * 2;
    } catch {
      return 1024; // Default size for non-serializable
    }
  }
}
