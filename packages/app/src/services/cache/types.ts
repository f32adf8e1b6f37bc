/**
 * Cache service types and interfaces
 */

/**
 * Cache service interface, typed by the values it holds
 */
export interface CacheService<V> {
  /**
   * Get value from cache, null when absent or expired
   */
  get(key: string): Promise<V | null>;

  /**
   * Set value in cache
   */
  set(key: string, value: V, ttl?: number): Promise<void>;

  /**
   * Delete key from cache
   */
  delete(key: string): Promise<void>;

  /**
   * Check if key exists
   */
  has(key: string): Promise<boolean>;

  /**
   * Clear all cache entries
   */
  clear(): Promise<void>;

  /**
   * Get cache statistics
   */
  getStats(): CacheStats;

  /**
   * Get all keys (for debugging)
   */
  keys(): Promise<string[]>;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  evictions: number;
  size: number;
  keys: number;
}
