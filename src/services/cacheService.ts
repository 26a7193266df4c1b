import { logger } from '@/utils/logger';

interface CacheEntry<V> {
  value: V;
  expiry: number;
}

/**
 * In-memory TTL cache. One instance per value type.
 *
 * Expired entries are dropped on every write, and once `maxEntries` is reached
 * the oldest entry is evicted to make room.
 */
export class CacheService<V> {
  private cache: Map<string, CacheEntry<V>> = new Map();

  constructor(
    private readonly name: string,
    private readonly defaultTtlSeconds: number = 3600,
    private readonly maxEntries: number = 500
  ) {
    logger.debug(`Using in-memory cache "${name}"`);
  }

  private sweep(now: number) {
    for (const [key, item] of this.cache.entries()) {
      if (item.expiry <= now) {
        this.cache.delete(key);
      }
    }
  }

  /**
   * Set a key-value pair in cache
   */
  async set(key: string, value: V, ttlSeconds: number = this.defaultTtlSeconds): Promise<void> {
    const now = Date.now();
    this.sweep(now);

    // Re-inserting moves the key to the newest position
    this.cache.delete(key);
    while (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }

    this.cache.set(key, { value, expiry: now + ttlSeconds * 1000 });
    logger.debug(`Cache set: ${this.name}/${key} (TTL: ${ttlSeconds}s)`);
  }

  /**
   * Get a value from cache
   */
  async get(key: string): Promise<V | null> {
    const item = this.cache.get(key);
    if (item && item.expiry > Date.now()) {
      logger.debug(`Cache hit: ${this.name}/${key}`);
      return item.value;
    }

    // Remove expired item
    if (item) {
      this.cache.delete(key);
    }

    logger.debug(`Cache miss: ${this.name}/${key}`);
    return null;
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key);
  }

  /**
   * Clear all cache
   */
  async clear(): Promise<void> {
    this.cache.clear();
    logger.info(`Cache cleared: ${this.name}`);
  }

  /**
   * Entries currently held, expired or not.
   */
  async getStats(): Promise<{ name: string; keys: number; maxEntries: number }> {
    return { name: this.name, keys: this.cache.size, maxEntries: this.maxEntries };
  }
}
