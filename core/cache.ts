/**
 * LRU Cache
 *
 * Bounded in-memory cache used to keep compiled glob matchers around across
 * repeated directory visits. Uses a Least Recently Used (LRU) eviction policy.
 *
 * Features:
 * - Configurable maximum entry count
 * - LRU eviction when cache is full
 * - Cache hit/miss statistics
 *
 * JavaScript runs one thread per realm and every worker thread loads its own
 * copy of this module, so instances are never shared between threads.
 */

/**
 * Cache statistics for monitoring cache performance
 */
export interface CacheStats {
  /** Total number of cache hits */
  hits: number
  /** Total number of cache misses */
  misses: number
  /** Current number of entries in cache */
  entryCount: number
  /** Maximum entries allowed in cache */
  maxEntries: number
  /** Cache hit ratio (hits / total requests) */
  hitRatio: number
  /** Number of evictions performed */
  evictions: number
}

/**
 * Configuration options for the LRU cache
 */
export interface LRUCacheOptions {
  /**
   * Maximum number of entries to store in cache.
   * When exceeded, least recently used entries are evicted.
   * @default 256
   */
  maxEntries?: number
}

const DEFAULT_MAX_ENTRIES = 256

/**
 * LRU Cache implementation
 *
 * Uses a Map for O(1) access. The Map's insertion order is leveraged for
 * LRU - we delete and re-insert on access to maintain LRU order.
 */
export class LRUCache<K, V> {
  private cache: Map<K, V> = new Map()
  private maxEntries: number

  // Statistics
  private hits: number = 0
  private misses: number = 0
  private evictions: number = 0

  constructor(options: LRUCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`)
    }
    this.maxEntries = maxEntries
  }

  /**
   * Get a value from the cache, marking it most recently used.
   */
  get(key: K): V | undefined {
    if (!this.cache.has(key)) {
      this.misses++
      return undefined
    }

    const value = this.cache.get(key)
    if (value === undefined) {
      this.misses++
      return undefined
    }

    // Move to end (most recently used)
    this.cache.delete(key)
    this.cache.set(key, value)

    this.hits++
    return value
  }

  /**
   * Store a value, evicting the least recently used entry if full.
   */
  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key)
    }

    while (this.cache.size >= this.maxEntries) {
      this.evictOldest()
    }

    this.cache.set(key, value)
  }

  /**
   * Return the cached value for `key`, computing and storing it on a miss.
   */
  getOrCreate(key: K, create: (key: K) => V): V {
    const cached = this.get(key)
    if (cached !== undefined) {
      return cached
    }
    const value = create(key)
    this.set(key, value)
    return value
  }

  /**
   * Check if a key is in the cache (without affecting LRU order)
   */
  has(key: K): boolean {
    return this.cache.has(key)
  }

  /**
   * Clear all entries from the cache
   */
  clear(): void {
    this.cache.clear()
    // Note: We don't reset statistics on clear
  }

  /**
   * Get current cache statistics
   */
  getStats(): CacheStats {
    const total = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      entryCount: this.cache.size,
      maxEntries: this.maxEntries,
      hitRatio: total > 0 ? this.hits / total : 0,
      evictions: this.evictions,
    }
  }

  get size(): number {
    return this.cache.size
  }

  /**
   * Evict the oldest (least recently used) entry
   */
  private evictOldest(): void {
    // Map iterates in insertion order, so first entry is oldest
    const first = this.cache.keys().next()
    if (!first.done) {
      this.cache.delete(first.value)
      this.evictions++
    }
  }
}
