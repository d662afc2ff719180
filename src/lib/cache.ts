/**
 * In-memory TTL cache
 *
 * Keyed read-through cache used for per-POI relevance scores. Each instance
 * owns its entries and cleanup timer; there is no shared global cache.
 *
 * Features:
 * - Configurable TTL and size limit
 * - Automatic cleanup of expired entries
 * - Hit/miss statistics
 */

// ============================================
// TYPES
// ============================================

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
  createdAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  oldestEntry: number | null;
}

export interface CacheOptions {
  ttlMs?: number; // Time to live in milliseconds
  maxSize?: number; // Maximum number of entries
  cleanupIntervalMs?: number;
}

// ============================================
// DEFAULT SETTINGS
// ============================================

const DEFAULT_TTL_MS = 30 * 60 * 1000; // 30 minutes
const DEFAULT_MAX_SIZE = 5000;
const DEFAULT_CLEANUP_INTERVAL_MS = 60 * 1000;

// ============================================
// MEMORY CACHE
// ============================================

export class MemoryCache<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();
  private hits = 0;
  private misses = 0;
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly ttlMs: number;
  private readonly maxSize: number;

  constructor(options: CacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;

    // The timer must not keep the process alive
    this.cleanupInterval = setInterval(
      () => this.cleanup(),
      options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS
    );
    this.cleanupInterval.unref();
  }

  /**
   * Get a value from cache
   */
  get(key: string): T | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.data;
  }

  /**
   * Set a value in cache
   */
  set(key: string, data: T, ttlMs: number = this.ttlMs): void {
    const now = Date.now();

    this.cache.set(key, {
      data,
      expiresAt: now + ttlMs,
      createdAt: now,
    });

    if (this.cache.size > this.maxSize) {
      this.evictOldest();
    }
  }

  /**
   * Return the cached value, computing and storing it on a miss
   */
  getOrCompute(key: string, compute: () => T): T {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const data = compute();
    this.set(key, data);
    return data;
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): CacheStats {
    let oldest: number | null = null;
    for (const entry of this.cache.values()) {
      if (oldest === null || entry.createdAt < oldest) {
        oldest = entry.createdAt;
      }
    }

    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      oldestEntry: oldest,
    };
  }

  getHitRate(): number {
    const total = this.hits + this.misses;
    return total === 0 ? 0 : this.hits / total;
  }

  /**
   * Clean up expired entries
   */
  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of Array.from(this.cache.entries())) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  }

  /**
   * Evict oldest entries when cache is full
   */
  private evictOldest(): void {
    const entries = Array.from(this.cache.entries());
    entries.sort((a, b) => a[1].createdAt - b[1].createdAt);

    // Remove oldest 10%
    const toRemove = Math.max(1, Math.floor(entries.length * 0.1));
    for (const [key] of entries.slice(0, toRemove)) {
      this.cache.delete(key);
    }
  }

  /**
   * Stop the cleanup timer and drop all entries
   */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.clear();
  }
}

// ============================================
// CACHE KEY GENERATORS
// ============================================

/**
 * Generate cache key with namespace. Parts are URI-encoded so distinct ids
 * never collapse to the same key.
 */
export function cacheKey(namespace: string, ...parts: (string | number | boolean)[]): string {
  return `${namespace}:${parts.map((p) => encodeURIComponent(String(p))).join(":")}`;
}

export const CACHE_NS = {
  RELEVANCE: "relevance",
} as const;
