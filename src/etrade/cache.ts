/**
 * LRU cache for E*TRADE market-data responses
 *
 * Caches GET responses for a short TTL. Keys are built from the request
 * path and parameters. Account-scoped and order endpoints are never cached.
 */

import { LRUCache } from 'lru-cache';
import { createHash } from 'node:crypto';

export interface CacheConfig {
  maxSize: number;      // Maximum number of entries (default: 200)
  ttlMs: number;        // Time to live in milliseconds (default: 5000)
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

const DEFAULT_CONFIG: CacheConfig = {
  maxSize: 200,
  ttlMs: 5000, // quotes go stale quickly
};

export class EtradeCache {
  private cache: LRUCache<string, { data: unknown }>;
  private config: CacheConfig;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.cache = new LRUCache({
      max: this.config.maxSize,
      ttl: this.config.ttlMs,
      updateAgeOnGet: false,
      updateAgeOnHas: false,
    });
  }

  /**
   * Generate a cache key from request path and parameters
   */
  static generateKey(path: string, params?: Record<string, unknown>): string {
    const normalizedParams = params
      ? JSON.stringify(Object.entries(params).sort(([a], [b]) => a.localeCompare(b)))
      : '';

    const hash = createHash('sha256')
      .update(path + normalizedParams)
      .digest('hex')
      .substring(0, 12);

    return `${path}:${hash}`;
  }

  get(key: string): { data: unknown } | undefined {
    const entry = this.cache.get(key);
    if (entry) {
      this.hits++;
      return entry;
    }
    this.misses++;
    return undefined;
  }

  set(key: string, data: unknown): void {
    this.cache.set(key, { data });
  }

  getStats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }
}
