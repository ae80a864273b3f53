import type { Logger } from 'pino';
import type { GeoLookupResult, GeoProvider } from './types.js';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Simple LRU cache with TTL
 */
export class LRUCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private maxSize: number;
  private ttlMs: number;
  private now: () => number;

  constructor(maxSize: number, ttlMs: number, now: () => number = Date.now) {
    this.maxSize = maxSize;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    // Delete existing to update position
    this.cache.delete(key);

    if (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) this.cache.delete(firstKey);
    }

    this.cache.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  size(): number {
    return this.cache.size;
  }

  cleanupExpired(): number {
    const now = this.now();
    let deleted = 0;

    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}

/**
 * Wraps a provider and keeps successful lookups for `ttlMs`. Failures are not cached.
 */
export class CachingGeoProvider implements GeoProvider {
  readonly name: string;
  private inner: GeoProvider;
  private cache: LRUCache<GeoLookupResult>;
  private logger?: Logger;

  constructor(inner: GeoProvider, options: { maxEntries: number; ttlMs: number; logger?: Logger }) {
    this.inner = inner;
    this.name = `cached-${inner.name}`;
    this.cache = new LRUCache(options.maxEntries, options.ttlMs);
    this.logger = options.logger?.child({ module: 'geo-cache' });
  }

  async lookup(ip: string): Promise<GeoLookupResult> {
    const cached = this.cache.get(ip);
    if (cached) {
      this.logger?.debug({ ip }, 'Geolocation served from cache');
      return cached;
    }

    const result = await this.inner.lookup(ip);
    this.cache.set(ip, result);
    return result;
  }

  cleanupExpired(): number {
    return this.cache.cleanupExpired();
  }
}
