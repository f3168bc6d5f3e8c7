/**
 * Pattern Cache
 *
 * Bounded least-recently-used cache for compiled patterns.
 * A Map keeps insertion order, so re-inserting a key on access moves it to
 * the most recent end and the first key is always the eviction candidate.
 */

import { ValidationError } from "../errors";

export interface PatternCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class PatternCache<V> {
  private entries: Map<string, V> = new Map();
  private readonly capacity: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ValidationError(
        `Pattern cache capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
  }

  /**
   * Get a cached value and mark it as most recently used
   */
  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /**
   * Insert or replace a value, evicting the least recently used entry
   * when the cache is full
   */
  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
        this.evictions++;
      }
    }
  }

  /**
   * Check presence without touching recency
   */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Keys from least to most recently used
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  getStats(): PatternCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
