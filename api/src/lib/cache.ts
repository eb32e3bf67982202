/**
 * LRU Cache
 *
 * Used for:
 * 1. Draft intents (question → DraftResult)
 * 2. Answers (question → response payload)
 *
 * Keys are hashed from the normalized question text. Node runs request
 * handlers on one thread, so Map operations need no further locking;
 * concurrent misses for the same key simply both compute, last writer wins.
 */

import { createHash } from 'crypto';

/**
 * Cache entry with metadata
 */
interface CacheEntry<T> {
  value: T;
  createdAt: number;
  accessedAt: number;
  accessCount: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  maxSize: number;
  hitRate: number;
}

/**
 * Lowercase, trim and collapse whitespace so trivially different
 * spellings of a question share an entry
 */
export function normalizeQuestion(question: string): string {
  return question.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * LRU cache with a TTL
 */
export class LRUCache<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(
    private maxSize = 100,
    private ttlMs = 30 * 60 * 1000,
    private clock: () => number = Date.now
  ) {}

  /**
   * Generate cache key from input
   */
  private generateKey(input: string): string {
    return createHash('sha256').update(normalizeQuestion(input)).digest('hex').slice(0, 16);
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.clock() - entry.createdAt > this.ttlMs;
  }

  /**
   * Get value from cache
   */
  get(input: string): T | undefined {
    const key = this.generateKey(input);
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    entry.accessedAt = this.clock();
    entry.accessCount++;
    this.hits++;

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    return entry.value;
  }

  /**
   * Set value in cache
   */
  set(input: string, value: T): void {
    if (this.maxSize <= 0) {
      return;
    }
    const key = this.generateKey(input);
    this.cache.delete(key);

    // Evict least recently used (first) entry
    if (this.cache.size >= this.maxSize) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.cache.delete(oldestKey);
      }
    }

    const now = this.clock();
    this.cache.set(key, {
      value,
      createdAt: now,
      accessedAt: now,
      accessCount: 1,
    });
  }

  /**
   * Check if key exists and is valid
   */
  has(input: string): boolean {
    const key = this.generateKey(input);
    const entry = this.cache.get(key);

    if (!entry) {
      return false;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      return false;
    }

    return true;
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      maxSize: this.maxSize,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
