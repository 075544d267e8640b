/**
 * LRU Cache with TTL support and statistics tracking
 */

import type { PermissionCacheStats } from './types.js';

/**
 * Doubly-linked list node for O(1) LRU operations
 */
interface CacheNode<T> {
  key: string;
  value: T;
  expiresAt?: number;
  prev: CacheNode<T> | null;
  next: CacheNode<T> | null;
}

export interface LRUCacheOptions {
  maxSize: number;
  /** Default TTL in ms; 0 or undefined disables expiry */
  defaultTtl?: number;
  /** Clock override for tests */
  now?: () => number;
}

export class LRUCache<T> {
  private cache: Map<string, CacheNode<T>> = new Map();
  private head: CacheNode<T> | null = null; // Most recently used
  private tail: CacheNode<T> | null = null; // Least recently used
  private readonly maxSize: number;
  private readonly defaultTtl?: number;
  private readonly now: () => number;

  // Statistics
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: LRUCacheOptions) {
    if (options.maxSize < 1) {
      throw new Error(`LRU cache maxSize must be at least 1, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.defaultTtl = options.defaultTtl;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get a value from the cache, updating recency
   */
  get(key: string): T | undefined {
    const node = this.cache.get(key);

    if (!node) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(node)) {
      this.unlink(node);
      this.misses++;
      return undefined;
    }

    this.moveToFront(node);
    this.hits++;
    return node.value;
  }

  set(key: string, value: T, ttl?: number): void {
    const existing = this.cache.get(key);

    if (existing) {
      existing.value = value;
      existing.expiresAt = this.calculateExpiry(ttl);
      this.moveToFront(existing);
      return;
    }

    if (this.cache.size >= this.maxSize) {
      this.evictLRU();
    }

    const node: CacheNode<T> = {
      key,
      value,
      expiresAt: this.calculateExpiry(ttl),
      prev: null,
      next: null,
    };
    this.cache.set(key, node);
    this.addToFront(node);
  }

  delete(key: string): boolean {
    const node = this.cache.get(key);
    if (!node) return false;

    this.unlink(node);
    return true;
  }

  clear(): void {
    this.cache.clear();
    this.head = null;
    this.tail = null;
  }

  size(): number {
    return this.cache.size;
  }

  keys(): string[] {
    return Array.from(this.cache.keys());
  }

  stats(): PermissionCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      evictions: this.evictions,
    };
  }

  /**
   * Get the least recently used key
   */
  getLRU(): string | undefined {
    return this.tail?.key;
  }

  // Private helper methods

  private calculateExpiry(ttl?: number): number | undefined {
    const effectiveTtl = ttl ?? this.defaultTtl;
    if (!effectiveTtl) return undefined;
    return this.now() + effectiveTtl;
  }

  private isExpired(node: CacheNode<T>): boolean {
    return node.expiresAt !== undefined && this.now() > node.expiresAt;
  }

  private addToFront(node: CacheNode<T>): void {
    node.next = this.head;
    node.prev = null;

    if (this.head) {
      this.head.prev = node;
    }
    this.head = node;

    if (!this.tail) {
      this.tail = node;
    }
  }

  private removeNode(node: CacheNode<T>): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }

    node.prev = null;
    node.next = null;
  }

  private unlink(node: CacheNode<T>): void {
    this.removeNode(node);
    this.cache.delete(node.key);
  }

  private moveToFront(node: CacheNode<T>): void {
    if (node === this.head) return;
    this.removeNode(node);
    this.addToFront(node);
  }

  private evictLRU(): void {
    if (!this.tail) return;
    this.unlink(this.tail);
    this.evictions++;
  }
}
