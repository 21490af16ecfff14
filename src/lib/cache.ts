/**
 * Cache Store
 *
 * Key/value contract shared by the orchestrator, the rate limiter and the stats
 * counters. Values are strings; callers serialize their own records. Every
 * operation rejects with CacheUnavailableError when the backing store cannot be
 * reached.
 */

import { createLogger } from './logger.js';

export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Returns true when the key was created */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  /** Deletes the key only while it still holds `value` */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  /** Atomic; creates at 1 and sets the TTL only on creation */
  increment(key: string, ttlSeconds: number): Promise<number>;
  /** Accepts an exact key or a `*` pattern; resolves to the number of keys removed */
  delete(keyOrPattern: string): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  ping(): Promise<void>;
}

// Key layout
export const CacheKeys = {
  daily: (date: string, count: number) => `daily:${date}:${count}`,
  dailyForDate: (date: string) => `daily:${date}:*`,
  allDaily: () => 'daily:*',
  generationLock: (date: string, count: number) => `lock:daily:${date}:${count}`,
  rateWindow: (callerKey: string, windowId: number) => `rate:${callerKey}:${windowId}`,
  stat: (counter: StatCounter) => `stats:${counter}`,
};

export type StatCounter =
  | 'total_generated'
  | 'ai_sourced'
  | 'fallback_sourced'
  | 'cache_hits'
  | 'cache_misses';

export function isPattern(keyOrPattern: string): boolean {
  return keyOrPattern.includes('*');
}

/**
 * Glob-style matcher supporting `*`, matching the subset of Redis MATCH syntax
 * the engine uses.
 */
export function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}

export interface CacheEntry {
  value: string;
  expiresAt: number;
  createdAt: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries to store */
  maxEntries?: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
  /** Enable debug logging */
  debug?: boolean;
}


const log = createLogger('memory-cache');

/**
 * In-process CacheStore with per-key TTL.
 *
 * Operations run to completion on the event loop, which makes each of them
 * atomic with respect to concurrent callers in this process.
 */
export class MemoryCacheStore implements CacheStore {
  private cache: Map<string, CacheEntry> = new Map();
  private maxEntries: number;
  private now: () => number;
  private debug: boolean;

  constructor(options: MemoryCacheOptions = {}) {
    this.maxEntries = options.maxEntries || 10000;
    this.now = options.now || Date.now;
    this.debug = options.debug || false;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry) {
      this.log(`MISS: ${key}`);
      return null;
    }

    this.log(`HIT: ${key}`);
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.write(key, value, ttlSeconds);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.write(key, value, ttlSeconds);
    return true;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== value) {
      return false;
    }
    this.cache.delete(key);
    this.log(`DELETE: ${key}`);
    return true;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      this.write(key, '1', ttlSeconds);
      return 1;
    }

    const next = (parseInt(entry.value, 10) || 0) + 1;
    // TTL is left as it was set on creation
    entry.value = String(next);
    return next;
  }

  async delete(keyOrPattern: string): Promise<number> {
    if (!isPattern(keyOrPattern)) {
      const existed = this.live(keyOrPattern) !== undefined;
      this.cache.delete(keyOrPattern);
      return existed ? 1 : 0;
    }

    const matching = await this.keys(keyOrPattern);
    for (const key of matching) {
      this.cache.delete(key);
    }
    this.log(`DELETE PATTERN: ${keyOrPattern} (${matching.length} keys)`);
    return matching.length;
  }

  async keys(pattern: string): Promise<string[]> {
    const matcher = patternToRegExp(pattern);
    const result: string[] = [];
    for (const key of Array.from(this.cache.keys())) {
      if (matcher.test(key) && this.live(key)) {
        result.push(key);
      }
    }
    return result;
  }

  async ping(): Promise<void> {
    // Always reachable
  }

  /**
   * Get remaining TTL for a key in milliseconds
   */
  getTtl(key: string): number | null {
    const entry = this.live(key);
    if (!entry) return null;
    return entry.expiresAt - this.now();
  }

  /**
   * Cleanup expired entries (call periodically to prevent memory bloat)
   */
  cleanup(): number {
    const now = this.now();
    let count = 0;

    for (const [key, entry] of Array.from(this.cache.entries())) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        count++;
      }
    }

    this.log(`CLEANUP: ${count} expired entries removed`);
    return count;
  }

  /**
   * Start automatic cleanup at a specified interval
   */
  startAutoCleanup(intervalMs = 60000): NodeJS.Timeout {
    const timer = setInterval(() => {
      this.cleanup();
    }, intervalMs);
    timer.unref();
    return timer;
  }

  private live(key: string): CacheEntry | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.cache.delete(key);
      this.log(`EXPIRED: ${key}`);
      return undefined;
    }
    return entry;
  }

  private write(key: string, value: string, ttlSeconds: number): void {
    if (!this.cache.has(key) && this.cache.size >= this.maxEntries) {
      this.evictOldest();
    }

    const now = this.now();
    this.cache.set(key, {
      value,
      createdAt: now,
      expiresAt: now + ttlSeconds * 1000,
    });
    this.log(`SET: ${key} (TTL: ${ttlSeconds}s)`);
  }

  /**
   * Evict oldest entries to make room for new ones
   */
  private evictOldest(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of Array.from(this.cache.entries())) {
      if (entry.createdAt < oldestTime) {
        oldestTime = entry.createdAt;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.cache.delete(oldestKey);
      this.log(`EVICT: ${oldestKey} (oldest entry)`);
    }
  }

  private log(message: string): void {
    if (this.debug) {
      log.debug(message);
    }
  }
}

export function createMemoryCacheStore(options?: MemoryCacheOptions): MemoryCacheStore {
  return new MemoryCacheStore(options);
}
