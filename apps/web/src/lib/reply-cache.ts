/**
 * Reply Cache
 *
 * In-process cache of model replies keyed by prompt digest.
 * Entries live until clear() is called; there is no TTL and no eviction.
 *
 * Cache Key: md5(prompt)
 *
 * Insert-or-fetch is atomic: the pending promise is stored before it is awaited,
 * so concurrent callers with the same prompt share a single upstream call.
 *
 * @module reply-cache
 */

import crypto from "crypto";

// ============================================================================
// TYPES
// ============================================================================

export interface ReplyCacheStats {
  enabled: boolean;
  entries: number;
  hits: number;
  misses: number;
}

export interface ReplyCacheOptions {
  enabled?: boolean;
}

// ============================================================================
// CACHE KEY GENERATION
// ============================================================================

export function generateCacheKey(prompt: string): string {
  return crypto.createHash("md5").update(prompt).digest("hex");
}

// ============================================================================
// CACHE
// ============================================================================

export class ReplyCache {
  private readonly entries = new Map<string, Promise<string>>();
  private hits = 0;
  private misses = 0;
  private enabled: boolean;

  constructor(options: ReplyCacheOptions = {}) {
    this.enabled = options.enabled ?? true;
  }

  get size(): number {
    return this.entries.size;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * Return the cached reply, or run the producer once and cache its result.
   * A rejected producer is not cached.
   */
  getOrCreate(prompt: string, producer: () => Promise<string>): Promise<string> {
    if (!this.enabled) {
      return producer();
    }

    const cacheKey = generateCacheKey(prompt);
    const existing = this.entries.get(cacheKey);
    if (existing) {
      this.hits++;
      console.log(`[Reply-Cache] Cache HIT for ${cacheKey.slice(0, 8)}`);
      return existing;
    }

    this.misses++;
    const pending = producer().catch((err: unknown) => {
      this.entries.delete(cacheKey);
      throw err;
    });
    this.entries.set(cacheKey, pending);
    return pending;
  }

  /**
   * Remove every entry. Returns the number of entries dropped.
   */
  clear(): number {
    const dropped = this.entries.size;
    this.entries.clear();
    console.log(`[Reply-Cache] Cleared ${dropped} entries`);
    return dropped;
  }

  getStats(): ReplyCacheStats {
    return {
      enabled: this.enabled,
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
    };
  }
}

/** Process-wide cache behind the route handlers; cleared by the /api/cache route. */
export const defaultReplyCache = new ReplyCache();
