/**
 * In-memory prime cache for the lazy prime sequence.
 * Holds a verified prefix of the primes and the bound it is complete up to.
 */

import type { CacheStats } from './types.js';
import { binarySearch } from './binary-search.js';

/**
 * Monotonically growing prefix of the primes.
 *
 * Node.js is single-threaded and every operation is synchronous, so no locking
 * is needed. The cache only ever grows: a replacement that would drop primes or
 * lower the watermark is ignored.
 */
export class PrimeCache {
  private primes: number[] = [];
  private watermark = 2;
  private extensions = 0;
  private hits = 0;
  private misses = 0;

  /**
   * Number of primes cached.
   */
  get size(): number {
    return this.primes.length;
  }

  /**
   * Every prime strictly below this value is cached.
   */
  get completeBelow(): number {
    return this.watermark;
  }

  /**
   * Read-only view of the cached primes.
   */
  get values(): readonly number[] {
    return this.primes;
  }

  /**
   * Cached prime at `index`, or undefined past the end.
   */
  at(index: number): number | undefined {
    return index < this.primes.length ? this.primes[index] : undefined;
  }

  /**
   * Whether `value` is a cached prime.
   */
  has(value: number): boolean {
    return binarySearch(this.primes, value) !== -1;
  }

  /**
   * Replace the cache with a longer prefix complete below `completeBelow`.
   * Returns false when the replacement would not grow the cache.
   */
  extend(primes: number[], completeBelow: number): boolean {
    if (primes.length < this.primes.length || completeBelow <= this.watermark) {
      return false;
    }

    this.primes = primes;
    this.watermark = completeBelow;
    this.extensions++;
    return true;
  }

  /**
   * Record whether a lookup was answered from the cache as it stood.
   */
  recordLookup(hit: boolean): void {
    if (hit) {
      this.hits++;
    } else {
      this.misses++;
    }
  }

  /**
   * Get cache statistics.
   */
  getStats(): CacheStats {
    return {
      size: this.primes.length,
      completeBelow: this.watermark,
      largest: this.primes.length > 0 ? this.primes[this.primes.length - 1] : null,
      extensions: this.extensions,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
