/**
 * Lazy prime sequence - list-like access to the infinite ordered set of primes.
 */

import type { CacheStats, GrowthOptions, SequenceOptions, SliceRequest } from './types.js';
import { PrimeCache } from './cache.js';
import { config } from './config.js';
import { SequenceIndexError, SliceError } from './errors.js';
import { sieveForCount } from './ordinal.js';
import { primesUpTo } from './sieve.js';
import { resolveSlice, sliceIndices } from './slice.js';
import { logger } from './utils/logger.js';
import { requireGrowthFactor } from './validation.js';

/**
 * List-like object over all primes that supports indexing, slicing and
 * membership checks, generating new primes when needed.
 *
 * `length` is the number of primes generated so far, not the size of the
 * (infinite) sequence.
 *
 * @example
 * ```typescript
 * const primes = new Primes();
 *
 * primes.has(31); // true
 * primes.get(100); // 547
 * primes.slice({ start: 10, stop: 15 }); // [31, 37, 41, 43, 47]
 * primes.slice({ start: 15, stop: 10, step: -2 }); // [53, 43, 37]
 * ```
 */
export class Primes implements Iterable<number> {
  private cache = new PrimeCache();
  private growth: Required<GrowthOptions>;

  constructor(options: SequenceOptions = {}) {
    this.growth = {
      growthFactor: requireGrowthFactor(options.growthFactor ?? config.PRIMES_GROWTH_FACTOR),
      initialBound: options.initialBound ?? config.PRIMES_INITIAL_BOUND,
    };
  }

  /**
   * Number of primes generated so far.
   */
  get length(): number {
    return this.cache.size;
  }

  /**
   * Check if a number is prime, sieving up to it if it lies past the cache.
   */
  has(value: number): boolean {
    if (!Number.isInteger(value) || value < 2) {
      return false;
    }

    const hit = value < this.cache.completeBelow;
    this.cache.recordLookup(hit);
    if (!hit) {
      this.extendToValue(value);
    }

    return this.cache.has(value);
  }

  /**
   * Prime at a zero-based index; get(0) is 2.
   */
  get(index: number): number {
    if (!Number.isInteger(index) || index < 0) {
      throw new SequenceIndexError(
        Number.isInteger(index)
          ? `Index must be non-negative, got ${index}`
          : `Index must be an integer, got ${index}`,
        index
      );
    }

    this.ensureCount(index + 1);
    return this.cache.values[index];
  }

  /**
   * Primes at the indices selected by a slice request.
   *
   * @throws SliceError for a zero step, a forward slice without a stop, a
   * backward slice without a start, or a negative start/stop
   */
  slice(request: SliceRequest): number[] {
    const resolved = resolveSlice(request);

    switch (resolved.kind) {
      case 'invalid':
        throw new SliceError(resolved.reason);
      case 'empty':
        return [];
      case 'forward':
      case 'backward':
        this.ensureCount(resolved.maxIndex + 1);
        break;
    }

    const values = this.cache.values;
    return Array.from(sliceIndices(resolved), i => values[i]);
  }

  /**
   * Yields every prime in order, without end, growing the cache as it goes.
   */
  *stream(): Generator<number> {
    for (let index = 0; ; index++) {
      yield this.get(index);
    }
  }

  /**
   * Iterate through the primes generated so far.
   */
  [Symbol.iterator](): Iterator<number> {
    return this.cache.values[Symbol.iterator]();
  }

  /**
   * Copy of the primes generated so far.
   */
  toArray(): number[] {
    return this.cache.values.slice();
  }

  /**
   * Check the generated primes against a list.
   */
  equals(other: readonly number[]): boolean {
    const values = this.cache.values;
    return values.length === other.length && values.every((p, i) => p === other[i]);
  }

  /**
   * Get cache statistics.
   */
  getStats(): CacheStats {
    return this.cache.getStats();
  }

  private ensureCount(count: number): void {
    const hit = count <= this.cache.size;
    this.cache.recordLookup(hit);
    if (hit) {
      return;
    }

    const run = sieveForCount(
      count,
      this.cache.values,
      this.growth,
      this.cache.completeBelow - 1
    );
    this.commit(run.primes, run.bound, count);
  }

  private extendToValue(value: number): void {
    this.commit(primesUpTo(value, this.cache.values), value, value);
  }

  private commit(primes: number[], bound: number, target: number): void {
    if (this.cache.extend(primes, bound + 1)) {
      logger.debug(
        { target, size: this.cache.size, completeBelow: this.cache.completeBelow },
        'Extended prime cache'
      );
    }
  }
}
