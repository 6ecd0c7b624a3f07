/**
 * TypeScript types for primeseq
 */

/**
 * Increasing, duplicate-free list of primes starting at 2 with no gaps.
 *
 * Passed as a hint to skip recomputation. The library trusts it and never
 * checks it; a list that breaks these rules gives undefined results.
 */
export type KnownPrimes = readonly number[];

/**
 * Geometric growth policy for repeated sieving.
 */
export interface GrowthOptions {
  /**
   * Factor the bound is multiplied by on each retry (must be > 1)
   * @default 2
   */
  growthFactor?: number;

  /**
   * First bound tried when the hint covers nothing yet
   * @default 100
   */
  initialBound?: number;
}

/**
 * Options for a lazy prime sequence
 */
export type SequenceOptions = GrowthOptions;

/**
 * Outcome of sieving until enough primes were found
 */
export interface SieveRun {
  /** Every prime <= bound */
  primes: number[];
  /** Bound of the final, successful sieve pass */
  bound: number;
}

/**
 * Slice request over the prime sequence. Missing fields take their defaults:
 * step 1, start 0 for forward slices, and "down to index 0" for a backward stop.
 */
export interface SliceRequest {
  start?: number;
  stop?: number;
  step?: number;
}

/**
 * Slice request classified before any primes are generated
 */
export type ResolvedSlice =
  | {
      kind: 'forward';
      start: number;
      stop: number;
      step: number;
      /** Highest index the slice reads */
      maxIndex: number;
    }
  | {
      kind: 'backward';
      start: number;
      /** Exclusive lower index; -1 runs through index 0 */
      stop: number;
      step: number;
      maxIndex: number;
    }
  | { kind: 'empty' }
  | { kind: 'invalid'; reason: string };

/**
 * Prime cache statistics
 */
export interface CacheStats {
  /** Number of primes cached */
  size: number;
  /** Every prime below this value is cached */
  completeBelow: number;
  /** Largest cached prime, or null while the cache is cold */
  largest: number | null;
  /** Times the cache was grown */
  extensions: number;
  /** Lookups answered without growing the cache */
  hits: number;
  /** Lookups that had to grow the cache first */
  misses: number;
}

export type PrimePair = [number, number];
export type PrimeTriplet = [number, number, number];
export type PrimeQuadruplet = [number, number, number, number];
