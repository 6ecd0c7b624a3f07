/**
 * Ordinal queries: the first n primes, the nth prime, composites up to x.
 *
 * Where the nth prime lies has no closed form, so these sieve to a bound and
 * grow it geometrically until enough primes turn up. Each retry reuses the
 * primes found so far as the sieve's hint.
 */

import type { GrowthOptions, KnownPrimes, SieveRun } from './types.js';
import { config } from './config.js';
import { primesUpTo } from './sieve.js';
import {
  requireGrowthFactor,
  requireNonNegativeInteger,
  requirePositiveInteger,
} from './validation.js';

/**
 * Next bound under the growth policy. Always strictly larger than `bound`.
 */
export function growBound(bound: number, factor: number = config.PRIMES_GROWTH_FACTOR): number {
  return Math.max(bound + 1, Math.ceil(bound * factor));
}

/**
 * Sieve until at least `n` primes are known.
 *
 * `coveredUpTo` is the largest value `known` is complete for; it defaults to
 * the last known prime. The first bound tried is the larger of the initial
 * bound and one growth step past it.
 */
export function sieveForCount(
  n: number,
  known: KnownPrimes = [],
  options: GrowthOptions = {},
  coveredUpTo: number = known.length > 0 ? known[known.length - 1] : 1
): SieveRun {
  requireNonNegativeInteger(n, 'n');
  const factor = requireGrowthFactor(options.growthFactor ?? config.PRIMES_GROWTH_FACTOR);
  const initialBound = options.initialBound ?? config.PRIMES_INITIAL_BOUND;

  if (known.length >= n) {
    return { primes: known.slice(), bound: coveredUpTo };
  }

  let bound = Math.max(initialBound, growBound(coveredUpTo, factor));
  let primes = primesUpTo(bound, known);

  while (primes.length < n) {
    bound = growBound(bound, factor);
    primes = primesUpTo(bound, primes);
  }

  return { primes, bound };
}

/**
 * Returns a list of the first n primes.
 *
 * @example
 * ```typescript
 * nPrimes(5); // [2, 3, 5, 7, 11]
 * ```
 */
export function nPrimes(n: number, known: KnownPrimes = [], options: GrowthOptions = {}): number[] {
  requireNonNegativeInteger(n, 'n');

  if (known.length >= n) {
    return known.slice(0, n);
  }

  return sieveForCount(n, known, options).primes.slice(0, n);
}

/**
 * Returns the nth prime, counting from nthPrime(1) = 2.
 *
 * @example
 * ```typescript
 * nthPrime(1000); // 7919
 * ```
 */
export function nthPrime(n: number, known: KnownPrimes = [], options: GrowthOptions = {}): number {
  requirePositiveInteger(n, 'n');
  return nPrimes(n, known, options)[n - 1];
}

/**
 * Returns every composite number (non-prime greater than 1) up to and including x.
 */
export function compositesUpTo(x: number, known: KnownPrimes = []): number[] {
  requireNonNegativeInteger(x, 'x');

  if (x < 4) {
    return [];
  }

  const primes = primesUpTo(x, known);
  const composites: number[] = [];
  let next = 0;

  for (let num = 4; num <= x; num++) {
    while (next < primes.length && primes[next] < num) next++;
    if (next < primes.length && primes[next] === num) continue;
    composites.push(num);
  }

  return composites;
}
