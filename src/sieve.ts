/**
 * Sieve of Eratosthenes
 */

import type { KnownPrimes } from './types.js';
import { bisectRight } from './binary-search.js';
import { isqrt, requireNonNegativeInteger } from './validation.js';

/**
 * Returns every prime up to and including `bound`, in increasing order.
 *
 * `known` seeds the sieve: only the segment above its largest prime is sieved,
 * and its primes below the square root of `bound` strike their multiples there
 * instead of being rediscovered. The output never depends on the hint.
 *
 * @example
 * ```typescript
 * primesUpTo(10); // [2, 3, 5, 7]
 * primesUpTo(30, [2, 3, 5, 7]); // [2, 3, 5, 7, 11, 13, 17, 19, 23, 29]
 * ```
 */
export function primesUpTo(bound: number, known: KnownPrimes = []): number[] {
  requireNonNegativeInteger(bound, 'bound');

  if (bound < 2) {
    return [];
  }

  const largestKnown = known.length > 0 ? known[known.length - 1] : 1;

  // Enough primes were passed in already
  if (largestKnown >= bound) {
    return known.slice(0, bisectRight(known, bound));
  }

  // Segment [low, bound]; marked[i] != 0 means low + i is composite
  const low = largestKnown + 1;
  const marked = new Uint8Array(bound - low + 1);
  const root = isqrt(bound);

  const strike = (prime: number): void => {
    const firstMultiple = Math.ceil(low / prime) * prime;
    // Multiples below the square already have a smaller factor
    for (let m = Math.max(prime * prime, firstMultiple); m <= bound; m += prime) {
      marked[m - low] = 1;
    }
  };

  for (const prime of known) {
    if (prime > root) break;
    strike(prime);
  }

  // Unmarked values up to the root have no smaller factor, so they are new sieving primes
  for (let num = low; num <= root; num++) {
    if (marked[num - low] === 0) {
      strike(num);
    }
  }

  const primes = known.slice();
  for (let num = low; num <= bound; num++) {
    if (marked[num - low] === 0) {
      primes.push(num);
    }
  }

  return primes;
}
