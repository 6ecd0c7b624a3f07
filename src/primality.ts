/**
 * Primality testing and next-prime search by trial division.
 */

import type { KnownPrimes } from './types.js';
import { binarySearch } from './binary-search.js';
import { PreconditionError } from './errors.js';
import { isqrt } from './validation.js';

/**
 * Returns true if x is a prime number.
 *
 * When `known` reaches x the answer is a binary search. Otherwise x is divided by
 * the known primes up to its square root, then by every odd number above them.
 * This is O(sqrt(x)); use primesUpTo to generate ranges.
 */
export function isPrime(x: number, known: KnownPrimes = []): boolean {
  if (!Number.isInteger(x) || x < 2) {
    return false;
  }

  const largestKnown = known.length > 0 ? known[known.length - 1] : 0;

  if (largestKnown >= x) {
    return binarySearch(known, x) !== -1;
  }

  const root = isqrt(x);

  for (const prime of known) {
    if (prime > root) return true;
    if (x % prime === 0) return false;
  }

  let divisor: number;
  if (largestKnown < 2) {
    if (x % 2 === 0) return x === 2;
    divisor = 3;
  } else {
    // Odd candidates above the known prefix
    divisor = largestKnown + 1 + (largestKnown % 2);
  }

  for (; divisor <= root; divisor += 2) {
    if (x % divisor === 0) return false;
  }

  return true;
}

/**
 * Given a list of primes, returns the smallest prime greater than its last entry.
 *
 * Uses trial division, which is far slower than primesUpTo for generating ranges.
 *
 * @example
 * ```typescript
 * nextPrime([2, 3, 5, 7, 11]); // 13
 * ```
 */
export function nextPrime(known: KnownPrimes): number {
  if (known.length === 0) {
    throw new PreconditionError('nextPrime needs at least one known prime', [
      'Start from [2]',
      'Use nthPrime(1) if you need the first prime',
    ]);
  }

  const largest = known[known.length - 1];
  if (largest === 2) {
    return 3;
  }

  // Bertrand's postulate: a prime exists below 2 * largest
  for (let candidate = largest + 1 + (largest % 2); ; candidate += 2) {
    if (isPrime(candidate, known)) {
      return candidate;
    }
  }
}
