/**
 * Prime constellations: pairs, triplets and quadruplets of primes a fixed distance apart.
 */

import type {
  KnownPrimes,
  PrimePair,
  PrimeQuadruplet,
  PrimeTriplet,
} from './types.js';
import { binarySearch } from './binary-search.js';
import { PreconditionError } from './errors.js';
import { primesUpTo } from './sieve.js';
import { requireNonNegativeInteger } from './validation.js';

/**
 * Pairs [p, p + difference] of primes with p + difference <= x
 */
export function primesWithDifferenceUpTo(
  x: number,
  difference: number,
  known: KnownPrimes = []
): PrimePair[] {
  requireNonNegativeInteger(x, 'x');
  if (!Number.isInteger(difference) || difference < 1) {
    throw new PreconditionError(`difference must be an integer >= 1, got ${difference}`, [
      'Use 2 for twin primes, 4 for cousin primes, 6 for sexy primes',
    ]);
  }

  const primes = primesUpTo(x, known);
  const pairs: PrimePair[] = [];

  for (const p of primes) {
    if (p + difference > x) break;
    if (binarySearch(primes, p + difference) !== -1) {
      pairs.push([p, p + difference]);
    }
  }

  return pairs;
}

/**
 * Primes with difference 2 up to x
 */
export function twinPrimesUpTo(x: number, known: KnownPrimes = []): PrimePair[] {
  return primesWithDifferenceUpTo(x, 2, known);
}

/**
 * Primes with difference 4 up to x
 */
export function cousinPrimesUpTo(x: number, known: KnownPrimes = []): PrimePair[] {
  return primesWithDifferenceUpTo(x, 4, known);
}

/**
 * Primes with difference 6 up to x
 */
export function sexyPrimesUpTo(x: number, known: KnownPrimes = []): PrimePair[] {
  return primesWithDifferenceUpTo(x, 6, known);
}

/**
 * Prime triplets up to x, in both shapes (p, p+2, p+6) and (p, p+4, p+6)
 */
export function primeTripletsUpTo(x: number, known: KnownPrimes = []): PrimeTriplet[] {
  requireNonNegativeInteger(x, 'x');

  const primes = primesUpTo(x, known);
  const has = (n: number) => binarySearch(primes, n) !== -1;
  const triplets: PrimeTriplet[] = [];

  for (const p of primes) {
    if (p + 6 > x) break;
    if (!has(p + 6)) continue;
    if (has(p + 2)) triplets.push([p, p + 2, p + 6]);
    if (has(p + 4)) triplets.push([p, p + 4, p + 6]);
  }

  return triplets;
}

/**
 * Prime quadruplets (p, p+2, p+6, p+8) up to x
 */
export function primeQuadrupletsUpTo(x: number, known: KnownPrimes = []): PrimeQuadruplet[] {
  requireNonNegativeInteger(x, 'x');

  const primes = primesUpTo(x, known);
  const has = (n: number) => binarySearch(primes, n) !== -1;
  const quadruplets: PrimeQuadruplet[] = [];

  for (const p of primes) {
    if (p + 8 > x) break;
    if (has(p + 2) && has(p + 6) && has(p + 8)) {
      quadruplets.push([p, p + 2, p + 6, p + 8]);
    }
  }

  return quadruplets;
}
