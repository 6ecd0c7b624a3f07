/**
 * Argument validation and helpful error messages
 */

import { PreconditionError } from './errors.js';

/**
 * Validate that a bound, count or value is a non-negative integer
 */
export function requireNonNegativeInteger(value: number, name: string): number {
  if (!Number.isInteger(value)) {
    throw new PreconditionError(`${name} must be an integer, got ${value}`, [
      `Round ${name} first (e.g., Math.floor(${name}))`,
    ]);
  }

  if (value < 0) {
    throw new PreconditionError(`${name} must be non-negative, got ${value}`, [
      `Use ${name} >= 0`,
    ]);
  }

  return value;
}

/**
 * Validate that a value is an integer >= 1
 */
export function requirePositiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new PreconditionError(`${name} must be an integer >= 1, got ${value}`, [
      `Use ${name} >= 1 (the first prime is nthPrime(1) = 2)`,
    ]);
  }

  return value;
}

/**
 * Validate a growth factor; anything <= 1 would never reach a larger bound
 */
export function requireGrowthFactor(value: number): number {
  if (!Number.isFinite(value) || value <= 1) {
    throw new PreconditionError(`growthFactor must be greater than 1, got ${value}`, [
      'Use the default growth factor of 2',
    ]);
  }

  return value;
}

/**
 * Largest integer r with r * r <= n
 */
export function isqrt(n: number): number {
  let root = Math.floor(Math.sqrt(n));
  // Math.sqrt can be off by one for large doubles
  while (root * root > n) root--;
  while ((root + 1) * (root + 1) <= n) root++;
  return root;
}
