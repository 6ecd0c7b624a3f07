/**
 * primeseq - prime generation, primality testing and a lazy prime sequence
 */

export { Primes } from './primes.js';
export { PrimeCache } from './cache.js';
export { primesUpTo } from './sieve.js';
export { isPrime, nextPrime } from './primality.js';
export { nPrimes, nthPrime, compositesUpTo, growBound, sieveForCount } from './ordinal.js';
export {
  primesWithDifferenceUpTo,
  twinPrimesUpTo,
  cousinPrimesUpTo,
  sexyPrimesUpTo,
  primeTripletsUpTo,
  primeQuadrupletsUpTo,
} from './constellations.js';
export { resolveSlice } from './slice.js';
export { binarySearch, bisectLeft, bisectRight } from './binary-search.js';
export { loadConfig } from './config.js';
export type { Config } from './config.js';
export type {
  KnownPrimes,
  GrowthOptions,
  SequenceOptions,
  SieveRun,
  SliceRequest,
  ResolvedSlice,
  CacheStats,
  PrimePair,
  PrimeTriplet,
  PrimeQuadruplet,
} from './types.js';
export {
  PreconditionError,
  SequenceIndexError,
  SliceError,
  ConfigError,
} from './errors.js';
