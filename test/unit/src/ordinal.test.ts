import {
  compositesUpTo,
  growBound,
  nPrimes,
  nthPrime,
  sieveForCount,
} from '../../../src/ordinal.js';
import { primesUpTo } from '../../../src/sieve.js';
import { PreconditionError } from '../../../src/errors.js';

describe('growBound', () => {
  it('multiplies by the growth factor', () => {
    expect(growBound(100, 2)).toBe(200);
    expect(growBound(3, 1.5)).toBe(5);
  });

  it('always moves forward by at least one', () => {
    expect(growBound(1, 1.1)).toBe(2);
    expect(growBound(0, 2)).toBe(1);
  });
});

describe('sieveForCount', () => {
  it('grows the bound geometrically until enough primes are found', () => {
    const run = sieveForCount(5, [], { initialBound: 10, growthFactor: 2 });
    expect(run.bound).toBe(20);
    expect(run.primes).toEqual([2, 3, 5, 7, 11, 13, 17, 19]);
  });

  it('stops at the initial bound when it already holds enough primes', () => {
    const run = sieveForCount(25, [], { initialBound: 100, growthFactor: 2 });
    expect(run.bound).toBe(100);
    expect(run.primes).toHaveLength(25);
  });

  it('starts one growth step past the covered range', () => {
    const run = sieveForCount(26, primesUpTo(100), { initialBound: 10, growthFactor: 2 }, 100);
    expect(run.bound).toBe(200);
    expect(run.primes).toHaveLength(46);
  });

  it('returns the hint when it is long enough', () => {
    const run = sieveForCount(3, [2, 3, 5, 7]);
    expect(run).toEqual({ primes: [2, 3, 5, 7], bound: 7 });
  });

  it('rejects growth factors that never grow', () => {
    expect(() => sieveForCount(10, [], { growthFactor: 1 })).toThrow(PreconditionError);
    expect(() => sieveForCount(10, [], { growthFactor: 0.5 })).toThrow(
      /growthFactor must be greater than 1/
    );
  });
});

describe('nPrimes', () => {
  it('returns the first n primes', () => {
    expect(nPrimes(5)).toEqual([2, 3, 5, 7, 11]);
    expect(nPrimes(1)).toEqual([2]);
  });

  it('returns an empty list for n = 0', () => {
    expect(nPrimes(0)).toEqual([]);
  });

  it('returns exactly n primes', () => {
    for (const n of [1, 2, 10, 25, 26, 100, 500]) {
      expect(nPrimes(n)).toHaveLength(n);
    }
  });

  it('reuses a long enough hint', () => {
    expect(nPrimes(3, [2, 3, 5, 7, 11])).toEqual([2, 3, 5]);
  });

  it('extends a short hint', () => {
    expect(nPrimes(10, [2, 3, 5])).toEqual([2, 3, 5, 7, 11, 13, 17, 19, 23, 29]);
  });

  it('gives the same answer for any growth policy', () => {
    expect(nPrimes(200, [], { initialBound: 2, growthFactor: 1.3 })).toEqual(nPrimes(200));
  });

  it('rejects negative n', () => {
    expect(() => nPrimes(-1)).toThrow(/n must be non-negative, got -1/);
  });
});

describe('nthPrime', () => {
  it('counts from 1', () => {
    expect(nthPrime(1)).toBe(2);
    expect(nthPrime(2)).toBe(3);
    expect(nthPrime(10)).toBe(29);
  });

  it('finds the 1000th prime', () => {
    expect(nthPrime(1000)).toBe(7919);
  });

  it('matches the last of nPrimes', () => {
    for (const n of [1, 7, 26, 168]) {
      expect(nthPrime(n)).toBe(nPrimes(n)[n - 1]);
    }
  });

  it('uses a hint', () => {
    expect(nthPrime(4, [2, 3, 5, 7, 11])).toBe(7);
  });

  it('rejects n < 1', () => {
    expect(() => nthPrime(0)).toThrow(PreconditionError);
    expect(() => nthPrime(0)).toThrow(/n must be an integer >= 1, got 0/);
    expect(() => nthPrime(2.5)).toThrow(PreconditionError);
  });
});

describe('compositesUpTo', () => {
  it('lists the composites up to 10', () => {
    expect(compositesUpTo(10)).toEqual([4, 6, 8, 9, 10]);
  });

  it('returns an empty list below 4', () => {
    expect(compositesUpTo(0)).toEqual([]);
    expect(compositesUpTo(3)).toEqual([]);
  });

  it('includes 4 at x = 4', () => {
    expect(compositesUpTo(4)).toEqual([4]);
  });

  it('partitions [2, x] together with the primes', () => {
    for (let x = 2; x <= 120; x++) {
      const merged = [...primesUpTo(x), ...compositesUpTo(x)].sort((a, b) => a - b);
      const expected = Array.from({ length: x - 1 }, (_, i) => i + 2);
      expect(merged).toEqual(expected);
    }
  });

  it('uses a hint', () => {
    expect(compositesUpTo(12, [2, 3, 5, 7, 11, 13])).toEqual([4, 6, 8, 9, 10, 12]);
  });

  it('rejects negative x', () => {
    expect(() => compositesUpTo(-5)).toThrow(PreconditionError);
  });
});
