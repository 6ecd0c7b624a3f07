import { Primes } from '../../../src/primes.js';
import { nPrimes } from '../../../src/ordinal.js';
import { PreconditionError, SequenceIndexError, SliceError } from '../../../src/errors.js';

describe('Primes', () => {
  let primes: Primes;

  beforeEach(() => {
    primes = new Primes({ initialBound: 100, growthFactor: 2 });
  });

  describe('membership', () => {
    it('answers for primes and composites', () => {
      expect(primes.has(11)).toBe(true);
      expect(primes.has(10)).toBe(false);
      expect(primes.has(31)).toBe(true);
    });

    it('sieves exactly up to the queried value', () => {
      expect(primes.has(1009)).toBe(true);
      expect(primes.length).toBe(169);
      expect(primes.getStats()).toMatchObject({ completeBelow: 1010, largest: 1009 });
    });

    it('answers below the watermark without extending', () => {
      primes.has(100);
      primes.has(97);
      primes.has(51);
      expect(primes.getStats()).toMatchObject({ extensions: 1, hits: 2, misses: 1 });
    });

    it('returns false for values that cannot be prime without extending', () => {
      expect(primes.has(1)).toBe(false);
      expect(primes.has(-3)).toBe(false);
      expect(primes.has(7.5)).toBe(false);
      expect(primes.length).toBe(0);
    });
  });

  describe('indexing', () => {
    it('returns the prime at a zero-based index', () => {
      expect(primes.get(0)).toBe(2);
      expect(primes.get(4)).toBe(11);
      expect(primes.get(100)).toBe(547);
    });

    it('grows the cache geometrically', () => {
      primes.get(100);
      expect(primes.getStats()).toEqual({
        size: 139,
        completeBelow: 801,
        largest: 797,
        extensions: 1,
        hits: 0,
        misses: 1,
      });
    });

    it('rejects negative indices', () => {
      expect(() => primes.get(-1)).toThrow(SequenceIndexError);
      expect(() => primes.get(-1)).toThrow(/Index must be non-negative, got -1/);
    });

    it('rejects fractional indices', () => {
      expect(() => primes.get(1.5)).toThrow(/Index must be an integer, got 1.5/);
    });
  });

  describe('slicing', () => {
    it('matches nPrimes for a leading slice', () => {
      expect(primes.slice({ start: 0, stop: 5 })).toEqual(nPrimes(5));
    });

    it('slices a middle range', () => {
      expect(primes.slice({ start: 10, stop: 20 })).toEqual([
        31, 37, 41, 43, 47, 53, 59, 61, 67, 71,
      ]);
    });

    it('steps backward', () => {
      expect(primes.slice({ start: 15, stop: 10, step: -2 })).toEqual([53, 43, 37]);
    });

    it('steps backward to index 0 without a stop', () => {
      expect(primes.slice({ start: 3, step: -1 })).toEqual([7, 5, 3, 2]);
    });

    it('steps forward', () => {
      expect(primes.slice({ stop: 10, step: 3 })).toEqual([2, 7, 17, 29]);
    });

    it('extends the cache to reach the highest index', () => {
      expect(primes.slice({ start: 30, stop: 27, step: -1 })).toEqual([127, 113, 109]);
      expect(primes.length).toBe(46);
    });

    it('returns an empty list for empty ranges without extending', () => {
      expect(primes.slice({ start: 5, stop: 5 })).toEqual([]);
      expect(primes.slice({ start: 2, stop: 5, step: -1 })).toEqual([]);
      expect(primes.length).toBe(0);
    });

    it('rejects a zero step', () => {
      expect(() => primes.slice({ start: 0, stop: 5, step: 0 })).toThrow(SliceError);
      expect(() => primes.slice({ start: 0, stop: 5, step: 0 })).toThrow(
        /slice step cannot be zero/
      );
    });

    it('rejects an unbounded forward slice', () => {
      expect(() => primes.slice({ start: 10 })).toThrow(/slice stop is required/);
    });

    it('rejects a backward slice without a start', () => {
      expect(() => primes.slice({ step: -1 })).toThrow(/slice start is required/);
    });

    it('rejects negative bounds', () => {
      expect(() => primes.slice({ start: 0, stop: -1 })).toThrow(SliceError);
    });
  });

  describe('length', () => {
    it('counts the primes cached so far', () => {
      expect(primes.length).toBe(0);
      primes.get(0);
      expect(primes.length).toBe(25);
    });
  });

  describe('iteration', () => {
    it('iterates over the cached primes', () => {
      const small = new Primes({ initialBound: 10 });
      small.get(3);
      expect([...small]).toEqual([2, 3, 5, 7]);
      expect(small.toArray()).toEqual([2, 3, 5, 7]);
      expect(small.equals([2, 3, 5, 7])).toBe(true);
      expect(small.equals([2, 3, 5])).toBe(false);
    });

    it('streams primes without end', () => {
      const small = new Primes({ initialBound: 10 });
      const seen: number[] = [];
      for (const p of small.stream()) {
        if (seen.length === 12) break;
        seen.push(p);
      }
      expect(seen).toEqual([2, 3, 5, 7, 11, 13, 17, 19, 23, 29, 31, 37]);
    });
  });

  describe('growth policy', () => {
    it('keeps everything sieved by the final pass', () => {
      const small = new Primes({ initialBound: 10, growthFactor: 2 });
      expect(small.get(24)).toBe(97);
      expect(small.getStats()).toMatchObject({ size: 37, completeBelow: 161, extensions: 1 });
    });

    it('rejects growth factors that never grow', () => {
      expect(() => new Primes({ growthFactor: 1 })).toThrow(PreconditionError);
    });
  });
});
