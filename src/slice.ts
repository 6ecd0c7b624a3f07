/**
 * Slice resolution for the unbounded prime sequence.
 *
 * A request is classified before any primes are generated. Forward slices need a
 * stop, since the sequence never ends; backward slices need a start, since it has
 * no last element to count down from.
 */

import type { ResolvedSlice, SliceRequest } from './types.js';

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Classify a slice request as forward, backward, empty or invalid.
 *
 * @example
 * ```typescript
 * resolveSlice({ start: 15, stop: 10, step: -2 });
 * // { kind: 'backward', start: 15, stop: 10, step: -2, maxIndex: 15 }
 * ```
 */
export function resolveSlice(request: SliceRequest): ResolvedSlice {
  const step = request.step ?? 1;

  if (!Number.isInteger(step)) {
    return { kind: 'invalid', reason: `slice step must be an integer, got ${step}` };
  }
  if (step === 0) {
    return { kind: 'invalid', reason: 'slice step cannot be zero' };
  }

  for (const [name, value] of [
    ['start', request.start],
    ['stop', request.stop],
  ] as const) {
    if (value !== undefined && !isIndex(value)) {
      return {
        kind: 'invalid',
        reason: `slice ${name} must be a non-negative integer, got ${value}`,
      };
    }
  }

  if (step > 0) {
    if (request.stop === undefined) {
      return {
        kind: 'invalid',
        reason: 'slice stop is required when step is positive (the sequence is infinite)',
      };
    }

    const start = request.start ?? 0;
    const stop = request.stop;
    if (start >= stop) {
      return { kind: 'empty' };
    }

    const maxIndex = start + Math.floor((stop - 1 - start) / step) * step;
    return { kind: 'forward', start, stop, step, maxIndex };
  }

  if (request.start === undefined) {
    return {
      kind: 'invalid',
      reason: 'slice start is required when step is negative (the sequence has no last element)',
    };
  }

  const start = request.start;
  const stop = request.stop ?? -1;
  if (stop >= start) {
    return { kind: 'empty' };
  }

  return { kind: 'backward', start, stop, step, maxIndex: start };
}

/**
 * Indices a resolved slice reads, in output order
 */
export function* sliceIndices(slice: ResolvedSlice): Generator<number> {
  switch (slice.kind) {
    case 'forward':
      for (let i = slice.start; i < slice.stop; i += slice.step) yield i;
      break;
    case 'backward':
      for (let i = slice.start; i > slice.stop; i += slice.step) yield i;
      break;
    case 'empty':
    case 'invalid':
      break;
  }
}
