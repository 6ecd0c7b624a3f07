/**
 * Binary search over sorted numeric lists.
 */

/**
 * First position at which x could be inserted keeping `list` sorted
 * (before any existing entries equal to x).
 */
export function bisectLeft(
  list: readonly number[],
  x: number,
  lo = 0,
  hi = list.length
): number {
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (list[mid] < x) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Last position at which x could be inserted keeping `list` sorted
 * (after any existing entries equal to x).
 */
export function bisectRight(
  list: readonly number[],
  x: number,
  lo = 0,
  hi = list.length
): number {
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (x < list[mid]) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

/**
 * Index of x in the sorted `list`, or -1 if absent.
 */
export function binarySearch(
  list: readonly number[],
  x: number,
  lo = 0,
  hi = list.length
): number {
  const pos = bisectLeft(list, x, lo, hi);
  return pos !== hi && list[pos] === x ? pos : -1;
}
