/**
 * Sorted-slice diff
 * Linear merge over two sorted arrays. Everything that has to be added to or
 * removed from a guide list goes through here.
 */

export type Compare<T> = (a: T, b: T) => number;

function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  throw new TypeError('diffSorted needs a comparator for non-primitive values');
}

/**
 * Elements only in `a` and elements only in `b`. Both inputs must already be
 * sorted by `compare`. Equal elements are consumed pairwise.
 */
export function diffSorted<T>(
  a: readonly T[],
  b: readonly T[],
  compare: Compare<T>,
): [onlyInA: T[], onlyInB: T[]];
export function diffSorted<T extends number | string>(
  a: readonly T[],
  b: readonly T[],
): [onlyInA: T[], onlyInB: T[]];
export function diffSorted<T>(
  a: readonly T[],
  b: readonly T[],
  compare?: Compare<T>,
): [T[], T[]] {
  const cmp: Compare<T> = compare ?? naturalOrder;
  const onlyInA: T[] = [];
  const onlyInB: T[] = [];
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const order = cmp(a[i], b[j]);
    if (order < 0) {
      onlyInA.push(a[i++]);
    } else if (order > 0) {
      onlyInB.push(b[j++]);
    } else {
      i++;
      j++;
    }
  }
  while (i < a.length) onlyInA.push(a[i++]);
  while (j < b.length) onlyInB.push(b[j++]);

  return [onlyInA, onlyInB];
}

export function sorted<T extends number | string>(values: readonly T[]): T[] {
  return [...values].sort(naturalOrder);
}

export function sortedUnique<T extends number | string>(values: readonly T[]): T[] {
  return sorted([...new Set(values)]);
}

/**
 * `[toAdd, toRemove]` to turn `actual` into `expected`. Neither input needs to
 * be sorted.
 */
export function diffUnsorted<T extends number | string>(
  expected: readonly T[],
  actual: readonly T[],
): [toAdd: T[], toRemove: T[]] {
  return diffSorted(sorted(expected), sorted(actual));
}
