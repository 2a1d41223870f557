/**
 * Divide-and-conquer minimum/maximum search
 */

export interface MinMax {
  min: number;
  max: number;
}

/**
 * Finds the smallest and largest value in O(n) comparisons,
 * splitting the range in halves and combining the results.
 */
export function findMinMax(values: readonly number[]): MinMax {
  if (values.length === 0) {
    throw new Error('Cannot find min/max of an empty array');
  }
  return search(values, 0, values.length - 1);
}

function search(values: readonly number[], left: number, right: number): MinMax {
  if (left === right) {
    return { min: values[left], max: values[left] };
  }

  // Pairs resolve with a single comparison
  if (right === left + 1) {
    return values[left] < values[right]
      ? { min: values[left], max: values[right] }
      : { min: values[right], max: values[left] };
  }

  const mid = Math.floor((left + right) / 2);
  const lower = search(values, left, mid);
  const upper = search(values, mid + 1, right);

  return {
    min: Math.min(lower.min, upper.min),
    max: Math.max(lower.max, upper.max),
  };
}
