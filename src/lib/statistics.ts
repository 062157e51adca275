/**
 * Statistical utilities for per-region aggregation and range computation
 */

/**
 * Arithmetic mean; NaN for an empty list
 */
export function calculateMean(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Smallest and largest value; null for an empty list
 */
export function extent(values: number[]): { min: number; max: number } | null {
  if (values.length === 0) return null;

  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }

  return { min, max };
}

/**
 * Largest absolute value; null for an empty list
 */
export function maxAbs(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((acc, v) => Math.max(acc, Math.abs(v)), 0);
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Group values by key, keeping first-seen key order
 */
export function groupValues<T>(
  items: T[],
  keyOf: (item: T) => string,
  valueOf: (item: T) => number
): Map<string, number[]> {
  const groups = new Map<string, number[]>();

  for (const item of items) {
    const key = keyOf(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(valueOf(item));
    } else {
      groups.set(key, [valueOf(item)]);
    }
  }

  return groups;
}
