import type { Metric, PaletteFamily, NormalizationRange, Scope } from './types';
import { RANGE_EPSILON } from './constants';
import { NormalizationRangeError } from './errors';
import { extent, maxAbs } from './statistics';

export interface RangeOptions {
  // false: values are already on the unit scale and the range is fixed
  normalize: boolean;
}

/**
 * Upper bound for a zero-width range; strictly above `value` at any magnitude
 */
export function widenAbove(value: number): number {
  return value + Math.max(RANGE_EPSILON, Math.abs(value) * Number.EPSILON * 4);
}

/**
 * Compute the normalization range for one (metric, scope).
 *
 * Sequential: literal min and max of the values. Diverging: symmetric around
 * zero at the largest absolute value, whatever the skew of the data.
 * A zero-width range is widened by RANGE_EPSILON, or by a few ulps of the
 * value where RANGE_EPSILON would round away.
 *
 * @throws NormalizationRangeError when there are no values
 */
export function computeRange(
  metric: Metric,
  scope: Scope,
  values: number[],
  family: PaletteFamily,
  options: RangeOptions = { normalize: true }
): NormalizationRange {
  const finite = values.filter(v => Number.isFinite(v));
  if (finite.length === 0) {
    throw new NormalizationRangeError(metric, scope);
  }

  if (!options.normalize) {
    return family === 'diverging'
      ? { metric, scope, family, vmin: -1, vmax: 1 }
      : { metric, scope, family, vmin: 0, vmax: 1 };
  }

  if (family === 'diverging') {
    // finite is non-empty, so maxAbs is a number
    const bound = maxAbs(finite) ?? 0;
    const vmax = bound === 0 ? RANGE_EPSILON : bound;
    return { metric, scope, family, vmin: -vmax, vmax };
  }

  const bounds = extent(finite) ?? { min: 0, max: 0 };
  const vmax = bounds.max === bounds.min ? widenAbove(bounds.min) : bounds.max;
  return { metric, scope, family, vmin: bounds.min, vmax };
}
