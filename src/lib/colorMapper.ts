import type { Colormap, HexColor, NormalizationRange } from './types';
import { clamp } from './statistics';

const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/;

export function isHexColor(value: string): boolean {
  return HEX_COLOR.test(value);
}

/**
 * Position of a value inside its range, clamped to [0, 1].
 * Out-of-range values saturate at the boundary rather than extrapolate.
 */
export function normalizePosition(value: number, range: Pick<NormalizationRange, 'vmin' | 'vmax'>): number {
  return clamp((value - range.vmin) / (range.vmax - range.vmin), 0, 1);
}

/**
 * Map a value to its color. Both scopes go through this one function,
 * each with its own NormalizationRange.
 */
export function mapColor(value: number, range: NormalizationRange, colormap: Colormap): HexColor {
  return colormap.interpolate(normalizePosition(value, range));
}
