import { rgb } from 'd3-color';
import {
  interpolateBuGn,
  interpolateGreys,
  interpolateOrRd,
  interpolatePuBu,
  interpolatePurples,
  interpolateRdBu,
  interpolateViridis,
} from 'd3-scale-chromatic';
import type { Colormap, ColormapOptions, ColormapStyle, HexColor, Metric, PaletteFamily } from './types';
import { COLORMAP_STYLES, METRIC_FAMILY, SCIENTIFIC_PALETTES } from './constants';
import { UnknownStyleError } from './errors';
import { clamp } from './statistics';

type Interpolator = (t: number) => string;

/**
 * Named palettes. Each maps [0, 1] to a CSS color string.
 * RdBu runs red to blue, so it is reversed: negative values blue, positive red.
 */
const PALETTES: Record<string, Interpolator> = {
  BuGn: interpolateBuGn,
  PuBu: interpolatePuBu,
  OrRd: interpolateOrRd,
  Purples: interpolatePurples,
  Greys: interpolateGreys,
  Viridis: interpolateViridis,
  RdBu_r: t => interpolateRdBu(1 - t),
};

export function isColormapStyle(name: string): name is ColormapStyle {
  return COLORMAP_STYLES.some(style => style === name);
}

/**
 * Validate a requested style name
 */
export function parseColormapStyle(name: string): ColormapStyle {
  const trimmed = name.trim();
  if (!isColormapStyle(trimmed)) {
    throw new UnknownStyleError(name, COLORMAP_STYLES);
  }
  return trimmed;
}

/**
 * Palette family the style implies for a metric.
 * Only the family decides whether the range is symmetric around zero.
 */
export function paletteFamily(style: ColormapStyle, metric: Metric): PaletteFamily {
  switch (style) {
    case 'diverging':
      return 'diverging';
    case 'scientific':
      return METRIC_FAMILY[metric];
    case 'grayscale':
    case 'viridis':
      return 'sequential';
  }
}

function paletteName(style: ColormapStyle, metric: Metric): string {
  switch (style) {
    case 'scientific':
      return METRIC_FAMILY[metric] === 'diverging' ? 'RdBu_r' : SCIENTIFIC_PALETTES[metric];
    case 'diverging':
      return 'RdBu_r';
    case 'grayscale':
      return 'Greys';
    case 'viridis':
      return 'Viridis';
  }
}

/**
 * Hex form of any CSS color the palettes produce
 */
export function toHexColor(cssColor: string): HexColor {
  return rgb(cssColor).formatHex();
}

/**
 * Resolve the palette for a metric.
 *
 * Print-friendly output swaps the palette for Greys on every metric but keeps
 * the family of the requested style, so normalized positions do not change
 * between the color and print versions of a figure.
 */
export function resolveColormap(metric: Metric, options: ColormapOptions): Colormap {
  const family = paletteFamily(options.style, metric);
  const style: ColormapStyle = options.printFriendly ? 'grayscale' : options.style;
  const name = options.printFriendly ? 'Greys' : paletteName(options.style, metric);
  const palette = PALETTES[name];

  return {
    metric,
    style,
    family,
    paletteName: name,
    interpolate: position => toHexColor(palette(clamp(position, 0, 1))),
  };
}
