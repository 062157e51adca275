import { describe, test, expect } from 'vitest';
import { interpolateBuGn, interpolatePurples } from 'd3-scale-chromatic';
import { paletteFamily, parseColormapStyle, resolveColormap, toHexColor } from '@/lib/palettes';
import { UnknownStyleError, ValidationError } from '@/lib/errors';
import { METRICS } from '@/lib/constants';
import { channels } from './helpers';

describe('colormap style registry', () => {
  test('scientific style uses the per-metric sequential palette', () => {
    const density = resolveColormap('density', { style: 'scientific', printFriendly: false });
    expect(density.paletteName).toBe('BuGn');
    expect(density.family).toBe('sequential');
    expect(density.interpolate(0.5)).toBe(toHexColor(interpolateBuGn(0.5)));

    const intensity = resolveColormap('intensity', { style: 'scientific', printFriendly: false });
    expect(intensity.paletteName).toBe('Purples');
    expect(intensity.interpolate(0.25)).toBe(toHexColor(interpolatePurples(0.25)));
  });

  test('viridis endpoints', () => {
    const cmap = resolveColormap('energy', { style: 'viridis', printFriendly: false });
    expect(cmap.interpolate(0)).toBe('#440154');
    expect(cmap.interpolate(1)).toBe('#fde725');
  });

  test('grayscale runs from white to black', () => {
    const cmap = resolveColormap('density', { style: 'grayscale', printFriendly: false });
    expect(cmap.interpolate(0)).toBe('#ffffff');
    expect(cmap.interpolate(1)).toBe('#000000');
  });

  test('positions outside [0, 1] saturate', () => {
    const cmap = resolveColormap('density', { style: 'viridis', printFriendly: false });
    expect(cmap.interpolate(-2)).toBe('#440154');
    expect(cmap.interpolate(7)).toBe('#fde725');
  });

  test('diverging style is diverging for every metric', () => {
    for (const metric of METRICS) {
      expect(paletteFamily('diverging', metric)).toBe('diverging');
      expect(resolveColormap(metric, { style: 'diverging', printFriendly: false }).paletteName).toBe('RdBu_r');
    }
  });

  test('diverging palette is blue below zero and red above', () => {
    const cmap = resolveColormap('energy', { style: 'diverging', printFriendly: false });
    const [lowR, , lowB] = channels(cmap.interpolate(0));
    const [highR, , highB] = channels(cmap.interpolate(1));
    expect(lowB).toBeGreaterThan(lowR);
    expect(highR).toBeGreaterThan(highB);
  });

  test('print-friendly overrides every style with gray but keeps the range family', () => {
    const cmap = resolveColormap('energy', { style: 'diverging', printFriendly: true });
    expect(cmap.style).toBe('grayscale');
    expect(cmap.paletteName).toBe('Greys');
    expect(cmap.family).toBe('diverging');

    for (let i = 0; i <= 20; i++) {
      const [r, g, b] = channels(cmap.interpolate(i / 20));
      expect(g).toBe(r);
      expect(b).toBe(r);
    }
  });

  test('unknown style names are rejected', () => {
    expect(() => parseColormapStyle('plasma')).toThrow(UnknownStyleError);
    expect(() => parseColormapStyle('plasma')).toThrow(ValidationError);
    expect(() => parseColormapStyle('plasma')).toThrow(
      'Unknown colormap style "plasma" (expected one of: scientific, diverging, grayscale, viridis)'
    );
    expect(parseColormapStyle(' viridis ')).toBe('viridis');
  });
});
