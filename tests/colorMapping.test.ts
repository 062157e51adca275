import { describe, test, expect } from 'vitest';
import { interpolateBuGn, interpolatePurples } from 'd3-scale-chromatic';
import { computeColorMapping } from '@/lib/colorMapping';
import { serializeMappingTable } from '@/lib/mappingTable';
import { toHexColor } from '@/lib/palettes';
import type { CalculationOptions, MatrixRow, ValueRecord } from '@/lib/types';
import { channels, createTestLogger, records } from './helpers';

const scientific: CalculationOptions = {
  style: 'scientific',
  printFriendly: false,
  normalize: true,
  metrics: ['density'],
};

// region 3 varies across four slices; regions 1 and 5 pin the aggregate range to [1, 4]
const densityInput: ValueRecord[] = records('density', [
  ['3', '1', 1],
  ['3', '2', 2],
  ['3', '3', 3],
  ['3', '4', 4],
  ['1', '1', 1],
  ['1', '2', 1],
  ['5', '1', 4],
  ['5', '2', 4],
]);

const mixedInput: ValueRecord[] = [
  ...densityInput,
  ...records('energy', [
    ['1', '1', -0.5],
    ['1', '2', 1.5],
    ['2', '1', 3],
  ]),
  ...records('intensity', [
    ['1', '1', 0.1],
    ['2', '2', 0.9],
  ]),
];

const isMatrix = (row: { scope: string }): row is MatrixRow => row.scope === 'matrix';

describe('computeColorMapping', () => {
  test('region 3 density: aggregate mean at the middle of the range', () => {
    const { rows } = computeColorMapping(densityInput, scientific, createTestLogger());
    const aggregate = rows.find(r => r.scope === 'aggregate' && r.region === '3');

    expect(aggregate).toEqual({
      metric: 'density',
      scope: 'aggregate',
      region: '3',
      value: 2.5,
      color: toHexColor(interpolateBuGn(0.5)),
    });
  });

  test('region 3 density: matrix rows share vmin 1 and vmax 4', () => {
    const { rows } = computeColorMapping(densityInput, scientific, createTestLogger());
    const region3 = rows.filter(isMatrix).filter(r => r.region === '3');

    expect(region3.map(r => r.group)).toEqual(['1', '2', '3', '4']);
    for (const row of region3) {
      expect(row.vmin).toBe(1);
      expect(row.vmax).toBe(4);
    }
    const normalized = region3.map(r => r.normalizedValue);
    expect(normalized[0]).toBe(0);
    expect(normalized[1]).toBeCloseTo(1 / 3, 10);
    expect(normalized[2]).toBeCloseTo(2 / 3, 10);
    expect(normalized[3]).toBe(1);
  });

  test('energy under the diverging style is centred on zero', () => {
    const input = records('energy', [
      ['1', '1', -3],
      ['2', '1', 5],
    ]);
    const { rows, scales } = computeColorMapping(
      input,
      { ...scientific, style: 'diverging', metrics: ['energy'] },
      createTestLogger()
    );

    const matrix = rows.filter(isMatrix);
    expect(matrix.map(r => [r.value, r.vmin, r.vmax, r.normalizedValue])).toEqual([
      [-3, -5, 5, 0.2],
      [5, -5, 5, 1],
    ]);
    expect(scales.map(s => [s.range.scope, s.range.vmin, s.range.vmax])).toEqual([
      ['aggregate', -5, 5],
      ['matrix', -5, 5],
    ]);
  });

  test('one aggregate row per (metric, region) and one matrix row per (metric, region, group)', () => {
    const { rows } = computeColorMapping(
      mixedInput,
      { ...scientific, metrics: ['density', 'energy', 'intensity'] },
      createTestLogger()
    );

    const aggregateKeys = rows.filter(r => r.scope === 'aggregate').map(r => `${r.metric}/${r.region}`);
    expect(aggregateKeys).toEqual(['density/1', 'density/3', 'density/5', 'energy/1', 'energy/2', 'intensity/1', 'intensity/2']);

    const matrixKeys = rows.filter(isMatrix).map(r => `${r.metric}/${r.region}/${r.group}`);
    expect(new Set(matrixKeys).size).toBe(matrixKeys.length);
    expect(matrixKeys).toHaveLength(densityInput.length + 3 + 2);
  });

  test('every color is six-digit hex and every normalized value matches its range', () => {
    const { rows } = computeColorMapping(
      mixedInput,
      { ...scientific, metrics: ['density', 'energy', 'intensity'] },
      createTestLogger()
    );

    for (const row of rows) {
      expect(row.color).toMatch(/^#[0-9A-Fa-f]{6}$/);
    }
    for (const row of rows.filter(isMatrix)) {
      const expected = Math.min(1, Math.max(0, (row.value - row.vmin) / (row.vmax - row.vmin)));
      expect(row.normalizedValue).toBeCloseTo(expected, 12);
    }
  });

  test('diverging matrix ranges are symmetric for every metric', () => {
    const { rows } = computeColorMapping(
      mixedInput,
      { ...scientific, style: 'diverging', metrics: ['density', 'energy', 'intensity'] },
      createTestLogger()
    );
    for (const row of rows.filter(isMatrix)) {
      expect(row.vmax).toBe(-row.vmin);
    }
  });

  test('print-friendly colors are all gray', () => {
    const { rows } = computeColorMapping(
      mixedInput,
      { ...scientific, style: 'viridis', printFriendly: true, metrics: ['density', 'energy', 'intensity'] },
      createTestLogger()
    );
    for (const row of rows) {
      const [r, g, b] = channels(row.color);
      expect([g, b]).toEqual([r, r]);
    }
  });

  test('identical input and options serialize to identical bytes', () => {
    const options: CalculationOptions = { ...scientific, metrics: ['density', 'energy', 'intensity'] };
    const first = serializeMappingTable(computeColorMapping(mixedInput, options, createTestLogger()).rows);
    const second = serializeMappingTable(
      computeColorMapping([...mixedInput].reverse(), options, createTestLogger()).rows
    );
    expect(second).toBe(first);
  });

  test('a metric with no values is skipped with a warning', () => {
    const logger = createTestLogger();
    const { rows, scales } = computeColorMapping(
      densityInput,
      { ...scientific, metrics: ['density', 'energy'] },
      logger
    );

    expect(rows.every(r => r.metric === 'density')).toBe(true);
    expect(scales.map(s => `${s.range.metric}/${s.range.scope}`)).toEqual(['density/aggregate', 'density/matrix']);
    expect(logger.warn).toHaveBeenCalledWith(
      '[energy] No values available to compute the aggregate range for energy; aggregate rows omitted'
    );
    expect(logger.warn).toHaveBeenCalledWith(
      '[energy] No values available to compute the matrix range for energy; matrix rows omitted'
    );
  });

  test('a single large-valued region is painted from the palette', () => {
    const input = records('intensity', [
      ['1', '1', 2e7],
      ['1', '2', 2e7],
    ]);
    const { rows } = computeColorMapping(input, { ...scientific, metrics: ['intensity'] }, createTestLogger());
    const start = toHexColor(interpolatePurples(0));

    expect(rows.map(r => [r.scope, r.region, r.value, r.color])).toEqual([
      ['aggregate', '1', 2e7, start],
      ['matrix', '1', 2e7, start],
      ['matrix', '1', 2e7, start],
    ]);
    expect(start).not.toBe('#000000');
    for (const row of rows.filter(isMatrix)) {
      expect(row.normalizedValue).toBe(0);
      expect(row.vmax).toBeGreaterThan(row.vmin);
    }
  });
});
