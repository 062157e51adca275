import type { Colormap, MatrixCell, MatrixRow, Metric, NormalizationRange, ValueRecord } from './types';
import { mapColor, normalizePosition } from './colorMapper';
import { compareIds } from './ids';
import { createMatrixRow } from './mappingRows';
import { calculateMean } from './statistics';

const cellKey = (group: string, region: string) => `${group}\u0000${region}`;

/**
 * One cell per (group, region) present in the input for a metric.
 * Repeated measurements of the same region in the same slice are averaged;
 * pairs that never occur are not filled in.
 */
export function buildMatrixCells(records: ValueRecord[], metric: Metric): MatrixCell[] {
  const buckets = new Map<string, { group: string; region: string; values: number[] }>();

  for (const record of records) {
    if (record.metric !== metric || !Number.isFinite(record.value)) continue;

    const key = cellKey(record.group, record.region);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.values.push(record.value);
    } else {
      buckets.set(key, { group: record.group, region: record.region, values: [record.value] });
    }
  }

  return Array.from(buckets.values())
    .map(b => ({ group: b.group, region: b.region, value: calculateMean(b.values) }))
    .sort((a, b) => compareIds(a.region, b.region) || compareIds(a.group, b.group));
}

export function buildMatrixRows(
  cells: MatrixCell[],
  range: NormalizationRange,
  colormap: Colormap
): MatrixRow[] {
  return cells.map(cell =>
    createMatrixRow({
      metric: range.metric,
      region: cell.region,
      group: cell.group,
      value: cell.value,
      color: mapColor(cell.value, range, colormap),
      normalizedValue: normalizePosition(cell.value, range),
      vmin: range.vmin,
      vmax: range.vmax,
    })
  );
}
