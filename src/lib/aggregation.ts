import type { AggregateRow, Colormap, Metric, NormalizationRange, ValueRecord } from './types';
import type { Logger } from './logger';
import { mapColor } from './colorMapper';
import { sortIds } from './ids';
import { createAggregateRow } from './mappingRows';
import { calculateMean, groupValues } from './statistics';

/**
 * Mean of every slice's value per region for one metric.
 * Regions without a finite contribution are logged and left out.
 */
export function aggregateByRegion(
  records: ValueRecord[],
  metric: Metric,
  logger?: Logger
): Map<string, number> {
  const byRegion = groupValues(
    records.filter(r => r.metric === metric),
    r => r.region,
    r => r.value
  );

  const means = new Map<string, number>();
  for (const region of sortIds(byRegion.keys())) {
    const values = (byRegion.get(region) ?? []).filter(v => Number.isFinite(v));
    if (values.length === 0) {
      logger?.warn(`[${metric}] region ${region} has no values; skipping its aggregate row`);
      continue;
    }
    means.set(region, calculateMean(values));
  }

  return means;
}

export function buildAggregateRows(
  means: Map<string, number>,
  range: NormalizationRange,
  colormap: Colormap
): AggregateRow[] {
  return sortIds(means.keys()).map(region => {
    const value = means.get(region) ?? NaN;
    return createAggregateRow(range.metric, region, value, mapColor(value, range, colormap));
  });
}
