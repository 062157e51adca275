import type {
  CalculationOptions,
  CalculationResult,
  Colormap,
  MappingRow,
  MetricScale,
  NormalizationRange,
  Scope,
  ValueRecord,
} from './types';
import type { Logger } from './logger';
import { consoleLogger } from './logger';
import { aggregateByRegion, buildAggregateRows } from './aggregation';
import { NormalizationRangeError } from './errors';
import { buildMatrixCells, buildMatrixRows } from './matrix';
import { resolveColormap } from './palettes';
import { computeRange } from './range';
import { sortMappingRows } from './mappingTable';

/**
 * Range for one (metric, scope), or null when there is nothing to normalize.
 * An empty key is a warning, not a failure: the other keys still get rows.
 */
function tryComputeRange(
  colormap: Colormap,
  scope: Scope,
  values: number[],
  options: CalculationOptions,
  logger: Logger
): NormalizationRange | null {
  try {
    return computeRange(colormap.metric, scope, values, colormap.family, {
      normalize: options.normalize,
    });
  } catch (err) {
    if (err instanceof NormalizationRangeError) {
      logger.warn(`[${colormap.metric}] ${err.message}; ${scope} rows omitted`);
      return null;
    }
    throw err;
  }
}

/**
 * Compute every aggregate and matrix row for the requested metrics.
 *
 * Style, print-friendly mode and normalization arrive only through `options`;
 * the same options and records always give the same rows.
 */
export function computeColorMapping(
  records: ValueRecord[],
  options: CalculationOptions,
  logger: Logger = consoleLogger
): CalculationResult {
  const rows: MappingRow[] = [];
  const scales: MetricScale[] = [];

  for (const metric of options.metrics) {
    const colormap = resolveColormap(metric, options);

    const means = aggregateByRegion(records, metric, logger);
    const aggregateRange = tryComputeRange(colormap, 'aggregate', Array.from(means.values()), options, logger);
    if (aggregateRange) {
      rows.push(...buildAggregateRows(means, aggregateRange, colormap));
      scales.push({ range: aggregateRange, colormap });
      logger.info(
        `[${metric}] aggregate: ${means.size} regions, range ${aggregateRange.vmin.toFixed(3)} - ${aggregateRange.vmax.toFixed(3)} (${colormap.paletteName})`
      );
    }

    const cells = buildMatrixCells(records, metric);
    const matrixRange = tryComputeRange(colormap, 'matrix', cells.map(c => c.value), options, logger);
    if (matrixRange) {
      rows.push(...buildMatrixRows(cells, matrixRange, colormap));
      scales.push({ range: matrixRange, colormap });
      logger.info(
        `[${metric}] matrix: ${cells.length} cells, range ${matrixRange.vmin.toFixed(3)} - ${matrixRange.vmax.toFixed(3)}`
      );
    }
  }

  return { rows: sortMappingRows(rows), scales };
}
