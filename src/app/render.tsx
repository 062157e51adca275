import path from 'node:path';
import { renderToStaticMarkup } from 'react-dom/server';
import type { ColorStop } from '@/components/Colorbar';
import { Heatmap, heatmapCellKey, type HeatmapCell, type HeatmapLegend } from '@/components/Heatmap';
import type { RenderConfig } from '@/lib/config';
import { METRIC_LABELS, NO_DATA_FILL } from '@/lib/constants';
import { RenderError, ValidationError } from '@/lib/errors';
import { readRequiredFile, writeFileAtomic } from '@/lib/files';
import { sortIds } from '@/lib/ids';
import { consoleLogger, type Logger } from '@/lib/logger';
import { parseMappingTable } from '@/lib/mappingTable';
import { loadShapeTemplate, type ShapeTemplate } from '@/lib/shapeTemplate';
import type { AggregateRow, MappingRow, MatrixRow, Metric } from '@/lib/types';

export interface RenderReport {
  written: string[];
  skipped: { output: string; reason: string }[];
}

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Load the mapping table. Without it there is nothing to paint with, and no
 * other source of colors is tried.
 */
export async function loadMappingTable(csvFile: string): Promise<MappingRow[]> {
  const csvText = await readRequiredFile(
    csvFile,
    'Run the calculation stage first (npm run calculate) to produce the mapping table.'
  );
  return parseMappingTable(csvText);
}

export function regionInfo(metric: Metric, regionIds: string[], fills: ReadonlyMap<string, string>): string {
  const lines = [`Region map: ${metric}`, '='.repeat(50)];
  for (const region of regionIds) {
    lines.push(`Region ${region}: ${fills.get(region) ?? 'no data'}`);
  }
  return lines.join('\n') + '\n';
}

function rowsByMetric<T extends MappingRow>(rows: T[], metrics: Metric[]): Map<Metric, T[]> {
  const byMetric = new Map<Metric, T[]>();
  for (const metric of metrics) {
    const matching = rows.filter(r => r.metric === metric);
    if (matching.length > 0) byMetric.set(metric, matching);
  }
  return byMetric;
}

async function renderRegionMaps(
  rows: AggregateRow[],
  template: ShapeTemplate,
  config: RenderConfig,
  logger: Logger,
  report: RenderReport
): Promise<void> {
  const byMetric = rowsByMetric(rows, config.metrics);
  if (byMetric.size === 0) {
    throw new RenderError('Mapping table has no aggregate rows for the requested metrics; region maps skipped');
  }

  for (const metric of config.metrics) {
    const metricRows = byMetric.get(metric);
    if (!metricRows) {
      logger.warn(`[${metric}] no aggregate rows; region map skipped`);
      report.skipped.push({ output: `colored_regions_${metric}.svg`, reason: 'no aggregate rows' });
      continue;
    }

    const fills = new Map(metricRows.map(r => [r.region, r.color]));
    const unplaced = sortIds(metricRows.map(r => r.region)).filter(r => !template.regionIds.includes(r));
    if (unplaced.length > 0) {
      logger.warn(`[${metric}] regions without a shape in the template: ${unplaced.join(', ')}`);
    }

    const svgPath = path.join(config.outputDir, `colored_regions_${metric}.svg`);
    await writeFileAtomic(svgPath, template.paint(fills, NO_DATA_FILL));
    const infoPath = path.join(config.outputDir, `region_info_${metric}.txt`);
    await writeFileAtomic(infoPath, regionInfo(metric, template.regionIds, fills));

    report.written.push(svgPath, infoPath);
    logger.info(`[${metric}] wrote ${svgPath}`);
  }
}

/**
 * Legend stops straight from the table: one per distinct normalized value
 */
export function legendStops(rows: MatrixRow[]): ColorStop[] {
  const byOffset = new Map<number, string>();
  for (const row of rows) {
    if (!byOffset.has(row.normalizedValue)) byOffset.set(row.normalizedValue, row.color);
  }
  return Array.from(byOffset, ([offset, color]) => ({ offset, color })).sort((a, b) => a.offset - b.offset);
}

/**
 * Heatmap legend spanning only the normalized values present in the rows.
 * The table holds no colors outside them, so the ticks are the data values
 * at the first and last stop rather than the full range; the full palette
 * is in the colorbar the calculation stage writes.
 */
export function heatmapLegend(rows: MatrixRow[]): HeatmapLegend {
  const stops = legendStops(rows);
  if (rows.length === 0 || stops.length === 0) {
    throw new RenderError('No matrix rows to build a legend from');
  }

  const { vmin, vmax } = rows[0];
  const first = stops[0].offset;
  const last = stops[stops.length - 1].offset;
  const span = last - first;
  const valueAt = (offset: number) => vmin + offset * (vmax - vmin);

  return {
    vmin: valueAt(first),
    vmax: valueAt(last),
    stops: stops.map(stop => ({ offset: span > 0 ? (stop.offset - first) / span : 0, color: stop.color })),
  };
}

export function renderHeatmap(metric: Metric, rows: MatrixRow[]): string {
  if (rows.length === 0) {
    throw new RenderError(`No matrix rows for ${metric}`);
  }
  const { vmin, vmax } = rows[0];
  if (rows.some(r => r.vmin !== vmin || r.vmax !== vmax)) {
    throw new ValidationError(`Matrix rows for ${metric} disagree on vmin/vmax`);
  }

  const cells = new Map<string, HeatmapCell>(
    rows.map(r => [heatmapCellKey(r.group, r.region), { color: r.color, value: r.value }])
  );
  const label = METRIC_LABELS[metric];
  const legend = heatmapLegend(rows);

  const markup = renderToStaticMarkup(
    <Heatmap
      id={`heatmap-${metric}`}
      title={`${label} Distribution Heatmap`}
      legendTitle={`${label} Value`}
      groups={sortIds(rows.map(r => r.group))}
      regions={sortIds(rows.map(r => r.region))}
      cells={cells}
      legend={legend}
    />
  );
  return `${XML_DECLARATION}${markup}\n`;
}

async function renderHeatmaps(
  rows: MatrixRow[],
  config: RenderConfig,
  logger: Logger,
  report: RenderReport
): Promise<void> {
  const byMetric = rowsByMetric(rows, config.metrics);
  if (byMetric.size === 0) {
    throw new RenderError('Mapping table has no matrix rows for the requested metrics; heatmaps skipped');
  }

  for (const metric of config.metrics) {
    const metricRows = byMetric.get(metric);
    if (!metricRows) {
      logger.warn(`[${metric}] no matrix rows; heatmap skipped`);
      report.skipped.push({ output: `heatmap_${metric}.svg`, reason: 'no matrix rows' });
      continue;
    }

    const out = path.join(config.outputDir, `heatmap_${metric}.svg`);
    await writeFileAtomic(out, renderHeatmap(metric, metricRows));
    report.written.push(out);
    logger.info(`[${metric}] wrote ${out}`);
  }
}

function skipOnRenderError(err: unknown, output: string, logger: Logger, report: RenderReport): void {
  if (!(err instanceof RenderError)) throw err;
  logger.warn(err.message);
  report.skipped.push({ output, reason: err.message });
}

/**
 * Rendering stage: paints region maps and heatmaps from the mapping table.
 * Colors are used exactly as stored; nothing here computes one.
 */
export async function runRender(config: RenderConfig, logger: Logger = consoleLogger): Promise<RenderReport> {
  const rows = await loadMappingTable(config.csvFile);
  const report: RenderReport = { written: [], skipped: [] };

  if (!config.skipSvg) {
    const aggregateRows = rows.filter((r): r is AggregateRow => r.scope === 'aggregate');
    const template = loadShapeTemplate(
      await readRequiredFile(config.svgFile, 'Point --svg-file at the region shape template.')
    );
    try {
      await renderRegionMaps(aggregateRows, template, config, logger, report);
    } catch (err) {
      skipOnRenderError(err, 'region maps', logger, report);
    }
  }

  if (!config.skipHeatmap) {
    const matrixRows = rows.filter((r): r is MatrixRow => r.scope === 'matrix');
    try {
      await renderHeatmaps(matrixRows, config, logger, report);
    } catch (err) {
      skipOnRenderError(err, 'heatmaps', logger, report);
    }
  }

  return report;
}
