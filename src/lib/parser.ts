import Papa from 'papaparse';
import type { AnalysisTable, Metric, ValueRecord } from './types';
import { ID_COLUMNS, METRICS } from './constants';
import { ValidationError } from './errors';
import { canonicalId, sortIds } from './ids';

/**
 * Parse a numeric cell; blank and non-numeric cells are NaN
 */
function parseNumber(raw: string | undefined): number {
  const trimmed = raw?.trim() ?? '';
  if (trimmed === '') return NaN;
  return Number(trimmed);
}

/**
 * Check that the header carries the id columns and every requested metric
 */
function checkColumns(fields: string[], metrics: Metric[]): void {
  const present = new Set(fields.map(f => f.trim()));
  const missing = [...ID_COLUMNS, ...metrics].filter(c => !present.has(c));

  if (missing.length > 0) {
    throw new ValidationError(`Analysis table is missing required columns: ${missing.join(', ')}`);
  }
}

/**
 * Parse the per-slice analysis table (one row per region and slice,
 * one column per metric) into value records.
 *
 * A row is dropped as a whole when its region or group is blank or when any
 * requested metric is not a number.
 */
export function parseAnalysisTable(csvText: string, metrics: Metric[] = METRICS): AnalysisTable {
  const result = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: header => header.trim(),
  });

  checkColumns(result.meta.fields ?? [], metrics);

  const records: ValueRecord[] = [];
  let droppedRows = 0;

  for (const row of result.data) {
    const region = canonicalId(row.region ?? '');
    const group = canonicalId(row.group ?? '');
    const values = metrics.map(metric => ({ metric, value: parseNumber(row[metric]) }));

    if (!region || !group || values.some(v => !Number.isFinite(v.value))) {
      droppedRows++;
      continue;
    }

    for (const { metric, value } of values) {
      records.push({ metric, region, group, value });
    }
  }

  return {
    records,
    regions: sortIds(records.map(r => r.region)),
    groups: sortIds(records.map(r => r.group)),
    droppedRows,
  };
}

/**
 * Parse a comma-separated metric list, e.g. "density,energy"
 */
export function parseMetricList(raw: string): Metric[] {
  const names = raw.split(',').map(s => s.trim()).filter(Boolean);
  const metrics: Metric[] = [];

  for (const name of names) {
    const metric = METRICS.find(m => m === name);
    if (!metric) {
      throw new ValidationError(`Unknown metric "${name}" (expected one of: ${METRICS.join(', ')})`);
    }
    if (!metrics.includes(metric)) metrics.push(metric);
  }

  if (metrics.length === 0) {
    throw new ValidationError('Metric list is empty');
  }

  return metrics;
}
