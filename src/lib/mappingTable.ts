import Papa from 'papaparse';
import type { MappingRow, Metric, Scope } from './types';
import { MAPPING_COLUMNS, METRICS } from './constants';
import { ValidationError } from './errors';
import { writeFileAtomic } from './files';
import { compareIds } from './ids';
import { createAggregateRow, createMatrixRow } from './mappingRows';

type MappingColumn = (typeof MAPPING_COLUMNS)[number];
type CsvRecord = Record<MappingColumn, string>;

const rowGroup = (row: MappingRow) => (row.scope === 'matrix' ? row.group : '');

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order rows by (metric, scope, region, group) ascending
 */
export function sortMappingRows(rows: MappingRow[]): MappingRow[] {
  return [...rows].sort(
    (a, b) =>
      compareText(a.metric, b.metric) ||
      compareText(a.scope, b.scope) ||
      compareIds(a.region, b.region) ||
      compareIds(rowGroup(a), rowGroup(b))
  );
}

function toRecord(row: MappingRow): CsvRecord {
  const base = {
    metric: row.metric,
    scope: row.scope,
    region: row.region,
    value: String(row.value),
    color: row.color,
  };

  if (row.scope === 'aggregate') {
    return { ...base, group: '', normalized_value: '', vmin: '', vmax: '' };
  }

  return {
    ...base,
    group: row.group,
    normalized_value: String(row.normalizedValue),
    vmin: String(row.vmin),
    vmax: String(row.vmax),
  };
}

/**
 * Serialize rows to the mapping table CSV.
 * Same rows in, same bytes out: fixed column order, sorted rows, "\n" line
 * endings and no timestamp.
 */
export function serializeMappingTable(rows: MappingRow[]): string {
  const data = sortMappingRows(rows).map(row => {
    const record = toRecord(row);
    return MAPPING_COLUMNS.map(column => record[column]);
  });

  return Papa.unparse({ fields: [...MAPPING_COLUMNS], data }, { newline: '\n' }) + '\n';
}

export async function writeMappingTable(filePath: string, rows: MappingRow[]): Promise<void> {
  await writeFileAtomic(filePath, serializeMappingTable(rows));
}

function parseMetric(raw: string, line: number): Metric {
  const metric = METRICS.find(m => m === raw);
  if (!metric) {
    throw new ValidationError(`Line ${line}: unknown metric "${raw}"`);
  }
  return metric;
}

function parseScope(raw: string, line: number): Scope {
  if (raw === 'aggregate' || raw === 'matrix') return raw;
  throw new ValidationError(`Line ${line}: unknown scope "${raw}"`);
}

function parseField(raw: string | undefined, column: string, line: number): number {
  const trimmed = raw?.trim() ?? '';
  const num = trimmed === '' ? NaN : Number(trimmed);
  if (!Number.isFinite(num)) {
    throw new ValidationError(`Line ${line}: column ${column} is not a number ("${trimmed}")`);
  }
  return num;
}

/**
 * Read a persisted mapping table back into tagged rows.
 * Matrix rows must carry group, normalized_value, vmin and vmax.
 */
export function parseMappingTable(csvText: string): MappingRow[] {
  const result = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: 'greedy',
  });

  const fields = new Set(result.meta.fields ?? []);
  const missing = MAPPING_COLUMNS.filter(c => !fields.has(c));
  if (missing.length > 0) {
    throw new ValidationError(`Mapping table is missing columns: ${missing.join(', ')}`);
  }

  return result.data.map((record, index) => {
    // header is line 1
    const line = index + 2;
    const metric = parseMetric(record.metric?.trim() ?? '', line);
    const scope = parseScope(record.scope?.trim() ?? '', line);
    const region = record.region?.trim() ?? '';
    const color = record.color?.trim() ?? '';
    const value = parseField(record.value, 'value', line);

    if (region === '') {
      throw new ValidationError(`Line ${line}: region is empty`);
    }

    if (scope === 'aggregate') {
      return createAggregateRow(metric, region, value, color);
    }

    return createMatrixRow({
      metric,
      region,
      group: record.group?.trim() ?? '',
      value,
      color,
      normalizedValue: parseField(record.normalized_value, 'normalized_value', line),
      vmin: parseField(record.vmin, 'vmin', line),
      vmax: parseField(record.vmax, 'vmax', line),
    });
  });
}
