import path from 'node:path';
import type { CalculationResult } from '@/lib/types';
import type { CalculationConfig } from '@/lib/config';
import { mappingTablePath } from '@/lib/config';
import { computeColorMapping } from '@/lib/colorMapping';
import { readRequiredFile, writeFileAtomic } from '@/lib/files';
import { consoleLogger, type Logger } from '@/lib/logger';
import { writeMappingTable } from '@/lib/mappingTable';
import { parseAnalysisTable } from '@/lib/parser';
import { colorbarFileName, renderColorbar } from './colorbar';

export interface CalculationReport extends CalculationResult {
  tablePath: string;
  colorbarPaths: string[];
}

/**
 * Calculation stage: analysis table in, mapping table (and optional
 * colorbars) out. The whole table is recomputed on every run.
 */
export async function runCalculation(
  config: CalculationConfig,
  logger: Logger = consoleLogger
): Promise<CalculationReport> {
  const csvText = await readRequiredFile(
    config.inputCsv,
    'Point --input-csv at the per-slice analysis table produced by the preprocessing step.'
  );

  const table = parseAnalysisTable(csvText, config.metrics);
  if (table.droppedRows > 0) {
    logger.warn(`Dropped ${table.droppedRows} rows with a missing id or a non-numeric metric`);
  }
  logger.info(`Loaded ${table.records.length} values: ${table.regions.length} regions, ${table.groups.length} slices`);

  const result = computeColorMapping(table.records, config, logger);

  const tablePath = mappingTablePath(config.outputDir);
  await writeMappingTable(tablePath, result.rows);
  logger.info(`Wrote ${result.rows.length} rows to ${tablePath}`);

  const colorbarPaths: string[] = [];
  if (config.saveColorbar) {
    for (const scale of result.scales) {
      const out = path.join(config.outputDir, colorbarFileName(scale));
      await writeFileAtomic(out, renderColorbar(scale));
      colorbarPaths.push(out);
      logger.info(`Wrote ${out}`);
    }
  }

  return { ...result, tablePath, colorbarPaths };
}
