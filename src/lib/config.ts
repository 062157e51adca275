import path from 'node:path';
import type { CalculationOptions, ColormapStyle, Metric } from './types';
import {
  DEFAULT_ANALYSIS_DIR,
  DEFAULT_INPUT_CSV,
  DEFAULT_RENDER_DIR,
  DEFAULT_SHAPE_TEMPLATE,
  DEFAULT_STYLE,
  MAPPING_TABLE_FILE,
  METRICS,
} from './constants';
import { parseColormapStyle } from './palettes';
import { parseMetricList } from './parser';

export interface CalculationConfig extends CalculationOptions {
  inputCsv: string;
  outputDir: string;
  saveColorbar: boolean;
}

export interface RenderConfig {
  csvFile: string;
  svgFile: string;
  outputDir: string;
  skipHeatmap: boolean;
  skipSvg: boolean;
  metrics: Metric[];
}

// Flag values as they come off the command line
export interface RawCalculationFlags {
  'input-csv'?: string;
  'output-dir'?: string;
  'colormap-style'?: string;
  'print-friendly'?: boolean;
  'save-colorbar'?: boolean;
  'no-normalize'?: boolean;
  metrics?: string;
}

export interface RawRenderFlags {
  'csv-file'?: string;
  'svg-file'?: string;
  'output-dir'?: string;
  'skip-heatmap'?: boolean;
  'skip-svg'?: boolean;
  metrics?: string;
}

export function mappingTablePath(outputDir: string): string {
  return path.join(outputDir, MAPPING_TABLE_FILE);
}

export function parseCalculationConfig(flags: RawCalculationFlags): CalculationConfig {
  const style: ColormapStyle = flags['colormap-style']
    ? parseColormapStyle(flags['colormap-style'])
    : DEFAULT_STYLE;

  return {
    inputCsv: flags['input-csv'] ?? DEFAULT_INPUT_CSV,
    outputDir: flags['output-dir'] ?? DEFAULT_ANALYSIS_DIR,
    style,
    printFriendly: flags['print-friendly'] ?? false,
    saveColorbar: flags['save-colorbar'] ?? false,
    normalize: !(flags['no-normalize'] ?? false),
    metrics: flags.metrics ? parseMetricList(flags.metrics) : [...METRICS],
  };
}

export function parseRenderConfig(flags: RawRenderFlags): RenderConfig {
  return {
    csvFile: flags['csv-file'] ?? mappingTablePath(DEFAULT_ANALYSIS_DIR),
    svgFile: flags['svg-file'] ?? DEFAULT_SHAPE_TEMPLATE,
    outputDir: flags['output-dir'] ?? DEFAULT_RENDER_DIR,
    skipHeatmap: flags['skip-heatmap'] ?? false,
    skipSvg: flags['skip-svg'] ?? false,
    metrics: flags.metrics ? parseMetricList(flags.metrics) : [...METRICS],
  };
}
