// Measured PNN metrics
export type Metric = 'density' | 'diffuseFluo' | 'energy' | 'intensity';

// Mapping row scope: region-level mean or individual slice x region cell
export type Scope = 'aggregate' | 'matrix';

export type ColormapStyle = 'scientific' | 'diverging' | 'grayscale' | 'viridis';

export type PaletteFamily = 'sequential' | 'diverging';

// "#rrggbb"
export type HexColor = string;

// One metric value of one region in one slice, read from the analysis table
export interface ValueRecord {
  metric: Metric;
  region: string;
  group: string;
  value: number;
}

// Normalization range shared by every row with the same (metric, scope)
export interface NormalizationRange {
  metric: Metric;
  scope: Scope;
  family: PaletteFamily;
  vmin: number;
  vmax: number;
}

// Palette resolved for one metric under the active style options
export interface Colormap {
  metric: Metric;
  style: ColormapStyle;
  family: PaletteFamily;
  paletteName: string;
  interpolate: (position: number) => HexColor;
}

// Range plus the palette it is painted with; what the colorbar legend needs
export interface MetricScale {
  range: NormalizationRange;
  colormap: Colormap;
}

interface MappingRowBase {
  metric: Metric;
  region: string;
  value: number;
  color: HexColor;
}

export interface AggregateRow extends MappingRowBase {
  scope: 'aggregate';
}

export interface MatrixRow extends MappingRowBase {
  scope: 'matrix';
  group: string;
  normalizedValue: number;
  vmin: number;
  vmax: number;
}

export type MappingRow = AggregateRow | MatrixRow;

// Matrix cell before coloring
export interface MatrixCell {
  region: string;
  group: string;
  value: number;
}

export interface ColormapOptions {
  style: ColormapStyle;
  printFriendly: boolean;
}

export interface CalculationOptions extends ColormapOptions {
  normalize: boolean;
  metrics: Metric[];
}

export interface CalculationResult {
  rows: MappingRow[];
  scales: MetricScale[];
}

// Parsed analysis table
export interface AnalysisTable {
  records: ValueRecord[];
  regions: string[];
  groups: string[];
  droppedRows: number;
}
