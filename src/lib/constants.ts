import type { ColormapStyle, Metric, PaletteFamily } from './types';

// Recognized metrics, in report order
export const METRICS: Metric[] = ['density', 'diffuseFluo', 'energy', 'intensity'];

export const COLORMAP_STYLES: ColormapStyle[] = ['scientific', 'diverging', 'grayscale', 'viridis'];

export const DEFAULT_STYLE: ColormapStyle = 'scientific';

// Identifier columns every analysis table must carry next to its metric columns
export const ID_COLUMNS = ['region', 'group'] as const;

// Every recognized metric is a non-negative measurement
export const METRIC_FAMILY: Record<Metric, PaletteFamily> = {
  density: 'sequential',
  diffuseFluo: 'sequential',
  energy: 'sequential',
  intensity: 'sequential',
};

// Sequential palette per metric under the scientific style
export const SCIENTIFIC_PALETTES: Record<Metric, string> = {
  density: 'BuGn',
  diffuseFluo: 'PuBu',
  energy: 'OrRd',
  intensity: 'Purples',
};

export const METRIC_LABELS: Record<Metric, string> = {
  density: 'Density',
  diffuseFluo: 'Diffuse Fluorescence',
  energy: 'Energy',
  intensity: 'Intensity',
};

// Keeps a degenerate range from dividing by zero
export const RANGE_EPSILON = 1e-9;

// Fill for regions and cells that have no row in the mapping table
export const NO_DATA_FILL = '#d3d3d3';

// Persisted mapping table columns, in file order
export const MAPPING_COLUMNS = [
  'metric',
  'scope',
  'region',
  'group',
  'value',
  'color',
  'normalized_value',
  'vmin',
  'vmax',
] as const;

export const MAPPING_TABLE_FILE = 'region_color_mapping.csv';

export const DEFAULT_INPUT_CSV = 'analysisData/dataFrameForBrainRender.csv';
export const DEFAULT_ANALYSIS_DIR = 'analysisData';
export const DEFAULT_SHAPE_TEMPLATE = 'originData/spinalCord_regions.svg';
export const DEFAULT_RENDER_DIR = 'output/regionPlot';

// Samples taken from a palette when drawing a colorbar gradient
export const COLORBAR_STOPS = 11;
