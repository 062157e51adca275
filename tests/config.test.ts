import path from 'node:path';
import { describe, test, expect } from 'vitest';
import { mappingTablePath, parseCalculationConfig, parseRenderConfig } from '@/lib/config';
import { UnknownStyleError, ValidationError } from '@/lib/errors';

describe('parseCalculationConfig', () => {
  test('defaults', () => {
    expect(parseCalculationConfig({})).toEqual({
      inputCsv: 'analysisData/dataFrameForBrainRender.csv',
      outputDir: 'analysisData',
      style: 'scientific',
      printFriendly: false,
      saveColorbar: false,
      normalize: true,
      metrics: ['density', 'diffuseFluo', 'energy', 'intensity'],
    });
  });

  test('flags override defaults', () => {
    const config = parseCalculationConfig({
      'input-csv': 'in.csv',
      'output-dir': 'out',
      'colormap-style': 'diverging',
      'print-friendly': true,
      'save-colorbar': true,
      'no-normalize': true,
      metrics: 'energy',
    });
    expect(config).toMatchObject({
      inputCsv: 'in.csv',
      outputDir: 'out',
      style: 'diverging',
      printFriendly: true,
      saveColorbar: true,
      normalize: false,
      metrics: ['energy'],
    });
  });

  test('unknown style names fail', () => {
    expect(() => parseCalculationConfig({ 'colormap-style': 'jet' })).toThrow(UnknownStyleError);
  });

  test('unknown metrics fail', () => {
    expect(() => parseCalculationConfig({ metrics: 'volume' })).toThrow(ValidationError);
  });
});

describe('parseRenderConfig', () => {
  test('defaults point at the calculation stage output', () => {
    expect(parseRenderConfig({})).toEqual({
      csvFile: path.join('analysisData', 'region_color_mapping.csv'),
      svgFile: 'originData/spinalCord_regions.svg',
      outputDir: 'output/regionPlot',
      skipHeatmap: false,
      skipSvg: false,
      metrics: ['density', 'diffuseFluo', 'energy', 'intensity'],
    });
  });

  test('skip flags and overrides', () => {
    expect(
      parseRenderConfig({ 'csv-file': 't.csv', 'skip-heatmap': true, 'skip-svg': true, metrics: 'intensity' })
    ).toMatchObject({ csvFile: 't.csv', skipHeatmap: true, skipSvg: true, metrics: ['intensity'] });
  });

  test('mapping table path', () => {
    expect(mappingTablePath('out')).toBe(path.join('out', 'region_color_mapping.csv'));
  });
});
