import { parseArgs } from 'node:util';
import { parseCalculationConfig, parseRenderConfig } from '@/lib/config';
import { isFatalError } from '@/lib/errors';
import { consoleLogger, type Logger } from '@/lib/logger';
import { runCalculation } from './calculate';
import { runRender } from './render';

const USAGE = `Usage:
  calculate [--input-csv FILE] [--output-dir DIR] [--colormap-style scientific|diverging|grayscale|viridis]
            [--print-friendly] [--save-colorbar] [--no-normalize] [--metrics a,b]
  render    [--csv-file FILE] [--svg-file FILE] [--output-dir DIR] [--skip-heatmap] [--skip-svg] [--metrics a,b]`;

export async function main(argv: string[], logger: Logger = consoleLogger): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case 'calculate': {
        const { values } = parseArgs({
          args: rest,
          options: {
            'input-csv': { type: 'string' },
            'output-dir': { type: 'string' },
            'colormap-style': { type: 'string' },
            'print-friendly': { type: 'boolean' },
            'save-colorbar': { type: 'boolean' },
            'no-normalize': { type: 'boolean' },
            metrics: { type: 'string' },
          },
        });
        await runCalculation(parseCalculationConfig(values), logger);
        return 0;
      }
      case 'render': {
        const { values } = parseArgs({
          args: rest,
          options: {
            'csv-file': { type: 'string' },
            'svg-file': { type: 'string' },
            'output-dir': { type: 'string' },
            'skip-heatmap': { type: 'boolean' },
            'skip-svg': { type: 'boolean' },
            metrics: { type: 'string' },
          },
        });
        const report = await runRender(parseRenderConfig(values), logger);
        logger.info(`Rendered ${report.written.length} files, skipped ${report.skipped.length}`);
        return 0;
      }
      default:
        logger.error(USAGE);
        return 2;
    }
  } catch (err) {
    if (isFatalError(err)) {
      logger.error(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, '/'))) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
