import { parseArgs } from 'node:util';
import dotenv from 'dotenv';
import { AppError } from './errors';
import { type ConfigOverrides, loadConfig } from './config';
import { logger, setLogLevel } from './utils/logger';
import { runHousingAnalysis } from './services/housingAnalysis';

dotenv.config();

const USAGE = `Usage: housing-clean [options]

  --data-dir <dir>     directory holding Housing.xlsx or Housing.csv (default: data)
  --output <file>      cleaned CSV destination (default: <data-dir>/Housing_cleaned.csv)
  --charts-dir <dir>   chart output directory (default: <data-dir>/charts)
  --no-charts          skip chart rendering
  -h, --help           show this help`;

export const parseCliArgs = (argv: string[]): ConfigOverrides & { help: boolean } => {
  const { values } = parseArgs({
    args: argv,
    options: {
      'data-dir': { type: 'string' },
      output: { type: 'string' },
      'charts-dir': { type: 'string' },
      'no-charts': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  return {
    dataDir: values['data-dir'],
    outputFile: values.output,
    chartsDir: values['charts-dir'],
    renderCharts: values['no-charts'] ? false : undefined,
    help: values.help ?? false,
  };
};

export const main = async (argv: string[]): Promise<number> => {
  try {
    const { help, ...overrides } = parseCliArgs(argv);
    if (help) {
      process.stdout.write(USAGE + '\n');
      return 0;
    }

    const config = loadConfig(process.env, overrides);
    setLogLevel(config.logLevel);
    await runHousingAnalysis(config, { print: (text) => process.stdout.write(text + '\n\n') });
    return 0;
  } catch (err) {
    if (err instanceof AppError) {
      logger.error(err.message, { error: { code: err.code, message: err.message }, details: err.details });
    } else if (err instanceof Error) {
      logger.error(err.message, { error: { message: err.message, stack: err.stack } });
    } else {
      logger.error('Unexpected failure', { error: { message: String(err) } });
    }
    return 1;
  }
};

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${String(err)}\n`);
    process.exitCode = 1;
  },
);
