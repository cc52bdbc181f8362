import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_MISSING_TOKENS, DEFAULT_TOLERANCE } from './utils/cleaning';
import { LOG_LEVELS, type LogLevel } from './utils/logger';

export interface AppConfig {
  dataDir: string;
  outputFile: string;
  chartsDir: string;
  renderCharts: boolean;
  missingTokens: string[];
  tolerance: number;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Pick<AppConfig, 'dataDir' | 'outputFile' | 'chartsDir' | 'renderCharts'>>;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const envSchema = z.object({
  HOUSING_DATA_DIR: z.string().min(1).default('data'),
  HOUSING_OUTPUT_FILE: z.string().min(1).optional(),
  HOUSING_CHARTS_DIR: z.string().min(1).optional(),
  HOUSING_RENDER_CHARTS: booleanFlag.default('true'),
  // Split on commas without trimming: a blank entry is the empty-string token.
  HOUSING_MISSING_TOKENS: z
    .string()
    .transform((v) => v.split(','))
    .optional(),
  HOUSING_TOLERANCE: z.coerce.number().positive().finite().default(DEFAULT_TOLERANCE),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type EnvInput = z.input<typeof envSchema>;

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.') || 'env',
        message: issue.message,
      })),
    );
  }

  const vars = parsed.data;
  const dataDir = overrides.dataDir ?? vars.HOUSING_DATA_DIR;

  return {
    dataDir,
    outputFile: overrides.outputFile ?? vars.HOUSING_OUTPUT_FILE ?? path.join(dataDir, 'Housing_cleaned.csv'),
    chartsDir: overrides.chartsDir ?? vars.HOUSING_CHARTS_DIR ?? path.join(dataDir, 'charts'),
    renderCharts: overrides.renderCharts ?? vars.HOUSING_RENDER_CHARTS,
    missingTokens: vars.HOUSING_MISSING_TOKENS ?? [...DEFAULT_MISSING_TOKENS],
    tolerance: vars.HOUSING_TOLERANCE,
    logLevel: vars.LOG_LEVEL,
  };
};
