/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'warn' }
  ),

  // Report
  SALES_RESULTS_PATH: Type.String({ minLength: 1, default: 'SalesResults.txt' }),
  SALES_REPORT_MODE: Type.Union([Type.Literal('detailed'), Type.Literal('summary')], {
    default: 'detailed',
  }),
  CURRENCY_SYMBOL: Type.String({ default: '$' }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'warn',
    SALES_RESULTS_PATH: env['SALES_RESULTS_PATH'] ?? 'SalesResults.txt',
    SALES_REPORT_MODE: env['SALES_REPORT_MODE'] ?? 'detailed',
    CURRENCY_SYMBOL: env['CURRENCY_SYMBOL'] ?? '$',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  report: {
    /** Output artifact, overwritten on every run */
    resultsPath: env.SALES_RESULTS_PATH,
    mode: env.SALES_REPORT_MODE,
    currencySymbol: env.CURRENCY_SYMBOL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
