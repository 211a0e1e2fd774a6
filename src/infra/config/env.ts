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
    { default: 'info' }
  ),

  // Input files
  FARS_DATA_DIR: Type.String({ default: '.', minLength: 1 }),

  // Plot output
  FARS_PLOT_OUTPUT: Type.String({ default: 'state-map.svg', minLength: 1 }),
  FARS_PLOT_WIDTH: Type.Integer({ default: 800, minimum: 100, maximum: 10000 }),
  FARS_PLOT_HEIGHT: Type.Integer({ default: 600, minimum: 100, maximum: 10000 }),
});

export type Env = Static<typeof EnvSchema>;

const parseOptionalInt = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    FARS_DATA_DIR: env['FARS_DATA_DIR'] ?? '.',
    FARS_PLOT_OUTPUT: env['FARS_PLOT_OUTPUT'] ?? 'state-map.svg',
    FARS_PLOT_WIDTH: parseOptionalInt(env['FARS_PLOT_WIDTH'], 800),
    FARS_PLOT_HEIGHT: parseOptionalInt(env['FARS_PLOT_HEIGHT'], 600),
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
  data: {
    dir: env.FARS_DATA_DIR,
  },
  plot: {
    output: env.FARS_PLOT_OUTPUT,
    width: env.FARS_PLOT_WIDTH,
    height: env.FARS_PLOT_HEIGHT,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
