import { CATALOG_API, DEFAULT_FLAKY_POLICY, LOG_LEVELS } from '@flaky-rerun/shared';
import { z } from 'zod';

// Blank counts as unset
const unlessBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === '' ? undefined : val), schema);

const envSchema = z.object({
  // Host-owned; unknown values fall back
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production').catch('production'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info').catch('info'),
  // Catalog API
  FLAKY_RERUN_API_URL: unlessBlank(z.string().url().default(CATALOG_API.DEFAULT_URL)),
  FLAKY_RERUN_API_TOKEN: z.string().default(''),
  FLAKY_RERUN_ENABLED: z.string().transform((val) => val !== 'false').default('true'),
  FLAKY_RERUN_TIMEOUT_MS: unlessBlank(
    z.string().transform(Number).pipe(z.number().int().positive()).default(String(CATALOG_API.DEFAULT_TIMEOUT_MS))
  ),
  // Process-wide thresholds, used when neither catalog nor marker sets one
  FLAKY_RERUN_DEFAULT_MAX_RUNS: unlessBlank(
    z.string().transform(Number).pipe(z.number().int()).default(String(DEFAULT_FLAKY_POLICY.MAX_RUNS))
  ),
  FLAKY_RERUN_DEFAULT_MIN_PASSES: unlessBlank(
    z.string().transform(Number).pipe(z.number().int()).default(String(DEFAULT_FLAKY_POLICY.MIN_PASSES))
  ),
});

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Parse runner configuration from the environment.
 * Blank variables take their default. Throws a ZodError when one of the
 * FLAKY_RERUN_* variables is present but malformed.
 */
export function loadConfig(env: Environment = process.env) {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    catalog: {
      enabled: parsed.FLAKY_RERUN_ENABLED,
      endpoint: parsed.FLAKY_RERUN_API_URL,
      apiToken: parsed.FLAKY_RERUN_API_TOKEN,
      timeoutMs: parsed.FLAKY_RERUN_TIMEOUT_MS,
    },
    defaults: {
      maxRuns: parsed.FLAKY_RERUN_DEFAULT_MAX_RUNS,
      minPasses: parsed.FLAKY_RERUN_DEFAULT_MIN_PASSES,
    },
  } as const;
}

export type RunnerConfig = ReturnType<typeof loadConfig>;
export type CatalogConfig = RunnerConfig['catalog'];

export { detectCiContext } from './ci-environment.js';
export type { CiContext, CiProvider } from './ci-environment.js';
