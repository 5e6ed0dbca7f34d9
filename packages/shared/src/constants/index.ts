export const DEFAULT_FLAKY_POLICY = {
  MAX_RUNS: 2,
  MIN_PASSES: 1,
} as const;

export const CATALOG_API = {
  DEFAULT_URL: 'https://api.flaky-rerun.dev/api/v1/flaky-tests',
  DEFAULT_TIMEOUT_MS: 10000, // 10 seconds
} as const;

export const CI_JOB_PREFIXES = {
  BUILDKITE: 'buildkite/',
  CIRCLECI: 'ci/circleci:',
} as const;

// Tag hosts attach to tests that opt in to reruns without a catalog entry
export const FLAKY_MARKER = 'flaky';

export const REPORT_BANNER = {
  HEADER: '===Flaky Test Report===',
  FOOTER: '===End Flaky Test Report===',
} as const;

export const REPORT_LIMITS = {
  MAX_ERROR_VALUE_LENGTH: 2000,
  MAX_TRACE_LENGTH: 8000,
} as const;
