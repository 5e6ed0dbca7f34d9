import type { AttemptFailure } from '@flaky-rerun/shared';
import { DEFAULT_FLAKY_POLICY } from '@flaky-rerun/shared';

/**
 * Decides whether a failed attempt is worth another run. Called once per
 * failed attempt, also when the session previewed that attempt first.
 * Returning false ends the loop even when budget remains.
 */
export type RerunFilter = (failure: AttemptFailure, testName: string) => boolean;

/**
 * Per-test counters for one (possibly repeated) execution.
 * Mutated only by `commitAttempt`.
 */
export interface FlakyAttributes {
  runs: number;
  passes: number;
  halted: boolean;
  readonly failures: AttemptFailure[];
  readonly maxRuns: number;
  readonly minPasses: number;
  readonly rerunFilter?: RerunFilter;
}

export interface FlakyAttributeOptions {
  readonly maxRuns?: number;
  readonly minPasses?: number;
  readonly rerunFilter?: RerunFilter;
}

export interface PolicyDefaults {
  readonly maxRuns: number;
  readonly minPasses: number;
}

export const BUILT_IN_POLICY_DEFAULTS: PolicyDefaults = {
  maxRuns: DEFAULT_FLAKY_POLICY.MAX_RUNS,
  minPasses: DEFAULT_FLAKY_POLICY.MIN_PASSES,
};
