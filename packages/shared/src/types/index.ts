export type AttemptOutcome = 'passed' | 'failed';

/**
 * Error detail captured from a failed attempt
 */
export interface AttemptFailure {
  readonly errorType: string;
  readonly errorValue: string;
  readonly errorTrace: string;
}

/**
 * Stable identity of one test as seen by the host runner.
 * `className` is the qualified module + suite path, `parameters` the
 * signature of a parameterised case.
 */
export interface TestIdentity {
  readonly testName: string;
  readonly className: string;
  readonly parameters?: string;
}

export interface PolicyOverride {
  readonly maxRuns?: number;
  readonly minPasses?: number;
}
