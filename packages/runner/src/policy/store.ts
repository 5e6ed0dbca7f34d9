/**
 * Flaky policy store
 *
 * Holds the catalog fetched at startup, keyed by test name, and resolves the
 * thresholds a flaky test runs under.
 */

import type { FlakyPolicyRecord, PolicyOverride } from '@flaky-rerun/shared';

import { InvalidPolicyError } from '../errors.js';

import { BUILT_IN_POLICY_DEFAULTS } from './attributes.js';
import type { FlakyAttributeOptions, FlakyAttributes, PolicyDefaults } from './attributes.js';

/**
 * Throws unless `1 <= minPasses <= maxRuns`, both integers
 */
export function assertValidThresholds(maxRuns: number, minPasses: number): void {
  if (!Number.isInteger(maxRuns) || !Number.isInteger(minPasses)) {
    throw new InvalidPolicyError('max_runs and min_passes must be integers', { maxRuns, minPasses });
  }
  if (minPasses <= 0) {
    throw new InvalidPolicyError('min_passes must be positive', { maxRuns, minPasses });
  }
  if (maxRuns < minPasses) {
    throw new InvalidPolicyError('min_passes cannot be greater than max_runs', { maxRuns, minPasses });
  }
}

/**
 * Fresh attributes for a flaky test. Explicit options win over `defaults`.
 */
export function defaultFlakyAttributes(
  options: FlakyAttributeOptions = {},
  defaults: PolicyDefaults = BUILT_IN_POLICY_DEFAULTS
): FlakyAttributes {
  const maxRuns = options.maxRuns ?? defaults.maxRuns;
  const minPasses = options.minPasses ?? defaults.minPasses;
  assertValidThresholds(maxRuns, minPasses);

  return {
    runs: 0,
    passes: 0,
    halted: false,
    failures: [],
    maxRuns,
    minPasses,
    rerunFilter: options.rerunFilter,
  };
}

export class FlakyPolicyStore {
  private readonly byTestName = new Map<string, FlakyPolicyRecord>();
  readonly defaults: PolicyDefaults;

  constructor(
    records: Iterable<FlakyPolicyRecord> = [],
    defaults: PolicyDefaults = BUILT_IN_POLICY_DEFAULTS
  ) {
    this.defaults = defaults;
    for (const record of records) {
      if (record.test_name) {
        this.byTestName.set(record.test_name, record);
      }
    }
  }

  get size(): number {
    return this.byTestName.size;
  }

  list(): FlakyPolicyRecord[] {
    return [...this.byTestName.values()];
  }

  /**
   * Find the catalog override for a test.
   *
   * The record's class name only has to be contained in `className`, so a
   * catalog entry recorded without the local namespace prefix still matches.
   * This is loose: a short or empty class name matches unrelated classes
   * whose test carries the same name.
   */
  lookup(testName: string, className: string): PolicyOverride | undefined {
    const record = this.byTestName.get(testName);
    if (!record || !className.includes(record.class_name)) {
      return undefined;
    }

    return {
      maxRuns: record.max_runs ?? undefined,
      minPasses: record.min_passes ?? undefined,
    };
  }

  /**
   * Resolve attributes field by field: catalog override, then marker, then defaults
   */
  resolve(override?: PolicyOverride, marker?: FlakyAttributeOptions): FlakyAttributes {
    return defaultFlakyAttributes(
      {
        maxRuns: override?.maxRuns ?? marker?.maxRuns,
        minPasses: override?.minPasses ?? marker?.minPasses,
        rerunFilter: marker?.rerunFilter,
      },
      this.defaults
    );
  }
}
