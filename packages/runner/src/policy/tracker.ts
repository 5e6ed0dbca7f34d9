import type { Logger, TestIdentity } from '@flaky-rerun/shared';

import { InvalidPolicyError } from '../errors.js';

import type { FlakyAttributeOptions, FlakyAttributes } from './attributes.js';
import type { FlakyPolicyStore } from './store.js';

export function testIdentityKey(identity: TestIdentity): string {
  const base = `${identity.className}::${identity.testName}`;
  return identity.parameters === undefined ? base : `${base}[${identity.parameters}]`;
}

export interface FlakyAttributeTrackerOptions {
  logger: Logger;
  onPolicyError?: (identity: TestIdentity, error: InvalidPolicyError) => void;
}

/**
 * Owns the attributes of every test currently inside a rerun loop
 */
export class FlakyAttributeTracker {
  private readonly tracked = new Map<string, FlakyAttributes>();
  // Identities whose policy failed to resolve run once for the rest of the process
  private readonly rejected = new Set<string>();

  constructor(
    private readonly store: FlakyPolicyStore,
    private readonly options: FlakyAttributeTrackerOptions
  ) {}

  /**
   * Attributes for a test, created on first sight. Returns undefined when the
   * test is not flaky or its policy is invalid.
   */
  observe(identity: TestIdentity, marker?: FlakyAttributeOptions): FlakyAttributes | undefined {
    const key = testIdentityKey(identity);
    const existing = this.tracked.get(key);
    if (existing) {
      return existing;
    }
    if (this.rejected.has(key)) {
      return undefined;
    }

    const override = this.store.lookup(identity.testName, identity.className);
    if (!override && !marker) {
      return undefined;
    }

    try {
      const attributes = this.store.resolve(override, marker);
      this.tracked.set(key, attributes);
      this.options.logger.debug(
        {
          testName: identity.testName,
          className: identity.className,
          source: override ? 'catalog' : 'marker',
          maxRuns: attributes.maxRuns,
          minPasses: attributes.minPasses,
        },
        'Tracking flaky test'
      );
      return attributes;
    } catch (error) {
      if (!(error instanceof InvalidPolicyError)) {
        throw error;
      }
      this.rejected.add(key);
      this.options.logger.error(
        { err: error, testName: identity.testName, className: identity.className, ...error.context },
        'Invalid rerun policy, test will run once'
      );
      this.options.onPolicyError?.(identity, error);
      return undefined;
    }
  }

  get(identity: TestIdentity): FlakyAttributes | undefined {
    return this.tracked.get(testIdentityKey(identity));
  }

  release(identity: TestIdentity): FlakyAttributes | undefined {
    const key = testIdentityKey(identity);
    const attributes = this.tracked.get(key);
    this.tracked.delete(key);
    return attributes;
  }

  get size(): number {
    return this.tracked.size;
  }
}
