import type { FlakyPolicyRecord, Logger, TestIdentity } from '@flaky-rerun/shared';
import { createLogger } from '@flaky-rerun/shared';

export const CATALOG_BASE_URL = 'https://catalog.test';
export const CATALOG_PATH = '/api/v1/flaky-tests';
export const CATALOG_ENDPOINT = `${CATALOG_BASE_URL}${CATALOG_PATH}`;

export function createTestLogger(): Logger {
  return createLogger('flaky-rerun-test', { level: 'silent', pretty: false });
}

/**
 * Error with a fixed stack so report output can be asserted exactly
 */
export function attemptError(message: string, name = 'Error'): Error {
  const error = new Error(message);
  error.name = name;
  error.stack = `${name}: ${message}\n    at testBody (suite.test.ts:1:1)`;
  return error;
}

/**
 * Test body that plays back a scripted sequence of outcomes, failing with
 * `attempt <n>` on each 'fail'
 */
export function scriptedBody(script: readonly ('pass' | 'fail')[]): { body: () => Promise<void>; calls: () => number } {
  let call = 0;
  return {
    body: async () => {
      const step = script[call] ?? 'fail';
      call++;
      if (step === 'fail') {
        throw attemptError(`attempt ${call}`);
      }
    },
    calls: () => call,
  };
}

export const testX: TestIdentity = { testName: 'test_x', className: 'tests.pkg.TestX' };

export const testXRecord: FlakyPolicyRecord = {
  test_name: 'test_x',
  class_name: 'pkg.TestX',
  min_passes: 2,
  max_runs: 3,
};
