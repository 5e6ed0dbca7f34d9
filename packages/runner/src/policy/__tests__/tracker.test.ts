import { describe, it, expect, beforeEach, vi } from 'vitest';

import { commitAttempt } from '../../engine/decision.js';
import { InvalidPolicyError } from '../../errors.js';
import { createTestLogger, testX, testXRecord } from '../../__tests__/fixtures.js';
import { FlakyPolicyStore } from '../store.js';
import { FlakyAttributeTracker, testIdentityKey } from '../tracker.js';

describe('FlakyAttributeTracker', () => {
  let store: FlakyPolicyStore;
  let tracker: FlakyAttributeTracker;
  let onPolicyError: ReturnType<typeof vi.fn>;
  const logger = createTestLogger();

  beforeEach(() => {
    store = new FlakyPolicyStore([
      testXRecord,
      { test_name: 'test_bad', class_name: 'pkg', min_passes: 3, max_runs: 2 },
    ]);
    onPolicyError = vi.fn();
    tracker = new FlakyAttributeTracker(store, { logger, onPolicyError });
  });

  it('should initialise attributes from the catalog on first observation', () => {
    const attributes = tracker.observe(testX);

    expect(attributes).toMatchObject({ runs: 0, passes: 0, maxRuns: 3, minPasses: 2 });
    expect(tracker.size).toBe(1);
  });

  it('should reuse attributes without resetting counters', () => {
    const first = tracker.observe(testX);
    expect(first).toBeDefined();
    if (!first) return;

    commitAttempt(first, { testName: 'test_x', outcome: 'passed' });
    const second = tracker.observe(testX);

    expect(second).toBe(first);
    expect(second?.runs).toBe(1);
    expect(second?.passes).toBe(1);
  });

  it('should not track tests missing from the catalog', () => {
    expect(tracker.observe({ testName: 'test_stable', className: 'pkg.TestX' })).toBeUndefined();
    expect(tracker.size).toBe(0);
  });

  it('should not track a catalog name under a non-matching class', () => {
    expect(tracker.observe({ testName: 'test_x', className: 'other.TestZ' })).toBeUndefined();
  });

  it('should track marked tests that the catalog does not list', () => {
    const attributes = tracker.observe({ testName: 'test_marked', className: 'pkg.M' }, { maxRuns: 4 });

    expect(attributes?.maxRuns).toBe(4);
    expect(attributes?.minPasses).toBe(1);
  });

  it('should treat a test with an invalid policy as not flaky and report it once', () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const identity = { testName: 'test_bad', className: 'pkg.Bad' };

    expect(tracker.observe(identity)).toBeUndefined();
    expect(tracker.observe(identity)).toBeUndefined();

    expect(onPolicyError).toHaveBeenCalledTimes(1);
    expect(onPolicyError).toHaveBeenCalledWith(identity, expect.any(InvalidPolicyError));
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should start fresh after release', () => {
    const first = tracker.observe(testX);
    if (!first) throw new Error('expected attributes');
    commitAttempt(first, { testName: 'test_x', outcome: 'passed' });

    expect(tracker.release(testX)).toBe(first);
    expect(tracker.get(testX)).toBeUndefined();

    const next = tracker.observe(testX);
    expect(next).not.toBe(first);
    expect(next?.runs).toBe(0);
  });

  it('should keep parameterised cases apart', () => {
    const a = tracker.observe({ ...testX, parameters: '1' });
    const b = tracker.observe({ ...testX, parameters: '2' });

    expect(a).not.toBe(b);
    expect(tracker.size).toBe(2);
  });
});

describe('testIdentityKey', () => {
  it('should combine class and test name', () => {
    expect(testIdentityKey(testX)).toBe('tests.pkg.TestX::test_x');
  });

  it('should append the parameter signature when present', () => {
    expect(testIdentityKey({ ...testX, parameters: 'a=1,b=2' })).toBe('tests.pkg.TestX::test_x[a=1,b=2]');
  });
});
