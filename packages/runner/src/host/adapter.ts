import type { TestIdentity } from '@flaky-rerun/shared';
import { FLAKY_MARKER } from '@flaky-rerun/shared';

import type { TestBody, RerunSession } from '../engine/session.js';
import type { FlakyAttributeOptions } from '../policy/attributes.js';

export interface FlakyMarker extends FlakyAttributeOptions {
  readonly tag: typeof FLAKY_MARKER;
}

/**
 * Mark a test for reruns even when the catalog does not list it
 */
export function flaky(options: FlakyAttributeOptions = {}): FlakyMarker {
  return { ...options, tag: FLAKY_MARKER };
}

/**
 * Module path without extension, `/` turned into `.`, followed by the
 * enclosing suite names: `src/math/calc.test.ts` + `['Calc']` gives
 * `src.math.calc.test.Calc`.
 */
export function qualifyClassName(modulePath: string, suites: readonly string[] = []): string {
  const modulePart = modulePath
    .replace(/\\/g, '/')
    .replace(/\.[cm]?[jt]sx?$/, '')
    .split('/')
    .filter((segment) => segment.length > 0 && segment !== '.')
    .join('.');

  return [modulePart, ...suites].filter((part) => part.length > 0).join('.');
}

/**
 * Wrap a test body for registration with any runner's `it(name, fn)`.
 * The wrapped function throws the last failure only when the final outcome is failed.
 */
export function wrapTest(
  session: RerunSession,
  identity: TestIdentity,
  body: TestBody,
  marker?: FlakyMarker
): () => Promise<void> {
  return async () => {
    const result = await session.runTest(identity, body, marker);
    if (result.outcome === 'failed') {
      throw result.error;
    }
  };
}
