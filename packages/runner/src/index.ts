export { RerunSession } from './engine/session.js';
export type {
  AttemptDecision,
  RerunSessionOptions,
  StartSessionOptions,
  TestBody,
  TestRunResult,
} from './engine/session.js';
export {
  RerunState,
  classifyState,
  commitAttempt,
  previewAttempt,
  shouldRerun,
} from './engine/decision.js';
export type { AttemptEvaluation, AttemptInput } from './engine/decision.js';
export { captureFailure } from './engine/failure.js';

export { FlakyPolicyStore, assertValidThresholds, defaultFlakyAttributes } from './policy/store.js';
export { FlakyAttributeTracker, testIdentityKey } from './policy/tracker.js';
export { BUILT_IN_POLICY_DEFAULTS } from './policy/attributes.js';
export type {
  FlakyAttributeOptions,
  FlakyAttributes,
  PolicyDefaults,
  RerunFilter,
} from './policy/attributes.js';

export { ReportAccumulator, formatAttempt } from './report/accumulator.js';
export type { AttemptRecord, ReportSink } from './report/accumulator.js';

export { fetchFlakyCatalog } from './catalog/fetcher.js';
export type { CatalogFetcherOptions, CatalogRequest } from './catalog/fetcher.js';

export { loadConfig, detectCiContext } from './config/index.js';
export type { CatalogConfig, CiContext, CiProvider, RunnerConfig } from './config/index.js';

export { FlakyRerunError, InvalidPolicyError, CatalogFetchError } from './errors.js';
export type { FlakyRerunErrorCode } from './errors.js';

export { FLAKY_MARKER } from '@flaky-rerun/shared';
export { flaky, qualifyClassName, wrapTest } from './host/adapter.js';
export type { FlakyMarker } from './host/adapter.js';
