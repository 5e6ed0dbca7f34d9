/**
 * Rerun session
 *
 * Host-facing orchestration for one process run. The host either drives
 * attempts itself through `beforeTest` / `onAttemptComplete`, or hands the
 * test body to `runTest` and lets the session loop.
 */

import type {
  AttemptFailure,
  AttemptOutcome,
  FlakyPolicyRecord,
  Logger,
  TestIdentity,
} from '@flaky-rerun/shared';
import { createLogger } from '@flaky-rerun/shared';
import type { AxiosInstance } from 'axios';
import { ZodError } from 'zod';

import { fetchFlakyCatalog } from '../catalog/fetcher.js';
import { detectCiContext, loadConfig } from '../config/index.js';
import type { RunnerConfig } from '../config/index.js';
import { InvalidPolicyError } from '../errors.js';
import type { FlakyAttributeOptions } from '../policy/attributes.js';
import { assertValidThresholds, FlakyPolicyStore } from '../policy/store.js';
import { FlakyAttributeTracker, testIdentityKey } from '../policy/tracker.js';
import { ReportAccumulator } from '../report/accumulator.js';
import type { ReportSink } from '../report/accumulator.js';

import { commitAttempt, previewAttempt, RerunState } from './decision.js';
import type { AttemptEvaluation } from './decision.js';
import { captureFailure } from './failure.js';

/**
 * Answer to the host after an attempt. `suppressLog` is set for
 * intermediate attempts whose outcome must not reach the normal report.
 */
export interface AttemptDecision {
  readonly rerun: boolean;
  readonly suppressLog: boolean;
  readonly state: RerunState;
}

export interface TestRunResult {
  readonly identity: TestIdentity;
  readonly outcome: AttemptOutcome;
  readonly state: RerunState;
  readonly attempts: number;
  // Most recent thrown value when the reported outcome is a failure
  readonly error?: unknown;
  readonly failure?: AttemptFailure;
}

export type TestBody = () => unknown;

export interface RerunSessionOptions {
  store: FlakyPolicyStore;
  logger?: Logger;
  report?: ReportAccumulator;
}

export interface StartSessionOptions {
  env?: Readonly<Record<string, string | undefined>>;
  logger?: Logger;
  httpClient?: AxiosInstance;
}

interface PendingPreview {
  readonly outcome: AttemptOutcome;
  readonly error: unknown;
  readonly vetoed: boolean;
}

const NOT_FLAKY_DECISION: AttemptDecision = {
  rerun: false,
  suppressLog: false,
  state: RerunState.NOT_FLAKY,
};

export class RerunSession {
  readonly store: FlakyPolicyStore;
  readonly report: ReportAccumulator;
  private readonly tracker: FlakyAttributeTracker;
  private readonly logger: Logger;
  // Filter verdicts from `previewAttempt`, reused by the matching commit
  private readonly previews = new Map<string, PendingPreview>();

  constructor(options: RerunSessionOptions) {
    this.store = options.store;
    this.logger = options.logger ?? createLogger('flaky-rerun');
    this.report = options.report ?? new ReportAccumulator(this.logger);
    this.tracker = new FlakyAttributeTracker(this.store, {
      logger: this.logger,
      onPolicyError: (identity, error) => {
        this.report.recordNote(`${identity.testName} has an invalid rerun policy (${error.message}); ran once.`);
      },
    });
  }

  /**
   * Load configuration, fetch the catalog once and build a session around it.
   * A malformed configuration leaves a session with built-in defaults and no
   * catalog, so only marked tests are rerun.
   */
  static async start(options: StartSessionOptions = {}): Promise<RerunSession> {
    let config: RunnerConfig;
    try {
      config = loadConfig(options.env);
    } catch (error) {
      if (!(error instanceof ZodError)) {
        throw error;
      }
      const logger = options.logger ?? createLogger('flaky-rerun');
      logger.error(
        { err: error, issues: error.issues },
        'Invalid rerun configuration, using built-in defaults without a catalog'
      );
      return new RerunSession({ store: new FlakyPolicyStore([]), logger });
    }

    const logger =
      options.logger ??
      createLogger('flaky-rerun', { level: config.logLevel, pretty: config.env === 'development' });

    try {
      assertValidThresholds(config.defaults.maxRuns, config.defaults.minPasses);
    } catch (error) {
      if (!(error instanceof InvalidPolicyError)) {
        throw error;
      }
      logger.error({ err: error, ...error.context }, 'Default rerun thresholds are invalid, flaky tests will run once');
    }

    const ci = detectCiContext(options.env);
    let records: FlakyPolicyRecord[] = [];
    if (config.catalog.enabled) {
      records = await fetchFlakyCatalog(
        {
          endpoint: config.catalog.endpoint,
          apiToken: config.catalog.apiToken,
          repoName: ci.repoName,
          jobName: ci.jobName,
          timeoutMs: config.catalog.timeoutMs,
        },
        { logger, httpClient: options.httpClient }
      );
    } else {
      logger.info('Flaky test catalog disabled, only marked tests will be rerun');
    }

    const store = new FlakyPolicyStore(records, config.defaults);
    logger.info(
      { catalogSize: store.size, provider: ci.provider, repoName: ci.repoName, jobName: ci.jobName },
      'Rerun session started'
    );
    return new RerunSession({ store, logger });
  }

  /**
   * Call before the first attempt of a test. Returns whether it will be tracked.
   */
  beforeTest(identity: TestIdentity, marker?: FlakyAttributeOptions): boolean {
    return this.tracker.observe(identity, marker) !== undefined;
  }

  /**
   * Decision the next `onAttemptComplete` would return, without recording anything
   */
  previewAttempt(identity: TestIdentity, outcome: AttemptOutcome, error?: unknown): AttemptDecision {
    const attributes = this.tracker.get(identity);
    if (!attributes) {
      return NOT_FLAKY_DECISION;
    }
    const failure = outcome === 'failed' ? captureFailure(error) : undefined;
    const evaluation = previewAttempt(attributes, { testName: identity.testName, outcome, failure });
    this.previews.set(testIdentityKey(identity), { outcome, error, vetoed: evaluation.halted });
    return toDecision(evaluation);
  }

  onAttemptComplete(identity: TestIdentity, outcome: AttemptOutcome, error?: unknown): AttemptDecision {
    const key = testIdentityKey(identity);
    const preview = this.previews.get(key);
    this.previews.delete(key);
    const failure = outcome === 'failed' ? captureFailure(error) : undefined;
    const vetoed = preview && preview.outcome === outcome && preview.error === error ? preview.vetoed : undefined;
    return this.completeAttempt(identity, outcome, failure, vetoed);
  }

  /**
   * Run a test body until its policy stops asking for attempts
   */
  async runTest(identity: TestIdentity, body: TestBody, marker?: FlakyAttributeOptions): Promise<TestRunResult> {
    this.beforeTest(identity, marker);

    let attempts = 0;
    let outcome: AttemptOutcome;
    let lastError: unknown;
    let lastFailure: AttemptFailure | undefined;
    let decision: AttemptDecision;

    do {
      attempts++;
      let failure: AttemptFailure | undefined;
      try {
        await body();
        outcome = 'passed';
      } catch (error) {
        outcome = 'failed';
        failure = captureFailure(error);
        lastError = error;
        lastFailure = failure;
      }
      decision = this.completeAttempt(identity, outcome, failure);
    } while (decision.rerun);

    const reported = reportedOutcome(decision.state, outcome);
    return {
      identity,
      outcome: reported,
      state: decision.state,
      attempts,
      ...(reported === 'failed' ? { error: lastError, failure: lastFailure } : {}),
    };
  }

  renderSummary(): string {
    return this.report.render();
  }

  /**
   * Write the end-of-run report. Later calls are no-ops.
   */
  finish(sink: ReportSink = process.stdout): boolean {
    return this.report.write(sink);
  }

  private completeAttempt(
    identity: TestIdentity,
    outcome: AttemptOutcome,
    failure: AttemptFailure | undefined,
    vetoed?: boolean
  ): AttemptDecision {
    const attributes = this.tracker.get(identity);
    if (!attributes) {
      return NOT_FLAKY_DECISION;
    }

    const evaluation = commitAttempt(attributes, { testName: identity.testName, outcome, failure, vetoed });
    this.report.recordAttempt({
      testName: identity.testName,
      attemptNumber: evaluation.runs,
      outcome,
      budgetRemaining: evaluation.budgetRemaining,
      passes: evaluation.passes,
      minPasses: attributes.minPasses,
      maxRuns: attributes.maxRuns,
      state: evaluation.state,
      failure,
    });
    this.logger.debug(
      {
        testName: identity.testName,
        attempt: evaluation.runs,
        outcome,
        passes: evaluation.passes,
        state: evaluation.state,
      },
      'Flaky test attempt completed'
    );

    if (!evaluation.rerun) {
      this.tracker.release(identity);
    }
    return toDecision(evaluation);
  }
}

function toDecision(evaluation: AttemptEvaluation): AttemptDecision {
  return {
    rerun: evaluation.rerun,
    suppressLog: evaluation.rerun,
    state: evaluation.state,
  };
}

function reportedOutcome(state: RerunState, lastOutcome: AttemptOutcome): AttemptOutcome {
  switch (state) {
    case RerunState.SATISFIED:
      return 'passed';
    case RerunState.EXHAUSTED:
      return 'failed';
    default:
      return lastOutcome;
  }
}
