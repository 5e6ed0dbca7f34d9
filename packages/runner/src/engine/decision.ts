/**
 * Rerun decision engine
 *
 * After every attempt:
 *   runs'   = runs + 1
 *   passes' = passes + (passed ? 1 : 0)
 *   rerun   = runs' < maxRuns && passes' < minPasses
 *
 * `previewAttempt` and `commitAttempt` share `evaluateAttempt`, so a preview
 * always predicts the commit that follows it.
 */

import type { AttemptFailure, AttemptOutcome } from '@flaky-rerun/shared';

import { FlakyRerunError } from '../errors.js';
import type { FlakyAttributes } from '../policy/attributes.js';

export enum RerunState {
  NOT_FLAKY = 'not_flaky',
  ATTEMPTING = 'attempting',
  SATISFIED = 'satisfied',
  EXHAUSTED = 'exhausted',
}

export interface AttemptInput {
  readonly testName: string;
  readonly outcome: AttemptOutcome;
  readonly failure?: AttemptFailure;
  // Filter verdict already taken for this attempt; the filter is not called again
  readonly vetoed?: boolean;
}

export interface AttemptEvaluation {
  readonly runs: number;
  readonly passes: number;
  readonly halted: boolean;
  readonly rerun: boolean;
  readonly state: RerunState;
  readonly budgetRemaining: number;
}

export function shouldRerun(runs: number, maxRuns: number, passes: number, minPasses: number): boolean {
  return runs < maxRuns && passes < minPasses;
}

function stateOf(runs: number, passes: number, maxRuns: number, minPasses: number, halted: boolean): RerunState {
  if (passes >= minPasses) {
    return RerunState.SATISFIED;
  }
  if (runs >= maxRuns || halted) {
    return RerunState.EXHAUSTED;
  }
  return RerunState.ATTEMPTING;
}

export function classifyState(attributes?: Readonly<FlakyAttributes>): RerunState {
  if (!attributes) {
    return RerunState.NOT_FLAKY;
  }
  return stateOf(attributes.runs, attributes.passes, attributes.maxRuns, attributes.minPasses, attributes.halted);
}

function evaluateAttempt(attributes: Readonly<FlakyAttributes>, input: AttemptInput): AttemptEvaluation {
  const runs = attributes.runs + 1;
  const passes = attributes.passes + (input.outcome === 'passed' ? 1 : 0);
  const vetoed =
    input.outcome === 'failed' &&
    (input.vetoed ??
      (input.failure !== undefined &&
        attributes.rerunFilter !== undefined &&
        !attributes.rerunFilter(input.failure, input.testName)));
  const halted = attributes.halted || vetoed;

  return {
    runs,
    passes,
    halted,
    rerun: !halted && shouldRerun(runs, attributes.maxRuns, passes, attributes.minPasses),
    state: stateOf(runs, passes, attributes.maxRuns, attributes.minPasses, halted),
    budgetRemaining: Math.max(attributes.maxRuns - runs, 0),
  };
}

/**
 * Decision the next commit would produce, without touching the counters
 */
export function previewAttempt(attributes: Readonly<FlakyAttributes>, input: AttemptInput): AttemptEvaluation {
  assertAttempting(attributes);
  return evaluateAttempt(attributes, input);
}

/**
 * Record a completed attempt and return the resulting decision
 */
export function commitAttempt(attributes: FlakyAttributes, input: AttemptInput): AttemptEvaluation {
  assertAttempting(attributes);
  const evaluation = evaluateAttempt(attributes, input);

  attributes.runs = evaluation.runs;
  attributes.passes = evaluation.passes;
  attributes.halted = evaluation.halted;
  if (input.outcome === 'failed' && input.failure) {
    attributes.failures.push(input.failure);
  }

  return evaluation;
}

function assertAttempting(attributes: Readonly<FlakyAttributes>): void {
  const state = classifyState(attributes);
  if (state !== RerunState.ATTEMPTING) {
    throw new FlakyRerunError('LOOP_FINISHED', `No further attempts allowed once a rerun loop is ${state}`, {
      context: { state, runs: attributes.runs, passes: attributes.passes },
    });
  }
}
