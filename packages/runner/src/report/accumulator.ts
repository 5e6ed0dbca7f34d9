/**
 * Report accumulator
 *
 * Collects one block per flaky-test attempt and writes them as a single
 * report at the end of the run.
 */

import type { AttemptFailure, AttemptOutcome, Logger } from '@flaky-rerun/shared';
import { REPORT_BANNER, REPORT_LIMITS, toLossyAscii, truncateString } from '@flaky-rerun/shared';

import { RerunState } from '../engine/decision.js';

export interface AttemptRecord {
  readonly testName: string;
  readonly attemptNumber: number;
  readonly outcome: AttemptOutcome;
  readonly budgetRemaining: number;
  readonly passes: number;
  readonly minPasses: number;
  readonly maxRuns: number;
  readonly state: RerunState;
  readonly failure?: AttemptFailure;
}

export interface ReportSink {
  write(chunk: string): unknown;
}

export function formatAttempt(record: AttemptRecord): string {
  const prefix = `${record.testName} [attempt ${record.attemptNumber}/${record.maxRuns}]`;

  if (record.outcome === 'passed') {
    const progress = `passed ${record.passes} out of the required ${record.minPasses} times`;
    if (record.state === RerunState.SATISFIED) {
      return `${prefix} ${progress}. Success!`;
    }
    return record.state === RerunState.ATTEMPTING
      ? `${prefix} ${progress}. Running again (${record.budgetRemaining} runs remaining).`
      : `${prefix} ${progress}; no runs remaining.`;
  }

  let headline: string;
  if (record.state === RerunState.ATTEMPTING) {
    headline = `${prefix} failed (${record.budgetRemaining} runs remaining out of ${record.maxRuns}).`;
  } else if (record.budgetRemaining > 0) {
    headline = `${prefix} failed; rerun filter declined a retry, passed ${record.passes} out of the required ${record.minPasses} times.`;
  } else {
    headline = `${prefix} failed; passed ${record.passes} out of the required ${record.minPasses} times.`;
  }

  return record.failure ? [headline, ...formatFailure(record.failure)].join('\n') : headline;
}

function formatFailure(failure: AttemptFailure): string[] {
  const lines = [`\t${failure.errorType}: ${truncateString(failure.errorValue, REPORT_LIMITS.MAX_ERROR_VALUE_LENGTH)}`];
  if (failure.errorTrace) {
    const trace = truncateString(failure.errorTrace, REPORT_LIMITS.MAX_TRACE_LENGTH);
    lines.push(...trace.split('\n').map((line) => `\t\t${line}`));
  }
  return lines;
}

export class ReportAccumulator {
  private readonly entries: string[] = [];
  private written = false;

  constructor(private readonly logger?: Logger) {}

  recordAttempt(record: AttemptRecord): void {
    this.entries.push(formatAttempt(record));
  }

  recordNote(note: string): void {
    this.entries.push(note);
  }

  get length(): number {
    return this.entries.length;
  }

  render(): string {
    const body = this.entries.length > 0 ? this.entries : ['No flaky test attempts recorded.'];
    return [REPORT_BANNER.HEADER, '', ...body, '', REPORT_BANNER.FOOTER].join('\n') + '\n';
  }

  /**
   * Write the report once. A sink that rejects the text gets a lossy ASCII
   * copy instead. Returns false when nothing was written.
   */
  write(sink: ReportSink): boolean {
    if (this.written) {
      return false;
    }
    this.written = true;

    const text = this.render();
    try {
      sink.write(text);
      return true;
    } catch (error) {
      this.logger?.warn({ err: error }, 'Report sink rejected text, retrying with lossy encoding');
    }

    try {
      sink.write(toLossyAscii(text));
      return true;
    } catch (error) {
      this.logger?.error({ err: error }, 'Failed to write flaky test report');
      return false;
    }
  }
}
