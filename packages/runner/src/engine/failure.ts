import type { AttemptFailure } from '@flaky-rerun/shared';

/**
 * Capture type, value and stack of whatever a test body threw
 */
export function captureFailure(error: unknown): AttemptFailure {
  if (error instanceof Error) {
    return {
      errorType: error.name,
      errorValue: error.message,
      errorTrace: error.stack ?? '',
    };
  }

  return {
    errorType: error === null ? 'null' : typeof error,
    errorValue: describeThrownValue(error),
    errorTrace: '',
  };
}

function describeThrownValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    try {
      return String(value);
    } catch {
      return '[unprintable value]';
    }
  }
}
