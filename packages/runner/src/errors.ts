export type FlakyRerunErrorCode = 'INVALID_POLICY' | 'CATALOG_FETCH_FAILED' | 'LOOP_FINISHED';

export class FlakyRerunError extends Error {
  public readonly code: FlakyRerunErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: FlakyRerunErrorCode,
    message: string,
    options?: {
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FlakyRerunError';
    this.code = code;
    this.context = options?.context;
  }
}

/**
 * Resolved thresholds break `1 <= minPasses <= maxRuns`
 */
export class InvalidPolicyError extends FlakyRerunError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INVALID_POLICY', message, { context });
    this.name = 'InvalidPolicyError';
  }
}

/**
 * Catalog request failed in transport, status or body shape.
 * Never escapes the fetcher; it is logged and the catalog degrades to empty.
 */
export class CatalogFetchError extends FlakyRerunError {
  public readonly statusCode?: number;

  constructor(
    message: string,
    options?: {
      statusCode?: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super('CATALOG_FETCH_FAILED', message, options);
    this.name = 'CatalogFetchError';
    this.statusCode = options?.statusCode;
  }
}
