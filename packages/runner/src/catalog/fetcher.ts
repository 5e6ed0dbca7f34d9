/**
 * Catalog fetcher
 *
 * One GET against the flaky-test catalog API at startup. Every failure
 * degrades to an empty catalog so ordinary test execution is never blocked.
 */

import type { FlakyPolicyRecord, Logger } from '@flaky-rerun/shared';
import {
  CATALOG_API,
  flakyCatalogResponseSchema,
  flakyPolicyRecordSchema,
  logger as defaultLogger,
} from '@flaky-rerun/shared';
import axios from 'axios';
import type { AxiosInstance } from 'axios';

import { CatalogFetchError } from '../errors.js';

export interface CatalogRequest {
  readonly endpoint: string;
  readonly apiToken: string;
  readonly repoName?: string;
  readonly jobName?: string;
  readonly timeoutMs?: number;
}

export interface CatalogFetcherOptions {
  readonly logger?: Logger;
  readonly httpClient?: AxiosInstance;
}

export async function fetchFlakyCatalog(
  request: CatalogRequest,
  options: CatalogFetcherOptions = {}
): Promise<FlakyPolicyRecord[]> {
  const logger = options.logger ?? defaultLogger;

  try {
    const records = await requestCatalog(request, options.httpClient ?? axios, logger);
    logger.info(
      { count: records.length, testNames: records.map((record) => record.test_name) },
      'Fetched flaky test catalog'
    );
    return records;
  } catch (error) {
    const fetchError = toCatalogFetchError(error);
    logger.warn(
      {
        err: fetchError,
        statusCode: fetchError.statusCode,
        endpoint: request.endpoint,
        repoName: request.repoName,
        jobName: request.jobName,
      },
      'Failed to fetch flaky test catalog, no tests will be rerun'
    );
    return [];
  }
}

async function requestCatalog(
  request: CatalogRequest,
  client: AxiosInstance,
  logger: Logger
): Promise<FlakyPolicyRecord[]> {
  const response = await client.get<unknown>(request.endpoint, {
    headers: {
      Authorization: `Bearer ${request.apiToken}`,
      'Content-Type': 'application/json',
    },
    params: {
      repo_name: request.repoName,
      job_name: request.jobName,
    },
    timeout: request.timeoutMs ?? CATALOG_API.DEFAULT_TIMEOUT_MS,
    validateStatus: () => true,
  });

  if (response.status < 200 || response.status >= 300) {
    throw new CatalogFetchError(`Catalog API returned HTTP ${response.status}`, {
      statusCode: response.status,
      context: { statusText: response.statusText },
    });
  }

  const parsed = flakyCatalogResponseSchema.safeParse(response.data);
  if (!parsed.success) {
    throw new CatalogFetchError('Catalog API returned a malformed body', {
      statusCode: response.status,
      cause: parsed.error,
    });
  }

  const records: FlakyPolicyRecord[] = [];
  parsed.data.flaky_tests.forEach((entry, index) => {
    const record = flakyPolicyRecordSchema.safeParse(entry);
    if (record.success) {
      records.push(record.data);
    } else {
      logger.debug({ index, issues: record.error.issues }, 'Skipping malformed catalog entry');
    }
  });
  return records;
}

function toCatalogFetchError(error: unknown): CatalogFetchError {
  if (error instanceof CatalogFetchError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    return new CatalogFetchError(`Catalog request failed: ${error.message}`, {
      statusCode: error.response?.status,
      context: { code: error.code },
      cause: error,
    });
  }
  return new CatalogFetchError(
    `Catalog request failed: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error }
  );
}
