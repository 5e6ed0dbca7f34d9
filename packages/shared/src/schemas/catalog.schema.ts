import { z } from 'zod';

/**
 * One entry of the flaky-test catalog as served by the catalog API.
 * Threshold fields may be missing or null; both mean "use the defaults".
 */
export const flakyPolicyRecordSchema = z.object({
  test_name: z.string().min(1),
  class_name: z.string(),
  min_passes: z.number().int().nullish(),
  max_runs: z.number().int().nullish(),
});

// Entries are validated one by one so a single bad record does not void the catalog
export const flakyCatalogResponseSchema = z.object({
  flaky_tests: z.array(z.unknown()).default([]),
});

export type FlakyPolicyRecord = z.infer<typeof flakyPolicyRecordSchema>;
export type FlakyCatalogResponse = z.infer<typeof flakyCatalogResponseSchema>;
