import { describe, it, expect } from 'vitest';

import { flakyCatalogResponseSchema, flakyPolicyRecordSchema } from '../catalog.schema.js';

describe('catalog schemas', () => {
  describe('flakyPolicyRecordSchema', () => {
    it('should accept a record with threshold overrides', () => {
      const result = flakyPolicyRecordSchema.safeParse({
        test_name: 'test_x',
        class_name: 'pkg.TestX',
        min_passes: 2,
        max_runs: 3,
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          test_name: 'test_x',
          class_name: 'pkg.TestX',
          min_passes: 2,
          max_runs: 3,
        });
      }
    });

    it('should accept missing and null thresholds', () => {
      const result = flakyPolicyRecordSchema.parse({
        test_name: 'test_y',
        class_name: 'pkg.TestY',
        max_runs: null,
      });

      expect(result.min_passes).toBeUndefined();
      expect(result.max_runs).toBeNull();
    });

    it('should reject records without a test name', () => {
      expect(flakyPolicyRecordSchema.safeParse({ test_name: '', class_name: 'pkg' }).success).toBe(false);
      expect(flakyPolicyRecordSchema.safeParse({ class_name: 'pkg' }).success).toBe(false);
    });

    it('should reject fractional thresholds', () => {
      const result = flakyPolicyRecordSchema.safeParse({
        test_name: 'test_x',
        class_name: 'pkg.TestX',
        max_runs: 2.5,
      });

      expect(result.success).toBe(false);
    });
  });

  describe('flakyCatalogResponseSchema', () => {
    it('should default to an empty list when the key is absent', () => {
      expect(flakyCatalogResponseSchema.parse({})).toEqual({ flaky_tests: [] });
    });

    it('should reject a non-array catalog', () => {
      expect(flakyCatalogResponseSchema.safeParse({ flaky_tests: 'nope' }).success).toBe(false);
    });

    it('should reject non-object bodies', () => {
      expect(flakyCatalogResponseSchema.safeParse('<html>error</html>').success).toBe(false);
      expect(flakyCatalogResponseSchema.safeParse(null).success).toBe(false);
    });
  });
});
