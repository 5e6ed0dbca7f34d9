export * from './constants/index.js';
export * from './schemas/catalog.schema.js';
export * from './utils/logger.js';
export * from './utils/validation.js';
export type {
  AttemptOutcome,
  AttemptFailure,
  TestIdentity,
  PolicyOverride,
} from './types/index.js';
