/**
 * hash-split - deterministic experiment group assignment
 *
 * Public API exports.
 */

// =============================================================================
// Configuration
// =============================================================================

export {
  splitterConfigSchema,
  experimentConfigSchema,
  experimentsFileSchema,
  parseSplitterConfig,
  parseExperimentConfig,
  parseExperimentsFile,
  getWeightSpec,
} from './config.js';
export type { SplitterConfig, SplitterConfigInput, ExperimentConfig, ExperimentsFile } from './config.js';

// =============================================================================
// Types
// =============================================================================

export type {
  Identifier,
  GroupWeight,
  TestShareSpec,
  WeightSpec,
  GroupBoundary,
  AssignmentDetail,
  DistributionRow,
} from './types.js';

export { SplitterError } from './types.js';
export type { SplitterErrorCode } from './types.js';

// =============================================================================
// Splitter
// =============================================================================

export { Splitter, quickSplit } from './splitter.js';
export {
  HASH_CONTRACT,
  canonicalizeIdentifier,
  isIdentifier,
  bucketHash,
  hashToUnitInterval,
} from './hashing/bucket-hash.js';
export type { BucketHash, CanonicalIdentifier } from './hashing/bucket-hash.js';
export {
  CONTROL_LABEL,
  TEST_LABEL,
  DEFAULT_GROUPS,
  buildBoundaries,
  pickGroup,
} from './hashing/weights.js';

// =============================================================================
// Analysis & Experiments
// =============================================================================

export { checkDistribution, maxShareDeviation } from './analysis/distribution.js';
export { ExperimentRegistry } from './experiments/experiment-registry.js';

// =============================================================================
// Error Utilities
// =============================================================================

export {
  isSplitterError,
  invalidWeights,
  unsupportedIdentifierType,
  invalidArgument,
  experimentNotFound,
  ioError,
} from './errors.js';

// =============================================================================
// Logger
// =============================================================================

export { createLogger, setGlobalLogLevel, getGlobalLogLevel } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
