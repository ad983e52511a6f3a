/**
 * Splitter Core Types
 *
 * Shared types for the hash-split library, organized by domain:
 * Identifiers, Groups, Results, Errors.
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * A stable value naming one subject (usually a user id).
 *
 * Strings are hashed as-is, safe integers and bigints by their base-10 form,
 * byte arrays verbatim. Floating-point values are rejected.
 */
export type Identifier = string | number | bigint | Uint8Array;

// =============================================================================
// Groups
// =============================================================================

/**
 * One group's share of the population.
 */
export interface GroupWeight {
  /** Group label returned by assign() */
  label: string;
  /** Non-negative weight; normalized against the total */
  weight: number;
}

/**
 * Two-way split: `testShare` of the population goes to "test", the rest to "control".
 */
export interface TestShareSpec {
  testShare: number;
}

/**
 * Accepted weight specifications. Order of a GroupWeight list is significant:
 * it defines the cumulative bucket boundaries.
 */
export type WeightSpec = TestShareSpec | readonly GroupWeight[];

/**
 * A group with its normalized weight and half-open unit-interval range [lower, upper).
 */
export interface GroupBoundary {
  label: string;
  weight: number;
  lower: number;
  upper: number;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Full assignment trace for a single identifier.
 */
export interface AssignmentDetail {
  /** Canonical identifier text (hex for byte identifiers) */
  identifier: string;
  /** Assigned group label */
  label: string;
  /** Hash mapped to [0, 1) */
  unit: number;
  /** First 8 digest bytes as 16 lowercase hex chars */
  hashPrefix: string;
}

/**
 * One line of a distribution report.
 */
export interface DistributionRow {
  label: string;
  count: number;
  /** Observed share in percent, two decimals */
  actualPct: number;
  /** Requested share in percent, two decimals (only when expected groups are given) */
  expectedPct?: number;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for SplitterError.
 */
export type SplitterErrorCode =
  | 'INVALID_WEIGHTS'
  | 'UNSUPPORTED_IDENTIFIER_TYPE'
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'IO_ERROR';

/**
 * Typed error class for splitter operations.
 *
 * Error details structure by code:
 * - INVALID_WEIGHTS: { reason, weights? }
 * - UNSUPPORTED_IDENTIFIER_TYPE: { type, value, index? }
 * - INVALID_ARGUMENT: { field, value, reason, issues? }
 * - NOT_FOUND: { experiment }
 * - IO_ERROR: { path, operation, errno? }
 */
export class SplitterError extends Error {
  constructor(
    public readonly code: SplitterErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SplitterError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SplitterError.prototype);
  }
}
