/**
 * Error utilities and factory functions.
 *
 * One factory per SplitterErrorCode, each filling the details shape
 * documented on SplitterError.
 */

import { SplitterError } from './types.js';

/**
 * Type guard to check if an error is a SplitterError.
 */
export function isSplitterError(error: unknown): error is SplitterError {
  return error instanceof SplitterError;
}

/**
 * Create an INVALID_WEIGHTS error.
 *
 * @param reason - What is wrong with the weight specification
 * @param weights - Optional offending weights
 */
export function invalidWeights(reason: string, weights?: unknown): SplitterError {
  const details: Record<string, unknown> = { reason };
  if (weights !== undefined) {
    details.weights = weights;
  }
  return new SplitterError('INVALID_WEIGHTS', `Invalid weights: ${reason}`, details);
}

/**
 * Describe a runtime value's type for error messages.
 */
function describeType(value: unknown): string {
  if (value === null) return 'null';
  // Only strings with lone surrogates are ever rejected
  if (typeof value === 'string') return 'malformed string';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return 'non-finite number';
    return Number.isInteger(value) ? 'unsafe integer' : 'float';
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * Create an UNSUPPORTED_IDENTIFIER_TYPE error.
 *
 * @param value - The identifier that could not be canonicalized
 * @param index - Position in a batch, when raised from one
 */
export function unsupportedIdentifierType(value: unknown, index?: number): SplitterError {
  const type = describeType(value);
  const details: Record<string, unknown> = {
    type,
    value: typeof value === 'bigint' ? value.toString() : value,
  };
  let message = `Unsupported identifier type '${type}'`;
  if (index !== undefined) {
    details.index = index;
    message += ` at index ${index}`;
  }
  return new SplitterError('UNSUPPORTED_IDENTIFIER_TYPE', message, details);
}

/**
 * Create an INVALID_ARGUMENT error.
 *
 * @param field - The field that has an invalid value
 * @param value - The invalid value
 * @param reason - Why the value is invalid
 * @param issues - Optional validation issues (e.g. from zod)
 */
export function invalidArgument(
  field: string,
  value: unknown,
  reason: string,
  issues?: string[],
): SplitterError {
  const details: Record<string, unknown> = {
    field,
    value,
    reason,
  };
  if (issues) {
    details.issues = issues;
  }
  return new SplitterError('INVALID_ARGUMENT', `Invalid argument '${field}': ${reason}`, details);
}

/**
 * Create a NOT_FOUND error for an unregistered experiment.
 */
export function experimentNotFound(experiment: string): SplitterError {
  return new SplitterError('NOT_FOUND', `Experiment '${experiment}' not found`, { experiment });
}

/**
 * Create an IO_ERROR error.
 *
 * @param path - The path that caused the error
 * @param operation - The operation that failed (read, parse, etc.)
 * @param errno - Optional error number/code
 */
export function ioError(path: string, operation: string, errno?: string): SplitterError {
  const details: Record<string, unknown> = {
    path,
    operation,
  };
  if (errno) {
    details.errno = errno;
  }
  return new SplitterError('IO_ERROR', `IO error during ${operation} on '${path}'`, details);
}
