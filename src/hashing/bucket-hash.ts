/**
 * BucketHash
 *
 * Maps (salt, identifier) to a point in [0, 1) with SHA-256.
 *
 * The contract below is versioned: any engine computing assignments
 * (application code or a warehouse query) must reproduce it bit-for-bit.
 * Changing any field reassigns every subject, same as changing the salt.
 */

import * as crypto from 'node:crypto';
import { invalidArgument, unsupportedIdentifierType } from '../errors.js';
import type { Identifier } from '../types.js';

export const HASH_CONTRACT = {
  version: 1,
  algorithm: 'sha256',
  /** Placed between salt and identifier: sha256(salt + "_" + id) */
  separator: '_',
  /** Leading digest bytes decoded as an unsigned big-endian integer */
  sliceBytes: 8,
  /** 2^64 */
  modulus: 18446744073709551616,
} as const;

/**
 * Canonical byte form of an identifier plus its printable text.
 */
export interface CanonicalIdentifier {
  bytes: Uint8Array;
  text: string;
}

/**
 * Hash of a single (salt, identifier) pair.
 */
export interface BucketHash {
  /** Unsigned big-endian integer from the digest slice */
  value: bigint;
  /** value / 2^64 as a double */
  unit: number;
  /** The slice as lowercase hex */
  prefix: string;
}

const encoder = new TextEncoder();

/** A high surrogate without its low half, or a low surrogate without its high half */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * True when `text` is well-formed UTF-16. UTF-8 encoding replaces lone
 * surrogates with U+FFFD, so two distinct malformed strings would hash alike.
 */
export function isWellFormedText(text: string): boolean {
  return !LONE_SURROGATE.test(text);
}

/**
 * Canonicalize an identifier to bytes.
 *
 * Integers (safe `number` or `bigint`) hash by their base-10 text, so 42 and 42n
 * agree. Floats, NaN, Infinity and unsafe integers throw: their text form is not
 * stable enough to hash. Strings containing lone surrogates throw too.
 */
export function canonicalizeIdentifier(identifier: unknown, index?: number): CanonicalIdentifier {
  if (typeof identifier === 'string') {
    if (!isWellFormedText(identifier)) {
      throw unsupportedIdentifierType(identifier, index);
    }
    return { bytes: encoder.encode(identifier), text: identifier };
  }
  if (typeof identifier === 'number') {
    if (!Number.isSafeInteger(identifier)) {
      throw unsupportedIdentifierType(identifier, index);
    }
    const text = String(identifier);
    return { bytes: encoder.encode(text), text };
  }
  if (typeof identifier === 'bigint') {
    const text = identifier.toString(10);
    return { bytes: encoder.encode(text), text };
  }
  if (identifier instanceof Uint8Array) {
    return { bytes: identifier, text: Buffer.from(identifier).toString('hex') };
  }
  throw unsupportedIdentifierType(identifier, index);
}

/**
 * Type guard for values assign() accepts.
 */
export function isIdentifier(value: unknown): value is Identifier {
  return (
    (typeof value === 'string' && isWellFormedText(value)) ||
    typeof value === 'bigint' ||
    value instanceof Uint8Array ||
    (typeof value === 'number' && Number.isSafeInteger(value))
  );
}

/**
 * Hash canonical identifier bytes under a salt.
 */
export function hashCanonical(salt: string, canonical: Uint8Array): BucketHash {
  const digest = crypto
    .createHash(HASH_CONTRACT.algorithm)
    .update(salt + HASH_CONTRACT.separator, 'utf8')
    .update(canonical)
    .digest();

  const value = digest.readBigUInt64BE(0);
  return {
    value,
    unit: Number(value) / HASH_CONTRACT.modulus,
    prefix: digest.subarray(0, HASH_CONTRACT.sliceBytes).toString('hex'),
  };
}

/**
 * Hash an identifier under a salt.
 *
 * @throws SplitterError UNSUPPORTED_IDENTIFIER_TYPE, or INVALID_ARGUMENT for a malformed salt
 */
export function bucketHash(salt: string, identifier: Identifier): BucketHash {
  if (!isWellFormedText(salt)) {
    throw invalidArgument('salt', salt, 'salt contains a lone UTF-16 surrogate');
  }
  return hashCanonical(salt, canonicalizeIdentifier(identifier).bytes);
}

/**
 * Map (salt, identifier) to [0, 1).
 */
export function hashToUnitInterval(salt: string, identifier: Identifier): number {
  return bucketHash(salt, identifier).unit;
}
