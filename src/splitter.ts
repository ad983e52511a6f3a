/**
 * Splitter - deterministic group assignment for one experiment.
 *
 * Holds a salt and a normalized weight table and nothing else, so a single
 * instance can be shared freely. Every method is a pure function of
 * (identifier, salt, weights).
 *
 * @example
 * const splitter = new Splitter('pricing_test_2024_q1', { testShare: 0.5 });
 * splitter.assign(12345); // same label on every call, process and machine
 */

import { getWeightSpec, parseSplitterConfig } from './config.js';
import { invalidArgument, unsupportedIdentifierType } from './errors.js';
import { canonicalizeIdentifier, hashCanonical, isWellFormedText } from './hashing/bucket-hash.js';
import { buildBoundaries, pickGroup } from './hashing/weights.js';
import { createLogger, setGlobalLogLevel } from './logger.js';
import type { AssignmentDetail, GroupBoundary, GroupWeight, Identifier, WeightSpec } from './types.js';

const logger = createLogger('Splitter');

export class Splitter {
  private readonly boundaries: readonly GroupBoundary[];

  /**
   * @param salt - Experiment salt. Changing it reassigns every subject.
   * @param weights - `{ testShare }`, an ordered group list, or omitted for 50/50 control/test
   * @throws SplitterError INVALID_WEIGHTS, or INVALID_ARGUMENT for a salt with lone surrogates
   */
  constructor(
    public readonly salt: string,
    weights?: WeightSpec,
  ) {
    if (!isWellFormedText(salt)) {
      throw invalidArgument('salt', salt, 'salt contains a lone UTF-16 surrogate');
    }
    this.boundaries = buildBoundaries(weights);

    if (salt.length === 0) {
      logger.warn('Empty salt: assignments will correlate with every other unsalted experiment', {
        groups: this.labels,
      });
    }
    logger.debug('Splitter created', { salt, groups: this.groups });
  }

  /**
   * Build a splitter from an unvalidated config object.
   * Applies the config's logLevel, when set, before constructing.
   */
  static fromConfig(input: unknown): Splitter {
    const config = parseSplitterConfig(input);
    if (config.logLevel !== undefined) {
      setGlobalLogLevel(config.logLevel);
    }
    return new Splitter(config.salt, getWeightSpec(config));
  }

  /** Normalized groups in declaration order */
  get groups(): GroupWeight[] {
    return this.boundaries.map(({ label, weight }) => ({ label, weight }));
  }

  get labels(): string[] {
    return this.boundaries.map((boundary) => boundary.label);
  }

  /**
   * Assign one identifier to a group.
   *
   * @throws SplitterError UNSUPPORTED_IDENTIFIER_TYPE
   */
  assign(identifier: Identifier): string {
    return this.assignAt(identifier);
  }

  /**
   * Assign each identifier, preserving order. Fails on the first identifier
   * that cannot be canonicalized, with its index in the error details.
   */
  assignBatch(identifiers: Iterable<Identifier>): string[] {
    const labels: string[] = [];
    let index = 0;
    for (const identifier of identifiers) {
      labels.push(this.assignAt(identifier, index));
      index++;
    }
    return labels;
  }

  /**
   * Return copies of `rows` with the assigned label stored under `column`.
   * Input rows are left untouched.
   *
   * @param key - Row property holding the identifier
   * @param column - Property to write the label to (default "group")
   */
  assignRows<Row extends object>(
    rows: readonly Row[],
    key: keyof Row,
    column: string = 'group',
  ): Array<Row & Record<string, string>> {
    return rows.map((row, index) => {
      const value: unknown = row[key];
      if (value === undefined || value === null) {
        throw unsupportedIdentifierType(value, index);
      }
      const label = this.assignAt(value, index);
      return { ...row, [column]: label };
    });
  }

  /**
   * Full trace of one assignment, for debugging and for checking a
   * warehouse query against this library.
   */
  explain(identifier: Identifier): AssignmentDetail {
    const canonical = canonicalizeIdentifier(identifier);
    const hash = hashCanonical(this.salt, canonical.bytes);
    return {
      identifier: canonical.text,
      label: pickGroup(this.boundaries, hash.unit),
      unit: hash.unit,
      hashPrefix: hash.prefix,
    };
  }

  private assignAt(identifier: unknown, index?: number): string {
    const canonical = canonicalizeIdentifier(identifier, index);
    return pickGroup(this.boundaries, hashCanonical(this.salt, canonical.bytes).unit);
  }
}

/**
 * One-liner control/test split over rows, adding a "group" property.
 *
 * @example
 * const split = quickSplit(users, 'userId', 'pricing_test');
 */
export function quickSplit<Row extends object>(
  rows: readonly Row[],
  key: keyof Row,
  salt: string,
  testShare: number = 0.5,
): Array<Row & Record<string, string>> {
  return new Splitter(salt, { testShare }).assignRows(rows, key);
}
