/**
 * Weight normalization and bucket lookup.
 *
 * Turns a weight specification into an ordered table of half-open
 * [lower, upper) ranges over the unit interval.
 */

import { invalidWeights } from '../errors.js';
import type { GroupBoundary, GroupWeight, WeightSpec } from '../types.js';

export const CONTROL_LABEL = 'control';
export const TEST_LABEL = 'test';

/** Used when no weights are given: 50/50 control/test. Frozen, entries included. */
export const DEFAULT_GROUPS: ReadonlyArray<Readonly<GroupWeight>> = Object.freeze([
  Object.freeze({ label: CONTROL_LABEL, weight: 0.5 }),
  Object.freeze({ label: TEST_LABEL, weight: 0.5 }),
]);

function isTestShareSpec(spec: WeightSpec): spec is { testShare: number } {
  return !Array.isArray(spec);
}

/**
 * Expand a weight specification to an explicit group list.
 */
export function toGroupWeights(spec: WeightSpec | undefined): readonly GroupWeight[] {
  if (spec === undefined) {
    return DEFAULT_GROUPS;
  }
  if (isTestShareSpec(spec)) {
    const p = spec.testShare;
    if (!Number.isFinite(p) || p < 0 || p > 1) {
      throw invalidWeights(`testShare must be within [0, 1], got ${p}`, spec);
    }
    return [
      { label: CONTROL_LABEL, weight: 1 - p },
      { label: TEST_LABEL, weight: p },
    ];
  }
  return spec;
}

/**
 * Validate and normalize weights into cumulative boundaries.
 *
 * @throws SplitterError INVALID_WEIGHTS on empty lists, fewer than two groups,
 *   negative or non-finite weights, a zero total, or empty/duplicate labels
 */
export function buildBoundaries(spec: WeightSpec | undefined): GroupBoundary[] {
  const groups = toGroupWeights(spec);

  if (groups.length === 0) {
    throw invalidWeights('at least one group is required', groups);
  }
  if (groups.length < 2) {
    throw invalidWeights(`at least two groups are required, got ${groups.length}`, groups);
  }

  const seen = new Set<string>();
  let total = 0;
  for (const group of groups) {
    if (group.label.length === 0) {
      throw invalidWeights('group labels must be non-empty', groups);
    }
    if (seen.has(group.label)) {
      throw invalidWeights(`duplicate group label '${group.label}'`, groups);
    }
    seen.add(group.label);
    if (!Number.isFinite(group.weight) || group.weight < 0) {
      throw invalidWeights(
        `weight for '${group.label}' must be a non-negative finite number, got ${group.weight}`,
        groups,
      );
    }
    total += group.weight;
  }
  if (total <= 0) {
    throw invalidWeights('weights sum to zero', groups);
  }

  const boundaries: GroupBoundary[] = [];
  let cumulative = 0;
  for (const group of groups) {
    const weight = group.weight / total;
    const lower = cumulative;
    cumulative += weight;
    boundaries.push({ label: group.label, weight, lower, upper: cumulative });
  }
  return boundaries;
}

/**
 * Find the group whose range contains `unit`.
 *
 * A point on a boundary belongs to the group starting there. Zero-weight groups
 * have an empty range and are never returned. If float rounding leaves `unit` at
 * or past the final bound, the last positive-weight group wins.
 */
export function pickGroup(boundaries: readonly GroupBoundary[], unit: number): string {
  let fallback: string | undefined;
  for (const boundary of boundaries) {
    if (boundary.weight <= 0) {
      continue;
    }
    if (unit < boundary.upper) {
      return boundary.label;
    }
    fallback = boundary.label;
  }
  if (fallback === undefined) {
    throw invalidWeights('no group has a positive weight');
  }
  return fallback;
}
