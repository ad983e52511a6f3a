/**
 * Distribution report: how many subjects landed in each group, against the
 * shares that were requested.
 */

import type { DistributionRow, GroupWeight } from '../types.js';

function roundPct(value: number): number {
  return Math.round(value * 100) / 100;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Count labels and compare observed shares to expected ones.
 *
 * Rows are sorted by descending count, then label. When `expected` is given,
 * each expected label gets a row even if it was never assigned, and
 * `expectedPct` is its weight's share of the expected total, so raw config
 * weights and `Splitter.groups` report alike.
 */
export function checkDistribution(
  labels: Iterable<string>,
  expected?: readonly GroupWeight[],
): DistributionRow[] {
  const counts = new Map<string, number>();
  for (const group of expected ?? []) {
    counts.set(group.label, 0);
  }

  let total = 0;
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
    total++;
  }

  const expectedTotal = (expected ?? []).reduce((sum, group) => sum + group.weight, 0);
  const expectedPct = new Map<string, number>();
  for (const group of expected ?? []) {
    expectedPct.set(group.label, expectedTotal > 0 ? roundPct((group.weight / expectedTotal) * 100) : 0);
  }

  const rows: DistributionRow[] = [];
  for (const [label, count] of counts) {
    const row: DistributionRow = {
      label,
      count,
      actualPct: total === 0 ? 0 : roundPct((count / total) * 100),
    };
    if (expected !== undefined) {
      row.expectedPct = expectedPct.get(label) ?? 0;
    }
    rows.push(row);
  }

  // Ties break on UTF-16 code units, independent of the host locale
  return rows.sort((a, b) => b.count - a.count || compareCodeUnits(a.label, b.label));
}

/**
 * Largest absolute gap, in percentage points, between observed and expected shares.
 */
export function maxShareDeviation(rows: readonly DistributionRow[]): number {
  let max = 0;
  for (const row of rows) {
    if (row.expectedPct === undefined) continue;
    max = Math.max(max, Math.abs(row.actualPct - row.expectedPct));
  }
  return max;
}
