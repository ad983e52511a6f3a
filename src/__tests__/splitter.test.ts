/**
 * Splitter Tests
 *
 * Covers assignment determinism, salt independence, weight fidelity over
 * 100k identifiers, and the batch/row helpers.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Splitter, quickSplit } from '../splitter.js';
import { checkDistribution, maxShareDeviation } from '../analysis/distribution.js';
import { getGlobalLogLevel, setGlobalLogLevel } from '../logger.js';
import { SplitterError } from '../types.js';

const POPULATION = 100_000;

function ids(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

function shares(labels: string[]): Record<string, number> {
  const result: Record<string, number> = {};
  for (const label of labels) {
    result[label] = (result[label] ?? 0) + 1 / labels.length;
  }
  return result;
}

describe('Splitter', () => {
  let stderrSpy: MockInstance;

  beforeEach(() => {
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    setGlobalLogLevel('info');
  });

  describe('construction', () => {
    it('should default to a 50/50 control/test split', () => {
      const splitter = new Splitter('demo_test');
      expect(splitter.groups).toEqual([
        { label: 'control', weight: 0.5 },
        { label: 'test', weight: 0.5 },
      ]);
      expect(splitter.labels).toEqual(['control', 'test']);
    });

    it('should accept a testShare', () => {
      const splitter = new Splitter('demo_test', { testShare: 0.2 });
      expect(splitter.groups).toEqual([
        { label: 'control', weight: 0.8 },
        { label: 'test', weight: 0.2 },
      ]);
    });

    it('should fail fast on invalid weights', () => {
      expect(() => new Splitter('demo_test', [])).toThrow(SplitterError);
      expect(
        () =>
          new Splitter('demo_test', [
            { label: 'control', weight: 0 },
            { label: 'test', weight: 0 },
          ]),
      ).toThrow(expect.objectContaining({ code: 'INVALID_WEIGHTS' }));
    });

    it('should warn, not fail, on an empty salt', () => {
      const splitter = new Splitter('');
      expect(splitter.assign(12345)).toBe('test');

      expect(stderrSpy).toHaveBeenCalledTimes(1);
      const entry = JSON.parse(String(stderrSpy.mock.calls[0][0]));
      expect(entry.level).toBe('warn');
      expect(entry.component).toBe('Splitter');
      expect(entry.data).toEqual({ groups: ['control', 'test'] });
    });

    it('should reject a salt containing a lone surrogate', () => {
      expect(() => new Splitter('pricing_\uD800')).toThrow(
        expect.objectContaining({
          code: 'INVALID_ARGUMENT',
          details: expect.objectContaining({ field: 'salt', reason: 'salt contains a lone UTF-16 surrogate' }),
        }),
      );
    });

    it('should reject string identifiers with lone surrogates', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      expect(() => splitter.assignBatch(['user_1', '\uDFFF'])).toThrow(
        expect.objectContaining({ code: 'UNSUPPORTED_IDENTIFIER_TYPE', details: expect.objectContaining({ index: 1 }) }),
      );
    });

    it('should not log at the default level for a salted splitter', () => {
      new Splitter('pricing_test_2024_q1');
      expect(stderrSpy).not.toHaveBeenCalled();
    });
  });

  describe('fromConfig', () => {
    it('should build from groups', () => {
      const splitter = Splitter.fromConfig({
        salt: 'homepage_hero',
        groups: [
          { label: 'control', weight: 2 },
          { label: 'variant', weight: 2 },
        ],
      });
      expect(splitter.salt).toBe('homepage_hero');
      expect(splitter.groups).toEqual([
        { label: 'control', weight: 0.5 },
        { label: 'variant', weight: 0.5 },
      ]);
    });

    it('should build from testShare and apply the log level', () => {
      const splitter = Splitter.fromConfig({ salt: 'homepage_hero', testShare: 0.1, logLevel: 'debug' });
      expect(getGlobalLogLevel()).toBe('debug');
      expect(splitter.labels).toEqual(['control', 'test']);

      const entry = JSON.parse(String(stderrSpy.mock.calls[0][0]));
      expect(entry.msg).toBe('Splitter created');
      expect(entry.level).toBe('debug');
    });

    it('should reject invalid configs with INVALID_ARGUMENT', () => {
      expect(() => Splitter.fromConfig({ testShare: 0.5 })).toThrow(
        expect.objectContaining({ code: 'INVALID_ARGUMENT' }),
      );
    });
  });

  describe('assign', () => {
    const weights = [
      { label: 'control', weight: 0.5 },
      { label: 'test', weight: 0.5 },
    ];

    it('should return the same label for the same identifier and salt', () => {
      const first = new Splitter('pricing_test_2024_q1', weights);
      const second = new Splitter('pricing_test_2024_q1', weights);

      expect(first.assign(12345)).toBe('control');
      for (let i = 0; i < 5; i++) {
        expect(first.assign(12345)).toBe('control');
        expect(second.assign(12345)).toBe('control');
      }
    });

    it('should match reference assignments for two salts', () => {
      const q1 = new Splitter('pricing_test_2024_q1', weights);
      const q2 = new Splitter('pricing_test_2024_q2', weights);

      expect([12345, 67890, 1, 42].map((id) => q1.assign(id))).toEqual([
        'control',
        'control',
        'control',
        'control',
      ]);
      expect([12345, 67890, 1, 42].map((id) => q2.assign(id))).toEqual([
        'control',
        'control',
        'test',
        'test',
      ]);
    });

    it('should treat an integer, its bigint and its decimal string alike', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      expect(splitter.assign(1)).toBe('test');
      expect(splitter.assign(1n)).toBe('test');
      expect(splitter.assign('1')).toBe('test');
    });

    it('should reject floats', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      expect(() => splitter.assign(1.5)).toThrow(
        expect.objectContaining({ code: 'UNSUPPORTED_IDENTIFIER_TYPE' }),
      );
      // A rejected call leaves the splitter usable
      expect(splitter.assign(1)).toBe('test');
    });
  });

  describe('distribution properties', () => {
    it('should match requested 50/50 weights within 1%', () => {
      const splitter = new Splitter('fidelity_check');
      const result = shares(splitter.assignBatch(ids(POPULATION)));
      expect(result.control).toBeCloseTo(0.50123, 4);
      expect(Math.abs(result.control - 0.5)).toBeLessThan(0.01);
      expect(Math.abs(result.test - 0.5)).toBeLessThan(0.01);
    });

    it('should match a 70/30 split within 1%', () => {
      const splitter = new Splitter('fidelity_check', { testShare: 0.3 });
      const labels = splitter.assignBatch(ids(POPULATION));
      const report = checkDistribution(labels, splitter.groups);
      expect(report[0]).toEqual({ label: 'control', count: 70183, actualPct: 70.18, expectedPct: 70 });
      expect(maxShareDeviation(report)).toBeLessThan(1);
    });

    it('should split string identifiers evenly too', () => {
      const splitter = new Splitter('fidelity_check');
      const result = shares(splitter.assignBatch(ids(POPULATION).map((i) => `user_${i}`)));
      expect(Math.abs(result.control - 0.5)).toBeLessThan(0.01);
    });

    it('should partition into 50/25/25 for three variants', () => {
      const splitter = new Splitter('fidelity_check', [
        { label: 'control', weight: 0.5 },
        { label: 'test_a', weight: 0.25 },
        { label: 'test_b', weight: 0.25 },
      ]);
      const report = checkDistribution(splitter.assignBatch(ids(POPULATION)), splitter.groups);

      expect(report.map((row) => row.label)).toEqual(['control', 'test_a', 'test_b']);
      expect(report.map((row) => row.count)).toEqual([50123, 24946, 24931]);
      expect(maxShareDeviation(report)).toBeLessThan(1);
    });

    it('should preserve aggregate shares when equal-weight labels are reordered', () => {
      const forward = new Splitter('fidelity_check', [
        { label: 'control', weight: 0.5 },
        { label: 'test_a', weight: 0.25 },
        { label: 'test_b', weight: 0.25 },
      ]);
      const reordered = new Splitter('fidelity_check', [
        { label: 'control', weight: 0.5 },
        { label: 'test_b', weight: 0.25 },
        { label: 'test_a', weight: 0.25 },
      ]);
      const population = ids(POPULATION);
      const a = shares(forward.assignBatch(population));
      const b = shares(reordered.assignBatch(population));

      // Individual subjects swap between test_a and test_b...
      expect(forward.assign(2)).toBe('test_a');
      expect(reordered.assign(2)).toBe('test_b');
      // ...but each label keeps its share.
      for (const label of ['control', 'test_a', 'test_b']) {
        expect(Math.abs(a[label] - b[label])).toBeLessThan(0.01);
      }
      expect(a.control).toBe(b.control);
    });

    it('should assign independently under different salts', () => {
      const first = new Splitter('independence_a');
      const second = new Splitter('independence_b');
      const cells = new Map<string, number>();
      for (const id of ids(POPULATION)) {
        const key = `${first.assign(id)}/${second.assign(id)}`;
        cells.set(key, (cells.get(key) ?? 0) + 1);
      }

      expect(Object.fromEntries(cells)).toEqual({
        'control/control': 25245,
        'control/test': 25016,
        'test/control': 24694,
        'test/test': 25045,
      });
      for (const count of cells.values()) {
        expect(Math.abs(count / POPULATION - 0.25)).toBeLessThan(0.01);
      }
    });
  });

  describe('assignBatch', () => {
    it('should equal element-wise assign in the same order', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      const batch = splitter.assignBatch([12345, 67890, 1, 42]);
      expect(batch).toEqual([12345, 67890, 1, 42].map((id) => splitter.assign(id)));
      expect(batch).toEqual(['control', 'control', 'test', 'test']);
    });

    it('should accept any iterable', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      expect(splitter.assignBatch(new Set([1, 42]))).toEqual(['test', 'test']);
    });

    it('should return an empty list for no identifiers', () => {
      expect(new Splitter('pricing_test_2024_q2').assignBatch([])).toEqual([]);
    });

    it('should fail the whole batch with the offending index', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      expect(() => splitter.assignBatch([1, 2, 0.5])).toThrow(
        expect.objectContaining({
          code: 'UNSUPPORTED_IDENTIFIER_TYPE',
          details: { type: 'float', value: 0.5, index: 2 },
        }),
      );
    });
  });

  describe('assignRows', () => {
    const rows = [
      { userId: 12345, plan: 'pro' },
      { userId: 1, plan: 'free' },
    ];

    it('should add a group column without mutating the input', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      const result = splitter.assignRows(rows, 'userId');

      expect(result).toEqual([
        { userId: 12345, plan: 'pro', group: 'control' },
        { userId: 1, plan: 'free', group: 'test' },
      ]);
      expect(rows[0]).toEqual({ userId: 12345, plan: 'pro' });
    });

    it('should write to a custom column', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      expect(splitter.assignRows(rows, 'userId', 'variant')[1]).toEqual({
        userId: 1,
        plan: 'free',
        variant: 'test',
      });
    });

    it('should reject rows with a missing key', () => {
      const splitter = new Splitter('pricing_test_2024_q2');
      const sparse: Array<{ userId?: number }> = [{ userId: 1 }, {}];
      expect(() => splitter.assignRows(sparse, 'userId')).toThrow(
        expect.objectContaining({ code: 'UNSUPPORTED_IDENTIFIER_TYPE', details: { type: 'undefined', value: undefined, index: 1 } }),
      );
    });
  });

  describe('explain', () => {
    it('should expose the hash prefix and unit value', () => {
      const detail = new Splitter('pricing_test_2024_q1').explain(12345);
      expect(detail.identifier).toBe('12345');
      expect(detail.label).toBe('control');
      expect(detail.hashPrefix).toBe('6cf8068a8167169b');
      expect(detail.unit).toBeCloseTo(0.42565956956368856, 12);
    });
  });
});

describe('quickSplit', () => {
  it('should split rows into control and test', () => {
    const rows = [{ id: 12345 }, { id: 67890 }, { id: 1 }, { id: 42 }];
    expect(quickSplit(rows, 'id', 'pricing_test_2024_q2').map((row) => row.group)).toEqual([
      'control',
      'control',
      'test',
      'test',
    ]);
  });

  it('should honor testShare', () => {
    const rows = [{ id: 1 }, { id: 42 }];
    expect(quickSplit(rows, 'id', 'pricing_test_2024_q2', 0).map((row) => row.group)).toEqual([
      'control',
      'control',
    ]);
    expect(quickSplit(rows, 'id', 'pricing_test_2024_q2', 1).map((row) => row.group)).toEqual(['test', 'test']);
  });
});
