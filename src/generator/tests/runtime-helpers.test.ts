import { describe, expect, it, test } from 'vitest';

import { type Callable, toCallable } from '../../pipeline/tests/fixtures';
import type { GroupingMembers } from '../../schema';
import {
  HelperRegistry,
  type RuntimeHelper,
  helperName,
  helperSource
} from '../runtime-helpers';

type HelperScenario = {
  id: string;
  description: string;
  helper: RuntimeHelper;
  args: unknown[];
  expected: unknown;
};

const DEFAULT_GROUPING: GroupingMembers = { keyMember: 'key', elementsMember: 'items' };

/**
 * Helper: evaluates the source of `helper` and returns the function.
 */
function load(helper: RuntimeHelper, grouping = DEFAULT_GROUPING): Callable {
  const factory: unknown = new Function(
    `${helperSource(helper, grouping)}\nreturn ${helperName(helper)};`
  );
  return toCallable(toCallable(factory)());
}

const double = (value: unknown) => (typeof value === 'number' ? value * 2 : null);
const isEven = (value: unknown) => typeof value === 'number' && value % 2 === 0;

/**
 * Test suite: runtime helpers emitted next to generated code.
 *
 * Coverage:
 * - Aggregates over arrays, sets and absent values.
 * - Element access with and without predicates.
 * - Flattening and grouping over any iterable.
 * - Registry ordering.
 */
describe('Runtime Helpers', () => {
  describe('Aggregates', () => {
    const scenarios: HelperScenario[] = [
      {
        id: 'Sum',
        description: 'Absent values are skipped',
        helper: 'sum',
        args: [[1, null, 2]],
        expected: 3
      },
      {
        id: 'Sum Selector',
        description: 'The selector applies to each element',
        helper: 'sum',
        args: [new Set([1, 2]), double],
        expected: 6
      },
      {
        id: 'Sum BigInt',
        description: 'Bigint values add up to a bigint',
        helper: 'sum',
        args: [[1n, null, 2n]],
        expected: 3n
      },
      {
        id: 'Sum Empty',
        description: 'An empty sum is zero',
        helper: 'sum',
        args: [[]],
        expected: 0
      },
      {
        id: 'Sum Empty BigInt',
        description: 'An empty sum returns the given zero',
        helper: 'sum',
        args: [[], undefined, 0n],
        expected: 0n
      },
      {
        id: 'Average BigInt',
        description: 'Bigint values average to a number',
        helper: 'average',
        args: [[2n, 4n]],
        expected: 3
      },
      {
        id: 'Average',
        description: 'The mean of the present values',
        helper: 'average',
        args: [[2, 4, null]],
        expected: 3
      },
      {
        id: 'Average Empty',
        description: 'An empty sequence has no average',
        helper: 'average',
        args: [[]],
        expected: null
      },
      {
        id: 'Min',
        description: 'The smallest value',
        helper: 'min',
        args: [[3, 1, 2]],
        expected: 1
      },
      {
        id: 'Max Selector',
        description: 'The largest selected value',
        helper: 'max',
        args: [[3, 1, 2], double],
        expected: 6
      },
      {
        id: 'Max Empty',
        description: 'An empty sequence has no maximum',
        helper: 'max',
        args: [[]],
        expected: null
      },
      {
        id: 'Count Predicate',
        description: 'Counts the matching elements',
        helper: 'count',
        args: [[1, 2, 3, 4], isEven],
        expected: 2
      }
    ];

    test.for(scenarios)('[$id] $description', ({ helper, args, expected }) => {
      expect(load(helper)(...args)).toBe(expected);
    });
  });

  describe('Element Access', () => {
    const scenarios: HelperScenario[] = [
      {
        id: 'First',
        description: 'The first matching element',
        helper: 'first',
        args: [[1, 2, 3, 4], isEven],
        expected: 2
      },
      {
        id: 'FirstOrDefault',
        description: 'Null when nothing matches',
        helper: 'firstOrDefault',
        args: [[1, 3], isEven],
        expected: null
      },
      {
        id: 'Last',
        description: 'The last matching element',
        helper: 'last',
        args: [[1, 2, 3, 4, 5], isEven],
        expected: 4
      },
      {
        id: 'LastOrDefault',
        description: 'Null for an empty sequence',
        helper: 'lastOrDefault',
        args: [[]],
        expected: null
      },
      {
        id: 'Any',
        description: 'False for an empty sequence',
        helper: 'any',
        args: [[]],
        expected: false
      },
      {
        id: 'All',
        description: 'True when every element matches',
        helper: 'all',
        args: [[2, 4], isEven],
        expected: true
      }
    ];

    test.for(scenarios)('[$id] $description', ({ helper, args, expected }) => {
      expect(load(helper)(...args)).toBe(expected);
    });

    it('throws when `first` finds nothing', () => {
      expect(() => load('first')([])).toThrow('Sequence contains no matching element');
      expect(() => load('last')([1, 3], isEven)).toThrow(
        'Sequence contains no matching element'
      );
    });
  });

  describe('Sequences', () => {
    it('flattens iterables but not strings', () => {
      const flatMap = load('flatMap');

      expect(flatMap(new Set([1, 2]), (value: unknown) => [value, double(value)])).toEqual([
        1, 2, 2, 4
      ]);
      expect(flatMap(['ab', 'cd'], (value: unknown) => value)).toEqual(['ab', 'cd']);
    });

    it('groups by key in first-seen order', () => {
      const groupBy = load('groupBy');
      const lines = [
        { sku: 'a', quantity: 1 },
        { sku: 'b', quantity: 2 },
        { sku: 'a', quantity: 3 }
      ];

      expect(
        groupBy(lines, (line: unknown) =>
          typeof line === 'object' && line !== null && 'sku' in line ? line.sku : null
        )
      ).toEqual([
        { key: 'a', items: [lines[0], lines[2]] },
        { key: 'b', items: [lines[1]] }
      ]);
    });

    it('groups by bigint and composite keys', () => {
      const groupBy = load('groupBy');
      const batches = [{ batch: 1n }, { batch: 2n }, { batch: 1n }];

      expect(
        groupBy(batches, (entry: unknown) =>
          typeof entry === 'object' && entry !== null && 'batch' in entry ? entry.batch : null
        )
      ).toEqual([
        { key: 1n, items: [batches[0], batches[2]] },
        { key: 2n, items: [batches[1]] }
      ]);
      expect(
        groupBy(batches, (entry: unknown) =>
          typeof entry === 'object' && entry !== null && 'batch' in entry
            ? { batch: entry.batch }
            : null
        )
      ).toEqual([
        { key: { batch: 1n }, items: [batches[0], batches[2]] },
        { key: { batch: 2n }, items: [batches[1]] }
      ]);
    });

    it('keeps keys of different types apart', () => {
      expect(load('groupBy')([1, '1', 1], (value: unknown) => value)).toEqual([
        { key: 1, items: [1, 1] },
        { key: '1', items: ['1'] }
      ]);
    });

    it('uses the configured grouping member names', () => {
      const groupBy = load('groupBy', { keyMember: 'k', elementsMember: 'values' });

      expect(groupBy([1, 2, 3], (value: unknown) => isEven(value))).toEqual([
        { k: false, values: [1, 3] },
        { k: true, values: [2] }
      ]);
    });
  });

  describe('Registry', () => {
    it('declares used helpers once, in a fixed order', () => {
      const registry = new HelperRegistry();

      expect(registry.use('sum')).toBe('__sum');
      registry.use('flatMap');
      registry.use('sum');

      const declarations = registry.declarations(DEFAULT_GROUPING);

      expect(declarations).toHaveLength(2);
      expect(declarations[0]?.startsWith('function __flatMap(source, selector) {')).toBe(true);
      expect(declarations[1]?.startsWith('function __sum(source, selector) {')).toBe(true);
    });
  });
});
