import { describe, expect, it, test } from 'vitest';

import { resolveCompilerOptions, vocabularyFromOptions } from '../../config';
import { parseExpression } from '../../parser/ast';
import { Scope } from '../../parser/scope';
import { commerceSchema, type TestScenario } from '../../pipeline/tests/fixtures';
import { createTypeSchema } from '../../schema';
import { print } from '../builders';
import { defaultValueFor } from '../defaults';
import { lowerExpression } from '../lowering';
import { splitNullSafe } from '../null-safe';
import { HelperRegistry } from '../runtime-helpers';

type LoweringScenario = TestScenario<string> & { source?: string; param?: string };

/**
 * Test suite: lowering shape expressions to plain JavaScript.
 *
 * Coverage:
 * - Combinators on arrays, sets and groupings.
 * - Null-safe chains rewritten into explicit guards.
 * - Untyped receivers kept as written.
 * - Default values of guarded fields.
 */
describe('Lowering', () => {
  const schema = createTypeSchema(commerceSchema);
  const vocabulary = vocabularyFromOptions(resolveCompilerOptions());

  const lower = (code: string, source = 'Order', param = 'o') => {
    const helpers = new HelperRegistry();
    const lowered = lowerExpression(parseExpression(code), {
      inference: {
        schema,
        vocabulary,
        scope: Scope.root(param, schema.resolveType(source)),
        elementsMember: 'items'
      },
      helpers
    });
    return { text: print(lowered), helpers };
  };

  describe('Combinators', () => {
    const scenarios: LoweringScenario[] = [
      {
        id: 'Array Project',
        description: 'Arrays keep `.map`',
        code: 'o.lines.map(l => l.sku)',
        expected: 'o.lines.map(l => l.sku)'
      },
      {
        id: 'Set Project',
        description: 'Other iterables go through `Array.from`',
        code: 'o.tags.map(t => t.length)',
        expected: 'Array.from(o.tags, t => t.length)'
      },
      {
        id: 'Flatten To Leaves',
        description: 'A flatten whose body is not an array uses the helper',
        code: 'o.lines.flatMap(l => l.product.category)',
        expected: '__flatMap(o.lines, l => l.product.category)'
      },
      {
        id: 'Materialize Array',
        description: 'Array materialization copies the sequence',
        code: 'o.lines.toArray()',
        expected: 'Array.from(o.lines)'
      },
      {
        id: 'Materialize Set',
        description: 'Set materialization builds a set',
        code: 'o.lines.toSet()',
        expected: 'new Set(o.lines)'
      },
      {
        id: 'Group By',
        description: 'Grouping goes through the helper',
        code: 'o.lines.groupBy(l => l.sku)',
        expected: '__groupBy(o.lines, l => l.sku)'
      },
      {
        id: 'Aggregate',
        description: 'Aggregates go through helpers',
        code: 'o.lines.sum(l => l.price)',
        expected: '__sum(o.lines, l => l.price)'
      },
      {
        id: 'BigInt Sum',
        description: 'A bigint sum passes a bigint zero',
        code: 'o.lines.sum(l => l.batch)',
        expected: '__sum(o.lines, l => l.batch, 0n)'
      },
      {
        id: 'Grouping Receiver',
        description: 'A grouping is read through its elements member',
        code: 'g.sum(l => l.quantity)',
        source: 'Grouping<string, OrderLine>',
        param: 'g',
        expected: '__sum(g.items, l => l.quantity)'
      },
      {
        id: 'Untyped Receiver',
        description: 'Calls on unknown receivers are kept',
        code: 'rates.map(r => r)',
        expected: 'rates.map(r => r)'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected, source, param }) => {
      expect(lower(code, source, param).text).toBe(expected);
    });

    it('registers the helpers it references', () => {
      const { helpers } = lower('o.lines.count() + o.lines.sum(l => l.price)');

      expect(
        helpers
          .declarations({ keyMember: 'key', elementsMember: 'items' })
          .map(source => source.slice(0, source.indexOf('(')))
      ).toEqual(['function __count', 'function __sum']);
    });
  });

  describe('Null-Safe Chains', () => {
    it('splits a chain into guards and a plain body', () => {
      const { guards, body } = splitNullSafe(parseExpression('o.customer?.address?.city'));

      expect(guards.map(print)).toEqual(['o.customer != null', 'o.customer.address != null']);
      expect(print(body)).toBe('o.customer.address.city');
    });

    it('guards intermediates on request', () => {
      const { guards } = splitNullSafe(parseExpression('o.customer.address.city'), {
        guardIntermediate: () => true
      });

      expect(guards.map(print)).toEqual(['o.customer != null', 'o.customer.address != null']);
    });

    it('lowers nested null-safe reads to a guarded conditional', () => {
      expect(lower('o.customer?.favorites?.length').text).toBe(
        'o.customer != null && o.customer.favorites != null ? o.customer.favorites.length : undefined'
      );
    });
  });

  describe('Defaults', () => {
    const scenarios: TestScenario<string>[] = [
      { id: 'String', description: 'Empty string', code: 'string', expected: '""' },
      { id: 'Number', description: 'Zero', code: 'number', expected: '0' },
      { id: 'Boolean', description: 'False', code: 'boolean', expected: 'false' },
      { id: 'Date', description: 'Dates have no default', code: 'Date', expected: 'null' },
      { id: 'Array', description: 'Empty array', code: 'string[]', expected: '[]' },
      { id: 'Set', description: 'Empty set', code: 'Set<string>', expected: 'new Set()' },
      { id: 'Entity', description: 'Entities have no default', code: 'Customer', expected: 'null' }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(print(defaultValueFor(schema.resolveType(code), false))).toBe(expected);
    });

    it('returns null for nullable fields', () => {
      expect(print(defaultValueFor(schema.resolveType('number'), true))).toBe('null');
    });
  });
});
