import { describe, expect, it, test } from 'vitest';

import { resolveCompilerOptions, vocabularyFromOptions } from '../../config';
import { ShapeSyntaxError } from '../../errors';
import { createTypeSchema } from '../../schema';
import { commerceSchema, type TestScenario } from '../../pipeline/tests/fixtures';
import { parseExpression, readShape } from '../ast';
import { hasTopLevelNullSafe, readMemberChain } from '../member-chain';
import { Scope, collectCaptures } from '../scope';
import { parseShapeFields, relativeSourcePath } from '../shape-parser';

/**
 * Test suite: reading shapes.
 *
 * Coverage:
 * - Accepted and rejected shape forms.
 * - Field extraction and skipped properties.
 * - Member chains and source-relative paths.
 * - Free-variable (capture) detection.
 */
describe('Shape Parser', () => {
  const schema = createTypeSchema(commerceSchema);
  const vocabulary = vocabularyFromOptions(resolveCompilerOptions());

  describe('Shape Forms', () => {
    it('reads an anonymous object-literal shape', () => {
      const shape = readShape('o => ({ id: o.id })');

      expect(shape.param).toBe('o');
      expect(shape.targetName).toBeUndefined();
      expect(shape.body.properties).toHaveLength(1);
    });

    it('reads a named shape', () => {
      const shape = readShape('o => new OrderSummary({ id: o.id })');

      expect(shape.targetName).toBe('OrderSummary');
      expect(shape.body.properties).toHaveLength(1);
    });

    const rejected: TestScenario<string>[] = [
      {
        id: 'Not A Function',
        description: 'The shape must be an arrow function',
        code: '42',
        expected: '[projection] A shape must be an arrow function, received Literal.'
      },
      {
        id: 'Two Parameters',
        description: 'Exactly one parameter is bound',
        code: '(a, b) => ({ id: a.id })',
        expected: '[projection] A shape must take exactly one identifier parameter.'
      },
      {
        id: 'Block Body',
        description: 'Statement bodies are rejected',
        code: 'o => { return { id: o.id }; }',
        expected: '[projection] A shape body must be an object literal expression, not a block.'
      },
      {
        id: 'Leaf Body',
        description: 'The body must build an object',
        code: 'o => o.id',
        expected: '[projection] A shape body must be an object literal or `new Target({ ... })`.'
      }
    ];

    test.for(rejected)('[$id] $description', ({ code, expected }) => {
      expect(() => readShape(code)).toThrow(expected);
    });

    it('wraps parser failures', () => {
      expect(() => readShape('o => ({ id: ')).toThrow(ShapeSyntaxError);
    });
  });

  describe('Fields', () => {
    it('keeps supported properties in order and reports the rest', () => {
      const shape = readShape(
        'o => ({ id: o.id, ...o, [key]: 1, id: o.reference, "total amount": o.total, label() { return 1; } })'
      );

      const parsed = parseShapeFields(
        shape.body,
        { type: schema.resolveType('Order'), base: { param: 'o', path: [] } },
        {
          schema,
          vocabulary,
          scope: Scope.root('o', schema.resolveType('Order')),
          elementsMember: 'items'
        }
      );

      expect(
        parsed.fields.map(field => [field.name, field.sourcePath, field.lineage])
      ).toEqual([
        ['id', ['id'], 'Order.id'],
        ['total amount', ['total'], 'Order.total']
      ]);

      expect(parsed.diagnostics.map(entry => entry.message)).toEqual([
        'Spread elements are not supported in shapes and were skipped: ...o',
        'Computed keys, methods and accessors are not supported in shapes and were skipped.',
        'Duplicate field "id" was skipped.',
        'Computed keys, methods and accessors are not supported in shapes and were skipped.'
      ]);
      expect(
        parsed.diagnostics.every(entry => entry.code === 'UnsupportedExpressionShape')
      ).toBe(true);
    });
  });

  describe('Member Chains', () => {
    it('reads hops and their null-safety', () => {
      expect(readMemberChain(parseExpression('o.customer?.address.city'))).toEqual({
        root: 'o',
        hops: [
          { name: 'customer', optional: false },
          { name: 'address', optional: true },
          { name: 'city', optional: false }
        ]
      });
    });

    it('rejects calls and dynamic keys', () => {
      expect(readMemberChain(parseExpression('o.lines.map(l => l.sku)'))).toBeNull();
      expect(readMemberChain(parseExpression('o[key]'))).toBeNull();
    });

    const base = { param: 'o', path: ['customer'] };
    const scenarios: TestScenario<readonly string[] | null>[] = [
      {
        id: 'Below Base',
        description: 'Paths are relative to the base',
        code: 'o.customer.name',
        expected: ['name']
      },
      {
        id: 'Null-Safe',
        description: 'Null-safe hops still form a path',
        code: 'o.customer?.address.city',
        expected: ['address', 'city']
      },
      {
        id: 'Outside Base',
        description: 'Reads outside the base have no path',
        code: 'o.total',
        expected: null
      },
      {
        id: 'Base Itself',
        description: 'The base itself is not a field path',
        code: 'o.customer',
        expected: null
      },
      {
        id: 'Call',
        description: 'Calls end the member chain',
        code: 'o.customer.name.trim()',
        expected: null
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(relativeSourcePath(parseExpression(code), base)).toEqual(expected);
    });
  });

  describe('Captures', () => {
    const scenarios: TestScenario<string[]>[] = [
      {
        id: 'Free Variable',
        description: 'Identifiers that are neither parameters nor globals',
        code: 'o.total * rate + Math.round(o.id)',
        expected: ['rate']
      },
      {
        id: 'Nested Lambda',
        description: 'Inner lambda parameters are bound',
        code: 'o.lines.map(l => l.price * factor)',
        expected: ['factor']
      },
      {
        id: 'Computed Key',
        description: 'Computed keys are reads, plain keys are not',
        code: '({ [key]: o.id, other: o.id })',
        expected: ['key']
      },
      {
        id: 'Named Target',
        description: 'A named nested shape does not read its target',
        code: 'new Summary({ id: o.id })',
        expected: []
      },
      {
        id: 'Destructured Parameter',
        description: 'Names bound by a parameter pattern are not captures',
        code: 'o.lines.map(({ sku, price = 0 }) => sku + price * factor)',
        expected: ['factor']
      },
      {
        id: 'Constructor Call',
        description: 'Other constructions read their callee',
        code: 'new Money(o.total, currency)',
        expected: ['Money', 'currency']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(collectCaptures(parseExpression(code), new Set(['o']))).toEqual(expected);
    });
  });

  describe('Null-Safe Detection', () => {
    const scenarios: TestScenario<boolean>[] = [
      { id: 'Plain', description: 'No null-safe hop', code: 'o.customer.name', expected: false },
      { id: 'Member', description: 'A null-safe member read', code: 'o.customer?.name', expected: true },
      {
        id: 'Call',
        description: 'A null-safe call',
        code: 'o.lines.map?.(l => l.sku)',
        expected: true
      },
      {
        id: 'Operand',
        description: 'A null-safe hop inside an operand',
        code: 'o.total + (o.customer?.name ?? "").length',
        expected: true
      },
      {
        id: 'Nested Lambda',
        description: 'Hops inside nested lambdas do not count',
        code: 'o.lines.map(l => l.product?.name)',
        expected: false
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(hasTopLevelNullSafe(parseExpression(code))).toBe(expected);
    });
  });
});
