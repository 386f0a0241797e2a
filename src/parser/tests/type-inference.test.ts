import { describe, expect, it, test } from 'vitest';

import { resolveCompilerOptions, vocabularyFromOptions } from '../../config';
import { createTypeSchema, typeKey } from '../../schema';
import { commerceSchema, type TestScenario } from '../../pipeline/tests/fixtures';
import type { TypeRef, TypeSchemaOracle } from '../../types/schema';
import { parseExpression } from '../ast';
import { Scope } from '../scope';
import { type InferenceContext, inferType } from '../type-inference';

type Inferred = { type: string; nullable: boolean | undefined } | null;

/**
 * Test suite: static type inference of shape expressions.
 *
 * Coverage:
 * - Member chains and nullability propagation.
 * - Sequence combinators and aggregates.
 * - Operators, literals and common methods.
 * - Captures and unresolvable expressions.
 */
describe('Type Inference', () => {
  const schema = createTypeSchema(commerceSchema);
  const vocabulary = vocabularyFromOptions(resolveCompilerOptions());

  const contextFor = (
    oracle: TypeSchemaOracle,
    captures: ReadonlyMap<string, TypeRef> = new Map()
  ): InferenceContext => ({
    schema: oracle,
    vocabulary,
    scope: Scope.root('o', oracle.resolveType('Order'), captures),
    elementsMember: 'items'
  });

  /**
   * Helper: infers `code` and renders the result as a type key.
   */
  const infer = (code: string, context = contextFor(schema)): Inferred => {
    const result = inferType(parseExpression(code), context);
    return result.success
      ? { type: typeKey(result.value.type), nullable: result.value.nullable }
      : null;
  };

  describe('Member Chains', () => {
    const scenarios: TestScenario<Inferred>[] = [
      {
        id: 'Direct Member',
        description: 'A non-nullable member of the parameter',
        code: 'o.id',
        expected: { type: 'number', nullable: false }
      },
      {
        id: 'Nullable Hop',
        description: 'A nullable intermediate makes the read nullable',
        code: 'o.customer.name',
        expected: { type: 'string', nullable: true }
      },
      {
        id: 'Null-Safe Hop',
        description: 'Null-safe navigation is always nullable',
        code: 'o.customer?.name',
        expected: { type: 'string', nullable: true }
      },
      {
        id: 'Array Length',
        description: '`.length` of an array is a number',
        code: 'o.lines.length',
        expected: { type: 'number', nullable: false }
      },
      {
        id: 'Set Size',
        description: '`.size` of a set is a number',
        code: 'o.tags.size',
        expected: { type: 'number', nullable: false }
      },
      {
        id: 'Unknown Member',
        description: 'Members missing from the schema do not resolve',
        code: 'o.missing',
        expected: null
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(infer(code)).toEqual(expected);
    });
  });

  describe('Combinators', () => {
    const scenarios: TestScenario<Inferred>[] = [
      {
        id: 'Project',
        description: 'Projection yields an array of the lambda result',
        code: 'o.lines.map(l => l.sku)',
        expected: { type: 'Array<string>', nullable: false }
      },
      {
        id: 'Flatten',
        description: 'Flattening unwraps one sequence level',
        code: 'o.lines.flatMap(l => [l.sku])',
        expected: { type: 'Array<string>', nullable: false }
      },
      {
        id: 'GroupBy',
        description: 'Grouping yields groupings keyed by the selector',
        code: 'o.lines.groupBy(l => l.sku)',
        expected: { type: 'Array<Grouping<string,OrderLine>>', nullable: false }
      },
      {
        id: 'Materialize Set',
        description: 'Materialization keeps the element type',
        code: 'o.lines.toSet()',
        expected: { type: 'Set<OrderLine>', nullable: false }
      },
      {
        id: 'Null-Safe Materialize',
        description: 'A null-safe receiver makes the result nullable',
        code: 'o.customer?.favorites?.toArray()',
        expected: { type: 'Array<Product>', nullable: true }
      },
      {
        id: 'Average',
        description: 'The average of an empty sequence is absent',
        code: 'o.lines.average(l => l.price)',
        expected: { type: 'number', nullable: true }
      },
      {
        id: 'FirstOrDefault',
        description: '`firstOrDefault` may be absent',
        code: 'o.lines.firstOrDefault()',
        expected: { type: 'OrderLine', nullable: true }
      },
      {
        id: 'BigInt Sum',
        description: '`sum` keeps a bigint selection bigint',
        code: 'o.lines.sum(l => l.batch)',
        expected: { type: 'bigint', nullable: false }
      },
      {
        id: 'Number Sum',
        description: '`sum` of numbers is a number',
        code: 'o.lines.sum(l => l.quantity)',
        expected: { type: 'number', nullable: false }
      },
      {
        id: 'Max With Selector',
        description: '`max` takes the selector type',
        code: 'o.lines.max(l => l.price)',
        expected: { type: 'number', nullable: true }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(infer(code)).toEqual(expected);
    });
  });

  describe('Operators And Literals', () => {
    const scenarios: TestScenario<Inferred>[] = [
      {
        id: 'String Method',
        description: 'Common string methods return strings',
        code: 'o.reference.toUpperCase()',
        expected: { type: 'string', nullable: false }
      },
      {
        id: 'Template',
        description: 'Template literals are strings',
        code: '`#${o.id}`',
        expected: { type: 'string', nullable: false }
      },
      {
        id: 'Comparison',
        description: 'Comparisons are booleans',
        code: 'o.total > 100',
        expected: { type: 'boolean', nullable: false }
      },
      {
        id: 'Coalesce',
        description: 'A non-nullable fallback removes nullability',
        code: 'o.notes ?? "none"',
        expected: { type: 'string', nullable: false }
      },
      {
        id: 'Concatenation',
        description: '`+` with a string operand is a string',
        code: 'o.reference + o.id',
        expected: { type: 'string', nullable: false }
      },
      {
        id: 'Arithmetic',
        description: 'Arithmetic on numbers is a number',
        code: 'o.id * 2',
        expected: { type: 'number', nullable: false }
      },
      {
        id: 'Date Construction',
        description: '`new Date()` is a date',
        code: 'new Date()',
        expected: { type: 'Date', nullable: false }
      },
      {
        id: 'Conditional',
        description: 'A `null` branch makes the conditional nullable',
        code: 'o.id > 0 ? o.reference : null',
        expected: { type: 'string', nullable: true }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(infer(code)).toEqual(expected);
    });
  });

  describe('Captures', () => {
    it('types declared captures', () => {
      const context = contextFor(schema, new Map([['rate', schema.resolveType('number')]]));

      expect(infer('rate * 2', context)).toEqual({ type: 'number', nullable: false });
    });

    it('leaves undeclared captures unresolved', () => {
      expect(infer('discount')).toBeNull();
    });
  });

  describe('Unannotated Schema', () => {
    it('reports unknown nullability for member reads', () => {
      const unannotated = createTypeSchema({ ...commerceSchema, nullableAnnotations: false });

      expect(infer('o.customer.name', contextFor(unannotated))).toEqual({
        type: 'string',
        nullable: undefined
      });
    });
  });
});
