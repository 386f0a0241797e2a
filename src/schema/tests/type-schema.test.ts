import { describe, expect, it, test } from 'vitest';

import { createTypeSchema, typeKey } from '..';
import { SchemaDefinitionError } from '../../errors';
import { commerceSchema, type TestScenario } from '../../pipeline/tests/fixtures';

/**
 * Test suite: declarative type schema.
 *
 * Coverage:
 * - Type expression grammar (collections, groupings, anonymous objects).
 * - Member metadata (nullability, readonly, grouping members).
 * - Fingerprint stability.
 * - Definition errors.
 */
describe('Type Schema', () => {
  const schema = createTypeSchema(commerceSchema);

  describe('Type Expressions', () => {
    const scenarios: TestScenario<string>[] = [
      {
        id: 'Entity',
        description: 'A declared entity resolves nominally',
        code: 'Order',
        expected: 'Order'
      },
      {
        id: 'Array Suffix',
        description: '`T[]` is an array collection',
        code: 'string[]',
        expected: 'Array<string>'
      },
      {
        id: 'ReadonlyArray',
        description: '`ReadonlyArray<T>` is an array collection too',
        code: 'ReadonlyArray<Order>',
        expected: 'Array<Order>'
      },
      {
        id: 'Set',
        description: '`Set<T>` keeps its container kind',
        code: 'Set<number>',
        expected: 'Set<number>'
      },
      {
        id: 'Iterable',
        description: 'Dates and iterables',
        code: 'Iterable<Date>',
        expected: 'Iterable<Date>'
      },
      {
        id: 'Nested Arrays',
        description: 'Array suffixes stack',
        code: 'Order[][]',
        expected: 'Array<Array<Order>>'
      },
      {
        id: 'Parenthesized Union',
        description: 'Nullability inside parentheses does not leak into the array',
        code: '(Customer | null)[]',
        expected: 'Array<Customer>'
      },
      {
        id: 'Grouping',
        description: 'Groupings carry key and element types',
        code: 'Grouping<string, OrderLine>',
        expected: 'Grouping<string,OrderLine>'
      },
      {
        id: 'Anonymous Object',
        description: 'Optional members of anonymous objects are nullable',
        code: '{ id: number; label?: string }',
        expected: '{id:number;label?:string}'
      },
      {
        id: 'Anonymous Key',
        description: 'Groupings may be keyed by anonymous objects',
        code: 'Grouping<{ category: string }, OrderLine>',
        expected: 'Grouping<{category:string},OrderLine>'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(typeKey(schema.resolveType(code))).toBe(expected);
    });
  });

  describe('Members', () => {
    it('reports declared nullability from the type expression', () => {
      const order = schema.resolveType('Order');

      expect(schema.getMember(order, 'customer')).toEqual({
        name: 'customer',
        type: { kind: 'entity', name: 'Customer' },
        nullable: true,
        readonly: false
      });
      expect(schema.getMember(order, 'reference')?.nullable).toBe(false);
    });

    it('leaves nullability unknown for object-form members without a flag', () => {
      const member = schema.getMember(schema.resolveType('Order'), 'version');

      expect(member?.readonly).toBe(true);
      expect(member?.nullable).toBeUndefined();
    });

    it('exposes the key and elements members of a grouping', () => {
      const grouping = schema.resolveType('Grouping<string, OrderLine>');

      expect(schema.getMember(grouping, 'key')).toEqual({
        name: 'key',
        type: { kind: 'primitive', name: 'string' },
        nullable: false,
        readonly: true
      });
      expect(schema.getMember(grouping, 'items')?.type).toEqual({
        kind: 'collection',
        collection: 'array',
        element: { kind: 'entity', name: 'OrderLine' }
      });
      expect(schema.getMember(grouping, 'values')).toBeUndefined();
    });

    it('uses the configured grouping member names', () => {
      const custom = createTypeSchema(commerceSchema, {
        keyMember: 'k',
        elementsMember: 'values'
      });
      const grouping = custom.resolveType('Grouping<string, OrderLine>');

      expect(custom.getMember(grouping, 'k')?.readonly).toBe(true);
      expect(custom.getMember(grouping, 'values')).toBeDefined();
      expect(custom.getMember(grouping, 'key')).toBeUndefined();
    });

    it('reports every member as unannotated when annotations are disabled', () => {
      const unannotated = createTypeSchema({ ...commerceSchema, nullableAnnotations: false });
      const order = unannotated.resolveType('Order');

      expect(unannotated.getMember(order, 'customer')?.nullable).toBeUndefined();
      expect(unannotated.getMember(order, 'id')?.nullable).toBeUndefined();
    });

    it('describes collections but not groupings', () => {
      expect(schema.describeCollection(schema.resolveType('Set<Order>'))).toEqual({
        kind: 'set',
        element: { kind: 'entity', name: 'Order' }
      });
      expect(
        schema.describeCollection(schema.resolveType('Grouping<string, Order>'))
      ).toBeUndefined();
    });

    it('records the construction mode of each entity', () => {
      expect(schema.getEntity('Order')?.construction).toBe('literal');
      expect(schema.getEntity('Product')?.construction).toBe('constructor');
      expect(schema.getEntity('Shipment')?.construction).toBe('none');
    });
  });

  describe('Fingerprint', () => {
    it('is stable for equal definitions and changes with the definition', () => {
      const again = createTypeSchema(commerceSchema);
      const changed = createTypeSchema({
        entities: { ...commerceSchema.entities, Tag: { members: { label: 'string' } } }
      });

      expect(again.fingerprint).toBe(schema.fingerprint);
      expect(changed.fingerprint).not.toBe(schema.fingerprint);
      expect(schema.fingerprint).toMatch(/^[0-9a-f]{16}$/);
    });
  });

  describe('Definition Errors', () => {
    const scenarios: TestScenario<string>[] = [
      {
        id: 'Unknown Entity',
        description: 'References to undeclared entities are rejected',
        code: 'Customr',
        expected: '[projection] Invalid member "Order.customer": unknown entity "Customr"'
      },
      {
        id: 'Wide Union',
        description: 'Only nullish members may join a union',
        code: 'string | number',
        expected:
          '[projection] Invalid member "Order.customer": unions of two non-nullish types are not supported'
      },
      {
        id: 'Arity',
        description: 'Generic arity is checked',
        code: 'Set<string, number>',
        expected:
          '[projection] Invalid member "Order.customer": "Set" takes 1 type argument(s), received 2'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(() =>
        createTypeSchema({ entities: { Order: { members: { customer: code } } } })
      ).toThrow(expected);
    });

    it('rejects unknown names passed to resolveType', () => {
      expect(() => schema.resolveType('Invoice')).toThrow(
        '[projection] Invalid type "Invoice": unknown entity "Invoice"'
      );
    });

    it('rejects definitions that fail validation', () => {
      expect(() =>
        createTypeSchema({ entities: { Order: { members: { id: '' } } } })
      ).toThrow(SchemaDefinitionError);
    });
  });
});
