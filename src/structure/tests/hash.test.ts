import { describe, expect, it, test } from 'vitest';

import { collectionOf } from '../../types/schema';
import {
  type FieldIdentity,
  computeContentHash,
  fieldSignature,
  structureSignature
} from '../hash';
import { NUMBER, STRING } from './structure-utils';

type SignatureScenario = {
  id: string;
  description: string;
  field: FieldIdentity;
  expected: string;
};

/**
 * Test suite: structural identity.
 *
 * Coverage:
 * - Field and structure signatures.
 * - Hash format and sensitivity to name, type, nullability and order.
 */
describe('Structure Hash', () => {
  describe('Signatures', () => {
    const scenarios: SignatureScenario[] = [
      {
        id: 'Leaf',
        description: 'name:type:nullable',
        field: { name: 'id', resolvedType: NUMBER, nullable: false },
        expected: 'id:number:false'
      },
      {
        id: 'Nullable Leaf',
        description: 'Nullability is part of the signature',
        field: { name: 'notes', resolvedType: STRING, nullable: true },
        expected: 'notes:string:true'
      },
      {
        id: 'Nested Collection',
        description: 'Nested Structures appear by hash',
        field: {
          name: 'lines',
          resolvedType: collectionOf('array', { kind: 'structure', hash: 'ABCD1234' }),
          nullable: false
        },
        expected: 'lines:Array<#ABCD1234>:false'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ field, expected }) => {
      expect(fieldSignature(field)).toBe(expected);
    });

    it('joins field signatures in order', () => {
      expect(
        structureSignature([
          { name: 'id', resolvedType: NUMBER, nullable: false },
          { name: 'name', resolvedType: STRING, nullable: true }
        ])
      ).toBe('id:number:false|name:string:true');
    });
  });

  describe('Content Hash', () => {
    const id: FieldIdentity = { name: 'id', resolvedType: NUMBER, nullable: false };
    const name: FieldIdentity = { name: 'name', resolvedType: STRING, nullable: true };
    const base = [id, name];

    it('is eight upper-case hex characters', () => {
      expect(computeContentHash(base)).toMatch(/^[0-9A-F]{8}$/);
    });

    it('is deterministic', () => {
      expect(computeContentHash(base)).toBe(
        computeContentHash(base.map(field => ({ ...field })))
      );
    });

    const variants: Array<{ id: string; description: string; fields: FieldIdentity[] }> = [
      {
        id: 'Renamed',
        description: 'A renamed field changes the hash',
        fields: [id, { ...name, name: 'label' }]
      },
      {
        id: 'Retyped',
        description: 'A retyped field changes the hash',
        fields: [{ ...id, resolvedType: STRING }, name]
      },
      {
        id: 'Nullability',
        description: 'A nullability flip changes the hash',
        fields: [{ ...id, nullable: true }, name]
      },
      {
        id: 'Reordered',
        description: 'Field order participates',
        fields: [name, id]
      }
    ];

    test.for(variants)('[$id] $description', ({ fields }) => {
      expect(computeContentHash(fields)).not.toBe(computeContentHash(base));
    });
  });
});
