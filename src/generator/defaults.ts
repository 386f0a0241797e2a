import type { Expression } from 'estree';
import { valueToEstree } from 'estree-util-value-to-estree';

import type { MaterializeTarget } from '../parser/combinators';
import type { TypeRef } from '../types/schema';
import { emptyArray, literal, newExpression } from './builders';

/**
 * Value a guarded field falls back to when its source is absent.
 *
 * - nullable fields and reference-like types -> `null`
 * - `string` -> `""`, `number` -> `0`, `bigint` -> `0n`, `boolean` -> `false`
 * - collections -> `[]`, or `new Set()` for sets
 */
export function defaultValueFor(type: TypeRef, nullable: boolean): Expression {
  if (nullable) return literal(null);

  switch (type.kind) {
    case 'primitive':
      switch (type.name) {
        case 'string':
          return valueToEstree('');
        case 'number':
          return valueToEstree(0);
        case 'bigint':
          return valueToEstree(0n);
        case 'boolean':
          return valueToEstree(false);
        case 'date':
          return literal(null);
      }
      break;

    case 'collection':
      return type.collection === 'set' ? newExpression('Set') : emptyArray();
  }

  return literal(null);
}

/**
 * Empty value of a materialized nested collection.
 */
export function emptyCollection(materialize: MaterializeTarget | null): Expression {
  return materialize === 'set' ? newExpression('Set') : emptyArray();
}
