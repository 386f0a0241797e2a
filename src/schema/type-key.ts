import type { TypeRef } from '../types/schema';

/**
 * Canonical, injective text form of a `TypeRef`.
 *
 * Used inside content hashes and interning signatures, so the output must be
 * stable across runs and must distinguish every structurally different type:
 *
 * - `string`, `number`, ... for primitives (`Date` for dates)
 * - `Customer` for entities
 * - `Array<T>` / `Set<T>` / `Iterable<T>` for collections
 * - `Grouping<K,E>` for groupings
 * - `{a:string;b?:number}` for anonymous objects (`?` marks nullable members)
 * - `#1A2B3C4D` for nested structures
 * - `unknown`
 */
export function typeKey(type: TypeRef): string {
  switch (type.kind) {
    case 'primitive':
      return type.name === 'date' ? 'Date' : type.name;
    case 'entity':
      return type.name;
    case 'collection': {
      const container =
        type.collection === 'array'
          ? 'Array'
          : type.collection === 'set'
            ? 'Set'
            : 'Iterable';
      return `${container}<${typeKey(type.element)}>`;
    }
    case 'grouping':
      return `Grouping<${typeKey(type.key)},${typeKey(type.element)}>`;
    case 'object':
      return `{${type.members
        .map(
          member =>
            `${member.name}${member.nullable === true ? '?' : ''}:${typeKey(member.type)}`
        )
        .join(';')}}`;
    case 'structure':
      return `#${type.hash}`;
    case 'unknown':
      return 'unknown';
  }
}

/**
 * Whether two type refs denote the same type.
 */
export function sameType(left: TypeRef, right: TypeRef): boolean {
  return typeKey(left) === typeKey(right);
}
