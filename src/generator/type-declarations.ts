import type { GroupingMembers } from '../schema';
import type { MemberInfo, TypeRef } from '../types/schema';
import type { Field, Structure } from '../types/structure';
import { isIdentifierName } from './builders';

/**
 * Resolves the declared name of a (nested) Structure.
 */
export type TypeNamer = (structure: Structure) => string;

/**
 * Renders the TypeScript interface of one Structure.
 *
 * ```ts
 * export interface OrderDto {
 *   id: number;
 *   customerCity: string | null;
 *   lines: LinesDto_1A2B3C4D[];
 * }
 * ```
 */
export function renderInterface(
  name: string,
  structure: Structure,
  nameOf: TypeNamer,
  grouping: GroupingMembers
): string {
  const members = structure.fields.map(
    field => `  ${propertyKey(field.name)}: ${fieldType(field, nameOf, grouping)};`
  );

  return members.length === 0
    ? `export interface ${name} {}`
    : [`export interface ${name} {`, ...members, '}'].join('\n');
}

/**
 * Every Structure of a tree, parents before children, one per name.
 */
export function collectStructures(
  root: Structure,
  nameOf: TypeNamer
): Array<{ name: string; structure: Structure }> {
  const seen = new Set<string>();
  const result: Array<{ name: string; structure: Structure }> = [];

  const visit = (structure: Structure) => {
    const name = nameOf(structure);
    if (seen.has(name)) return;
    seen.add(name);
    result.push({ name, structure });

    for (const field of structure.fields) {
      if (field.nested) visit(field.nested.structure);
    }
  };

  visit(root);
  return result;
}

function fieldType(field: Field, nameOf: TypeNamer, grouping: GroupingMembers): string {
  const base = field.nested
    ? nestedType(field, nameOf)
    : renderType(field.resolvedType, grouping);

  return field.nullable ? `${base} | null` : base;
}

function nestedType(field: Field, nameOf: TypeNamer): string {
  const { nested } = field;
  if (!nested) return 'unknown';

  const name = nameOf(nested.structure);
  if (nested.kind === 'object') return name;

  return nested.materialize === 'set' ? `Set<${name}>` : `${name}[]`;
}

/**
 * TypeScript text of a schema type.
 */
export function renderType(type: TypeRef, grouping: GroupingMembers): string {
  switch (type.kind) {
    case 'primitive':
      return type.name === 'date' ? 'Date' : type.name;

    case 'entity':
      return type.name;

    case 'collection': {
      const element = renderType(type.element, grouping);
      if (type.collection === 'set') return `Set<${element}>`;
      if (type.collection === 'iterable') return `Iterable<${element}>`;
      return /^[\w$.]+$/.test(element) ? `${element}[]` : `Array<${element}>`;
    }

    case 'grouping':
      return renderObject(
        [
          { name: grouping.keyMember, type: type.key, nullable: false, readonly: true },
          {
            name: grouping.elementsMember,
            type: { kind: 'collection', collection: 'array', element: type.element },
            nullable: false,
            readonly: true
          }
        ],
        grouping
      );

    case 'object':
      return renderObject(type.members, grouping);

    case 'structure':
      return `Structure_${type.hash}`;

    case 'unknown':
      return 'unknown';
  }
}

function renderObject(members: readonly MemberInfo[], grouping: GroupingMembers): string {
  if (members.length === 0) return '{}';

  const parts = members.map(member => {
    const type = renderType(member.type, grouping);
    const optional = member.nullable === true ? '?' : '';
    const readonly = member.readonly ? 'readonly ' : '';
    return `${readonly}${propertyKey(member.name)}${optional}: ${member.nullable === true ? `${type} | null` : type}`;
  });

  return `{ ${parts.join('; ')} }`;
}

function propertyKey(name: string): string {
  return isIdentifierName(name) ? name : JSON.stringify(name);
}
