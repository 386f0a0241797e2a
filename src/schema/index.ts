import { createHash } from 'node:crypto';

import { SchemaDefinitionError } from '../errors';
import type {
  CollectionInfo,
  EntityInfo,
  MemberInfo,
  TypeRef,
  TypeSchemaOracle
} from '../types/schema';
import { validateWithSchema } from '../validator';
import {
  type MemberDefinition,
  type TypeSchemaDefinition,
  type ValidatedTypeSchemaDefinition,
  typeSchemaDefinition
} from './definition';
import {
  type ParsedTypeExpression,
  type TypeExpressionContext,
  TypeExpressionSyntaxError,
  parseTypeExpression
} from './type-expression';
export type { TypeSchemaDefinition } from './definition';
export { typeKey } from './type-key';

/**
 * Runtime member names of a grouping value.
 */
export type GroupingMembers = {
  keyMember: string;
  elementsMember: string;
};

const DEFAULT_GROUPING_MEMBERS: GroupingMembers = {
  keyMember: 'key',
  elementsMember: 'items'
};

/**
 * Builds a {@link TypeSchemaOracle} from a declarative definition.
 *
 * Processing:
 * 1. Validate the definition shape (zod, through Standard Schema).
 * 2. Parse each member's type expression against the declared entity names.
 * 3. Freeze the result and compute the schema fingerprint.
 *
 * @throws SchemaDefinitionError for validation issues, unparsable type
 *   expressions and references to undeclared entities.
 */
export function createTypeSchema(
  definition: TypeSchemaDefinition,
  grouping: GroupingMembers = DEFAULT_GROUPING_MEMBERS
): TypeSchemaOracle {
  const validated = validateWithSchema(
    typeSchemaDefinition,
    definition,
    'type schema definition',
    message => new SchemaDefinitionError(message)
  );

  return new DeclarativeTypeSchema(validated, grouping);
}

class DeclarativeTypeSchema implements TypeSchemaOracle {
  private readonly entities = new Map<string, EntityInfo>();
  readonly fingerprint: string;

  constructor(
    definition: ValidatedTypeSchemaDefinition,
    private readonly grouping: GroupingMembers
  ) {
    const context = this.expressionContext(definition);

    for (const [name, entity] of Object.entries(definition.entities)) {
      const members = Object.entries(entity.members).map(
        ([memberName, member]) =>
          this.buildMember(name, memberName, member, context)
      );

      this.entities.set(
        name,
        Object.freeze({
          name,
          members: Object.freeze(members),
          construction: entity.construction
        })
      );
    }

    this.fingerprint = createHash('sha256')
      .update(JSON.stringify(definition))
      .update(JSON.stringify(grouping))
      .digest('hex')
      .slice(0, 16);
  }

  resolveType(expression: string): TypeRef {
    try {
      return parseTypeExpression(expression, {
        hasEntity: name => this.entities.has(name),
        annotated: true
      }).type;
    } catch (error) {
      throw wrapSyntaxError(error, `type "${expression}"`);
    }
  }

  getEntity(name: string): EntityInfo | undefined {
    return this.entities.get(name);
  }

  getMember(owner: TypeRef, name: string): MemberInfo | undefined {
    switch (owner.kind) {
      case 'entity':
        return this.entities
          .get(owner.name)
          ?.members.find(member => member.name === name);

      case 'object':
        return owner.members.find(member => member.name === name);

      case 'grouping':
        if (name === this.grouping.keyMember) {
          return { name, type: owner.key, nullable: false, readonly: true };
        }
        if (name === this.grouping.elementsMember) {
          return {
            name,
            type: { kind: 'collection', collection: 'array', element: owner.element },
            nullable: false,
            readonly: true
          };
        }
        return undefined;

      default:
        return undefined;
    }
  }

  describeCollection(type: TypeRef): CollectionInfo | undefined {
    return type.kind === 'collection'
      ? { kind: type.collection, element: type.element }
      : undefined;
  }

  private expressionContext(
    definition: ValidatedTypeSchemaDefinition
  ): TypeExpressionContext {
    return {
      hasEntity: name => Object.hasOwn(definition.entities, name),
      annotated: definition.nullableAnnotations
    };
  }

  private buildMember(
    entityName: string,
    memberName: string,
    member: MemberDefinition,
    context: TypeExpressionContext
  ): MemberInfo {
    const source = typeof member === 'string' ? member : member.type;
    const parsed = parseMemberType(
      source,
      context,
      `member "${entityName}.${memberName}"`
    );

    const declaredNullable =
      typeof member === 'string'
        ? parsed.nullable
        : (member.nullable ?? (parsed.nullable ? true : undefined));

    return Object.freeze({
      name: memberName,
      type: parsed.type,
      nullable: context.annotated ? declaredNullable : undefined,
      readonly: typeof member === 'string' ? false : (member.readonly ?? false)
    });
  }
}

function parseMemberType(
  source: string,
  context: TypeExpressionContext,
  subject: string
): ParsedTypeExpression {
  try {
    return parseTypeExpression(source, context);
  } catch (error) {
    throw wrapSyntaxError(error, subject);
  }
}

function wrapSyntaxError(error: unknown, subject: string): Error {
  if (error instanceof TypeExpressionSyntaxError) {
    return new SchemaDefinitionError(`Invalid ${subject}: ${error.reason}`, {
      cause: error
    });
  }
  return error instanceof Error ? error : new Error(String(error));
}
