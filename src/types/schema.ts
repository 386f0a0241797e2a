/**
 * Type vocabulary shared by the schema oracle, the shape parser and the
 * generators.
 *
 * A `TypeRef` is a plain, serializable description of a value's static type.
 * It never carries behaviour; lookups go through {@link TypeSchemaOracle}.
 */

export type PrimitiveName = 'string' | 'number' | 'boolean' | 'bigint' | 'date';

/**
 * Runtime container kinds a collection member may have.
 *
 * - `array`    : `T[]` / `Array<T>` / `ReadonlyArray<T>`
 * - `set`      : `Set<T>`
 * - `iterable` : any other enumerable sequence (`Iterable<T>`)
 */
export type CollectionKind = 'array' | 'set' | 'iterable';

export type PrimitiveTypeRef = { kind: 'primitive'; name: PrimitiveName };

export type EntityTypeRef = { kind: 'entity'; name: string };

export type CollectionTypeRef = {
  kind: 'collection';
  collection: CollectionKind;
  element: TypeRef;
};

/**
 * A grouped sequence: a `key` plus the sequence of elements sharing it.
 *
 * The member names under which key and elements are reachable at runtime are
 * configuration (`grouping.keyMember` / `grouping.elementsMember`), not part
 * of the type.
 */
export type GroupingTypeRef = {
  kind: 'grouping';
  key: TypeRef;
  element: TypeRef;
};

/**
 * Anonymous / transient object type (inline schema objects, group keys built
 * from object literals). Not nominally addressable.
 */
export type ObjectTypeRef = { kind: 'object'; members: readonly MemberInfo[] };

/**
 * A projected nested Structure, addressed by content hash.
 */
export type StructureTypeRef = { kind: 'structure'; hash: string };

export type UnknownTypeRef = { kind: 'unknown' };

export type TypeRef =
  | PrimitiveTypeRef
  | EntityTypeRef
  | CollectionTypeRef
  | GroupingTypeRef
  | ObjectTypeRef
  | StructureTypeRef
  | UnknownTypeRef;

export type MemberInfo = {
  name: string;
  type: TypeRef;

  /**
   * Declared nullability annotation.
   *
   * `undefined` means the annotation is unavailable (schema built with
   * `nullableAnnotations: false`); the nullability resolver then falls back to
   * syntactic heuristics.
   */
  nullable: boolean | undefined;

  readonly: boolean;
};

/**
 * How a missing instance of an entity is default-constructed:
 * - `literal`     : `{}`
 * - `constructor` : `new Name()`
 * - `none`        : cannot be constructed (abstract, required arguments)
 */
export type EntityConstruction = 'literal' | 'constructor' | 'none';

export type EntityInfo = {
  name: string;
  members: readonly MemberInfo[];
  construction: EntityConstruction;
};

export type CollectionInfo = {
  kind: CollectionKind;
  element: TypeRef;
};

/**
 * Read-only view of the host's source-type schema.
 *
 * Never mutated by the compiler; safe to share between sessions.
 */
export interface TypeSchemaOracle {
  /**
   * Resolves a type expression (e.g. `"Order"`, `"Grouping<{ a: string }, Item>"`).
   *
   * @throws SchemaDefinitionError on syntax errors or unknown entity names.
   */
  resolveType(expression: string): TypeRef;

  getEntity(name: string): EntityInfo | undefined;

  /**
   * Looks up a member on an entity, anonymous object or grouping.
   */
  getMember(owner: TypeRef, name: string): MemberInfo | undefined;

  /**
   * Describes `type` as a collection, or `undefined` when it is not one.
   * Groupings are not collections: their elements member is.
   */
  describeCollection(type: TypeRef): CollectionInfo | undefined;

  /**
   * Content digest of the schema; participates in memoization keys.
   */
  readonly fingerprint: string;
}

export const UNKNOWN_TYPE: UnknownTypeRef = { kind: 'unknown' };

export function primitive(name: PrimitiveName): PrimitiveTypeRef {
  return { kind: 'primitive', name };
}

export function collectionOf(
  collection: CollectionKind,
  element: TypeRef
): CollectionTypeRef {
  return { kind: 'collection', collection, element };
}
