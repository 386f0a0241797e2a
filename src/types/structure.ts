import type { Expression } from 'estree';

import type { NullabilityReason } from '../nullability/resolver';
import type { MaterializeTarget } from '../parser/combinators';
import type { CollectionKind, TypeRef } from './schema';

/**
 * `test ? <nested> : other` (or mirrored) around a nested shape.
 */
export type ConditionalWrapper = {
  test: Expression;
  nestedBranch: 'consequent' | 'alternate';
  other: Expression;
};

type NestedFieldBase = {
  structure: Structure;

  /** Present when the nested shape was written `new Target({ ... })`. */
  targetName?: string;

  conditional?: ConditionalWrapper;

  /** Right-hand side of a top-level `??`, used in place of the default. */
  fallback?: Expression;
};

/**
 * Direct nested object `{ ... }`.
 *
 * `sourcePrefix` is the member path from the parent's source to the nested
 * Structure's source (`['customer']` for `{ name: o.customer.name }`); empty
 * when the nested Structure reads from the parent's source itself.
 */
export type NestedObject = NestedFieldBase & {
  kind: 'object';
  sourcePrefix: readonly string[];
};

/**
 * Inner step of a flatten + reproject: `outer.flatten(p => p.inner.project(q => ({...})))`.
 */
export type FlattenStep = {
  outerParam: string;
  outerElement: TypeRef;
  innerReceiver: Expression;
  innerReceiverOptional: boolean;
  innerCollection: CollectionKind;

  /** The inner receiver is a grouping; its elements member is projected. */
  innerReceiverIsGrouping: boolean;
};

/**
 * Nested collection: one-to-many projection, optionally through a flatten,
 * optionally materialized.
 */
export type NestedCollection = NestedFieldBase & {
  kind: 'collection';
  via: 'project' | 'flatten';

  /** The collection being projected (or flattened). */
  receiver: Expression;
  receiverOptional: boolean;
  receiverCollection: CollectionKind;

  /** The receiver is a grouping; its elements member is projected. */
  receiverIsGrouping: boolean;

  /** The lambda parameter bound to each element of the nested shape. */
  elementParam: string;
  elementType: TypeRef;

  /** Set for flatten + reproject. */
  flatten: FlattenStep | null;

  materialize: MaterializeTarget | null;

  /**
   * Member path of `receiver` relative to the parent's source; `null` when it
   * is not a pure member chain (no inverse then).
   */
  receiverPath: readonly string[] | null;
};

export type NestedField = NestedObject | NestedCollection;

export type Field = {
  name: string;

  /** The defining source sub-expression, as written in the shape. */
  sourceExpression: Expression;

  /**
   * Member path relative to the owning Structure's source when the
   * expression is a pure member chain; otherwise `null`.
   */
  sourcePath: readonly string[] | null;

  /**
   * Leaf: the inferred type (`unknown` when unresolved).
   * Nested: `structure(hash)` or `collection(kind, structure(hash))`.
   */
  resolvedType: TypeRef;

  nullable: boolean;
  nullabilityReason: NullabilityReason;

  nested?: NestedField;

  /** The nested shape was written as `new Target({ ... })`. */
  isFromNamedSubtype: boolean;

  lineage: string;
};

/**
 * Canonical, immutable model of a shape.
 *
 * Frozen once built; `contentHash` depends only on the ordered
 * (name, nullable, type-or-nested-hash) field sequence.
 */
export type Structure = {
  sourceType: TypeRef;
  fields: readonly Field[];
  contentHash: string;

  /** Set for named shapes (`new Target({ ... })` or a call-site target). */
  targetName?: string;

  /** Naming hint for anonymous structures (PascalCase field or source name). */
  hint: string;
};
