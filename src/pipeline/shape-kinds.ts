import { sourceLabel } from '../parser/shape-parser';
import { typeKey } from '../schema/type-key';
import type { TypeRef } from '../types/schema';

/**
 * The three kinds of shape a call site can declare.
 *
 * - `anonymous`: `o => ({ ... })` without a target name; the target type is
 *   inferred in place.
 * - `named`: `o => new OrderDto({ ... })`, or a call site naming its target.
 * - `grouping`: the source is a grouped sequence; key-derived fields read
 *   the key's members, aggregates run over the group's elements.
 */
export type ShapeKind =
  | { kind: 'anonymous'; source: TypeRef }
  | { kind: 'named'; source: TypeRef; targetName: string }
  | {
      kind: 'grouping';
      source: Extract<TypeRef, { kind: 'grouping' }>;
      targetName?: string;
    };

/**
 * Per-kind behavior shared by every call site of that kind.
 */
export interface ShapeStrategy<K extends ShapeKind = ShapeKind> {
  readonly kind: K['kind'];

  /** Naming hint of the root Structure. */
  hint(shape: K): string;

  targetName(shape: K): string | undefined;

  /**
   * Name fragment of the source in prebuilt declarations, or a reason why
   * the shape cannot be prebuilt.
   */
  prebuiltSource(shape: K): { name: string } | { blocked: string };
}

const anonymousStrategy: ShapeStrategy<Extract<ShapeKind, { kind: 'anonymous' }>> = {
  kind: 'anonymous',
  hint: shape => identifierFragment(sourceLabel(shape.source)),
  targetName: () => undefined,
  prebuiltSource: () => ({ blocked: 'the target type is inferred in place' })
};

const namedStrategy: ShapeStrategy<Extract<ShapeKind, { kind: 'named' }>> = {
  kind: 'named',
  hint: shape => shape.targetName,
  targetName: shape => shape.targetName,
  prebuiltSource: shape => ({ name: identifierFragment(typeKey(shape.source)) })
};

const groupingStrategy: ShapeStrategy<Extract<ShapeKind, { kind: 'grouping' }>> = {
  kind: 'grouping',
  hint: shape => shape.targetName ?? 'Group',
  targetName: shape => shape.targetName,
  prebuiltSource: shape => {
    if (!shape.targetName) {
      return { blocked: 'the target type is inferred in place' };
    }
    if (shape.source.key.kind === 'object') {
      return { blocked: 'the grouping key type is anonymous' };
    }
    return { name: identifierFragment(typeKey(shape.source)) };
  }
};

/**
 * Classifies a call site. A grouping source wins over a target name.
 */
export function classifyShape(
  source: TypeRef,
  targetName: string | undefined
): ShapeKind {
  if (source.kind === 'grouping') {
    return targetName ? { kind: 'grouping', source, targetName } : { kind: 'grouping', source };
  }
  return targetName
    ? { kind: 'named', source, targetName }
    : { kind: 'anonymous', source };
}

/**
 * The strategy of a shape, applied to it.
 */
export type SelectedStrategy = {
  kind: ShapeKind['kind'];
  hint: string;
  targetName: string | undefined;
  prebuiltSource: { name: string } | { blocked: string };
};

export function selectStrategy(shape: ShapeKind): SelectedStrategy {
  switch (shape.kind) {
    case 'anonymous':
      return apply(anonymousStrategy, shape);
    case 'named':
      return apply(namedStrategy, shape);
    case 'grouping':
      return apply(groupingStrategy, shape);
  }
}

function apply<K extends ShapeKind>(
  strategy: ShapeStrategy<K>,
  shape: K
): SelectedStrategy {
  return {
    kind: strategy.kind,
    hint: strategy.hint(shape),
    targetName: strategy.targetName(shape),
    prebuiltSource: strategy.prebuiltSource(shape)
  };
}

/**
 * `Grouping<string,Order>` -> `Grouping_string_Order`.
 */
export function identifierFragment(text: string): string {
  const fragment = text
    .replace(/[^\w$]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return fragment.length > 0 ? fragment : 'Source';
}
