import type { Expression } from 'estree';

import {
  type CombinatorVocabulary,
  matchCombinator
} from '../parser/combinators';
import {
  hasTopLevelNullSafe,
  isConditionalRoot,
  readMemberChain
} from '../parser/member-chain';
import type { Scope } from '../parser/scope';
import type { StaticResult } from '../parser/static-result';
import type { InferredType } from '../parser/type-inference';

/**
 * Which signal decided a field's nullability.
 */
export type NullabilityReason =
  | 'member-annotation'
  | 'materialized-collection'
  | 'null-safe-navigation'
  | 'member-chain-heuristic'
  | 'collection-collapse'
  | 'explicit-fallback'
  | 'expression-type';

export type NullabilityDecision = {
  nullable: boolean;
  reason: NullabilityReason;
};

export type NullabilityInput = {
  expression: Expression;
  declared: StaticResult<InferredType>;

  /** What the nested resolver made of the field, if anything. */
  nested: 'object' | 'collection' | null;
};

export type NullabilityContext = {
  scope: Scope;
  vocabulary: CombinatorVocabulary;

  /** Collapse rule switch (`collectionNullabilityRemoval`). */
  collapseCollections: boolean;
};

/**
 * Decides whether a target field may be absent.
 *
 * Precedence (first match wins, later rules may override as noted):
 * 1. Direct member read: inherit the member's declared annotation (made
 *    nullable by any nullable hop it is reached through).
 * 2. Materialize call not reached null-safely: the outer collection is
 *    non-nullable.
 * 3. Null-safe navigation at the top level: nullable (overrides 1).
 * 4. No annotation available and a member chain of two or more hops from a
 *    lambda parameter: nullable.
 * 5. Nested collection Structure not wrapped in a conditional: collapsed to
 *    non-nullable; the generated code falls back to an empty collection.
 *
 * An explicit fallback (`expr ?? fallback`) bypasses rules 1-4: the field is
 * as nullable as the fallback.
 */
export function resolveNullability(
  input: NullabilityInput,
  context: NullabilityContext
): NullabilityDecision {
  const decision = decideFromSignals(input, context);

  // 5. Collapse rule.
  if (
    decision.nullable &&
    context.collapseCollections &&
    input.nested === 'collection' &&
    !isConditionalRoot(input.expression)
  ) {
    return { nullable: false, reason: 'collection-collapse' };
  }

  return decision;
}

function decideFromSignals(
  input: NullabilityInput,
  context: NullabilityContext
): NullabilityDecision {
  const { expression, declared } = input;
  const annotation = declared.success ? declared.value.nullable : undefined;

  if (expression.type === 'LogicalExpression' && expression.operator === '??') {
    return { nullable: annotation === true, reason: 'explicit-fallback' };
  }

  const nullSafe = hasTopLevelNullSafe(expression);
  const chain = readMemberChain(expression);

  let decision: NullabilityDecision;

  if (expression.type === 'MemberExpression' && chain) {
    // 1. Direct member read.
    decision = { nullable: annotation === true, reason: 'member-annotation' };
  } else if (
    !nullSafe &&
    matchCombinator(expression, context.vocabulary)?.role === 'materialize'
  ) {
    // 2. Materialized collection.
    return { nullable: false, reason: 'materialized-collection' };
  } else {
    decision = { nullable: annotation === true, reason: 'expression-type' };
  }

  // 3. Null-safe navigation overrides the annotation.
  if (nullSafe) {
    return { nullable: true, reason: 'null-safe-navigation' };
  }

  // 4. Syntactic fallback when annotations are unavailable.
  if (
    annotation === undefined &&
    chain !== null &&
    chain.hops.length >= 2 &&
    context.scope.isParameter(chain.root)
  ) {
    return { nullable: true, reason: 'member-chain-heuristic' };
  }

  return decision;
}
