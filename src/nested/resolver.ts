import type {
  ConditionalExpression,
  Expression,
  ObjectExpression,
  Property
} from 'estree';
import { is } from 'estree-toolkit';

import { readShapeBody } from '../parser/ast';
import {
  type CombinatorCall,
  type MaterializeTarget,
  matchCombinator
} from '../parser/combinators';
import { unwrapChain } from '../parser/member-chain';
import type { Scope } from '../parser/scope';
import { type SourceBase, relativeSourcePath } from '../parser/shape-parser';
import {
  type InferenceContext,
  inferType,
  isExpression,
  sequenceOf
} from '../parser/type-inference';
import type { ConditionalWrapper, FlattenStep } from '../types/structure';
import type { CollectionKind, TypeRef } from '../types/schema';

type PlanBase = {
  body: ObjectExpression;
  targetName?: string;
  conditional?: ConditionalWrapper;
  fallback?: Expression;
};

/**
 * Direct nested object: the body is built against `sourceType`, read from
 * `base` (the parent's base extended by `sourcePrefix`).
 */
export type NestedObjectPlan = PlanBase & {
  kind: 'object';
  sourceType: TypeRef;
  base: SourceBase;
  sourcePrefix: readonly string[];
};

/**
 * Nested collection: the body is built against `elementType`, read from the
 * lambda parameter `elementParam` in `scope`.
 */
export type NestedCollectionPlan = PlanBase & {
  kind: 'collection';
  via: 'project' | 'flatten';
  receiver: Expression;
  receiverOptional: boolean;
  receiverCollection: CollectionKind;
  receiverIsGrouping: boolean;
  receiverPath: readonly string[] | null;
  elementParam: string;
  elementType: TypeRef;
  flatten: FlattenStep | null;
  materialize: MaterializeTarget | null;
  scope: Scope;
};

export type UnsupportedPlan = { kind: 'unsupported'; reason: string };

export type NestedPlan = NestedObjectPlan | NestedCollectionPlan | UnsupportedPlan;

export type NestedContext = {
  inference: InferenceContext;

  /** Source of the Structure owning the field. */
  sourceType: TypeRef;
  base: SourceBase;
};

/**
 * Decides whether a field expression builds a nested shape, and how.
 *
 * Detection order:
 * 1. `<nested> ?? fallback`: the fallback replaces the generated default.
 * 2. `test ? <nested> : other` (or mirrored): exactly one branch may nest.
 * 3. One-to-many projection, optionally materialized:
 *    `o.lines.project(l => ({ ... })).toArray()`.
 * 4. Flatten: `o.orders.flatten(p => p.lines.project(l => ({ ... })))`, or a
 *    flatten whose body is itself a shape. A bare flatten (`p => p.lines`)
 *    builds no nested Structure.
 * 5. Direct nested object `{ ... }` / `new Target({ ... })`, sourced from the
 *    longest member-chain prefix its fields share.
 *
 * Returns `null` for leaves.
 */
export function planNested(
  expression: Expression,
  context: NestedContext
): NestedPlan | null {
  let primary = expression;
  let fallback: Expression | undefined;

  if (is.logicalExpression(expression) && expression.operator === '??') {
    primary = expression.left;
    fallback = expression.right;
  }

  if (is.conditionalExpression(primary)) {
    return planConditional(primary, fallback, context);
  }

  const core = planCore(primary, context);
  if (!core || core.kind === 'unsupported') return core;

  return fallback ? { ...core, fallback } : core;
}

function planConditional(
  { test, consequent, alternate }: ConditionalExpression,
  fallback: Expression | undefined,
  context: NestedContext
): NestedPlan | null {
  const whenTrue = planCore(consequent, context);
  const whenFalse = planCore(alternate, context);

  const nestsTrue = whenTrue !== null && whenTrue.kind !== 'unsupported';
  const nestsFalse = whenFalse !== null && whenFalse.kind !== 'unsupported';

  if (nestsTrue === nestsFalse) {
    if (nestsTrue) {
      return {
        kind: 'unsupported',
        reason: 'Both branches of a conditional build nested shapes; the field is kept as an opaque leaf.'
      };
    }
    return whenTrue?.kind === 'unsupported' ? whenTrue : whenFalse;
  }

  const [plan, conditional]: [NestedPlan | null, ConditionalWrapper] = nestsTrue
    ? [whenTrue, { test, nestedBranch: 'consequent', other: alternate }]
    : [whenFalse, { test, nestedBranch: 'alternate', other: consequent }];

  if (!plan || plan.kind === 'unsupported') return plan;

  return fallback
    ? { ...plan, conditional, fallback }
    : { ...plan, conditional };
}

function planCore(expression: Expression, context: NestedContext): NestedPlan | null {
  let materialize: MaterializeTarget | null = null;
  let call = matchCombinator(expression, context.inference.vocabulary);

  if (call?.role === 'materialize') {
    materialize = call.target;
    call = matchCombinator(call.receiver, context.inference.vocabulary);
    if (!call) return null;
  }

  if (call?.role === 'project') {
    return planProjection(call, materialize, context);
  }
  if (call?.role === 'flatten') {
    return planFlatten(call, materialize, context);
  }
  if (call || materialize) return null;

  const shape = readShapeBody(unwrapChain(expression));
  if (!shape) return null;

  return { kind: 'object', ...shape, ...nestedObjectSource(shape.body, context) };
}

type ReceiverInfo = {
  collection: CollectionKind;
  element: TypeRef;
  isGrouping: boolean;
};

function describeReceiver(
  receiver: Expression,
  inference: InferenceContext
): ReceiverInfo | null {
  const inferred = inferType(receiver, inference);
  if (!inferred.success) return null;

  const sequence = sequenceOf(inferred.value.type, inference);
  if (!sequence) return null;

  return {
    collection: sequence.kind,
    element: sequence.element,
    isGrouping: inferred.value.type.kind === 'grouping'
  };
}

function planProjection(
  call: Extract<CombinatorCall, { role: 'project' }>,
  materialize: MaterializeTarget | null,
  context: NestedContext
): NestedPlan | null {
  if (!call.lambda) return unsupportedCallback(call);

  // `o.lines.map(l => l.sku)` projects to leaves: no nested Structure.
  const shape = readShapeBody(call.lambda.body);
  if (!shape) return null;

  const receiver = describeReceiver(call.receiver, context.inference);
  if (!receiver) {
    return {
      kind: 'unsupported',
      reason: `The receiver of "${call.method}" is not a typed collection.`
    };
  }

  return {
    kind: 'collection',
    via: 'project',
    ...shape,
    receiver: call.receiver,
    receiverOptional: call.receiverOptional,
    receiverCollection: receiver.collection,
    receiverIsGrouping: receiver.isGrouping,
    receiverPath: relativeSourcePath(call.receiver, context.base),
    elementParam: call.lambda.param,
    elementType: receiver.element,
    flatten: null,
    materialize,
    scope: context.inference.scope.extend(call.lambda.param, receiver.element)
  };
}

function planFlatten(
  call: Extract<CombinatorCall, { role: 'flatten' }>,
  materialize: MaterializeTarget | null,
  context: NestedContext
): NestedPlan | null {
  const { lambda } = call;
  if (!lambda) return unsupportedCallback(call);

  const receiver = describeReceiver(call.receiver, context.inference);
  if (!receiver) {
    return {
      kind: 'unsupported',
      reason: `The receiver of "${call.method}" is not a typed collection.`
    };
  }

  const outerScope = context.inference.scope.extend(lambda.param, receiver.element);
  const base = {
    kind: 'collection' as const,
    via: 'flatten' as const,
    receiver: call.receiver,
    receiverOptional: call.receiverOptional,
    receiverCollection: receiver.collection,
    receiverIsGrouping: receiver.isGrouping,
    receiverPath: null,
    materialize
  };

  // `o.orders.flatten(p => ({ ... }))`: each element yields one shape.
  const direct = readShapeBody(lambda.body);
  if (direct) {
    return {
      ...base,
      ...direct,
      elementParam: lambda.param,
      elementType: receiver.element,
      flatten: null,
      scope: outerScope
    };
  }

  // `o.orders.flatten(p => p.lines.project(l => ({ ... })))`.
  let innerExpression = lambda.body;
  const peeled = matchCombinator(innerExpression, context.inference.vocabulary);
  if (peeled?.role === 'materialize') innerExpression = peeled.receiver;

  const inner = matchCombinator(innerExpression, context.inference.vocabulary);
  if (inner?.role !== 'project' || !inner.lambda) return null;

  const innerShape = readShapeBody(inner.lambda.body);
  if (!innerShape) return null;

  const innerReceiver = describeReceiver(inner.receiver, {
    ...context.inference,
    scope: outerScope
  });
  if (!innerReceiver) return null;

  return {
    ...base,
    ...innerShape,
    elementParam: inner.lambda.param,
    elementType: innerReceiver.element,
    flatten: {
      outerParam: lambda.param,
      outerElement: receiver.element,
      innerReceiver: inner.receiver,
      innerReceiverOptional: inner.receiverOptional,
      innerCollection: innerReceiver.collection,
      innerReceiverIsGrouping: innerReceiver.isGrouping
    },
    scope: outerScope.extend(inner.lambda.param, innerReceiver.element)
  };
}

/**
 * A project/flatten whose first argument is some function the resolver cannot
 * read as a lambda (block body, several parameters): the author may have
 * meant a nested shape.
 */
function unsupportedCallback(call: CombinatorCall): UnsupportedPlan | null {
  const [first] = call.call.arguments;
  const isFunction =
    first !== undefined &&
    (first.type === 'ArrowFunctionExpression' ||
      first.type === 'FunctionExpression');

  return isFunction
    ? {
        kind: 'unsupported',
        reason: `The callback of "${call.method}" must be a one-parameter arrow function with an expression body.`
      }
    : null;
}

/**
 * Source of a direct nested object.
 *
 * The prefix is the longest member path, below the parent's base, shared by
 * every member-chain field of the literal (each chain minus its final hop).
 * `{ name: o.customer.name, city: o.customer.address.city }` under `o`
 * yields `['customer']`. Without a shared prefix, or when the schema cannot
 * type it, the nested Structure reads from the parent's source.
 */
function nestedObjectSource(
  body: ObjectExpression,
  context: NestedContext
): Pick<NestedObjectPlan, 'sourceType' | 'base' | 'sourcePrefix'> {
  const parent = {
    sourceType: context.sourceType,
    base: context.base,
    sourcePrefix: []
  };

  let prefix: readonly string[] | null = null;

  for (const value of propertyValues(body)) {
    const path = relativeSourcePath(value, context.base);
    if (!path) continue;

    const owner = path.slice(0, -1);
    prefix = prefix === null ? owner : commonPrefix(prefix, owner);
    if (prefix.length === 0) return parent;
  }

  if (!prefix || prefix.length === 0) return parent;

  let type = context.sourceType;
  for (const segment of prefix) {
    const member = context.inference.schema.getMember(type, segment);
    if (!member || context.inference.schema.describeCollection(member.type)) {
      return parent;
    }
    type = member.type;
  }

  return {
    sourceType: type,
    base: { param: context.base.param, path: [...context.base.path, ...prefix] },
    sourcePrefix: prefix
  };
}

function propertyValues(body: ObjectExpression): Expression[] {
  return body.properties.flatMap((property): Expression[] =>
    isInitProperty(property) && isExpression(property.value) ? [property.value] : []
  );
}

function isInitProperty(property: ObjectExpression['properties'][number]): property is Property {
  return property.type === 'Property' && property.kind === 'init' && !property.computed;
}

function commonPrefix(left: readonly string[], right: readonly string[]): string[] {
  const shared: string[] = [];
  for (const [index, segment] of left.entries()) {
    if (right[index] !== segment) break;
    shared.push(segment);
  }
  return shared;
}
