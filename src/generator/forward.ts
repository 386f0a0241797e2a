import type { ArrowFunctionExpression, Expression } from 'estree';

import type { CombinatorVocabulary } from '../parser/combinators';
import { readMemberChain, staticPropertyName } from '../parser/member-chain';
import type { Scope } from '../parser/scope';
import { type InferenceContext, inferType } from '../parser/type-inference';
import type { TypeSchemaOracle } from '../types/schema';
import type {
  Field,
  NestedCollection,
  NestedField,
  Structure
} from '../types/structure';
import {
  and,
  arrow,
  call,
  coalesce,
  conditional,
  emptyArray,
  identifier,
  member,
  newExpression,
  notNull,
  objectLiteral,
  print
} from './builders';
import { defaultValueFor, emptyCollection } from './defaults';
import {
  type LoweringContext,
  elementSource,
  lowerExpression,
  projectOver
} from './lowering';
import { splitNullSafe } from './null-safe';
import type { HelperRegistry } from './runtime-helpers';

export type ForwardContext = {
  schema: TypeSchemaOracle;
  vocabulary: CombinatorVocabulary;
  elementsMember: string;
  helpers: HelperRegistry;
};

export type ForwardFunction = {
  /** `param => ({ ... })` */
  node: ArrowFunctionExpression;

  /** Top-level field name and its printed assignment expression. */
  fields: Array<{ name: string; assignment: string }>;
};

/**
 * Generates the forward projection `param => ({ ... })` of a root Structure.
 */
export function generateForward(
  structure: Structure,
  root: { param: string; scope: Scope },
  context: ForwardContext
): ForwardFunction {
  const entries = fieldEntries(structure, root.scope, context);

  return {
    node: arrow(root.param, objectLiteral(entries)),
    fields: entries.map(([name, value]) => ({ name, assignment: print(value) }))
  };
}

function fieldEntries(
  structure: Structure,
  scope: Scope,
  context: ForwardContext
): Array<readonly [string, Expression]> {
  return structure.fields.map(
    field => [field.name, fieldValue(field, scope, context)] as const
  );
}

function loweringContext(scope: Scope, context: ForwardContext): LoweringContext {
  return {
    inference: {
      schema: context.schema,
      vocabulary: context.vocabulary,
      scope,
      elementsMember: context.elementsMember
    },
    helpers: context.helpers
  };
}

/**
 * Assignment expression of one target field.
 */
export function fieldValue(
  field: Field,
  scope: Scope,
  context: ForwardContext
): Expression {
  if (!field.nested) return leafValue(field, scope, context);

  return field.nested.kind === 'object'
    ? wrapNested(
        objectLiteral(fieldEntries(field.nested.structure, scope, context)),
        field.nested,
        loweringContext(scope, context)
      )
    : wrapNested(
        collectionValue(field, field.nested, scope, context),
        field.nested,
        loweringContext(scope, context)
      );
}

/**
 * Guarded intermediates at the top level of a field: values whose own
 * annotation is nullable (a member declared nullable, an `...OrDefault`
 * call), or, without annotations, member reads below a lambda parameter.
 *
 * Nullability inherited from an outer hop is not re-guarded; that hop
 * carries its own guard.
 */
function intermediateGuard(inference: InferenceContext) {
  return (node: Expression): boolean => {
    const nullable = ownNullability(node, inference);
    if (nullable !== undefined) return nullable;

    const chain = readMemberChain(node);
    return (
      chain !== null &&
      chain.hops.length > 0 &&
      inference.scope.isParameter(chain.root)
    );
  };
}

function ownNullability(
  node: Expression,
  inference: InferenceContext
): boolean | undefined {
  if (node.type === 'MemberExpression' && node.object.type !== 'Super') {
    const name = staticPropertyName(node);
    const owner = inferType(node.object, inference);
    const declared =
      name !== null && owner.success
        ? inference.schema.getMember(owner.value.type, name)
        : undefined;
    if (declared) return declared.nullable;
  }

  const inferred = inferType(node, inference);
  return inferred.success ? inferred.value.nullable : false;
}

/**
 * Plain leaf: `guards ? body : default`, or `body ?? fallback`.
 *
 * `o.customer?.address?.city ?? "n/a"` becomes
 * `o.customer != null && o.customer.address != null ? o.customer.address.city ?? "n/a" : "n/a"`.
 */
function leafValue(field: Field, scope: Scope, context: ForwardContext): Expression {
  const lowering = loweringContext(scope, context);
  const expression = field.sourceExpression;

  const [primary, fallback] =
    expression.type === 'LogicalExpression' && expression.operator === '??'
      ? [expression.left, lowerExpression(expression.right, lowering)]
      : [expression, undefined];

  const split = splitNullSafe(primary, {
    guardIntermediate: intermediateGuard(lowering.inference)
  });
  const body = lowerExpression(split.body, lowering);

  if (split.guards.length === 0) {
    return fallback ? coalesce(body, fallback) : body;
  }

  const test = and(split.guards.map(guard => lowerExpression(guard, lowering)));

  return fallback
    ? conditional(test, coalesce(body, fallback), fallback)
    : conditional(test, body, defaultValueFor(field.resolvedType, field.nullable));
}

/**
 * Guards for reading `receiver` as a sequence: its own null-safe hops and
 * nullable intermediates, plus the receiver itself when it is reached
 * null-safely or may be absent.
 */
function receiverGuards(
  receiver: Expression,
  receiverOptional: boolean,
  lowering: LoweringContext
): { guards: Expression[]; body: Expression } {
  const guardIntermediateNode = intermediateGuard(lowering.inference);
  const split = splitNullSafe(receiver, { guardIntermediate: guardIntermediateNode });
  const guards = [...split.guards];

  const spine =
    split.body.type === 'MemberExpression' || split.body.type === 'CallExpression';
  if (receiverOptional || (spine && guardIntermediateNode(receiver))) {
    const own = notNull(split.body);
    const printed = print(own);
    if (!guards.some(guard => print(guard) === printed)) guards.push(own);
  }

  return {
    guards: guards.map(guard => lowerExpression(guard, lowering)),
    body: lowerExpression(split.body, lowering)
  };
}

/**
 * Element-wise transform of a nested collection field, guarded by a null
 * check that falls back to an empty collection (or `null` when the field
 * stays nullable).
 */
function collectionValue(
  field: Field,
  nested: NestedCollection,
  scope: Scope,
  context: ForwardContext
): Expression {
  const lowering = loweringContext(scope, context);
  const receiver = receiverGuards(nested.receiver, nested.receiverOptional, lowering);
  const source = elementSource(
    receiver.body,
    nested.receiverIsGrouping,
    context.elementsMember
  );
  const sourceIsArray =
    nested.receiverIsGrouping || nested.receiverCollection === 'array';

  let core: Expression;

  if (nested.flatten) {
    const step = nested.flatten;
    const outerScope = scope.extend(step.outerParam, step.outerElement);
    const innerScope = outerScope.extend(nested.elementParam, nested.elementType);

    const inner = receiverGuards(
      step.innerReceiver,
      step.innerReceiverOptional,
      loweringContext(outerScope, context)
    );
    const innerCore = projectOver(
      elementSource(inner.body, step.innerReceiverIsGrouping, context.elementsMember),
      step.innerReceiverIsGrouping || step.innerCollection === 'array',
      arrow(
        nested.elementParam,
        objectLiteral(fieldEntries(nested.structure, innerScope, context))
      )
    );
    const perElement =
      inner.guards.length > 0
        ? conditional(and(inner.guards), innerCore, emptyArray())
        : innerCore;

    const outerFn = arrow(step.outerParam, perElement);
    core = sourceIsArray
      ? call(member(source, 'flatMap'), [outerFn])
      : call(member(call(member(identifier('Array'), 'from'), [source]), 'flatMap'), [
          outerFn
        ]);
  } else {
    const elementScope = scope.extend(nested.elementParam, nested.elementType);
    core = projectOver(
      source,
      sourceIsArray,
      arrow(
        nested.elementParam,
        objectLiteral(fieldEntries(nested.structure, elementScope, context))
      )
    );
  }

  if (nested.materialize === 'set') core = newExpression('Set', [core]);

  if (receiver.guards.length === 0) return core;

  const otherwise = nested.fallback
    ? lowerExpression(nested.fallback, lowering)
    : field.nullable
      ? defaultValueFor(field.resolvedType, true)
      : emptyCollection(nested.materialize);

  return conditional(and(receiver.guards), core, otherwise);
}

/**
 * Re-applies a conditional wrapper (`test ? <nested> : other`) and an
 * explicit fallback around a generated nested value.
 */
function wrapNested(
  value: Expression,
  nested: NestedField,
  lowering: LoweringContext
): Expression {
  if (!nested.conditional) return value;

  const { test, nestedBranch, other } = nested.conditional;
  const loweredTest = lowerExpression(test, lowering);
  const loweredOther = lowerExpression(other, lowering);

  const wrapped =
    nestedBranch === 'consequent'
      ? conditional(loweredTest, value, loweredOther)
      : conditional(loweredTest, loweredOther, value);

  return nested.fallback
    ? coalesce(wrapped, lowerExpression(nested.fallback, lowering))
    : wrapped;
}
