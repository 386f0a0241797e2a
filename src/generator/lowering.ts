import type { CallExpression, Expression, SpreadElement } from 'estree';

import {
  type CombinatorCall,
  matchCombinator
} from '../parser/combinators';
import {
  type InferenceContext,
  inferAggregate,
  inferType,
  isExpression,
  isPrimitive,
  sequenceOf
} from '../parser/type-inference';
import { type CollectionInfo, UNKNOWN_TYPE } from '../types/schema';
import {
  and,
  arrow,
  call,
  conditional,
  identifier,
  member,
  newExpression
} from './builders';
import { defaultValueFor } from './defaults';
import { splitNullSafe } from './null-safe';
import type { HelperRegistry } from './runtime-helpers';

export type LoweringContext = {
  inference: InferenceContext;
  helpers: HelperRegistry;
};

/**
 * Rewrites a shape expression into plain JavaScript.
 *
 * - Combinator calls on typed sequences become native array operations or
 *   runtime helper calls:
 *   - project     -> `src.map(fn)` on arrays, `Array.from(src, fn)` otherwise
 *   - flatten     -> `src.flatMap(fn)` when both levels are arrays,
 *                    `__flatMap(src, fn)` otherwise
 *   - materialize -> `Array.from(src)` / `new Set(src)`
 *   - groupBy     -> `__groupBy(src, fn)`
 *   - aggregates  -> `__sum(src, fn)`, `__count(src)`, ...
 * - A grouping receiver is read through its elements member.
 * - Null-safe chains below the top level become
 *   `guards ? body : undefined`.
 *
 * Calls on untyped receivers are kept as written. Types are always inferred
 * on the original nodes; the input is never mutated.
 */
export function lowerExpression(
  expression: Expression,
  context: LoweringContext
): Expression {
  switch (expression.type) {
    case 'ChainExpression': {
      const { guards, body } = splitNullSafe(expression);
      const lowered = lowerExpression(body, context);
      if (guards.length === 0) return lowered;

      return conditional(
        and(guards.map(guard => lowerExpression(guard, context))),
        lowered,
        identifier('undefined')
      );
    }

    case 'CallExpression':
      return lowerCall(expression, context);

    case 'MemberExpression':
      if (expression.object.type === 'Super') return expression;
      return {
        ...expression,
        object: lowerExpression(expression.object, context),
        property:
          expression.computed && expression.property.type !== 'PrivateIdentifier'
            ? lowerExpression(expression.property, context)
            : expression.property
      };

    case 'NewExpression':
      return {
        ...expression,
        arguments: lowerArguments(expression.arguments, context)
      };

    case 'ArrowFunctionExpression': {
      if (expression.body.type === 'BlockStatement') return expression;
      const [param] = expression.params;
      const scope =
        param && param.type === 'Identifier'
          ? context.inference.scope.extend(param.name, UNKNOWN_TYPE)
          : context.inference.scope;
      return {
        ...expression,
        body: lowerExpression(expression.body, withScope(context, scope))
      };
    }

    case 'UnaryExpression':
      return {
        ...expression,
        argument: lowerExpression(expression.argument, context)
      };

    case 'BinaryExpression':
      if (expression.left.type === 'PrivateIdentifier') return expression;
      return {
        ...expression,
        left: lowerExpression(expression.left, context),
        right: lowerExpression(expression.right, context)
      };

    case 'LogicalExpression':
      return {
        ...expression,
        left: lowerExpression(expression.left, context),
        right: lowerExpression(expression.right, context)
      };

    case 'ConditionalExpression':
      return {
        ...expression,
        test: lowerExpression(expression.test, context),
        consequent: lowerExpression(expression.consequent, context),
        alternate: lowerExpression(expression.alternate, context)
      };

    case 'TemplateLiteral':
      return {
        ...expression,
        expressions: expression.expressions.map(item =>
          lowerExpression(item, context)
        )
      };

    case 'ArrayExpression':
      return {
        ...expression,
        elements: expression.elements.map(element =>
          element === null ? null : lowerArgument(element, context)
        )
      };

    case 'ObjectExpression':
      return {
        ...expression,
        properties: expression.properties.map(property => {
          if (property.type === 'SpreadElement') {
            return { ...property, argument: lowerExpression(property.argument, context) };
          }
          return isExpression(property.value)
            ? { ...property, value: lowerExpression(property.value, context) }
            : property;
        })
      };

    default:
      return expression;
  }
}

function lowerArgument(
  argument: Expression | SpreadElement,
  context: LoweringContext
): Expression | SpreadElement {
  return argument.type === 'SpreadElement'
    ? { ...argument, argument: lowerExpression(argument.argument, context) }
    : lowerExpression(argument, context);
}

function lowerArguments(
  args: ReadonlyArray<Expression | SpreadElement>,
  context: LoweringContext
): Array<Expression | SpreadElement> {
  return args.map(argument => lowerArgument(argument, context));
}

function withScope(
  context: LoweringContext,
  scope: InferenceContext['scope']
): LoweringContext {
  return { ...context, inference: { ...context.inference, scope } };
}

function lowerCall(expression: CallExpression, context: LoweringContext): Expression {
  const combinator = matchCombinator(expression, context.inference.vocabulary);

  if (combinator) {
    const receiver = inferType(combinator.receiver, context.inference);
    const sequence = receiver.success
      ? sequenceOf(receiver.value.type, context.inference)
      : undefined;

    if (receiver.success && sequence) {
      const lowered = lowerCombinator(
        combinator,
        sequence,
        receiver.value.type.kind === 'grouping',
        context
      );
      if (lowered) return lowered;
    }
  }

  if (expression.callee.type === 'Super') return expression;

  return {
    ...expression,
    callee: lowerExpression(expression.callee, context),
    arguments: lowerArguments(expression.arguments, context)
  };
}

/**
 * Receiver as an element source: a grouping is read through its elements
 * member.
 */
export function elementSource(
  receiver: Expression,
  isGrouping: boolean,
  elementsMember: string
): Expression {
  return isGrouping ? member(receiver, elementsMember) : receiver;
}

/**
 * `src.map(fn)` for arrays, `Array.from(src, fn)` for any other iterable.
 */
export function projectOver(
  source: Expression,
  isArray: boolean,
  fn: Expression
): Expression {
  return isArray
    ? call(member(source, 'map'), [fn])
    : call(member(identifier('Array'), 'from'), [source, fn]);
}

function lowerCombinator(
  combinator: CombinatorCall,
  sequence: CollectionInfo,
  isGrouping: boolean,
  context: LoweringContext
): Expression | null {
  const source = elementSource(
    lowerExpression(combinator.receiver, context),
    isGrouping,
    context.inference.elementsMember
  );
  const isArray = isGrouping || sequence.kind === 'array';

  switch (combinator.role) {
    case 'project':
    case 'flatten':
    case 'groupBy': {
      const { lambda } = combinator;
      if (!lambda) return null;

      const inner = withScope(
        context,
        context.inference.scope.extend(lambda.param, sequence.element)
      );
      const fn = arrow(lambda.param, lowerExpression(lambda.body, inner));

      if (combinator.role === 'project') return projectOver(source, isArray, fn);

      if (combinator.role === 'groupBy') {
        return call(identifier(context.helpers.use('groupBy')), [source, fn]);
      }

      const body = inferType(lambda.body, inner.inference);
      const yieldsArray =
        body.success &&
        body.value.type.kind === 'collection' &&
        body.value.type.collection === 'array';

      return isArray && yieldsArray
        ? call(member(source, 'flatMap'), [fn])
        : call(identifier(context.helpers.use('flatMap')), [source, fn]);
    }

    case 'materialize':
      return combinator.target === 'set'
        ? newExpression('Set', [source])
        : call(member(identifier('Array'), 'from'), [source]);

    case 'aggregate': {
      const args = combinator.args.map(argument =>
        lowerSelector(argument, sequence, context)
      );

      // A bigint sum passes its own zero: `__sum(src, fn, 0n)`.
      if (combinator.operator === 'sum') {
        const total = inferAggregate(combinator, sequence, context.inference);
        if (total.success && isPrimitive(total.value.type, 'bigint')) {
          const [selector = identifier('undefined')] = args;
          return call(identifier(context.helpers.use('sum')), [
            source,
            selector,
            defaultValueFor(total.value.type, false)
          ]);
        }
      }

      return call(identifier(context.helpers.use(combinator.operator)), [
        source,
        ...args
      ]);
    }
  }
}

/**
 * Aggregate arguments: selector/predicate lambdas see the element type.
 */
function lowerSelector(
  argument: Expression,
  sequence: CollectionInfo,
  context: LoweringContext
): Expression {
  if (
    argument.type !== 'ArrowFunctionExpression' ||
    argument.body.type === 'BlockStatement'
  ) {
    return lowerExpression(argument, context);
  }

  const [param] = argument.params;
  if (!param || param.type !== 'Identifier') return lowerExpression(argument, context);

  return {
    ...argument,
    body: lowerExpression(
      argument.body,
      withScope(context, context.inference.scope.extend(param.name, sequence.element))
    )
  };
}
