import type {
  ArrowFunctionExpression,
  CallExpression,
  Expression
} from 'estree';

import { staticPropertyName, unwrapChain } from './member-chain';

export const AGGREGATE_OPERATORS = [
  'count',
  'sum',
  'average',
  'min',
  'max',
  'first',
  'last',
  'firstOrDefault',
  'lastOrDefault',
  'any',
  'all'
] as const;

export type AggregateOperator = (typeof AGGREGATE_OPERATORS)[number];

export type MaterializeTarget = 'array' | 'set';

/**
 * Method names recognized as sequence combinators, by role.
 */
export type CombinatorVocabulary = {
  project: ReadonlySet<string>;
  flatten: ReadonlySet<string>;
  materialize: ReadonlyMap<string, MaterializeTarget>;
  groupBy: ReadonlySet<string>;
  aggregate: ReadonlyMap<string, AggregateOperator>;
};

/**
 * A lambda argument `param => body` (expression body, one identifier
 * parameter; a second index parameter is tolerated and ignored).
 */
export type Lambda = {
  param: string;
  body: Expression;
  node: ArrowFunctionExpression;
};

type CallBase = {
  call: CallExpression;
  method: string;
  receiver: Expression;

  /** The method was reached null-safely: `receiver?.method(...)`. */
  receiverOptional: boolean;
};

/**
 * A call matched against the vocabulary.
 *
 * `lambda` is `null` when the callback is missing or is not an arrow
 * function of the accepted form; callers treat such calls as unsupported.
 */
export type CombinatorCall =
  | (CallBase & { role: 'project'; lambda: Lambda | null })
  | (CallBase & { role: 'flatten'; lambda: Lambda | null })
  | (CallBase & { role: 'groupBy'; lambda: Lambda | null })
  | (CallBase & { role: 'materialize'; target: MaterializeTarget })
  | (CallBase & {
      role: 'aggregate';
      operator: AggregateOperator;
      args: readonly Expression[];
    });

/**
 * Matches `expression` (after unwrapping `?.`) as a combinator call.
 *
 * Matching is structural: a call whose callee is a static member access with
 * a name from the vocabulary. The receiver's type is checked by callers.
 */
export function matchCombinator(
  expression: Expression,
  vocabulary: CombinatorVocabulary
): CombinatorCall | null {
  const call = unwrapChain(expression);
  if (call.type !== 'CallExpression') return null;

  const callee = call.callee;
  if (callee.type !== 'MemberExpression' || callee.object.type === 'Super') {
    return null;
  }

  const method = staticPropertyName(callee);
  if (method === null) return null;

  const base: CallBase = {
    call,
    method,
    receiver: callee.object,
    receiverOptional: callee.optional
  };

  const args = readArguments(call);

  if (vocabulary.project.has(method)) {
    return { ...base, role: 'project', lambda: readLambdaArgument(args) };
  }
  if (vocabulary.flatten.has(method)) {
    return { ...base, role: 'flatten', lambda: readLambdaArgument(args) };
  }
  if (vocabulary.groupBy.has(method)) {
    return { ...base, role: 'groupBy', lambda: readLambdaArgument(args) };
  }

  const target = vocabulary.materialize.get(method);
  if (target && args && args.length === 0) {
    return { ...base, role: 'materialize', target };
  }

  const operator = vocabulary.aggregate.get(method);
  if (operator && args) {
    return { ...base, role: 'aggregate', operator, args };
  }

  return null;
}

/**
 * Call arguments, or `null` when any of them is a spread.
 */
function readArguments(call: CallExpression): Expression[] | null {
  const args: Expression[] = [];
  for (const argument of call.arguments) {
    if (argument.type === 'SpreadElement') return null;
    args.push(argument);
  }
  return args;
}

function readLambdaArgument(args: readonly Expression[] | null): Lambda | null {
  if (!args || args.length !== 1) return null;
  const [first] = args;
  return first ? readLambda(first) : null;
}

/**
 * Reads `param => body` (optionally `(param, index) => body`).
 */
export function readLambda(expression: Expression): Lambda | null {
  if (expression.type !== 'ArrowFunctionExpression') return null;
  if (expression.async || expression.body.type === 'BlockStatement') {
    return null;
  }

  const [param, index, ...rest] = expression.params;
  if (!param || param.type !== 'Identifier' || rest.length > 0) return null;
  if (index && index.type !== 'Identifier') return null;

  return { param: param.name, body: expression.body, node: expression };
}
