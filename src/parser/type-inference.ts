import type {
  BinaryExpression,
  CallExpression,
  ConditionalExpression,
  Expression,
  LogicalExpression,
  MemberExpression,
  NewExpression,
  ObjectExpression,
  Pattern,
  UnaryExpression
} from 'estree';

import type {
  CollectionInfo,
  MemberInfo,
  TypeRef,
  TypeSchemaOracle
} from '../types/schema';
import { UNKNOWN_TYPE, collectionOf, primitive } from '../types/schema';
import {
  type CombinatorCall,
  type CombinatorVocabulary,
  matchCombinator
} from './combinators';
import { staticPropertyName } from './member-chain';
import type { Scope } from './scope';
import { type StaticResult, UNRESOLVED, resolved } from './static-result';

/**
 * Static type of an expression plus its nullability annotation.
 *
 * `nullable === undefined` means no annotation was available (the schema
 * was built without nullability annotations, or the value flows from an
 * unannotated member).
 */
export type InferredType = {
  type: TypeRef;
  nullable: boolean | undefined;
};

export type InferenceContext = {
  schema: TypeSchemaOracle;
  vocabulary: CombinatorVocabulary;
  scope: Scope;

  /** Runtime member holding a grouping's elements. */
  elementsMember: string;
};

const STRING_METHODS = new Set([
  'toUpperCase',
  'toLowerCase',
  'trim',
  'trimStart',
  'trimEnd',
  'slice',
  'substring',
  'padStart',
  'padEnd',
  'replace',
  'replaceAll',
  'concat',
  'repeat',
  'charAt',
  'toString',
  'toISOString',
  'toFixed',
  'join'
]);

const BOOLEAN_METHODS = new Set(['includes', 'startsWith', 'endsWith', 'has']);

const NUMBER_METHODS = new Set([
  'indexOf',
  'lastIndexOf',
  'getTime',
  'getFullYear',
  'getMonth',
  'getDate',
  'charCodeAt'
]);

const CONVERSIONS = new Map<string, TypeRef>([
  ['String', primitive('string')],
  ['Number', primitive('number')],
  ['Boolean', primitive('boolean')],
  ['BigInt', primitive('bigint')]
]);

const NON_NULL = (type: TypeRef): StaticResult<InferredType> =>
  resolved({ type, nullable: false });

/**
 * Infers the static type of an expression against the type schema.
 *
 * Coverage:
 * - literals, template literals, global constants
 * - lambda parameters and declared captures
 * - member chains through entities, anonymous objects and groupings
 * - sequence combinators (project / flatten / materialize / groupBy /
 *   aggregates), with groupings rebound to their element sequence
 * - common string, number and date methods
 * - unary, binary, logical (`&&`, `||`, `??`) and conditional operators
 * - object, array and `new` expressions
 *
 * Anything else is `UNRESOLVED`; callers keep such fields as pass-through
 * values of type `unknown`.
 */
export function inferType(
  expression: Expression,
  context: InferenceContext
): StaticResult<InferredType> {
  switch (expression.type) {
    case 'Literal':
      return inferLiteral(expression.value);

    case 'TemplateLiteral':
      return NON_NULL(primitive('string'));

    case 'Identifier':
      return inferIdentifier(expression.name, context);

    case 'ChainExpression': {
      const inner = inferType(expression.expression, context);
      // A null-safe hop may short-circuit anywhere along the chain.
      return inner.success
        ? resolved({ type: inner.value.type, nullable: true })
        : UNRESOLVED;
    }

    case 'MemberExpression':
      return inferMember(expression, context);

    case 'CallExpression':
      return inferCall(expression, context);

    case 'NewExpression':
      return inferNew(expression, context);

    case 'UnaryExpression':
      return inferUnary(expression, context);

    case 'BinaryExpression':
      return inferBinary(expression, context);

    case 'LogicalExpression':
      return inferLogical(expression, context);

    case 'ConditionalExpression':
      return inferConditional(expression, context);

    case 'ObjectExpression':
      return NON_NULL(inferObjectLiteral(expression, context));

    case 'ArrayExpression': {
      const [first] = expression.elements;
      if (!first || first.type === 'SpreadElement') {
        return NON_NULL(collectionOf('array', UNKNOWN_TYPE));
      }
      const element = inferType(first, context);
      return NON_NULL(
        collectionOf('array', element.success ? element.value.type : UNKNOWN_TYPE)
      );
    }

    default:
      return UNRESOLVED;
  }
}

function inferLiteral(value: unknown): StaticResult<InferredType> {
  switch (typeof value) {
    case 'string':
      return NON_NULL(primitive('string'));
    case 'number':
      return NON_NULL(primitive('number'));
    case 'boolean':
      return NON_NULL(primitive('boolean'));
    case 'bigint':
      return NON_NULL(primitive('bigint'));
  }
  if (value === null) {
    return resolved({ type: UNKNOWN_TYPE, nullable: true });
  }
  return UNRESOLVED;
}

function inferIdentifier(
  name: string,
  context: InferenceContext
): StaticResult<InferredType> {
  switch (name) {
    case 'undefined':
      return resolved({ type: UNKNOWN_TYPE, nullable: true });
    case 'NaN':
    case 'Infinity':
      return NON_NULL(primitive('number'));
  }

  const binding = context.scope.lookup(name);
  if (!binding?.type) return UNRESOLVED;

  return resolved({
    type: binding.type,
    nullable: binding.kind === 'parameter' ? false : undefined
  });
}

/**
 * Member reads.
 *
 * Nullability propagates: the read is nullable when the member itself is,
 * or when any object it is reached through is. It is `undefined` when no
 * annotation says either way.
 */
function inferMember(
  expression: MemberExpression,
  context: InferenceContext
): StaticResult<InferredType> {
  if (expression.object.type === 'Super') return UNRESOLVED;

  const name = staticPropertyName(expression);
  if (name === null) return UNRESOLVED;

  const owner = inferType(expression.object, context);
  if (!owner.success) return UNRESOLVED;

  const member = lookupMember(owner.value.type, name, context);
  if (!member) return UNRESOLVED;

  return resolved({
    type: member.type,
    nullable: combineNullability(owner.value.nullable, member.nullable)
  });
}

function lookupMember(
  owner: TypeRef,
  name: string,
  context: InferenceContext
): MemberInfo | undefined {
  const declared = context.schema.getMember(owner, name);
  if (declared) return declared;

  // `.length` of arrays and strings.
  if (
    name === 'length' &&
    ((owner.kind === 'collection' && owner.collection === 'array') ||
      (owner.kind === 'primitive' && owner.name === 'string'))
  ) {
    return { name, type: primitive('number'), nullable: false, readonly: true };
  }

  if (
    name === 'size' &&
    owner.kind === 'collection' &&
    owner.collection === 'set'
  ) {
    return { name, type: primitive('number'), nullable: false, readonly: true };
  }

  return undefined;
}

/**
 * `true` wins; otherwise unknown (`undefined`) wins over `false`.
 */
export function combineNullability(
  ...flags: ReadonlyArray<boolean | undefined>
): boolean | undefined {
  if (flags.some(flag => flag === true)) return true;
  if (flags.some(flag => flag === undefined)) return undefined;
  return false;
}

/**
 * Element sequence of a receiver: a collection, or a grouping rebound to its
 * elements member.
 */
export function sequenceOf(
  type: TypeRef,
  context: InferenceContext
): CollectionInfo | undefined {
  if (type.kind === 'grouping') {
    return { kind: 'array', element: type.element };
  }
  return context.schema.describeCollection(type);
}

function inferCall(
  expression: CallExpression,
  context: InferenceContext
): StaticResult<InferredType> {
  const combinator = matchCombinator(expression, context.vocabulary);
  if (combinator) {
    const result = inferCombinator(combinator, context);
    if (result.success) return result;
  }

  const callee = expression.callee;

  // Conversions: String(x), Number(x), ...
  if (callee.type === 'Identifier') {
    const converted = CONVERSIONS.get(callee.name);
    return converted && !context.scope.isParameter(callee.name)
      ? NON_NULL(converted)
      : UNRESOLVED;
  }

  if (callee.type !== 'MemberExpression' || callee.object.type === 'Super') {
    return UNRESOLVED;
  }

  const method = staticPropertyName(callee);
  if (method === null) return UNRESOLVED;

  // Math.round(x), Math.max(a, b), ...
  if (
    callee.object.type === 'Identifier' &&
    callee.object.name === 'Math' &&
    !context.scope.isParameter('Math')
  ) {
    return NON_NULL(primitive('number'));
  }

  const receiver = inferType(callee.object, context);
  if (!receiver.success) return UNRESOLVED;

  if (STRING_METHODS.has(method)) return NON_NULL(primitive('string'));
  if (BOOLEAN_METHODS.has(method)) return NON_NULL(primitive('boolean'));
  if (NUMBER_METHODS.has(method)) return NON_NULL(primitive('number'));

  return UNRESOLVED;
}

/**
 * Result types of the sequence vocabulary.
 *
 * - project / flatten    -> array of the lambda's result (flatten unwraps one level)
 * - groupBy              -> array of groupings keyed by the lambda's result
 * - materialize          -> array or set of the receiver's elements
 * - aggregates           -> number / boolean / element, nullable where the
 *                           sequence may be empty
 */
function inferCombinator(
  combinator: CombinatorCall,
  context: InferenceContext
): StaticResult<InferredType> {
  const receiver = inferType(combinator.receiver, context);
  if (!receiver.success) return UNRESOLVED;

  const sequence = sequenceOf(receiver.value.type, context);
  if (!sequence) return UNRESOLVED;

  switch (combinator.role) {
    case 'project':
    case 'flatten':
    case 'groupBy': {
      if (!combinator.lambda) return UNRESOLVED;

      const body = inferType(combinator.lambda.body, {
        ...context,
        scope: context.scope.extend(combinator.lambda.param, sequence.element)
      });
      const bodyType = body.success ? body.value.type : UNKNOWN_TYPE;

      if (combinator.role === 'groupBy') {
        return NON_NULL(
          collectionOf('array', {
            kind: 'grouping',
            key: bodyType,
            element: sequence.element
          })
        );
      }

      if (combinator.role === 'flatten') {
        const inner = sequenceOf(bodyType, context);
        return NON_NULL(collectionOf('array', inner ? inner.element : bodyType));
      }

      return NON_NULL(collectionOf('array', bodyType));
    }

    case 'materialize':
      return NON_NULL(collectionOf(combinator.target, sequence.element));

    case 'aggregate':
      return inferAggregate(combinator, sequence, context);
  }
}

/**
 * Result type of an aggregate over `sequence`.
 *
 * `sum` keeps a bigint selection bigint; every other selection sums to a
 * number.
 */
export function inferAggregate(
  combinator: Extract<CombinatorCall, { role: 'aggregate' }>,
  sequence: CollectionInfo,
  context: InferenceContext
): StaticResult<InferredType> {
  switch (combinator.operator) {
    case 'count':
      return NON_NULL(primitive('number'));

    case 'sum': {
      const selected = selectedType(combinator, sequence, context);
      return NON_NULL(
        selected && isPrimitive(selected, 'bigint')
          ? primitive('bigint')
          : primitive('number')
      );
    }

    case 'average':
      return resolved({ type: primitive('number'), nullable: true });

    case 'any':
    case 'all':
      return NON_NULL(primitive('boolean'));

    case 'first':
    case 'last':
      return resolved({ type: sequence.element, nullable: false });

    case 'firstOrDefault':
    case 'lastOrDefault':
      return resolved({ type: sequence.element, nullable: true });

    case 'min':
    case 'max': {
      const selected = selectedType(combinator, sequence, context);
      return selected ? resolved({ type: selected, nullable: true }) : UNRESOLVED;
    }
  }
}

/**
 * Type of the values an aggregate reads: the selector's result, or the
 * element itself when there is no selector. `undefined` when the selector
 * cannot be read.
 */
function selectedType(
  combinator: Extract<CombinatorCall, { role: 'aggregate' }>,
  sequence: CollectionInfo,
  context: InferenceContext
): TypeRef | undefined {
  const [selector] = combinator.args;
  if (!selector || selector.type !== 'ArrowFunctionExpression') {
    return sequence.element;
  }

  const [param] = selector.params;
  if (
    !param ||
    param.type !== 'Identifier' ||
    selector.body.type === 'BlockStatement'
  ) {
    return undefined;
  }

  const selected = inferType(selector.body, {
    ...context,
    scope: context.scope.extend(param.name, sequence.element)
  });
  return selected.success ? selected.value.type : UNKNOWN_TYPE;
}

function inferNew(
  expression: NewExpression,
  context: InferenceContext
): StaticResult<InferredType> {
  if (expression.callee.type !== 'Identifier') return UNRESOLVED;
  const name = expression.callee.name;

  if (name === 'Date') return NON_NULL(primitive('date'));

  if (name === 'Set') {
    const [source] = expression.arguments;
    if (!source) return NON_NULL(collectionOf('set', UNKNOWN_TYPE));
    if (source.type === 'SpreadElement') return UNRESOLVED;

    const inferred = inferType(source, context);
    const sequence = inferred.success
      ? sequenceOf(inferred.value.type, context)
      : undefined;
    return NON_NULL(collectionOf('set', sequence?.element ?? UNKNOWN_TYPE));
  }

  if (context.schema.getEntity(name)) {
    return NON_NULL({ kind: 'entity', name });
  }

  // `new Target({ ... })`: the target's type is whatever the literal declares.
  const [argument] = expression.arguments;
  if (argument && argument.type === 'ObjectExpression') {
    return NON_NULL(inferObjectLiteral(argument, context));
  }

  return UNRESOLVED;
}

function inferUnary(
  expression: UnaryExpression,
  context: InferenceContext
): StaticResult<InferredType> {
  switch (expression.operator) {
    case '!':
    case 'delete':
      return NON_NULL(primitive('boolean'));
    case 'typeof':
      return NON_NULL(primitive('string'));
    case 'void':
      return resolved({ type: UNKNOWN_TYPE, nullable: true });
    case '-':
    case '~': {
      const operand = inferType(expression.argument, context);
      return NON_NULL(
        operand.success && isPrimitive(operand.value.type, 'bigint')
          ? primitive('bigint')
          : primitive('number')
      );
    }
    case '+':
      return NON_NULL(primitive('number'));
  }
}

function inferBinary(
  expression: BinaryExpression,
  context: InferenceContext
): StaticResult<InferredType> {
  switch (expression.operator) {
    case '==':
    case '!=':
    case '===':
    case '!==':
    case '<':
    case '<=':
    case '>':
    case '>=':
    case 'in':
    case 'instanceof':
      return NON_NULL(primitive('boolean'));
  }

  if (expression.left.type === 'PrivateIdentifier') return UNRESOLVED;

  const left = inferType(expression.left, context);
  const right = inferType(expression.right, context);
  const leftType = left.success ? left.value.type : UNKNOWN_TYPE;
  const rightType = right.success ? right.value.type : UNKNOWN_TYPE;

  if (
    expression.operator === '+' &&
    (isPrimitive(leftType, 'string') || isPrimitive(rightType, 'string'))
  ) {
    return NON_NULL(primitive('string'));
  }

  if (!left.success || !right.success) return UNRESOLVED;

  return NON_NULL(
    isPrimitive(leftType, 'bigint') && isPrimitive(rightType, 'bigint')
      ? primitive('bigint')
      : primitive('number')
  );
}

function inferLogical(
  expression: LogicalExpression,
  context: InferenceContext
): StaticResult<InferredType> {
  const left = inferType(expression.left, context);
  const right = inferType(expression.right, context);

  switch (expression.operator) {
    case '??':
    case '||': {
      // The fallback decides whether the result may still be absent.
      const type =
        left.success && left.value.type.kind !== 'unknown'
          ? left.value.type
          : right.success
            ? right.value.type
            : UNKNOWN_TYPE;
      if (!left.success && !right.success) return UNRESOLVED;
      return resolved({
        type,
        nullable: right.success ? right.value.nullable : undefined
      });
    }

    case '&&':
      if (!right.success) return UNRESOLVED;
      return resolved({
        type: right.value.type,
        nullable: combineNullability(
          left.success ? left.value.nullable : undefined,
          right.value.nullable
        )
      });
  }
}

function inferConditional(
  expression: ConditionalExpression,
  context: InferenceContext
): StaticResult<InferredType> {
  const consequent = inferType(expression.consequent, context);
  const alternate = inferType(expression.alternate, context);

  if (!consequent.success && !alternate.success) return UNRESOLVED;

  const typed = [consequent, alternate].flatMap(branch =>
    branch.success && branch.value.type.kind !== 'unknown' ? [branch.value] : []
  );
  const [primary] = typed;

  return resolved({
    type: primary ? primary.type : UNKNOWN_TYPE,
    nullable: combineNullability(
      consequent.success ? consequent.value.nullable : undefined,
      alternate.success ? alternate.value.nullable : undefined
    )
  });
}

/**
 * Anonymous object type of an object literal. Unsupported properties
 * (spreads, computed keys, methods) are left out.
 */
export function inferObjectLiteral(
  expression: ObjectExpression,
  context: InferenceContext
): TypeRef {
  const members: MemberInfo[] = [];

  for (const property of expression.properties) {
    if (property.type !== 'Property' || property.computed) continue;
    if (property.kind !== 'init' || property.method) continue;

    const name =
      property.key.type === 'Identifier'
        ? property.key.name
        : property.key.type === 'Literal' && typeof property.key.value === 'string'
          ? property.key.value
          : null;
    if (name === null || !isExpression(property.value)) continue;

    const value = inferType(property.value, context);
    members.push({
      name,
      type: value.success ? value.value.type : UNKNOWN_TYPE,
      nullable: value.success ? value.value.nullable : undefined,
      readonly: false
    });
  }

  return { kind: 'object', members };
}

export function isPrimitive(type: TypeRef, name: string): boolean {
  return type.kind === 'primitive' && type.name === name;
}

/**
 * Property values inside object expressions are always expressions; the
 * pattern variants only occur in destructuring.
 */
export function isExpression(
  value: Expression | Pattern
): value is Expression {
  switch (value.type) {
    case 'ObjectPattern':
    case 'ArrayPattern':
    case 'RestElement':
    case 'AssignmentPattern':
      return false;
    default:
      return true;
  }
}
