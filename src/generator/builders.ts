import type {
  ArrowFunctionExpression,
  AssignmentExpression,
  CallExpression,
  ConditionalExpression,
  Expression,
  Identifier,
  LogicalExpression,
  MemberExpression,
  NewExpression,
  ObjectExpression,
  Pattern,
  Property,
  Statement
} from 'estree';
import { generate } from 'astring';

const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

const RESERVED_WORDS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger',
  'default', 'delete', 'do', 'else', 'enum', 'export', 'extends', 'false',
  'finally', 'for', 'function', 'if', 'import', 'in', 'instanceof', 'new',
  'null', 'return', 'super', 'switch', 'this', 'throw', 'true', 'try',
  'typeof', 'var', 'void', 'while', 'with', 'yield', 'let', 'static',
  'implements', 'interface', 'package', 'private', 'protected', 'public',
  'await'
]);

/**
 * Whether `name` can be written as a bare identifier (and thus as a dotted
 * member name or unquoted object key).
 */
export function isIdentifierName(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Whether `name` can be declared as a binding (a parameter or const).
 */
export function isBindingName(name: string): boolean {
  return isIdentifierName(name) && !RESERVED_WORDS.has(name);
}

export function identifier(name: string): Identifier {
  return { type: 'Identifier', name };
}

export function literal(value: string | number | boolean | null): Expression {
  return { type: 'Literal', value };
}

/**
 * `object.name`, or `object["name"]` when `name` is not an identifier.
 */
export function member(object: Expression, name: string): MemberExpression {
  const computed = !isIdentifierName(name);
  return {
    type: 'MemberExpression',
    object,
    property: computed ? { type: 'Literal', value: name } : identifier(name),
    computed,
    optional: false
  } satisfies MemberExpression;
}

/**
 * `root.a.b.c` from a member path.
 */
export function memberPath(
  root: Expression,
  path: readonly string[]
): Expression {
  return path.reduce<Expression>((object, name) => member(object, name), root);
}

export function call(
  callee: Expression,
  args: readonly Expression[]
): CallExpression {
  return {
    type: 'CallExpression',
    callee,
    arguments: [...args],
    optional: false
  } satisfies CallExpression;
}

export function newExpression(
  name: string,
  args: readonly Expression[] = []
): NewExpression {
  return {
    type: 'NewExpression',
    callee: identifier(name),
    arguments: [...args]
  } satisfies NewExpression;
}

/**
 * `param => body`.
 */
export function arrow(param: string, body: Expression): ArrowFunctionExpression {
  return {
    type: 'ArrowFunctionExpression',
    params: [identifier(param)],
    body,
    expression: true,
    async: false,
    generator: false
  } satisfies ArrowFunctionExpression;
}

/**
 * `{ name: value, ... }` with identifier keys where possible.
 */
export function objectLiteral(
  entries: ReadonlyArray<readonly [string, Expression]>
): ObjectExpression {
  const properties = entries.map(
    ([name, value]): Property => ({
      type: 'Property',
      key: isIdentifierName(name)
        ? identifier(name)
        : { type: 'Literal', value: name },
      value,
      kind: 'init',
      computed: false,
      shorthand: false,
      method: false
    })
  );

  return { type: 'ObjectExpression', properties } satisfies ObjectExpression;
}

export function emptyArray(): Expression {
  return { type: 'ArrayExpression', elements: [] };
}

/**
 * `value != null` (loose: rejects both `null` and `undefined`).
 */
export function notNull(value: Expression): Expression {
  return {
    type: 'BinaryExpression',
    operator: '!=',
    left: value,
    right: literal(null)
  };
}

/**
 * Left-associated `a && b && c`.
 */
export function and(operands: readonly Expression[]): Expression {
  const [first, ...rest] = operands;
  if (!first) return literal(true);

  return rest.reduce<Expression>(
    (left, right) =>
      ({
        type: 'LogicalExpression',
        operator: '&&',
        left,
        right
      }) satisfies LogicalExpression,
    first
  );
}

export function coalesce(left: Expression, right: Expression): LogicalExpression {
  return { type: 'LogicalExpression', operator: '??', left, right };
}

export function conditional(
  test: Expression,
  consequent: Expression,
  alternate: Expression
): ConditionalExpression {
  return { type: 'ConditionalExpression', test, consequent, alternate };
}

export function assign(
  target: MemberExpression,
  value: Expression,
  operator: AssignmentExpression['operator'] = '='
): Statement {
  return {
    type: 'ExpressionStatement',
    expression: { type: 'AssignmentExpression', operator, left: target, right: value }
  };
}

export function expressionStatement(expression: Expression): Statement {
  return { type: 'ExpressionStatement', expression };
}

export function ifStatement(test: Expression, body: readonly Statement[]): Statement {
  const [only] = body;
  return {
    type: 'IfStatement',
    test,
    consequent:
      body.length === 1 && only ? only : { type: 'BlockStatement', body: [...body] },
    alternate: null
  };
}

/**
 * `function name(param, ...) { body }`; a parameter with a default is
 * written `[name, default]`.
 */
export function functionDeclaration(
  name: string,
  params: ReadonlyArray<string | readonly [string, Expression]>,
  body: readonly Statement[]
): Statement {
  const patterns = params.map((param): Pattern =>
    typeof param === 'string'
      ? identifier(param)
      : { type: 'AssignmentPattern', left: identifier(param[0]), right: param[1] }
  );

  return {
    type: 'FunctionDeclaration',
    id: identifier(name),
    params: patterns,
    body: { type: 'BlockStatement', body: [...body] },
    async: false,
    generator: false
  };
}

export function returnStatement(argument: Expression): Statement {
  return { type: 'ReturnStatement', argument };
}

export function constDeclaration(name: string, init: Expression): Statement {
  return {
    type: 'VariableDeclaration',
    kind: 'const',
    declarations: [{ type: 'VariableDeclarator', id: identifier(name), init }]
  };
}

/**
 * Prints an ESTree node as JavaScript source (astring, two-space indent).
 */
export function print(node: Expression | Statement): string {
  return generate(node);
}
