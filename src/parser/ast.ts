import type {
  ArrowFunctionExpression,
  Expression,
  Node,
  ObjectExpression
} from 'estree';
import { is } from 'estree-toolkit';
import { parse } from 'meriyah';

import { ShapeSyntaxError } from '../errors';
import { isArray, isRecord } from '../guards';

/**
 * Checks whether a runtime value is “node-like” enough to be treated as an
 * ESTree node.
 *
 * This is a shallow bridge guard:
 * - ensures the value is an object (not null)
 * - excludes arrays
 * - ensures a string `type` discriminator exists
 */
export function isNodeLike(value: unknown): value is Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}

/**
 * Parses source text as a single expression and returns the inner ESTree
 * expression node.
 *
 * Implementation detail:
 * - wraps the input in parentheses so object literals parse as expressions
 * - validates the returned AST shape:
 *   Program -> first statement is ExpressionStatement -> returns its `expression`
 *
 * @throws ShapeSyntaxError if the text does not parse as one expression.
 */
export function parseExpression(code: string): Expression {
  let ast: unknown;
  try {
    ast = parse(`(${code})`);
  } catch (error) {
    throw new ShapeSyntaxError(
      `Cannot parse shape source: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    throw new ShapeSyntaxError(
      'Expected parser output to be an ESTree Program node.'
    );
  }

  const [first, ...rest] = ast.body;
  if (!first || rest.length > 0 || !is.expressionStatement(first)) {
    throw new ShapeSyntaxError(
      'Expected shape source to contain exactly one expression.'
    );
  }

  return first.expression;
}

/**
 * The syntactic parts of a shape, `param => ({ ... })` or
 * `param => new Target({ ... })`.
 */
export type ShapeSyntax = {
  /** The single lambda parameter bound to the source value. */
  param: string;

  /** Object literal listing the target fields. */
  body: ObjectExpression;

  /** Set when the body constructs a named target (`new Target({...})`). */
  targetName?: string;

  node: ArrowFunctionExpression;
};

/**
 * Reads a shape arrow function.
 *
 * Accepted forms:
 * - `o => ({ id: o.id })`
 * - `o => new OrderDto({ id: o.id })`
 *
 * @throws ShapeSyntaxError for any other form.
 */
export function readShape(shape: string | Expression): ShapeSyntax {
  const node = typeof shape === 'string' ? parseExpression(shape) : shape;

  if (!is.arrowFunctionExpression(node)) {
    throw new ShapeSyntaxError(
      `A shape must be an arrow function, received ${node.type}.`
    );
  }

  const [param, ...extra] = node.params;
  if (!param || extra.length > 0 || !is.identifier(param)) {
    throw new ShapeSyntaxError(
      'A shape must take exactly one identifier parameter.'
    );
  }

  if (node.body.type === 'BlockStatement') {
    throw new ShapeSyntaxError(
      'A shape body must be an object literal expression, not a block.'
    );
  }

  const body = readShapeBody(node.body);
  if (!body) {
    throw new ShapeSyntaxError(
      'A shape body must be an object literal or `new Target({ ... })`.'
    );
  }

  return { param: param.name, node, ...body };
}

/**
 * Recognizes a shape body: an object literal, or a named construction whose
 * single argument is an object literal.
 *
 * Returns `null` for every other expression (the caller treats it as a leaf).
 */
export function readShapeBody(
  expression: Expression
): { body: ObjectExpression; targetName?: string } | null {
  if (is.objectExpression(expression)) {
    return { body: expression };
  }

  if (
    is.newExpression(expression) &&
    is.identifier(expression.callee) &&
    expression.arguments.length === 1
  ) {
    const [argument] = expression.arguments;
    if (argument && is.objectExpression(argument)) {
      return { body: argument, targetName: expression.callee.name };
    }
  }

  return null;
}
