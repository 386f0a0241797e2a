import type { Expression, MemberExpression, Node, Super } from 'estree';
import { traverse } from 'estree-toolkit';

/**
 * One property access in a member chain.
 */
export type ChainHop = {
  name: string;

  /** `true` for a null-safe hop (`a?.b`). */
  optional: boolean;
};

/**
 * A pure member chain `root.a?.b.c`: an identifier followed by static
 * property reads only (no calls, no computed keys other than string literals).
 */
export type MemberChain = {
  root: string;
  hops: readonly ChainHop[];
};

/**
 * Removes a top-level `ChainExpression` wrapper (the node ESTree puts around
 * any expression containing `?.`).
 */
export function unwrapChain(expression: Expression): Expression {
  return expression.type === 'ChainExpression'
    ? expression.expression
    : expression;
}

/**
 * Static property name of a member access, or `null` when it is computed from
 * anything but a string literal (or is a private name).
 */
export function staticPropertyName(member: MemberExpression): string | null {
  const { property } = member;

  if (!member.computed) {
    return property.type === 'Identifier' ? property.name : null;
  }

  return property.type === 'Literal' && typeof property.value === 'string'
    ? property.value
    : null;
}

/**
 * Reads `expression` as a member chain.
 *
 * Examples:
 * - `o`                      -> `{ root: 'o', hops: [] }`
 * - `o.customer?.name`       -> `{ root: 'o', hops: [customer, name?] }`
 * - `o.items.map(fn)`        -> `null` (call)
 * - `o[key]`                 -> `null` (dynamic key)
 */
export function readMemberChain(expression: Expression): MemberChain | null {
  const hops: ChainHop[] = [];
  let cursor: Expression | Super = unwrapChain(expression);

  while (cursor.type === 'MemberExpression') {
    const name = staticPropertyName(cursor);
    if (name === null) return null;

    hops.unshift({ name, optional: cursor.optional });
    cursor = cursor.object;
  }

  return cursor.type === 'Identifier' ? { root: cursor.name, hops } : null;
}

/**
 * Whether the chain contains a null-safe hop.
 */
export function isNullSafeChain(chain: MemberChain): boolean {
  return chain.hops.some(hop => hop.optional);
}

/**
 * Whether `expression` uses null-safe navigation (`?.` on a member or call)
 * anywhere at its top level. Occurrences inside nested lambdas do not count.
 */
export function hasTopLevelNullSafe(expression: Node): boolean {
  if (isOptionalHop(expression)) return true;

  let found = false;

  traverse(expression, {
    MemberExpression(path) {
      if (path.node && isOptionalHop(path.node)) {
        found = true;
        this.stop();
      }
    },
    CallExpression(path) {
      if (path.node && isOptionalHop(path.node)) {
        found = true;
        this.stop();
      }
    },
    ArrowFunctionExpression(path) {
      if (path.node !== expression) path.skip();
    },
    FunctionExpression(path) {
      if (path.node !== expression) path.skip();
    }
  });

  return found;
}

function isOptionalHop(node: Node): boolean {
  return (
    (node.type === 'MemberExpression' || node.type === 'CallExpression') &&
    node.optional
  );
}

/**
 * Whether a conditional (`a ? b : c`) wraps the whole expression.
 */
export function isConditionalRoot(expression: Expression): boolean {
  return unwrapChain(expression).type === 'ConditionalExpression';
}

/**
 * Renders a path for diagnostics and generated names: `customer.address`.
 */
export function formatPath(path: readonly string[]): string {
  return path.join('.');
}

/**
 * `true` when `path` begins with every segment of `prefix`.
 */
export function startsWithPath(
  path: readonly string[],
  prefix: readonly string[]
): boolean {
  return prefix.every((segment, index) => path[index] === segment);
}
