import type { Expression, Super } from 'estree';

import { unwrapChain } from '../parser/member-chain';
import { notNull, print } from './builders';

/**
 * A null-safe expression split into explicit guards and a plain body.
 *
 * `o.customer?.address?.city` becomes
 * - guards: `o.customer != null`, `o.customer.address != null`
 * - body:   `o.customer.address.city`
 *
 * Guard operands are sub-expressions of the original spine with `?.`
 * removed; they still need lowering.
 */
export type NullSafeSplit = {
  guards: Expression[];
  body: Expression;
};

export type SplitOptions = {
  /**
   * Decides whether a non-optional intermediate (an object that is itself
   * a member read or call, never the root) is guarded as well.
   * Receives the original node.
   */
  guardIntermediate?: (intermediate: Expression) => boolean;
};

/**
 * Rewrites the member/call spine of `expression` without `?.`.
 *
 * The spine runs from the outermost node through `object` / `callee` links
 * down to its root. Each `?.` hop adds a guard on the value it reads from;
 * `guardIntermediate` may add more. Guards are ordered root-first and
 * deduplicated by their printed text. Arguments and computed keys are left
 * untouched.
 */
export function splitNullSafe(
  expression: Expression,
  options: SplitOptions = {}
): NullSafeSplit {
  const guards: Expression[] = [];
  const seen = new Set<string>();

  const addGuard = (value: Expression) => {
    const guard = notNull(value);
    const key = print(guard);
    if (seen.has(key)) return;
    seen.add(key);
    guards.push(guard);
  };

  const needsGuard = (original: Expression | Super, optional: boolean) =>
    original.type !== 'Super' &&
    (optional ||
      (isSpineNode(original) && options.guardIntermediate?.(original) === true));

  const rebuild = (node: Expression): Expression => {
    switch (node.type) {
      case 'MemberExpression': {
        if (node.object.type === 'Super') return node;

        const object = rebuild(node.object);
        if (needsGuard(node.object, node.optional)) addGuard(object);

        return { ...node, object, optional: false };
      }

      case 'CallExpression': {
        if (node.callee.type === 'Super') return node;

        const callee = rebuild(node.callee);
        if (node.optional) addGuard(callee);

        return { ...node, callee, optional: false };
      }

      default:
        return node;
    }
  };

  const body = rebuild(unwrapChain(expression));
  return { guards, body };
}

function isSpineNode(node: Expression): boolean {
  return node.type === 'MemberExpression' || node.type === 'CallExpression';
}
