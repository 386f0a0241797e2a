import type { Expression, Program } from 'estree';
import { type types, is, traverse } from 'estree-toolkit';

import type { TypeRef } from '../types/schema';

/**
 * Identifiers that resolve without being lambda parameters or captures.
 */
export const KNOWN_GLOBALS: ReadonlySet<string> = new Set([
  'undefined',
  'NaN',
  'Infinity',
  'Math',
  'Number',
  'String',
  'Boolean',
  'BigInt',
  'Date',
  'JSON',
  'Array',
  'Object',
  'Set',
  'Map'
]);

export type ScopeBinding =
  | { kind: 'parameter'; type: TypeRef }
  | { kind: 'capture'; type: TypeRef | undefined };

/**
 * Lexical scope of a shape: lambda parameters bound to their element types,
 * plus the call site's declared captures at the root.
 *
 * Immutable; `extend` returns a child scope.
 */
export class Scope {
  private constructor(
    private readonly bindings: ReadonlyMap<string, TypeRef>,
    private readonly captures: ReadonlyMap<string, TypeRef>,
    private readonly parent: Scope | undefined
  ) {}

  static root(
    param: string,
    type: TypeRef,
    captures: ReadonlyMap<string, TypeRef> = new Map()
  ): Scope {
    return new Scope(new Map([[param, type]]), captures, undefined);
  }

  extend(param: string, type: TypeRef): Scope {
    return new Scope(new Map([[param, type]]), this.captures, this);
  }

  lookup(name: string): ScopeBinding | undefined {
    const type = this.bindings.get(name);
    if (type) return { kind: 'parameter', type };

    if (this.parent) return this.parent.lookup(name);

    if (KNOWN_GLOBALS.has(name)) return undefined;
    return { kind: 'capture', type: this.captures.get(name) };
  }

  isParameter(name: string): boolean {
    return this.lookup(name)?.kind === 'parameter';
  }
}

/**
 * Collects the free identifiers of a shape: names read but bound neither by
 * an enclosing lambda parameter, by `bound`, nor as a known global.
 *
 * Binding analysis is estree-toolkit's scope tracker; the expression is
 * wrapped in a program so its unresolved references land in the program
 * scope's global bindings.
 */
export function collectCaptures(
  expression: Expression,
  bound: ReadonlySet<string> = new Set()
): string[] {
  const program: Program = {
    type: 'Program',
    sourceType: 'module',
    body: [{ type: 'ExpressionStatement', expression }]
  };

  // `new Target({ ... })` names a nested shape; the target is not read.
  const targets = new Set<string>();
  let references: string[] = [];

  traverse(program, {
    $: { scope: true },
    NewExpression(path) {
      const name = path.node ? shapeTargetName(path.node) : undefined;
      if (name) targets.add(name);
    },
    ExpressionStatement: {
      leave(path) {
        references = Object.keys(path.scope?.globalBindings ?? {});
      }
    }
  });

  return references
    .filter(
      name => !bound.has(name) && !KNOWN_GLOBALS.has(name) && !targets.has(name)
    )
    .sort();
}

function shapeTargetName(node: types.NewExpression): string | undefined {
  const [argument, ...rest] = node.arguments;
  return is.identifier(node.callee) &&
    rest.length === 0 &&
    argument !== undefined &&
    is.objectExpression(argument)
    ? node.callee.name
    : undefined;
}
