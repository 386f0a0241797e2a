import type { Expression, ObjectExpression, Property } from 'estree';
import { generate } from 'astring';

import { type Diagnostic, diagnostic } from '../types/diagnostics';
import { typeKey } from '../schema/type-key';
import type { TypeRef } from '../types/schema';
import { readMemberChain, startsWithPath } from './member-chain';
import { type StaticResult } from './static-result';
import {
  type InferenceContext,
  type InferredType,
  inferType,
  isExpression
} from './type-inference';

/**
 * Where a Structure's source value comes from: a lambda parameter, plus the
 * member path already walked from it (non-empty for nested objects whose
 * fields share a common prefix such as `o.customer`).
 */
export type SourceBase = {
  param: string;
  path: readonly string[];
};

/**
 * One target field as read from the shape, before nullability and nesting
 * are decided.
 */
export type ParsedField = {
  name: string;
  expression: Expression;
  declared: StaticResult<InferredType>;

  /**
   * Member path relative to the Structure's source, when the expression is a
   * pure member chain rooted at the source; otherwise `null`.
   */
  sourcePath: readonly string[] | null;

  lineage: string;
};

export type ParsedShape = {
  fields: ParsedField[];
  diagnostics: Diagnostic[];
};

/**
 * Reads the target fields of a shape body in declaration order.
 *
 * Skipped (with an `UnsupportedExpressionShape` diagnostic):
 * - spread elements (`...o`)
 * - computed keys (`[key]: value`)
 * - methods and accessors
 * - duplicate names (the first declaration wins)
 *
 * Type inference failures are field-local: the field is kept and its
 * `declared` result is `UNRESOLVED`.
 */
export function parseShapeFields(
  body: ObjectExpression,
  source: { type: TypeRef; base: SourceBase },
  context: InferenceContext
): ParsedShape {
  const fields: ParsedField[] = [];
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();
  const label = sourceLabel(source.type);

  for (const property of body.properties) {
    if (property.type === 'SpreadElement') {
      diagnostics.push(
        diagnostic(
          'UnsupportedExpressionShape',
          `Spread elements are not supported in shapes and were skipped: ...${generate(property.argument)}`,
          { lineage: label }
        )
      );
      continue;
    }

    const name = readFieldName(property);
    if (name === null || !isExpression(property.value)) {
      diagnostics.push(
        diagnostic(
          'UnsupportedExpressionShape',
          'Computed keys, methods and accessors are not supported in shapes and were skipped.',
          { lineage: label }
        )
      );
      continue;
    }

    if (seen.has(name)) {
      diagnostics.push(
        diagnostic(
          'UnsupportedExpressionShape',
          `Duplicate field "${name}" was skipped.`,
          { field: name, lineage: label }
        )
      );
      continue;
    }
    seen.add(name);

    const expression = property.value;
    const sourcePath = relativeSourcePath(expression, source.base);

    fields.push({
      name,
      expression,
      declared: inferType(expression, context),
      sourcePath,
      lineage: describeLineage(label, expression, sourcePath)
    });
  }

  return { fields, diagnostics };
}

function readFieldName(property: Property): string | null {
  if (property.computed || property.kind !== 'init' || property.method) {
    return null;
  }

  if (property.key.type === 'Identifier') return property.key.name;
  if (property.key.type === 'Literal') {
    const { value } = property.key;
    return typeof value === 'string' || typeof value === 'number'
      ? String(value)
      : null;
  }
  return null;
}

/**
 * Member path of `expression` relative to `base`, or `null` when the
 * expression is not a pure member chain rooted there.
 *
 * `base = { param: 'o', path: ['customer'] }`:
 * - `o.customer.name`          -> `['name']`
 * - `o.customer?.address.city` -> `['address', 'city']`
 * - `o.total`                  -> `null` (outside the base)
 * - `o.customer.name.trim()`   -> `null` (call)
 */
export function relativeSourcePath(
  expression: Expression,
  base: SourceBase
): readonly string[] | null {
  const chain = readMemberChain(expression);
  if (!chain || chain.root !== base.param) return null;

  const path = chain.hops.map(hop => hop.name);
  if (path.length <= base.path.length || !startsWithPath(path, base.path)) {
    return null;
  }

  return path.slice(base.path.length);
}

/**
 * Human-readable name of a source type for lineage strings.
 */
export function sourceLabel(type: TypeRef): string {
  switch (type.kind) {
    case 'entity':
      return type.name;
    case 'grouping':
      return 'Grouping';
    case 'object':
      return 'Object';
    default:
      return typeKey(type);
  }
}

/**
 * `Order.customer.address.city` for member chains,
 * `Order{o.lines.length * 2}` for anything else.
 */
function describeLineage(
  label: string,
  expression: Expression,
  sourcePath: readonly string[] | null
): string {
  if (sourcePath) return [label, ...sourcePath].join('.');
  return `${label}{${generate(expression)}}`;
}
