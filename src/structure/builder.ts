import type { ObjectExpression } from 'estree';

import type { Logger } from '../logger';
import {
  type NestedCollectionPlan,
  type NestedObjectPlan,
  planNested
} from '../nested/resolver';
import { resolveNullability } from '../nullability/resolver';
import type { CombinatorVocabulary } from '../parser/combinators';
import type { Scope } from '../parser/scope';
import {
  type ParsedField,
  type SourceBase,
  parseShapeFields,
  sourceLabel
} from '../parser/shape-parser';
import { type Diagnostic, diagnostic } from '../types/diagnostics';
import {
  type TypeRef,
  type TypeSchemaOracle,
  UNKNOWN_TYPE,
  collectionOf
} from '../types/schema';
import type {
  Field,
  NestedCollection,
  NestedField,
  NestedObject,
  Structure
} from '../types/structure';
import { computeContentHash } from './hash';

export type StructureBuilderContext = {
  schema: TypeSchemaOracle;
  vocabulary: CombinatorVocabulary;
  elementsMember: string;
  collapseCollections: boolean;
  logger: Logger;
};

export type StructureSource = {
  type: TypeRef;
  base: SourceBase;
  scope: Scope;
};

export type StructureNaming = {
  hint: string;
  targetName?: string;
};

/**
 * Result of building one call site's Structure tree.
 *
 * `structure` is `null` when any Structure in the tree ended up with zero
 * fields; `diagnostics` then contains the `EmptyStructure` error.
 */
export type BuildResult = {
  structure: Structure | null;
  diagnostics: Diagnostic[];
};

/**
 * Builds the Structure tree of a shape body.
 *
 * Per field, in declaration order:
 * 1. Parse the property and infer its type.
 * 2. Ask the nested resolver whether it builds a sub-shape; recurse if so.
 * 3. Decide nullability.
 * 4. Record the field, with its nested Structure's hash standing in for
 *    its type.
 *
 * Children are hashed before their parent, so a parent's hash covers the
 * whole subtree. Every Structure is frozen on creation.
 */
export function buildStructure(
  body: ObjectExpression,
  source: StructureSource,
  naming: StructureNaming,
  context: StructureBuilderContext
): BuildResult {
  const diagnostics: Diagnostic[] = [];
  const structure = build(body, source, naming, context, diagnostics);
  return { structure, diagnostics };
}

function build(
  body: ObjectExpression,
  source: StructureSource,
  naming: StructureNaming,
  context: StructureBuilderContext,
  diagnostics: Diagnostic[]
): Structure | null {
  const inference = {
    schema: context.schema,
    vocabulary: context.vocabulary,
    scope: source.scope,
    elementsMember: context.elementsMember
  };

  const parsed = parseShapeFields(body, source, inference);
  diagnostics.push(...parsed.diagnostics);

  if (parsed.fields.length === 0) {
    diagnostics.push(
      diagnostic(
        'EmptyStructure',
        `The shape "${naming.targetName ?? naming.hint}" has no resolvable fields.`,
        { lineage: sourceLabel(source.type) }
      )
    );
    return null;
  }

  const fields: Field[] = [];

  for (const parsedField of parsed.fields) {
    const field = buildField(parsedField, source, context, diagnostics);
    if (field === null) return null;
    fields.push(field);
  }

  const structure: Structure = {
    sourceType: source.type,
    fields: Object.freeze(fields),
    contentHash: computeContentHash(fields),
    hint: naming.hint,
    ...(naming.targetName ? { targetName: naming.targetName } : {})
  };

  return Object.freeze(structure);
}

function buildField(
  parsed: ParsedField,
  source: StructureSource,
  context: StructureBuilderContext,
  diagnostics: Diagnostic[]
): Field | null {
  const plan = planNested(parsed.expression, {
    inference: {
      schema: context.schema,
      vocabulary: context.vocabulary,
      scope: source.scope,
      elementsMember: context.elementsMember
    },
    sourceType: source.type,
    base: source.base
  });

  let nested: NestedField | undefined;

  if (plan?.kind === 'unsupported') {
    diagnostics.push(
      diagnostic('UnsupportedExpressionShape', plan.reason, {
        field: parsed.name,
        lineage: parsed.lineage
      })
    );
  } else if (plan) {
    const built = buildNested(plan, parsed.name, source.scope, context, diagnostics);
    if (built === null) return null;
    nested = built;
  }

  if (!nested && !parsed.declared.success) {
    diagnostics.push(
      diagnostic(
        'UnresolvedType',
        `The type of field "${parsed.name}" could not be determined; it is passed through as unknown.`,
        { field: parsed.name, lineage: parsed.lineage }
      )
    );
    context.logger.warn(
      { field: parsed.name, lineage: parsed.lineage },
      'unresolved field type'
    );
  }

  const decision = resolveNullability(
    {
      expression: parsed.expression,
      declared: parsed.declared,
      nested: nested?.kind ?? null
    },
    {
      scope: source.scope,
      vocabulary: context.vocabulary,
      collapseCollections: context.collapseCollections
    }
  );

  const field: Field = {
    name: parsed.name,
    sourceExpression: parsed.expression,
    sourcePath: parsed.sourcePath,
    resolvedType: nested
      ? nestedType(nested)
      : parsed.declared.success
        ? parsed.declared.value.type
        : UNKNOWN_TYPE,
    nullable: decision.nullable,
    nullabilityReason: decision.reason,
    isFromNamedSubtype: nested?.targetName !== undefined,
    lineage: parsed.lineage,
    ...(nested ? { nested } : {})
  };

  return Object.freeze(field);
}

function buildNested(
  plan: NestedObjectPlan | NestedCollectionPlan,
  fieldName: string,
  parentScope: Scope,
  context: StructureBuilderContext,
  diagnostics: Diagnostic[]
): NestedField | null {
  const naming: StructureNaming = {
    hint: toPascalCase(fieldName),
    ...(plan.targetName ? { targetName: plan.targetName } : {})
  };

  if (plan.kind === 'object') {
    const structure = build(
      plan.body,
      { type: plan.sourceType, base: plan.base, scope: parentScope },
      naming,
      context,
      diagnostics
    );
    if (!structure) return null;

    const nested: NestedObject = {
      kind: 'object',
      structure,
      sourcePrefix: plan.sourcePrefix,
      ...wrappers(plan)
    };
    return Object.freeze(nested);
  }

  const structure = build(
    plan.body,
    {
      type: plan.elementType,
      base: { param: plan.elementParam, path: [] },
      scope: plan.scope
    },
    naming,
    context,
    diagnostics
  );
  if (!structure) return null;

  const nested: NestedCollection = {
    kind: 'collection',
    structure,
    via: plan.via,
    receiver: plan.receiver,
    receiverOptional: plan.receiverOptional,
    receiverCollection: plan.receiverCollection,
    receiverIsGrouping: plan.receiverIsGrouping,
    elementParam: plan.elementParam,
    elementType: plan.elementType,
    flatten: plan.flatten,
    materialize: plan.materialize,
    receiverPath: plan.receiverPath,
    ...wrappers(plan)
  };
  return Object.freeze(nested);
}

function wrappers(
  plan: NestedObjectPlan | NestedCollectionPlan
): Pick<NestedField, 'targetName' | 'conditional' | 'fallback'> {
  return {
    ...(plan.targetName ? { targetName: plan.targetName } : {}),
    ...(plan.conditional ? { conditional: plan.conditional } : {}),
    ...(plan.fallback ? { fallback: plan.fallback } : {})
  };
}

/**
 * Stand-in type of a nested field: the nested Structure's hash, wrapped in
 * the materialized collection kind for one-to-many projections.
 */
function nestedType(nested: NestedField): TypeRef {
  const reference: TypeRef = { kind: 'structure', hash: nested.structure.contentHash };
  if (nested.kind === 'object') return reference;

  return collectionOf(nested.materialize === 'set' ? 'set' : 'array', reference);
}

/**
 * `shippingAddress` -> `ShippingAddress`, `line_items` -> `LineItems`.
 */
export function toPascalCase(name: string): string {
  return name
    .split(/[^A-Za-z0-9]+/)
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}
