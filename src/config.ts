import { z } from 'zod';

import { OptionsValidationError } from './errors';
import {
  AGGREGATE_OPERATORS,
  type CombinatorVocabulary
} from './parser/combinators';
import { sha256 } from './structure/hash';
import { validateWithSchema } from './validator';

const memberName = z.string().regex(/^[A-Za-z_$][\w$]*$/, 'must be an identifier');

const combinatorOptions = z
  .object({
    /** One-to-many projection: `items.map(i => ({ ... }))`. */
    project: z.array(memberName).default(['map', 'select']),

    /** Flattening projection: `orders.flatMap(o => o.lines)`. */
    flatten: z.array(memberName).default(['flatMap', 'selectMany']),

    /** Materialization calls and the container they produce. */
    materialize: z
      .record(memberName, z.enum(['array', 'set']))
      .default({ toArray: 'array', toList: 'array', toSet: 'set' }),

    groupBy: z.array(memberName).default(['groupBy']),

    /** Aggregate method names, each mapped to the operator it performs. */
    aggregates: z
      .record(memberName, z.enum(AGGREGATE_OPERATORS))
      .default(
        Object.fromEntries(
          AGGREGATE_OPERATORS.map(operator => [operator, operator] as const)
        )
      )
  })
  .strict()
  .superRefine((value, ctx) => {
    const roles = new Map<string, string>();
    const claim = (name: string, role: string) => {
      const existing = roles.get(name);
      if (existing && existing !== role) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${name}" is registered both as ${existing} and as ${role}`
        });
      }
      roles.set(name, role);
    };

    for (const name of value.project) claim(name, 'project');
    for (const name of value.flatten) claim(name, 'flatten');
    for (const name of Object.keys(value.materialize)) claim(name, 'materialize');
    for (const name of value.groupBy) claim(name, 'groupBy');
    for (const name of Object.keys(value.aggregates)) claim(name, 'aggregate');
  });

/**
 * Compiler options.
 *
 * Every field has a default; `{}` is a complete configuration.
 */
export const compilerOptionsSchema = z
  .object({
    /**
     * Collapse nullable nested collections (outside conditionals) to
     * non-nullable fields that default to an empty collection.
     */
    collectionNullabilityRemoval: z.boolean().default(true),

    /**
     * Preferred emission strategy. `prebuilt` falls back to `inline` for
     * shapes with captures or anonymous targets.
     */
    emission: z.enum(['inline', 'prebuilt']).default('inline'),

    /** Suffix of generated type names: `{Hint}{suffix}_{hash}`. */
    typeNameSuffix: z.string().regex(/^[\w$]*$/).default('Dto'),

    /** Runtime member names of a grouping value. */
    grouping: z
      .object({
        keyMember: memberName.default('key'),
        elementsMember: memberName.default('items')
      })
      .strict()
      .default({}),

    combinators: combinatorOptions.default({})
  })
  .strict();

export type ProjectionCompilerOptions = z.input<typeof compilerOptionsSchema>;

/**
 * Options one call site may override. Grouping members and the combinator
 * vocabulary shape the type schema and stay compiler-wide.
 */
export const callSiteOptionsSchema = z
  .object({
    collectionNullabilityRemoval: z.boolean().optional(),
    emission: z.enum(['inline', 'prebuilt']).optional(),
    typeNameSuffix: z.string().regex(/^[\w$]*$/).optional()
  })
  .strict();

export type CallSiteOptions = z.input<typeof callSiteOptionsSchema>;

export type ResolvedCompilerOptions = z.output<typeof compilerOptionsSchema>;

export type EmissionStrategy = ResolvedCompilerOptions['emission'];

/**
 * Validates options and applies defaults.
 *
 * @throws OptionsValidationError
 */
export function resolveCompilerOptions(
  options: ProjectionCompilerOptions = {}
): ResolvedCompilerOptions {
  return validateWithSchema(
    compilerOptionsSchema,
    options,
    'compiler options',
    message => new OptionsValidationError(message)
  );
}

/**
 * Validates a call site's overrides and applies them over the compiler's
 * options.
 *
 * @throws OptionsValidationError
 */
export function mergeCallSiteOptions(
  options: ResolvedCompilerOptions,
  overrides: CallSiteOptions | undefined
): ResolvedCompilerOptions {
  if (!overrides) return options;

  const valid = validateWithSchema(
    callSiteOptionsSchema,
    overrides,
    'call site options',
    message => new OptionsValidationError(message)
  );

  return {
    ...options,
    collectionNullabilityRemoval:
      valid.collectionNullabilityRemoval ?? options.collectionNullabilityRemoval,
    emission: valid.emission ?? options.emission,
    typeNameSuffix: valid.typeNameSuffix ?? options.typeNameSuffix
  };
}

/**
 * Digest of the resolved options; part of every memoization key.
 */
export function optionsFingerprint(options: ResolvedCompilerOptions): string {
  return sha256(JSON.stringify(options)).slice(0, 16);
}

export function vocabularyFromOptions(
  options: ResolvedCompilerOptions
): CombinatorVocabulary {
  const { combinators } = options;
  return {
    project: new Set(combinators.project),
    flatten: new Set(combinators.flatten),
    materialize: new Map(Object.entries(combinators.materialize)),
    groupBy: new Set(combinators.groupBy),
    aggregate: new Map(Object.entries(combinators.aggregates))
  };
}
