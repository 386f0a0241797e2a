import {
  type EmissionStrategy,
  type ProjectionCompilerOptions,
  type ResolvedCompilerOptions,
  mergeCallSiteOptions,
  optionsFingerprint,
  resolveCompilerOptions,
  vocabularyFromOptions
} from '../config';
import { SchemaDefinitionError } from '../errors';
import { constDeclaration, print } from '../generator/builders';
import { generateForward } from '../generator/forward';
import { ReverseGenerator } from '../generator/reverse';
import { HelperRegistry } from '../generator/runtime-helpers';
import {
  collectStructures,
  renderInterface
} from '../generator/type-declarations';
import { type Logger, componentLogger } from '../logger';
import { type ShapeSyntax, readShape } from '../parser/ast';
import type { CombinatorVocabulary } from '../parser/combinators';
import { Scope, collectCaptures } from '../parser/scope';
import { type TypeSchemaDefinition, createTypeSchema } from '../schema';
import { typeKey } from '../schema/type-key';
import { buildStructure } from '../structure/builder';
import { StructureTable } from '../structure/table';
import { type Diagnostic, diagnostic } from '../types/diagnostics';
import type { TypeRef, TypeSchemaOracle } from '../types/schema';
import type { Structure } from '../types/structure';
import { type ProjectionCache, memoKey } from './cache';
import type { CallSite, CompileResult, ShapeAnalysis } from './result';
import {
  classifyShape,
  identifierFragment,
  selectStrategy
} from './shape-kinds';

export type CompilerDependencies = {
  /** Root logger; a silent-by-default pino logger is created otherwise. */
  logger?: Logger;

  /** Memo table shared across sessions. */
  cache?: ProjectionCache;
};

/**
 * Compiler bound to one schema and one set of options.
 */
export type ProjectionCompiler = {
  readonly schema: TypeSchemaOracle;
  readonly options: ResolvedCompilerOptions;

  /** A session owns the interning table and the emitted-code caches. */
  createSession(): CompilerSession;

  /** Compiles one call site in a fresh session. */
  compile(callSite: CallSite): CompileResult;
};

type CompilerState = {
  schema: TypeSchemaOracle;
  options: ResolvedCompilerOptions;
  vocabulary: CombinatorVocabulary;
  logger: Logger;
  cache: ProjectionCache | undefined;
};

/**
 * Creates a projection compiler.
 *
 * Setup:
 * 1. Validate options and apply defaults (zod, through Standard Schema).
 * 2. Build the type schema from its declarative definition, unless an
 *    oracle is passed in.
 * 3. Derive the combinator vocabulary and the options fingerprint.
 *
 * @throws OptionsValidationError
 * @throws SchemaDefinitionError
 */
export function createProjectionCompiler(
  schema: TypeSchemaDefinition | TypeSchemaOracle,
  options: ProjectionCompilerOptions = {},
  dependencies: CompilerDependencies = {}
): ProjectionCompiler {
  const resolved = resolveCompilerOptions(options);
  const oracle = isTypeSchemaOracle(schema)
    ? schema
    : createTypeSchema(schema, resolved.grouping);

  const state: CompilerState = {
    schema: oracle,
    options: resolved,
    vocabulary: vocabularyFromOptions(resolved),
    logger: componentLogger('compiler', dependencies.logger),
    cache: dependencies.cache
  };

  return {
    schema: oracle,
    options: resolved,
    createSession: () => new CompilerSession(state),
    compile: callSite => new CompilerSession(state).compile(callSite)
  };
}

function isTypeSchemaOracle(
  value: TypeSchemaDefinition | TypeSchemaOracle
): value is TypeSchemaOracle {
  return 'resolveType' in value && typeof value.resolveType === 'function';
}

/**
 * One compilation pass over many call sites.
 *
 * Call sites are independent: a failing one never affects the others. What
 * they share is owned here, never globally:
 * - the interning table (type names, deduplicated declarations)
 * - inverse functions, memoized by hash, source and paths
 * - prebuilt forward declarations, one per (source, target)
 */
export class CompilerSession {
  readonly table: StructureTable;
  private readonly reverse: ReverseGenerator;
  private readonly prebuilt = new Map<string, string>();
  private readonly logger: Logger;

  constructor(private readonly state: CompilerState) {
    this.table = new StructureTable(state.options.typeNameSuffix);
    this.reverse = new ReverseGenerator(state.schema);
    this.logger = state.logger;
  }

  /**
   * Compiles one call site.
   *
   * The memo cache holds the session-independent analysis; names (type,
   * inverse, prebuilt) are always assigned by this session.
   *
   * @throws ShapeSyntaxError when the shape is not `param => ({ ... })` or
   *   `param => new Target({ ... })`.
   * @throws SchemaDefinitionError when the source type does not resolve.
   * @throws OptionsValidationError when the call site's overrides are invalid.
   * @throws IdentityCollisionError
   */
  compile(callSite: CallSite): CompileResult {
    const shape = readShape(callSite.shape);
    const sourceType =
      typeof callSite.sourceType === 'string'
        ? this.state.schema.resolveType(callSite.sourceType)
        : callSite.sourceType;
    const options = mergeCallSiteOptions(this.state.options, callSite.options);

    const location = describeLocation(callSite);
    const log = this.logger.child({
      callSite: location,
      ...(callSite.namespace ? { namespace: callSite.namespace } : {})
    });

    const key = memoKey({
      location,
      printedShape: print(shape.node),
      sourceType: typeKey(sourceType),
      targetName: callSite.targetName,
      captures: callSite.captures ?? {},
      schemaFingerprint: this.state.schema.fingerprint,
      optionsFingerprint: optionsFingerprint(options)
    });

    let analysis = this.state.cache?.get(key);
    if (analysis) {
      log.debug('memo cache hit');
    } else {
      analysis = this.analyze(shape, sourceType, callSite, options, log);
      this.state.cache?.set(key, analysis);
    }

    if (!analysis.success) {
      return { success: false, diagnostics: [...analysis.diagnostics] };
    }
    return this.emit(analysis, options, log);
  }

  /**
   * One interface declaration per distinct generated type seen by this
   * session.
   */
  typeDeclarations(): string[] {
    const nameOf = (structure: Structure) => this.table.typeNameOf(structure);
    return this.table
      .declarations()
      .map(({ name, structure }) =>
        renderInterface(name, structure, nameOf, this.state.options.grouping)
      );
  }

  /**
   * Builds the Structure tree and the forward code.
   */
  private analyze(
    shape: ShapeSyntax,
    sourceType: TypeRef,
    callSite: CallSite,
    options: ResolvedCompilerOptions,
    log: Logger
  ): ShapeAnalysis {
    const { schema, vocabulary } = this.state;
    const diagnostics: Diagnostic[] = [];

    const captureTypes = new Map<string, TypeRef>();
    for (const [name, expression] of Object.entries(callSite.captures ?? {})) {
      try {
        captureTypes.set(name, schema.resolveType(expression));
      } catch (error) {
        if (!(error instanceof SchemaDefinitionError)) throw error;
        diagnostics.push(
          diagnostic(
            'UnresolvedType',
            `Capture "${name}" has an unresolvable type "${expression}"; it is read as unknown.`,
            { lineage: `capture ${name}` }
          )
        );
      }
    }
    const captured = collectCaptures(shape.body, new Set([shape.param]));
    const scope = Scope.root(shape.param, sourceType, captureTypes);

    const strategy = selectStrategy(
      classifyShape(sourceType, shape.targetName ?? callSite.targetName)
    );
    log.debug({ shapeKind: strategy.kind }, 'selected shape strategy');

    // 1. Structure tree
    const built = buildStructure(
      shape.body,
      { type: sourceType, base: { param: shape.param, path: [] }, scope },
      {
        hint: strategy.hint,
        ...(strategy.targetName ? { targetName: strategy.targetName } : {})
      },
      {
        schema,
        vocabulary,
        elementsMember: options.grouping.elementsMember,
        collapseCollections: options.collectionNullabilityRemoval,
        logger: log
      }
    );
    diagnostics.push(...built.diagnostics);

    if (!built.structure) {
      log.warn(
        { diagnostics: diagnostics.length },
        'call site aborted: empty structure'
      );
      return { success: false, diagnostics };
    }

    // 2. Forward code
    const helpers = new HelperRegistry();
    const forward = generateForward(
      built.structure,
      { param: shape.param, scope },
      {
        schema,
        vocabulary,
        elementsMember: options.grouping.elementsMember,
        helpers
      }
    );

    return {
      success: true,
      structure: built.structure,
      shapeKind: strategy.kind,
      prebuiltSource: strategy.prebuiltSource,
      captured,
      forward: {
        node: forward.node,
        expression: print(forward.node),
        fields: forward.fields
      },
      helpers: helpers.declarations(options.grouping),
      diagnostics
    };
  }

  /**
   * Names an analyzed call site within this session: interning, emission,
   * the inverse and the type declarations.
   */
  private emit(
    analysis: Extract<ShapeAnalysis, { success: true }>,
    options: ResolvedCompilerOptions,
    log: Logger
  ): CompileResult {
    const { structure, forward } = analysis;
    const diagnostics: Diagnostic[] = [...analysis.diagnostics];

    // 3. Interning
    const { reused, renamed } = this.table.intern(
      structure,
      options.typeNameSuffix
    );
    for (const { requested, assigned } of renamed) {
      diagnostics.push(
        diagnostic(
          'TypeNameConflict',
          `"${requested}" already names a different shape; declared as "${assigned}".`,
          { lineage: requested }
        )
      );
    }
    const typeName = this.table.typeNameOf(structure);
    log.debug({ hash: structure.contentHash, typeName, reused }, 'interned structure');

    // 4. Emission
    const emission = this.chooseEmission(analysis, options, log);
    let reference = forward.expression;
    let declaration: string | undefined;

    if (emission.strategy === 'prebuilt') {
      const name = this.prebuiltName(
        `__project_${emission.source}_${identifierFragment(typeName)}`,
        forward.expression,
        structure.contentHash
      );
      declaration = print(constDeclaration(name, forward.node));
      reference = name;
    }

    // 5. Inverse
    const reverse = this.reverse.generate(structure, diagnostics);

    // 6. Type declarations
    const nameOf = (node: Structure) => this.table.typeNameOf(node);
    const typeDeclarations = collectStructures(structure, nameOf).map(
      ({ name, structure: node }) =>
        renderInterface(name, node, nameOf, options.grouping)
    );

    if (diagnostics.length > 0) {
      log.warn({ diagnostics: diagnostics.length }, 'recovered field-level issues');
    }

    return {
      success: true,
      structure,
      hash: structure.contentHash,
      typeName,
      shapeKind: analysis.shapeKind,
      strategy: emission.strategy,
      forward: {
        expression: forward.expression,
        reference,
        ...(declaration ? { declaration } : {}),
        fields: forward.fields
      },
      reverse: {
        functionName: reverse.functionName,
        declarations: reverse.declarations
      },
      helpers: analysis.helpers,
      typeDeclarations,
      diagnostics
    };
  }

  /**
   * Prebuilt emission needs a named target and a shape without captures;
   * anything else is emitted inline.
   */
  private chooseEmission(
    analysis: Extract<ShapeAnalysis, { success: true }>,
    options: ResolvedCompilerOptions,
    log: Logger
  ): { strategy: 'inline' } | { strategy: 'prebuilt'; source: string } {
    if (options.emission === 'inline') return { strategy: 'inline' };

    const { captured, prebuiltSource } = analysis;
    if (captured.length > 0) {
      log.debug(
        { reason: `the shape reads captured variables (${captured.join(', ')})` },
        'prebuilt emission unavailable, emitting inline'
      );
      return { strategy: 'inline' };
    }
    if ('blocked' in prebuiltSource) {
      log.debug(
        { reason: prebuiltSource.blocked },
        'prebuilt emission unavailable, emitting inline'
      );
      return { strategy: 'inline' };
    }

    return { strategy: 'prebuilt', source: prebuiltSource.name };
  }

  /**
   * Reuses the declaration name when the text is identical; a different
   * transform for the same (source, target) gets a hash suffix.
   */
  private prebuiltName(base: string, text: string, hash: string): string {
    const existing = this.prebuilt.get(base);
    if (existing === undefined || existing === text) {
      this.prebuilt.set(base, text);
      return base;
    }

    const name = `${base}_${hash}`;
    this.prebuilt.set(name, text);
    return name;
  }
}

function describeLocation(callSite: CallSite): string {
  if (callSite.location) {
    const { file, line, column } = callSite.location;
    return `${file}:${line}:${column}`;
  }
  return callSite.id ?? '<unknown>';
}

export type { EmissionStrategy };
