import type { Expression, MemberExpression, Statement } from 'estree';

import { typeKey } from '../schema/type-key';
import { type Diagnostic, diagnostic } from '../types/diagnostics';
import type { MemberInfo, TypeRef, TypeSchemaOracle } from '../types/schema';
import type { Field, NestedCollection, NestedObject, Structure } from '../types/structure';
import {
  arrow,
  assign,
  call,
  coalesce,
  emptyArray,
  expressionStatement,
  functionDeclaration,
  identifier,
  ifStatement,
  member,
  memberPath,
  newExpression,
  notNull,
  objectLiteral,
  print,
  returnStatement
} from './builders';

const DTO = 'dto';
const ENTITY = 'entity';

type InverseContext = {
  dependencies: string[];
  diagnostics: Diagnostic[];

  /** Intermediate paths (`customer.address`) already initialized unconditionally. */
  initialized: Set<string>;
};

type ResolvedPath = {
  ensure: Statement[];
  leaf: MemberInfo;
  commit(): Statement[];
};

export type ReverseFunction = {
  functionName: string;

  /**
   * Declarations the function depends on, children first, ending with its
   * own.
   */
  declarations: string[];
};

type MemoEntry = ReverseFunction & {
  /** Issues recorded while generating; replayed for every call site. */
  diagnostics: Diagnostic[];
};

/**
 * Generates inverse functions `reverse_<hash>(dto, entity = <construct>)`
 * that write a target value back into a source instance.
 *
 * Inverses are memoized per (hash, source type, path signature): equal keys
 * share one function. A different key under an already used hash gets a
 * numbered name (`reverse_<hash>_2`).
 *
 * Each intermediate object is initialized once (`entity.a ??= {}`), before
 * the first unconditional write below it.
 */
export class ReverseGenerator {
  private readonly memo = new Map<string, MemoEntry>();
  private readonly namesPerHash = new Map<string, number>();

  constructor(private readonly schema: TypeSchemaOracle) {}

  generate(structure: Structure, diagnostics: Diagnostic[]): ReverseFunction {
    const key = memoKey(structure);
    const cached = this.memo.get(key);
    if (cached) {
      diagnostics.push(...cached.diagnostics);
      return { functionName: cached.functionName, declarations: cached.declarations };
    }

    const functionName = this.nameFor(structure.contentHash);
    const issues: Diagnostic[] = [];
    const context: InverseContext = {
      dependencies: [],
      diagnostics: issues,
      initialized: new Set()
    };
    const body: Statement[] = [];

    for (const field of structure.fields) {
      body.push(...this.invertField(field, structure.sourceType, context));
    }
    body.push(returnStatement(identifier(ENTITY)));

    const construct = constructValue(structure.sourceType, this.schema);
    const declaration = print(
      functionDeclaration(
        functionName,
        [DTO, construct ? [ENTITY, construct] : ENTITY],
        body
      )
    );

    const declarations = unique([...context.dependencies, declaration]);
    this.memo.set(key, { functionName, declarations, diagnostics: issues });
    diagnostics.push(...issues);
    return { functionName, declarations };
  }

  private nameFor(hash: string): string {
    const count = (this.namesPerHash.get(hash) ?? 0) + 1;
    this.namesPerHash.set(hash, count);
    return count === 1 ? `reverse_${hash}` : `reverse_${hash}_${count}`;
  }

  private invertField(
    field: Field,
    sourceType: TypeRef,
    context: InverseContext
  ): Statement[] {
    const { diagnostics } = context;
    const dtoValue = member(identifier(DTO), field.name);

    if (field.nested?.kind === 'object') {
      return this.invertNestedObject(field, field.nested, sourceType, dtoValue, context);
    }

    const path =
      field.nested?.kind === 'collection'
        ? field.nested.via === 'project' && !field.nested.receiverIsGrouping
          ? field.nested.receiverPath
          : null
        : field.sourcePath;

    if (!path || path.length === 0) {
      diagnostics.push(ambiguous(field));
      return [];
    }

    const target = this.resolvePath(sourceType, path, context.initialized);
    if (!target) {
      diagnostics.push(ambiguous(field, 'an intermediate member cannot be constructed'));
      return [];
    }
    if (target.leaf.readonly) return [];

    const leaf = member(memberPath(identifier(ENTITY), path.slice(0, -1)), target.leaf.name);

    if (field.nested?.kind === 'collection') {
      const value = this.collectionInverse(field, field.nested, target.leaf, dtoValue, context);
      return value ? [...target.commit(), assign(leaf, value)] : [];
    }

    return [...target.commit(), assign(leaf, dtoValue)];
  }

  /**
   * - source is the parent itself: `if (dto.f != null) reverse_X(dto.f, entity);`
   * - source below a prefix:
   *   `if (dto.f != null) entity.p = reverse_X(dto.f, entity.p ?? <construct>);`
   */
  private invertNestedObject(
    field: Field,
    nested: NestedObject,
    sourceType: TypeRef,
    dtoValue: MemberExpression,
    context: InverseContext
  ): Statement[] {
    const { dependencies, diagnostics } = context;
    const inverse = this.generate(nested.structure, diagnostics);
    dependencies.push(...inverse.declarations);

    const callee = identifier(inverse.functionName);

    if (nested.sourcePrefix.length === 0) {
      return [
        ifStatement(notNull(dtoValue), [
          expressionStatement(call(callee, [dtoValue, identifier(ENTITY)]))
        ])
      ];
    }

    // Initializers under a null check do not count as done for later fields.
    const target = this.resolvePath(sourceType, nested.sourcePrefix, context.initialized);
    const construct = target && constructValue(target.leaf.type, this.schema);
    if (!target || !construct) {
      diagnostics.push(ambiguous(field, 'the nested source cannot be constructed'));
      return [];
    }
    if (target.leaf.readonly) return [];

    const slot = member(
      memberPath(identifier(ENTITY), nested.sourcePrefix.slice(0, -1)),
      target.leaf.name
    );

    return [
      ifStatement(notNull(dtoValue), [
        ...target.ensure,
        assign(slot, call(callee, [dtoValue, coalesce(slot, construct)]))
      ])
    ];
  }

  /**
   * `Array.from(dto.f ?? [], e => reverse_X(e))`, wrapped in `new Set(...)`
   * when the source member is a set.
   */
  private collectionInverse(
    field: Field,
    nested: NestedCollection,
    target: MemberInfo,
    dtoValue: MemberExpression,
    context: InverseContext
  ): Expression | null {
    const { dependencies, diagnostics } = context;
    const collection = this.schema.describeCollection(target.type);
    if (!collection || !constructValue(collection.element, this.schema)) {
      diagnostics.push(ambiguous(field, 'the element type cannot be constructed'));
      return null;
    }

    const inverse = this.generate(nested.structure, diagnostics);
    dependencies.push(...inverse.declarations);

    const elements = call(member(identifier('Array'), 'from'), [
      coalesce(dtoValue, emptyArray()),
      arrow('e', call(identifier(inverse.functionName), [identifier('e')]))
    ]);

    return collection.kind === 'set' ? newExpression('Set', [elements]) : elements;
  }

  /**
   * Walks `path` from `sourceType`. Every intermediate must be
   * default-constructible; each one not yet in `initialized` gets an
   * `entity.a ??= <construct>` statement.
   *
   * `commit()` returns those statements and marks their paths initialized;
   * `ensure` returns them without marking.
   */
  private resolvePath(
    sourceType: TypeRef,
    path: readonly string[],
    initialized: Set<string>
  ): ResolvedPath | null {
    const ensure: Statement[] = [];
    const keys: string[] = [];
    let owner = sourceType;

    for (const [index, name] of path.entries()) {
      const info = this.schema.getMember(owner, name);
      if (!info) return null;

      if (index === path.length - 1) {
        return {
          ensure,
          leaf: info,
          commit: () => {
            for (const key of keys) initialized.add(key);
            return ensure;
          }
        };
      }

      const construct = constructValue(info.type, this.schema);
      if (!construct || info.readonly) return null;

      const key = path.slice(0, index + 1).join('.');
      if (!initialized.has(key)) {
        keys.push(key);
        ensure.push(
          assign(
            member(memberPath(identifier(ENTITY), path.slice(0, index)), name),
            construct,
            '??='
          )
        );
      }
      owner = info.type;
    }

    return null;
  }
}

/**
 * Default instance of `type`: `{}` for literal entities and anonymous
 * objects, `new Name()` for constructor entities, `null` when it cannot be
 * constructed.
 */
export function constructValue(
  type: TypeRef,
  schema: TypeSchemaOracle
): Expression | null {
  switch (type.kind) {
    case 'object':
      return objectLiteral([]);

    case 'entity': {
      const entity = schema.getEntity(type.name);
      if (!entity) return null;
      if (entity.construction === 'literal') return objectLiteral([]);
      if (entity.construction === 'constructor') return newExpression(entity.name);
      return null;
    }

    default:
      return null;
  }
}

function ambiguous(field: Field, detail = 'it has no plain member path'): Diagnostic {
  return diagnostic(
    'AmbiguousReversePath',
    `Field "${field.name}" is left out of the inverse: ${detail}.`,
    { field: field.name, lineage: field.lineage }
  );
}

/**
 * Memo key of an inverse: hash, source type and the member paths every
 * field writes to.
 */
function memoKey(structure: Structure): string {
  const paths = structure.fields.map(field => {
    const nested = field.nested;
    if (nested?.kind === 'object') {
      return `${field.name}=[${nested.sourcePrefix.join('.')}]${memoKey(nested.structure)}`;
    }
    if (nested?.kind === 'collection') {
      return `${field.name}=${nested.receiverPath?.join('.') ?? '?'}*${memoKey(nested.structure)}`;
    }
    return `${field.name}=${field.sourcePath?.join('.') ?? '?'}`;
  });

  return `${structure.contentHash}@${typeKey(structure.sourceType)}{${paths.join(';')}}`;
}

function unique(items: readonly string[]): string[] {
  return [...new Set(items)];
}
