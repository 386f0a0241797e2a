import type { MemberInfo, PrimitiveName, TypeRef } from '../types/schema';
import { UNKNOWN_TYPE, collectionOf, primitive } from '../types/schema';

/**
 * Result of parsing a type expression such as `Customer | null`.
 *
 * `nullable` is `true` when the top-level union names `null` or `undefined`.
 */
export type ParsedTypeExpression = {
  type: TypeRef;
  nullable: boolean;
};

/**
 * Resolution hooks the parser needs from the schema under construction.
 */
export type TypeExpressionContext = {
  /** Returns `true` when `name` is a declared entity. */
  hasEntity(name: string): boolean;

  /** Whether object-literal members carry nullability annotations. */
  annotated: boolean;
};

const PRIMITIVES = new Map<string, PrimitiveName>([
  ['string', 'string'],
  ['number', 'number'],
  ['boolean', 'boolean'],
  ['bigint', 'bigint'],
  ['Date', 'date']
]);

const NULLISH = new Set(['null', 'undefined']);

/**
 * Token stream over a type expression.
 *
 * Tokens are identifiers and the punctuation `< > [ ] { } ( ) , ; : ? |`.
 */
function tokenize(source: string): string[] {
  const tokens = source.match(/[A-Za-z_$][\w$]*|[<>[\]{}(),;:?|]|\S/g);
  return tokens ?? [];
}

/**
 * Recursive-descent parser for the schema's type-expression grammar:
 *
 * ```
 * union   := postfix ('|' postfix)*
 * postfix := primary ('[' ']')*
 * primary := IDENT ('<' union (',' union)* '>')?
 *          | '{' (IDENT '?'? ':' union (';' | ',')?)* '}'
 *          | '(' union ')'
 * ```
 *
 * Only `null` / `undefined` may be combined with another member in a union;
 * they set the nullable flag instead of widening the type.
 */
class TypeExpressionParser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly string[],
    private readonly context: TypeExpressionContext
  ) {}

  parse(): ParsedTypeExpression {
    const result = this.parseUnion();
    if (this.position < this.tokens.length) {
      this.fail(`unexpected token "${this.tokens[this.position]}"`);
    }
    return result;
  }

  private parseUnion(): ParsedTypeExpression {
    let type: TypeRef | undefined;
    let nullable = false;

    do {
      const next = this.peek();
      if (next !== undefined && NULLISH.has(next)) {
        this.position++;
        nullable = true;
        continue;
      }

      const member = this.parsePostfix();
      if (type) {
        this.fail('unions of two non-nullish types are not supported');
      }
      type = member.type;
      nullable ||= member.nullable;
    } while (this.accept('|'));

    if (!type) {
      this.fail('a union needs at least one non-nullish member');
    }

    return { type, nullable };
  }

  private parsePostfix(): ParsedTypeExpression {
    let result = this.parsePrimary();

    while (this.accept('[')) {
      this.expect(']');
      result = { type: collectionOf('array', result.type), nullable: false };
    }

    return result;
  }

  private parsePrimary(): ParsedTypeExpression {
    if (this.accept('(')) {
      const inner = this.parseUnion();
      this.expect(')');
      return inner;
    }

    if (this.accept('{')) {
      return { type: this.parseObjectBody(), nullable: false };
    }

    const name = this.identifier();
    const args = this.accept('<') ? this.parseArguments() : [];

    return { type: this.resolveNamed(name, args), nullable: false };
  }

  private parseArguments(): ParsedTypeExpression[] {
    const args: ParsedTypeExpression[] = [];
    do {
      args.push(this.parseUnion());
    } while (this.accept(','));
    this.expect('>');
    return args;
  }

  private parseObjectBody(): TypeRef {
    const members: MemberInfo[] = [];

    while (!this.accept('}')) {
      const name = this.identifier();
      const optional = this.accept('?');
      this.expect(':');
      const value = this.parseUnion();

      members.push({
        name,
        type: value.type,
        nullable: this.context.annotated
          ? value.nullable || optional
          : undefined,
        readonly: false
      });

      if (!this.accept(';')) this.accept(',');
    }

    return { kind: 'object', members };
  }

  private resolveNamed(name: string, args: ParsedTypeExpression[]): TypeRef {
    const primitiveName = PRIMITIVES.get(name);
    if (primitiveName) {
      this.arity(name, args, 0);
      return primitive(primitiveName);
    }

    switch (name) {
      case 'unknown':
      case 'any':
        this.arity(name, args, 0);
        return UNKNOWN_TYPE;

      case 'Array':
      case 'ReadonlyArray':
        return collectionOf('array', this.single(name, args));

      case 'Set':
      case 'ReadonlySet':
        return collectionOf('set', this.single(name, args));

      case 'Iterable':
        return collectionOf('iterable', this.single(name, args));

      case 'Grouping': {
        const [key, element] = this.pair(name, args);
        return { kind: 'grouping', key, element };
      }
    }

    this.arity(name, args, 0);
    if (!this.context.hasEntity(name)) {
      this.fail(`unknown entity "${name}"`);
    }
    return { kind: 'entity', name };
  }

  private single(name: string, args: ParsedTypeExpression[]): TypeRef {
    this.arity(name, args, 1);
    const [first] = args;
    return first ? first.type : UNKNOWN_TYPE;
  }

  private pair(
    name: string,
    args: ParsedTypeExpression[]
  ): [TypeRef, TypeRef] {
    this.arity(name, args, 2);
    const [first, second] = args;
    return [first?.type ?? UNKNOWN_TYPE, second?.type ?? UNKNOWN_TYPE];
  }

  private arity(name: string, args: readonly unknown[], expected: number) {
    if (args.length !== expected) {
      this.fail(
        `"${name}" takes ${expected} type argument(s), received ${args.length}`
      );
    }
  }

  private identifier(): string {
    const token = this.peek();
    if (token === undefined || !/^[A-Za-z_$]/.test(token)) {
      this.fail(
        token === undefined
          ? 'unexpected end of type expression'
          : `expected a type name, found "${token}"`
      );
    }
    this.position++;
    return token;
  }

  private peek(): string | undefined {
    return this.tokens[this.position];
  }

  private accept(token: string): boolean {
    if (this.peek() === token) {
      this.position++;
      return true;
    }
    return false;
  }

  private expect(token: string): void {
    if (!this.accept(token)) {
      this.fail(`expected "${token}"`);
    }
  }

  private fail(reason: string): never {
    throw new TypeExpressionSyntaxError(this.source, reason);
  }
}

/**
 * Raised by {@link parseTypeExpression}; wrapped by the schema builder into a
 * `SchemaDefinitionError` that names the offending member.
 */
export class TypeExpressionSyntaxError extends Error {
  constructor(
    readonly source: string,
    readonly reason: string
  ) {
    super(`Cannot parse type "${source}": ${reason}`);
    this.name = 'TypeExpressionSyntaxError';
  }
}

export function parseTypeExpression(
  source: string,
  context: TypeExpressionContext
): ParsedTypeExpression {
  return new TypeExpressionParser(source, tokenize(source), context).parse();
}
