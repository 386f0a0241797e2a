/**
 * Fatal error taxonomy.
 *
 * Everything recoverable is reported as a {@link Diagnostic} instead; the
 * classes below stop compilation (schema/option problems are configuration
 * bugs, an identity collision is an invariant violation).
 *
 * Messages carry the `[projection]` prefix so they stand out in build logs.
 */
export class ProjectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`[projection] ${message}`, options);
    this.name = new.target.name;
  }
}

/**
 * The declarative type schema is malformed (validation issue, bad type
 * expression, unknown entity reference).
 */
export class SchemaDefinitionError extends ProjectionError {}

/**
 * Compiler options failed validation.
 */
export class OptionsValidationError extends ProjectionError {}

/**
 * The shape is not an arrow function of the accepted form, or its source
 * text does not parse.
 */
export class ShapeSyntaxError extends ProjectionError {}

/**
 * Two structurally distinct shapes produced the same content hash.
 *
 * Must never happen; raised as soon as the interning table sees it.
 */
export class IdentityCollisionError extends ProjectionError {
  constructor(
    readonly hash: string,
    readonly existingSignature: string,
    readonly incomingSignature: string
  ) {
    super(
      `Identity collision for structure hash ${hash}.\n` +
        `  existing: ${existingSignature}\n` +
        `  incoming: ${incomingSignature}`
    );
  }
}
