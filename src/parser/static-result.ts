/**
 * Represents a successful static resolution.
 *
 * Meaning:
 * - The input node was statically resolvable against the type schema.
 * - `value` is the information the resolver derived for it (for type
 *   inference: the inferred type and its nullability).
 */
export type StaticSuccess<T> = {
  success: true;
  value: T;
};

/**
 * Represents a failed static resolution.
 *
 * Contract:
 * - Failure carries no value payload.
 * - Callers apply their local recovery policy (pass-through field, opaque
 *   leaf, omitted reverse assignment).
 */
export type StaticFailure = {
  success: false;
};

/**
 * Discriminated union representing the outcome of a static resolution attempt.
 *
 * Pattern:
 * - `success: true`  => a value is available (`StaticSuccess<T>`)
 * - `success: false` => resolution failed (`StaticFailure`)
 */
export type StaticResult<T = unknown> = StaticSuccess<T> | StaticFailure;

/**
 * Canonical failure sentinel for "unresolvable".
 */
export const UNRESOLVED: StaticFailure = { success: false } as const;

export function resolved<T>(value: T): StaticSuccess<T> {
  return { success: true, value };
}
