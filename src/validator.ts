import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Validates (and transforms) a value using a Standard Schema V1 compliant
 * validator.
 *
 * The `~standard` property is the universal adapter defined by the Standard
 * Schema V1 specification: it lets configuration be validated generically
 * with Zod, Valibot, ArkType and others.
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // 1. Universal Adapter (Result Pattern):
 *   //    - Returns an object ({ value } or { issues }).
 *   //    - Does NOT throw errors.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *
 *   // 2. Library-Specific Internals (Ignored):
 *   parse,
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * @param schema - Standard Schema instance.
 * @param input - The raw value.
 * @param subject - What is being validated (used in error messages).
 * @param fail - Builds the error thrown for the first issue.
 * @returns The validated (and potentially transformed) value.
 *
 * @throws
 * - If the schema object has no `~standard` property.
 * - If the validator returns a Promise (compilation is synchronous).
 * - If validation fails.
 */
export function validateWithSchema<Output>(
  schema: StandardSchemaV1<unknown, Output>,
  input: unknown,
  subject: string,
  fail: (message: string) => Error
): Output {
  // Fail-safe:
  // Guards against plain objects being passed where a schema is expected.
  if (!('~standard' in schema)) {
    throw fail(
      `The schema for ${subject} is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot).`
    );
  }

  const result = schema['~standard'].validate(input);

  // The compiler pipeline is strictly synchronous.
  if (result instanceof Promise) {
    throw fail(`Async schema validation is not supported for ${subject}.`);
  }

  // Handle 'Result Pattern': issues must be checked manually.
  if (result.issues) {
    const [firstIssue] = result.issues;
    const issuePath = formatIssuePath(firstIssue?.path);
    throw fail(
      `Invalid ${subject} at "${issuePath}": ${firstIssue?.message ?? 'unknown issue'}`
    );
  }

  return result.value;
}

/**
 * Joins a Standard Schema issue path into a dotted string.
 *
 * Path segments may be bare keys or `{ key }` objects.
 */
function formatIssuePath(
  path: ReadonlyArray<PropertyKey | StandardSchemaV1.PathSegment> | undefined
): string {
  if (!path || path.length === 0) return '<root>';

  return path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}
