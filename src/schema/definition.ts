import { z } from 'zod';

/**
 * A member is either a type expression (`"Customer | null"`) or an object
 * spelling out the flags explicitly.
 *
 * In the object form, an omitted `nullable` means "annotation unavailable"
 * for that member.
 */
const memberDefinition = z.union([
  z.string().min(1),
  z
    .object({
      type: z.string().min(1),
      nullable: z.boolean().optional(),
      readonly: z.boolean().optional()
    })
    .strict()
]);

const entityDefinition = z
  .object({
    members: z.record(z.string().min(1), memberDefinition),
    construction: z.enum(['literal', 'constructor', 'none']).default('literal')
  })
  .strict();

/**
 * Declarative, JSON-friendly description of the source-type schema.
 *
 * @example
 * ```ts
 * const definition: TypeSchemaDefinition = {
 *   entities: {
 *     Order: { members: { id: 'number', customer: 'Customer | null' } },
 *     Customer: { members: { name: 'string' } }
 *   }
 * };
 * ```
 */
export const typeSchemaDefinition = z
  .object({
    entities: z.record(z.string().regex(/^[A-Za-z_$][\w$]*$/), entityDefinition),

    /**
     * When `false`, every member reports its nullability as unknown, the
     * state of an unannotated code base.
     */
    nullableAnnotations: z.boolean().default(true)
  })
  .strict();

export type TypeSchemaDefinition = z.input<typeof typeSchemaDefinition>;

export type ValidatedTypeSchemaDefinition = z.output<typeof typeSchemaDefinition>;

export type MemberDefinition = z.output<typeof memberDefinition>;
