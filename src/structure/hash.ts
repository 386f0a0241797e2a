import { createHash } from 'node:crypto';

import { typeKey } from '../schema/type-key';
import type { TypeRef } from '../types/schema';

/**
 * Number of hex characters kept from the SHA-256 digest.
 */
export const HASH_LENGTH = 8;

/**
 * The part of a field that participates in structural identity.
 */
export type FieldIdentity = {
  name: string;
  nullable: boolean;

  /** Leaf type, or `structure(hash)` / `collection(kind, structure(hash))`. */
  resolvedType: TypeRef;
};

/**
 * `name:type:nullable`, with nested Structures rendered as `#HASH`.
 */
export function fieldSignature(field: FieldIdentity): string {
  return `${field.name}:${typeKey(field.resolvedType)}:${field.nullable}`;
}

/**
 * Canonical signature of a field sequence; two Structures are the same shape
 * exactly when their signatures are equal.
 */
export function structureSignature(fields: readonly FieldIdentity[]): string {
  return fields.map(fieldSignature).join('|');
}

/**
 * Content hash of a field sequence.
 *
 * `sha256(fieldDigest_1 | fieldDigest_2 | ...)`, each field digest being
 * `sha256(name:type:nullable)`; upper-case hex truncated to
 * {@link HASH_LENGTH}. Source type, target name and call-site location do not
 * participate.
 */
export function computeContentHash(fields: readonly FieldIdentity[]): string {
  const digests = fields.map(field => sha256(fieldSignature(field)));
  return sha256(digests.join('|')).slice(0, HASH_LENGTH).toUpperCase();
}

export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}
