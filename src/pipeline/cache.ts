import { sha256 } from '../structure/hash';
import type { ShapeAnalysis } from './result';

/**
 * Memo table for analyzed call sites, keyed by {@link memoKey}.
 *
 * Any `Map<string, ShapeAnalysis>` fits; a host may share one across
 * sessions and passes. Entries hold nothing session-specific.
 */
export interface ProjectionCache {
  get(key: string): ShapeAnalysis | undefined;
  set(key: string, value: ShapeAnalysis): unknown;
}

export function createProjectionCache(): ProjectionCache {
  return new Map<string, ShapeAnalysis>();
}

export type MemoKeyParts = {
  /** `file:line:column`, or the call-site id. */
  location: string;
  printedShape: string;
  sourceType: string;
  targetName: string | undefined;
  captures: Readonly<Record<string, string>>;
  schemaFingerprint: string;
  optionsFingerprint: string;
};

/**
 * Value-based memoization key of one call site.
 *
 * Two evaluations of an unchanged shape at the same location, against the
 * same schema and options, share a key.
 */
export function memoKey(parts: MemoKeyParts): string {
  const captures = Object.keys(parts.captures)
    .sort()
    .map(name => `${name}:${parts.captures[name] ?? ''}`)
    .join(',');

  return [
    parts.location,
    sha256(parts.printedShape),
    parts.sourceType,
    parts.targetName ?? '',
    captures,
    parts.schemaFingerprint,
    parts.optionsFingerprint
  ].join('|');
}
