import { IdentityCollisionError } from '../errors';
import type { Structure } from '../types/structure';
import { structureSignature } from './hash';

type Entry = {
  signature: string;
  canonical: Structure;
  suffix: string;
  generatedName?: string;
};

export type InternResult = {
  /** The first Structure interned under this hash. */
  canonical: Structure;

  /** `true` when an identical Structure had been interned before. */
  reused: boolean;

  /**
   * Target names that already named a different Structure in this session,
   * with the name the incoming Structure was declared under instead.
   */
  renamed: Array<{ requested: string; assigned: string }>;
};

/**
 * Interning table for Structures, owned by one compiler session.
 *
 * - Deduplicates by content hash: the first Structure seen for a hash is the
 *   canonical one; later identical ones reuse its generated type.
 * - Verifies identity: a hash seen with a different canonical signature
 *   raises {@link IdentityCollisionError}.
 * - Hands out type names: the target name for named shapes,
 *   `{Hint}{suffix}_{hash}` for anonymous ones (fixed on first use). A
 *   target name taken by a different Structure becomes `{Target}_{hash}`.
 */
export class StructureTable {
  private readonly entries = new Map<string, Entry>();
  private readonly named = new Map<string, Structure>();

  /** `{target}@{hash}` -> declared name. */
  private readonly targetNames = new Map<string, string>();

  constructor(private readonly typeNameSuffix: string) {}

  /**
   * Interns `structure` and every nested Structure below it (children first).
   *
   * @param typeNameSuffix Suffix of a generated name fixed by this call.
   * @throws IdentityCollisionError
   */
  intern(
    structure: Structure,
    typeNameSuffix: string = this.typeNameSuffix
  ): InternResult {
    const renamed: InternResult['renamed'] = [];
    const result = this.internTree(structure, typeNameSuffix, renamed);
    return { ...result, renamed };
  }

  private internTree(
    structure: Structure,
    suffix: string,
    renamed: InternResult['renamed']
  ): Omit<InternResult, 'renamed'> {
    for (const field of structure.fields) {
      if (field.nested) this.internTree(field.nested.structure, suffix, renamed);
    }

    const signature = structureSignature(structure.fields);
    const existing = this.entries.get(structure.contentHash);

    if (existing && existing.signature !== signature) {
      throw new IdentityCollisionError(
        structure.contentHash,
        existing.signature,
        signature
      );
    }

    if (structure.targetName) {
      const assigned = this.claimTargetName(structure.targetName, structure);
      if (assigned !== structure.targetName) {
        renamed.push({ requested: structure.targetName, assigned });
      }
    }

    if (existing) {
      return { canonical: existing.canonical, reused: true };
    }

    this.entries.set(structure.contentHash, {
      signature,
      canonical: structure,
      suffix
    });
    return { canonical: structure, reused: false };
  }

  private claimTargetName(targetName: string, structure: Structure): string {
    const key = `${targetName}@${structure.contentHash}`;
    const claimed = this.targetNames.get(key);
    if (claimed) return claimed;

    const holder = this.named.get(targetName);
    const name =
      !holder || holder.contentHash === structure.contentHash
        ? targetName
        : `${targetName}_${structure.contentHash}`;

    this.targetNames.set(key, name);
    if (!this.named.has(name)) this.named.set(name, structure);
    return name;
  }

  /**
   * Generated type name of `structure`.
   */
  typeNameOf(structure: Structure): string {
    if (structure.targetName) {
      return (
        this.targetNames.get(`${structure.targetName}@${structure.contentHash}`) ??
        structure.targetName
      );
    }

    const entry = this.entries.get(structure.contentHash);
    if (!entry) {
      return generatedTypeName(structure, this.typeNameSuffix);
    }

    entry.generatedName ??= generatedTypeName(structure, entry.suffix);
    return entry.generatedName;
  }

  has(hash: string): boolean {
    return this.entries.has(hash);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * One entry per distinct generated type, in first-use order: named targets
   * under their own names, anonymous Structures under their hash-based
   * names.
   */
  declarations(): Array<{ name: string; structure: Structure }> {
    const result: Array<{ name: string; structure: Structure }> = [];

    for (const entry of this.entries.values()) {
      if (entry.generatedName) {
        result.push({ name: entry.generatedName, structure: entry.canonical });
      }
    }
    for (const [name, structure] of this.named) {
      result.push({ name, structure });
    }

    return result;
  }
}

export function generatedTypeName(structure: Structure, suffix: string): string {
  return `${structure.hint}${suffix}_${structure.contentHash}`;
}
