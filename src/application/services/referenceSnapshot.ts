import type { ReferenceEntry } from "../../core/entities/reference";
import type { ReferenceKind } from "../../core/entities/stockholder";
import { normalizeEntityName } from "../utils/nameText";

export type IndexedReference = ReferenceEntry & {
  normalizedName: string;
};

/**
 * Read-only view of the reference list taken at run start, split into organization and person indices.
 */
export class ReferenceSnapshot {
  private readonly indices: Readonly<Record<ReferenceKind, readonly IndexedReference[]>>;

  private constructor(
    organizations: IndexedReference[],
    persons: IndexedReference[],
    readonly loadedAt: Date,
  ) {
    this.indices = {
      organization: Object.freeze(organizations),
      person: Object.freeze(persons),
    };
  }

  static fromEntries(entries: ReferenceEntry[], loadedAt = new Date()): ReferenceSnapshot {
    const indexed = entries
      .map((entry) => ({
        ...entry,
        name: entry.name.trim(),
        normalizedName: normalizeEntityName(entry.name),
      }))
      .filter((entry) => entry.normalizedName.length > 0);

    return new ReferenceSnapshot(
      indexed.filter((entry) => entry.kind === "organization"),
      indexed.filter((entry) => entry.kind === "person"),
      loadedAt,
    );
  }

  static empty(): ReferenceSnapshot {
    return ReferenceSnapshot.fromEntries([]);
  }

  index(kind: ReferenceKind): readonly IndexedReference[] {
    return this.indices[kind];
  }

  get size(): number {
    return this.indices.organization.length + this.indices.person.length;
  }
}
