import type {
  EntityType,
  MatchResult,
  ReferenceKind,
} from "../../core/entities/stockholder";
import { levenshteinDistance, weightedRatio } from "../utils/nameSimilarity";
import type { IndexedReference, ReferenceSnapshot } from "./referenceSnapshot";

export const DEFAULT_MATCH_THRESHOLD = 80;

export type MatchQuery = {
  normalizedName: string;
  displayName: string;
  entityType: EntityType;
};

type ScoredCandidate = {
  reference: IndexedReference;
  score: number;
  editDistance: number;
};

const presumedKind = (entityType: EntityType): ReferenceKind =>
  entityType === "individual" ? "person" : "organization";

const otherKind = (kind: ReferenceKind): ReferenceKind =>
  kind === "person" ? "organization" : "person";

const noMatch = (bestScore: number): MatchResult => ({
  matched: false,
  referenceId: null,
  referenceName: null,
  confidence: null,
  referenceStatus: null,
  referenceLastActivity: null,
  referenceNotes: null,
  matchBasis: null,
  bestScore,
});

/**
 * Resolves a record against the reference snapshot, biased to precision: below the threshold nothing is attached.
 */
export class MatchResolverService {
  constructor(private readonly threshold = DEFAULT_MATCH_THRESHOLD) {
    if (!Number.isInteger(threshold) || threshold < 0 || threshold > 100) {
      throw new Error(`Match threshold must be an integer in [0, 100], got ${threshold}.`);
    }
  }

  resolve(query: MatchQuery, snapshot: ReferenceSnapshot): MatchResult {
    if (!query.normalizedName) {
      return noMatch(0);
    }

    const primaryKind = presumedKind(query.entityType);
    const primary = this.bestCandidate(query, snapshot.index(primaryKind));
    if (primary && primary.score >= this.threshold) {
      return this.toMatch(primary);
    }

    // Nothing at threshold in the presumed index; the other index is the fallback.
    const fallback = this.bestCandidate(query, snapshot.index(otherKind(primaryKind)));
    if (fallback && fallback.score >= this.threshold) {
      return this.toMatch(fallback);
    }

    return noMatch(Math.max(primary?.score ?? 0, fallback?.score ?? 0));
  }

  private bestCandidate(
    query: MatchQuery,
    index: readonly IndexedReference[],
  ): ScoredCandidate | null {
    const queryText = query.displayName.trim().toLowerCase();
    let best: ScoredCandidate | null = null;

    for (const reference of index) {
      const score = weightedRatio(query.normalizedName, reference.normalizedName);
      if (best && score < best.score) {
        continue;
      }

      const candidate: ScoredCandidate = {
        reference,
        score,
        editDistance: levenshteinDistance(queryText, reference.name.toLowerCase()),
      };

      if (!best || this.compare(candidate, best) < 0) {
        best = candidate;
      }
    }

    return best;
  }

  /**
   * Orders candidates within one index: higher score, then smaller edit distance, then lowest reference id.
   * Kind preference needs no comparison here because the presumed kind's index is always searched first.
   */
  private compare(left: ScoredCandidate, right: ScoredCandidate): number {
    if (left.score !== right.score) {
      return right.score - left.score;
    }

    if (left.editDistance !== right.editDistance) {
      return left.editDistance - right.editDistance;
    }

    if (left.reference.referenceId === right.reference.referenceId) {
      return 0;
    }

    return left.reference.referenceId < right.reference.referenceId ? -1 : 1;
  }

  private toMatch(candidate: ScoredCandidate): MatchResult {
    return {
      matched: true,
      referenceId: candidate.reference.referenceId,
      referenceName: candidate.reference.name,
      confidence: candidate.score,
      referenceStatus: candidate.reference.status,
      referenceLastActivity: candidate.reference.lastActivity ?? null,
      referenceNotes: candidate.reference.notes ?? null,
      matchBasis: candidate.reference.kind,
    };
  }
}
