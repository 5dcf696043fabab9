import { RECIPROCAL_REVIEW_LIMIT } from "@/lib/constants";
import { ERROR_CODES } from "@/lib/error-codes";
import { violation, type RuleViolation } from "@/lib/errors";
import type { Review } from "@/lib/types";

export interface ConflictCheckInput {
  scrollId: string;
  reviewerId: string;
  round: number;
  authorIds: string[];
  reviewerHistory: Pick<Review, "scrollId" | "round">[];
  authorsOf: (scrollId: string) => string[];
}

/** Returns every conflict of interest between a reviewer and a scroll; empty means none. */
export function findReviewConflicts(input: ConflictCheckInput): RuleViolation[] {
  const conflicts: RuleViolation[] = [];

  if (input.authorIds.includes(input.reviewerId)) {
    conflicts.push(violation(ERROR_CODES.reviewerIsAuthor, "Reviewer is an author of this scroll"));
  }

  const otherScrolls = new Set(input.reviewerHistory.map((r) => r.scrollId).filter((id) => id !== input.scrollId));
  for (const authorId of input.authorIds) {
    if (authorId === input.reviewerId) continue;
    let reviewed = 0;
    for (const scrollId of otherScrolls) {
      if (input.authorsOf(scrollId).includes(authorId)) reviewed += 1;
    }
    if (reviewed >= RECIPROCAL_REVIEW_LIMIT) {
      conflicts.push(
        violation(
          ERROR_CODES.excessiveReciprocalReviews,
          `Reviewer has already reviewed ${reviewed} scrolls by author ${authorId}`,
          { details: { authorId, reviewedCount: reviewed, limit: RECIPROCAL_REVIEW_LIMIT } }
        )
      );
    }
  }

  if (input.reviewerHistory.some((r) => r.scrollId === input.scrollId && r.round === input.round)) {
    conflicts.push(
      violation(ERROR_CODES.alreadyReviewedThisScrollRound, `Reviewer already reviewed this scroll in round ${input.round}`)
    );
  }

  return conflicts;
}

/** Round for a new review: never below the scroll version, never below an existing round. */
export function nextReviewRound(existingRounds: number[], scrollVersion: number): number {
  return Math.max(scrollVersion, ...existingRounds);
}
