import type { PolicyConfig } from "@/lib/config";
import { CRITICAL_FLAG_MIN_CONFIDENCE } from "@/lib/constants";
import type { DecisionOutcome, PolicyRuleEvaluation, Recommendation, Review, ReviewSetSummary } from "@/lib/types";
import { roundTo, sortByCreatedAtAsc } from "@/lib/utils";

export interface DecisionEvaluation {
  decision: DecisionOutcome;
  ruleEvaluations: PolicyRuleEvaluation[];
  reviewSummary: ReviewSetSummary;
  explanation: string;
}

export function requiredReviewCount(domain: string, policy: PolicyConfig): number {
  return policy.highImpactDomains.includes(domain) ? policy.minReviewsHighImpact : policy.minReviewsNormal;
}

export function ruleMinimumReviews(reviewCount: number, domain: string, policy: PolicyConfig): PolicyRuleEvaluation {
  const required = requiredReviewCount(domain, policy);
  const passed = reviewCount >= required;
  return {
    rule: "minimum_reviews",
    inputs: { reviewCount, required, domain },
    passed,
    explanation: `${passed ? "Met" : "Not met"}: ${reviewCount}/${required} reviews received`
  };
}

export function ruleRevisionLimit(version: number, policy: PolicyConfig): PolicyRuleEvaluation {
  const maxRounds = policy.maxRevisionRounds;
  // version 1 is the original submission
  const passed = version <= maxRounds + 1;
  return {
    rule: "revision_limit",
    inputs: { currentVersion: version, maxRounds },
    passed,
    explanation: `${passed ? "OK" : "EXCEEDED"}: version ${version}, max ${maxRounds} revision rounds`
  };
}

export function ruleScoreThreshold(meanOverall: number, policy: PolicyConfig): PolicyRuleEvaluation {
  const threshold = policy.acceptScoreThreshold;
  const passed = meanOverall >= threshold;
  return {
    rule: "score_threshold",
    inputs: { meanOverall: roundTo(meanOverall, 2), threshold },
    passed,
    explanation: `${passed ? "Met" : "Not met"}: mean score ${meanOverall.toFixed(1)} vs threshold ${threshold}`
  };
}

export function ruleNoRejectMajority(recommendations: Recommendation[]): PolicyRuleEvaluation {
  const rejectCount = recommendations.filter((r) => r === "reject").length;
  const total = recommendations.length;
  const majorityReject = total > 0 && rejectCount > total / 2;
  return {
    rule: "no_reject_majority",
    inputs: { rejectCount, total },
    passed: !majorityReject,
    explanation: `${majorityReject ? "FAIL: majority reject" : "OK"}: ${rejectCount}/${total} reject`
  };
}

export function ruleNoUnresolvedCriticalFlags(reviews: Pick<Review, "recommendation" | "confidence">[]): PolicyRuleEvaluation {
  const criticalFlagCount = reviews.filter(
    (r) => r.recommendation === "reject" && r.confidence >= CRITICAL_FLAG_MIN_CONFIDENCE
  ).length;
  const passed = criticalFlagCount === 0;
  return {
    rule: "no_unresolved_critical_flags",
    inputs: { criticalFlagCount, minConfidence: CRITICAL_FLAG_MIN_CONFIDENCE },
    passed,
    explanation: passed ? "OK" : `FAIL: ${criticalFlagCount} critical flags`
  };
}

export function ruleRevisionsNeeded(recommendations: Recommendation[]): PolicyRuleEvaluation {
  const revisionRequests = recommendations.filter((r) => r === "minor_revisions" || r === "major_revisions").length;
  return {
    rule: "revisions_needed",
    inputs: { revisionRequests, total: recommendations.length },
    passed: revisionRequests > 0,
    explanation: `${revisionRequests}/${recommendations.length} reviewers request revisions`
  };
}

export function summarizeReviews(reviews: Review[], round: number): ReviewSetSummary {
  const ordered = sortByCreatedAtAsc(reviews);
  const total = ordered.reduce((sum, r) => sum + r.scores.overall, 0);
  return {
    round,
    reviewCount: ordered.length,
    meanOverall: ordered.length ? roundTo(total / ordered.length, 2) : 0,
    recommendations: ordered.map((r) => r.recommendation),
    reviewIds: ordered.map((r) => r.id)
  };
}

/**
 * Applies the publication policy to all of a scroll's reviews.
 *
 * Deterministic: identical reviews, scroll version, domain and policy always
 * produce the identical decision, rule list and explanation.
 */
export function evaluateDecision(params: {
  domain: string;
  version: number;
  round: number;
  reviews: Review[];
  policy: PolicyConfig;
}): DecisionEvaluation {
  const { domain, version, round, policy } = params;
  const reviews = sortByCreatedAtAsc(params.reviews);
  const reviewSummary = summarizeReviews(reviews, round);
  const recommendations = reviews.map((r) => r.recommendation);
  const meanOverall = reviews.length ? reviews.reduce((sum, r) => sum + r.scores.overall, 0) / reviews.length : 0;

  const minimum = ruleMinimumReviews(reviews.length, domain, policy);
  if (!minimum.passed) {
    return {
      decision: "insufficient_reviews",
      ruleEvaluations: [minimum],
      reviewSummary,
      explanation: `Waiting for more reviews: ${minimum.explanation}`
    };
  }

  const revisionLimit = ruleRevisionLimit(version, policy);
  const score = ruleScoreThreshold(meanOverall, policy);
  const rejectMajority = ruleNoRejectMajority(recommendations);
  const criticalFlags = ruleNoUnresolvedCriticalFlags(reviews);
  const revisionsNeeded = ruleRevisionsNeeded(recommendations);
  const ruleEvaluations = [minimum, revisionLimit, score, rejectMajority, criticalFlags, revisionsNeeded];

  const resolve = (decision: DecisionOutcome, explanation: string): DecisionEvaluation => ({
    decision,
    ruleEvaluations,
    reviewSummary,
    explanation
  });

  if (!revisionLimit.passed) {
    return resolve("reject", "Max revision rounds exceeded; auto-rejected by policy");
  }
  if (!rejectMajority.passed) {
    return resolve("reject", "Majority of reviewers recommend rejection");
  }
  if (!criticalFlags.passed) {
    return resolve("reject", "Unresolved critical flags from high-confidence reviewers");
  }
  if (revisionsNeeded.passed && !score.passed) {
    return resolve("revisions_required", "Reviewers request revisions and score is below threshold");
  }
  if (revisionsNeeded.passed) {
    if (recommendations.includes("major_revisions")) {
      return resolve("revisions_required", "Score meets threshold but major revisions requested");
    }
    // Minor requests travel with the record in reviewSummary.recommendations.
    return resolve("accept", "Score meets threshold; minor revision requests can be addressed post-acceptance");
  }
  if (score.passed) {
    return resolve("accept", "All criteria met: sufficient reviews, score above threshold, no reject majority");
  }
  return resolve("revisions_required", "Score below threshold; revisions required");
}
