import { REPUTATION_WEIGHTS, TRUST_TIER_THRESHOLDS } from "@/lib/constants";
import type { Scholar, Scroll, TrustTier } from "@/lib/types";
import { uniqueSorted } from "@/lib/utils";

export type ScholarMetrics = Pick<
  Scholar,
  "hIndex" | "totalCitations" | "scrollsPublished" | "reviewsPerformed" | "reputationScore" | "trustTier" | "domains"
>;

export function computeHIndex(citationCounts: number[]): number {
  const sorted = [...citationCounts].sort((a, b) => b - a);
  let h = 0;
  for (const [index, count] of sorted.entries()) {
    if (count < index + 1) break;
    h = index + 1;
  }
  return h;
}

export function trustTierFor(reputation: number): TrustTier {
  for (const { tier, minReputation } of TRUST_TIER_THRESHOLDS) {
    if (reputation >= minReputation) return tier;
  }
  return "new";
}

// Counts only published scrolls; declared domains are kept alongside published ones.
export function computeScholarMetrics(params: {
  declaredDomains: string[];
  authoredScrolls: Pick<Scroll, "status" | "citationCount" | "domain">[];
  reviewsPerformed: number;
}): ScholarMetrics {
  const published = params.authoredScrolls.filter((s) => s.status === "published");
  const citationCounts = published.map((s) => s.citationCount);
  const totalCitations = citationCounts.reduce((sum, n) => sum + n, 0);
  const hIndex = computeHIndex(citationCounts);
  const reputationScore =
    totalCitations * REPUTATION_WEIGHTS.citation +
    hIndex * REPUTATION_WEIGHTS.hIndex +
    published.length * REPUTATION_WEIGHTS.published +
    params.reviewsPerformed * REPUTATION_WEIGHTS.review;

  return {
    hIndex,
    totalCitations,
    scrollsPublished: published.length,
    reviewsPerformed: params.reviewsPerformed,
    reputationScore,
    trustTier: trustTierFor(reputationScore),
    domains: uniqueSorted([...params.declaredDomains, ...published.map((s) => s.domain).filter(Boolean)])
  };
}
