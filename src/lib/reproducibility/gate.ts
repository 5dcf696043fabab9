import { NON_EMPIRICAL_SCROLL_TYPES, REVIEW_APPROVED_STATUSES } from "@/lib/constants";
import { ERROR_CODES } from "@/lib/error-codes";
import type { Badge, EvidenceGrade, ReplicationResult, Scroll } from "@/lib/types";

export interface GateResult {
  passed: boolean;
  reason: string;
}

export interface EvidenceAssessment {
  grade: EvidenceGrade;
  badges: Badge[];
}

const DERIVED_BADGES: readonly Badge[] = ["replicated", "artifact_complete", "high_confidence_methods"];

export function evaluateReproGate(
  scroll: Pick<Scroll, "type" | "artifactBundleId">,
  replications: Pick<ReplicationResult, "success">[]
): GateResult {
  if (NON_EMPIRICAL_SCROLL_TYPES.has(scroll.type)) {
    return { passed: true, reason: `auto_pass: ${scroll.type} does not require replication` };
  }
  if (scroll.type === "meta_analysis") {
    return { passed: true, reason: "auto_pass: meta-analysis verified through cited scroll status" };
  }
  if (!scroll.artifactBundleId) {
    return { passed: false, reason: ERROR_CODES.missingArtifactBundle };
  }
  const successful = replications.filter((r) => r.success).length;
  if (successful === 0) {
    return { passed: false, reason: ERROR_CODES.noSuccessfulReplications };
  }
  return { passed: true, reason: `passed: ${successful} successful replication(s)` };
}

export function gradeEvidence(
  scroll: Pick<Scroll, "status">,
  replications: Pick<ReplicationResult, "success" | "reproducerId">[]
): EvidenceGrade {
  const reproducers = new Set(replications.filter((r) => r.success).map((r) => r.reproducerId));
  if (reproducers.size >= 2) return "A";
  if (reproducers.size === 1) return "B";
  if (REVIEW_APPROVED_STATUSES.has(scroll.status)) return "C";
  return "ungraded";
}

/** Grade plus badge set. Badges the grader does not own (integrity_flagged) are carried over. */
export function assessEvidence(
  scroll: Pick<Scroll, "status" | "artifactBundleId" | "badges">,
  replications: Pick<ReplicationResult, "success" | "reproducerId">[]
): EvidenceAssessment {
  const grade = gradeEvidence(scroll, replications);
  const badges: Badge[] = scroll.badges.filter((badge) => !DERIVED_BADGES.includes(badge));
  if (grade === "A" || grade === "B") badges.push("replicated");
  if (scroll.artifactBundleId) badges.push("artifact_complete");
  if (grade === "A") badges.push("high_confidence_methods");
  return { grade, badges };
}
