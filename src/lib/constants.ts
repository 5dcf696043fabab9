export const STATE_SCHEMA_VERSION = 1;

export const SCROLL_TYPES = ["paper", "hypothesis", "meta_analysis", "rebuttal", "tutorial"] as const;
export const SCROLL_STATUSES = [
  "submitted",
  "screened",
  "desk_rejected",
  "under_review",
  "revisions_required",
  "accepted",
  "repro_check",
  "published",
  "rejected",
  "retracted",
  "superseded",
  "flagged"
] as const;
export const RECOMMENDATIONS = ["accept", "minor_revisions", "major_revisions", "reject"] as const;
export const SANCTION_TYPES = ["review_suspension", "submission_suspension", "reputation_penalty", "scroll_retraction"] as const;
export const CLAIM_KINDS = ["hypothesis", "finding", "method", "limitation"] as const;

// Scroll types that publish without a replication.
export const NON_EMPIRICAL_SCROLL_TYPES = new Set(["hypothesis", "tutorial", "rebuttal"]);
export const REVIEW_APPROVED_STATUSES = new Set(["repro_check", "accepted", "published"]);
export const REPLICATION_CLOSED_STATUSES = new Set(["desk_rejected", "rejected", "retracted"]);
export const BUNDLE_CLOSED_STATUSES = new Set(["desk_rejected", "rejected", "retracted", "superseded"]);

export const DEFAULT_REVIEW_CONFIDENCE = 0.8;
export const CRITICAL_FLAG_MIN_CONFIDENCE = 0.8;
export const RECIPROCAL_REVIEW_LIMIT = 3;
export const SCORE_MIN = 1;
export const SCORE_MAX = 10;
export const MAX_LISTED_MISSING_REFERENCES = 10;
export const LINEAGE_MAX_DEPTH = 10;
export const SCROLL_ID_PREFIX = "AX";

export const TRUST_TIER_THRESHOLDS = [
  { tier: "distinguished", minReputation: 500 },
  { tier: "trusted", minReputation: 100 },
  { tier: "established", minReputation: 20 }
] as const;

export const REPUTATION_WEIGHTS = {
  citation: 3,
  hIndex: 10,
  published: 2,
  review: 1
} as const;

export const ACTORS = {
  policyEngine: "policy_engine",
  reproGate: "repro_gate",
  integrityAgent: "integrity_agent",
  system: "system"
} as const;

export const AUDIT_ACTIONS = {
  scholarRegistered: "scholar_registered",
  scrollSubmitted: "scroll_submitted",
  statusChanged: "scroll_status_changed",
  reviewSubmitted: "review_submitted",
  decisionMade: "decision_made",
  revisionSubmitted: "revision_submitted",
  scrollRetracted: "scroll_retracted",
  scrollPublished: "scroll_published",
  scrollFlagged: "scroll_flagged",
  artifactBundleSubmitted: "artifact_bundle_submitted",
  replicationCompleted: "repro_completed",
  evidenceGraded: "evidence_graded",
  sanctionApplied: "sanction_applied",
  integrityViolation: "integrity_violation",
  similarityCheckUnavailable: "similarity_check_unavailable"
} as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[keyof typeof AUDIT_ACTIONS];
