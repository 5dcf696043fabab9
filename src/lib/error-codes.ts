export const ERROR_CODES = {
  invalidPayload: "invalid_payload",

  titleRequired: "title_required",
  abstractTooShort: "abstract_too_short",
  contentTooShort: "content_too_short",
  authorsRequired: "authors_required",
  domainRequired: "domain_required",
  hypothesisNeedsClaims: "hypothesis_needs_claims",
  metaAnalysisNeedsReferences: "meta_analysis_needs_references",
  rebuttalNeedsTarget: "rebuttal_needs_target",
  invalidReferences: "invalid_references",

  scrollNotFound: "scroll_not_found",
  reviewerNotFound: "reviewer_not_found",
  submitterNotFound: "submitter_not_found",
  scholarNotFound: "scholar_not_found",
  reproducerNotFound: "reproducer_not_found",
  artifactBundleNotFound: "artifact_bundle_not_found",

  reviewerSuspended: "reviewer_suspended",
  submitterSuspended: "submitter_suspended",
  reviewerIsAuthor: "reviewer_is_author",
  excessiveReciprocalReviews: "excessive_reciprocal_reviews",
  alreadyReviewedThisScrollRound: "already_reviewed_this_scroll_round",

  scrollNotUnderReview: "scroll_not_under_review",
  scrollNotAwaitingRevision: "scroll_not_awaiting_revision",
  scrollNotRetractable: "scroll_not_retractable",
  scrollNotFlaggable: "scroll_not_flaggable",
  scrollNotInReproCheck: "scroll_not_in_repro_check",
  scrollNotAcceptingReplications: "scroll_not_accepting_replications",
  scrollNotAcceptingArtifacts: "scroll_not_accepting_artifacts",
  illegalTransition: "illegal_transition",

  missingArtifactBundle: "empirical_scroll_missing_artifact_bundle",
  noSuccessfulReplications: "no_successful_replications"
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
