import type { PolicyConfig } from "@/lib/config";
import {
  ACTORS,
  AUDIT_ACTIONS,
  BUNDLE_CLOSED_STATUSES,
  LINEAGE_MAX_DEPTH,
  REPLICATION_CLOSED_STATUSES,
  SCROLL_ID_PREFIX,
  STATE_SCHEMA_VERSION
} from "@/lib/constants";
import { evaluateDecision } from "@/lib/decision-engine/evaluate";
import { ERROR_CODES } from "@/lib/error-codes";
import { InfrastructureError, violation, zodViolations, type RuleViolation } from "@/lib/errors";
import type { SimilarityCheck } from "@/lib/integrity/similarity";
import { canTransition, decisionAction, transition, type LifecycleAction } from "@/lib/lifecycle/transitions";
import { assessEvidence, evaluateReproGate, type GateResult } from "@/lib/reproducibility/gate";
import { findReviewConflicts, nextReviewRound } from "@/lib/review/conflicts";
import { computeScholarMetrics } from "@/lib/scholars/metrics";
import {
  artifactBundleSubmissionSchema,
  replicationSubmissionSchema,
  reviewSubmissionSchema,
  revisionPatchSchema,
  sanctionRequestSchema,
  scholarRegistrationSchema,
  scrollSubmissionSchema,
  type ArtifactBundleInput,
  type ReplicationInput,
  type ReviewSubmissionInput,
  type RevisionPatchInput,
  type SanctionRequestInput,
  type ScholarRegistrationInput,
  type ScrollSubmissionInput
} from "@/lib/schemas";
import { screenSubmission } from "@/lib/screening/screen";
import type {
  AppState,
  ArtifactBundle,
  AuditDetailValue,
  AuditEvent,
  AuditTargetType,
  Clock,
  DecisionRecord,
  LineageNode,
  ReplicationResult,
  Review,
  Sanction,
  SanctionType,
  Scholar,
  Scroll,
  ScrollStatus
} from "@/lib/types";
import { addHours, deepClone, randomId, sortByCreatedAtAsc, uniqueSorted } from "@/lib/utils";

type AuditInput = {
  action: string;
  actorId: string;
  targetId: string;
  targetType: AuditTargetType;
  details?: Record<string, AuditDetailValue>;
};

export type ScrollResult = { scroll: Scroll | null; errors: RuleViolation[] };
export type DecisionOutcomeResult = { decision: DecisionRecord; gate: GateResult | null };
export type ReviewResult = {
  review: Review | null;
  errors: RuleViolation[];
  decision: DecisionRecord | null;
  gate: GateResult | null;
};

export function emptyState(): AppState {
  return {
    schemaVersion: STATE_SCHEMA_VERSION,
    scholars: [],
    scrolls: [],
    authorships: [],
    reviews: [],
    decisions: [],
    artifactBundles: [],
    replications: [],
    sanctions: [],
    citations: [],
    auditEvents: [],
    idSequences: {},
    auditSequence: 0
  };
}

function notFound(scrollId: string): RuleViolation {
  return violation(ERROR_CODES.scrollNotFound, `Scroll ${scrollId} not found`);
}

export class MemoryStore {
  state: AppState;
  private readonly clock: Clock;

  constructor(initialState?: AppState, options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? (() => new Date());
    const base = initialState ? deepClone(initialState) : emptyState();
    if (base.schemaVersion > STATE_SCHEMA_VERSION) {
      throw new InfrastructureError(
        `State snapshot schema ${base.schemaVersion} is newer than supported schema ${STATE_SCHEMA_VERSION}`
      );
    }
    this.state = { ...emptyState(), ...base, schemaVersion: STATE_SCHEMA_VERSION };
  }

  now(): string {
    return this.clock().toISOString();
  }

  private audit(event: AuditInput): AuditEvent {
    this.state.auditSequence += 1;
    const record: AuditEvent = {
      id: randomId("audit"),
      sequence: this.state.auditSequence,
      action: event.action,
      actorId: event.actorId,
      targetId: event.targetId,
      targetType: event.targetType,
      details: event.details ?? {},
      timestamp: this.now()
    };
    this.state.auditEvents.push(record);
    return record;
  }

  snapshotState(): AppState {
    return deepClone(this.state);
  }

  /** Runs a unit of work; any throw restores the state as it was before `fn`. */
  transaction<T>(fn: (store: this) => T): T {
    const before = deepClone(this.state);
    try {
      return fn(this);
    } catch (error) {
      this.state = before;
      throw error;
    }
  }

  private applyTransition(
    scroll: Scroll,
    action: LifecycleAction,
    audit: { actorId: string; action?: string; details?: Record<string, AuditDetailValue> }
  ): ScrollStatus {
    const result = transition(scroll.status, action);
    if (!result.ok) {
      throw new InfrastructureError(result.error.message);
    }
    const from = scroll.status;
    scroll.status = result.to;
    scroll.updatedAt = this.now();
    this.audit({
      action: audit.action ?? AUDIT_ACTIONS.statusChanged,
      actorId: audit.actorId,
      targetId: scroll.id,
      targetType: "scroll",
      details: { from, to: result.to, transition: action, ...(audit.details ?? {}) }
    });
    return result.to;
  }

  private nextScrollId(): string {
    const year = String(this.clock().getUTCFullYear());
    const sequence = (this.state.idSequences[year] ?? 0) + 1;
    this.state.idSequences[year] = sequence;
    return `${SCROLL_ID_PREFIX}-${year}-${String(sequence).padStart(5, "0")}`;
  }

  // ---- scholars ----

  registerScholar(input: ScholarRegistrationInput): { scholar: Scholar | null; errors: RuleViolation[] } {
    const parsed = scholarRegistrationSchema.safeParse(input);
    if (!parsed.success) return { scholar: null, errors: zodViolations(parsed.error) };
    const timestamp = this.now();
    const scholar: Scholar = {
      id: randomId("scholar"),
      name: parsed.data.name,
      affiliation: parsed.data.affiliation,
      bio: parsed.data.bio,
      declaredDomains: uniqueSorted(parsed.data.domains),
      domains: uniqueSorted(parsed.data.domains),
      hIndex: 0,
      totalCitations: 0,
      scrollsPublished: 0,
      reviewsPerformed: 0,
      reputationScore: 0,
      trustTier: "new",
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.state.scholars.push(scholar);
    this.audit({
      action: AUDIT_ACTIONS.scholarRegistered,
      actorId: scholar.id,
      targetId: scholar.id,
      targetType: "scholar",
      details: { name: scholar.name }
    });
    return { scholar, errors: [] };
  }

  getScholar(scholarId: string) {
    return this.state.scholars.find((s) => s.id === scholarId) ?? null;
  }

  listScholars() {
    return [...this.state.scholars].sort((a, b) => a.name.localeCompare(b.name));
  }

  recomputeScholarMetrics(scholarId: string): Scholar | null {
    const scholar = this.getScholar(scholarId);
    if (!scholar) return null;
    const metrics = computeScholarMetrics({
      declaredDomains: scholar.declaredDomains,
      authoredScrolls: this.listScrollsByAuthor(scholarId),
      reviewsPerformed: this.state.reviews.filter((r) => r.reviewerId === scholarId).length
    });
    Object.assign(scholar, metrics, { updatedAt: this.now() });
    return scholar;
  }

  // ---- sanctions ----

  applySanction(input: SanctionRequestInput, actorId: string = ACTORS.integrityAgent): { sanction: Sanction | null; errors: RuleViolation[] } {
    const parsed = sanctionRequestSchema.safeParse(input);
    if (!parsed.success) return { sanction: null, errors: zodViolations(parsed.error) };
    const request = parsed.data;
    if (!this.getScholar(request.scholarId)) {
      return { sanction: null, errors: [violation(ERROR_CODES.scholarNotFound, `Scholar ${request.scholarId} not found`)] };
    }
    if (request.scrollId && !this.getScroll(request.scrollId)) {
      return { sanction: null, errors: [notFound(request.scrollId)] };
    }
    const appliedAt = this.now();
    const sanction: Sanction = {
      id: randomId("sanction"),
      scholarId: request.scholarId,
      type: request.type,
      reason: request.reason,
      scrollId: request.scrollId ?? null,
      appliedAt,
      expiresAt: request.durationHours ? addHours(appliedAt, request.durationHours) : null
    };
    this.state.sanctions.push(sanction);
    this.audit({
      action: AUDIT_ACTIONS.sanctionApplied,
      actorId,
      targetId: sanction.scholarId,
      targetType: "scholar",
      details: {
        sanctionId: sanction.id,
        sanctionType: sanction.type,
        reason: sanction.reason,
        scrollId: sanction.scrollId,
        durationHours: request.durationHours ?? null
      }
    });
    return { sanction, errors: [] };
  }

  listActiveSanctions(scholarId: string): Sanction[] {
    const nowMs = this.clock().getTime();
    return this.state.sanctions
      .filter((s) => s.scholarId === scholarId && (s.expiresAt === null || new Date(s.expiresAt).getTime() > nowMs))
      .sort((a, b) => new Date(b.appliedAt).getTime() - new Date(a.appliedAt).getTime());
  }

  hasActiveSanction(scholarId: string, type: SanctionType): boolean {
    return this.listActiveSanctions(scholarId).some((s) => s.type === type);
  }

  // ---- scrolls ----

  getScroll(scrollId: string) {
    return this.state.scrolls.find((s) => s.id === scrollId) ?? null;
  }

  listScrolls(filter: { status?: ScrollStatus; domain?: string } = {}) {
    return sortByCreatedAtAsc(
      this.state.scrolls.filter(
        (s) => (!filter.status || s.status === filter.status) && (!filter.domain || s.domain === filter.domain)
      )
    );
  }

  getAuthors(scrollId: string): string[] {
    return this.state.authorships
      .filter((a) => a.scrollId === scrollId)
      .sort((a, b) => a.position - b.position)
      .map((a) => a.scholarId);
  }

  isAuthor(scrollId: string, scholarId: string): boolean {
    return this.state.authorships.some((a) => a.scrollId === scrollId && a.scholarId === scholarId);
  }

  listScrollsByAuthor(scholarId: string): Scroll[] {
    const ids = new Set(this.state.authorships.filter((a) => a.scholarId === scholarId).map((a) => a.scrollId));
    return sortByCreatedAtAsc(this.state.scrolls.filter((s) => ids.has(s.id)));
  }

  // Owned scroll or nothing: callers cannot tell a missing scroll from someone else's.
  private getOwnedScroll(scrollId: string, scholarId: string): Scroll | null {
    const scroll = this.getScroll(scrollId);
    if (!scroll || !this.isAuthor(scroll.id, scholarId)) return null;
    return scroll;
  }

  submitScroll(input: ScrollSubmissionInput, submitterId: string, policy: PolicyConfig): ScrollResult {
    const parsed = scrollSubmissionSchema.safeParse(input);
    if (!parsed.success) return { scroll: null, errors: zodViolations(parsed.error) };
    const submission = parsed.data;

    if (!this.getScholar(submitterId)) {
      return { scroll: null, errors: [violation(ERROR_CODES.submitterNotFound, `Scholar ${submitterId} not found`)] };
    }
    if (this.hasActiveSanction(submitterId, "submission_suspension")) {
      return {
        scroll: null,
        errors: [violation(ERROR_CODES.submitterSuspended, "Submitter is under an active submission suspension")]
      };
    }

    // Screened as submitted; the submitter joins the stored author list afterwards.
    const references = uniqueInOrder(submission.references);
    const screeningErrors = screenSubmission({ ...submission, references }, policy, (id) => this.getScroll(id) !== null);
    const authors = uniqueInOrder([submitterId, ...submission.authors]);

    const timestamp = this.now();
    const scroll: Scroll = {
      id: this.nextScrollId(),
      type: submission.type,
      status: "submitted",
      version: 1,
      title: submission.title.trim(),
      abstract: submission.abstract,
      content: submission.content,
      domain: submission.domain.trim(),
      keywords: submission.keywords,
      references,
      claims: submission.claims,
      methodProfile: submission.methodProfile,
      resultSummary: submission.resultSummary,
      artifactBundleId: null,
      evidenceGrade: "ungraded",
      badges: [],
      decisionRecordId: null,
      supersededBy: null,
      retractionReason: null,
      citationCount: 0,
      screeningErrors,
      revisionHistory: [],
      submittedBy: submitterId,
      createdAt: timestamp,
      updatedAt: timestamp,
      publishedAt: null
    };
    this.state.scrolls.push(scroll);
    authors.forEach((scholarId, position) => this.state.authorships.push({ scrollId: scroll.id, scholarId, position }));

    this.audit({
      action: AUDIT_ACTIONS.scrollSubmitted,
      actorId: submitterId,
      targetId: scroll.id,
      targetType: "scroll",
      details: {
        title: scroll.title,
        type: scroll.type,
        domain: scroll.domain,
        screeningErrors: screeningErrors.map((e) => e.rule)
      }
    });

    if (screeningErrors.length) {
      this.applyTransition(scroll, "screen_fail", { actorId: ACTORS.system });
      return { scroll, errors: screeningErrors };
    }
    this.applyTransition(scroll, "screen_pass", { actorId: ACTORS.system });
    this.recordCitations(scroll.id, scroll.references);
    return { scroll, errors: [] };
  }

  reviseScroll(scrollId: string, authorId: string, input: RevisionPatchInput): ScrollResult {
    const scroll = this.getOwnedScroll(scrollId, authorId);
    if (!scroll) return { scroll: null, errors: [notFound(scrollId)] };
    const parsed = revisionPatchSchema.safeParse(input);
    if (!parsed.success) return { scroll: null, errors: zodViolations(parsed.error) };
    if (scroll.status !== "revisions_required") {
      return {
        scroll: null,
        errors: [
          violation(ERROR_CODES.scrollNotAwaitingRevision, `Scroll ${scroll.id} is ${scroll.status}; revisions are accepted only when revisions are required`, {
            details: { status: scroll.status }
          })
        ]
      };
    }

    const patch = parsed.data;
    if (patch.references) {
      const missing = uniqueSorted(patch.references.filter((id) => id === scroll.id || !this.getScroll(id)));
      if (missing.length) {
        return {
          scroll: null,
          errors: [violation(ERROR_CODES.invalidReferences, `Unknown cited scroll IDs: ${missing.join(", ")}`)]
        };
      }
    }

    if (patch.title !== undefined) scroll.title = patch.title.trim();
    if (patch.abstract !== undefined) scroll.abstract = patch.abstract;
    if (patch.content !== undefined) scroll.content = patch.content;
    if (patch.keywords !== undefined) scroll.keywords = patch.keywords;
    if (patch.references !== undefined) scroll.references = uniqueInOrder(patch.references);
    if (patch.claims !== undefined) scroll.claims = patch.claims;
    if (patch.methodProfile !== undefined) scroll.methodProfile = patch.methodProfile;
    if (patch.resultSummary !== undefined) scroll.resultSummary = patch.resultSummary;

    scroll.version += 1;
    scroll.revisionHistory.push({
      version: scroll.version,
      timestamp: this.now(),
      changeSummary: patch.changeSummary,
      responseLetter: patch.responseLetter
    });
    this.applyTransition(scroll, "revise", {
      actorId: authorId,
      action: AUDIT_ACTIONS.revisionSubmitted,
      details: { version: scroll.version, changeSummary: patch.changeSummary }
    });
    this.recordCitations(scroll.id, scroll.references);
    return { scroll, errors: [] };
  }

  retractScroll(scrollId: string, authorId: string, reason: string): ScrollResult {
    const scroll = this.getOwnedScroll(scrollId, authorId);
    if (!scroll) return { scroll: null, errors: [notFound(scrollId)] };
    if (!reason.trim()) {
      return { scroll: null, errors: [violation(ERROR_CODES.invalidPayload, "reason: a retraction reason is required", { field: "reason" })] };
    }
    if (!canTransition(scroll.status, "retract")) {
      return {
        scroll: null,
        errors: [
          violation(ERROR_CODES.scrollNotRetractable, `Scroll ${scroll.id} cannot be retracted from status ${scroll.status}`, {
            details: { status: scroll.status }
          })
        ]
      };
    }
    scroll.retractionReason = reason.trim();
    this.applyTransition(scroll, "retract", {
      actorId: authorId,
      action: AUDIT_ACTIONS.scrollRetracted,
      details: { reason: scroll.retractionReason }
    });
    return { scroll, errors: [] };
  }

  flagScroll(scrollId: string, reason: string, reporterId: string = ACTORS.integrityAgent): ScrollResult {
    const scroll = this.getScroll(scrollId);
    if (!scroll) return { scroll: null, errors: [notFound(scrollId)] };
    if (!canTransition(scroll.status, "flag")) {
      return {
        scroll: null,
        errors: [
          violation(ERROR_CODES.scrollNotFlaggable, `Scroll ${scroll.id} cannot be flagged from status ${scroll.status}`, {
            details: { status: scroll.status }
          })
        ]
      };
    }
    if (!scroll.badges.includes("integrity_flagged")) scroll.badges.push("integrity_flagged");
    this.applyTransition(scroll, "flag", {
      actorId: reporterId,
      action: AUDIT_ACTIONS.scrollFlagged,
      details: { reason }
    });
    return { scroll, errors: [] };
  }

  recordSimilarityCheck(scrollId: string, check: SimilarityCheck) {
    if (check.status === "unavailable") {
      return this.audit({
        action: AUDIT_ACTIONS.similarityCheckUnavailable,
        actorId: ACTORS.integrityAgent,
        targetId: scrollId,
        targetType: "scroll",
        details: { reason: check.reason }
      });
    }
    if (!check.matches.length) return null;
    return this.audit({
      action: AUDIT_ACTIONS.integrityViolation,
      actorId: ACTORS.integrityAgent,
      targetId: scrollId,
      targetType: "scroll",
      details: {
        kind: "similarity",
        matches: check.matches.map((m) => ({ candidateId: m.candidateId, similarity: m.similarity }))
      }
    });
  }

  // ---- review queue and reviews ----

  listReviewsForScroll(scrollId: string, round?: number): Review[] {
    return sortByCreatedAtAsc(
      this.state.reviews.filter((r) => r.scrollId === scrollId && (round === undefined || r.round === round))
    );
  }

  currentRound(scroll: Scroll): number {
    return nextReviewRound(
      this.state.reviews.filter((r) => r.scrollId === scroll.id).map((r) => r.round),
      scroll.version
    );
  }

  getReviewQueue(filter: { domain?: string; reviewerId?: string; limit?: number } = {}) {
    const entries = this.listScrolls({ status: "under_review", domain: filter.domain })
      .filter((scroll) => !filter.reviewerId || !this.isAuthor(scroll.id, filter.reviewerId))
      .map((scroll) => ({ scroll, reviewCount: this.listReviewsForScroll(scroll.id, this.currentRound(scroll)).length }));
    entries.sort(
      (a, b) => a.reviewCount - b.reviewCount || new Date(a.scroll.createdAt).getTime() - new Date(b.scroll.createdAt).getTime()
    );
    return filter.limit ? entries.slice(0, filter.limit) : entries;
  }

  submitReview(scrollId: string, reviewerId: string, input: ReviewSubmissionInput, policy: PolicyConfig): ReviewResult {
    const rejected = (errors: RuleViolation[]): ReviewResult => ({ review: null, errors, decision: null, gate: null });

    const scroll = this.getScroll(scrollId);
    if (!scroll) return rejected([notFound(scrollId)]);
    if (scroll.status !== "under_review") {
      return rejected([
        violation(ERROR_CODES.scrollNotUnderReview, `Scroll ${scroll.id} is ${scroll.status}; reviews are accepted only while under review`, {
          details: { status: scroll.status }
        })
      ]);
    }

    const round = this.currentRound(scroll);

    const reviewer = this.getScholar(reviewerId);
    if (!reviewer) return rejected([violation(ERROR_CODES.reviewerNotFound, `Scholar ${reviewerId} not found`)]);
    if (this.hasActiveSanction(reviewer.id, "review_suspension")) {
      return rejected([violation(ERROR_CODES.reviewerSuspended, "Reviewer is under an active review suspension")]);
    }

    const parsed = reviewSubmissionSchema.safeParse(input);
    if (!parsed.success) return rejected(zodViolations(parsed.error));

    const conflicts = findReviewConflicts({
      scrollId: scroll.id,
      reviewerId: reviewer.id,
      round,
      authorIds: this.getAuthors(scroll.id),
      reviewerHistory: this.state.reviews.filter((r) => r.reviewerId === reviewer.id),
      authorsOf: (id) => this.getAuthors(id)
    });
    if (conflicts.length) return rejected(conflicts);

    const review: Review = {
      id: randomId("review"),
      scrollId: scroll.id,
      reviewerId: reviewer.id,
      round,
      scores: parsed.data.scores,
      recommendation: parsed.data.recommendation,
      commentsToAuthors: parsed.data.commentsToAuthors,
      confidentialComments: parsed.data.confidentialComments,
      suggestedEdits: parsed.data.suggestedEdits,
      confidence: parsed.data.confidence,
      createdAt: this.now()
    };
    this.state.reviews.push(review);
    this.audit({
      action: AUDIT_ACTIONS.reviewSubmitted,
      actorId: reviewer.id,
      targetId: scroll.id,
      targetType: "scroll",
      details: {
        reviewId: review.id,
        round,
        recommendation: review.recommendation,
        overallScore: review.scores.overall
      }
    });

    const outcome = this.runDecision(scroll, policy);
    return { review, errors: [], decision: outcome.decision, gate: outcome.gate };
  }

  // ---- decisions ----

  getDecisionTrace(scrollId: string): DecisionRecord[] {
    return deepClone(this.state.decisions.filter((d) => d.scrollId === scrollId));
  }

  evaluateScroll(scrollId: string, policy: PolicyConfig): DecisionRecord | null {
    const scroll = this.getScroll(scrollId);
    if (!scroll || scroll.status !== "under_review") return null;
    return this.runDecision(scroll, policy).decision;
  }

  private runDecision(scroll: Scroll, policy: PolicyConfig): DecisionOutcomeResult {
    const round = this.currentRound(scroll);
    const evaluation = evaluateDecision({
      domain: scroll.domain,
      version: scroll.version,
      round,
      // Reviews from every round count; `round` only labels the record.
      reviews: this.listReviewsForScroll(scroll.id),
      policy
    });

    const previousStatus = scroll.status;
    const record: DecisionRecord = {
      id: randomId("decision"),
      scrollId: scroll.id,
      scrollVersion: scroll.version,
      round,
      decision: evaluation.decision,
      ruleEvaluations: evaluation.ruleEvaluations,
      reviewSummary: evaluation.reviewSummary,
      explanation: evaluation.explanation,
      previousStatus,
      nextStatus: previousStatus,
      decidedAt: this.now()
    };
    this.state.decisions.push(record);
    scroll.decisionRecordId = record.id;
    this.audit({
      action: AUDIT_ACTIONS.decisionMade,
      actorId: ACTORS.policyEngine,
      targetId: scroll.id,
      targetType: "scroll",
      details: {
        decisionId: record.id,
        decision: record.decision,
        round,
        explanation: record.explanation
      }
    });

    if (evaluation.decision === "insufficient_reviews") {
      return { decision: record, gate: null };
    }

    record.nextStatus = this.applyTransition(scroll, decisionAction(evaluation.decision), {
      actorId: ACTORS.policyEngine,
      details: { decisionId: record.id }
    });
    if (record.nextStatus !== "repro_check") {
      return { decision: record, gate: null };
    }
    this.refreshEvidence(scroll);
    return { decision: record, gate: this.processReproGate(scroll.id) };
  }

  // ---- reproducibility ----

  getArtifactBundle(bundleId: string) {
    return this.state.artifactBundles.find((b) => b.id === bundleId) ?? null;
  }

  listReplicationsForScroll(scrollId: string): ReplicationResult[] {
    return this.state.replications
      .filter((r) => r.scrollId === scrollId)
      .sort((a, b) => new Date(a.completedAt).getTime() - new Date(b.completedAt).getTime());
  }

  processReproGate(scrollId: string): GateResult {
    const scroll = this.getScroll(scrollId);
    if (!scroll) return { passed: false, reason: ERROR_CODES.scrollNotFound };
    if (scroll.status !== "repro_check") return { passed: false, reason: ERROR_CODES.scrollNotInReproCheck };

    const result = evaluateReproGate(scroll, this.listReplicationsForScroll(scroll.id));
    if (result.passed) {
      scroll.publishedAt = this.now();
      this.applyTransition(scroll, "gate_pass", {
        actorId: ACTORS.reproGate,
        action: AUDIT_ACTIONS.scrollPublished,
        details: { reason: result.reason }
      });
      this.refreshEvidence(scroll);
    }
    return result;
  }

  private refreshEvidence(scroll: Scroll) {
    const assessment = assessEvidence(scroll, this.listReplicationsForScroll(scroll.id));
    const badgesChanged =
      assessment.badges.length !== scroll.badges.length || assessment.badges.some((b, i) => b !== scroll.badges[i]);
    if (assessment.grade === scroll.evidenceGrade && !badgesChanged) return;
    const previousGrade = scroll.evidenceGrade;
    scroll.evidenceGrade = assessment.grade;
    scroll.badges = assessment.badges;
    scroll.updatedAt = this.now();
    if (previousGrade !== assessment.grade) {
      this.audit({
        action: AUDIT_ACTIONS.evidenceGraded,
        actorId: ACTORS.reproGate,
        targetId: scroll.id,
        targetType: "scroll",
        details: { from: previousGrade, to: assessment.grade, badges: [...assessment.badges] }
      });
    }
  }

  submitArtifactBundle(
    scrollId: string,
    submitterId: string,
    input: ArtifactBundleInput
  ): { bundle: ArtifactBundle | null; errors: RuleViolation[] } {
    const scroll = this.getOwnedScroll(scrollId, submitterId);
    if (!scroll) return { bundle: null, errors: [notFound(scrollId)] };
    const parsed = artifactBundleSubmissionSchema.safeParse(input);
    if (!parsed.success) return { bundle: null, errors: zodViolations(parsed.error) };
    if (BUNDLE_CLOSED_STATUSES.has(scroll.status)) {
      return {
        bundle: null,
        errors: [
          violation(ERROR_CODES.scrollNotAcceptingArtifacts, `Scroll ${scroll.id} is ${scroll.status} and no longer accepts artifact bundles`, {
            details: { status: scroll.status }
          })
        ]
      };
    }

    const bundle: ArtifactBundle = {
      id: randomId("bundle"),
      scrollId: scroll.id,
      ...parsed.data,
      submittedBy: submitterId,
      createdAt: this.now()
    };
    this.state.artifactBundles.push(bundle);
    scroll.artifactBundleId = bundle.id;
    scroll.updatedAt = bundle.createdAt;
    this.audit({
      action: AUDIT_ACTIONS.artifactBundleSubmitted,
      actorId: submitterId,
      targetId: scroll.id,
      targetType: "scroll",
      details: { bundleId: bundle.id, codeHash: bundle.codeHash, dataHash: bundle.dataHash }
    });
    this.refreshEvidence(scroll);
    return { bundle, errors: [] };
  }

  submitReplication(
    scrollId: string,
    reproducerId: string,
    input: ReplicationInput
  ): { replication: ReplicationResult | null; errors: RuleViolation[]; gate: GateResult | null } {
    const rejected = (errors: RuleViolation[]) => ({ replication: null, errors, gate: null });

    const scroll = this.getScroll(scrollId);
    if (!scroll) return rejected([notFound(scrollId)]);
    const parsed = replicationSubmissionSchema.safeParse(input);
    if (!parsed.success) return rejected(zodViolations(parsed.error));
    if (!this.getScholar(reproducerId)) {
      return rejected([violation(ERROR_CODES.reproducerNotFound, `Scholar ${reproducerId} not found`)]);
    }
    const bundle = this.getArtifactBundle(parsed.data.artifactBundleId);
    if (!bundle || bundle.scrollId !== scroll.id) {
      return rejected([
        violation(ERROR_CODES.artifactBundleNotFound, `Artifact bundle ${parsed.data.artifactBundleId} not found for scroll ${scroll.id}`)
      ]);
    }
    if (REPLICATION_CLOSED_STATUSES.has(scroll.status)) {
      return rejected([
        violation(ERROR_CODES.scrollNotAcceptingReplications, `Scroll ${scroll.id} is ${scroll.status} and no longer accepts replications`, {
          details: { status: scroll.status }
        })
      ]);
    }

    const replication: ReplicationResult = {
      id: randomId("replication"),
      scrollId: scroll.id,
      reproducerId,
      ...parsed.data
    };
    this.state.replications.push(replication);
    this.audit({
      action: AUDIT_ACTIONS.replicationCompleted,
      actorId: reproducerId,
      targetId: scroll.id,
      targetType: "scroll",
      details: { replicationId: replication.id, bundleId: bundle.id, success: replication.success }
    });
    this.refreshEvidence(scroll);
    const gate = scroll.status === "repro_check" ? this.processReproGate(scroll.id) : null;
    return { replication, errors: [], gate };
  }

  // ---- citations ----

  private recordCitations(citingId: string, references: string[]) {
    const touched = new Set<string>();
    for (const citedId of references) {
      if (citedId === citingId || !this.getScroll(citedId)) continue;
      const exists = this.state.citations.some((c) => c.citingId === citingId && c.citedId === citedId);
      if (exists) continue;
      this.state.citations.push({ citingId, citedId, createdAt: this.now() });
      touched.add(citedId);
    }
    for (const citedId of touched) {
      const cited = this.getScroll(citedId);
      if (cited) cited.citationCount = this.forwardCitations(citedId).length;
    }
  }

  forwardCitations(scrollId: string): string[] {
    return uniqueSorted(this.state.citations.filter((c) => c.citedId === scrollId).map((c) => c.citingId));
  }

  backwardReferences(scrollId: string): string[] {
    return uniqueSorted(this.state.citations.filter((c) => c.citingId === scrollId).map((c) => c.citedId));
  }

  traceLineage(scrollId: string, maxDepth = LINEAGE_MAX_DEPTH): LineageNode {
    const visited = new Set<string>();
    const trace = (id: string, depth: number): LineageNode => {
      if (depth >= maxDepth || visited.has(id)) return { scrollId: id, truncated: true };
      visited.add(id);
      const scroll = this.getScroll(id);
      if (!scroll) return { scrollId: id, notFound: true };
      return {
        scrollId: scroll.id,
        title: scroll.title,
        references: this.backwardReferences(scroll.id).map((ref) => trace(ref, depth + 1))
      };
    };
    return trace(scrollId, 0);
  }

  listMostCited(filter: { domain?: string; limit?: number } = {}): Scroll[] {
    return this.listScrolls({ status: "published", domain: filter.domain })
      .sort((a, b) => b.citationCount - a.citationCount || a.id.localeCompare(b.id))
      .slice(0, filter.limit ?? 20);
  }

  // ---- audit ----

  listAuditEvents(filter: { targetId?: string; actorId?: string; action?: string; limit?: number } = {}): AuditEvent[] {
    const events = this.state.auditEvents
      .filter(
        (e) =>
          (!filter.targetId || e.targetId === filter.targetId) &&
          (!filter.actorId || e.actorId === filter.actorId) &&
          (!filter.action || e.action === filter.action)
      )
      .sort((a, b) => a.sequence - b.sequence);
    return filter.limit ? events.slice(-filter.limit) : events;
  }
}

function uniqueInOrder(values: string[]): string[] {
  return Array.from(new Set(values));
}
