import type { ErrorCode } from "@/lib/error-codes";

export type ScrollType = "paper" | "hypothesis" | "meta_analysis" | "rebuttal" | "tutorial";
export type ScrollStatus =
  | "submitted"
  | "screened"
  | "desk_rejected"
  | "under_review"
  | "revisions_required"
  | "accepted"
  | "repro_check"
  | "published"
  | "rejected"
  | "retracted"
  | "superseded"
  | "flagged";
export type Recommendation = "accept" | "minor_revisions" | "major_revisions" | "reject";
export type DecisionOutcome = "accept" | "reject" | "revisions_required" | "insufficient_reviews";
export type EvidenceGrade = "A" | "B" | "C" | "ungraded";
export type Badge = "replicated" | "artifact_complete" | "high_confidence_methods" | "integrity_flagged";
export type TrustTier = "new" | "established" | "trusted" | "distinguished";
export type SanctionType = "review_suspension" | "submission_suspension" | "reputation_penalty" | "scroll_retraction";
export type ClaimKind = "hypothesis" | "finding" | "method" | "limitation";
export type AuditTargetType = "scroll" | "review" | "scholar" | "artifact_bundle" | "replication" | "sanction";

export type Clock = () => Date;

export interface Claim {
  kind: ClaimKind;
  statement: string;
  evidence?: string;
}

export interface MethodProfile {
  approach: string;
  datasets: string[];
  tools: string[];
  notes?: string;
}

export interface SuggestedEdit {
  section: string;
  originalText: string;
  proposedText: string;
  rationale: string;
}

export interface ResponseLetterItem {
  reviewerId: string;
  reviewerComment: string;
  authorResponse: string;
  changeMade: string;
}

export interface RevisionEntry {
  version: number;
  timestamp: string;
  changeSummary: string;
  responseLetter: ResponseLetterItem[];
}

export interface ScreeningError {
  rule: ErrorCode;
  message: string;
}

export interface Scholar {
  id: string;
  name: string;
  affiliation: string;
  bio: string;
  declaredDomains: string[];
  // declaredDomains plus domains of published scrolls; recomputed
  domains: string[];
  hIndex: number;
  totalCitations: number;
  scrollsPublished: number;
  reviewsPerformed: number;
  reputationScore: number;
  trustTier: TrustTier;
  createdAt: string;
  updatedAt: string;
}

export interface Scroll {
  id: string;
  type: ScrollType;
  status: ScrollStatus;
  version: number;
  title: string;
  abstract: string;
  content: string;
  domain: string;
  keywords: string[];
  references: string[];
  claims: Claim[];
  methodProfile: MethodProfile | null;
  resultSummary: string | null;
  artifactBundleId: string | null;
  evidenceGrade: EvidenceGrade;
  badges: Badge[];
  decisionRecordId: string | null;
  supersededBy: string | null;
  retractionReason: string | null;
  citationCount: number;
  screeningErrors: ScreeningError[];
  revisionHistory: RevisionEntry[];
  submittedBy: string;
  createdAt: string;
  updatedAt: string;
  publishedAt: string | null;
}

export interface Authorship {
  scrollId: string;
  scholarId: string;
  position: number;
}

export interface ReviewScores {
  originality: number;
  methodology: number;
  significance: number;
  clarity: number;
  overall: number;
}

export interface Review {
  id: string;
  scrollId: string;
  reviewerId: string;
  round: number;
  scores: ReviewScores;
  recommendation: Recommendation;
  commentsToAuthors: string;
  confidentialComments: string;
  suggestedEdits: SuggestedEdit[];
  confidence: number;
  createdAt: string;
}

export interface PolicyRuleEvaluation {
  rule: string;
  inputs: Record<string, number | string | boolean>;
  passed: boolean;
  explanation: string;
}

export interface ReviewSetSummary {
  round: number;
  reviewCount: number;
  meanOverall: number;
  recommendations: Recommendation[];
  reviewIds: string[];
}

export interface DecisionRecord {
  id: string;
  scrollId: string;
  scrollVersion: number;
  round: number;
  decision: DecisionOutcome;
  ruleEvaluations: PolicyRuleEvaluation[];
  reviewSummary: ReviewSetSummary;
  explanation: string;
  previousStatus: ScrollStatus;
  nextStatus: ScrollStatus;
  decidedAt: string;
}

export interface ArtifactBundle {
  id: string;
  scrollId: string;
  codeHash: string;
  dataHash: string;
  environmentSpec: string;
  runCommands: string[];
  expectedMetrics: Record<string, number>;
  randomSeed: number | null;
  submittedBy: string;
  createdAt: string;
}

export interface ReplicationResult {
  id: string;
  scrollId: string;
  artifactBundleId: string;
  reproducerId: string;
  success: boolean;
  observedMetrics: Record<string, number>;
  logs: string;
  environmentUsed: string;
  startedAt: string;
  completedAt: string;
}

export interface Sanction {
  id: string;
  scholarId: string;
  type: SanctionType;
  reason: string;
  scrollId: string | null;
  appliedAt: string;
  expiresAt: string | null;
}

export type AuditDetailValue = string | number | boolean | null | string[] | AuditDetailValue[] | { [key: string]: AuditDetailValue };

export interface AuditEvent {
  id: string;
  sequence: number;
  action: string;
  actorId: string;
  targetId: string;
  targetType: AuditTargetType;
  details: Record<string, AuditDetailValue>;
  timestamp: string;
}

export interface CitationEdge {
  citingId: string;
  citedId: string;
  createdAt: string;
}

export interface AppState {
  schemaVersion: number;
  scholars: Scholar[];
  scrolls: Scroll[];
  authorships: Authorship[];
  reviews: Review[];
  decisions: DecisionRecord[];
  artifactBundles: ArtifactBundle[];
  replications: ReplicationResult[];
  sanctions: Sanction[];
  citations: CitationEdge[];
  auditEvents: AuditEvent[];
  idSequences: Record<string, number>;
  auditSequence: number;
}

export type LineageNode =
  | { scrollId: string; title: string; references: LineageNode[] }
  | { scrollId: string; truncated: true }
  | { scrollId: string; notFound: true };
