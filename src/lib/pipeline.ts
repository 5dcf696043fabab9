import type { AppConfig } from "@/lib/config";
import { InfrastructureError, zodViolations, type RuleViolation } from "@/lib/errors";
import { checkSimilarity, ShingleSimilarityOracle, type SimilarityCheck, type SimilarityOracle } from "@/lib/integrity/similarity";
import { createLogger, type Logger } from "@/lib/logger";
import type { GateResult } from "@/lib/reproducibility/gate";
import {
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
import type { MemoryStore, ReviewResult, ScrollResult } from "@/lib/store/memory";
import { getRuntimeStore, persistRuntimeStore } from "@/lib/store/runtime";
import type { DecisionRecord, Scholar, Scroll } from "@/lib/types";

export interface PipelineDeps {
  store: MemoryStore;
  config: AppConfig;
  oracle?: SimilarityOracle;
  logger?: Logger;
  persist?: (store: MemoryStore) => Promise<void>;
}

export type SubmitResult = ScrollResult & { similarity: SimilarityCheck | null };

/**
 * Transport-agnostic entry points of the publishing workflow.
 *
 * Business failures come back as data. Only infrastructure faults throw.
 * Mutations run one at a time: each is a store transaction followed by a
 * durable write, and a failed write rolls the in-memory state back.
 */
export class PublishingPipeline {
  readonly store: MemoryStore;
  private readonly config: AppConfig;
  private readonly oracle: SimilarityOracle;
  private readonly logger: Logger;
  private readonly persist: (store: MemoryStore) => Promise<void>;
  private tail: Promise<void> = Promise.resolve();

  constructor(deps: PipelineDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.logger = deps.logger ?? createLogger("pipeline", deps.config.logLevel);
    this.persist = deps.persist ?? ((store) => persistRuntimeStore(deps.config, store));
    this.oracle =
      deps.oracle ??
      new ShingleSimilarityOracle(() =>
        this.store
          .listScrolls()
          .filter((s) => s.status !== "desk_rejected")
          .map((s) => ({ id: s.id, domain: s.domain, text: scrollText(s) }))
      );
  }

  private get policy() {
    return this.config.policy;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private commit<T>(operation: string, fn: (store: MemoryStore) => T): Promise<T> {
    return this.serialize(async () => {
      const before = this.store.snapshotState();
      const result = this.store.transaction(fn);
      try {
        await this.persist(this.store);
      } catch (error) {
        this.store.state = before;
        this.logger.error("persist failed; state rolled back", { operation, error });
        if (error instanceof InfrastructureError) throw error;
        throw new InfrastructureError(`Failed to persist ${operation}`, { cause: error });
      }
      return result;
    });
  }

  screen(input: ScrollSubmissionInput): RuleViolation[] {
    const parsed = scrollSubmissionSchema.safeParse(input);
    if (!parsed.success) return zodViolations(parsed.error);
    return screenSubmission(parsed.data, this.policy, (id) => this.store.getScroll(id) !== null);
  }

  async submit(input: ScrollSubmissionInput, submitterId: string): Promise<SubmitResult> {
    const result = await this.commit("submit", (store) => store.submitScroll(input, submitterId, this.policy));
    const scroll = result.scroll;
    if (!scroll) return { ...result, similarity: null };
    this.logger.info("scroll submitted", { scrollId: scroll.id, status: scroll.status, errors: result.errors.length });
    if (scroll.status !== "under_review") return { ...result, similarity: null };

    const similarity = await checkSimilarity({
      oracle: this.oracle,
      text: scrollText(scroll),
      filter: { excludeIds: [scroll.id] },
      threshold: this.policy.plagiarismSimilarityThreshold,
      logger: this.logger
    });
    await this.commit("record similarity", (store) => store.recordSimilarityCheck(scroll.id, similarity));
    if (similarity.status === "ok" && similarity.matches.length) {
      this.logger.warn("similarity above threshold", { scrollId: scroll.id, matches: similarity.matches.length });
    }
    return { ...result, similarity };
  }

  async submitReview(scrollId: string, reviewerId: string, input: ReviewSubmissionInput): Promise<ReviewResult> {
    const result = await this.commit("submit review", (store) => store.submitReview(scrollId, reviewerId, input, this.policy));
    if (result.decision) {
      this.logger.info("decision recorded", {
        scrollId,
        decision: result.decision.decision,
        nextStatus: result.decision.nextStatus
      });
    }
    return result;
  }

  evaluate(scrollId: string): Promise<DecisionRecord | null> {
    return this.commit("evaluate", (store) => store.evaluateScroll(scrollId, this.policy));
  }

  checkGate(scrollId: string): Promise<GateResult> {
    return this.commit("check gate", (store) => store.processReproGate(scrollId));
  }

  revise(scrollId: string, authorId: string, patch: RevisionPatchInput): Promise<ScrollResult> {
    return this.commit("revise", (store) => store.reviseScroll(scrollId, authorId, patch));
  }

  retract(scrollId: string, authorId: string, reason: string): Promise<ScrollResult> {
    return this.commit("retract", (store) => store.retractScroll(scrollId, authorId, reason));
  }

  registerScholar(input: ScholarRegistrationInput) {
    return this.commit("register scholar", (store) => store.registerScholar(input));
  }

  submitArtifactBundle(scrollId: string, submitterId: string, input: ArtifactBundleInput) {
    return this.commit("submit artifact bundle", (store) => store.submitArtifactBundle(scrollId, submitterId, input));
  }

  submitReplication(scrollId: string, reproducerId: string, input: ReplicationInput) {
    return this.commit("submit replication", (store) => store.submitReplication(scrollId, reproducerId, input));
  }

  flagScroll(scrollId: string, reason: string, reporterId?: string): Promise<ScrollResult> {
    return this.commit("flag scroll", (store) => store.flagScroll(scrollId, reason, reporterId));
  }

  applySanction(input: SanctionRequestInput, actorId?: string) {
    return this.commit("apply sanction", (store) => store.applySanction(input, actorId));
  }

  recomputeScholarMetrics(scholarId: string): Promise<Scholar | null> {
    return this.commit("recompute scholar metrics", (store) => store.recomputeScholarMetrics(scholarId));
  }

  getScroll(scrollId: string) {
    return this.store.getScroll(scrollId);
  }

  getDecisionTrace(scrollId: string) {
    return this.store.getDecisionTrace(scrollId);
  }

  getReviewQueue(filter: { domain?: string; reviewerId?: string; limit?: number } = {}) {
    return this.store.getReviewQueue(filter);
  }

  listAuditEvents(filter: { targetId?: string; actorId?: string; action?: string; limit?: number } = {}) {
    return this.store.listAuditEvents(filter);
  }

  traceLineage(scrollId: string, maxDepth?: number) {
    return this.store.traceLineage(scrollId, maxDepth);
  }
}

function scrollText(scroll: Pick<Scroll, "title" | "abstract" | "content">) {
  return [scroll.title, scroll.abstract, scroll.content].join("\n");
}

export async function createRuntimePipeline(config: AppConfig, logger?: Logger): Promise<PublishingPipeline> {
  const log = logger ?? createLogger("scriptorium", config.logLevel);
  const store = await getRuntimeStore(config, log.child("runtime"));
  return new PublishingPipeline({ store, config, logger: log.child("pipeline") });
}
