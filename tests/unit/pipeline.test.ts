import { describe, expect, it } from "vitest";
import { appConfigSchema } from "../../src/lib/config";
import { InfrastructureError } from "../../src/lib/errors";
import type { SimilarityMatch, SimilarityOracle } from "../../src/lib/integrity/similarity";
import { silentLogger } from "../../src/lib/logger";
import { PublishingPipeline, type PipelineDeps } from "../../src/lib/pipeline";
import { addScholar, createStore, paperInput, reviewInput } from "./fixtures";

const config = appConfigSchema.parse({ environment: "test" });

function mkPipeline(deps: Partial<PipelineDeps> = {}) {
  const { store } = createStore();
  return new PublishingPipeline({ store, config, logger: silentLogger, persist: async () => undefined, ...deps });
}

function fixedOracle(matches: SimilarityMatch[]) {
  let calls = 0;
  const oracle: SimilarityOracle = {
    query: async () => {
      calls += 1;
      return matches;
    }
  };
  return { oracle, calls: () => calls };
}

describe("PublishingPipeline", () => {
  it("screens without storing anything", () => {
    const pipeline = mkPipeline();
    expect(pipeline.screen(paperInput({ content: "Short." })).map((e) => e.rule)).toEqual(["content_too_short", "authors_required"]);
    expect(pipeline.screen({ type: "paper", references: [""] })).toEqual([
      { rule: "invalid_payload", message: "references.0: String must contain at least 1 character(s)", field: "references.0" }
    ]);
    expect(pipeline.store.state.scrolls).toEqual([]);
  });

  it("desk-rejects exactly what screening reports", async () => {
    const pipeline = mkPipeline({ oracle: fixedOracle([]).oracle });
    const author = addScholar(pipeline.store, "Author");
    const input = paperInput({ authors: [] });
    expect(pipeline.screen(input).map((e) => e.rule)).toEqual(["authors_required"]);

    const { scroll, errors, similarity } = await pipeline.submit(input, author);
    expect(errors.map((e) => e.rule)).toEqual(["authors_required"]);
    expect(scroll?.status).toBe("desk_rejected");
    expect(similarity).toBeNull();
  });

  it("runs a scroll from submission to a recorded decision", async () => {
    const pipeline = mkPipeline({ oracle: fixedOracle([]).oracle });
    const author = addScholar(pipeline.store, "Author");
    const { scroll, similarity } = await pipeline.submit(paperInput({ authors: [author] }), author);
    expect(scroll?.status).toBe("under_review");
    expect(similarity).toEqual({ status: "ok", matches: [] });

    const scrollId = scroll?.id ?? "";
    const first = await pipeline.submitReview(scrollId, addScholar(pipeline.store, "Reviewer one"), reviewInput(7, "accept"));
    expect(first.decision?.decision).toBe("insufficient_reviews");
    const second = await pipeline.submitReview(scrollId, addScholar(pipeline.store, "Reviewer two"), reviewInput(8, "accept"));
    expect(second.decision).toMatchObject({ decision: "accept", nextStatus: "repro_check" });
    expect(second.gate).toEqual({ passed: false, reason: "empirical_scroll_missing_artifact_bundle" });

    expect(pipeline.getDecisionTrace(scrollId).map((d) => d.decision)).toEqual(["insufficient_reviews", "accept"]);
    expect(await pipeline.checkGate(scrollId)).toEqual({ passed: false, reason: "empirical_scroll_missing_artifact_bundle" });
  });

  it("skips the similarity check for desk-rejected scrolls", async () => {
    const { oracle, calls } = fixedOracle([]);
    const pipeline = mkPipeline({ oracle });
    const author = addScholar(pipeline.store, "Author");
    const result = await pipeline.submit(paperInput({ title: "", authors: [author] }), author);
    expect(result.scroll?.status).toBe("desk_rejected");
    expect(result.similarity).toBeNull();
    expect(calls()).toBe(0);
  });

  it("keeps reviewing when the similarity oracle is down", async () => {
    const oracle: SimilarityOracle = {
      query: async () => {
        throw new Error("index offline");
      }
    };
    const pipeline = mkPipeline({ oracle });
    const author = addScholar(pipeline.store, "Author");
    const { scroll, similarity } = await pipeline.submit(paperInput({ authors: [author] }), author);

    expect(similarity).toEqual({ status: "unavailable", reason: "index offline" });
    expect(scroll?.status).toBe("under_review");
    const events = pipeline.listAuditEvents({ targetId: scroll?.id, action: "similarity_check_unavailable" });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ actorId: "integrity_agent", details: { reason: "index offline" } });
  });

  it("records matches at or above the threshold as an integrity violation", async () => {
    const { oracle } = fixedOracle([
      { candidateId: "AX-2025-00007", similarity: 0.5 },
      { candidateId: "AX-2025-00003", similarity: 0.92 },
      { candidateId: "AX-2025-00001", similarity: 0.97 }
    ]);
    const pipeline = mkPipeline({ oracle });
    const author = addScholar(pipeline.store, "Author");
    const { scroll, similarity } = await pipeline.submit(paperInput({ authors: [author] }), author);

    const matches = [
      { candidateId: "AX-2025-00001", similarity: 0.97 },
      { candidateId: "AX-2025-00003", similarity: 0.92 }
    ];
    expect(similarity).toEqual({ status: "ok", matches });
    expect(scroll?.status).toBe("under_review");
    const event = pipeline.listAuditEvents({ targetId: scroll?.id, action: "integrity_violation" })[0];
    expect(event.details).toEqual({ kind: "similarity", matches });
  });

  it("finds duplicate text with the built-in oracle", async () => {
    const pipeline = mkPipeline();
    const author = addScholar(pipeline.store, "Author");
    const original = await pipeline.submit(paperInput({ authors: [author] }), author);
    expect(original.similarity).toEqual({ status: "ok", matches: [] });

    const copier = addScholar(pipeline.store, "Copier");
    const copy = await pipeline.submit(paperInput({ authors: [copier] }), copier);
    expect(copy.similarity).toEqual({ status: "ok", matches: [{ candidateId: original.scroll?.id, similarity: 1 }] });
  });

  it("rolls the store back when the durable write fails", async () => {
    let failing = true;
    const pipeline = mkPipeline({
      oracle: fixedOracle([]).oracle,
      persist: async () => {
        if (failing) throw new Error("disk full");
      }
    });
    const author = addScholar(pipeline.store, "Author");
    const before = pipeline.store.snapshotState();

    const error = await pipeline.submit(paperInput({ authors: [author] }), author).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InfrastructureError);
    expect(error).toMatchObject({ message: "Failed to persist submit" });
    expect(pipeline.store.snapshotState()).toEqual(before);

    failing = false;
    const { scroll } = await pipeline.submit(paperInput({ authors: [author] }), author);
    expect(scroll?.id).toBe("AX-2026-00001");
  });

  it("applies concurrent submissions one at a time", async () => {
    const pipeline = mkPipeline({ oracle: fixedOracle([]).oracle });
    const author = addScholar(pipeline.store, "Author");
    const [first, second] = await Promise.all([
      pipeline.submit(paperInput({ title: "First", authors: [author] }), author),
      pipeline.submit(paperInput({ title: "Second", authors: [author] }), author)
    ]);
    expect([first.scroll?.id, second.scroll?.id]).toEqual(["AX-2026-00001", "AX-2026-00002"]);
    expect(pipeline.getReviewQueue().map((entry) => entry.scroll.title)).toEqual(["First", "Second"]);
  });
});
