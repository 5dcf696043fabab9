import { describe, expect, it } from "vitest";
import { screenSubmission, type ScreeningSubject } from "../../src/lib/screening/screen";
import { ABSTRACT, CONTENT, policy } from "./fixtures";

function mkSubject(overrides: Partial<ScreeningSubject> = {}): ScreeningSubject {
  return {
    type: "paper",
    title: "Deterministic review policies",
    abstract: ABSTRACT,
    content: CONTENT,
    domain: "ai-ml",
    authors: ["scholar_a"],
    references: [],
    claims: [],
    ...overrides
  };
}

const known = new Set(["AX-2026-00001", "AX-2026-00002"]);
const exists = (id: string) => known.has(id);

describe("screenSubmission", () => {
  it("passes a complete paper", () => {
    expect(screenSubmission(mkSubject(), policy, exists)).toEqual([]);
  });

  it("reports a missing title and a short abstract together", () => {
    const errors = screenSubmission(mkSubject({ title: "   ", abstract: "Too short to count." }), policy, exists);
    expect(errors).toEqual([
      { rule: "title_required", message: "Title is required" },
      { rule: "abstract_too_short", message: "Abstract must be at least 50 characters (got 19)" }
    ]);
  });

  it("accepts an abstract exactly at the minimum length", () => {
    const errors = screenSubmission(mkSubject({ abstract: "a".repeat(50) }), policy, exists);
    expect(errors).toEqual([]);
  });

  it("measures lengths after trimming whitespace", () => {
    const errors = screenSubmission(mkSubject({ content: `   ${"x".repeat(199)}   ` }), policy, exists);
    expect(errors.map((e) => e.rule)).toEqual(["content_too_short"]);
  });

  it("requires authors and a domain", () => {
    const errors = screenSubmission(mkSubject({ authors: [], domain: "" }), policy, exists);
    expect(errors.map((e) => e.rule)).toEqual(["authors_required", "domain_required"]);
  });

  it("applies type-specific rules", () => {
    expect(screenSubmission(mkSubject({ type: "hypothesis" }), policy, exists).map((e) => e.rule)).toEqual([
      "hypothesis_needs_claims"
    ]);
    expect(
      screenSubmission(mkSubject({ type: "meta_analysis", references: ["AX-2026-00001"] }), policy, exists)
    ).toEqual([{ rule: "meta_analysis_needs_references", message: "Meta-analysis scrolls must cite at least 2 scrolls (got 1)" }]);
    expect(screenSubmission(mkSubject({ type: "rebuttal" }), policy, exists).map((e) => e.rule)).toEqual([
      "rebuttal_needs_target"
    ]);
    expect(
      screenSubmission(
        mkSubject({ type: "hypothesis", claims: [{ kind: "hypothesis", statement: "Scores predict replication." }] }),
        policy,
        exists
      )
    ).toEqual([]);
  });

  it("lists unknown references sorted, deduplicated and capped at ten", () => {
    const missing = Array.from({ length: 12 }, (_, i) => `AX-2025-${String(12 - i).padStart(5, "0")}`);
    const errors = screenSubmission(mkSubject({ references: ["AX-2026-00001", ...missing, missing[0]] }), policy, exists);
    expect(errors).toEqual([
      {
        rule: "invalid_references",
        message:
          "Unknown cited scroll IDs: AX-2025-00001, AX-2025-00002, AX-2025-00003, AX-2025-00004, AX-2025-00005, " +
          "AX-2025-00006, AX-2025-00007, AX-2025-00008, AX-2025-00009, AX-2025-00010..."
      }
    ]);
  });

  it("does not short-circuit after the first failure", () => {
    const errors = screenSubmission(
      mkSubject({ type: "rebuttal", title: "", abstract: "", content: "", authors: [], domain: " ", references: [] }),
      policy,
      exists
    );
    expect(errors.map((e) => e.rule)).toEqual([
      "title_required",
      "abstract_too_short",
      "content_too_short",
      "authors_required",
      "domain_required",
      "rebuttal_needs_target"
    ]);
  });

  it("honours configured length limits", () => {
    const errors = screenSubmission(mkSubject({ abstract: "short but enough" }), { minAbstractLength: 10, minContentLength: 20 }, exists);
    expect(errors).toEqual([]);
  });
});
