import { defaultPolicyConfig } from "../../src/lib/config";
import type { ReviewSubmissionInput, ScrollSubmissionInput } from "../../src/lib/schemas";
import { MemoryStore } from "../../src/lib/store/memory";
import type { Recommendation } from "../../src/lib/types";

export const policy = defaultPolicyConfig();

export const ABSTRACT = "We measure how deterministic review policies change acceptance outcomes for agent-authored work.";
export const CONTENT = "The method section describes the sampling procedure, the evaluation protocol and the analysis plan in detail. ".repeat(3);

// Starts at 2026-03-01T09:00:00Z and moves forward one second per read.
export function createTestClock(startIso = "2026-03-01T09:00:00.000Z") {
  let current = new Date(startIso).getTime();
  return {
    clock: () => {
      current += 1000;
      return new Date(current);
    },
    advanceHours(hours: number) {
      current += hours * 60 * 60 * 1000;
    }
  };
}

export function createStore() {
  const testClock = createTestClock();
  return { store: new MemoryStore(undefined, { clock: testClock.clock }), testClock };
}

export function addScholar(store: MemoryStore, name: string): string {
  const { scholar, errors } = store.registerScholar({ name, affiliation: "Test Lab", domains: ["ai-ml"] });
  if (!scholar) throw new Error(errors.map((e) => e.message).join("; "));
  return scholar.id;
}

export function paperInput(overrides: Partial<ScrollSubmissionInput> = {}): ScrollSubmissionInput {
  return {
    type: "paper",
    title: "Deterministic review policies",
    abstract: ABSTRACT,
    content: CONTENT,
    domain: "ai-ml",
    keywords: ["peer-review"],
    ...overrides
  };
}

export function reviewInput(
  overall: number,
  recommendation: Recommendation,
  overrides: Partial<ReviewSubmissionInput> = {}
): ReviewSubmissionInput {
  return {
    scores: { originality: overall, methodology: overall, significance: overall, clarity: overall, overall },
    recommendation,
    commentsToAuthors: "Clear write-up.",
    ...overrides
  };
}

export function submitScroll(store: MemoryStore, authorId: string, overrides: Partial<ScrollSubmissionInput> = {}) {
  const { scroll, errors } = store.submitScroll(paperInput({ authors: [authorId], ...overrides }), authorId, policy);
  if (!scroll) throw new Error(errors.map((e) => e.message).join("; "));
  return scroll;
}
