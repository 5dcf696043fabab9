import type { Logger } from "@/lib/logger";

export interface SimilarityMatch {
  candidateId: string;
  similarity: number;
}

export interface SimilarityFilter {
  excludeIds?: string[];
  domain?: string;
}

export interface SimilarityOracle {
  query(text: string, filter: SimilarityFilter): Promise<SimilarityMatch[]>;
}

export type SimilarityCheck =
  | { status: "ok"; matches: SimilarityMatch[] }
  | { status: "unavailable"; reason: string };

/**
 * Queries the oracle and keeps matches at or above the threshold.
 * Oracle faults become an `unavailable` result; callers decide how to proceed.
 */
export async function checkSimilarity(params: {
  oracle: SimilarityOracle;
  text: string;
  filter: SimilarityFilter;
  threshold: number;
  logger: Logger;
}): Promise<SimilarityCheck> {
  let matches: SimilarityMatch[];
  try {
    matches = await params.oracle.query(params.text, params.filter);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    params.logger.warn("similarity oracle unavailable", { reason });
    return { status: "unavailable", reason };
  }
  const excluded = new Set(params.filter.excludeIds ?? []);
  return {
    status: "ok",
    matches: matches
      .filter((m) => m.similarity >= params.threshold && !excluded.has(m.candidateId))
      .sort((a, b) => b.similarity - a.similarity || a.candidateId.localeCompare(b.candidateId))
  };
}

export interface IndexedDocument {
  id: string;
  domain: string;
  text: string;
}

const SHINGLE_SIZE = 5;

function shingles(text: string): Set<string> {
  const words = text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
  const out = new Set<string>();
  if (words.length < SHINGLE_SIZE) {
    if (words.length) out.add(words.join(" "));
    return out;
  }
  for (let i = 0; i + SHINGLE_SIZE <= words.length; i += 1) {
    out.add(words.slice(i, i + SHINGLE_SIZE).join(" "));
  }
  return out;
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (!a.size || !b.size) return 0;
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared += 1;
  }
  return shared / (a.size + b.size - shared);
}

// In-process oracle: Jaccard overlap of word 5-shingles against the stored corpus.
export class ShingleSimilarityOracle implements SimilarityOracle {
  constructor(private readonly corpus: () => IndexedDocument[]) {}

  async query(text: string, filter: SimilarityFilter): Promise<SimilarityMatch[]> {
    const probe = shingles(text);
    const excluded = new Set(filter.excludeIds ?? []);
    return this.corpus()
      .filter((doc) => !excluded.has(doc.id) && (!filter.domain || doc.domain === filter.domain))
      .map((doc) => ({ candidateId: doc.id, similarity: jaccard(probe, shingles(doc.text)) }))
      .filter((match) => match.similarity > 0);
  }
}
