// src/services/retriever.ts
// Similarity retrieval with a single relaxed-threshold fallback.

import type { Candidate, LearnerContext, ThresholdPolicy } from "../domain/types.js";
import { digestNumber } from "./config.js";
import type { Embedder } from "./embedder.js";
import { debug } from "./log.js";
import type { VectorStore } from "./vector-store.js";

const log = debug("coach:retriever");

export function thresholdPolicyFromConfig(): ThresholdPolicy {
  return {
    primary: digestNumber("retrieval.primary_threshold", 0.25),
    relaxed: digestNumber("retrieval.relaxed_threshold", 0.15)
  };
}

/** Topics joined by a single space, in order. */
export function buildQueryText(topics: string[]): string {
  return topics.join(" ").trim();
}

export class ContentRetriever {
  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embedder: Embedder,
    private readonly policy: ThresholdPolicy = thresholdPolicyFromConfig()
  ) {}

  /**
   * Search at the primary threshold; when nothing comes back, retry exactly once
   * at the relaxed threshold. Store order (similarity descending) is kept.
   */
  async retrieve(queryVector: number[], limit: number, policy: ThresholdPolicy = this.policy): Promise<Candidate[]> {
    let results = await this.vectorStore.search(queryVector, policy.primary, limit);
    if (results.length === 0) {
      log("no results at primary threshold, relaxing", { primary: policy.primary, relaxed: policy.relaxed });
      results = await this.vectorStore.search(queryVector, policy.relaxed, limit);
    }
    return results.map((r) => ({ document: r.document, similarity: r.similarity }));
  }

  async retrieveForContext(ctx: LearnerContext, limit: number): Promise<Candidate[]> {
    const queryText = buildQueryText(ctx.current_topics);
    if (!queryText) {
      log("empty topic query, skipping retrieval");
      return [];
    }
    const queryVector = await this.embedder.embed(queryText);
    const candidates = await this.retrieve(queryVector, limit);
    log("retrieved", { query: queryText, limit, count: candidates.length });
    return candidates;
  }
}
