// src/services/probe.ts
// Retrieval diagnostics: how many documents a query reaches at several thresholds.

import { digestNumber, digestNumberArray } from "./config.js";
import type { Embedder } from "./embedder.js";
import type { VectorStore } from "./vector-store.js";

export interface ThresholdProbe {
  threshold: number;
  count: number;
  results: Array<{ id: string; title: string; similarity: number }>;
}

export interface ProbeReport {
  query: string;
  embedding_dimension: number;
  probes: ThresholdProbe[];
}

export async function probeThresholds(
  query: string,
  deps: { embedder: Embedder; vectorStore: VectorStore },
  thresholds: number[] = digestNumberArray("retrieval.probe_thresholds", [0.1, 0.3, 0.5, 0.6, 0.7, 0.8]),
  limit: number = digestNumber("retrieval.probe_limit", 5)
): Promise<ProbeReport> {
  const vector = await deps.embedder.embed(query);
  const probes: ThresholdProbe[] = [];
  for (const threshold of thresholds) {
    const hits = await deps.vectorStore.search(vector, threshold, limit);
    probes.push({
      threshold,
      count: hits.length,
      results: hits.map((h) => ({ id: h.document.id, title: h.document.title, similarity: h.similarity }))
    });
  }
  return { query, embedding_dimension: vector.length, probes };
}
