// src/services/insight-store.ts
// Persisted daily insights: written by the digest, read back by history tools.

import { z } from "zod";
import type { InsightQuery, StoredInsight } from "../domain/types.js";
import { makeInsightId } from "./ids.js";
import { type IndexOps, type SearchHit, isIndexNotFound } from "./os-client.js";

export type NewInsight = Omit<StoredInsight, "id" | "created_at"> & { created_at?: string };

export interface InsightStore {
  save(insight: NewInsight): Promise<StoredInsight>;
  /** Newest first, unless a text query ranks by match. */
  query(filters: InsightQuery): Promise<StoredInsight[]>;
}

export const DEFAULT_INSIGHT_LIMIT = 10;

const storedInsightSchema = z.object({
  id: z.string(),
  insight: z.string(),
  content_id: z.string(),
  title: z.string().catch(""),
  source_url: z.string().catch(""),
  relevance_score: z.number(),
  week: z.number().int(),
  created_at: z.string()
});

export function buildInsightQuery(filters: InsightQuery): Record<string, unknown> {
  const filter: Record<string, unknown>[] = [];
  if (filters.contentId) filter.push({ term: { content_id: filters.contentId } });
  if (filters.date) {
    filter.push({
      range: { created_at: { gte: `${filters.date}T00:00:00.000Z`, lte: `${filters.date}T23:59:59.999Z` } }
    });
  }
  const text = filters.text?.trim();
  const must: Record<string, unknown>[] = text ? [{ match: { insight: { query: text } } }] : [];

  return {
    size: filters.limit ?? DEFAULT_INSIGHT_LIMIT,
    query: { bool: { must: must.length > 0 ? must : [{ match_all: {} }], filter } },
    ...(text ? {} : { sort: [{ created_at: { order: "desc" } }] })
  };
}

export class OpenSearchInsightStore implements InsightStore {
  constructor(private readonly ops: IndexOps, private readonly index: string) {}

  async save(insight: NewInsight): Promise<StoredInsight> {
    const stored: StoredInsight = {
      ...insight,
      id: makeInsightId(),
      created_at: insight.created_at ?? new Date().toISOString()
    };
    await this.ops.index(this.index, stored.id, { ...stored }, true);
    return stored;
  }

  async query(filters: InsightQuery): Promise<StoredInsight[]> {
    let hits: SearchHit[];
    try {
      hits = await this.ops.search(this.index, buildInsightQuery(filters));
    } catch (err) {
      if (isIndexNotFound(err)) return [];
      throw err;
    }
    const out: StoredInsight[] = [];
    for (const hit of hits) {
      const parsed = storedInsightSchema.safeParse({ id: hit._id, ...hit._source });
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }
}
