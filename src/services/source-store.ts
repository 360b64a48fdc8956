// src/services/source-store.ts
// Registry of content sources (feeds and blogs). Re-registering a URL updates its type and tags.

import { z } from "zod";
import type { ContentSource } from "../domain/types.js";
import { makeSourceId } from "./ids.js";
import { type IndexOps, type SearchHit, isIndexNotFound } from "./os-client.js";

export const SOURCE_TYPES = ["rss", "blog", "reddit"] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const DEFAULT_SOURCE_LIMIT = 100;

export interface SourceStore {
  add(sourceUrl: string, sourceType: SourceType, tags: string[]): Promise<{ source: ContentSource; created: boolean }>;
  /** Oldest registration first. */
  list(sourceType?: SourceType, limit?: number): Promise<ContentSource[]>;
}

const sourceSchema = z.object({
  id: z.string(),
  source_url: z.string(),
  source_type: z.string(),
  tags: z.array(z.string()).catch([]),
  created_at: z.string()
});

export class OpenSearchSourceStore implements SourceStore {
  constructor(private readonly ops: IndexOps, private readonly index: string) {}

  async add(sourceUrl: string, sourceType: SourceType, tags: string[]): Promise<{ source: ContentSource; created: boolean }> {
    const url = sourceUrl.trim();
    const id = makeSourceId(url);
    const existing = await this.searchSafe({ size: 1, query: { ids: { values: [id] } } });
    const previous = existing.length > 0 ? sourceSchema.safeParse({ id, ...existing[0]._source }) : undefined;

    const source: ContentSource = {
      id,
      source_url: url,
      source_type: sourceType,
      tags: [...new Set(tags.map((t) => t.trim()).filter((t) => t.length > 0))],
      created_at: previous?.success ? previous.data.created_at : new Date().toISOString()
    };
    await this.ops.index(this.index, id, { ...source }, true);
    return { source, created: !previous };
  }

  async list(sourceType?: SourceType, limit = DEFAULT_SOURCE_LIMIT): Promise<ContentSource[]> {
    const hits = await this.searchSafe({
      size: limit,
      query: sourceType ? { term: { source_type: sourceType } } : { match_all: {} },
      sort: [{ created_at: { order: "asc" } }]
    });
    const out: ContentSource[] = [];
    for (const hit of hits) {
      const parsed = sourceSchema.safeParse({ id: hit._id, ...hit._source });
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }

  private async searchSafe(body: Record<string, unknown>): Promise<SearchHit[]> {
    try {
      return await this.ops.search(this.index, body);
    } catch (err) {
      if (isIndexNotFound(err)) return [];
      throw err;
    }
  }
}
