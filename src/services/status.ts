// src/services/status.ts
// Diagnostics for "why is my digest empty?": stored progress, registered sources,
// how much content is indexed and whether it carries embeddings.

import { z } from "zod";
import type { SystemStatus } from "../domain/types.js";
import { digestNumber } from "./config.js";
import { debug } from "./log.js";
import type { IndexNames } from "./os-bootstrap.js";
import { type IndexOps, type SearchHit, isIndexNotFound } from "./os-client.js";
import type { ProgressStore } from "./progress-store.js";
import type { SourceStore } from "./source-store.js";

const log = debug("coach:status");

const sampleSchema = z.object({
  title: z.string().catch(""),
  source_url: z.string().catch(""),
  created_at: z.string().optional().catch(undefined)
});

export interface StatusDeps {
  ops: IndexOps;
  indices: IndexNames;
  progressStore: ProgressStore;
  sourceStore: SourceStore;
}

export class SystemStatusReporter {
  constructor(private readonly deps: StatusDeps, private readonly sampleSize = digestNumber("status.sample_size", 5)) {}

  async report(): Promise<SystemStatus> {
    const { ops, indices } = this.deps;
    const progress = await this.deps.progressStore.getLearnerContext();
    const sources = await this.deps.sourceStore.list();
    const total = await this.orZero(() => ops.count(indices.content));
    const embedded = await this.orZero(() => ops.count(indices.content, { exists: { field: "embedding" } }));
    const samples = await this.sample();

    log("status", { total, embedded, sources: sources.length });
    return {
      user_progress: progress ?? null,
      content_sources_count: sources.length,
      content_sources: sources,
      total_content_items: total,
      sample_content: samples,
      has_embeddings: embedded > 0
    };
  }

  private async sample(): Promise<SystemStatus["sample_content"]> {
    let hits: SearchHit[];
    try {
      hits = await this.deps.ops.search(this.deps.indices.content, {
        size: this.sampleSize,
        _source: { excludes: ["embedding", "content"] },
        query: { match_all: {} },
        sort: [{ created_at: { order: "desc" } }]
      });
    } catch (err) {
      if (isIndexNotFound(err)) return [];
      throw err;
    }
    return hits.map((hit) => {
      const src = sampleSchema.parse(hit._source);
      return {
        id: hit._id,
        title: src.title,
        source_url: src.source_url,
        ...(src.created_at ? { created_at: src.created_at } : {})
      };
    });
  }

  private async orZero(count: () => Promise<number>): Promise<number> {
    try {
      return await count();
    } catch (err) {
      if (isIndexNotFound(err)) return 0;
      throw err;
    }
  }
}
