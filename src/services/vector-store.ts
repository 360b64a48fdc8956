// src/services/vector-store.ts
// Vector store over an OpenSearch k-NN index.
//
// Similarity is exact cosine via the k-NN painless extension, shifted by +1 so
// scores stay non-negative: _score = 1 + cos(query, embedding).
// A threshold t therefore maps to min_score = 1 + t; hits at exactly t are dropped.

import { z } from "zod";
import type { Document, DocumentMetadata } from "../domain/types.js";
import type { IndexOps, SearchHit } from "./os-client.js";
import { debug } from "./log.js";

const log = debug("coach:vector-store");

export interface VectorSearchResult {
  document: Document;
  similarity: number;
}

export type NewDocument = Pick<Document, "id" | "title" | "content" | "source_url">;

export interface VectorStore {
  /** Documents with similarity above threshold, highest first, at most limit. */
  search(queryVector: number[], threshold: number, limit: number): Promise<VectorSearchResult[]>;
  insert(document: NewDocument, embedding: number[], metadata: DocumentMetadata): Promise<Document>;
}

const looseString = z.string().optional().catch(undefined);

export const metadataSchema = z
  .object({
    summary: looseString,
    author: looseString,
    published: looseString,
    tags: z.array(z.string()).optional().catch(undefined),
    source_type: looseString
  })
  .passthrough();

const documentSourceSchema = z.object({
  id: z.string().optional().catch(undefined),
  title: z.string().catch(""),
  content: z.string().catch(""),
  source_url: z.string().catch(""),
  metadata: metadataSchema.catch({})
});

export const COSINE_SCRIPT = "1.0 + cosineSimilarity(params.query_value, doc[params.field])";

export function buildSimilarityQuery(queryVector: number[], threshold: number, limit: number): Record<string, unknown> {
  return {
    size: limit,
    min_score: 1 + threshold,
    _source: { excludes: ["embedding"] },
    query: {
      script_score: {
        query: { match_all: {} },
        script: {
          source: COSINE_SCRIPT,
          params: { field: "embedding", query_value: queryVector }
        }
      }
    }
  };
}

export function hitToDocument(hit: SearchHit): Document {
  const src = documentSourceSchema.parse(hit._source);
  return {
    id: src.id ?? hit._id,
    title: src.title,
    content: src.content,
    source_url: src.source_url,
    metadata: src.metadata
  };
}

export class OpenSearchVectorStore implements VectorStore {
  constructor(private readonly ops: IndexOps, private readonly index: string) {}

  async search(queryVector: number[], threshold: number, limit: number): Promise<VectorSearchResult[]> {
    if (limit <= 0) return [];
    const hits = await this.ops.search(this.index, buildSimilarityQuery(queryVector, threshold, limit));
    const results: VectorSearchResult[] = [];
    for (const hit of hits) {
      const similarity = (hit._score ?? 0) - 1;
      if (similarity <= threshold) continue;
      results.push({ document: hitToDocument(hit), similarity });
    }
    log("search", { threshold, limit, hits: hits.length, kept: results.length });
    return results;
  }

  async insert(document: NewDocument, embedding: number[], metadata: DocumentMetadata): Promise<Document> {
    const stored: Document = { ...document, embedding, metadata };
    await this.ops.index(this.index, document.id, {
      ...stored,
      created_at: new Date().toISOString()
    });
    return stored;
  }
}
