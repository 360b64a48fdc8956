// src/services/ingest.ts
// Ingestion: embed already-fetched items and store them with their metadata.

import { toErrorMessage } from "../domain/errors.js";
import type { Document, DocumentMetadata, IncomingDocument } from "../domain/types.js";
import type { Embedder } from "./embedder.js";
import { makeContentId } from "./ids.js";
import { debug } from "./log.js";
import type { VectorStore } from "./vector-store.js";

const log = debug("coach:ingest");

/** Text that is embedded for a document: title, blank line, body. */
export function embeddingText(item: Pick<IncomingDocument, "title" | "content">): string {
  return `${item.title}\n\n${item.content}`;
}

export function metadataFor(item: IncomingDocument): DocumentMetadata {
  const meta: DocumentMetadata = {};
  if (item.summary !== undefined) meta.summary = item.summary;
  if (item.author !== undefined) meta.author = item.author;
  if (item.published !== undefined) meta.published = item.published;
  if (item.tags !== undefined) meta.tags = [...item.tags];
  if (item.source_type !== undefined) meta.source_type = item.source_type;
  return meta;
}

export interface IngestReport {
  stored: Document[];
  failed: Array<{ title: string; link: string; error: string }>;
}

/**
 * Embed and insert each item. A failing item is reported and skipped;
 * the rest of the batch continues.
 */
export async function ingestDocuments(
  items: IncomingDocument[],
  deps: { embedder: Embedder; vectorStore: VectorStore }
): Promise<IngestReport> {
  const report: IngestReport = { stored: [], failed: [] };
  for (const item of items) {
    try {
      const embedding = await deps.embedder.embed(embeddingText(item));
      const doc = await deps.vectorStore.insert(
        {
          id: makeContentId(item.link, item.title, item.content),
          title: item.title,
          content: item.content,
          source_url: item.link
        },
        embedding,
        metadataFor(item)
      );
      report.stored.push(doc);
    } catch (err) {
      const error = toErrorMessage(err);
      console.warn(`[ingest] skipping "${item.title}": ${error}`);
      report.failed.push({ title: item.title, link: item.link, error });
    }
  }
  log("ingested", { requested: items.length, stored: report.stored.length, failed: report.failed.length });
  return report;
}
