import { describe, it, expect, vi, afterEach } from "vitest";
import { makeContentId } from "../../../src/services/ids.js";
import { embeddingText, ingestDocuments, metadataFor } from "../../../src/services/ingest.js";
import { FakeEmbedder, ScriptedVectorStore } from "../../helpers/fakes.js";

const ITEM_A = {
  title: "Attention is a lookup",
  content: "Queries are compared with keys.",
  link: "https://example.com/a",
  author: "Sample Author",
  published: "2026-10-12T09:00:00Z",
  tags: ["attention"],
  source_type: "blog"
};
const ITEM_B = { title: "Positional encodings", content: "Order matters.", link: "https://example.com/b" };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ingestion helpers", () => {
  it("embeds the title and body separated by a blank line", () => {
    expect(embeddingText(ITEM_B)).toBe("Positional encodings\n\nOrder matters.");
  });

  it("keeps only the metadata fields the item carries", () => {
    expect(metadataFor(ITEM_A)).toEqual({
      author: "Sample Author",
      published: "2026-10-12T09:00:00Z",
      tags: ["attention"],
      source_type: "blog"
    });
    expect(metadataFor(ITEM_B)).toEqual({});
  });
});

describe("ingestDocuments", () => {
  it("embeds and stores each item under a stable id", async () => {
    const embedder = new FakeEmbedder();
    const vectorStore = new ScriptedVectorStore();
    const report = await ingestDocuments([ITEM_A, ITEM_B], { embedder, vectorStore });

    expect(embedder.calls).toEqual([
      "Attention is a lookup\n\nQueries are compared with keys.",
      "Positional encodings\n\nOrder matters."
    ]);
    expect(report.failed).toEqual([]);
    expect(report.stored.map((d) => d.id)).toEqual([makeContentId(ITEM_A.link), makeContentId(ITEM_B.link)]);
    expect(vectorStore.inserted[0]).toEqual({
      id: makeContentId(ITEM_A.link),
      title: ITEM_A.title,
      content: ITEM_A.content,
      source_url: ITEM_A.link,
      embedding: [1, 0, 0, 0],
      metadata: metadataFor(ITEM_A)
    });
  });

  it("reports a failing item and continues with the rest", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const vectorStore = new ScriptedVectorStore();
    vectorStore.failInsertFor.add(ITEM_A.title);
    const report = await ingestDocuments([ITEM_A, ITEM_B], { embedder: new FakeEmbedder(), vectorStore });

    expect(report.stored.map((d) => d.title)).toEqual(["Positional encodings"]);
    expect(report.failed).toEqual([
      { title: ITEM_A.title, link: ITEM_A.link, error: "insert rejected for Attention is a lookup" }
    ]);
    expect(warn).toHaveBeenCalledWith('[ingest] skipping "Attention is a lookup": insert rejected for Attention is a lookup');
  });
});
