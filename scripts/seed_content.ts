// scripts/seed_content.ts
// Seed script for local development.
// Run with: npm run seed
//
// Behavior:
// - Waits for OpenSearch health and creates the indices (idempotent).
// - Stores a sample learner context (week 3, transformers + attention).
// - Ingests the documents in scripts/fixtures/sample_content.json with the configured embedder.
//
// Env:
//   OPENSEARCH_URL (default: http://localhost:9200)
//   OPENSEARCH_USERNAME / OPENSEARCH_PASSWORD (optional)
//   EMBEDDING_ENDPOINT / COACH_EMBED_PROVIDER (default: local hash embedder)

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { loadEmbedder } from "../src/services/embedder.js";
import { ingestDocuments } from "../src/services/ingest.js";
import { bootstrapOpenSearch, indexNamesFromConfig } from "../src/services/os-bootstrap.js";
import { openSearchOps } from "../src/services/os-client.js";
import { OpenSearchProgressStore } from "../src/services/progress-store.js";
import { OpenSearchVectorStore } from "../src/services/vector-store.js";

const samplesPath = fileURLToPath(new URL("./fixtures/sample_content.json", import.meta.url));

const sampleSchema = z.array(
  z.object({
    title: z.string(),
    content: z.string(),
    link: z.string(),
    summary: z.string().optional(),
    author: z.string().optional(),
    published: z.string().optional(),
    tags: z.array(z.string()).optional(),
    source_type: z.string().optional()
  })
);

async function seed() {
  const embedder = await loadEmbedder();
  console.log(`Embedder: ${embedder.model} (dim ${embedder.dim})`);

  const created = await bootstrapOpenSearch({ expectedDim: embedder.dim });
  console.log(created.length > 0 ? `Created indices: ${created.join(", ")}` : "Indices already present");

  const indices = indexNamesFromConfig();
  const ops = openSearchOps();

  const progress = new OpenSearchProgressStore(ops, indices.progress);
  const ctx = await progress.setLearnerContext(3, ["transformers", "attention"], "Understand how attention layers are built");
  console.log("Learner context:", ctx);

  const items = sampleSchema.parse(JSON.parse(fs.readFileSync(samplesPath, "utf8")));
  const report = await ingestDocuments(items, { embedder, vectorStore: new OpenSearchVectorStore(ops, indices.content) });
  console.log(`Ingested ${report.stored.length}/${items.length} documents`);
  for (const f of report.failed) console.log(`  failed: ${f.title}: ${f.error}`);

  console.log("\nNext: call digest.generate from an MCP client.");
}

seed().catch((err) => {
  console.error("Seed failed:", err);
  process.exit(1);
});
