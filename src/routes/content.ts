// src/routes/content.ts
// Content tools: ingestion of already-fetched items and retrieval diagnostics.

import { z } from "zod";
import { ingestDocuments } from "../services/ingest.js";
import { probeThresholds } from "../services/probe.js";
import type { Runtime } from "../services/runtime.js";
import { defineTool, type ToolHost } from "./tooling.js";

const incomingItem = z.object({
  title: z.string().min(1),
  content: z.string(),
  link: z.string(),
  summary: z.string().optional(),
  author: z.string().optional(),
  published: z.string().optional(),
  tags: z.array(z.string()).optional(),
  source_type: z.string().optional()
});

export function registerContent(host: ToolHost, runtime: Runtime): void {
  defineTool(
    host,
    "content.ingest",
    "Embed and store already-fetched documents so they can be retrieved for digests.",
    { items: z.array(incomingItem).min(1) },
    async ({ items }) => {
      const report = await ingestDocuments(items, runtime);
      return {
        success: true,
        stored: report.stored.length,
        ids: report.stored.map((d) => d.id),
        failed: report.failed
      };
    }
  );

  defineTool(
    host,
    "content.probe_thresholds",
    "Report how many stored documents a query reaches at several similarity thresholds.",
    {
      query: z.string().trim().min(1),
      thresholds: z.array(z.number().min(0).max(1)).min(1).optional(),
      limit: z.number().int().min(1).max(50).optional()
    },
    async ({ query, thresholds, limit }) => {
      const report = await probeThresholds(query, runtime, thresholds, limit);
      return { success: true, ...report };
    }
  );
}
