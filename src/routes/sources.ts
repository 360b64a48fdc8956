// src/routes/sources.ts
// Content source registry and system diagnostics.

import { z } from "zod";
import { SOURCE_TYPES } from "../services/source-store.js";
import type { Runtime } from "../services/runtime.js";
import { defineTool, type ToolHost } from "./tooling.js";

export function registerSources(host: ToolHost, runtime: Runtime): void {
  defineTool(
    host,
    "sources.add",
    "Register a content source (RSS feed, blog or subreddit) with optional tags.",
    {
      source_url: z.string().trim().url(),
      source_type: z.enum(SOURCE_TYPES),
      tags: z.array(z.string()).default([])
    },
    async ({ source_url, source_type, tags }) => {
      const { source, created } = await runtime.sourceStore.add(source_url, source_type, tags);
      return { success: true, created, source };
    }
  );

  defineTool(
    host,
    "sources.list",
    "List registered content sources, optionally of one type.",
    { source_type: z.enum(SOURCE_TYPES).optional() },
    async ({ source_type }) => {
      const sources = await runtime.sourceStore.list(source_type);
      return { success: true, count: sources.length, sources };
    }
  );

  defineTool(
    host,
    "system.status",
    "Report stored progress, registered sources, indexed content and whether embeddings exist.",
    {},
    async () => ({ success: true, diagnostics: await runtime.status.report() })
  );
}
