// src/routes/digest.ts
// Digest and insight history tools.

import { z } from "zod";
import { digestNumber } from "../services/config.js";
import { DEFAULT_INSIGHT_LIMIT } from "../services/insight-store.js";
import { utcDay } from "../services/ids.js";
import type { Runtime } from "../services/runtime.js";
import { defineTool, type ToolHost } from "./tooling.js";

const limitField = z.number().int().min(1).max(100).optional();

function historyLimit(): number {
  return digestNumber("history.default_limit", DEFAULT_INSIGHT_LIMIT);
}

export function registerDigest(host: ToolHost, runtime: Runtime, now: () => Date = () => new Date()): void {
  defineTool(
    host,
    "digest.generate",
    "Generate today's personalized learning digest from the stored learner progress.",
    { num_insights: z.number().int().optional().describe("Number of insights to produce (default from config)") },
    async ({ num_insights }) => runtime.digest.generateDigest(num_insights)
  );

  defineTool(
    host,
    "insights.today",
    "List insights generated during the current UTC day, newest first.",
    { limit: limitField },
    async ({ limit }) => {
      const date = utcDay(now());
      const insights = await runtime.insightStore.query({ date, limit: limit ?? historyLimit() });
      return { success: true, date, count: insights.length, insights };
    }
  );

  defineTool(
    host,
    "insights.search",
    "Full-text search over previously generated insights.",
    { query: z.string().trim().min(1), limit: limitField },
    async ({ query, limit }) => {
      const insights = await runtime.insightStore.query({ text: query, limit: limit ?? historyLimit() });
      return { success: true, query, count: insights.length, insights };
    }
  );
}
