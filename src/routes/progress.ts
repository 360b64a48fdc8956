// src/routes/progress.ts
// Learner progress tools. There is exactly one learner.

import { z } from "zod";
import { NoProgressConfiguredError } from "../domain/errors.js";
import type { Runtime } from "../services/runtime.js";
import { defineTool, type ToolHost } from "./tooling.js";

export function registerProgress(host: ToolHost, runtime: Runtime): void {
  defineTool(
    host,
    "progress.update",
    "Set the learner's current week, topics and goals.",
    {
      current_week: z.number().int().min(1),
      current_topics: z.array(z.string()),
      learning_goals: z.string().default("")
    },
    async ({ current_week, current_topics, learning_goals }) => {
      const progress = await runtime.progressStore.setLearnerContext(current_week, current_topics, learning_goals);
      return { success: true, progress };
    }
  );

  defineTool(host, "progress.get", "Show the stored learner progress.", {}, async () => {
    const progress = await runtime.progressStore.getLearnerContext();
    if (!progress) throw new NoProgressConfiguredError();
    return { success: true, progress };
  });
}
