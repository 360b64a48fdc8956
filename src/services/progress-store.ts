// src/services/progress-store.ts
// Learner progress (week, topics, goals). One learner, one document.

import { z } from "zod";
import { InvalidRequestError } from "../domain/errors.js";
import type { LearnerContext } from "../domain/types.js";
import { type IndexOps, type SearchHit, isIndexNotFound } from "./os-client.js";

export const LEARNER_ID = "default";

export interface ProgressStore {
  getLearnerContext(): Promise<LearnerContext | undefined>;
  setLearnerContext(week: number, topics: string[], goals: string): Promise<LearnerContext>;
}

const progressSourceSchema = z.object({
  current_week: z.number().int(),
  current_topics: z.array(z.string()).catch([]),
  learning_goals: z.string().nullish().transform((g) => g ?? "")
});

/** Validate and normalize a learner context before it is stored. */
export function normalizeLearnerContext(week: number, topics: string[], goals: string): LearnerContext {
  if (!Number.isInteger(week) || week < 1) {
    throw new InvalidRequestError(`current_week must be an integer >= 1 (got ${week})`);
  }
  return {
    current_week: week,
    current_topics: topics.map((t) => t.trim()).filter((t) => t.length > 0),
    learning_goals: goals.trim()
  };
}

export class OpenSearchProgressStore implements ProgressStore {
  constructor(private readonly ops: IndexOps, private readonly index: string) {}

  async getLearnerContext(): Promise<LearnerContext | undefined> {
    let hits: SearchHit[];
    try {
      hits = await this.ops.search(this.index, {
        size: 1,
        query: { ids: { values: [LEARNER_ID] } }
      });
    } catch (err) {
      // Nothing has been stored until the index exists.
      if (isIndexNotFound(err)) return undefined;
      throw err;
    }
    if (hits.length === 0) return undefined;
    const parsed = progressSourceSchema.safeParse(hits[0]._source);
    if (!parsed.success) {
      throw new Error(`Stored progress is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async setLearnerContext(week: number, topics: string[], goals: string): Promise<LearnerContext> {
    const ctx = normalizeLearnerContext(week, topics, goals);
    await this.ops.index(this.index, LEARNER_ID, { ...ctx, updated_at: new Date().toISOString() }, true);
    return ctx;
  }
}
