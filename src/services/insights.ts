// src/services/insights.ts
// Insight generator: one short coaching insight per document.

import { type GenerationOutcome, extractFinalOutput } from "../domain/reasoning.js";
import type { LearnerContext } from "../domain/types.js";
import { digestNumber } from "./config.js";
import type { GenerationService } from "./generation.js";
import { INSIGHT_BODY_CHARS, insightMessages } from "./prompts.js";

export interface InsightGeneratorOptions {
  maxTokens?: number;
  temperature?: number;
  bodyChars?: number;
}

export class InsightGenerator {
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly bodyChars: number;

  constructor(private readonly generation: GenerationService, opts: InsightGeneratorOptions = {}) {
    this.maxTokens = opts.maxTokens ?? digestNumber("generation.insight.max_tokens", 500);
    this.temperature = opts.temperature ?? digestNumber("generation.insight.temperature", 0.7);
    this.bodyChars = opts.bodyChars ?? digestNumber("generation.insight.body_chars", INSIGHT_BODY_CHARS);
  }

  async generateInsight(documentBody: string, ctx: LearnerContext): Promise<GenerationOutcome> {
    const raw = await this.generation.complete(
      insightMessages(documentBody, ctx, this.bodyChars),
      this.maxTokens,
      this.temperature
    );
    return extractFinalOutput(raw);
  }
}
