// src/services/scorer.ts
// Relevance scorer: gathers the three signals for a candidate and fuses them.

import {
  NEUTRAL_TOPIC_RELEVANCE,
  freshnessScore,
  fuseRelevance,
  parseRelevanceReply,
  similaritySignal
} from "../domain/relevance.js";
import { extractFinalOutput } from "../domain/reasoning.js";
import type { Candidate, LearnerContext } from "../domain/types.js";
import { digestNumber } from "./config.js";
import type { GenerationService } from "./generation.js";
import { debug } from "./log.js";
import { RELEVANCE_BODY_CHARS, relevanceMessages } from "./prompts.js";

const log = debug("coach:scorer");

export interface RelevanceScorerOptions {
  now?: () => Date;
  maxTokens?: number;
  temperature?: number;
  bodyChars?: number;
}

export class RelevanceScorer {
  private readonly now: () => Date;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly bodyChars: number;

  constructor(private readonly generation: GenerationService, opts: RelevanceScorerOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.maxTokens = opts.maxTokens ?? digestNumber("generation.relevance.max_tokens", 10);
    this.temperature = opts.temperature ?? digestNumber("generation.relevance.temperature", 0.3);
    this.bodyChars = opts.bodyChars ?? digestNumber("generation.relevance.body_chars", RELEVANCE_BODY_CHARS);
  }

  /**
   * Model-rated relevance of the body to the topics. Unparseable replies are neutral;
   * a failed call is not, and propagates to the caller.
   */
  async topicRelevance(body: string, topics: string[]): Promise<number> {
    const reply = await this.generation.complete(
      relevanceMessages(body, topics, this.bodyChars),
      this.maxTokens,
      this.temperature
    );
    const outcome = extractFinalOutput(reply);
    if (outcome.kind !== "ok") return NEUTRAL_TOPIC_RELEVANCE;
    return parseRelevanceReply(outcome.text);
  }

  async score(candidate: Candidate, ctx: LearnerContext): Promise<number> {
    const similarity = similaritySignal(candidate.similarity);
    const topicRelevance = await this.topicRelevance(candidate.document.content, ctx.current_topics);
    const freshness = freshnessScore(candidate.document.metadata.published, this.now());
    const score = fuseRelevance({ similarity, topicRelevance, freshness });
    log("score", { id: candidate.document.id, similarity, topicRelevance, freshness, score });
    return score;
  }
}
