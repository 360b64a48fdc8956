// src/services/digest.ts
// Digest assembler: retrieve, generate, score, rank, persist, summarize.

import {
  DigestError,
  InvalidRequestError,
  NoProgressConfiguredError,
  toErrorMessage
} from "../domain/errors.js";
import { extractFinalOutput, outcomeText } from "../domain/reasoning.js";
import { rankByRelevance } from "../domain/relevance.js";
import type { Candidate, Digest, DigestResult, LearnerContext, ScoredInsight } from "../domain/types.js";
import { digestBoolean, digestNumber, digestString } from "./config.js";
import type { GenerationService } from "./generation.js";
import type { InsightStore } from "./insight-store.js";
import type { InsightGenerator } from "./insights.js";
import { debug } from "./log.js";
import type { ProgressStore } from "./progress-store.js";
import { summaryMessages } from "./prompts.js";
import type { ContentRetriever } from "./retriever.js";
import type { RelevanceScorer } from "./scorer.js";

const log = debug("coach:digest");

export const EMPTY_DIGEST_SUMMARY = "No relevant content found for your topics today.";

export interface DigestDeps {
  retriever: ContentRetriever;
  insights: InsightGenerator;
  scorer: RelevanceScorer;
  generation: GenerationService;
  insightStore: InsightStore;
  progressStore: ProgressStore;
}

export interface DigestOptions {
  defaultInsights?: number;
  maxInsights?: number;
  overfetchFactor?: number;
  keepIncompleteInsights?: boolean;
  emptySummary?: string;
  summaryMaxTokens?: number;
  summaryTemperature?: number;
  now?: () => Date;
}

/** Summary used when the model cannot produce one. */
export function fallbackSummary(ctx: LearnerContext, count: number): string {
  const noun = count === 1 ? "insight" : "insights";
  const topics = ctx.current_topics.length > 0 ? ctx.current_topics.join(", ") : "your current topics";
  return `Week ${ctx.current_week}: ${count} ${noun} on ${topics} for today.`;
}

export class DigestAssembler {
  private readonly defaultInsights: number;
  private readonly maxInsights: number;
  private readonly overfetchFactor: number;
  private readonly keepIncomplete: boolean;
  private readonly emptySummary: string;
  private readonly summaryMaxTokens: number;
  private readonly summaryTemperature: number;
  private readonly now: () => Date;

  constructor(private readonly deps: DigestDeps, opts: DigestOptions = {}) {
    this.defaultInsights = opts.defaultInsights ?? digestNumber("digest.default_insights", 7);
    this.maxInsights = opts.maxInsights ?? digestNumber("digest.max_insights", 20);
    this.overfetchFactor = opts.overfetchFactor ?? digestNumber("retrieval.overfetch_factor", 2);
    this.keepIncomplete = opts.keepIncompleteInsights ?? digestBoolean("digest.keep_incomplete_insights", false);
    this.emptySummary = opts.emptySummary ?? digestString("digest.empty_summary", EMPTY_DIGEST_SUMMARY);
    this.summaryMaxTokens = opts.summaryMaxTokens ?? digestNumber("generation.summary.max_tokens", 150);
    this.summaryTemperature = opts.summaryTemperature ?? digestNumber("generation.summary.temperature", 0.8);
    this.now = opts.now ?? (() => new Date());
  }

  async buildDigest(ctx: LearnerContext | undefined, targetInsightCount: number): Promise<Digest> {
    if (!ctx) throw new NoProgressConfiguredError();
    if (!Number.isInteger(targetInsightCount) || targetInsightCount < 1 || targetInsightCount > this.maxInsights) {
      throw new InvalidRequestError(
        `num_insights must be an integer between 1 and ${this.maxInsights} (got ${targetInsightCount})`
      );
    }

    const date = this.now().toISOString();
    const candidates = await this.deps.retriever.retrieveForContext(ctx, targetInsightCount * this.overfetchFactor);
    if (candidates.length === 0) {
      log("no candidates", { week: ctx.current_week, topics: ctx.current_topics });
      return this.assemble(date, ctx, this.emptySummary, [], 0);
    }

    const produced: ScoredInsight[] = [];
    for (const candidate of candidates.slice(0, targetInsightCount)) {
      const insight = await this.processCandidate(candidate, ctx);
      if (insight) produced.push(insight);
    }

    const ranked = rankByRelevance(produced);
    const persisted = await this.persist(ranked, ctx);
    const summary = await this.summarize(ranked, ctx);
    log("digest built", { candidates: candidates.length, insights: ranked.length, persisted });
    return this.assemble(date, ctx, summary, ranked, persisted);
  }

  /** Load the stored learner context and build a digest; every failure becomes a result. */
  async generateDigest(targetInsightCount: number = this.defaultInsights): Promise<DigestResult> {
    try {
      const ctx = await this.deps.progressStore.getLearnerContext();
      const digest = await this.buildDigest(ctx, targetInsightCount);
      return { success: true, digest };
    } catch (err) {
      if (err instanceof DigestError) {
        return { success: false, error: err.message, code: err.code };
      }
      console.error("[digest] generation failed:", err);
      return { success: false, error: toErrorMessage(err), code: "INTERNAL" };
    }
  }

  private async processCandidate(candidate: Candidate, ctx: LearnerContext): Promise<ScoredInsight | undefined> {
    const doc = candidate.document;
    try {
      const outcome = await this.deps.insights.generateInsight(doc.content, ctx);
      if (outcome.kind !== "ok") {
        console.warn(`[digest] ${outcome.kind} reply for ${doc.id}${this.keepIncomplete ? ", keeping" : ", skipping"}`);
        if (!this.keepIncomplete) return undefined;
      }
      const relevance = await this.deps.scorer.score(candidate, ctx);
      return {
        insight: outcomeText(outcome),
        content_id: doc.id,
        title: doc.title,
        source_url: doc.source_url,
        relevance_score: relevance,
        similarity_score: candidate.similarity ?? 0,
        metadata: doc.metadata
      };
    } catch (err) {
      console.warn(`[digest] skipping ${doc.id}: ${toErrorMessage(err)}`);
      return undefined;
    }
  }

  private async persist(insights: ScoredInsight[], ctx: LearnerContext): Promise<number> {
    let saved = 0;
    for (const item of insights) {
      try {
        await this.deps.insightStore.save({
          insight: item.insight,
          content_id: item.content_id,
          title: item.title,
          source_url: item.source_url,
          relevance_score: item.relevance_score,
          week: ctx.current_week
        });
        saved++;
      } catch (err) {
        console.warn(`[digest] could not persist insight for ${item.content_id}: ${toErrorMessage(err)}`);
      }
    }
    return saved;
  }

  private async summarize(insights: ScoredInsight[], ctx: LearnerContext): Promise<string> {
    if (insights.length === 0) return fallbackSummary(ctx, 0);
    try {
      const raw = await this.deps.generation.complete(
        summaryMessages(insights.map((i) => i.insight), ctx),
        this.summaryMaxTokens,
        this.summaryTemperature
      );
      const outcome = extractFinalOutput(raw);
      if (outcome.kind === "ok" && outcome.text) return outcome.text;
      console.warn(`[digest] summary reply was ${outcome.kind === "ok" ? "empty" : outcome.kind}, using fallback`);
    } catch (err) {
      console.warn(`[digest] summary generation failed, using fallback: ${toErrorMessage(err)}`);
    }
    return fallbackSummary(ctx, insights.length);
  }

  private assemble(
    date: string,
    ctx: LearnerContext,
    summary: string,
    insights: ScoredInsight[],
    persisted: number
  ): Digest {
    return {
      date,
      week: ctx.current_week,
      topics: [...ctx.current_topics],
      context: { ...ctx, current_topics: [...ctx.current_topics] },
      summary,
      insights,
      total_insights: insights.length,
      persisted_insights: persisted
    };
  }
}
