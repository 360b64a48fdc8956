// src/domain/relevance.ts
// Multi-signal relevance policy: fixed-weight fusion of similarity, topic relevance and freshness.

/** Fusion weights. A change here is a policy change, so they are not configurable per request. */
export const RELEVANCE_WEIGHTS = Object.freeze({
  similarity: 0.4,
  topicRelevance: 0.4,
  freshness: 0.2
});

export const NEUTRAL_SIMILARITY = 0.5;
export const NEUTRAL_TOPIC_RELEVANCE = 0.5;
export const NEUTRAL_FRESHNESS = 0.5;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Freshness steps by age in whole days, checked in order (age <= maxAgeDays). */
export const FRESHNESS_STEPS: ReadonlyArray<{ maxAgeDays: number; score: number }> = [
  { maxAgeDays: 0, score: 1.0 },
  { maxAgeDays: 7, score: 0.9 },
  { maxAgeDays: 30, score: 0.7 },
  { maxAgeDays: 90, score: 0.4 }
];
export const STALE_FRESHNESS = 0.2;

export interface RelevanceSignals {
  similarity: number;
  topicRelevance: number;
  freshness: number;
}

export function clamp01(n: number): number {
  if (Number.isNaN(n)) return 0;
  return Math.max(0, Math.min(1, n));
}

export function roundTo(n: number, places: number): number {
  const f = Math.pow(10, places);
  return Math.round(n * f) / f;
}

/** Weighted fusion of the three signals, rounded to 3 decimals. Inputs are clamped to [0,1]. */
export function fuseRelevance(signals: RelevanceSignals): number {
  const w = RELEVANCE_WEIGHTS;
  const raw =
    w.similarity * clamp01(signals.similarity) +
    w.topicRelevance * clamp01(signals.topicRelevance) +
    w.freshness * clamp01(signals.freshness);
  return clamp01(roundTo(raw, 3));
}

/** Similarity as attached by retrieval; absent or non-finite values are neutral, not zero. */
export function similaritySignal(similarity: number | undefined): number {
  if (typeof similarity !== "number" || !Number.isFinite(similarity)) return NEUTRAL_SIMILARITY;
  return clamp01(similarity);
}

export function freshnessForAge(ageDays: number): number {
  for (const step of FRESHNESS_STEPS) {
    if (ageDays <= step.maxAgeDays) return step.score;
  }
  return STALE_FRESHNESS;
}

// Date.parse alone accepts "42" or "Issue 12"; only these two shapes reach it.
const ISO_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const RFC2822_TIMESTAMP_RE =
  /^(?:[A-Z][a-z]{2},\s*)?\d{1,2}\s+[A-Z][a-z]{2}\s+\d{4}\s+\d{2}:\d{2}(?::\d{2})?(?:\s*(?:GMT|UTC?|[A-Z]{3}|[+-]\d{4}))?$/;

/** Epoch millis for an ISO-8601 or RFC 2822 timestamp; undefined for anything else. */
export function parseTimestamp(value: string): number | undefined {
  const s = value.trim();
  if (!ISO_TIMESTAMP_RE.test(s) && !RFC2822_TIMESTAMP_RE.test(s)) return undefined;
  const ts = Date.parse(s);
  return Number.isNaN(ts) ? undefined : ts;
}

/**
 * Freshness of a document from its publication timestamp.
 * Age is counted in whole days (floored) relative to `now`.
 * Missing or unparseable timestamps are neutral.
 */
export function freshnessScore(published: unknown, now: Date = new Date()): number {
  if (typeof published !== "string") return NEUTRAL_FRESHNESS;
  const ts = parseTimestamp(published);
  if (ts === undefined) return NEUTRAL_FRESHNESS;
  const ageDays = Math.floor((now.getTime() - ts) / DAY_MS);
  return freshnessForAge(ageDays);
}

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a model's rating reply ("0.8") into [0,1].
 * Anything that is not a single decimal number yields the neutral default.
 */
export function parseRelevanceReply(reply: string): number {
  const s = reply.trim();
  if (!DECIMAL_RE.test(s)) return NEUTRAL_TOPIC_RELEVANCE;
  const n = Number(s);
  if (!Number.isFinite(n)) return NEUTRAL_TOPIC_RELEVANCE;
  return clamp01(n);
}

/** Stable sort by relevance, highest first; equal scores keep their input order. */
export function rankByRelevance<T extends { relevance_score: number }>(items: T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.relevance_score - a.item.relevance_score || a.index - b.index)
    .map(({ item }) => item);
}
