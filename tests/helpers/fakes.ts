// In-process stand-ins for OpenSearch, the embedding model, the generation service and the stores.

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type {
  ChatMessage,
  Document,
  DocumentMetadata,
  InsightQuery,
  LearnerContext,
  StoredInsight
} from "../../src/domain/types.js";
import type { ToolHost } from "../../src/routes/tooling.js";
import { isPlainObject, type ConfigTree } from "../../src/services/config.js";
import type { Embedder } from "../../src/services/embedder.js";
import type { GenerationService } from "../../src/services/generation.js";
import type { InsightStore, NewInsight } from "../../src/services/insight-store.js";
import type { IndexOps, SearchHit, Source } from "../../src/services/os-client.js";
import { normalizeLearnerContext, type ProgressStore } from "../../src/services/progress-store.js";
import type { NewDocument, VectorSearchResult, VectorStore } from "../../src/services/vector-store.js";

// ---------------------------------------------------------------------------
// OpenSearch

function asArray(v: unknown): unknown[] {
  if (v === undefined) return [];
  return Array.isArray(v) ? v : [v];
}

function firstEntry(obj: ConfigTree): [string, unknown] | undefined {
  const keys = Object.keys(obj);
  return keys.length > 0 ? [keys[0], obj[keys[0]]] : undefined;
}

/** Evaluates the small query subset the stores emit: ids, term, range, match, match_all, bool. */
function matches(id: string, doc: Source, query: unknown): boolean {
  if (!isPlainObject(query)) return true;
  const clause = firstEntry(query);
  if (!clause) return true;
  const [kind, spec] = clause;
  if (!isPlainObject(spec)) return true;

  switch (kind) {
    case "match_all":
      return true;
    case "exists":
      return typeof spec.field === "string" && doc[spec.field] !== undefined && doc[spec.field] !== null;
    case "ids":
      return asArray(spec.values).includes(id);
    case "term": {
      const entry = firstEntry(spec);
      return entry ? doc[entry[0]] === entry[1] : true;
    }
    case "range": {
      const entry = firstEntry(spec);
      if (!entry || !isPlainObject(entry[1])) return true;
      const value = String(doc[entry[0]] ?? "");
      const { gte, lte } = entry[1];
      return (typeof gte !== "string" || value >= gte) && (typeof lte !== "string" || value <= lte);
    }
    case "match": {
      const entry = firstEntry(spec);
      if (!entry) return true;
      const q = isPlainObject(entry[1]) ? String(entry[1].query ?? "") : String(entry[1]);
      const field = String(doc[entry[0]] ?? "").toLowerCase();
      return q
        .toLowerCase()
        .split(/\s+/)
        .filter(Boolean)
        .some((token) => field.includes(token));
    }
    case "bool":
      return [...asArray(spec.must), ...asArray(spec.filter)].every((q) => matches(id, doc, q));
    default:
      return true;
  }
}

function createdAtOrder(sort: unknown[]): unknown {
  const first = sort[0];
  if (!isPlainObject(first) || !isPlainObject(first.created_at)) return "desc";
  return first.created_at.order;
}

/** Shaped like the client's ResponseError for a search against a missing index. */
export class IndexNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(index: string) {
    super(`index_not_found_exception: no such index [${index}]`);
  }
}

export class FakeIndexOps implements IndexOps {
  readonly docs = new Map<string, Map<string, Source>>();
  readonly searches: Array<{ index: string; body: Record<string, unknown> }> = [];
  readonly writes: Array<{ index: string; id: string; document: Source; refresh: boolean }> = [];
  /** Scores by document id, applied to queries that carry a min_score (similarity searches). */
  readonly scores = new Map<string, number>();
  /** Indices that do not exist yet; reads fail with a 404 until the first write. */
  readonly missing = new Set<string>();
  searchImpl?: (index: string, body: Record<string, unknown>) => SearchHit[];
  failIndexWith?: Error;

  async search(index: string, body: Record<string, unknown>): Promise<SearchHit[]> {
    this.searches.push({ index, body });
    if (this.missing.has(index)) throw new IndexNotFoundError(index);
    if (this.searchImpl) return this.searchImpl(index, body);

    const stored = this.docs.get(index) ?? new Map<string, Source>();
    let hits: SearchHit[] = [...stored.entries()]
      .filter(([id, doc]) => matches(id, doc, body.query))
      .map(([id, doc]) => ({ _id: id, _score: this.scores.get(id) ?? null, _source: { ...doc } }));

    const minScore = body.min_score;
    if (typeof minScore === "number") {
      hits = hits
        .filter((h) => (h._score ?? 0) >= minScore)
        .sort((a, b) => (b._score ?? 0) - (a._score ?? 0));
    } else if (Array.isArray(body.sort)) {
      const sign = createdAtOrder(body.sort) === "asc" ? 1 : -1;
      hits = hits.sort(
        (a, b) => sign * String(a._source.created_at ?? "").localeCompare(String(b._source.created_at ?? ""))
      );
    }
    const size = typeof body.size === "number" ? body.size : 10;
    return hits.slice(0, size);
  }

  async index(index: string, id: string, document: Source, refresh = false): Promise<void> {
    if (this.failIndexWith) throw this.failIndexWith;
    this.missing.delete(index);
    this.writes.push({ index, id, document, refresh });
    const stored = this.docs.get(index) ?? new Map<string, Source>();
    stored.set(id, { ...document });
    this.docs.set(index, stored);
  }

  async count(index: string, query?: Record<string, unknown>): Promise<number> {
    if (this.missing.has(index)) throw new IndexNotFoundError(index);
    const stored = this.docs.get(index) ?? new Map<string, Source>();
    return [...stored.entries()].filter(([id, doc]) => matches(id, doc, query)).length;
  }
}

// ---------------------------------------------------------------------------
// Models

export class FakeEmbedder implements Embedder {
  readonly model = "fake";
  readonly calls: string[] = [];
  failWith?: Error;

  constructor(readonly dim = 4) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failWith) throw this.failWith;
    return Array.from({ length: this.dim }, (_, i) => (i === 0 ? 1 : 0));
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (const t of texts) out.push(await this.embed(t));
    return out;
  }
}

export interface GenerationCall {
  messages: ChatMessage[];
  maxOutputTokens: number;
  temperature: number;
}

export type GenerationReply = (call: GenerationCall) => string | Promise<string>;

/** Replies through a handler; calls are recorded. */
export class FakeGeneration implements GenerationService {
  readonly calls: GenerationCall[] = [];

  constructor(private readonly reply: GenerationReply) {}

  async complete(messages: ChatMessage[], maxOutputTokens: number, temperature: number): Promise<string> {
    const call = { messages, maxOutputTokens, temperature };
    this.calls.push(call);
    return this.reply(call);
  }
}

export function userPrompt(call: GenerationCall): string {
  return call.messages.find((m) => m.role === "user")?.content ?? "";
}

export function isRelevanceCall(call: GenerationCall): boolean {
  return userPrompt(call).startsWith("Rate how relevant");
}

export function isInsightCall(call: GenerationCall): boolean {
  return userPrompt(call).includes("Insight:");
}

export function isSummaryCall(call: GenerationCall): boolean {
  return userPrompt(call).includes("Introduction:");
}

// ---------------------------------------------------------------------------
// Stores

export function makeDocument(id: string, overrides: Partial<Document> = {}, metadata: DocumentMetadata = {}): Document {
  return {
    id,
    title: `Title ${id}`,
    content: `Body of ${id}`,
    source_url: `https://example.com/${id}`,
    metadata,
    ...overrides
  };
}

/** Answers each search from a queue of canned result lists; records every call. */
export class ScriptedVectorStore implements VectorStore {
  readonly searches: Array<{ queryVector: number[]; threshold: number; limit: number }> = [];
  readonly inserted: Document[] = [];
  failInsertFor = new Set<string>();

  constructor(private readonly responses: VectorSearchResult[][] = []) {}

  async search(queryVector: number[], threshold: number, limit: number): Promise<VectorSearchResult[]> {
    this.searches.push({ queryVector, threshold, limit });
    return (this.responses.shift() ?? []).slice(0, limit);
  }

  async insert(document: NewDocument, embedding: number[], metadata: DocumentMetadata): Promise<Document> {
    if (this.failInsertFor.has(document.title)) throw new Error(`insert rejected for ${document.title}`);
    const stored: Document = { ...document, embedding, metadata };
    this.inserted.push(stored);
    return stored;
  }
}

export class InMemoryProgressStore implements ProgressStore {
  constructor(private ctx?: LearnerContext) {}

  async getLearnerContext(): Promise<LearnerContext | undefined> {
    return this.ctx;
  }

  async setLearnerContext(week: number, topics: string[], goals: string): Promise<LearnerContext> {
    this.ctx = normalizeLearnerContext(week, topics, goals);
    return this.ctx;
  }
}

export class InMemoryInsightStore implements InsightStore {
  readonly saved: StoredInsight[] = [];
  failFor = new Set<string>();
  private seq = 0;

  async save(insight: NewInsight): Promise<StoredInsight> {
    if (this.failFor.has(insight.content_id)) throw new Error(`store rejected ${insight.content_id}`);
    this.seq++;
    const stored: StoredInsight = {
      ...insight,
      id: `ins_${this.seq}`,
      created_at: insight.created_at ?? new Date(Date.UTC(2026, 9, 19, 8, 0, this.seq)).toISOString()
    };
    this.saved.push(stored);
    return stored;
  }

  async query(filters: InsightQuery): Promise<StoredInsight[]> {
    return this.saved
      .filter((i) => !filters.contentId || i.content_id === filters.contentId)
      .filter((i) => !filters.date || i.created_at.startsWith(filters.date))
      .filter((i) => !filters.text || i.insight.toLowerCase().includes(filters.text.toLowerCase()))
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, filters.limit ?? 10);
  }
}

// ---------------------------------------------------------------------------
// MCP

export class FakeToolHost implements ToolHost {
  readonly tools = new Map<string, { description: string; handler: (args: unknown) => Promise<CallToolResult> }>();

  tool(
    name: string,
    description: string,
    _shape: unknown,
    handler: (args: unknown) => Promise<CallToolResult>
  ): void {
    this.tools.set(name, { description, handler });
  }

  /** Invoke a tool and parse its JSON text payload. */
  async call(name: string, args: unknown = {}): Promise<Record<string, unknown>> {
    const tool = this.tools.get(name);
    if (!tool) throw new Error(`tool not registered: ${name}`);
    const result = await tool.handler(args);
    const first = result.content[0];
    if (!first || first.type !== "text") throw new Error(`tool ${name} returned no text content`);
    const parsed: unknown = JSON.parse(first.text);
    if (!isPlainObject(parsed)) throw new Error(`tool ${name} returned non-object JSON`);
    return parsed;
  }
}
