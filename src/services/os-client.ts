// src/services/os-client.ts
// OpenSearch client factory + small helpers.
// Env:
//   OPENSEARCH_URL (default: http://localhost:9200)
//   OPENSEARCH_USERNAME / OPENSEARCH_PASSWORD (optional)
//   OPENSEARCH_SSL_REJECT_UNAUTHORIZED=false (optional; for self-signed local dev)
//   COACH_OS_CLIENT_MAX_RETRIES=3
//   COACH_OS_CLIENT_TIMEOUT_MS=10000
//   COACH_OS_MIN_HEALTH=yellow|green, COACH_OS_HEALTH_TIMEOUT_MS=30000

import { Client } from "@opensearch-project/opensearch";
import { z } from "zod";
import { toErrorMessage } from "../domain/errors.js";
import { debug } from "./log.js";

const log = debug("coach:os-client");

export type Source = Record<string, unknown>;

export interface SearchHit {
  _id: string;
  _score: number | null;
  _source: Source;
}

/** The slice of OpenSearch the stores need; fakes implement this in tests. */
export interface IndexOps {
  search(index: string, body: Record<string, unknown>): Promise<SearchHit[]>;
  index(index: string, id: string, document: Source, refresh?: boolean): Promise<void>;
  count(index: string, query?: Record<string, unknown>): Promise<number>;
}

const searchResponseSchema = z.object({
  hits: z.object({
    hits: z.array(
      z.object({
        _id: z.string(),
        _score: z.number().nullable().optional(),
        _source: z.record(z.unknown()).optional()
      })
    )
  })
});

const countResponseSchema = z.object({ count: z.number().int().nonnegative() });

let _client: Client | null = null;

function nodeUrl(): string {
  return process.env.OPENSEARCH_URL || "http://localhost:9200";
}

export function getClient(): Client {
  if (_client) return _client;

  const node = nodeUrl();
  const username = process.env.OPENSEARCH_USERNAME;
  const password = process.env.OPENSEARCH_PASSWORD;
  const rejectUnauthorized = (process.env.OPENSEARCH_SSL_REJECT_UNAUTHORIZED ?? "true") !== "false";
  const maxRetries = Number(process.env.COACH_OS_CLIENT_MAX_RETRIES ?? 3);
  const requestTimeout = Number(process.env.COACH_OS_CLIENT_TIMEOUT_MS ?? 10000);

  log("client.init", { node, maxRetries, requestTimeout, rejectUnauthorized });
  _client = new Client({
    node,
    maxRetries,
    requestTimeout,
    ssl: { rejectUnauthorized },
    ...(username && password ? { auth: { username, password } } : {})
  });
  return _client;
}

/** Gate on cluster health; throws with the node URL and root cause on failure. */
export async function assertHealthy(client: Client = getClient()): Promise<void> {
  const minStatus = (process.env.COACH_OS_MIN_HEALTH || "yellow").toLowerCase() === "green" ? "green" : "yellow";
  const timeoutMs = Number(process.env.COACH_OS_HEALTH_TIMEOUT_MS ?? 30000);
  const timeout = `${Math.max(1, Math.ceil(timeoutMs / 1000))}s`;

  try {
    const res = await client.cluster.health({ wait_for_status: minStatus, timeout });
    const status = typeof res.body?.status === "string" ? res.body.status : "unknown";
    const order: Record<string, number> = { red: 0, yellow: 1, green: 2 };
    if ((order[status] ?? 0) < order[minStatus]) {
      throw new Error(`Cluster health '${status}' did not reach '${minStatus}' within ${timeout}`);
    }
  } catch (err) {
    throw new Error(
      `OpenSearch health check failed for ${nodeUrl()}. Ensure the cluster is up and reachable. Root cause: ${toErrorMessage(err)}`,
      { cause: err }
    );
  }
}

/** Ensure an index exists; if not, create with provided body (mappings/settings). */
export async function ensureIndex(name: string, body: Record<string, unknown>, client: Client = getClient()): Promise<boolean> {
  return withRetries(async () => {
    const exists = await client.indices.exists({ index: name });
    if (exists.body) return false;
    await client.indices.create({ index: name, body });
    log("index.created", { index: name });
    return true;
  });
}

/**
 * True for a search or count against an index that does not exist yet
 * (bootstrap is opt-in, so a fresh cluster has none of ours).
 */
export function isIndexNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ("statusCode" in err && err.statusCode === 404) return true;
  const meta = "meta" in err ? err.meta : undefined;
  if (typeof meta === "object" && meta !== null && "statusCode" in meta && meta.statusCode === 404) return true;
  return err.message.includes("index_not_found_exception");
}

/** Small retry wrapper for transient ops (connection/reset). A missing index is not retried. */
export async function withRetries<T>(fn: () => Promise<T>, attempts = 3, baseDelayMs = 150): Promise<T> {
  let lastErr: unknown;
  for (let i = 0; i < attempts; i++) {
    try { return await fn(); }
    catch (e) {
      lastErr = e;
      if (i === attempts - 1 || isIndexNotFound(e)) break;
      const jitter = Math.floor(Math.random() * 100);
      const delay = Math.min(2000, baseDelayMs * Math.pow(2, i)) + jitter;
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(String(lastErr));
}

/** IndexOps over a live client: searches and writes go through withRetries. */
export function openSearchOps(client: Client = getClient(), attempts = 3): IndexOps {
  return {
    async search(index, body) {
      log("search.request", { node: nodeUrl(), index, size: body.size });
      const res = await withRetries(() => client.search({ index, body }), attempts);
      const parsed = searchResponseSchema.safeParse(res.body);
      if (!parsed.success) {
        throw new Error(`Malformed OpenSearch search response from ${index}: ${parsed.error.message}`);
      }
      const hits = parsed.data.hits.hits.map((h) => ({ _id: h._id, _score: h._score ?? null, _source: h._source ?? {} }));
      log("search.response", { index, count: hits.length });
      return hits;
    },
    async index(index, id, document, refresh = false) {
      log("index.request", { node: nodeUrl(), index, id });
      await withRetries(() => client.index({ index, id, body: document, refresh }), attempts);
    },
    async count(index, query) {
      const res = await withRetries(() => client.count({ index, body: query ? { query } : {} }), attempts);
      const parsed = countResponseSchema.safeParse(res.body);
      if (!parsed.success) {
        throw new Error(`Malformed OpenSearch count response from ${index}: ${parsed.error.message}`);
      }
      return parsed.data.count;
    }
  };
}
