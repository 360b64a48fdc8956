/* src/services/embedder.ts
   Embedding generator. One model is loaded at process start and shared read-only.
   - provider "http": POSTs {texts, dim} to EMBEDDING_ENDPOINT and expects {vectors: number[][]}.
   - provider "local": hash-based pseudo-embeddings, stable per input (dev and tests).
   If the model cannot be loaded, every call fails with ModelUnavailableError.
   Vectors are L2-normalized.
*/

import { z } from "zod";
import { ModelUnavailableError, toErrorMessage } from "../domain/errors.js";
import { digestNumber, digestString, envOr } from "./config.js";
import { debug } from "./log.js";

const log = debug("coach:embedder");

export interface Embedder {
  readonly model: string;
  readonly dim: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface EmbedderSettings {
  provider: string;
  dim: number;
  endpoint?: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
}

type FetchFn = typeof fetch;

export function embedderSettingsFromEnv(): EmbedderSettings {
  const endpoint = process.env.EMBEDDING_ENDPOINT || undefined;
  // An endpoint implies the http model unless a provider is named explicitly
  const provider = envOr("COACH_EMBED_PROVIDER", endpoint ? "http" : digestString("embedding.provider", "local"));
  return {
    provider: provider.toLowerCase(),
    dim: Number(envOr("COACH_EMBED_DIM", String(digestNumber("embedding.dim", 384)))),
    endpoint,
    apiKey: process.env.EMBEDDING_API_KEY || undefined,
    timeoutMs: Number(envOr("COACH_EMBED_TIMEOUT_MS", String(digestNumber("embedding.timeout_ms", 8000)))),
    maxRetries: Number(envOr("COACH_EMBED_RETRIES", String(digestNumber("embedding.retries", 3))))
  };
}

/**
 * Load the configured embedding model once. Never throws: a model that fails to
 * load is returned as an embedder whose calls fail with ModelUnavailableError.
 */
export async function loadEmbedder(
  settings: EmbedderSettings = embedderSettingsFromEnv(),
  fetchImpl: FetchFn = fetch
): Promise<Embedder> {
  if (!Number.isInteger(settings.dim) || settings.dim <= 0) {
    return new UnavailableEmbedder(settings.provider, 0, `invalid embedding dimension '${settings.dim}'`);
  }

  if (settings.provider === "local") {
    log("load", { provider: "local", dim: settings.dim });
    return new LocalHashEmbedder(settings.dim);
  }

  if (settings.provider === "http") {
    if (!settings.endpoint) {
      return new UnavailableEmbedder("http", settings.dim, "EMBEDDING_ENDPOINT is not set");
    }
    const embedder = new HttpEmbedder({
      endpoint: settings.endpoint,
      apiKey: settings.apiKey,
      dim: settings.dim,
      timeoutMs: settings.timeoutMs,
      maxRetries: settings.maxRetries,
      fetchImpl
    });
    try {
      await embedder.embed("ping");
      log("load", { provider: "http", endpoint: settings.endpoint, dim: settings.dim });
      return embedder;
    } catch (err) {
      const reason = toErrorMessage(err);
      console.error(`[embedder] failed to load http model at ${settings.endpoint}: ${reason}`);
      return new UnavailableEmbedder("http", settings.dim, reason, err);
    }
  }

  return new UnavailableEmbedder(settings.provider, settings.dim, `unknown provider '${settings.provider}'`);
}

// ---------------------------
// Unavailable model
// ---------------------------
export class UnavailableEmbedder implements Embedder {
  readonly model: string;

  constructor(provider: string, readonly dim: number, private readonly reason: string, private readonly cause?: unknown) {
    this.model = `${provider}:unavailable`;
  }

  async embed(): Promise<number[]> {
    throw new ModelUnavailableError(this.reason, { cause: this.cause });
  }

  async embedBatch(): Promise<number[][]> {
    throw new ModelUnavailableError(this.reason, { cause: this.cause });
  }
}

// ---------------------------
// Remote HTTP embedder
// ---------------------------
export interface HttpEmbedderOptions {
  endpoint: string;
  apiKey?: string;
  dim: number;
  timeoutMs: number;
  maxRetries: number;
  fetchImpl?: FetchFn;
}

const remoteResponseSchema = z.object({ vectors: z.array(z.array(z.number())) });

export class HttpEmbedder implements Embedder {
  readonly model: string;
  readonly dim: number;
  private readonly fetchImpl: FetchFn;

  constructor(private readonly opts: HttpEmbedderOptions) {
    this.model = `http:${opts.endpoint}`;
    this.dim = opts.dim;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async embed(text: string): Promise<number[]> {
    const [v] = await this.embedBatch([text]);
    return v;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const vectors = await this.remoteEmbed(texts);
    return vectors.map(unitNormalize);
  }

  private async remoteEmbed(texts: string[]): Promise<number[][]> {
    const { endpoint, apiKey, dim, timeoutMs } = this.opts;
    const attempts = Math.max(1, this.opts.maxRetries);
    const body = JSON.stringify({ texts, dim });
    let lastErr: unknown;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const ctrl = new AbortController();
        const to = setTimeout(() => ctrl.abort(), timeoutMs);

        const res = await this.fetchImpl(endpoint, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {})
          },
          body,
          signal: ctrl.signal
        }).finally(() => clearTimeout(to));

        if (!res.ok) {
          const text = await safeText(res);
          throw new Error(`HTTP ${res.status}: ${text.slice(0, 200)}`);
        }

        const parsed = remoteResponseSchema.safeParse(await res.json());
        if (!parsed.success || parsed.data.vectors.length !== texts.length) {
          throw new Error("Malformed response: missing or invalid 'vectors'");
        }

        for (const v of parsed.data.vectors) {
          if (v.length !== dim) {
            throw new Error(`Vector has wrong dimension (expected ${dim}, got ${v.length})`);
          }
        }
        return parsed.data.vectors;
      } catch (err) {
        lastErr = err;
        log("remote.error", { attempt, message: toErrorMessage(err) });
        if (attempt < attempts - 1) await sleep(backoffMs(attempt));
      }
    }
    throw new Error(`remoteEmbed failed after ${attempts} attempts: ${String(lastErr)}`);
  }
}

function backoffMs(attempt: number): number {
  const base = 150; // ms
  const jitter = Math.floor(Math.random() * 100);
  return Math.min(2000, base * Math.pow(2, attempt)) + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}

async function safeText(res: Response): Promise<string> {
  try { return await res.text(); } catch { return ""; }
}

// ---------------------------
// Deterministic local model
// ---------------------------
// Stable pseudo-embedding per input text: tokens are hashed and spread over the
// vector with sin/cos bumps. Not semantically meaningful beyond token overlap.

export class LocalHashEmbedder implements Embedder {
  readonly model = "local:hash";

  constructor(readonly dim: number) {}

  async embed(text: string): Promise<number[]> {
    return unitNormalize(localHashEmbedding(text, this.dim));
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((t) => unitNormalize(localHashEmbedding(t, this.dim)));
  }
}

function localHashEmbedding(text: string, dim: number): number[] {
  const vec = new Array<number>(dim).fill(0);
  const tokens = simpleTokens(text);

  const rng = mulberry32(murmur3(text));

  for (const tok of tokens) {
    const h1 = murmur3(tok + "|a");
    const h2 = murmur3(tok + "|b");
    const i = Math.abs(h1) % dim;
    const j = Math.abs(h2) % dim;

    const phase = (h1 ^ h2) >>> 0;
    const amp = 0.5 + 0.5 * rng(); // 0.5..1.0
    vec[i] += Math.sin(phase * 0.0001) * amp;
    vec[j] += Math.cos(phase * 0.0001) * amp * 0.7;
  }

  // Small noise to break ties
  for (let k = 0; k < dim; k++) vec[k] += (rng() - 0.5) * 0.01;
  return vec;
}

function simpleTokens(s: string): string[] {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9_./:-]+/g, " ")
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, 1024); // the local model's input limit
}

// Murmur3 32-bit hash (x86 variant, simplified)
function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let i = 0;
  while (key.length >= i + 4) {
    let k =
      (key.charCodeAt(i) & 0xff) |
      ((key.charCodeAt(i + 1) & 0xff) << 8) |
      ((key.charCodeAt(i + 2) & 0xff) << 16) |
      ((key.charCodeAt(i + 3) & 0xff) << 24);
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
    i += 4;
  }
  let k1 = 0;
  switch (key.length & 3) {
    case 3:
      k1 ^= (key.charCodeAt(i + 2) & 0xff) << 16;
    // falls through
    case 2:
      k1 ^= (key.charCodeAt(i + 1) & 0xff) << 8;
    // falls through
    case 1:
      k1 ^= key.charCodeAt(i) & 0xff;
      k1 = Math.imul(k1, 0xcc9e2d51);
      k1 = (k1 << 15) | (k1 >>> 17);
      k1 = Math.imul(k1, 0x1b873593);
      h ^= k1;
  }
  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h | 0;
}

function mulberry32(a: number): () => number {
  return function () {
    a |= 0; a = (a + 0x6D2B79F5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ---------------------------
// Vector utilities
// ---------------------------
export function unitNormalize(v: number[]): number[] {
  let norm = 0;
  for (let i = 0; i < v.length; i++) norm += v[i] * v[i];
  norm = Math.sqrt(norm) || 1;
  return v.map((x) => x / norm);
}
