// src/services/os-bootstrap.ts
// OpenSearch bootstrap: health gating, idempotent index creation, vector dim validation.
//
// Behavior:
// - Waits for cluster health (yellow|green) with timeout.
// - Creates the content, insights, progress and sources indices from config/index-templates when missing.
// - Validates knn_vector dimensions in the bodies against the embedding dimension.
//   Optionally auto-fixes mismatches if COACH_OS_AUTOFIX_VECTOR_DIM=true.
//
// Env:
//   COACH_BOOTSTRAP_OS=1                          -> enable bootstrap at startup (wired from src/index.ts)
//   COACH_EMBED_DIM=384                           -> expected embedding vector dimension
//   COACH_OS_AUTOFIX_VECTOR_DIM=true|false        -> adjust loaded bodies to expected dim (default: false)
//   CONFIG_INDEX_TEMPLATES_DIR=config/index-templates -> override templates dir

import fs from "node:fs";
import path from "node:path";
import { digestNumber, digestString, envOr, isPlainObject, type ConfigTree } from "./config.js";
import { debug } from "./log.js";
import { assertHealthy, ensureIndex } from "./os-client.js";

const log = debug("coach:os-bootstrap");

export type IndexRole = "content" | "insights" | "progress" | "sources";

export const INDEX_ROLES: readonly IndexRole[] = ["content", "insights", "progress", "sources"];

export interface IndexNames {
  content: string;
  insights: string;
  progress: string;
  sources: string;
}

export function indexNamesFromConfig(): IndexNames {
  return {
    content: digestString("indices.content", "coach-content"),
    insights: digestString("indices.insights", "coach-insights"),
    progress: digestString("indices.progress", "coach-progress"),
    sources: digestString("indices.sources", "coach-sources")
  };
}

export interface BootstrapOptions {
  templatesDir?: string;
  expectedDim?: number;
  autoFixVectorDims?: boolean;
  indices?: IndexNames;
  healthCheck?: () => Promise<void>;
  ensure?: (name: string, body: ConfigTree) => Promise<boolean>;
}

function readJson(filePath: string): ConfigTree {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isPlainObject(parsed)) throw new Error(`Index body ${filePath} is not a JSON object`);
  return parsed;
}

/** Visit every { type: "knn_vector", dimension: number } node. */
function visitKnnVectorMappings(node: unknown, fn: (mapping: ConfigTree) => void): void {
  if (Array.isArray(node)) {
    for (const item of node) visitKnnVectorMappings(item, fn);
    return;
  }
  if (!isPlainObject(node)) return;
  if (node.type === "knn_vector" && typeof node.dimension === "number") fn(node);
  for (const v of Object.values(node)) visitKnnVectorMappings(v, fn);
}

export function findKnnVectorDimensions(body: unknown): number[] {
  const dims: number[] = [];
  visitKnnVectorMappings(body, (m) => {
    if (typeof m.dimension === "number") dims.push(m.dimension);
  });
  return dims;
}

export function adjustAllKnnVectorDimensions(body: unknown, expectedDim: number): void {
  visitKnnVectorMappings(body, (m) => {
    m.dimension = expectedDim;
  });
}

/**
 * All knn_vector mappings must match expectedDim. With autoFix, mismatches are
 * corrected in place; otherwise every mismatch is reported in one error.
 */
export function validateOrFixVectorDims(
  bodies: Array<{ name: string; body: ConfigTree }>,
  expectedDim: number,
  autoFix: boolean
): void {
  const mismatches: Array<{ name: string; found: number[] }> = [];
  for (const { name, body } of bodies) {
    const dims = findKnnVectorDimensions(body);
    if (!dims.some((d) => d !== expectedDim)) continue;
    if (autoFix) adjustAllKnnVectorDimensions(body, expectedDim);
    else mismatches.push({ name, found: dims });
  }
  if (mismatches.length > 0) {
    const details = mismatches.map((m) => `${m.name}: [${m.found.join(", ")}] (expected ${expectedDim})`).join("; ");
    throw new Error(
      `Vector dimension mismatch in mappings: ${details}. Set COACH_EMBED_DIM to match templates or enable COACH_OS_AUTOFIX_VECTOR_DIM=true to auto-adjust.`
    );
  }
}

/** Load coach-<role>.json for every role present in the templates dir. */
export function loadIndexBodies(templatesDir: string): Array<{ role: IndexRole; name: string; body: ConfigTree }> {
  const out: Array<{ role: IndexRole; name: string; body: ConfigTree }> = [];
  for (const role of INDEX_ROLES) {
    const file = path.join(templatesDir, `coach-${role}.json`);
    if (!fs.existsSync(file)) {
      log("template.missing", { role, file });
      continue;
    }
    out.push({ role, name: path.basename(file), body: readJson(file) });
  }
  return out;
}

/** Returns the names of indices created by this call. */
export async function bootstrapOpenSearch(opts: BootstrapOptions = {}): Promise<string[]> {
  const {
    templatesDir = envOr("CONFIG_INDEX_TEMPLATES_DIR", "config/index-templates"),
    expectedDim = Number(envOr("COACH_EMBED_DIM", String(digestNumber("embedding.dim", 384)))),
    autoFixVectorDims = envOr("COACH_OS_AUTOFIX_VECTOR_DIM", "false").toLowerCase() === "true",
    indices = indexNamesFromConfig(),
    healthCheck = () => assertHealthy(),
    ensure = (name: string, body: ConfigTree) => ensureIndex(name, body)
  } = opts;

  await healthCheck();

  const bodies = loadIndexBodies(templatesDir);
  validateOrFixVectorDims(bodies, expectedDim, autoFixVectorDims);

  const created: string[] = [];
  for (const { role, body } of bodies) {
    const name = indices[role];
    if (await ensure(name, body)) created.push(name);
  }
  log("bootstrap.done", { created });
  return created;
}
