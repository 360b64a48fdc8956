// src/services/ids.ts
// Utilities for generating stable IDs, hashes, and date helpers.

import crypto from "node:crypto";
import { v4 as uuidv4 } from "uuid";

const CONTENT_PREFIX = "doc_";
const INSIGHT_PREFIX = "ins_";
const SOURCE_PREFIX = "src_";

/**
 * Stable content id: the same source URL always maps to the same document,
 * so re-ingesting a feed overwrites instead of duplicating.
 * Items without a URL are keyed by title + body.
 */
export function makeContentId(sourceUrl: string, title = "", content = ""): string {
  const key = sourceUrl.trim() ? `url|${sourceUrl.trim()}` : `text|${title}|${content}`;
  return `${CONTENT_PREFIX}${sha256Hex(key).slice(0, 24)}`;
}

/** One registration per URL, like a unique column. */
export function makeSourceId(sourceUrl: string): string {
  return `${SOURCE_PREFIX}${sha256Hex(`source|${sourceUrl.trim()}`).slice(0, 24)}`;
}

export function makeInsightId(): string {
  return `${INSIGHT_PREFIX}${uuidv4()}`;
}

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}

/** YYYY-MM-DD of the UTC day containing d. */
export function utcDay(d: Date = new Date()): string {
  return d.toISOString().slice(0, 10);
}

export function isUtcDay(s: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(s) && !Number.isNaN(Date.parse(`${s}T00:00:00.000Z`));
}
