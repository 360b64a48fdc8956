import fs from "node:fs";
import yaml from "js-yaml";

// Lightweight YAML-backed config loader with a lazy cache and typed getters.
// Base file: config/digest.yaml (COACH_DIGEST_CONFIG_PATH overrides the path).
// Overrides, applied in order: COACH_DIGEST_OVERRIDES_FILE (JSON), then COACH_DIGEST_OVERRIDES_JSON.

export type ConfigTree = Record<string, unknown>;

let digestCache: ConfigTree | null = null;

export function isPlainObject(v: unknown): v is ConfigTree {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function safeLoadYaml(path: string): ConfigTree {
  try {
    const doc = yaml.load(fs.readFileSync(path, "utf8"));
    return isPlainObject(doc) ? doc : {};
  } catch {
    return {};
  }
}

function safeParseJson(raw: string): ConfigTree {
  try {
    const obj: unknown = JSON.parse(raw);
    return isPlainObject(obj) ? obj : {};
  } catch {
    return {};
  }
}

function safeLoadJsonFile(path: string): ConfigTree {
  try {
    return safeParseJson(fs.readFileSync(path, "utf8"));
  } catch {
    return {};
  }
}

// Deep merge for override application (arrays and scalars are replaced)
export function deepMerge(a: ConfigTree, b: ConfigTree): ConfigTree {
  const out: ConfigTree = { ...a };
  for (const k of Object.keys(b)) {
    const bv = b[k];
    const av = out[k];
    out[k] = isPlainObject(av) && isPlainObject(bv) ? deepMerge(av, bv) : bv;
  }
  return out;
}

export function getDigestConfig(): ConfigTree {
  if (digestCache) return digestCache;

  const basePath = process.env.COACH_DIGEST_CONFIG_PATH || "config/digest.yaml";
  let merged = safeLoadYaml(basePath);

  const overridesFile = process.env.COACH_DIGEST_OVERRIDES_FILE;
  if (overridesFile && overridesFile.trim().length > 0) {
    merged = deepMerge(merged, safeLoadJsonFile(overridesFile));
  }

  const overridesJson = process.env.COACH_DIGEST_OVERRIDES_JSON;
  if (overridesJson && overridesJson.trim().length > 0) {
    merged = deepMerge(merged, safeParseJson(overridesJson));
  }

  digestCache = merged;
  return merged;
}

// Path utilities

function getIn(obj: ConfigTree, path: string): unknown {
  let cur: unknown = obj;
  for (const s of path.split(".")) {
    if (!isPlainObject(cur)) return undefined;
    cur = cur[s];
  }
  return cur;
}

function coerceNumber(v: unknown, dflt: number): number {
  if (typeof v === "number" && !Number.isNaN(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (!Number.isNaN(n)) return n;
  }
  return dflt;
}

function coerceBoolean(v: unknown, dflt: boolean): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (s === "true") return true;
    if (s === "false") return false;
    const n = Number(v);
    if (s.length > 0 && !Number.isNaN(n)) return n !== 0;
  }
  return dflt;
}

function coerceNumberArray(v: unknown, dflt: number[]): number[] {
  if (Array.isArray(v)) return v.filter((x): x is number => typeof x === "number" && Number.isFinite(x));
  return dflt;
}

// Typed getters: config/digest.yaml

export function digestNumber(path: string, dflt: number): number {
  return coerceNumber(getIn(getDigestConfig(), path), dflt);
}

export function digestBoolean(path: string, dflt: boolean): boolean {
  return coerceBoolean(getIn(getDigestConfig(), path), dflt);
}

export function digestString(path: string, dflt: string): string {
  const v = getIn(getDigestConfig(), path);
  return typeof v === "string" ? v : dflt;
}

export function digestNumberArray(path: string, dflt: number[]): number[] {
  return coerceNumberArray(getIn(getDigestConfig(), path), dflt);
}

/** Environment wins over YAML for deployment-specific knobs. */
export function envOr(name: string, dflt: string): string {
  const v = process.env[name];
  return v && v.trim().length > 0 ? v.trim() : dflt;
}

// Optional: expose a way to clear caches (useful for tests)
export function __resetConfigCaches(): void {
  digestCache = null;
}
