// src/services/log.ts
// Stage tracing for the coach pipeline. Each area gets its own namespace
// ("coach:retriever", "coach:scorer", ...) and stays silent unless DEBUG selects it.
//
//   DEBUG=coach:*                       every coach area
//   DEBUG=coach:digest,coach:scorer     a comma list
//   DEBUG=coach:*,-coach:os-client      a leading "-" excludes an area
//
// Lines go to stderr with an ISO timestamp; stdout belongs to the MCP transport.

export type Logger = (...args: unknown[]) => void;

interface Selection {
  include: string[];
  exclude: string[];
}

let cached: { raw: string; selection: Selection } | undefined;

function selectionFor(raw: string): Selection {
  if (cached?.raw === raw) return cached.selection;
  const selection: Selection = { include: [], exclude: [] };
  for (const part of raw.split(",")) {
    const p = part.trim();
    if (!p) continue;
    if (p.startsWith("-")) selection.exclude.push(p.slice(1));
    else selection.include.push(p);
  }
  cached = { raw, selection };
  return selection;
}

function covers(pattern: string, namespace: string): boolean {
  if (pattern === "*" || pattern === namespace) return true;
  return pattern.endsWith("*") && namespace.startsWith(pattern.slice(0, -1));
}

export function debugEnabled(namespace: string): boolean {
  const { include, exclude } = selectionFor(process.env.DEBUG ?? "");
  if (exclude.some((p) => covers(p, namespace))) return false;
  return include.some((p) => covers(p, namespace));
}

/** Logger for one area; resolved against DEBUG once, when the module creating it loads. */
export function debug(namespace: string): Logger {
  if (!debugEnabled(namespace)) return () => undefined;
  return (...args: unknown[]) => {
    console.error(`[${new Date().toISOString()}] ${namespace}`, ...args);
  };
}
