// src/domain/reasoning.ts
// Strips a model's inline reasoning segment (<think>...</think>) from a reply.

export const REASONING_START = "<think>";
export const REASONING_END = "</think>";

export const REASONING_ONLY_TEXT = "Error: Model only generated thinking process, no insight produced.";
export const INCOMPLETE_REASONING_TEXT = "Error: Incomplete response - thinking process not finished.";

export type GenerationOutcome =
  | { kind: "ok"; text: string }
  | { kind: "reasoning_only" }
  | { kind: "incomplete" };

/**
 * Keep only what follows the last end marker.
 * - end marker with nothing after it  -> reasoning_only
 * - start marker with no end marker   -> incomplete
 * - no markers                        -> the reply, trimmed
 */
export function extractFinalOutput(raw: string): GenerationOutcome {
  const end = raw.lastIndexOf(REASONING_END);
  if (end >= 0) {
    const tail = raw.slice(end + REASONING_END.length).trim();
    return tail ? { kind: "ok", text: tail } : { kind: "reasoning_only" };
  }
  if (raw.includes(REASONING_START)) return { kind: "incomplete" };
  return { kind: "ok", text: raw.trim() };
}

/** Text form of an outcome; non-ok outcomes map to their legacy literal messages. */
export function outcomeText(outcome: GenerationOutcome): string {
  switch (outcome.kind) {
    case "ok":
      return outcome.text;
    case "reasoning_only":
      return REASONING_ONLY_TEXT;
    case "incomplete":
      return INCOMPLETE_REASONING_TEXT;
  }
}
