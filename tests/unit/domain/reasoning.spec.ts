import { describe, it, expect } from "vitest";
import {
  INCOMPLETE_REASONING_TEXT,
  REASONING_ONLY_TEXT,
  extractFinalOutput,
  outcomeText
} from "../../../src/domain/reasoning.js";

describe("extractFinalOutput", () => {
  it("keeps the text after the end marker", () => {
    expect(extractFinalOutput("<think>weighing options</think>  Review attention masks today. ")).toEqual({
      kind: "ok",
      text: "Review attention masks today."
    });
  });

  it("uses the last end marker when there are several", () => {
    expect(extractFinalOutput("<think>a</think>draft</think> final")).toEqual({ kind: "ok", text: "final" });
  });

  it("reports reasoning-only replies", () => {
    expect(extractFinalOutput("<think>only thoughts</think>   ")).toEqual({ kind: "reasoning_only" });
  });

  it("reports unfinished reasoning", () => {
    expect(extractFinalOutput("<think>cut off mid-")).toEqual({ kind: "incomplete" });
  });

  it("trims replies without markers", () => {
    expect(extractFinalOutput("  plain insight \n")).toEqual({ kind: "ok", text: "plain insight" });
  });
});

describe("outcomeText", () => {
  it("maps outcomes to their text", () => {
    expect(outcomeText({ kind: "ok", text: "x" })).toBe("x");
    expect(outcomeText({ kind: "reasoning_only" })).toBe(
      "Error: Model only generated thinking process, no insight produced."
    );
    expect(outcomeText({ kind: "incomplete" })).toBe("Error: Incomplete response - thinking process not finished.");
    expect(REASONING_ONLY_TEXT).toBe(outcomeText({ kind: "reasoning_only" }));
    expect(INCOMPLETE_REASONING_TEXT).toBe(outcomeText({ kind: "incomplete" }));
  });
});
