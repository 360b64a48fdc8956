import { describe, it, expect } from "vitest";
import { OpenSearchInsightStore, buildInsightQuery } from "../../../src/services/insight-store.js";
import { FakeIndexOps } from "../../helpers/fakes.js";

function newInsight(contentId: string, relevance: number, createdAt: string, text = `Insight for ${contentId}`) {
  return {
    insight: text,
    content_id: contentId,
    title: `Title ${contentId}`,
    source_url: `https://example.com/${contentId}`,
    relevance_score: relevance,
    week: 3,
    created_at: createdAt
  };
}

describe("buildInsightQuery", () => {
  it("filters by content id and UTC day, newest first", () => {
    expect(buildInsightQuery({ contentId: "doc_1", date: "2026-10-19", limit: 5 })).toEqual({
      size: 5,
      query: {
        bool: {
          must: [{ match_all: {} }],
          filter: [
            { term: { content_id: "doc_1" } },
            { range: { created_at: { gte: "2026-10-19T00:00:00.000Z", lte: "2026-10-19T23:59:59.999Z" } } }
          ]
        }
      },
      sort: [{ created_at: { order: "desc" } }]
    });
  });

  it("ranks by match for text queries and defaults the limit", () => {
    expect(buildInsightQuery({ text: "  attention  " })).toEqual({
      size: 10,
      query: { bool: { must: [{ match: { insight: { query: "attention" } } }], filter: [] } }
    });
  });
});

describe("OpenSearchInsightStore", () => {
  it("assigns an id and creation time on save", async () => {
    const ops = new FakeIndexOps();
    const store = new OpenSearchInsightStore(ops, "coach-insights");
    const { created_at: _ignored, ...withoutTime } = newInsight("doc_1", 0.8, "");
    const saved = await store.save(withoutTime);
    expect(saved.id).toMatch(/^ins_/);
    expect(Number.isNaN(Date.parse(saved.created_at))).toBe(false);
    expect(ops.writes[0]).toMatchObject({ index: "coach-insights", id: saved.id, refresh: true });
  });

  it("returns a saved insight when queried by its content id", async () => {
    const store = new OpenSearchInsightStore(new FakeIndexOps(), "coach-insights");
    const saved = await store.save(newInsight("doc_1", 0.74, "2026-10-19T08:00:00.000Z"));
    await store.save(newInsight("doc_2", 0.5, "2026-10-19T09:00:00.000Z"));

    const found = await store.query({ contentId: "doc_1" });
    expect(found).toEqual([saved]);
    expect(found[0].relevance_score).toBe(0.74);
  });

  it("lists one UTC day newest first", async () => {
    const store = new OpenSearchInsightStore(new FakeIndexOps(), "coach-insights");
    await store.save(newInsight("doc_old", 0.9, "2026-10-18T23:59:59.000Z"));
    await store.save(newInsight("doc_a", 0.5, "2026-10-19T08:00:00.000Z"));
    await store.save(newInsight("doc_b", 0.6, "2026-10-19T10:00:00.000Z"));

    const today = await store.query({ date: "2026-10-19" });
    expect(today.map((i) => i.content_id)).toEqual(["doc_b", "doc_a"]);
  });

  it("lists nothing while the insights index does not exist", async () => {
    const ops = new FakeIndexOps();
    ops.missing.add("coach-insights");
    const store = new OpenSearchInsightStore(ops, "coach-insights");
    expect(await store.query({ date: "2026-10-19" })).toEqual([]);
  });

  it("skips stored documents that do not parse as insights", async () => {
    const ops = new FakeIndexOps();
    await ops.index("coach-insights", "broken", { insight: "attention without fields", relevance_score: "high" });
    const store = new OpenSearchInsightStore(ops, "coach-insights");
    await store.save(newInsight("doc_1", 0.7, "2026-10-19T08:00:00.000Z", "Practice attention masking"));

    const found = await store.query({ text: "attention" });
    expect(found.map((i) => i.content_id)).toEqual(["doc_1"]);
  });
});
