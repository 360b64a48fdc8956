import { describe, it, expect } from "vitest";
import { makeSourceId } from "../../../src/services/ids.js";
import { OpenSearchSourceStore } from "../../../src/services/source-store.js";
import { FakeIndexOps } from "../../helpers/fakes.js";

describe("OpenSearchSourceStore", () => {
  it("keys sources by URL and keeps the first registration time", async () => {
    const ops = new FakeIndexOps();
    const store = new OpenSearchSourceStore(ops, "coach-sources");
    await ops.index("coach-sources", makeSourceId("https://example.com/feed"), {
      source_url: "https://example.com/feed",
      source_type: "rss",
      tags: ["ml"],
      created_at: "2026-10-01T00:00:00.000Z"
    });

    const { source, created } = await store.add(" https://example.com/feed ", "blog", ["nlp", "nlp"]);
    expect(created).toBe(false);
    expect(source).toEqual({
      id: makeSourceId("https://example.com/feed"),
      source_url: "https://example.com/feed",
      source_type: "blog",
      tags: ["nlp"],
      created_at: "2026-10-01T00:00:00.000Z"
    });
    expect(ops.writes[1]).toMatchObject({ index: "coach-sources", id: source.id, refresh: true });
  });

  it("lists oldest first, filtered by type, skipping malformed documents", async () => {
    const ops = new FakeIndexOps();
    const store = new OpenSearchSourceStore(ops, "coach-sources");
    await ops.index("coach-sources", "src_b", {
      source_url: "https://example.com/b",
      source_type: "rss",
      tags: [],
      created_at: "2026-10-02T00:00:00.000Z"
    });
    await ops.index("coach-sources", "src_a", {
      source_url: "https://example.com/a",
      source_type: "rss",
      tags: "ml",
      created_at: "2026-10-01T00:00:00.000Z"
    });
    await ops.index("coach-sources", "src_c", { source_url: "https://example.com/c", source_type: "blog" });

    const rss = await store.list("rss");
    expect(rss.map((s) => s.id)).toEqual(["src_a", "src_b"]);
    expect(rss[0].tags).toEqual([]);
    expect((await store.list()).map((s) => s.id)).toEqual(["src_a", "src_b"]);
    expect(ops.searches[0].body).toMatchObject({ size: 100, query: { term: { source_type: "rss" } } });
  });

  it("lists nothing and registers normally before the index exists", async () => {
    const ops = new FakeIndexOps();
    ops.missing.add("coach-sources");
    const store = new OpenSearchSourceStore(ops, "coach-sources");
    expect(await store.list()).toEqual([]);

    const { created } = await store.add("https://example.com/new", "rss", []);
    expect(created).toBe(true);
    expect(await store.list()).toHaveLength(1);
  });
});
