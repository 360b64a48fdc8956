import { describe, it, expect } from "vitest";
import { isIndexNotFound, withRetries } from "../../../src/services/os-client.js";
import { IndexNotFoundError } from "../../helpers/fakes.js";

describe("isIndexNotFound", () => {
  it("recognizes 404 responses by status code or error type", () => {
    expect(isIndexNotFound(new IndexNotFoundError("coach-progress"))).toBe(true);
    expect(isIndexNotFound(Object.assign(new Error("Response Error"), { meta: { statusCode: 404 } }))).toBe(true);
    expect(isIndexNotFound(new Error("index_not_found_exception: no such index [coach-sources]"))).toBe(true);
  });

  it("rejects other failures", () => {
    expect(isIndexNotFound(new Error("connect ECONNREFUSED"))).toBe(false);
    expect(isIndexNotFound(Object.assign(new Error("Response Error"), { meta: { statusCode: 503 } }))).toBe(false);
    expect(isIndexNotFound("index_not_found_exception")).toBe(false);
  });
});

describe("withRetries", () => {
  it("retries transient failures until one succeeds", async () => {
    let calls = 0;
    const result = await withRetries(
      async () => {
        calls++;
        if (calls < 3) throw new Error("socket hang up");
        return "ok";
      },
      3,
      1
    );
    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("gives up after the last attempt", async () => {
    let calls = 0;
    await expect(
      withRetries(
        async () => {
          calls++;
          throw new Error("socket hang up");
        },
        2,
        1
      )
    ).rejects.toThrow("socket hang up");
    expect(calls).toBe(2);
  });

  it("does not retry a missing index", async () => {
    let calls = 0;
    await expect(
      withRetries(async () => {
        calls++;
        throw new IndexNotFoundError("coach-progress");
      })
    ).rejects.toBeInstanceOf(IndexNotFoundError);
    expect(calls).toBe(1);
  });
});
