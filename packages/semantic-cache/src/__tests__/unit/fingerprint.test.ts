import { describe, expect, it } from "vitest";
import { embedQuery, makeKey } from "../../fingerprint.js";
import { INTENT_TTL_SECONDS, resolveTtl } from "../../freshness.js";
import type { KeyParts } from "../../types.js";

const baseParts: KeyParts = {
  intent: "general",
  embeddingSignature: "abc",
  count: 10,
  offset: 0,
  page: 1,
  getRelated: false,
};

describe("embedQuery", () => {
  it("should produce a 24-character hex signature", () => {
    expect(embedQuery("hello")).toBe("2cf24dba5fb0a30e26e83b2a");
  });

  it("should be case-insensitive", () => {
    expect(embedQuery("Rust Async Runtime")).toBe(embedQuery("rust async runtime"));
  });

  it("should distinguish different queries", () => {
    expect(embedQuery("rust")).not.toBe(embedQuery("go"));
  });
});

describe("makeKey", () => {
  it("should use placeholders for absent optional parts", () => {
    expect(makeKey(baseParts)).toBe("general|abc|10|0|1|*|*|plain|0");
  });

  it("should include every provided part", () => {
    const key = makeKey({
      ...baseParts,
      intent: "news",
      site: "example.com",
      timePeriod: "week",
      getRelated: true,
      relatedCount: 5,
      offset: 20,
      page: 3,
    });
    expect(key).toBe('news|abc|10|20|3|"example.com"|"week"|related|5');
  });

  it("should be deterministic", () => {
    expect(makeKey(baseParts)).toBe(makeKey({ ...baseParts }));
  });

  it("should treat an empty site like an absent one", () => {
    expect(makeKey({ ...baseParts, site: "" })).toBe(makeKey(baseParts));
  });

  it("should not confuse a literal wildcard site with an absent one", () => {
    expect(makeKey({ ...baseParts, site: "*" })).toBe('general|abc|10|0|1|"*"|*|plain|0');
    expect(makeKey({ ...baseParts, site: "*" })).not.toBe(makeKey(baseParts));
    expect(makeKey({ ...baseParts, timePeriod: "*" })).not.toBe(makeKey(baseParts));
  });

  it("should separate requests that differ only in paging", () => {
    expect(makeKey({ ...baseParts, page: 2, offset: 10 })).not.toBe(makeKey(baseParts));
  });
});

describe("resolveTtl", () => {
  it("should expose the per-intent windows", () => {
    expect(INTENT_TTL_SECONDS).toEqual({
      news: 900,
      technical: 86_400,
      shopping: 21_600,
      academic: 129_600,
      finance: 10_800,
      local: 7_200,
      general: 21_600,
    });
  });

  it("should fall back to the general window for unknown intents", () => {
    expect(resolveTtl("weather")).toBe(21_600);
  });

  it("should prefer overrides", () => {
    expect(resolveTtl("news", { news: 60 })).toBe(60);
    expect(resolveTtl("finance", { news: 60 })).toBe(10_800);
  });
});
