import { describe, expect, it } from "vitest";
import { extractKeyPoints, summarizePage, truncateAtSentence } from "../summarizer.js";
import type { PageDetails } from "../types.js";

describe("truncateAtSentence", () => {
  it("should return content that already fits", () => {
    expect(truncateAtSentence("Short text.", 20)).toBe("Short text.");
  });

  it("should cut back to the last full stop", () => {
    expect(truncateAtSentence("First sentence. Second sentence.", 20)).toBe("First sentence.");
  });

  it("should close a prefix without any full stop", () => {
    expect(truncateAtSentence("abcdefghij", 5)).toBe("abcde.");
  });
});

describe("extractKeyPoints", () => {
  it("should prefer headings when there are at least three", () => {
    const headings = ["One", "Two", "Three", "Four", "Five", "Six"];
    expect(extractKeyPoints("ignored content", headings)).toEqual(["One", "Two", "Three", "Four", "Five"]);
  });

  it("should pick emphasised sentences and top up from across the text", () => {
    const content = [
      "This is the key finding of the study",
      "Weather was mild across the region today",
      "Another plain sentence without emphasis here",
    ].join(". ");

    expect(extractKeyPoints(content, ["Only heading"])).toEqual([
      "This is the key finding of the study",
      "Weather was mild across the region today",
      "Another plain sentence without emphasis here",
    ]);
  });

  it("should skip fragments too short to stand alone", () => {
    expect(extractKeyPoints("Too short. Tiny. Also brief.", [])).toEqual([]);
  });

  it("should keep at most five emphasised sentences", () => {
    const content = Array.from({ length: 7 }, (_, i) => `Sentence ${i} states an important result`).join(". ");

    expect(extractKeyPoints(content, [])).toHaveLength(5);
  });
});

describe("summarizePage", () => {
  const page: PageDetails = {
    url: "https://example.com/a",
    domain: "example.com",
    title: "Example",
    description: "",
    contentSnippet: "Alpha beta gamma. Delta epsilon zeta.",
    headings: ["Intro", "Usage", "Details", "Caveats"],
    keywords: [],
    isOfficial: false,
  };

  it("should summarise page content", () => {
    expect(summarizePage(page, 120)).toEqual({
      url: "https://example.com/a",
      title: "Example",
      summary: "Alpha beta gamma. Delta epsilon zeta.",
      keyPoints: ["Intro", "Usage", "Details", "Caveats"],
      wordCount: 6,
      contentLength: 37,
      headings: ["Intro", "Usage", "Details"],
      domain: "example.com",
    });
  });

  it("should truncate long content at a sentence", () => {
    expect(summarizePage(page, 25).summary).toBe("Alpha beta gamma.");
  });

  it("should handle a page with no content", () => {
    const summary = summarizePage({ ...page, contentSnippet: "", headings: [] }, 120);

    expect(summary.summary).toBe("");
    expect(summary.keyPoints).toEqual([]);
    expect(summary.wordCount).toBe(0);
  });
});
