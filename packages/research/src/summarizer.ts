/**
 * Extractive summaries: a sentence-bounded prefix of the page content plus
 * a handful of key points.
 */

import type { PageDetails, PageSummary } from "./types.js";

const MAX_KEY_POINTS = 5;
const MIN_KEY_POINT_LENGTH = 21;
const SUMMARY_HEADINGS = 3;
const EMPHASIS_WORDS = ["important", "key", "significant", "main", "primary", "crucial", "essential"];

/**
 * Truncate at the last full stop within `maxLength`. Content that already
 * fits is returned unchanged.
 */
export function truncateAtSentence(content: string, maxLength: number): string {
  if (content.length <= maxLength) return content;
  const prefix = content.slice(0, maxLength);
  const lastStop = prefix.lastIndexOf(".");
  return `${lastStop >= 0 ? prefix.slice(0, lastStop) : prefix}.`;
}

/**
 * Key points: the page's headings when it has at least three; otherwise
 * sentences using emphasis words, topped up with sentences from the start,
 * a third and two thirds of the way through.
 */
export function extractKeyPoints(content: string, headings: readonly string[]): string[] {
  if (headings.length >= 3) {
    return headings.slice(0, MAX_KEY_POINTS);
  }

  const sentences = content
    .split(".")
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length >= MIN_KEY_POINT_LENGTH);
  const points: string[] = [];
  const add = (sentence: string | undefined) => {
    if (sentence !== undefined && !points.includes(sentence)) points.push(sentence);
  };

  for (const sentence of sentences) {
    const lowered = sentence.toLowerCase();
    if (EMPHASIS_WORDS.some((word) => lowered.includes(word))) add(sentence);
  }

  if (points.length < 3 && sentences.length > 0) {
    add(sentences[0]);
    add(sentences[Math.floor(sentences.length / 3)]);
    add(sentences[Math.floor((sentences.length * 2) / 3)]);
  }

  return points.slice(0, MAX_KEY_POINTS);
}

function countWords(content: string): number {
  return content.split(/\s+/).filter((word) => word !== "").length;
}

export function summarizePage(page: PageDetails, maxLength: number): PageSummary {
  return {
    url: page.url,
    title: page.title,
    summary: truncateAtSentence(page.contentSnippet, maxLength),
    keyPoints: extractKeyPoints(page.contentSnippet, page.headings),
    wordCount: countWords(page.contentSnippet),
    contentLength: page.contentSnippet.length,
    headings: page.headings.slice(0, SUMMARY_HEADINGS),
    domain: page.domain,
  };
}
