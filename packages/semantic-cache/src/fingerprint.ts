import { createHash } from "node:crypto";
import type { KeyParts } from "./types.js";

const SIGNATURE_LENGTH = 24;

/**
 * Stable signature of a query: sha256 over the lower-cased text, hex,
 * truncated to 24 characters. Case-insensitive by construction.
 */
export function embedQuery(query: string): string {
  return createHash("sha256").update(query.toLowerCase(), "utf8").digest("hex").slice(0, SIGNATURE_LENGTH);
}

/** Free-form parts are JSON-quoted so no value can equal the "*" placeholder. */
function optionalPart(value: string | undefined): string {
  return value !== undefined && value !== "" ? JSON.stringify(value) : "*";
}

/**
 * Build the cache key from request attributes. Absent optional parts use
 * fixed placeholders so distinct requests never collide.
 */
export function makeKey(parts: KeyParts): string {
  return [
    parts.intent,
    parts.embeddingSignature,
    String(parts.count),
    String(parts.offset),
    String(parts.page),
    optionalPart(parts.site),
    optionalPart(parts.timePeriod),
    parts.getRelated ? "related" : "plain",
    String(parts.relatedCount ?? 0),
  ].join("|");
}
