/**
 * Zod schema for cache configuration.
 */

import type { Clock } from "@sift/core";
import { ConfigInvalidError } from "@sift/errors";
import { z } from "zod";
import { DEFAULT_MAX_ENTRIES, FingerprintCache, fromConfig } from "./cache.js";
import type { CachePayload, SemanticCacheConfig } from "./types.js";

const ttlSeconds = z.number().positive({ message: "TTL must be a positive number of seconds" });

export const SemanticCacheConfigSchema = z.object({
  maxEntries: z
    .number()
    .int()
    .min(1, { message: "maxEntries must be at least 1" })
    .default(DEFAULT_MAX_ENTRIES),
  ttlOverrides: z
    .object({
      news: ttlSeconds.optional(),
      technical: ttlSeconds.optional(),
      shopping: ttlSeconds.optional(),
      academic: ttlSeconds.optional(),
      finance: ttlSeconds.optional(),
      local: ttlSeconds.optional(),
      general: ttlSeconds.optional(),
    })
    .strict()
    .default({}),
});

export type SemanticCacheConfigInput = z.input<typeof SemanticCacheConfigSchema>;

/**
 * Validate raw cache configuration.
 * @throws ConfigInvalidError listing every offending field
 */
export function validateSemanticCacheConfig(config: unknown): SemanticCacheConfig {
  const parsed = SemanticCacheConfigSchema.safeParse(config ?? {});
  if (!parsed.success) {
    throw ConfigInvalidError.fromSchemaIssues("semantic-cache", parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Factory: creates a FingerprintCache from validated configuration.
 */
export function createSemanticCache<P extends CachePayload = CachePayload>(
  config: SemanticCacheConfigInput = {},
  clock?: Clock,
): FingerprintCache<P> {
  return fromConfig<P>(validateSemanticCacheConfig(config), clock);
}
