/**
 * Zod schemas for configuration, requests and tool input.
 */

import { ConfigInvalidError, toValidationIssues, ValidationError } from "@sift/errors";
import { SEARCH_INTENTS, SemanticCacheConfigSchema } from "@sift/semantic-cache";
import { z } from "zod";
import {
  DEFAULT_COUNT,
  DEFAULT_DEV_TOOL_NAME,
  DEFAULT_FACT_CHECK_TOOL_NAME,
  DEFAULT_LOCATION_TOOL_NAME,
  DEFAULT_MAX_SNIPPET_LENGTH,
  DEFAULT_RELATED_TOOL_NAME,
  DEFAULT_TOOL_NAME,
  type SearchRequest,
} from "./types.js";

export const MAX_QUERY_LENGTH = 400;

const queryField = z
  .string()
  .trim()
  .min(1, { message: "query must not be empty" })
  .max(MAX_QUERY_LENGTH, { message: `query must be at most ${MAX_QUERY_LENGTH} characters` });

export const TimePeriodSchema = z.enum(["day", "week", "month", "year"]);

export const SearchIntentSchema = z.enum(SEARCH_INTENTS);

export const SearchProviderConfigSchema = z.object({
  provider: z.literal("duckduckgo"),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(1000).max(60_000).optional(),
  region: z.string().min(1).optional(),
});

export const WebSearchConfigSchema = z.object({
  providers: z.array(SearchProviderConfigSchema).min(1).default([{ provider: "duckduckgo" }]),
  maxSnippetLength: z.number().int().min(50).max(5000).default(DEFAULT_MAX_SNIPPET_LENGTH),
  toolName: z.string().min(1).default(DEFAULT_TOOL_NAME),
  relatedToolName: z.string().min(1).default(DEFAULT_RELATED_TOOL_NAME),
  devToolName: z.string().min(1).default(DEFAULT_DEV_TOOL_NAME),
  locationToolName: z.string().min(1).default(DEFAULT_LOCATION_TOOL_NAME),
  factCheckToolName: z.string().min(1).default(DEFAULT_FACT_CHECK_TOOL_NAME),
  cache: SemanticCacheConfigSchema.default({}),
});

export type WebSearchConfigInput = z.input<typeof WebSearchConfigSchema>;
export type WebSearchConfig = z.output<typeof WebSearchConfigSchema>;

export const SearchRequestSchema = z.object({
  query: queryField,
  count: z.number().int().min(1).max(20).default(DEFAULT_COUNT),
  page: z.number().int().min(1).default(1),
  offset: z.number().int().min(0).optional(),
  site: z.string().trim().min(1).optional(),
  timePeriod: TimePeriodSchema.optional(),
  intent: SearchIntentSchema.optional(),
  getRelated: z.boolean().default(false),
  relatedCount: z.number().int().min(1).max(20).optional(),
});

export type SearchRequestInput = z.input<typeof SearchRequestSchema>;

export const WebSearchToolInputSchema = z.object({
  query: queryField,
  count: z.number().int().min(1).max(20).default(DEFAULT_COUNT),
  page: z.number().int().min(1).default(1),
  site: z.string().trim().min(1).optional(),
  timePeriod: TimePeriodSchema.optional(),
});

export type WebSearchToolInput = z.output<typeof WebSearchToolInputSchema>;

export const RelatedSearchesInputSchema = z.object({
  query: queryField,
  count: z.number().int().min(1).max(10).default(5),
});

export type RelatedSearchesInput = z.output<typeof RelatedSearchesInputSchema>;

const optionalTerm = z.string().trim().min(1).optional();

export const DevSearchInputSchema = z.object({
  query: queryField,
  language: optionalTerm,
  framework: optionalTerm,
  site: optionalTerm,
  count: z.number().int().min(1).max(20).default(DEFAULT_COUNT),
});

export type DevSearchInput = z.output<typeof DevSearchInputSchema>;

export const LocationSearchInputSchema = z.object({
  query: queryField,
  location: z.string().trim().min(1, { message: "location must not be empty" }),
  serviceType: optionalTerm,
  radiusKm: z.number().int().min(1).max(50).optional(),
  count: z.number().int().min(1).max(20).default(DEFAULT_COUNT),
});

export type LocationSearchInput = z.output<typeof LocationSearchInputSchema>;

export const MAX_STATEMENT_LENGTH = 500;

export const FactCheckInputSchema = z.object({
  statement: z
    .string()
    .trim()
    .min(1, { message: "statement must not be empty" })
    .max(MAX_STATEMENT_LENGTH, {
      message: `statement must be at most ${MAX_STATEMENT_LENGTH} characters`,
    }),
  minSources: z.number().int().min(1).max(10).default(3),
});

export type FactCheckInput = z.output<typeof FactCheckInputSchema>;

/**
 * Validate that a query is non-empty after trimming.
 * @returns Trimmed query string, or empty string if invalid.
 */
export function validateQuery(query: unknown): string {
  if (typeof query !== "string" || query.trim().length === 0) {
    return "";
  }
  return query.trim();
}

/**
 * Parse input against a schema.
 * @throws ValidationError listing every offending field
 */
export function parseInput<O>(
  schema: z.ZodType<O, z.ZodTypeDef, unknown>,
  input: unknown,
  what: string,
): O {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error.issues);
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
    throw new ValidationError(`Invalid ${what}: ${summary}`, issues);
  }
  return parsed.data;
}

/**
 * Resolve a search request: defaults applied, offset derived from page.
 */
export function toSearchRequest(input: SearchRequestInput): SearchRequest {
  const parsed = parseInput(SearchRequestSchema, input, "search request");
  return {
    ...parsed,
    offset: parsed.offset ?? (parsed.page - 1) * parsed.count,
  };
}

/**
 * Validate web search configuration.
 * @throws ConfigInvalidError listing every offending field
 */
export function validateWebSearchConfig(config: unknown): WebSearchConfig {
  const parsed = WebSearchConfigSchema.safeParse(config ?? {});
  if (!parsed.success) {
    throw ConfigInvalidError.fromSchemaIssues("web-search", parsed.error.issues);
  }
  return parsed.data;
}
