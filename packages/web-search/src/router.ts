/**
 * WebSearchRouter: provider registry + fallback chain.
 */

import { createLogger, type Logger } from "@sift/core";
import { SearchAllProvidersFailedError, SearchInvalidQueryError } from "@sift/errors";
import { createSearchProvider } from "./providers/index.js";
import type {
  SearchBackend,
  SearchBatch,
  SearchProviderConfig,
  SearchRequest,
  WebSearchProvider,
} from "./types.js";
import { validateQuery } from "./validation.js";

export interface WebSearchRouterOptions {
  readonly logger?: Logger;
}

export class WebSearchRouter implements SearchBackend {
  private readonly providers: readonly WebSearchProvider[];
  private readonly logger: Logger;

  constructor(providers: readonly WebSearchProvider[], options: WebSearchRouterOptions = {}) {
    this.providers = providers;
    this.logger = options.logger ?? createLogger("web-search");
  }

  /** Provider ids in fallback order */
  get providerIds(): readonly string[] {
    return this.providers.map((provider) => provider.id);
  }

  async fetch(request: SearchRequest, signal?: AbortSignal): Promise<SearchBatch> {
    const trimmed = validateQuery(request.query);
    if (trimmed === "") {
      throw new SearchInvalidQueryError(request.query);
    }

    const options = {
      count: request.count,
      offset: request.offset,
      timePeriod: request.timePeriod,
    };

    const failedProviders: string[] = [];
    let lastError: Error | undefined;

    for (const provider of this.providers) {
      if (signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }

      try {
        return await provider.search(trimmed, options, signal);
      } catch (error) {
        if (error instanceof DOMException && error.name === "AbortError") {
          throw error;
        }
        failedProviders.push(provider.id);
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(`provider "${provider.id}" failed: ${lastError.message}`);
      }
    }

    throw new SearchAllProvidersFailedError(failedProviders, lastError);
  }
}

/**
 * Build a router from provider configurations.
 */
export function createWebSearchRouter(
  providers: readonly SearchProviderConfig[],
  maxSnippetLength?: number,
  options: WebSearchRouterOptions = {},
): WebSearchRouter {
  return new WebSearchRouter(
    providers.map((config) => createSearchProvider(config, maxSnippetLength)),
    options,
  );
}
