/**
 * Provider factory: creates providers from configuration.
 */

import { SearchProviderError } from "@sift/errors";
import type { SearchProviderConfig, WebSearchProvider } from "../types.js";
import { createDuckDuckGoLiteProvider } from "./duckduckgo-lite.js";

export {
  createDuckDuckGoLiteProvider,
  extractRelatedQueries,
  parseLiteResults,
  unwrapRedirect,
} from "./duckduckgo-lite.js";

/**
 * Create a search provider from configuration.
 *
 * @param maxSnippetLength - Maximum snippet length (default 300)
 */
export function createSearchProvider(
  config: SearchProviderConfig,
  maxSnippetLength?: number,
): WebSearchProvider {
  switch (config.provider) {
    case "duckduckgo":
      return createDuckDuckGoLiteProvider(config, maxSnippetLength);
    default:
      throw new SearchProviderError(
        String(config.provider),
        `Unknown provider: "${String(config.provider)}". Supported: duckduckgo`,
      );
  }
}
