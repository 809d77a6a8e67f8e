/**
 * Shared HTTP utility: fetch + timeout + error classification.
 */

import { SearchProviderError, SearchRateLimitedError } from "@sift/errors";
import { DEFAULT_TIMEOUT_MS } from "./types.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * User agent sent with outgoing requests; SIFT_USER_AGENT overrides the default.
 */
export function resolveUserAgent(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SIFT_USER_AGENT?.trim();
  return override !== undefined && override !== "" ? override : DEFAULT_USER_AGENT;
}

/** Request shape accepted by fetchText */
export interface FetchTextInit {
  readonly method?: "GET" | "POST";
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * Fetch a URL as text with timeout and error classification.
 *
 * @param source - Provider or component identifier for error context
 * @param timeoutMs - Request timeout in milliseconds (default 10_000)
 * @param signal - Optional external abort signal; its abort is rethrown as-is
 * @throws SearchRateLimitedError on HTTP 429
 * @throws SearchProviderError on any other non-2xx status, timeout or network failure
 */
export async function fetchText(
  source: string,
  url: string,
  init: FetchTextInit,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
  signal?: AbortSignal,
): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  // Link external signal to internal controller
  const onExternalAbort = () => controller.abort();
  signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: init.method ?? "GET",
      headers: { "User-Agent": resolveUserAgent(), ...init.headers },
      ...(init.body !== undefined ? { body: init.body } : {}),
      signal: controller.signal,
    });

    if (response.status === 429) {
      throw new SearchRateLimitedError(source);
    }

    if (!response.ok) {
      throw new SearchProviderError(source, `HTTP ${response.status}`);
    }

    return await response.text();
  } catch (error) {
    if (error instanceof SearchRateLimitedError || error instanceof SearchProviderError) {
      throw error;
    }

    if (error instanceof DOMException && error.name === "AbortError") {
      if (signal?.aborted) {
        throw error;
      }
      throw new SearchProviderError(source, `Request timed out after ${timeoutMs}ms`);
    }

    throw new SearchProviderError(
      source,
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined,
    );
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}
