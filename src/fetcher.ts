import createFetch from "make-fetch-happen";
import { FetchError } from "./errors.js";
import { createLimiter } from "./util.js";

/**
 * Retrieves the raw text behind a locator, or fails with a `FetchError`.
 */
export interface Fetcher {
  fetch(locator: string): Promise<string>;
}

export interface HttpFetcherOptions {
  cachePath?: string;
  retries?: number;
  // Milliseconds per request
  timeout?: number;
  // Requests in flight at once, across every caller of this fetcher
  concurrency?: number;
}

/**
 * Fetcher backed by make-fetch-happen, with an HTTP cache, retries and a
 * bounded number of concurrent requests.
 */
export function createHttpFetcher({
  cachePath = "node_modules/.cache",
  retries = 3,
  timeout = 30_000,
  concurrency = 4,
}: HttpFetcherOptions = {}): Fetcher {
  const fetch = createFetch.defaults({
    cachePath,
    // Realtime files change every few minutes; revalidate instead of trusting the cache
    cache: "no-cache",
    retry: retries,
    timeout,
  });
  const limit = createLimiter(concurrency);

  return {
    fetch: (locator) =>
      limit(async () => {
        const response = await fetch(locator).catch((error: unknown) => {
          throw isTimeout(error)
            ? new FetchError("timeout", locator, "Request timed out", {
                cause: error,
              })
            : new FetchError("server-error", locator, "Request failed", {
                cause: error,
              });
        });

        if (response.status === 404 || response.status === 410) {
          throw new FetchError("not-found", locator, "Not found");
        }
        if (response.status === 408 || response.status === 504) {
          throw new FetchError("timeout", locator, `HTTP ${response.status}`);
        }
        if (!response.ok) {
          throw new FetchError(
            "server-error",
            locator,
            `HTTP ${response.status} ${response.statusText}`,
          );
        }

        const body = await response.text();
        if (body.trim() === "") {
          throw new FetchError("not-found", locator, "Empty response");
        }
        return body;
      }),
  };
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "request-timeout"
  );
}
