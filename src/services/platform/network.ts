/**
 * Network layer interface and implementation.
 *
 * HttpClient is the only network seam: retries, redirect limits and
 * idle timeouts live in the ResilientFetcher built on top of it.
 */

import { getErrorMessage } from "../../shared/error-utils.js";
import type { Logger } from "../logging/index.js";

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Time allowed until response headers arrive, in milliseconds. Default: 30000 */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Extra request headers */
  readonly headers?: Readonly<Record<string, string>>;
  /**
   * "manual" returns 3xx responses as-is so the caller can count hops.
   * Default: "follow"
   */
  readonly redirect?: "follow" | "manual";
}

/**
 * HTTP client for making GET requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   *
   * The timeout only covers the wait for response headers. Body reads are
   * not bounded by it.
   *
   * @param url - URL to fetch
   * @param options - Request options
   * @returns Response object
   * @throws DOMException with name "AbortError" on timeout or abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(url, {
   *   timeout: 30_000,
   *   headers: { "User-Agent": "squirrelscan-installer" },
   *   redirect: "manual",
   * });
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

export interface NetworkLayerConfig {
  /** Used when a request names no timeout. Default: 30000 */
  readonly defaultTimeout?: number;
}

/**
 * Abort `target` when `source` aborts. Returns the unlink function.
 */
function forwardAbort(source: AbortSignal | undefined, target: AbortController): () => void {
  if (source === undefined) return () => undefined;
  const onAbort = (): void => target.abort();
  if (source.aborted) {
    target.abort();
    return () => undefined;
  }
  source.addEventListener("abort", onAbort, { once: true });
  return () => source.removeEventListener("abort", onAbort);
}

/**
 * HttpClient over the runtime's global fetch (undici on Node.js).
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly defaultTimeout: number;

  constructor(
    private readonly logger: Logger,
    config: NetworkLayerConfig = {}
  ) {
    this.defaultTimeout = config.defaultTimeout ?? 30_000;
  }

  async fetch(url: string, options: HttpRequestOptions = {}): Promise<Response> {
    const controller = new AbortController();
    const headerTimer = setTimeout(
      () => controller.abort(),
      options.timeout ?? this.defaultTimeout
    );
    const unlink = forwardAbort(options.signal, controller);

    const redirect = options.redirect ?? "follow";
    const init: RequestInit = {
      method: "GET",
      signal: controller.signal,
      redirect,
      ...(options.headers !== undefined && { headers: { ...options.headers } }),
    };

    this.logger.debug("GET", { url, redirect });
    try {
      const response = await fetch(url, init);
      this.logger.debug("Response", { url, status: response.status });
      return response;
    } catch (error) {
      this.logger.warn("Request failed", { url, error: getErrorMessage(error) });
      throw error;
    } finally {
      clearTimeout(headerTimer);
      unlink();
    }
  }
}
