/**
 * ResilientFetcher - the single network boundary of the installer.
 *
 * Wraps HttpClient with:
 * - Manual redirect following with a hop limit
 * - A request/idle timeout distinct from an overall per-attempt deadline
 * - A fixed number of attempts with a fixed delay in between
 */

import { NetworkError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { HttpClient } from "../platform/network.js";
import { toError } from "../../shared/error-utils.js";

/** User-Agent sent with every request. */
export const USER_AGENT = "squirrelscan-installer";

/**
 * Fetcher tuning. All durations in milliseconds.
 */
export interface ResilientFetcherConfig {
  /** Total attempts per URL. Default: 3 */
  readonly attempts?: number;
  /** Fixed delay between attempts. Default: 2000 */
  readonly retryDelayMs?: number;
  /** Time allowed for response headers, and for each gap between body chunks. Default: 30000 */
  readonly requestTimeoutMs?: number;
  /** Overall deadline for one attempt, body included. Default: 120000 */
  readonly maxDurationMs?: number;
  /** Redirect hops followed before giving up. Default: 10 */
  readonly maxRedirects?: number;
}

/**
 * Download progress, reported after every body chunk.
 */
export interface DownloadProgress {
  readonly bytesDownloaded: number;
  /** From Content-Length; null when the server did not send one */
  readonly totalBytes: number | null;
}

/**
 * Details of a failed attempt that will be retried.
 */
export interface RetryInfo {
  readonly url: string;
  /** 1-based number of the attempt that failed */
  readonly attempt: number;
  readonly attempts: number;
  readonly error: NetworkError;
}

export interface FetchOptions {
  /** Accept header. Default: "*\/*" */
  readonly accept?: string;
  readonly onProgress?: (progress: DownloadProgress) => void;
  readonly onRetry?: (info: RetryInfo) => void;
}

const DEFAULTS: Required<ResilientFetcherConfig> = {
  attempts: 3,
  retryDelayMs: 2000,
  requestTimeoutMs: 30_000,
  maxDurationMs: 120_000,
  maxRedirects: 10,
};

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/**
 * Whether another attempt could plausibly succeed.
 * Transport failures, timeouts, 5xx, 408 and 429 qualify; other 4xx and
 * redirect loops do not.
 */
export function isRetryable(error: NetworkError): boolean {
  switch (error.errorCode) {
    case "NETWORK_ERROR":
    case "TIMEOUT":
      return true;
    case "HTTP_STATUS": {
      const status = error.status ?? 0;
      return status >= 500 || status === 408 || status === 429;
    }
    case "TOO_MANY_REDIRECTS":
      return false;
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseContentLength(value: string | null): number | null {
  if (value === null) return null;
  const length = Number(value);
  return Number.isSafeInteger(length) && length >= 0 ? length : null;
}

/**
 * Fetches bytes with retries and redirect handling.
 *
 * @example
 * const fetcher = new ResilientFetcher(httpClient, loggingService.createLogger("fetcher"));
 * const bytes = await fetcher.fetchBytes(artifactUrl, {
 *   onProgress: ({ bytesDownloaded, totalBytes }) => reporter.progress(bytesDownloaded, totalBytes),
 * });
 */
export class ResilientFetcher {
  private readonly config: Required<ResilientFetcherConfig>;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly logger: Logger,
    config: ResilientFetcherConfig = {}
  ) {
    this.config = { ...DEFAULTS, ...config };
  }

  /**
   * Fetch a URL's body as bytes.
   *
   * @throws NetworkError after the last attempt, or at once for a non-retryable status
   */
  async fetchBytes(url: string, options: FetchOptions = {}): Promise<Buffer> {
    const { attempts, retryDelayMs } = this.config;

    for (let attempt = 1; ; attempt++) {
      try {
        const bytes = await this.attempt(url, options);
        this.logger.debug("Fetched", { url, bytes: bytes.length, attempt });
        return bytes;
      } catch (error) {
        const failure =
          error instanceof NetworkError
            ? error
            : new NetworkError(
                url,
                getErrorMessage(error),
                "NETWORK_ERROR",
                undefined,
                toError(error)
              );

        if (attempt >= attempts || !isRetryable(failure)) {
          this.logger.warn("Fetch failed", {
            url,
            attempt,
            code: failure.errorCode,
            status: failure.status ?? null,
            error: failure.message,
          });
          throw new NetworkError(
            url,
            `Failed to fetch ${url} (attempt ${attempt}/${attempts}): ${failure.message}`,
            failure.errorCode,
            failure.status,
            failure
          );
        }

        this.logger.warn("Fetch failed, retrying", {
          url,
          attempt,
          attempts,
          error: failure.message,
        });
        options.onRetry?.({ url, attempt, attempts, error: failure });
        await delay(retryDelayMs);
      }
    }
  }

  /**
   * Fetch a URL's body as UTF-8 text.
   */
  async fetchText(url: string, options: FetchOptions = {}): Promise<string> {
    return (await this.fetchBytes(url, options)).toString("utf-8");
  }

  private async attempt(url: string, options: FetchOptions): Promise<Buffer> {
    const deadline = new AbortController();
    const deadlineTimer = setTimeout(() => deadline.abort(), this.config.maxDurationMs);

    try {
      let current = url;
      for (let hops = 0; ; hops++) {
        const response = await this.request(current, options, deadline.signal);

        if (REDIRECT_STATUSES.has(response.status)) {
          const location = response.headers.get("location");
          await response.body?.cancel();
          if (location === null) {
            throw new NetworkError(
              current,
              `HTTP ${response.status} redirect without a Location header`,
              "HTTP_STATUS",
              response.status
            );
          }
          if (hops >= this.config.maxRedirects) {
            throw new NetworkError(
              url,
              `Too many redirects (more than ${this.config.maxRedirects})`,
              "TOO_MANY_REDIRECTS"
            );
          }
          const next = new URL(location, current).toString();
          this.logger.debug("Redirect", { from: current, to: next, status: response.status });
          current = next;
          continue;
        }

        if (!response.ok) {
          await response.body?.cancel();
          throw new NetworkError(
            current,
            `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
            "HTTP_STATUS",
            response.status
          );
        }

        return await this.readBody(current, response, deadline.signal, options.onProgress);
      }
    } finally {
      clearTimeout(deadlineTimer);
    }
  }

  private async request(
    url: string,
    options: FetchOptions,
    deadline: AbortSignal
  ): Promise<Response> {
    try {
      return await this.httpClient.fetch(url, {
        timeout: this.config.requestTimeoutMs,
        signal: deadline,
        redirect: "manual",
        headers: {
          "User-Agent": USER_AGENT,
          Accept: options.accept ?? "*/*",
        },
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw this.timeoutError(url, deadline.aborted ? "deadline" : "request");
      }
      throw new NetworkError(
        url,
        getErrorMessage(error),
        "NETWORK_ERROR",
        undefined,
        toError(error)
      );
    }
  }

  /**
   * Read the body chunk by chunk so that a stalled stream trips the idle
   * timeout instead of hanging until the overall deadline.
   */
  private async readBody(
    url: string,
    response: Response,
    deadline: AbortSignal,
    onProgress: FetchOptions["onProgress"]
  ): Promise<Buffer> {
    const body = response.body;
    if (body === null) {
      return Buffer.alloc(0);
    }

    const totalBytes = parseContentLength(response.headers.get("content-length"));
    const reader = body.getReader();
    const chunks: Uint8Array[] = [];
    let bytesDownloaded = 0;
    let stalled: "idle" | "deadline" | null = null;

    const stop = (reason: "idle" | "deadline"): void => {
      stalled ??= reason;
      reader.cancel().catch((error: unknown) => {
        this.logger.silly("Cancel after stall failed", { url, error: getErrorMessage(error) });
      });
    };
    const onDeadline = (): void => stop("deadline");

    let idleTimer = setTimeout(() => stop("idle"), this.config.requestTimeoutMs);
    deadline.addEventListener("abort", onDeadline);
    if (deadline.aborted) onDeadline();

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done || stalled !== null) break;
        chunks.push(value);
        bytesDownloaded += value.length;
        onProgress?.({ bytesDownloaded, totalBytes });
        clearTimeout(idleTimer);
        idleTimer = setTimeout(() => stop("idle"), this.config.requestTimeoutMs);
      }
    } catch (error) {
      if (stalled === null) {
        throw new NetworkError(
          url,
          `Download interrupted: ${getErrorMessage(error)}`,
          "NETWORK_ERROR",
          undefined,
          toError(error)
        );
      }
    } finally {
      clearTimeout(idleTimer);
      deadline.removeEventListener("abort", onDeadline);
    }

    if (stalled !== null) {
      throw this.timeoutError(url, stalled);
    }
    return Buffer.concat(chunks);
  }

  private timeoutError(url: string, kind: "request" | "idle" | "deadline"): NetworkError {
    const { requestTimeoutMs, maxDurationMs } = this.config;
    const message =
      kind === "deadline"
        ? `Timed out after ${maxDurationMs / 1000}s`
        : kind === "idle"
          ? `No data received for ${requestTimeoutMs / 1000}s`
          : `No response within ${requestTimeoutMs / 1000}s`;
    return new NetworkError(url, message, "TIMEOUT");
  }
}
