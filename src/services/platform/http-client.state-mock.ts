/**
 * In-memory HttpClient for fetcher and release tests.
 *
 * Responses are configured per exact URL. Every request lands in
 * `$.requests`. Matchers register on import.
 */

import { expect } from "vitest";
import type { HttpClient, HttpRequestOptions } from "./network.js";
import type {
  MatcherImplementationsFor,
  MatcherResult,
  MockState,
  MockWithState,
  Snapshot,
} from "../../test/state-mock.js";

export interface HttpRequestRecord {
  readonly url: string;
  readonly options: HttpRequestOptions;
}

/**
 * Response data. A fresh Response is built for every request so bodies can
 * be read more than once across retries.
 */
export interface ConfiguredResponse {
  readonly status?: number;
  readonly headers?: Record<string, string>;
  readonly body?: string | Uint8Array;
  /** Body factory for chunked or stalled bodies */
  readonly stream?: () => ReadableStream<Uint8Array>;
  /** Headers arrive after this many ms (pair with fake timers) */
  readonly delayMs?: number;
}

/**
 * One response for every request, or a queue served in order whose last
 * entry repeats.
 */
export type ResponseSetup = ConfiguredResponse | readonly ConfiguredResponse[];

export interface HttpClientMockState extends MockState {
  readonly requests: readonly HttpRequestRecord[];
}

export type MockHttpClient = HttpClient &
  MockWithState<HttpClientMockState> & {
    /** Every later request rejects like fetch() does when offline */
    simulateNetworkDown(): void;
  };

export interface MockHttpClientOptions {
  readonly responses?: Record<string, ResponseSetup>;
  /** Served for unknown URLs. Default: 404 with an empty body */
  readonly defaultResponse?: ConfiguredResponse;
}

const aborted = (): DOMException => new DOMException("The operation was aborted.", "AbortError");

/**
 * Resolves after `delayMs`, or rejects with an AbortError when the request
 * timeout is shorter or the signal fires first.
 */
function headersAfter(
  delayMs: number,
  timeout: number | undefined,
  signal: AbortSignal | undefined
): Promise<void> {
  return new Promise((resolve, reject) => {
    const timesOut = timeout !== undefined && timeout < delayMs;
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(aborted());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      if (timesOut) {
        reject(aborted());
      } else {
        resolve();
      }
    }, timesOut ? timeout : delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function isQueue(setup: ResponseSetup): setup is readonly ConfiguredResponse[] {
  return Array.isArray(setup);
}

type ResponseBody = ConstructorParameters<typeof Response>[0];

function buildResponse(setup: ConfiguredResponse): Response {
  let body: ResponseBody = null;
  if (setup.stream !== undefined) {
    body = setup.stream();
  } else if (typeof setup.body === "string") {
    body = setup.body;
  } else if (setup.body !== undefined) {
    // Copy: a pooled Buffer's backing store holds unrelated bytes
    body = new Uint8Array(setup.body);
  }
  return new Response(body, {
    status: setup.status ?? 200,
    ...(setup.headers !== undefined && { headers: setup.headers }),
  });
}

/**
 * @example
 * const httpClient = createMockHttpClient({
 *   responses: { [url]: [{ status: 503 }, { body: "ok" }] },
 * });
 * await fetcher.fetchBytes(url);
 * expect(httpClient).toHaveRequestCount(2);
 */
export function createMockHttpClient(options: MockHttpClientOptions = {}): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const served = new Map<string, number>();
  const fallback = options.defaultResponse ?? { status: 404, body: "" };
  let offline = false;

  function pick(url: string): ConfiguredResponse {
    const setup = options.responses?.[url];
    if (setup === undefined) {
      return fallback;
    }
    if (!isQueue(setup)) {
      return setup;
    }
    const queue = setup;
    const index = served.get(url) ?? 0;
    served.set(url, index + 1);
    return queue[Math.min(index, queue.length - 1)] ?? fallback;
  }

  const state: HttpClientMockState = {
    requests,
    snapshot(): Snapshot {
      return { __brand: "Snapshot", value: this.toString() };
    },
    toString(): string {
      const urls = requests.map((r) => r.url);
      return `${urls.length} request(s): ${urls.join(", ") || "(none)"}${offline ? " [offline]" : ""}`;
    },
  };

  return {
    $: state,

    async fetch(url: string, requestOptions: HttpRequestOptions = {}): Promise<Response> {
      requests.push({ url, options: requestOptions });
      if (offline) {
        throw new TypeError("fetch failed");
      }
      if (requestOptions.signal?.aborted) {
        throw aborted();
      }
      const setup = pick(url);
      if ((setup.delayMs ?? 0) > 0) {
        await headersAfter(setup.delayMs ?? 0, requestOptions.timeout, requestOptions.signal);
      }
      return buildResponse(setup);
    },

    simulateNetworkDown(): void {
      offline = true;
    },
  };
}

interface HttpClientMatchers {
  toHaveRequestCount(count: number): void;
  toHaveNoRequests(): void;
}

declare module "vitest" {
  interface Assertion<T> extends HttpClientMatchers {}
}

export const httpClientMatchers: MatcherImplementationsFor<MockHttpClient, HttpClientMatchers> = {
  toHaveRequestCount(received, count) {
    const actual = received.$.requests.length;
    return {
      pass: actual === count,
      message: (): string =>
        actual === count
          ? `Expected a request count other than ${count}`
          : `Expected ${count} request(s), got ${actual}: ${received.$.toString()}`,
    } satisfies MatcherResult;
  },

  toHaveNoRequests(received) {
    const pass = received.$.requests.length === 0;
    return {
      pass,
      message: (): string =>
        pass ? "Expected at least one request" : `Expected no requests, got ${received.$.toString()}`,
    } satisfies MatcherResult;
  },
};

expect.extend(httpClientMatchers);
