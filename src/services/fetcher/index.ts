export { ResilientFetcher, USER_AGENT, isRetryable } from "./resilient-fetcher.js";
export type {
  ResilientFetcherConfig,
  DownloadProgress,
  RetryInfo,
  FetchOptions,
} from "./resilient-fetcher.js";
