export {
  ResilientFetcher,
  type ResilientFetcherOptions
} from "./web-engine/resilient-fetcher.js";
export {
  AxiosTransport,
  type AxiosTransportOptions
} from "./web-engine/axios-transport.js";
export { DEFAULT_BROWSER_HEADERS } from "./web-engine/browser-headers.js";
export type {
  ClientErrorFailure,
  ExhaustedFailure,
  FetchAttempt,
  FetchErrorCode,
  FetchFailure,
  FetchMetadata,
  FetchResult,
  FetchSuccess,
  HttpTransport,
  TransportRequestOptions,
  TransportResponse,
  UnexpectedFailure
} from "./web-engine/types.js";
export {
  loadFetcherConfig,
  resolveFetcherConfig,
  type FetcherConfig,
  type FetcherConfigInput
} from "./config/fetcher-config.js";
export { FetcherConfigError, TransportError } from "./utils/errors.js";
export { PacingClock, systemClock } from "./anti-blocking/pacing-clock.js";
export {
  RetryStrategy,
  buildBackoffSchedule,
  isRecoverable
} from "./anti-blocking/retry-strategy.js";
export type {
  AttemptStatus,
  BackoffStrategy,
  Clock,
  FailureStatus,
  RetryDecision
} from "./anti-blocking/types.js";
export {
  FBREF_CATEGORY_NAMES,
  buildFbrefMatchLogsUrl,
  buildFbrefTeamSeasonTargets,
  type FbrefStatCategory,
  type FbrefTeam
} from "./sources/fbref.js";
export {
  buildUnderstatLeagueUrl,
  buildUnderstatSeasonTargets,
  buildUnderstatTeamUrl
} from "./sources/understat.js";
export type { PageSource, PageTarget } from "./sources/types.js";
export { collectPages } from "./pipeline/page-collector.js";
export type {
  CollectionResult,
  CollectedPage,
  FailurePolicy,
  PageFailure
} from "./pipeline/types.js";
export { FetchMetrics, type MetricSnapshot } from "./observability/metrics.js";
