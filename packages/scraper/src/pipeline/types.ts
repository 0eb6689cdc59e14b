import type { PageTarget } from '../sources/types.js';
import type { FetchErrorCode, FetchResult } from '../web-engine/types.js';

type FailurePolicy = 'skip' | 'abort';

type PageFetcher = {
  fetch(url: string): Promise<FetchResult>;
};

type CollectedPage = {
  target: PageTarget;
  content: string;
  statusCode: number;
  finalUrl: string;
  attempts: number;
};

type PageFailure = {
  target: PageTarget;
  errorCode: FetchErrorCode;
  error: string;
  attempts: number;
};

type CollectionResult = {
  pages: CollectedPage[];
  failures: PageFailure[];
  aborted: boolean;
  /** Targets never requested because the run was aborted. */
  notAttempted: PageTarget[];
};

type CollectOptions = {
  onFailure?: FailurePolicy;
};

export type {
  FailurePolicy,
  PageFetcher,
  CollectedPage,
  PageFailure,
  CollectionResult,
  CollectOptions,
};
