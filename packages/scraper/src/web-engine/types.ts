import type {
  AttemptStatus,
  RecoverableStatus,
} from '../anti-blocking/types.js';

type TransportRequestOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
};

type TransportResponse = {
  statusCode: number;
  body: string;
  headers: Record<string, string>;
  finalUrl: string;
};

/**
 * Issues a single GET. Resolves for every HTTP status; rejects only when no
 * response arrived at all.
 */
interface HttpTransport {
  get(url: string, options: TransportRequestOptions): Promise<TransportResponse>;
}

type FetchAttempt = {
  url: string;
  attemptNumber: number;
  status: AttemptStatus;
  waitBeforeMs: number;
  pacingWaitMs: number;
  durationMs: number;
  statusCode?: number;
  error?: string;
};

type FetchMetadata = {
  durationMs: number;
  method: string;
};

type FetchSuccess = {
  success: true;
  url: string;
  finalUrl: string;
  content: string;
  statusCode: number;
  headers: Record<string, string>;
  attempts: FetchAttempt[];
  metadata: FetchMetadata;
};

type FetchFailureBase = {
  success: false;
  url: string;
  error: string;
  attempts: FetchAttempt[];
  metadata: FetchMetadata;
};

type ClientErrorFailure = FetchFailureBase & {
  errorCode: 'client-error';
  statusCode: number;
};

type ExhaustedFailure = FetchFailureBase & {
  errorCode: 'exhausted';
  lastStatus: RecoverableStatus;
  lastStatusCode?: number;
  attemptCount: number;
};

type UnexpectedFailure = FetchFailureBase & {
  errorCode: 'unexpected';
  statusCode?: number;
};

type FetchFailure = ClientErrorFailure | ExhaustedFailure | UnexpectedFailure;

type FetchResult = FetchSuccess | FetchFailure;

type FetchErrorCode = FetchFailure['errorCode'];

export type {
  TransportRequestOptions,
  TransportResponse,
  HttpTransport,
  FetchAttempt,
  FetchMetadata,
  FetchSuccess,
  ClientErrorFailure,
  ExhaustedFailure,
  UnexpectedFailure,
  FetchFailure,
  FetchResult,
  FetchErrorCode,
};
