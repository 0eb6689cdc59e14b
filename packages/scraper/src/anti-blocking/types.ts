/**
 * Classification of a single HTTP attempt.
 */
type AttemptStatus =
  | 'success'
  | 'rate-limited'
  | 'blocked'
  | 'transient-error'
  | 'client-error'
  | 'unexpected';

type FailureStatus = Exclude<AttemptStatus, 'success'>;

type RecoverableStatus = Extract<
  FailureStatus,
  'rate-limited' | 'blocked' | 'transient-error'
>;

type RetryDecision =
  | {
      shouldRetry: boolean;
      recoverable: true;
      delayMs: number;
      status: RecoverableStatus;
    }
  | {
      shouldRetry: false;
      recoverable: false;
      delayMs: 0;
      status: Exclude<FailureStatus, RecoverableStatus>;
    };

type BackoffStrategy = 'linear' | 'exponential';

type BackoffScheduleOptions = {
  strategy: BackoffStrategy;
  baseMs: number;
  steps: number;
};

type Clock = {
  now(): number;
  sleep(ms: number): Promise<void>;
};

type PacingClockConfig = {
  minIntervalMs: number;
};

type PacedResult<T> = {
  result: T;
  waitedMs: number;
};

export type {
  AttemptStatus,
  FailureStatus,
  RecoverableStatus,
  RetryDecision,
  BackoffStrategy,
  BackoffScheduleOptions,
  Clock,
  PacingClockConfig,
  PacedResult,
};
