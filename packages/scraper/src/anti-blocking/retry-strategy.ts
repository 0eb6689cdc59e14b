import { TransportError } from '../utils/errors.js';
import type {
  AttemptStatus,
  BackoffScheduleOptions,
  FailureStatus,
  RecoverableStatus,
  RetryDecision,
} from './types.js';

type RetryStrategyConfig = {
  maxRetries: number;
  backoffScheduleMs: readonly number[];
};

const RECOVERABLE_STATUSES: ReadonlySet<FailureStatus> = new Set<RecoverableStatus>([
  'rate-limited',
  'blocked',
  'transient-error',
]);

const NETWORK_ERROR_HINTS = [
  'timeout',
  'econnreset',
  'econnrefused',
  'enotfound',
  'socket hang up',
  'network',
];

/**
 * Waits applied before attempts 2..steps+1.
 * linear: base, 2*base, 3*base... exponential: base, 2*base, 4*base...
 */
export function buildBackoffSchedule(options: BackoffScheduleOptions): number[] {
  const steps = Math.max(0, Math.floor(options.steps));

  return Array.from({ length: steps }, (_, index) =>
    options.strategy === 'linear'
      ? options.baseMs * (index + 1)
      : options.baseMs * 2 ** index,
  );
}

const DEFAULT_CONFIG: RetryStrategyConfig = {
  maxRetries: 3,
  backoffScheduleMs: buildBackoffSchedule({
    strategy: 'linear',
    baseMs: 5000,
    steps: 2,
  }),
};

export function isRecoverable(status: AttemptStatus): status is RecoverableStatus {
  return status !== 'success' && RECOVERABLE_STATUSES.has(status);
}

export class RetryStrategy {
  private readonly config: RetryStrategyConfig;

  constructor(config?: Partial<RetryStrategyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  classifyStatus(statusCode: number): AttemptStatus {
    if (statusCode >= 200 && statusCode < 300) {
      return 'success';
    }

    if (statusCode === 403) {
      return 'blocked';
    }

    if (statusCode === 429) {
      return 'rate-limited';
    }

    if (statusCode >= 400 && statusCode < 500) {
      return 'client-error';
    }

    if (statusCode >= 500 && statusCode < 600) {
      return 'transient-error';
    }

    return 'unexpected';
  }

  classifyError(error: unknown): FailureStatus {
    if (error instanceof TransportError && error.isNetworkError) {
      return 'transient-error';
    }

    const message =
      error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

    if (NETWORK_ERROR_HINTS.some((hint) => message.includes(hint))) {
      return 'transient-error';
    }

    return 'unexpected';
  }

  /**
   * Decide what follows a failed attempt. `attemptNumber` is 1-based; the
   * returned delay is the wait before attempt `attemptNumber + 1`.
   */
  decide(status: FailureStatus, attemptNumber: number): RetryDecision {
    if (!isRecoverable(status)) {
      return { shouldRetry: false, recoverable: false, delayMs: 0, status };
    }

    if (attemptNumber >= this.config.maxRetries) {
      return { shouldRetry: false, recoverable: true, delayMs: 0, status };
    }

    return {
      shouldRetry: true,
      recoverable: true,
      delayMs: this.backoffBefore(attemptNumber + 1),
      status,
    };
  }

  backoffBefore(attemptNumber: number): number {
    if (attemptNumber <= 1) {
      return 0;
    }

    const schedule = this.config.backoffScheduleMs;
    return schedule[attemptNumber - 2] ?? schedule[schedule.length - 1] ?? 0;
  }
}

export type { RetryStrategyConfig };
