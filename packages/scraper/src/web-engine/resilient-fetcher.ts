import { createLogger } from '@workspace/logger';
import { PacingClock, systemClock } from '../anti-blocking/pacing-clock.js';
import { RetryStrategy } from '../anti-blocking/retry-strategy.js';
import type {
  Clock,
  FailureStatus,
  RetryDecision,
} from '../anti-blocking/types.js';
import {
  resolveFetcherConfig,
  type FetcherConfig,
  type FetcherConfigInput,
} from '../config/fetcher-config.js';
import { FetchMetrics } from '../observability/metrics.js';
import { AxiosTransport } from './axios-transport.js';
import type {
  FetchAttempt,
  FetchFailure,
  FetchResult,
  HttpTransport,
  TransportResponse,
} from './types.js';

const fetcherLog = createLogger('Fetcher');

type ResilientFetcherOptions = {
  transport?: HttpTransport;
  clock?: Clock;
  /**
   * Share one pacing clock between fetchers to pace them together. Each
   * fetcher's requests wait for the larger of its own `minIntervalMs` and the
   * clock's interval.
   */
  pacingClock?: PacingClock;
  metrics?: FetchMetrics;
};

type AttemptOutcome = {
  attempt: FetchAttempt;
  response?: TransportResponse;
};

type RequestOutcome =
  | { kind: 'response'; response: TransportResponse; durationMs: number }
  | { kind: 'error'; error: unknown; durationMs: number };

/**
 * Paced, retrying page fetcher.
 *
 * Every request waits until `minIntervalMs` has passed since the previous one
 * completed. 403 and 429 responses, 5xx responses and network failures are
 * retried after the scheduled backoff until `maxRetries` attempts were made;
 * any other 4xx fails at once. Logical fetches on one instance run one after
 * another.
 */
export class ResilientFetcher {
  readonly config: FetcherConfig;
  readonly metrics: FetchMetrics;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly pacing: PacingClock;
  private readonly retryStrategy: RetryStrategy;
  private queue: Promise<void>;

  constructor(config?: FetcherConfigInput, options: ResilientFetcherOptions = {}) {
    this.config = resolveFetcherConfig(config);
    this.clock = options.clock ?? systemClock;
    this.transport = options.transport ?? new AxiosTransport();
    this.pacing =
      options.pacingClock ??
      new PacingClock({ minIntervalMs: this.config.minIntervalMs }, this.clock);
    this.retryStrategy = new RetryStrategy({
      maxRetries: this.config.maxRetries,
      backoffScheduleMs: this.config.backoffScheduleMs,
    });
    this.metrics = options.metrics ?? new FetchMetrics();
    this.queue = Promise.resolve();
  }

  fetch(url: string): Promise<FetchResult> {
    const run = this.queue.then(() => this.fetchWithRetries(url));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async fetchWithRetries(url: string): Promise<FetchResult> {
    const startedAt = this.clock.now();
    const attempts: FetchAttempt[] = [];
    let attemptNumber = 1;
    let waitBeforeMs = 0;

    fetcherLog.info(`Fetching ${url}`);

    while (true) {
      if (waitBeforeMs > 0) {
        await this.clock.sleep(waitBeforeMs);
      }

      const outcome = await this.attempt(url, attemptNumber, waitBeforeMs);
      const { attempt } = outcome;
      attempts.push(attempt);
      this.metrics.increment('fetch.requests');
      this.metrics.increment(`fetch.attempts.${attempt.status}`);
      this.metrics.recordDuration(attempt.durationMs);

      if (attempt.status === 'success' && outcome.response) {
        fetcherLog.debug(
          `Attempt ${attemptNumber}/${this.config.maxRetries} succeeded (${outcome.response.statusCode}) ${url}`,
        );
        this.metrics.increment('fetch.succeeded');

        return {
          success: true,
          url,
          finalUrl: outcome.response.finalUrl,
          content: outcome.response.body,
          statusCode: outcome.response.statusCode,
          headers: outcome.response.headers,
          attempts,
          metadata: this.metadata(startedAt),
        };
      }

      const status: FailureStatus =
        attempt.status === 'success' ? 'unexpected' : attempt.status;
      const decision = this.retryStrategy.decide(status, attemptNumber);

      if (!decision.shouldRetry) {
        const failure = this.fail(url, decision, outcome, attempts, startedAt);
        this.metrics.increment(`fetch.failed.${failure.errorCode}`);
        fetcherLog.error(failure.error);
        return failure;
      }

      fetcherLog.warn(
        `Attempt ${attemptNumber}/${this.config.maxRetries} ${describeAttempt(attempt)} for ${url}, retrying in ${decision.delayMs}ms`,
      );

      attemptNumber += 1;
      waitBeforeMs = decision.delayMs;
    }
  }

  private async attempt(
    url: string,
    attemptNumber: number,
    waitBeforeMs: number,
  ): Promise<AttemptOutcome> {
    const { result, waitedMs } = await this.pacing.run(() => this.request(url), {
      minIntervalMs: this.config.minIntervalMs,
    });

    const base = {
      url,
      attemptNumber,
      waitBeforeMs,
      pacingWaitMs: waitedMs,
      durationMs: result.durationMs,
    };

    if (result.kind === 'error') {
      return {
        attempt: {
          ...base,
          status: this.retryStrategy.classifyError(result.error),
          error: result.error instanceof Error ? result.error.message : String(result.error),
        },
      };
    }

    return {
      attempt: {
        ...base,
        status: this.retryStrategy.classifyStatus(result.response.statusCode),
        statusCode: result.response.statusCode,
      },
      response: result.response,
    };
  }

  private async request(url: string): Promise<RequestOutcome> {
    const startedAt = this.clock.now();

    try {
      const response = await this.transport.get(url, {
        headers: this.config.headers,
        timeoutMs: this.config.timeoutMs,
      });
      return { kind: 'response', response, durationMs: this.clock.now() - startedAt };
    } catch (error) {
      return { kind: 'error', error, durationMs: this.clock.now() - startedAt };
    }
  }

  private fail(
    url: string,
    decision: RetryDecision,
    outcome: AttemptOutcome,
    attempts: FetchAttempt[],
    startedAt: number,
  ): FetchFailure {
    const { attempt, response } = outcome;
    const common = {
      success: false as const,
      url,
      attempts,
      metadata: this.metadata(startedAt),
    };

    if (decision.status === 'client-error' && response) {
      return {
        ...common,
        errorCode: 'client-error',
        statusCode: response.statusCode,
        error: `Client error ${response.statusCode} for ${url}, not retrying`,
      };
    }

    if (decision.recoverable) {
      return {
        ...common,
        errorCode: 'exhausted',
        lastStatus: decision.status,
        lastStatusCode: attempt.statusCode,
        attemptCount: attempts.length,
        error: `Gave up on ${url} after ${attempts.length} attempts (last: ${describeAttempt(attempt)})`,
      };
    }

    return {
      ...common,
      errorCode: 'unexpected',
      statusCode: attempt.statusCode,
      error: `Unexpected failure for ${url}: ${describeAttempt(attempt)}`,
    };
  }

  private metadata(startedAt: number) {
    return { durationMs: this.clock.now() - startedAt, method: 'http-get' };
  }
}

function describeAttempt(attempt: FetchAttempt): string {
  if (attempt.statusCode !== undefined) {
    return `${attempt.status} (HTTP ${attempt.statusCode})`;
  }

  return attempt.error ? `${attempt.status} (${attempt.error})` : attempt.status;
}

export type { ResilientFetcherOptions };
