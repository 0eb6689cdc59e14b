import type { Clock, PacedResult, PacingClockConfig } from './types.js';

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

type PacedRunOptions = {
  /** Caller's own interval; the larger of this and the clock's applies. */
  minIntervalMs?: number;
};

/**
 * Enforces a minimum gap between the end of one request and the start of the
 * next. Requests handed to `run` execute one at a time, in call order, so a
 * clock shared by several fetchers paces all of them together.
 */
export class PacingClock {
  private readonly minIntervalMs: number;
  private readonly clock: Clock;
  private lastCompletedAt: number | undefined;
  private tail: Promise<void>;

  constructor(config: PacingClockConfig, clock: Clock = systemClock) {
    this.minIntervalMs = Math.max(0, config.minIntervalMs);
    this.clock = clock;
    this.lastCompletedAt = undefined;
    this.tail = Promise.resolve();
  }

  run<T>(
    request: () => Promise<T>,
    options: PacedRunOptions = {},
  ): Promise<PacedResult<T>> {
    const intervalMs = Math.max(this.minIntervalMs, options.minIntervalMs ?? 0);
    const turn = this.tail.then(() => this.execute(request, intervalMs));
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  /**
   * Milliseconds a request issued now would have to wait.
   */
  remainingWaitMs(intervalMs: number = this.minIntervalMs): number {
    if (this.lastCompletedAt === undefined) {
      return 0;
    }

    const elapsed = this.clock.now() - this.lastCompletedAt;
    return Math.max(0, intervalMs - elapsed);
  }

  reset(): void {
    this.lastCompletedAt = undefined;
  }

  private async execute<T>(
    request: () => Promise<T>,
    intervalMs: number,
  ): Promise<PacedResult<T>> {
    let waitedMs = 0;
    // Timers may fire slightly early; keep sleeping until the gap holds.
    let remainingMs = this.remainingWaitMs(intervalMs);
    while (remainingMs > 0) {
      await this.clock.sleep(remainingMs);
      waitedMs += remainingMs;
      remainingMs = this.remainingWaitMs(intervalMs);
    }

    try {
      const result = await request();
      return { result, waitedMs };
    } finally {
      this.lastCompletedAt = this.clock.now();
    }
  }
}

export type { PacedRunOptions };
