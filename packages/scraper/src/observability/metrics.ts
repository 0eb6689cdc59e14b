type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  durations: DurationSummary;
};

/**
 * In-process counters for a fetch run: attempts by status, outcomes by error
 * code, and per-request durations.
 */
export class FetchMetrics {
  private readonly counters: Map<string, number>;
  private readonly durationValues: number[];

  constructor() {
    this.counters = new Map();
    this.durationValues = [];
  }

  increment(counter: string, amount = 1): void {
    this.counters.set(counter, this.count(counter) + amount);
  }

  count(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  recordDuration(ms: number): void {
    this.durationValues.push(ms);
  }

  snapshot(): MetricSnapshot {
    const counters = Object.fromEntries(this.counters);

    const count = this.durationValues.length;
    const total = this.durationValues.reduce((sum, value) => sum + value, 0);

    return {
      counters,
      durations: {
        count,
        min: count > 0 ? Math.min(...this.durationValues) : 0,
        max: count > 0 ? Math.max(...this.durationValues) : 0,
        avg: count > 0 ? total / count : 0,
        total,
      },
    };
  }

  log(logger: { info: (msg: string, data?: string) => void }): void {
    logger.info('[Metrics]', JSON.stringify(this.snapshot()));
  }

  reset(): void {
    this.counters.clear();
    this.durationValues.length = 0;
  }
}

export type { MetricSnapshot, DurationSummary };
