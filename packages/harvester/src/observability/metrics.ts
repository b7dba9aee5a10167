type CounterName =
  | 'items.processed'
  | 'items.failed'
  | 'items.skipped.position'
  | 'items.skipped.seen'
  | 'pages.visited'
  | 'collections.completed'
  | 'collections.skipped';

type MetricSnapshot = {
  counters: Partial<Record<CounterName, number>>;
  detailFetch: {
    count: number;
    min: number;
    max: number;
    avg: number;
    total: number;
  };
};

export class CrawlMetrics {
  private readonly counters: Map<CounterName, number>;
  private readonly durationValues: number[];

  constructor() {
    this.counters = new Map();
    this.durationValues = [];
  }

  increment(counter: CounterName, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: CounterName): number {
    return this.counters.get(counter) ?? 0;
  }

  recordDetailFetch(ms: number): void {
    this.durationValues.push(ms);
  }

  snapshot(): MetricSnapshot {
    const counters: Partial<Record<CounterName, number>> = {};
    for (const [key, value] of this.counters) {
      counters[key] = value;
    }

    const count = this.durationValues.length;
    const total = this.durationValues.reduce((sum, value) => sum + value, 0);
    const min = count > 0 ? Math.min(...this.durationValues) : 0;
    const max = count > 0 ? Math.max(...this.durationValues) : 0;
    const avg = count > 0 ? total / count : 0;

    return {
      counters,
      detailFetch: { count, min, max, avg, total },
    };
  }

  log(logger: { info: (msg: string, data?: string) => void }): void {
    logger.info('[Metrics]', JSON.stringify(this.snapshot()));
  }
}

export type { CounterName, MetricSnapshot };
