export interface CounterValue {
  name: string;
  labels: Record<string, string>;
  value: number;
}

export interface HistogramValue {
  name: string;
  labels: Record<string, string>;
  count: number;
  sum: number;
  buckets: Map<number, number>; // upper bound → count
}

interface HistogramState {
  name: string;
  labels: Record<string, string>;
  count: number;
  sum: number;
  /** Cumulative count per entry of `defaultBuckets` */
  bucketCounts: number[];
}

/**
 * In-process counters and latency histograms for ticks, completions and dispatches.
 */
export class Metrics {
  private readonly counters = new Map<string, CounterValue>();
  private readonly histograms = new Map<string, HistogramState>();

  private readonly defaultBuckets = [
    10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000,
  ];

  increment(name: string, labels: Record<string, string> = {}, value = 1): void {
    const key = this.makeKey(name, labels);
    const counter = this.counters.get(key);
    if (counter) {
      counter.value += value;
    } else {
      this.counters.set(key, { name, labels: { ...labels }, value });
    }
  }

  observe(name: string, labels: Record<string, string>, value: number): void {
    const key = this.makeKey(name, labels);
    const hist = this.histograms.get(key) ?? {
      name,
      labels: { ...labels },
      count: 0,
      sum: 0,
      bucketCounts: this.defaultBuckets.map(() => 0),
    };
    this.histograms.set(key, hist);
    hist.count++;
    hist.sum += value;
    hist.bucketCounts = hist.bucketCounts.map((n, i) => {
      const bound = this.defaultBuckets[i];
      return bound !== undefined && value <= bound ? n + 1 : n;
    });
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(this.makeKey(name, labels))?.value ?? 0;
  }

  getHistogram(name: string, labels: Record<string, string>): HistogramValue | undefined {
    const hist = this.histograms.get(this.makeKey(name, labels));
    return hist ? this.toHistogramValue(hist) : undefined;
  }

  getAllCounters(): CounterValue[] {
    return [...this.counters.values()].map((c) => ({ ...c, labels: { ...c.labels } }));
  }

  getAllHistograms(): HistogramValue[] {
    return [...this.histograms.values()].map((h) => this.toHistogramValue(h));
  }

  recordTick(ok: boolean, durationMs: number): void {
    this.increment("ticks_total", { ok: String(ok) });
    this.observe("tick_latency_ms", {}, durationMs);
  }

  recordCompletionRequest(provider: string, outcome: "ok" | "http_error" | "transport_error"): void {
    this.increment("completion_requests_total", { provider, outcome });
  }

  recordFailover(from: string, to: string): void {
    this.increment("provider_failovers_total", { from, to });
  }

  recordInvalidFunctionCall(): void {
    this.increment("function_calls_invalid_total");
  }

  recordDispatch(capabilityName: string, actionName: string, ok: boolean, durationMs: number): void {
    this.increment("dispatches_total", {
      capability: capabilityName,
      action: actionName,
      ok: String(ok),
    });
    this.observe("dispatch_latency_ms", { capability: capabilityName }, durationMs);
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private toHistogramValue(hist: HistogramState): HistogramValue {
    const buckets = new Map<number, number>();
    this.defaultBuckets.forEach((bound, i) => {
      buckets.set(bound, hist.bucketCounts[i] ?? 0);
    });
    return {
      name: hist.name,
      labels: { ...hist.labels },
      count: hist.count,
      sum: hist.sum,
      buckets,
    };
  }

  private makeKey(name: string, labels: Record<string, string>): string {
    const sortedLabels = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(",");
    return `${name}{${sortedLabels}}`;
  }
}
