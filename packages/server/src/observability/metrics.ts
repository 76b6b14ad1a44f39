/**
 * In-process metrics for monitoring dispatch performance
 * Tracks call counts, errors, and latency histograms
 */

interface Counter {
  count: number;
}

interface Histogram {
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramStats {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

type Labels = Record<string, string>;

// Keep only the most recent samples per histogram
const MAX_SAMPLES = 1000;

export class MetricsRegistry {
  #counters: Map<string, Counter> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  // Increment a counter
  inc(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const counter = this.#counters.get(key) ?? { count: 0 };
    counter.count++;
    this.#counters.set(key, counter);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0, count: 0 };
    histogram.values.push(value);
    histogram.sum += value;
    histogram.count++;

    if (histogram.values.length > MAX_SAMPLES) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
      histogram.count = histogram.values.length;
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels))?.count ?? 0;
  }

  // Get histogram stats (p50, p95, p99)
  getHistogram(name: string, labels: Labels = {}): HistogramStats | null {
    return this.#stats(this.makeKey(name, labels));
  }

  // Get all metrics (for debugging)
  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramStats | null>;
  } {
    const counters: Record<string, number> = {};
    for (const [key, counter] of this.#counters) {
      counters[key] = counter.count;
    }

    const histograms: Record<string, HistogramStats | null> = {};
    for (const key of this.#histograms.keys()) {
      histograms[key] = this.#stats(key);
    }

    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }

  #stats(key: string): HistogramStats | null {
    const histogram = this.#histograms.get(key);
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: histogram.count,
      sum: histogram.sum,
      p50: percentile(50),
      p95: percentile(95),
      p99: percentile(99),
    };
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

export const metrics = new MetricsRegistry();

// Helper to record dispatch metrics
export function recordDispatch(
  op: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("strongbox.dispatch.calls_total", { op });

  if (!success) {
    metrics.inc("strongbox.dispatch.errors_total", { op, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("strongbox.dispatch.latency_ms", duration_ms, { op });
}
