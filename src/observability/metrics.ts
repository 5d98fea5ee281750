import { MetricCounterName, MetricTimerName } from "./types";

export interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, HistogramSummary>;
}

/** Nearest-rank percentile over an ascending list. */
function percentile(sorted: number[], fraction: number): number {
  const rank = Math.ceil(fraction * sorted.length);
  return sorted[Math.min(sorted.length, Math.max(1, rank)) - 1];
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_crawled: this.getCounter("pages_crawled"),
      candidates_probed: this.getCounter("candidates_probed"),
      search_queries: this.getCounter("search_queries"),
      sections_discovered: this.getCounter("sections_discovered"),
      site_searches: this.getCounter("site_searches"),
      reports_found: this.getCounter("reports_found"),
      attachments_found: this.getCounter("attachments_found"),
      downloads_ok: this.getCounter("downloads_ok"),
      downloads_skipped: this.getCounter("downloads_skipped"),
      downloads_failed: this.getCounter("downloads_failed"),
      regions_succeeded: this.getCounter("regions_succeeded"),
      regions_failed: this.getCounter("regions_failed"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      page_fetch_ms: this.summarize("page_fetch_ms"),
      download_ms: this.summarize("download_ms"),
      region_ms: this.summarize("region_ms"),
    };
  }

  snapshot(): MetricsSnapshot {
    return { counters: this.getCounters(), timers: this.getTimerSummaries() };
  }

  printSummary(runId?: string): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          runId,
          ...this.snapshot(),
        },
        null,
        2,
      ),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = [...(this.timers.get(name) ?? [])].sort((a, b) => a - b);
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0 };
    }

    const total = values.reduce((sum, value) => sum + value, 0);
    return {
      count: values.length,
      min: values[0],
      max: values[values.length - 1],
      avg: Number((total / values.length).toFixed(2)),
      p50: percentile(values, 0.5),
      p95: percentile(values, 0.95),
    };
  }
}
