interface DurationSample {
  durationMs: number;
  timestamp: number;
}

interface SeriesMetrics {
  samples: DurationSample[];
  count: number;
  errorCount: number;
}

export interface SeriesSnapshot {
  name: string;
  p50Ms: number;
  p95Ms: number;
  p99Ms: number;
  count: number;
  /** Samples inside the window. */
  windowCount: number;
  errorCount: number;
  errorRate: number;
}

/**
 * Sliding-window duration series plus plain counters. Expired samples are
 * dropped whenever a series is written, so the collector holds no timers.
 */
export class MetricsCollector {
  private series = new Map<string, SeriesMetrics>();
  private counters = new Map<string, number>();
  private readonly windowMs: number;

  constructor(windowMs = 60_000) {
    this.windowMs = windowMs;
  }

  private evict(m: SeriesMetrics, now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < m.samples.length && m.samples[expired].timestamp <= cutoff) expired++;
    if (expired > 0) m.samples.splice(0, expired);
  }

  increment(name: string, by = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  record(name: string, durationMs: number, isError: boolean): void {
    let m = this.series.get(name);
    if (!m) {
      m = { samples: [], count: 0, errorCount: 0 };
      this.series.set(name, m);
    }
    const now = Date.now();
    this.evict(m, now);
    m.samples.push({ durationMs, timestamp: now });
    m.count++;
    if (isError) m.errorCount++;
  }

  percentile(samples: number[], p: number): number {
    if (samples.length === 0) return 0;
    const sorted = [...samples].sort((a, b) => a - b);
    const idx = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, idx)];
  }

  getSnapshot(): SeriesSnapshot[] {
    const cutoff = Date.now() - this.windowMs;
    const results: SeriesSnapshot[] = [];
    for (const [name, m] of this.series) {
      const durations = m.samples.filter((s) => s.timestamp > cutoff).map((s) => s.durationMs);
      results.push({
        name,
        p50Ms: this.percentile(durations, 50),
        p95Ms: this.percentile(durations, 95),
        p99Ms: this.percentile(durations, 99),
        count: m.count,
        windowCount: durations.length,
        errorCount: m.errorCount,
        errorRate: m.count > 0 ? parseFloat(((m.errorCount / m.count) * 100).toFixed(2)) : 0,
      });
    }
    return results.sort((a, b) => b.count - a.count);
  }

  reset(): void {
    this.series.clear();
    this.counters.clear();
  }
}
