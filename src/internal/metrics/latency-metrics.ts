import type { LatencySummary } from "../../core/types.js";

/**
 * Collects call durations (ms) for one answer system across a run.
 * Nearest-rank percentiles; a batch run keeps every sample.
 */
export class LatencyMetrics {
  private samples: number[] = [];

  static fromSeconds(durations: number[]): LatencyMetrics {
    const metrics = new LatencyMetrics();
    for (const seconds of durations) metrics.record(seconds * 1000);
    return metrics;
  }

  record(durationMs: number): void {
    if (!Number.isFinite(durationMs) || durationMs < 0) return;
    this.samples.push(durationMs);
  }

  get count(): number {
    return this.samples.length;
  }

  percentile(p: number): number | null {
    if (this.samples.length === 0) return null;

    const sorted = [...this.samples].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return Math.round(sorted[Math.max(0, index)]);
  }

  summary(): LatencySummary {
    return {
      count: this.count,
      p50: this.percentile(50),
      p95: this.percentile(95),
      p99: this.percentile(99),
    };
  }
}
