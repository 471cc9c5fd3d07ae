/**
 * Run metrics for batch processing.
 *
 * Every timed step (extraction, one conversion, an OCR request, chunking)
 * is recorded with its outcome so a run can be summarized per operation.
 */

import { randomUUID } from "node:crypto";

export interface TimingRecord {
  operation: string;
  durationMs: number;
  /** False when the timed function threw */
  ok: boolean;
  startedAt: Date;
}

export interface TimingSummary {
  operation: string;
  count: number;
  failed: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
  p50Ms: number;
  p95Ms: number;
}

/** Message counts of a finished batch */
export interface RunCounts {
  processed: number;
  failed: number;
  skipped: number;
  cancelled: number;
}

export interface RunMetrics {
  runId: string;
  trigger: string;
  startedAt: Date;
  completedAt: Date;
  totalDurationMs: number;
  counts: RunCounts;
  /** Slowest operation first */
  summaries: TimingSummary[];
}

/** Wall clock plus a monotonic timer; injectable for tests. */
export interface RunClock {
  now(): Date;
  elapsedMs(): number;
}

export const systemClock: RunClock = {
  now: () => new Date(),
  elapsedMs: () => performance.now(),
};

export class TimingCollector {
  readonly runId = `run-${randomUUID().slice(0, 8)}`;
  readonly startedAt: Date;
  private readonly records: TimingRecord[] = [];

  constructor(
    readonly trigger: string,
    private readonly clock: RunClock = systemClock
  ) {
    this.startedAt = clock.now();
  }

  record(operation: string, durationMs: number, ok = true): void {
    this.records.push({ operation, durationMs, ok, startedAt: this.clock.now() });
  }

  async time<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = this.clock.elapsedMs();
    let ok = false;
    try {
      const result = await fn();
      ok = true;
      return result;
    } finally {
      this.record(operation, this.clock.elapsedMs() - start, ok);
    }
  }

  timeSync<T>(operation: string, fn: () => T): T {
    const start = this.clock.elapsedMs();
    let ok = false;
    try {
      const result = fn();
      ok = true;
      return result;
    } finally {
      this.record(operation, this.clock.elapsedMs() - start, ok);
    }
  }

  get size(): number {
    return this.records.length;
  }

  summarize(operation: string): TimingSummary | null {
    const records = this.records.filter((r) => r.operation === operation);
    if (records.length === 0) return null;

    const durations = records.map((r) => r.durationMs).sort((a, b) => a - b);
    const totalMs = durations.reduce((sum, d) => sum + d, 0);
    return {
      operation,
      count: durations.length,
      failed: records.filter((r) => !r.ok).length,
      totalMs,
      minMs: durations[0] ?? 0,
      maxMs: durations[durations.length - 1] ?? 0,
      avgMs: totalMs / durations.length,
      p50Ms: percentile(durations, 50),
      p95Ms: percentile(durations, 95),
    };
  }

  finalize(counts: RunCounts): RunMetrics {
    const completedAt = this.clock.now();
    const operations = [...new Set(this.records.map((r) => r.operation))];
    const summaries = operations
      .map((op) => this.summarize(op))
      .filter((s): s is TimingSummary => s !== null)
      .sort((a, b) => b.totalMs - a.totalMs || a.operation.localeCompare(b.operation));

    return {
      runId: this.runId,
      trigger: this.trigger,
      startedAt: this.startedAt,
      completedAt,
      totalDurationMs: completedAt.getTime() - this.startedAt.getTime(),
      counts: {
        processed: counts.processed,
        failed: counts.failed,
        skipped: counts.skipped,
        cancelled: counts.cancelled,
      },
      summaries,
    };
  }
}

/**
 * Linear-interpolated percentile of an ascending array; 0 when empty.
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  if (sortedValues.length === 0) return 0;

  const index = (p / 100) * (sortedValues.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const low = sortedValues[lower] ?? 0;
  const high = sortedValues[upper] ?? low;

  return low + (high - low) * (index - lower);
}

export function formatSummary(summary: TimingSummary): string {
  const failed = summary.failed > 0 ? ` (${summary.failed} failed)` : "";
  return (
    `${summary.operation}: ${summary.count}x${failed}, ` +
    `total ${summary.totalMs.toFixed(0)}ms, ` +
    `avg ${summary.avgMs.toFixed(1)}ms, ` +
    `p50 ${summary.p50Ms.toFixed(1)}ms, ` +
    `p95 ${summary.p95Ms.toFixed(1)}ms`
  );
}

export function formatRunMetrics(metrics: RunMetrics): string {
  const { processed, failed, skipped, cancelled } = metrics.counts;
  const lines = [
    `=== Run ${metrics.runId} (${metrics.trigger}) ===`,
    `Duration: ${metrics.totalDurationMs}ms`,
    `Messages: ${processed} processed, ${failed} failed, ${skipped} skipped, ${cancelled} cancelled`,
  ];
  for (const summary of metrics.summaries) {
    lines.push(`  ${formatSummary(summary)}`);
  }
  return lines.join("\n");
}
