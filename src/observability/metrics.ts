import type { DownloadOutcome } from "../types";
import type { Logger } from "./logger";
import type { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface RunStatisticsSnapshot {
  pagesVisited: number;
  pagesFailed: number;
  documentsFound: number;
  excluded: number;
  downloaded: number;
  skippedDuplicate: number;
  failed: number;
}

const OUTCOME_COUNTERS: Record<DownloadOutcome["status"], MetricCounterName> = {
  downloaded: "downloaded",
  skipped_duplicate: "skipped_duplicate",
  failed: "failed",
};

/**
 * Per-run accumulator. One instance is created by the pipeline and handed down
 * explicitly to whatever needs to count something.
 */
export class RunStatistics {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  recordOutcome(outcome: DownloadOutcome): void {
    this.incrementCounter(OUTCOME_COUNTERS[outcome.status]);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  snapshot(): RunStatisticsSnapshot {
    return {
      pagesVisited: this.counters.get("pages_visited") ?? 0,
      pagesFailed: this.counters.get("pages_failed") ?? 0,
      documentsFound: this.counters.get("documents_found") ?? 0,
      excluded: this.counters.get("documents_excluded") ?? 0,
      downloaded: this.counters.get("downloaded") ?? 0,
      skippedDuplicate: this.counters.get("skipped_duplicate") ?? 0,
      failed: this.counters.get("failed") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      page_fetch_ms: this.summarize("page_fetch_ms"),
      download_ms: this.summarize("download_ms"),
    };
  }

  logSummary(logger: Logger): void {
    logger.info("run_summary", { ...this.snapshot(), timers: this.getTimerSummaries() });
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
