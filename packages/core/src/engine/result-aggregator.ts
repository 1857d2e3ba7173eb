/**
 * Result Aggregator
 *
 * Reassembles per-request outcomes into submission order and summarizes
 * them. Pure; the coordinator calls it once per run.
 */
import { performance } from "node:perf_hooks";
import type { CheckOutcome, OutcomeKind } from "../outcome";

export interface BatchEntry {
  /** Zero-based submission position */
  readonly index: number;
  readonly identity: string;
  readonly checkType: string;
  readonly outcome: CheckOutcome;
}

export type BatchSummary = Readonly<Record<OutcomeKind, number>>;

export interface BatchResult {
  readonly batchId: string;
  readonly results: readonly BatchEntry[];
  readonly summary: BatchSummary;
  /** Wall-clock time from batch start, queueing included */
  readonly totalElapsedMs: number;
}

export interface AggregateOptions {
  batchId: string;
  /** `performance.now()` reading taken when the batch started */
  startedAt: number;
  /** Current `performance.now()` reading; taken at call time when omitted */
  now?: number;
}

export function summarize(entries: readonly BatchEntry[]): BatchSummary {
  const summary: Record<OutcomeKind, number> = { success: 0, warning: 0, error: 0 };
  for (const entry of entries) {
    summary[entry.outcome.kind]++;
  }
  return Object.freeze(summary);
}

export function aggregateResults(entries: readonly BatchEntry[], options: AggregateOptions): BatchResult {
  const results = [...entries].sort((a, b) => a.index - b.index);
  const now = options.now ?? performance.now();

  return Object.freeze({
    batchId: options.batchId,
    results: Object.freeze(results),
    summary: summarize(results),
    totalElapsedMs: Math.max(0, now - options.startedAt),
  });
}

/**
 * Percentage of successful outcomes, one decimal place. 0 for an empty batch.
 */
export function successRate(summary: BatchSummary): number {
  const total = summary.success + summary.warning + summary.error;
  if (total === 0) return 0;
  return Math.round((summary.success / total) * 1000) / 10;
}
