/**
 * Batch Report
 *
 * Human-readable rendering of a batch result.
 */

import { successRate, type BatchEntry, type BatchResult } from "@hostprobe/core";
import type { IOutputService } from "../../interfaces/output.interface";

const ICONS = {
  success: "✓",
  warning: "⚠",
  error: "✗",
} as const;

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatEntry(entry: BatchEntry): string {
  const { kind, message, elapsedMs } = entry.outcome;
  return `${ICONS[kind]} ${entry.identity} [${entry.checkType}] ${message} (${formatSeconds(elapsedMs)})`;
}

export function renderEntry(output: IOutputService, entry: BatchEntry): void {
  const line = formatEntry(entry);
  switch (entry.outcome.kind) {
    case "success":
      output.success(line);
      break;
    case "warning":
      output.warn(line);
      break;
    case "error":
      output.error(line);
      break;
  }
}

export function formatSummary(result: BatchResult): string {
  const { success, warning, error } = result.summary;
  return (
    `Summary: ${success} passed, ${warning} warnings, ${error} failed ` +
    `(${successRate(result.summary)}% success) in ${formatSeconds(result.totalElapsedMs)}`
  );
}

export function renderReport(output: IOutputService, result: BatchResult): void {
  output.header(`Batch ${result.batchId}`, "📋");
  output.newline();

  for (const entry of result.results) {
    renderEntry(output, entry);
  }

  output.newline();
  if (result.results.length === 0) {
    output.dim("No checks to run.");
  }
  output.log(formatSummary(result));
}
