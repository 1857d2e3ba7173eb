// ---------------------------------------------------------------------------
// BatchLogger: single-line structured logging for batch runs
// ---------------------------------------------------------------------------

import type { OutcomeKind } from "./outcome";

export interface BatchLoggerOptions {
  /** Log one line per completed check. Default: false. */
  verbose?: boolean;
  /** Maximum message length before truncation. Default: 200. */
  maxMessageLength?: number;
  /** Custom log function. Default: console.log. */
  logFn?: (message: string) => void;
}

export class BatchLogger {
  private readonly verbose: boolean;
  private readonly maxMessageLength: number;
  private readonly logFn: (message: string) => void;

  constructor(options?: BatchLoggerOptions) {
    this.verbose = options?.verbose ?? false;
    this.maxMessageLength = options?.maxMessageLength ?? 200;
    this.logFn = options?.logFn ?? console.log;
  }

  batchStarted(batchId: string, total: number, chunks: number, workers: number): void {
    this.logFn(`[BATCH:START] id=${batchId} total=${total} chunks=${chunks} workers=${workers}`);
  }

  requestRejected(batchId: string, identity: string, issues: string[]): void {
    this.logFn(
      `[BATCH:REJECT] id=${batchId} identity=${identity} issues=${this.truncate(issues.join("; "))}`,
    );
  }

  chunkStarted(batchId: string, chunk: number, chunks: number, size: number): void {
    this.logFn(`[BATCH:CHUNK] id=${batchId} chunk=${chunk}/${chunks} size=${size}`);
  }

  checkCompleted(
    batchId: string,
    identity: string,
    checkType: string,
    kind: OutcomeKind,
    elapsedMs: number,
    message: string,
  ): void {
    if (!this.verbose) return;
    this.logFn(
      `[BATCH:CHECK] id=${batchId} identity=${identity} type=${checkType} kind=${kind} ` +
        `elapsedMs=${Math.round(elapsedMs)} message=${this.truncate(message)}`,
    );
  }

  checkTimedOut(batchId: string, identity: string, timeoutMs: number): void {
    this.logFn(`[BATCH:TIMEOUT] id=${batchId} identity=${identity} scope=check timeoutMs=${timeoutMs}`);
  }

  batchInterrupted(batchId: string, reason: string, unresolved: number): void {
    this.logFn(`[BATCH:ABORT] id=${batchId} reason=${reason} unresolved=${unresolved}`);
  }

  batchCompleted(
    batchId: string,
    summary: Readonly<Record<OutcomeKind, number>>,
    totalElapsedMs: number,
  ): void {
    this.logFn(
      `[BATCH:END] id=${batchId} success=${summary.success} warning=${summary.warning} ` +
        `error=${summary.error} elapsedMs=${Math.round(totalElapsedMs)}`,
    );
  }

  private truncate(value: string): string {
    if (value.length <= this.maxMessageLength) {
      return value;
    }
    return value.slice(0, this.maxMessageLength) + "...(truncated)";
  }
}
