/**
 * Batch Runner
 *
 * Coordinates one batch run: validates requests, splits them into chunks,
 * feeds each chunk through the worker pool and enforces the per-check and
 * batch-level time limits. Every submitted request gets exactly one entry in
 * the result, in submission order.
 */
import { performance } from "node:perf_hooks";
import { v4 as uuidv4 } from "uuid";
import { resolveBatchOptions, type BatchOptions, type ResolvedBatchOptions } from "../config";
import {
  BatchCancelledError,
  BatchConfigError,
  BatchTimeoutError,
  CheckTimeoutError,
  describeError,
} from "../errors";
import type { BatchLogger } from "../logger";
import { createOutcome, errorOutcomeFrom, type CheckOutcome } from "../outcome";
import { normalizeRequests, type CheckRequest } from "../request";
import type { CheckInvoker } from "./check-invoker";
import { aggregateResults, type BatchEntry, type BatchResult } from "./result-aggregator";
import { WorkerPool } from "./worker-pool";

export interface RunBatchOptions extends BatchOptions {
  /** Cancels the run; unresolved requests are reported as cancelled */
  signal?: AbortSignal;
  /** Shared pool. The runner never closes a pool it did not create. */
  pool?: WorkerPool;
}

export interface BatchRunnerOptions {
  logger?: BatchLogger;
  /** Fallback options, overridden field by field by each run's options */
  defaults?: BatchOptions;
}

interface QueuedItem {
  readonly index: number;
  readonly request: CheckRequest;
}

type InterruptReason = "timeout" | "cancelled";

interface RunState {
  readonly batchId: string;
  readonly options: ResolvedBatchOptions;
  readonly pool: WorkerPool;
  readonly slots: Array<BatchEntry | undefined>;
  /** performance.now() reading at the moment each unit got a slot */
  readonly unitStarts: Map<number, number>;
  /** Aborted when the batch times out or is cancelled */
  readonly interrupt: AbortController;
  interruptReason?: InterruptReason;
  finalized: boolean;
}

export class BatchRunner {
  private readonly logger?: BatchLogger;
  private readonly defaults: BatchOptions;

  constructor(
    private readonly invoker: CheckInvoker,
    options: BatchRunnerOptions = {},
  ) {
    this.logger = options.logger;
    this.defaults = options.defaults ?? {};
  }

  /**
   * Run every request and collect one entry per request.
   *
   * @throws BatchConfigError when options are invalid or `requests` is not an array
   */
  async runBatch(requests: readonly unknown[], options: RunBatchOptions = {}): Promise<BatchResult> {
    if (!Array.isArray(requests)) {
      throw new BatchConfigError("Invalid batch: requests must be an array");
    }
    const { signal, pool: sharedPool, ...batchOptions } = options;
    const resolved = resolveBatchOptions({ ...this.defaults, ...stripUndefined(batchOptions) });

    const batchId = uuidv4();
    const startedAt = performance.now();
    const normalized = normalizeRequests(requests);

    const run: RunState = {
      batchId,
      options: resolved,
      pool: sharedPool ?? new WorkerPool(resolved.maxWorkers),
      slots: new Array<BatchEntry | undefined>(normalized.length).fill(undefined),
      unitStarts: new Map(),
      interrupt: new AbortController(),
      finalized: false,
    };
    const ownsPool = sharedPool === undefined;

    const queued: QueuedItem[] = [];
    for (const entry of normalized) {
      if (entry.valid) {
        queued.push({ index: entry.index, request: entry.request });
        continue;
      }
      this.logger?.requestRejected(batchId, entry.identity, entry.issues);
      run.slots[entry.index] = {
        index: entry.index,
        identity: entry.identity,
        checkType: entry.checkType,
        outcome: createOutcome("error", `Rejected check request: ${entry.issues.join("; ")}`, 0, {
          rejected: true,
          issues: entry.issues,
        }),
      };
    }

    const chunks = chunk(queued, resolved.batchSize);
    this.logger?.batchStarted(batchId, normalized.length, chunks.length, run.pool.size);

    const interrupted = new Promise<void>((resolve) => {
      run.interrupt.signal.addEventListener("abort", () => resolve(), { once: true });
    });
    const onCancel = (): void => this.interruptRun(run, "cancelled");
    let batchTimer: ReturnType<typeof setTimeout> | undefined;

    if (signal?.aborted) {
      this.interruptRun(run, "cancelled");
    } else {
      signal?.addEventListener("abort", onCancel, { once: true });
      if (resolved.batchTimeoutMs !== undefined) {
        batchTimer = setTimeout(() => this.interruptRun(run, "timeout"), resolved.batchTimeoutMs);
      }
    }

    try {
      for (let i = 0; i < chunks.length && !run.interrupt.signal.aborted; i++) {
        const items = chunks[i] ?? [];
        this.logger?.chunkStarted(batchId, i + 1, chunks.length, items.length);
        const pending = items.map((item) => this.runItem(run, item));
        await Promise.race([Promise.all(pending), interrupted]);
      }
    } finally {
      if (batchTimer) clearTimeout(batchTimer);
      signal?.removeEventListener("abort", onCancel);
    }

    if (run.interruptReason) {
      const unresolved = this.fillUnresolved(run, queued, run.interruptReason);
      this.logger?.batchInterrupted(batchId, run.interruptReason, unresolved);
    }

    run.finalized = true;
    if (ownsPool) {
      run.pool.close({ abandonQueued: true });
    }

    const entries = run.slots.filter((entry): entry is BatchEntry => entry !== undefined);
    const result = aggregateResults(entries, { batchId, startedAt });
    this.logger?.batchCompleted(batchId, result.summary, result.totalElapsedMs);
    return result;
  }

  /**
   * Submit one request. Resolves once its slot in the result is filled,
   * which on a per-check timeout happens before the pool unit settles.
   */
  private runItem(run: RunState, item: QueuedItem): Promise<void> {
    return new Promise<void>((resolve) => {
      const unit = run.pool.submit(() => this.execute(run, item, resolve));
      void unit.then(resolve, (err: unknown) => {
        this.record(run, item, errorOutcomeFrom(err, "Check could not be scheduled"));
        resolve();
      });
    });
  }

  /**
   * Body of a pool unit. Holds the slot until the invocation settles, even
   * after a per-check timeout has already filled the result.
   */
  private async execute(run: RunState, item: QueuedItem, settleItem: () => void): Promise<void> {
    if (run.interrupt.signal.aborted) return;

    const unitStart = performance.now();
    run.unitStarts.set(item.index, unitStart);

    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort(run.interrupt.signal.reason);
    run.interrupt.signal.addEventListener("abort", onInterrupt, { once: true });

    const timeoutMs = run.options.perCheckTimeoutMs;
    let checkTimer: ReturnType<typeof setTimeout> | undefined;
    if (timeoutMs !== undefined) {
      checkTimer = setTimeout(() => {
        const err = new CheckTimeoutError(timeoutMs);
        controller.abort(err);
        if (this.record(run, item, timeoutOutcome(err, performance.now() - unitStart))) {
          this.logger?.checkTimedOut(run.batchId, item.request.identity, timeoutMs);
        }
        settleItem();
      }, timeoutMs);
    }

    try {
      const outcome = await this.invoker.invoke(item.request.checkType, item.request.config, {
        signal: controller.signal,
      });
      if (this.record(run, item, outcome)) {
        this.logger?.checkCompleted(
          run.batchId,
          item.request.identity,
          item.request.checkType,
          outcome.kind,
          outcome.elapsedMs,
          outcome.message,
        );
      }
    } finally {
      if (checkTimer) clearTimeout(checkTimer);
      run.interrupt.signal.removeEventListener("abort", onInterrupt);
    }
  }

  /**
   * Fill a result slot. The first write wins and nothing is written once the
   * run has returned. Returns whether the outcome was kept.
   */
  private record(run: RunState, item: QueuedItem, outcome: CheckOutcome): boolean {
    if (run.finalized || run.slots[item.index] !== undefined) {
      return false;
    }
    run.slots[item.index] = {
      index: item.index,
      identity: item.request.identity,
      checkType: item.request.checkType,
      outcome,
    };
    return true;
  }

  private interruptRun(run: RunState, reason: InterruptReason): void {
    if (run.interrupt.signal.aborted) return;
    run.interruptReason = reason;
    const err =
      reason === "timeout"
        ? new BatchTimeoutError(run.options.batchTimeoutMs ?? 0)
        : new BatchCancelledError();
    run.interrupt.abort(err);
  }

  private fillUnresolved(run: RunState, queued: readonly QueuedItem[], reason: InterruptReason): number {
    const now = performance.now();
    let unresolved = 0;
    for (const item of queued) {
      if (run.slots[item.index] !== undefined) continue;
      const err =
        reason === "timeout"
          ? new BatchTimeoutError(run.options.batchTimeoutMs ?? 0)
          : new BatchCancelledError();
      const unitStart = run.unitStarts.get(item.index);
      const extra = err instanceof BatchTimeoutError ? { timeoutMs: err.timeoutMs } : {};
      this.record(
        run,
        item,
        createOutcome("error", err.message, unitStart === undefined ? 0 : now - unitStart, {
          ...describeError(err),
          ...extra,
        }),
      );
      unresolved++;
    }
    return unresolved;
  }
}

function timeoutOutcome(err: CheckTimeoutError, elapsedMs: number): CheckOutcome {
  return createOutcome("error", err.message, elapsedMs, {
    ...describeError(err),
    timeoutMs: err.timeoutMs,
  });
}

function chunk<T>(items: readonly T[], size: number | undefined): T[][] {
  if (items.length === 0) return [];
  if (size === undefined || items.length <= size) return [[...items]];
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function stripUndefined(options: BatchOptions): BatchOptions {
  const result: BatchOptions = {};
  if (options.maxWorkers !== undefined) result.maxWorkers = options.maxWorkers;
  if (options.batchSize !== undefined) result.batchSize = options.batchSize;
  if (options.perCheckTimeoutMs !== undefined) result.perCheckTimeoutMs = options.perCheckTimeoutMs;
  if (options.batchTimeoutMs !== undefined) result.batchTimeoutMs = options.batchTimeoutMs;
  return result;
}
