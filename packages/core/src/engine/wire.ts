/**
 * Wire format
 *
 * JSON shapes exchanged with callers outside the process: check files going
 * in, result payloads coming out. Keys are snake_case and durations are in
 * seconds.
 */
import { z } from "zod";
import { CheckFileError } from "../errors";
import type { OutcomeKind, RawData } from "../outcome";
import type { BatchResult, BatchSummary } from "./result-aggregator";

export interface BatchEntryPayload {
  identity: string;
  check_type: string;
  outcome_kind: OutcomeKind;
  message: string;
  elapsed_seconds: number;
  raw_data: RawData;
  timestamp: string;
}

export interface BatchResultPayload {
  batch_id: string;
  results: BatchEntryPayload[];
  summary: BatchSummary;
  total_elapsed_seconds: number;
}

const toSeconds = (ms: number): number => Math.round(ms) / 1000;

export function toBatchResultPayload(result: BatchResult): BatchResultPayload {
  return {
    batch_id: result.batchId,
    results: result.results.map((entry) => ({
      identity: entry.identity,
      check_type: entry.checkType,
      outcome_kind: entry.outcome.kind,
      message: entry.outcome.message,
      elapsed_seconds: toSeconds(entry.outcome.elapsedMs),
      raw_data: entry.outcome.rawData,
      timestamp: entry.outcome.timestamp,
    })),
    summary: { ...result.summary },
    total_elapsed_seconds: toSeconds(result.totalElapsedMs),
  };
}

const CheckFileEntrySchema = z
  .object({
    id: z.string().optional(),
    identity: z.string().optional(),
    check_type: z.string().optional(),
    plugin_type: z.string().optional(),
    config: z.unknown().optional(),
  })
  .passthrough();

/**
 * Map a parsed check file to request inputs. Entries that do not look like
 * check entries are passed through unchanged, so the runner rejects them in
 * place rather than failing the whole file.
 *
 * @throws CheckFileError if the document is not a JSON array
 */
export function parseCheckFile(document: unknown): unknown[] {
  if (!Array.isArray(document)) {
    throw new CheckFileError("Check file must contain a JSON array of check entries");
  }

  return document.map((entry: unknown) => {
    const parsed = CheckFileEntrySchema.safeParse(entry);
    if (!parsed.success) {
      return entry;
    }
    const { id, identity, check_type, plugin_type, config } = parsed.data;
    const request: Record<string, unknown> = {};
    const resolvedIdentity = identity ?? id;
    if (resolvedIdentity !== undefined) request.identity = resolvedIdentity;
    const checkType = check_type ?? plugin_type;
    if (checkType !== undefined) request.checkType = checkType;
    if (config !== undefined) request.config = config;
    return request;
  });
}
