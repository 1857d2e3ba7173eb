/**
 * Engine configuration
 *
 * Batch options are validated with zod. Environment variables provide the
 * process-wide defaults; explicit options passed to a run take precedence.
 */
import { z } from "zod";
import { defaultMaxWorkers } from "./constants/defaults";
import { BatchConfigError } from "./errors";
import { formatIssues } from "./request";

export const BatchOptionsSchema = z.object({
  /** Pool size; at most this many checks run at once */
  maxWorkers: z.number().int("maxWorkers must be an integer").positive("maxWorkers must be greater than 0").optional(),
  /** Split the batch into sequential chunks of at most this many requests */
  batchSize: z.number().int("batchSize must be an integer").positive("batchSize must be greater than 0").optional(),
  /** Upper bound on a single check's invocation */
  perCheckTimeoutMs: z.number().positive("perCheckTimeoutMs must be greater than 0").finite().optional(),
  /** Upper bound on the whole run, across all chunks */
  batchTimeoutMs: z.number().positive("batchTimeoutMs must be greater than 0").finite().optional(),
});
export type BatchOptions = z.infer<typeof BatchOptionsSchema>;

export interface ResolvedBatchOptions {
  maxWorkers: number;
  batchSize?: number;
  perCheckTimeoutMs?: number;
  batchTimeoutMs?: number;
}

/**
 * Validate caller-supplied options and fill in the pool size default.
 * @throws BatchConfigError when any option violates the batch contract
 */
export function resolveBatchOptions(options: BatchOptions = {}): ResolvedBatchOptions {
  const parsed = BatchOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new BatchConfigError(`Invalid batch options: ${formatIssues(parsed.error).join("; ")}`);
  }
  return {
    ...parsed.data,
    maxWorkers: parsed.data.maxWorkers ?? defaultMaxWorkers(),
  };
}

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess((value) => (value === undefined || value === "" ? undefined : value), schema.optional());

const EngineEnvSchema = z.object({
  HOSTPROBE_MAX_WORKERS: optionalNumber(z.coerce.number().int().positive()),
  HOSTPROBE_BATCH_SIZE: optionalNumber(z.coerce.number().int().positive()),
  HOSTPROBE_CHECK_TIMEOUT_SECONDS: optionalNumber(z.coerce.number().positive()),
  HOSTPROBE_BATCH_TIMEOUT_SECONDS: optionalNumber(z.coerce.number().positive()),
});

/**
 * Read batch defaults from environment variables. Timeouts are given in
 * seconds and converted to milliseconds.
 * @throws BatchConfigError when a variable is set to an invalid value
 */
export function loadEngineDefaults(env: NodeJS.ProcessEnv = process.env): BatchOptions {
  const parsed = EngineEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new BatchConfigError(`Invalid environment configuration: ${formatIssues(parsed.error).join("; ")}`);
  }
  const vars = parsed.data;
  const options: BatchOptions = {};
  if (vars.HOSTPROBE_MAX_WORKERS !== undefined) options.maxWorkers = vars.HOSTPROBE_MAX_WORKERS;
  if (vars.HOSTPROBE_BATCH_SIZE !== undefined) options.batchSize = vars.HOSTPROBE_BATCH_SIZE;
  if (vars.HOSTPROBE_CHECK_TIMEOUT_SECONDS !== undefined) {
    options.perCheckTimeoutMs = vars.HOSTPROBE_CHECK_TIMEOUT_SECONDS * 1000;
  }
  if (vars.HOSTPROBE_BATCH_TIMEOUT_SECONDS !== undefined) {
    options.batchTimeoutMs = vars.HOSTPROBE_BATCH_TIMEOUT_SECONDS * 1000;
  }
  return options;
}
