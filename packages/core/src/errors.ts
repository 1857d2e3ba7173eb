// ---------------------------------------------------------------------------
// Engine errors: the only conditions that are thrown rather than reported
// as check outcomes.
// ---------------------------------------------------------------------------

export enum EngineErrorCode {
  INVALID_OPTIONS = "INVALID_OPTIONS",
  POOL_CLOSED = "POOL_CLOSED",
  CHECK_TIMEOUT = "CHECK_TIMEOUT",
  BATCH_TIMEOUT = "BATCH_TIMEOUT",
  BATCH_CANCELLED = "BATCH_CANCELLED",
  DUPLICATE_CHECK_TYPE = "DUPLICATE_CHECK_TYPE",
  INVALID_CHECK_FILE = "INVALID_CHECK_FILE",
}

export class CheckEngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(message: string, code: EngineErrorCode) {
    super(message);
    this.name = "CheckEngineError";
    this.code = code;
  }
}

/** A caller passed options that violate the batch contract. */
export class BatchConfigError extends CheckEngineError {
  constructor(message: string) {
    super(message, EngineErrorCode.INVALID_OPTIONS);
    this.name = "BatchConfigError";
  }
}

export class PoolClosedError extends CheckEngineError {
  constructor(message = "Worker pool is closed") {
    super(message, EngineErrorCode.POOL_CLOSED);
    this.name = "PoolClosedError";
  }
}

export class CheckTimeoutError extends CheckEngineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Check timed out after ${timeoutMs}ms (per-check timeout)`, EngineErrorCode.CHECK_TIMEOUT);
    this.name = "CheckTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class BatchTimeoutError extends CheckEngineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Batch timeout of ${timeoutMs}ms reached before check resolved`, EngineErrorCode.BATCH_TIMEOUT);
    this.name = "BatchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class BatchCancelledError extends CheckEngineError {
  constructor(message = "Batch cancelled before check resolved") {
    super(message, EngineErrorCode.BATCH_CANCELLED);
    this.name = "BatchCancelledError";
  }
}

export class DuplicateCheckError extends CheckEngineError {
  constructor(checkType: string, existingName?: string) {
    super(
      `Check type '${checkType}' is already registered.` +
        (existingName ? ` Existing: ${existingName}` : ""),
      EngineErrorCode.DUPLICATE_CHECK_TYPE,
    );
    this.name = "DuplicateCheckError";
  }
}

export class CheckFileError extends CheckEngineError {
  constructor(message: string) {
    super(message, EngineErrorCode.INVALID_CHECK_FILE);
    this.name = "CheckFileError";
  }
}

export interface ErrorDescription {
  error: string;
  errorType: string;
}

/**
 * Normalize anything that was thrown into the `{ error, errorType }` pair
 * carried in an error outcome's raw data.
 */
export function describeError(err: unknown): ErrorDescription {
  if (err instanceof Error) {
    return { error: err.message, errorType: err.name };
  }
  if (typeof err === "string") {
    return { error: err, errorType: "Error" };
  }
  return { error: safeString(err), errorType: typeof err };
}

function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    // Objects without a usable toString, e.g. Object.create(null)
    return Object.prototype.toString.call(value);
  }
}
