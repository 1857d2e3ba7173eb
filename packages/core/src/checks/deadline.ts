/**
 * Signal that fires when the engine gives up on the check or when the
 * check's own I/O timeout elapses, whichever comes first.
 */
export function deadlineSignal(signal: AbortSignal, timeoutMs: number): AbortSignal {
  return AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]);
}

/** Message of an error, including the underlying cause fetch wraps. */
export function failureMessage(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  if (err.cause instanceof Error && err.cause.message) {
    return `${err.message} (${err.cause.message})`;
  }
  return err.message;
}
