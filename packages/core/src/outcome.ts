/**
 * Check outcomes
 *
 * The normalized result every check produces. Outcomes are frozen on
 * creation and never mutated afterwards.
 */
import { z } from "zod";
import { describeError } from "./errors";

export const OutcomeKindSchema = z.enum(["success", "warning", "error"]);
export type OutcomeKind = z.infer<typeof OutcomeKindSchema>;

export type RawData = Readonly<Record<string, unknown>>;

export interface CheckOutcome {
  readonly kind: OutcomeKind;
  readonly message: string;
  /** Wall-clock duration of the invocation itself, queueing excluded */
  readonly elapsedMs: number;
  readonly rawData: RawData;
  /** ISO-8601 time the outcome was produced */
  readonly timestamp: string;
}

export const CheckOutcomeSchema = z.object({
  kind: OutcomeKindSchema,
  message: z.string(),
  elapsedMs: z.number().nonnegative(),
  rawData: z.record(z.unknown()),
  timestamp: z.string(),
});

export function createOutcome(
  kind: OutcomeKind,
  message: string,
  elapsedMs = 0,
  rawData: RawData = {},
): CheckOutcome {
  return Object.freeze({
    kind,
    message,
    elapsedMs: Number.isFinite(elapsedMs) && elapsedMs > 0 ? elapsedMs : 0,
    rawData: Object.freeze({ ...rawData }),
    timestamp: new Date().toISOString(),
  });
}

/** Copy of `outcome` stamped with a different elapsed time. */
export function withElapsed(outcome: CheckOutcome, elapsedMs: number): CheckOutcome {
  return createOutcome(outcome.kind, outcome.message, elapsedMs, outcome.rawData);
}

/**
 * Error outcome for something that was thrown. The message is prefixed and
 * the raw data carries the failure's type name and description.
 */
export function errorOutcomeFrom(
  err: unknown,
  prefix: string,
  elapsedMs = 0,
  extra: Record<string, unknown> = {},
): CheckOutcome {
  const described = describeError(err);
  return createOutcome("error", `${prefix}: ${described.error}`, elapsedMs, {
    ...extra,
    ...described,
  });
}

export function isCheckOutcome(value: unknown): value is CheckOutcome {
  return CheckOutcomeSchema.safeParse(value).success;
}
