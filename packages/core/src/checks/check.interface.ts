/**
 * Check Interface
 *
 * Contract every check implementation fulfils. A check accepts a validated
 * configuration and resolves to an outcome; anything it throws is contained
 * by the invoker.
 */
import type { z } from "zod";
import { createOutcome, type CheckOutcome, type RawData } from "../outcome";

export interface CheckContext {
  /** Fires when the engine stops waiting for this check (timeout or cancel) */
  readonly signal: AbortSignal;
}

export interface ICheck<TConfig = unknown> {
  /** Tag used by requests to select this check */
  readonly checkType: string;

  /** Human-readable name for display */
  readonly name: string;

  /** What this check verifies */
  readonly description: string;

  /** Schema the request configuration is validated against before `run` */
  readonly configSchema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;

  run(config: TConfig, context: CheckContext): Promise<CheckOutcome>;
}

/**
 * Base class for checks with outcome helpers.
 */
export abstract class BaseCheck<TConfig> implements ICheck<TConfig> {
  abstract readonly checkType: string;
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly configSchema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;

  abstract run(config: TConfig, context: CheckContext): Promise<CheckOutcome>;

  protected success(message: string, elapsedMs: number, rawData?: RawData): CheckOutcome {
    return createOutcome("success", message, elapsedMs, rawData);
  }

  protected warning(message: string, elapsedMs: number, rawData?: RawData): CheckOutcome {
    return createOutcome("warning", message, elapsedMs, rawData);
  }

  protected error(message: string, elapsedMs: number, rawData?: RawData): CheckOutcome {
    return createOutcome("error", message, elapsedMs, rawData);
  }
}
