/**
 * Fake checks for engine tests. None of them touch the network.
 */
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { BaseCheck, type CheckContext, type ICheck } from "../../checks/check.interface";
import { CheckRegistry } from "../../checks/check-registry";
import { createOutcome, OutcomeKindSchema, type CheckOutcome } from "../../outcome";

/** Records how many runs overlap. */
export class ConcurrencyTracker {
  active = 0;
  maxActive = 0;
  started = 0;
  finished = 0;

  enter(): void {
    this.active++;
    this.started++;
    this.maxActive = Math.max(this.maxActive, this.active);
  }

  leave(): void {
    this.active--;
    this.finished++;
  }
}

const SleepConfigSchema = z.object({
  ms: z.number().nonnegative().default(0),
  kind: OutcomeKindSchema.default("success"),
  /** Reject with this message after sleeping */
  fail: z.string().optional(),
  /** Stop sleeping when the engine aborts the invocation */
  honorAbort: z.boolean().default(false),
});
type SleepConfig = z.infer<typeof SleepConfigSchema>;

export class SleepCheck extends BaseCheck<SleepConfig> {
  readonly checkType = "sleep";
  readonly name = "Sleep";
  readonly description = "Waits, then reports the configured outcome";
  readonly configSchema = SleepConfigSchema;
  readonly seenSignals: AbortSignal[] = [];

  constructor(readonly tracker: ConcurrencyTracker = new ConcurrencyTracker()) {
    super();
  }

  async run(config: SleepConfig, context: CheckContext): Promise<CheckOutcome> {
    this.tracker.enter();
    this.seenSignals.push(context.signal);
    try {
      await sleep(config.ms, undefined, config.honorAbort ? { signal: context.signal } : undefined);
      if (config.fail) {
        throw new Error(config.fail);
      }
      return createOutcome(config.kind, `slept ${config.ms}ms`, config.ms, { ms: config.ms });
    } finally {
      this.tracker.leave();
    }
  }
}

const EmptySchema = z.object({}).passthrough();

/** Throws synchronously from `run`. */
export class ExplodingCheck implements ICheck<Record<string, unknown>> {
  readonly checkType = "explode";
  readonly name = "Explode";
  readonly description = "Always throws";
  readonly configSchema = EmptySchema;
  calls = 0;

  run(): Promise<CheckOutcome> {
    this.calls++;
    throw new TypeError("kaboom");
  }
}

/** Resolves to something that is not a valid outcome. */
export class MalformedOutcomeCheck implements ICheck<Record<string, unknown>> {
  readonly checkType = "malformed";
  readonly name = "Malformed";
  readonly description = "Returns an outcome with a negative elapsed time";
  readonly configSchema = EmptySchema;

  async run(): Promise<CheckOutcome> {
    return Object.freeze({ ...createOutcome("success", "looks fine"), elapsedMs: -5 });
  }
}

export interface FakeRegistry {
  registry: CheckRegistry;
  sleep: SleepCheck;
  explode: ExplodingCheck;
  tracker: ConcurrencyTracker;
}

export function createFakeRegistry(): FakeRegistry {
  const tracker = new ConcurrencyTracker();
  const sleepCheck = new SleepCheck(tracker);
  const explode = new ExplodingCheck();
  const registry = CheckRegistry.withChecks([sleepCheck, explode, new MalformedOutcomeCheck()]);
  return { registry, sleep: sleepCheck, explode, tracker };
}

export function sleepRequest(identity: string, config: z.input<typeof SleepConfigSchema> = {}) {
  return { identity, checkType: "sleep", config };
}
