/**
 * Check Invoker
 *
 * Runs a single check and converts every failure into an `error` outcome.
 * `invoke` never rejects.
 */
import { performance } from "node:perf_hooks";
import type { CheckRegistry } from "../checks/check-registry";
import { createOutcome, errorOutcomeFrom, isCheckOutcome, withElapsed, type CheckOutcome } from "../outcome";
import { formatIssues } from "../request";

export interface InvokeOptions {
  /** Forwarded to the check as `context.signal` */
  signal?: AbortSignal;
}

export const EXCEPTION_PREFIX = "Exception running check";

export class CheckInvoker {
  constructor(private readonly registry: CheckRegistry) {}

  async invoke(checkType: string, config: unknown, options: InvokeOptions = {}): Promise<CheckOutcome> {
    const started = performance.now();
    const elapsed = (): number => performance.now() - started;

    const check = this.registry.get(checkType);
    if (!check) {
      return createOutcome("error", `Unknown check type '${checkType}'`, elapsed(), {
        checkType,
        availableTypes: this.registry.getCheckTypes(),
      });
    }

    try {
      // Schema refinements and transforms run check code too
      const parsed = check.configSchema.safeParse(config ?? {});
      if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        return createOutcome(
          "error",
          `Invalid configuration for check '${checkType}': ${issues.join("; ")}`,
          elapsed(),
          { config, issues },
        );
      }

      const signal = options.signal ?? new AbortController().signal;
      const outcome: unknown = await check.run(parsed.data, { signal });
      if (!isCheckOutcome(outcome)) {
        return createOutcome(
          "error",
          `Check '${checkType}' returned an invalid outcome`,
          elapsed(),
          { returned: describeReturned(outcome) },
        );
      }
      return withElapsed(outcome, elapsed());
    } catch (err) {
      return errorOutcomeFrom(err, EXCEPTION_PREFIX, elapsed());
    }
  }
}

function describeReturned(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
