/**
 * Check Command Handler
 *
 * Runs a single check through the batch engine and prints its outcome.
 */

import { toBatchResultPayload } from "@hostprobe/core";
import type { IOutputService } from "../interfaces/output.interface";
import { createBatchRunner, exitCodeFor, type EngineServices } from "./batch/batch.handler";
import { renderEntry } from "./batch/report";
import { secondsToMs } from "./options";

export interface CheckCommandOptions {
  config?: Record<string, unknown>;
  /** Seconds */
  timeout?: number;
  json?: boolean;
}

export class CheckHandler {
  constructor(
    private readonly output: IOutputService,
    private readonly services: EngineServices = {},
  ) {}

  async execute(checkType: string, options: CheckCommandOptions = {}): Promise<number> {
    const runner = createBatchRunner(this.output, this.services);

    if (!options.json) {
      this.output.startSpinner(`Running ${checkType}...`);
    }
    const result = await runner
      .runBatch([{ identity: checkType, checkType, config: options.config ?? {} }], {
        maxWorkers: 1,
        perCheckTimeoutMs: secondsToMs(options.timeout),
      })
      .finally(() => this.output.stopSpinner());

    if (options.json) {
      this.output.json(toBatchResultPayload(result).results[0]);
      return exitCodeFor(result);
    }

    for (const entry of result.results) {
      renderEntry(this.output, entry);
      for (const [key, value] of Object.entries(entry.outcome.rawData)) {
        this.output.dim(`   ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
      }
    }
    return exitCodeFor(result);
  }
}

export function createCheckHandler(output: IOutputService, services?: EngineServices): CheckHandler {
  return new CheckHandler(output, services);
}
