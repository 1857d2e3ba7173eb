/**
 * Batch Command Handler
 *
 * Reads a check file, runs it through the batch engine and reports the
 * result. The exit code is 1 when any check ended in an error.
 */

import fs from "fs-extra";
import {
  BatchLogger,
  BatchRunner,
  CheckFileError,
  CheckInvoker,
  createDefaultRegistry,
  loadEngineDefaults,
  parseCheckFile,
  toBatchResultPayload,
  type BatchResult,
  type CheckRegistry,
} from "@hostprobe/core";
import type { IOutputService } from "../../interfaces/output.interface";
import { secondsToMs } from "../options";
import { renderReport } from "./report";

export interface BatchCommandOptions {
  maxWorkers?: number;
  batchSize?: number;
  /** Seconds */
  checkTimeout?: number;
  /** Seconds */
  batchTimeout?: number;
  json?: boolean;
  output?: string;
  verbose?: boolean;
}

export interface EngineServices {
  registry?: CheckRegistry;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a runner over the registry, with environment defaults applied and
 * engine log lines routed to the output's diagnostic channel when verbose.
 */
export function createBatchRunner(
  output: IOutputService,
  services: EngineServices = {},
  verbose = false,
): BatchRunner {
  const registry = services.registry ?? createDefaultRegistry();
  const logger = verbose
    ? new BatchLogger({ verbose: true, logFn: (line) => output.diagnostic(line) })
    : undefined;
  return new BatchRunner(new CheckInvoker(registry), {
    logger,
    defaults: loadEngineDefaults(services.env ?? process.env),
  });
}

export function exitCodeFor(result: BatchResult): number {
  return result.summary.error > 0 ? 1 : 0;
}

export class BatchHandler {
  constructor(
    private readonly output: IOutputService,
    private readonly services: EngineServices = {},
  ) {}

  /**
   * Execute the batch command.
   * @returns the process exit code
   */
  async execute(file: string, options: BatchCommandOptions = {}): Promise<number> {
    const requests = parseCheckFile(await this.readCheckFile(file));
    const runner = createBatchRunner(this.output, this.services, options.verbose === true);

    if (!options.json) {
      this.output.startSpinner(`Running ${requests.length} check(s)...`);
    }

    let result: BatchResult;
    try {
      result = await runner.runBatch(requests, {
        maxWorkers: options.maxWorkers,
        batchSize: options.batchSize,
        perCheckTimeoutMs: secondsToMs(options.checkTimeout),
        batchTimeoutMs: secondsToMs(options.batchTimeout),
      });
    } finally {
      this.output.stopSpinner();
    }

    const payload = toBatchResultPayload(result);
    if (options.output) {
      await fs.outputJson(options.output, payload, { spaces: 2 });
    }

    if (options.json) {
      this.output.json(payload);
    } else {
      renderReport(this.output, result);
      if (options.output) {
        this.output.dim(`Results written to ${options.output}`);
      }
    }

    return exitCodeFor(result);
  }

  private async readCheckFile(file: string): Promise<unknown> {
    if (!(await fs.pathExists(file))) {
      throw new CheckFileError(`Check file not found: ${file}`);
    }
    try {
      const document: unknown = await fs.readJson(file);
      return document;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CheckFileError(`Could not parse check file ${file}: ${message}`);
    }
  }
}

export function createBatchHandler(output: IOutputService, services?: EngineServices): BatchHandler {
  return new BatchHandler(output, services);
}
