/**
 * List Command Handler
 */

import { createDefaultRegistry, type CheckRegistry } from "@hostprobe/core";
import type { IOutputService } from "../interfaces/output.interface";

export interface ListCommandOptions {
  json?: boolean;
}

export class ListHandler {
  constructor(
    private readonly output: IOutputService,
    private readonly registry: CheckRegistry = createDefaultRegistry(),
  ) {}

  execute(options: ListCommandOptions = {}): void {
    const checks = this.registry.describe();

    if (options.json) {
      this.output.json(checks);
      return;
    }

    this.output.header("Available Check Types", "🔎");
    this.output.newline();
    for (const check of checks) {
      this.output.info(`${check.checkType} (${check.name})`);
      this.output.dim(`   ${check.description}`);
      if (check.configKeys.length > 0) {
        this.output.dim(`   Config: ${check.configKeys.join(", ")}`);
      }
    }
    this.output.newline();
  }
}
