#!/usr/bin/env tsx

import { Command } from "commander";
import chalk from "chalk";
import { HOSTPROBE_VERSION } from "@hostprobe/core";
import { createBatchHandler, type BatchCommandOptions } from "./commands/batch/batch.handler";
import { createCheckHandler, type CheckCommandOptions } from "./commands/check.handler";
import { ListHandler, type ListCommandOptions } from "./commands/list.handler";
import { parseJsonObject, parsePositiveInteger, parseSeconds } from "./commands/options";
import { createOutputService } from "./services/output.service";

const output = createOutputService();
const program = new Command();

program
  .name("hostprobe")
  .description("hostprobe - run website, certificate, mail and DNS health checks in parallel")
  .version(HOSTPROBE_VERSION);

program
  .command("batch")
  .description("Run every check in a JSON check file")
  .argument("<file>", "JSON array of { id, check_type, config } entries")
  .option("--max-workers <n>", "Checks to run at once", parsePositiveInteger)
  .option("--batch-size <n>", "Run the file in sequential chunks of this size", parsePositiveInteger)
  .option("--check-timeout <seconds>", "Time limit for each check", parseSeconds)
  .option("--batch-timeout <seconds>", "Time limit for the whole run", parseSeconds)
  .option("--json", "Print the result payload as JSON")
  .option("-o, --output <file>", "Also write the result payload to a file")
  .option("-v, --verbose", "Log engine progress to stderr")
  .action(async (file: string, options: BatchCommandOptions) => {
    process.exitCode = await createBatchHandler(output).execute(file, options);
  });

program
  .command("list")
  .description("List available check types")
  .option("--json", "Print the list as JSON")
  .action((options: ListCommandOptions) => {
    new ListHandler(output).execute(options);
  });

program
  .command("check")
  .description("Run a single check")
  .argument("<type>", "Check type, e.g. website_status")
  .option("-c, --config <json>", "Check configuration as a JSON object", parseJsonObject)
  .option("--timeout <seconds>", "Time limit for the check", parseSeconds)
  .option("--json", "Print the outcome as JSON")
  .action(async (checkType: string, options: CheckCommandOptions) => {
    process.exitCode = await createCheckHandler(output).execute(checkType, options);
  });

program.exitOverride();

try {
  await program.parseAsync();
} catch (error: unknown) {
  output.stopSpinner();
  const code = error instanceof Error && "code" in error ? error.code : undefined;
  if (code !== "commander.help" && code !== "commander.version" && code !== "commander.helpDisplayed") {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red("Error:"), message);
    process.exitCode = 1;
  }
}
