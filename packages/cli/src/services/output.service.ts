/**
 * Output Service
 *
 * Terminal implementation of IOutputService using chalk and ora.
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { IOutputService } from "../interfaces/output.interface";

export class OutputService implements IOutputService {
  private spinner: Ora | null = null;

  header(text: string, icon?: string): void {
    console.log(chalk.blue.bold(icon ? `${icon} ${text}` : text));
  }

  info(text: string): void {
    console.log(chalk.blue(text));
  }

  success(text: string): void {
    console.log(chalk.green(text));
  }

  warn(text: string): void {
    console.log(chalk.yellow(text));
  }

  error(text: string): void {
    console.error(chalk.red(text));
  }

  dim(text: string): void {
    console.log(chalk.gray(text));
  }

  log(text: string): void {
    console.log(text);
  }

  json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  diagnostic(text: string): void {
    // Keep the spinner line intact while logging underneath it
    if (this.spinner) {
      this.spinner.clear();
    }
    process.stderr.write(`${chalk.gray(text)}\n`);
    if (this.spinner) {
      this.spinner.render();
    }
  }

  newline(): void {
    console.log();
  }

  startSpinner(text: string): void {
    this.stopSpinner();
    // Spinner frames go to stderr so piped stdout stays clean
    this.spinner = ora({ text, stream: process.stderr }).start();
  }

  stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

/**
 * Factory for the default terminal output.
 */
export function createOutputService(): IOutputService {
  return new OutputService();
}
