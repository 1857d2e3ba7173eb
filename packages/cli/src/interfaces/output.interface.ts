/**
 * Output Service Interface
 *
 * Everything the command handlers print goes through this contract, so
 * tests can record output instead of writing to the terminal.
 */

export interface IOutputService {
  /** Bold title line, optionally prefixed with an icon */
  header(text: string, icon?: string): void;

  info(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;

  /** De-emphasized secondary text */
  dim(text: string): void;

  /** Text written as-is */
  log(text: string): void;

  /** Pretty-printed JSON document on stdout */
  json(value: unknown): void;

  /** Diagnostic line on stderr; never mixed into JSON output */
  diagnostic(text: string): void;

  newline(): void;

  startSpinner(text: string): void;
  stopSpinner(): void;
}
