import { z } from "zod";
import { BaseCheck, CheckRegistry, type CheckContext, type CheckOutcome } from "@hostprobe/core";
import type { IOutputService } from "../interfaces/output.interface";

export interface RecordedLine {
  channel: "header" | "info" | "success" | "warn" | "error" | "dim" | "log" | "json" | "diagnostic" | "newline";
  text: string;
}

/** Output service that records every call instead of printing. */
export class RecordingOutput implements IOutputService {
  readonly lines: RecordedLine[] = [];
  readonly spinners: string[] = [];
  spinnerActive = false;

  header(text: string, icon?: string): void {
    this.lines.push({ channel: "header", text: icon ? `${icon} ${text}` : text });
  }
  info(text: string): void {
    this.lines.push({ channel: "info", text });
  }
  success(text: string): void {
    this.lines.push({ channel: "success", text });
  }
  warn(text: string): void {
    this.lines.push({ channel: "warn", text });
  }
  error(text: string): void {
    this.lines.push({ channel: "error", text });
  }
  dim(text: string): void {
    this.lines.push({ channel: "dim", text });
  }
  log(text: string): void {
    this.lines.push({ channel: "log", text });
  }
  json(value: unknown): void {
    this.lines.push({ channel: "json", text: JSON.stringify(value) });
  }
  diagnostic(text: string): void {
    this.lines.push({ channel: "diagnostic", text });
  }
  newline(): void {
    this.lines.push({ channel: "newline", text: "" });
  }
  startSpinner(text: string): void {
    this.spinners.push(text);
    this.spinnerActive = true;
  }
  stopSpinner(): void {
    this.spinnerActive = false;
  }

  textOf(channel: RecordedLine["channel"]): string[] {
    return this.lines.filter((line) => line.channel === channel).map((line) => line.text);
  }

  /** Parsed payload of the single json() call. */
  jsonPayload(): unknown {
    const [text] = this.textOf("json");
    return text === undefined ? undefined : JSON.parse(text);
  }
}

const EchoConfigSchema = z.object({
  kind: z.enum(["success", "warning", "error"]).default("success"),
  message: z.string().default("ok"),
  delayMs: z.number().int().nonnegative().default(0),
});
type EchoConfig = z.infer<typeof EchoConfigSchema>;

/** Resolves to whatever outcome its configuration asks for. */
export class EchoCheck extends BaseCheck<EchoConfig> {
  readonly checkType = "echo";
  readonly name = "Echo";
  readonly description = "Returns the configured outcome";
  readonly configSchema = EchoConfigSchema;

  async run(config: EchoConfig, context: CheckContext): Promise<CheckOutcome> {
    if (config.delayMs > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, config.delayMs);
        context.signal.addEventListener("abort", () => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
    const rawData = { requested: config.kind };
    if (config.kind === "warning") return this.warning(config.message, 0, rawData);
    if (config.kind === "error") return this.error(config.message, 0, rawData);
    return this.success(config.message, 0, rawData);
  }
}

export function createEchoRegistry(): CheckRegistry {
  return CheckRegistry.withChecks([new EchoCheck()]);
}
