/**
 * Website Status Check
 *
 * Requests a URL and compares the status code and body against
 * expectations. A status mismatch is an error; a matching status with
 * unexpected content is a warning.
 */
import { performance } from "node:perf_hooks";
import { z } from "zod";
import { DEFAULT_HTTP_TIMEOUT_MS } from "../constants/defaults";
import type { CheckOutcome } from "../outcome";
import { BaseCheck, type CheckContext } from "./check.interface";
import { deadlineSignal, failureMessage } from "./deadline";

export const WebsiteConfigSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "url must start with http:// or https://"),
  method: z
    .string()
    .min(1)
    .transform((value) => value.toUpperCase())
    .default("GET"),
  headers: z.record(z.string()).default({}),
  body: z.string().optional(),
  expectedStatus: z.number().int().min(100).max(599).default(200),
  expectedContent: z.string().min(1).optional(),
  unexpectedContent: z.string().min(1).optional(),
  followRedirects: z.boolean().default(true),
  auth: z.object({ username: z.string(), password: z.string() }).optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
});

export type WebsiteConfig = z.infer<typeof WebsiteConfigSchema>;

export class WebsiteCheck extends BaseCheck<WebsiteConfig> {
  readonly checkType = "website_status";
  readonly name = "Website Status";
  readonly description = "Checks that a website responds with the expected status code and content";
  readonly configSchema = WebsiteConfigSchema;

  async run(config: WebsiteConfig, context: CheckContext): Promise<CheckOutcome> {
    const started = performance.now();
    const headers: Record<string, string> = { ...config.headers };
    if (config.auth) {
      const token = Buffer.from(`${config.auth.username}:${config.auth.password}`).toString("base64");
      headers["Authorization"] = `Basic ${token}`;
    }

    let response: Response;
    let text: string;
    try {
      response = await fetch(config.url, {
        method: config.method,
        headers,
        body: config.body,
        redirect: config.followRedirects ? "follow" : "manual",
        signal: deadlineSignal(context.signal, config.timeoutMs),
      });
      text = await response.text();
    } catch (err) {
      const message = failureMessage(err);
      return this.error(`Connection error: ${message}`, performance.now() - started, {
        url: config.url,
        error: message,
        errorType: err instanceof Error ? err.name : typeof err,
      });
    }
    const elapsed = performance.now() - started;

    const statusMatch = response.status === config.expectedStatus;
    const contentIssues = findContentIssues(text, config);
    const contentMatch = contentIssues.length === 0;

    const rawData = {
      url: config.url,
      finalUrl: response.url || config.url,
      statusCode: response.status,
      expectedStatus: config.expectedStatus,
      statusMatch,
      contentMatch,
      contentIssues,
      responseHeaders: Object.fromEntries(response.headers.entries()),
      responseSize: Buffer.byteLength(text),
      redirected: response.redirected,
    };

    if (!statusMatch) {
      return this.error(
        `Website check failed. Expected status: ${config.expectedStatus}, actual: ${response.status}`,
        elapsed,
        rawData,
      );
    }
    if (!contentMatch) {
      return this.warning(
        `Website accessible but content issues detected: ${contentIssues.join(", ")}`,
        elapsed,
        rawData,
      );
    }
    return this.success(`Website check successful. Status code: ${response.status}`, elapsed, rawData);
  }
}

export function findContentIssues(
  body: string,
  expectations: Pick<WebsiteConfig, "expectedContent" | "unexpectedContent">,
): string[] {
  const issues: string[] = [];
  if (expectations.expectedContent && !body.includes(expectations.expectedContent)) {
    issues.push(`Expected content '${expectations.expectedContent}' not found`);
  }
  if (expectations.unexpectedContent && body.includes(expectations.unexpectedContent)) {
    issues.push(`Unexpected content '${expectations.unexpectedContent}' found`);
  }
  return issues;
}
