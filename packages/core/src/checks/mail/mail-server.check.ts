/**
 * Mail Server Check
 *
 * Connects to an SMTP, IMAP or POP3 server and runs the protocol's
 * capability handshake, logging in when credentials are configured.
 * Optionally resolves the domain's MX records first and checks the
 * highest-priority exchanger.
 */
import { Resolver } from "node:dns/promises";
import { performance } from "node:perf_hooks";
import { z } from "zod";
import { DEFAULT_MAIL_TIMEOUT_MS, MAIL_PORTS } from "../../constants/defaults";
import type { CheckOutcome } from "../../outcome";
import { BaseCheck, type CheckContext } from "../check.interface";
import { deadlineSignal, failureMessage } from "../deadline";
import { MailSession } from "./mail-session";
import { HANDSHAKES, MailAuthError, MailProtocolError, describeCapabilities, type MailProtocol } from "./protocols";

export const MailServerConfigSchema = z
  .object({
    hostname: z.string().min(1, "hostname is required"),
    protocol: z
      .string()
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(["smtp", "imap", "pop3"])),
    port: z.number().int().min(1).max(65535).optional(),
    useSsl: z.boolean().default(false),
    timeoutMs: z.number().int().positive().default(DEFAULT_MAIL_TIMEOUT_MS),
    resolveMx: z.boolean().default(false),
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
  })
  .refine((config) => (config.username === undefined) === (config.password === undefined), {
    message: "username and password must be given together",
    path: ["password"],
  });

export type MailServerConfig = z.infer<typeof MailServerConfigSchema>;

export interface MxRecord {
  exchange: string;
  priority: number;
}

export interface MxLookupOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

export type MxResolver = (domain: string, options: MxLookupOptions) => Promise<MxRecord[]>;

/** MX lookup on a dedicated resolver, cancelled when the signal fires. */
export async function resolveMxRecords(domain: string, options: MxLookupOptions): Promise<MxRecord[]> {
  options.signal.throwIfAborted();
  const resolver = new Resolver({ timeout: options.timeoutMs, tries: 1 });
  const onAbort = (): void => resolver.cancel();
  options.signal.addEventListener("abort", onAbort, { once: true });
  try {
    return await resolver.resolveMx(domain);
  } finally {
    options.signal.removeEventListener("abort", onAbort);
  }
}

export function defaultMailPort(protocol: MailProtocol, useSsl: boolean): number {
  return useSsl ? MAIL_PORTS[protocol].ssl : MAIL_PORTS[protocol].plain;
}

/** Exchanger hosts ordered by preference, trailing dots removed. */
export function orderMxRecords(records: readonly MxRecord[]): string[] {
  return [...records]
    .sort((a, b) => a.priority - b.priority || a.exchange.localeCompare(b.exchange))
    .map((record) => record.exchange.replace(/\.$/, ""));
}

export class MailServerCheck extends BaseCheck<MailServerConfig> {
  readonly checkType = "mail_server";
  readonly name = "Mail Server";
  readonly description = "Checks SMTP, IMAP or POP3 server connectivity and capabilities";
  readonly configSchema = MailServerConfigSchema;

  constructor(private readonly resolveMx: MxResolver = resolveMxRecords) {
    super();
  }

  async run(config: MailServerConfig, context: CheckContext): Promise<CheckOutcome> {
    const started = performance.now();
    const signal = deadlineSignal(context.signal, config.timeoutMs);
    const protocol = config.protocol;
    const port = config.port ?? defaultMailPort(protocol, config.useSsl);
    const label = protocol.toUpperCase();

    let host = config.hostname;
    const rawData: Record<string, unknown> = {
      hostname: config.hostname,
      port,
      protocol,
      useSsl: config.useSsl,
      mxRecords: null,
    };

    if (config.resolveMx && shouldResolveMx(config.hostname)) {
      try {
        const records = await this.resolveMx(config.hostname, { timeoutMs: config.timeoutMs, signal });
        const exchangers = orderMxRecords(records);
        rawData.mxRecords = exchangers;
        const preferred = exchangers[0];
        if (preferred) {
          host = preferred;
          rawData.hostnameUsed = preferred;
        }
      } catch (err) {
        rawData.mxError = failureMessage(err);
      }
    }

    const credentials =
      config.username !== undefined && config.password !== undefined
        ? { username: config.username, password: config.password }
        : undefined;
    const target = host === config.hostname ? `${host}:${port}` : `for ${config.hostname} (using ${host}:${port})`;

    let session: MailSession;
    try {
      session = await MailSession.connect({ host, port, useSsl: config.useSsl, signal });
    } catch (err) {
      return this.error(
        `Connection error checking ${label} server ${target}: ${failureMessage(err)}`,
        performance.now() - started,
        { ...rawData, error: failureMessage(err) },
      );
    }
    rawData.remoteAddress = session.remoteAddress;

    try {
      const result = await HANDSHAKES[protocol](session, credentials);
      const authenticated = credentials ? `. Authenticated as ${credentials.username}` : "";
      return this.success(
        `${label} server ${target} is operational${describeCapabilities(protocol, result)}${authenticated}`,
        performance.now() - started,
        { ...rawData, greeting: result.greeting, ...result.details },
      );
    } catch (err) {
      const kind =
        err instanceof MailAuthError
          ? "Authentication failed"
          : err instanceof MailProtocolError
            ? "Protocol error"
            : "Error";
      return this.error(
        `${kind} checking ${label} server ${target}: ${failureMessage(err)}`,
        performance.now() - started,
        { ...rawData, error: failureMessage(err) },
      );
    } finally {
      session.close();
    }
  }
}

/** MX lookup only makes sense for domain names, not IP literals. */
function shouldResolveMx(hostname: string): boolean {
  return hostname.includes(".") && !/^\d/.test(hostname) && !hostname.includes(":");
}
