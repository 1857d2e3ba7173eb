/**
 * DNS Record Check
 *
 * Resolves a record, optionally compares it to expected values, asks the
 * zone's own nameservers and measures propagation across public resolvers.
 */
import { isIP } from "node:net";
import { performance } from "node:perf_hooks";
import { z } from "zod";
import {
  DEFAULT_DNS_TIMEOUT_MS,
  DEFAULT_PROPAGATION_THRESHOLD,
  DEFAULT_PROPAGATION_WORKERS,
} from "../../constants/defaults";
import { DEFAULT_PUBLIC_RESOLVERS, type ResolverInfo } from "../../constants/public-resolvers";
import type { CheckOutcome, OutcomeKind } from "../../outcome";
import { BaseCheck, type CheckContext } from "../check.interface";
import { deadlineSignal, failureMessage } from "../deadline";
import { checkAuthoritative, type AuthoritativeReport } from "./authoritative";
import { DNS_RECORD_TYPES, NodeDnsQuerier, dnsErrorCode, type DnsQuerier } from "./dns-querier";
import { checkPropagation, containsExpected, type PropagationReport } from "./propagation";

const IpAddressSchema = z.string().refine((value) => isIP(value) !== 0, (value) => ({
  message: `Invalid resolver IP address: ${value}`,
}));

const ResolverSchema = z.union([
  IpAddressSchema.transform((ip): ResolverInfo => ({ ip, name: ip, provider: "Custom" })),
  z
    .object({ ip: IpAddressSchema, name: z.string().optional(), provider: z.string().optional() })
    .transform((entry): ResolverInfo => ({
      ip: entry.ip,
      name: entry.name ?? entry.ip,
      provider: entry.provider ?? "Unknown",
    })),
]);

export const DnsRecordConfigSchema = z.object({
  domain: z.string().min(1, "domain is required"),
  recordType: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(DNS_RECORD_TYPES)),
  subdomain: z.string().default(""),
  expectedValue: z.union([z.string().min(1), z.array(z.string()).min(1)]).optional(),
  nameserver: z.union([IpAddressSchema, z.array(IpAddressSchema).min(1)]).optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_DNS_TIMEOUT_MS),
  checkAuthoritative: z.boolean().default(false),
  checkPropagation: z.boolean().default(false),
  resolvers: z.array(ResolverSchema).min(1).optional(),
  propagationThreshold: z
    .number()
    .min(0, "propagationThreshold must be between 0 and 100")
    .max(100, "propagationThreshold must be between 0 and 100")
    .default(DEFAULT_PROPAGATION_THRESHOLD),
  maxWorkers: z.number().int().positive().default(DEFAULT_PROPAGATION_WORKERS),
});

export type DnsRecordConfig = z.infer<typeof DnsRecordConfigSchema>;

const MAX_LISTED_VALUES = 5;

export class DnsRecordCheck extends BaseCheck<DnsRecordConfig> {
  readonly checkType = "dns_record";
  readonly name = "DNS Record";
  readonly description = "Checks DNS record existence, expected values and propagation";
  readonly configSchema = DnsRecordConfigSchema;

  constructor(private readonly querier: DnsQuerier = new NodeDnsQuerier()) {
    super();
  }

  async run(config: DnsRecordConfig, context: CheckContext): Promise<CheckOutcome> {
    const fullDomain = config.subdomain ? `${config.subdomain}.${config.domain}` : config.domain;
    const recordType = config.recordType;
    const servers = config.nameserver === undefined ? undefined : [config.nameserver].flat();
    const expected = config.expectedValue === undefined ? [] : [config.expectedValue].flat();
    const started = performance.now();

    let records: string[];
    try {
      records = await this.querier.query({
        name: fullDomain,
        recordType,
        servers,
        timeoutMs: config.timeoutMs,
        signal: deadlineSignal(context.signal, config.timeoutMs),
      });
    } catch (err) {
      const code = dnsErrorCode(err);
      const elapsed = performance.now() - started;
      const rawData = { domain: fullDomain, recordType, error: code ?? failureMessage(err), queryTimeMs: elapsed };
      switch (code) {
        case "ENOTFOUND":
          return this.error(`Domain ${fullDomain} does not exist`, elapsed, rawData);
        case "ENODATA":
          return this.error(`No ${recordType} records found for ${fullDomain}`, elapsed, rawData);
        case "ETIMEOUT":
          return this.error(`Timeout resolving ${recordType} records for ${fullDomain}`, elapsed, rawData);
        default:
          return this.error(`Error checking DNS records: ${failureMessage(err)}`, elapsed, rawData);
      }
    }
    const queryTimeMs = performance.now() - started;

    let authoritative: AuthoritativeReport | undefined;
    if (config.checkAuthoritative) {
      authoritative = await checkAuthoritative(this.querier, {
        name: fullDomain,
        recordType,
        timeoutMs: config.timeoutMs,
        signal: deadlineSignal(context.signal, config.timeoutMs),
      });
    }

    let propagation: PropagationReport | undefined;
    if (config.checkPropagation) {
      propagation = await checkPropagation(this.querier, {
        name: fullDomain,
        recordType,
        expected,
        resolvers: config.resolvers ?? DEFAULT_PUBLIC_RESOLVERS,
        threshold: config.propagationThreshold,
        timeoutMs: config.timeoutMs,
        maxWorkers: config.maxWorkers,
        signal: deadlineSignal(context.signal, config.timeoutMs),
      });
    }

    const expectedMatch = containsExpected(records, expected);
    let kind: OutcomeKind = "success";
    const issues: string[] = [];

    if (!expectedMatch) {
      kind = "error";
      issues.push(
        Array.isArray(config.expectedValue)
          ? `Expected values ${JSON.stringify(config.expectedValue)} not all found`
          : `Expected value '${config.expectedValue}' not found`,
      );
    }
    if (authoritative && !authoritative.isAuthoritative) {
      if (kind !== "error") kind = "warning";
      issues.push("Non-authoritative response");
    }
    if (propagation && propagation.status !== "success") {
      const counts = `${propagation.percentage}% (${propagation.consistentCount}/${propagation.totalCount} resolvers)`;
      if (propagation.status === "error") {
        kind = "error";
        issues.push(`Poor propagation: ${counts}`);
      } else {
        if (kind !== "error") kind = "warning";
        issues.push(`Partial propagation: ${counts}`);
      }
    }

    const rawData: Record<string, unknown> = {
      domain: fullDomain,
      recordType,
      records,
      expectedValue: config.expectedValue ?? null,
      expectedValueMatch: expectedMatch,
      queryTimeMs,
      nameserver: servers ?? "system",
    };
    if (authoritative) rawData.authoritative = authoritative;
    if (propagation) rawData.propagation = propagation;

    const message =
      (kind === "success"
        ? successMessage(recordType, fullDomain, config.expectedValue, records.length)
        : `DNS ${recordType} record check for ${fullDomain} has issues: ${issues.join(", ")}`) +
      listValues(records);

    const elapsed = performance.now() - started;
    if (kind === "success") return this.success(message, elapsed, rawData);
    if (kind === "warning") return this.warning(message, elapsed, rawData);
    return this.error(message, elapsed, rawData);
  }
}

function successMessage(
  recordType: string,
  domain: string,
  expectedValue: string | string[] | undefined,
  count: number,
): string {
  if (Array.isArray(expectedValue)) {
    return `DNS ${recordType} records for ${domain} contain all expected values`;
  }
  if (expectedValue !== undefined) {
    return `DNS ${recordType} record for ${domain} matches expected value`;
  }
  return count > 1 ? `DNS ${recordType} records found for ${domain}` : `DNS ${recordType} record found for ${domain}`;
}

function listValues(records: readonly string[]): string {
  return records.length <= MAX_LISTED_VALUES
    ? `. Values: ${records.join(", ")}`
    : `. Found ${records.length} records`;
}
