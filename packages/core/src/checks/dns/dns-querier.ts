/**
 * DNS lookups for the dns_record check, with answers rendered as strings
 * so they can be compared against expected values.
 */
import type { CaaRecord, MxRecord, SoaRecord, SrvRecord } from "node:dns";
import { Resolver } from "node:dns/promises";

export const DNS_RECORD_TYPES = ["A", "AAAA", "MX", "CNAME", "NS", "PTR", "TXT", "SOA", "SRV", "CAA"] as const;
export type DnsRecordType = (typeof DNS_RECORD_TYPES)[number];

export interface DnsQuery {
  name: string;
  recordType: DnsRecordType;
  /** Nameserver IPs to ask; the system resolver's servers when omitted */
  servers?: readonly string[];
  timeoutMs: number;
  signal: AbortSignal;
}

export interface DnsQuerier {
  query(query: DnsQuery): Promise<string[]>;
}

export function formatMx(record: MxRecord): string {
  return `${record.priority} ${record.exchange}`;
}

export function formatSoa(record: SoaRecord): string {
  return [
    record.nsname,
    record.hostmaster,
    record.serial,
    record.refresh,
    record.retry,
    record.expire,
    record.minttl,
  ].join(" ");
}

export function formatSrv(record: SrvRecord): string {
  return `${record.priority} ${record.weight} ${record.port} ${record.name}`;
}

export function formatCaa(record: CaaRecord): string {
  const entries: Array<[string, string | undefined]> = [
    ["issue", record.issue],
    ["issuewild", record.issuewild],
    ["iodef", record.iodef],
    ["contactemail", record.contactemail],
    ["contactphone", record.contactphone],
  ];
  const found = entries.find(([, value]) => value !== undefined);
  return found ? `${record.critical} ${found[0]} "${found[1]}"` : `${record.critical}`;
}

/** Queries through `node:dns` with a dedicated resolver per query. */
export class NodeDnsQuerier implements DnsQuerier {
  async query(query: DnsQuery): Promise<string[]> {
    const resolver = new Resolver({ timeout: query.timeoutMs, tries: 1 });
    if (query.servers && query.servers.length > 0) {
      resolver.setServers([...query.servers]);
    }

    const onAbort = (): void => resolver.cancel();
    query.signal.addEventListener("abort", onAbort, { once: true });
    try {
      return await lookup(resolver, query.name, query.recordType);
    } finally {
      query.signal.removeEventListener("abort", onAbort);
    }
  }
}

async function lookup(resolver: Resolver, name: string, recordType: DnsRecordType): Promise<string[]> {
  switch (recordType) {
    case "A":
      return resolver.resolve4(name);
    case "AAAA":
      return resolver.resolve6(name);
    case "MX":
      return (await resolver.resolveMx(name)).map(formatMx);
    case "CNAME":
      return resolver.resolveCname(name);
    case "NS":
      return resolver.resolveNs(name);
    case "PTR":
      return resolver.resolvePtr(name);
    case "TXT":
      return (await resolver.resolveTxt(name)).map((chunks) => chunks.join(""));
    case "SOA":
      return [formatSoa(await resolver.resolveSoa(name))];
    case "SRV":
      return (await resolver.resolveSrv(name)).map(formatSrv);
    case "CAA":
      return (await resolver.resolveCaa(name)).map(formatCaa);
  }
}

/** The `code` of a DNS lookup failure (`ENOTFOUND`, `ENODATA`, ...), if any. */
export function dnsErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
