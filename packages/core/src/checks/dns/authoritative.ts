/**
 * Authoritative lookups: find the zone's nameservers through NS records and
 * ask them directly. An answer from one of them is authoritative.
 */
import { failureMessage } from "../deadline";
import type { DnsQuerier, DnsRecordType } from "./dns-querier";

export interface AuthoritativeRequest {
  name: string;
  recordType: DnsRecordType;
  timeoutMs: number;
  signal: AbortSignal;
}

export interface AuthoritativeReport {
  isAuthoritative: boolean;
  /** Zone whose NS records were used */
  zone?: string;
  nameservers: string[];
  /** Address of the nameserver that answered */
  nameserver?: string;
  records?: string[];
  /** Nameserver addresses queried, in order */
  attempted: string[];
  /** Failed lookups keyed by the name or address queried */
  failures: Record<string, string>;
  error?: string;
}

/** The name itself, then each parent zone down to two labels. */
export function zoneCandidates(name: string): string[] {
  const labels = name.replace(/\.$/, "").split(".");
  const candidates: string[] = [];
  for (let i = 0; i <= labels.length - 2; i++) {
    candidates.push(labels.slice(i).join("."));
  }
  return candidates.length > 0 ? candidates : [name];
}

export async function checkAuthoritative(
  querier: DnsQuerier,
  request: AuthoritativeRequest,
): Promise<AuthoritativeReport> {
  const failures: Record<string, string> = {};
  const ask = async (
    key: string,
    name: string,
    recordType: DnsRecordType,
    servers?: readonly string[],
  ): Promise<string[] | undefined> => {
    try {
      return await querier.query({ name, recordType, servers, timeoutMs: request.timeoutMs, signal: request.signal });
    } catch (err) {
      failures[key] = failureMessage(err);
      return undefined;
    }
  };

  let zone: string | undefined;
  let nameservers: string[] = [];
  for (const candidate of zoneCandidates(request.name)) {
    const found = await ask(candidate, candidate, "NS");
    if (found && found.length > 0) {
      zone = candidate;
      nameservers = found.map((host) => host.replace(/\.$/, ""));
      break;
    }
  }

  const addresses: string[] = [];
  for (const host of nameservers) {
    for (const ip of (await ask(host, host, "A")) ?? []) {
      if (!addresses.includes(ip)) addresses.push(ip);
    }
  }
  if (addresses.length === 0) {
    return {
      isAuthoritative: false,
      zone,
      nameservers,
      attempted: [],
      failures,
      error: "Could not determine authoritative nameservers",
    };
  }

  const attempted: string[] = [];
  for (const ip of addresses) {
    attempted.push(ip);
    const records = await ask(ip, request.name, request.recordType, [ip]);
    if (records) {
      return { isAuthoritative: true, zone, nameservers, nameserver: ip, records, attempted, failures };
    }
  }
  return {
    isAuthoritative: false,
    zone,
    nameservers,
    attempted,
    failures,
    error: "No authoritative response received from nameservers",
  };
}
