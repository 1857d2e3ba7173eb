import { CheckRegistry } from "./check-registry";
import { DnsRecordCheck } from "./dns/dns-record.check";
import { MailServerCheck } from "./mail/mail-server.check";
import { SslCertificateCheck } from "./ssl-certificate.check";
import { WebsiteCheck } from "./website.check";

export * from "./check.interface";
export * from "./check-registry";
export * from "./deadline";
export * from "./website.check";
export * from "./ssl-certificate.check";
export * from "./mail/mail-session";
export * from "./mail/protocols";
export * from "./mail/mail-server.check";
export * from "./dns/dns-querier";
export * from "./dns/propagation";
export * from "./dns/authoritative";
export * from "./dns/dns-record.check";

/**
 * Registry with every built-in check.
 */
export function createDefaultRegistry(): CheckRegistry {
  return CheckRegistry.withChecks([
    new WebsiteCheck(),
    new SslCertificateCheck(),
    new MailServerCheck(),
    new DnsRecordCheck(),
  ]);
}
