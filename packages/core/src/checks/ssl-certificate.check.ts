/**
 * SSL Certificate Check
 *
 * Opens a TLS connection, reads the peer certificate and classifies it by
 * how long it remains valid.
 */
import { performance } from "node:perf_hooks";
import tls from "node:tls";
import { z } from "zod";
import {
  DEFAULT_CERT_CRITICAL_DAYS,
  DEFAULT_CERT_WARNING_DAYS,
  DEFAULT_TLS_TIMEOUT_MS,
} from "../constants/defaults";
import type { CheckOutcome, OutcomeKind } from "../outcome";
import { BaseCheck, type CheckContext } from "./check.interface";
import { deadlineSignal, failureMessage } from "./deadline";

const DAY_MS = 24 * 60 * 60 * 1000;

export const SslCertificateConfigSchema = z
  .object({
    hostname: z.string().min(1, "hostname is required"),
    port: z.number().int().min(1).max(65535).optional(),
    timeoutMs: z.number().int().positive().default(DEFAULT_TLS_TIMEOUT_MS),
    warningDays: z.number().int().nonnegative().default(DEFAULT_CERT_WARNING_DAYS),
    criticalDays: z.number().int().nonnegative().default(DEFAULT_CERT_CRITICAL_DAYS),
    checkChain: z.boolean().default(false),
    verifyHostname: z.boolean().default(true),
  })
  .refine((config) => config.criticalDays <= config.warningDays, {
    message: "criticalDays must not exceed warningDays",
    path: ["criticalDays"],
  });

export type SslCertificateConfig = z.infer<typeof SslCertificateConfigSchema>;

export interface CertificateInfo {
  notBefore: Date;
  notAfter: Date;
  subject: Record<string, string>;
  issuer: Record<string, string>;
  serialNumber: string;
  fingerprint256: string;
  alternativeNames: string[];
  authorized: boolean;
  authorizationError?: string;
  /** Set when the certificate does not cover the requested hostname */
  hostnameError?: string;
  cipher?: string;
  protocol?: string;
}

export interface CertificateRequest {
  hostname: string;
  port: number;
  timeoutMs: number;
  signal: AbortSignal;
}

export type CertificateFetcher = (request: CertificateRequest) => Promise<CertificateInfo>;

export interface CertificateClassification {
  kind: OutcomeKind;
  message: string;
  daysUntilExpiration: number;
}

/**
 * Accepts a bare host or a URL. A port in the URL wins over the configured
 * one; plain `http://` URLs default to port 80.
 */
export function parseHostAndPort(target: string, configuredPort?: number): { hostname: string; port: number } {
  if (/^https?:\/\//i.test(target)) {
    const url = new URL(target);
    if (url.port) {
      return { hostname: url.hostname, port: Number(url.port) };
    }
    const schemeDefault = url.protocol === "http:" ? 80 : 443;
    return { hostname: url.hostname, port: configuredPort ?? schemeDefault };
  }
  return { hostname: target, port: configuredPort ?? 443 };
}

export function classifyCertificate(
  validity: Pick<CertificateInfo, "notBefore" | "notAfter">,
  thresholds: { warningDays: number; criticalDays: number },
  now: Date = new Date(),
): CertificateClassification {
  const expires = validity.notAfter.toISOString();
  const daysUntilExpiration = Math.floor((validity.notAfter.getTime() - now.getTime()) / DAY_MS);

  if (now < validity.notBefore) {
    return {
      kind: "error",
      message: `Certificate not yet valid. Valid from ${validity.notBefore.toISOString()}`,
      daysUntilExpiration,
    };
  }
  if (now > validity.notAfter) {
    return { kind: "error", message: `Certificate expired on ${expires}`, daysUntilExpiration };
  }
  if (daysUntilExpiration <= thresholds.criticalDays) {
    return {
      kind: "error",
      message: `Certificate expires very soon: ${daysUntilExpiration} days left (expires on ${expires})`,
      daysUntilExpiration,
    };
  }
  if (daysUntilExpiration <= thresholds.warningDays) {
    return {
      kind: "warning",
      message: `Certificate expiration approaching: ${daysUntilExpiration} days left (expires on ${expires})`,
      daysUntilExpiration,
    };
  }
  return {
    kind: "success",
    message: `Certificate valid until ${expires} (${daysUntilExpiration} days remaining)`,
    daysUntilExpiration,
  };
}

export class SslCertificateCheck extends BaseCheck<SslCertificateConfig> {
  readonly checkType = "ssl_certificate";
  readonly name = "SSL Certificate";
  readonly description = "Checks TLS certificate validity and days until expiration";
  readonly configSchema = SslCertificateConfigSchema;

  constructor(private readonly fetchCertificate: CertificateFetcher = readPeerCertificate) {
    super();
  }

  async run(config: SslCertificateConfig, context: CheckContext): Promise<CheckOutcome> {
    const { hostname, port } = parseHostAndPort(config.hostname, config.port);
    const started = performance.now();

    let cert: CertificateInfo;
    try {
      cert = await this.fetchCertificate({
        hostname,
        port,
        timeoutMs: config.timeoutMs,
        signal: context.signal,
      });
    } catch (err) {
      const message = failureMessage(err);
      return this.error(`SSL error: ${message}`, performance.now() - started, {
        hostname,
        port,
        error: message,
        errorType: err instanceof Error ? err.name : typeof err,
      });
    }
    const elapsed = performance.now() - started;

    const rawData: Record<string, unknown> = {
      hostname,
      port,
      notBefore: cert.notBefore.toISOString(),
      notAfter: cert.notAfter.toISOString(),
      subject: cert.subject,
      issuer: cert.issuer,
      serialNumber: cert.serialNumber,
      fingerprint256: cert.fingerprint256,
      alternativeNames: cert.alternativeNames,
      authorized: cert.authorized,
    };
    if (cert.authorizationError) rawData.authorizationError = cert.authorizationError;
    if (config.checkChain) {
      rawData.cipher = cert.cipher;
      rawData.protocol = cert.protocol;
    }

    const classification = classifyCertificate(cert, config);
    rawData.daysUntilExpiration = classification.daysUntilExpiration;

    if (config.verifyHostname && cert.hostnameError && classification.kind !== "error") {
      return this.error(`Certificate hostname mismatch: ${cert.hostnameError}`, elapsed, rawData);
    }
    return classification.kind === "success"
      ? this.success(classification.message, elapsed, rawData)
      : classification.kind === "warning"
        ? this.warning(classification.message, elapsed, rawData)
        : this.error(classification.message, elapsed, rawData);
  }
}

/**
 * Default fetcher. Untrusted and expired certificates are still read so
 * they can be classified; trust problems are reported on the result.
 */
export function readPeerCertificate(request: CertificateRequest): Promise<CertificateInfo> {
  const signal = deadlineSignal(request.signal, request.timeoutMs);

  return new Promise<CertificateInfo>((resolve, reject) => {
    const socket = tls.connect({
      host: request.hostname,
      port: request.port,
      servername: request.hostname,
      rejectUnauthorized: false,
    });

    const onAbort = (): void => {
      socket.destroy();
      reject(new Error(`Connection to ${request.hostname}:${request.port} aborted: ${failureMessage(signal.reason)}`));
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });

    socket.once("secureConnect", () => {
      signal.removeEventListener("abort", onAbort);
      const peer = socket.getPeerCertificate();
      if (!peer || Object.keys(peer).length === 0) {
        socket.end();
        reject(new Error(`No certificate presented by ${request.hostname}:${request.port}`));
        return;
      }
      const identityError = tls.checkServerIdentity(request.hostname, peer);
      const cipher = socket.getCipher();
      resolve({
        notBefore: new Date(peer.valid_from),
        notAfter: new Date(peer.valid_to),
        subject: flattenNames(peer.subject),
        issuer: flattenNames(peer.issuer),
        serialNumber: peer.serialNumber,
        fingerprint256: peer.fingerprint256,
        alternativeNames: parseAltNames(peer.subjectaltname),
        authorized: socket.authorized,
        authorizationError: socket.authorizationError ? String(socket.authorizationError) : undefined,
        hostnameError: identityError?.message,
        cipher: cipher.name,
        protocol: socket.getProtocol() ?? undefined,
      });
      socket.end();
    });

    socket.once("error", (err) => {
      signal.removeEventListener("abort", onAbort);
      socket.destroy();
      reject(err);
    });
  });
}

function flattenNames(names: tls.Certificate | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!names) return result;
  for (const [key, value] of Object.entries(names)) {
    if (typeof value === "string") result[key] = value;
    else if (Array.isArray(value)) result[key] = value.join(", ");
  }
  return result;
}

/** `"DNS:a.example, DNS:b.example"` to `["a.example", "b.example"]` */
export function parseAltNames(subjectAltName: string | undefined): string[] {
  if (!subjectAltName) return [];
  return subjectAltName
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => entry.replace(/^[A-Za-z ]+:/, ""));
}
