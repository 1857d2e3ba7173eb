import { describe, it, expect } from "vitest";
import {
  SslCertificateCheck,
  SslCertificateConfigSchema,
  classifyCertificate,
  parseAltNames,
  parseHostAndPort,
  type CertificateInfo,
  type CertificateRequest,
} from "../ssl-certificate.check";

const DAY = 24 * 60 * 60 * 1000;

function certificateExpiringIn(days: number, overrides: Partial<CertificateInfo> = {}): CertificateInfo {
  const now = Date.now();
  return {
    notBefore: new Date(now - 90 * DAY),
    // Half a day of headroom keeps the floor() stable while the test runs
    notAfter: new Date(now + days * DAY + DAY / 2),
    subject: { CN: "status.example.test" },
    issuer: { CN: "Example Test CA" },
    serialNumber: "0A1B2C",
    fingerprint256: "AA:BB:CC",
    alternativeNames: ["status.example.test"],
    authorized: true,
    cipher: "TLS_AES_256_GCM_SHA384",
    protocol: "TLSv1.3",
    ...overrides,
  };
}

describe("parseHostAndPort", () => {
  it("should default a bare host to 443", () => {
    expect(parseHostAndPort("example.com")).toEqual({ hostname: "example.com", port: 443 });
    expect(parseHostAndPort("example.com", 8443)).toEqual({ hostname: "example.com", port: 8443 });
  });

  it("should take host and port from a URL", () => {
    expect(parseHostAndPort("https://example.com:9443/path")).toEqual({ hostname: "example.com", port: 9443 });
    expect(parseHostAndPort("https://example.com/path")).toEqual({ hostname: "example.com", port: 443 });
  });

  it("should default plain http URLs to port 80 unless a port is configured", () => {
    expect(parseHostAndPort("http://example.com")).toEqual({ hostname: "example.com", port: 80 });
    expect(parseHostAndPort("http://example.com", 8080)).toEqual({ hostname: "example.com", port: 8080 });
  });
});

describe("classifyCertificate", () => {
  const thresholds = { warningDays: 30, criticalDays: 14 };
  const now = new Date("2026-06-01T00:00:00.000Z");
  const validFrom = new Date("2026-01-01T00:00:00.000Z");

  it("should succeed well before expiry", () => {
    const result = classifyCertificate(
      { notBefore: validFrom, notAfter: new Date("2026-09-01T00:00:00.000Z") },
      thresholds,
      now,
    );

    expect(result).toEqual({
      kind: "success",
      message: "Certificate valid until 2026-09-01T00:00:00.000Z (92 days remaining)",
      daysUntilExpiration: 92,
    });
  });

  it("should warn inside the warning window", () => {
    const result = classifyCertificate(
      { notBefore: validFrom, notAfter: new Date("2026-06-21T00:00:00.000Z") },
      thresholds,
      now,
    );

    expect(result.kind).toBe("warning");
    expect(result.message).toBe(
      "Certificate expiration approaching: 20 days left (expires on 2026-06-21T00:00:00.000Z)",
    );
  });

  it("should fail inside the critical window", () => {
    const result = classifyCertificate(
      { notBefore: validFrom, notAfter: new Date("2026-06-15T00:00:00.000Z") },
      thresholds,
      now,
    );

    expect(result.kind).toBe("error");
    expect(result.message).toBe("Certificate expires very soon: 14 days left (expires on 2026-06-15T00:00:00.000Z)");
  });

  it("should fail for an expired certificate", () => {
    const result = classifyCertificate(
      { notBefore: validFrom, notAfter: new Date("2026-05-01T00:00:00.000Z") },
      thresholds,
      now,
    );

    expect(result).toEqual({
      kind: "error",
      message: "Certificate expired on 2026-05-01T00:00:00.000Z",
      daysUntilExpiration: -31,
    });
  });

  it("should fail for a certificate that is not valid yet", () => {
    const result = classifyCertificate(
      { notBefore: new Date("2026-07-01T00:00:00.000Z"), notAfter: new Date("2027-07-01T00:00:00.000Z") },
      thresholds,
      now,
    );

    expect(result.kind).toBe("error");
    expect(result.message).toBe("Certificate not yet valid. Valid from 2026-07-01T00:00:00.000Z");
  });
});

describe("parseAltNames", () => {
  it("should strip the name type prefixes", () => {
    expect(parseAltNames("DNS:example.com, DNS:www.example.com, IP Address:10.0.0.1")).toEqual([
      "example.com",
      "www.example.com",
      "10.0.0.1",
    ]);
    expect(parseAltNames(undefined)).toEqual([]);
  });
});

describe("SslCertificateCheck", () => {
  const signal = new AbortController().signal;

  it("should classify the fetched certificate", async () => {
    const requests: CertificateRequest[] = [];
    const check = new SslCertificateCheck(async (request) => {
      requests.push(request);
      return certificateExpiringIn(20);
    });

    const outcome = await check.run(SslCertificateConfigSchema.parse({ hostname: "https://status.example.test" }), {
      signal,
    });

    expect(requests).toEqual([{ hostname: "status.example.test", port: 443, timeoutMs: 30_000, signal }]);
    expect(outcome.kind).toBe("warning");
    expect(outcome.rawData).toMatchObject({
      hostname: "status.example.test",
      port: 443,
      daysUntilExpiration: 20,
      subject: { CN: "status.example.test" },
      authorized: true,
    });
    expect(outcome.rawData).not.toHaveProperty("cipher");
  });

  it("should include cipher details when checking the chain", async () => {
    const check = new SslCertificateCheck(async () => certificateExpiringIn(200));

    const outcome = await check.run(
      SslCertificateConfigSchema.parse({ hostname: "status.example.test", checkChain: true }),
      { signal },
    );

    expect(outcome.kind).toBe("success");
    expect(outcome.rawData).toMatchObject({ cipher: "TLS_AES_256_GCM_SHA384", protocol: "TLSv1.3" });
  });

  it("should fail on a hostname mismatch unless verification is off", async () => {
    const mismatched = certificateExpiringIn(200, { hostnameError: "Host: other.test. is not in the cert's altnames" });
    const check = new SslCertificateCheck(async () => mismatched);

    const verified = await check.run(SslCertificateConfigSchema.parse({ hostname: "other.test" }), { signal });
    const unverified = await check.run(
      SslCertificateConfigSchema.parse({ hostname: "other.test", verifyHostname: false }),
      { signal },
    );

    expect(verified.kind).toBe("error");
    expect(verified.message).toBe(
      "Certificate hostname mismatch: Host: other.test. is not in the cert's altnames",
    );
    expect(unverified.kind).toBe("success");
  });

  it("should report connection failures as SSL errors", async () => {
    const check = new SslCertificateCheck(async () => {
      throw new Error("connect ECONNREFUSED 127.0.0.1:443");
    });

    const outcome = await check.run(SslCertificateConfigSchema.parse({ hostname: "localhost" }), { signal });

    expect(outcome.kind).toBe("error");
    expect(outcome.message).toBe("SSL error: connect ECONNREFUSED 127.0.0.1:443");
    expect(outcome.rawData).toEqual({
      hostname: "localhost",
      port: 443,
      error: "connect ECONNREFUSED 127.0.0.1:443",
      errorType: "Error",
    });
  });

  it("should reject thresholds in the wrong order", () => {
    const parsed = SslCertificateConfigSchema.safeParse({ hostname: "example.com", warningDays: 5, criticalDays: 10 });

    expect(parsed.success).toBe(false);
  });
});
