import { describe, it, expect } from "vitest";
import { createDefaultRegistry, CheckRegistry } from "../checks";
import { DuplicateCheckError } from "../errors";
import { createFakeRegistry, SleepCheck } from "../engine/__tests__/fixtures";

describe("CheckRegistry", () => {
  it("should start empty", () => {
    const registry = CheckRegistry.createEmpty();

    expect(registry.size).toBe(0);
    expect(registry.getCheckTypes()).toEqual([]);
    expect(registry.get("sleep")).toBeUndefined();
  });

  it("should look up registered checks by type", () => {
    const { registry, sleep } = createFakeRegistry();

    expect(registry.get("sleep")).toBe(sleep);
    expect(registry.getCheckTypes()).toEqual(["sleep", "explode", "malformed"]);
  });

  it("should refuse a duplicate check type", () => {
    const { registry } = createFakeRegistry();

    expect(() => registry.register(new SleepCheck())).toThrow(DuplicateCheckError);
    expect(() => registry.register(new SleepCheck())).toThrow(
      "Check type 'sleep' is already registered. Existing: Sleep",
    );
  });

  it("should unregister checks", () => {
    const { registry } = createFakeRegistry();

    expect(registry.unregister("explode")).toBe(true);
    expect(registry.unregister("explode")).toBe(false);
    expect(registry.size).toBe(2);
  });

  it("should describe checks with their configuration keys", () => {
    const { registry } = createFakeRegistry();

    expect(registry.describe()[0]).toEqual({
      checkType: "sleep",
      name: "Sleep",
      description: "Waits, then reports the configured outcome",
      configKeys: ["ms", "kind", "fail", "honorAbort"],
    });
  });
});

describe("createDefaultRegistry", () => {
  it("should register every built-in check", () => {
    const registry = createDefaultRegistry();

    expect(registry.getCheckTypes()).toEqual(["website_status", "ssl_certificate", "mail_server", "dns_record"]);
  });

  it("should see through refined schemas when describing", () => {
    const ssl = createDefaultRegistry()
      .describe()
      .find((check) => check.checkType === "ssl_certificate");

    expect(ssl?.configKeys).toEqual([
      "hostname",
      "port",
      "timeoutMs",
      "warningDays",
      "criticalDays",
      "checkChain",
      "verifyHostname",
    ]);
  });
});
