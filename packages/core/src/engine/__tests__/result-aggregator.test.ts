import { describe, it, expect } from "vitest";
import { createOutcome } from "../../outcome";
import { aggregateResults, successRate, summarize, type BatchEntry } from "../result-aggregator";
import { parseCheckFile, toBatchResultPayload } from "../wire";
import { CheckFileError } from "../../errors";

function entry(index: number, kind: "success" | "warning" | "error", elapsedMs = 0): BatchEntry {
  return {
    index,
    identity: `site-${index}`,
    checkType: "website_status",
    outcome: createOutcome(kind, `${kind} ${index}`, elapsedMs, { index }),
  };
}

describe("aggregateResults", () => {
  it("should order entries by submission index", () => {
    const result = aggregateResults([entry(2, "success"), entry(0, "error"), entry(1, "warning")], {
      batchId: "batch-1",
      startedAt: 100,
      now: 350,
    });

    expect(result.results.map((e) => e.index)).toEqual([0, 1, 2]);
    expect(result.batchId).toBe("batch-1");
    expect(result.totalElapsedMs).toBe(250);
  });

  it("should count outcomes by kind", () => {
    const summary = summarize([entry(0, "success"), entry(1, "success"), entry(2, "error")]);

    expect(summary).toEqual({ success: 2, warning: 0, error: 1 });
  });

  it("should never report negative elapsed time", () => {
    const result = aggregateResults([], { batchId: "b", startedAt: 500, now: 400 });

    expect(result.totalElapsedMs).toBe(0);
  });
});

describe("successRate", () => {
  it("should round to one decimal place", () => {
    expect(successRate({ success: 2, warning: 1, error: 0 })).toBe(66.7);
    expect(successRate({ success: 1, warning: 0, error: 7 })).toBe(12.5);
  });

  it("should be 0 for an empty batch", () => {
    expect(successRate({ success: 0, warning: 0, error: 0 })).toBe(0);
  });
});

describe("toBatchResultPayload", () => {
  it("should convert to snake_case keys and seconds", () => {
    const result = aggregateResults([entry(0, "success", 1234), entry(1, "error", 50)], {
      batchId: "batch-7",
      startedAt: 0,
      now: 2500,
    });

    const payload = toBatchResultPayload(result);

    expect(payload.batch_id).toBe("batch-7");
    expect(payload.total_elapsed_seconds).toBe(2.5);
    expect(payload.summary).toEqual({ success: 1, warning: 0, error: 1 });
    expect(payload.results[0]).toEqual({
      identity: "site-0",
      check_type: "website_status",
      outcome_kind: "success",
      message: "success 0",
      elapsed_seconds: 1.234,
      raw_data: { index: 0 },
      timestamp: result.results[0]?.outcome.timestamp,
    });
    expect(payload.results[1]?.elapsed_seconds).toBe(0.05);
  });

  it("should produce JSON-serializable output", () => {
    const result = aggregateResults([entry(0, "warning", 10)], { batchId: "b", startedAt: 0, now: 10 });

    const roundTripped: unknown = JSON.parse(JSON.stringify(toBatchResultPayload(result)));

    expect(roundTripped).toEqual(toBatchResultPayload(result));
  });
});

describe("parseCheckFile", () => {
  it("should map wire entries to request inputs", () => {
    const requests = parseCheckFile([
      { id: "home", check_type: "website_status", config: { url: "https://example.com" } },
      { identity: "cert", plugin_type: "ssl_certificate", config: { hostname: "example.com" } },
      { check_type: "dns_record" },
    ]);

    expect(requests).toEqual([
      { identity: "home", checkType: "website_status", config: { url: "https://example.com" } },
      { identity: "cert", checkType: "ssl_certificate", config: { hostname: "example.com" } },
      { checkType: "dns_record" },
    ]);
  });

  it("should pass through entries it cannot map so they are rejected in place", () => {
    const requests = parseCheckFile([{ config: {} }, "not-an-object", { id: 5, check_type: "x" }]);

    expect(requests).toEqual([{ config: {} }, "not-an-object", { id: 5, check_type: "x" }]);
  });

  it("should throw CheckFileError when the document is not an array", () => {
    expect(() => parseCheckFile({ checks: [] })).toThrow(CheckFileError);
    expect(() => parseCheckFile({ checks: [] })).toThrow(
      "Check file must contain a JSON array of check entries",
    );
  });
});
