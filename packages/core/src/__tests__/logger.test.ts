import { describe, it, expect, beforeEach } from "vitest";
import { BatchLogger } from "../logger";

describe("BatchLogger", () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
  });

  it("should write bracket-tagged key=value lines", () => {
    const logger = new BatchLogger({ logFn: (line) => lines.push(line) });

    logger.batchStarted("b1", 3, 1, 8);
    logger.checkTimedOut("b1", "home", 1000);
    logger.batchInterrupted("b1", "timeout", 2);
    logger.batchCompleted("b1", { success: 1, warning: 0, error: 2 }, 1234.6);

    expect(lines).toEqual([
      "[BATCH:START] id=b1 total=3 chunks=1 workers=8",
      "[BATCH:TIMEOUT] id=b1 identity=home scope=check timeoutMs=1000",
      "[BATCH:ABORT] id=b1 reason=timeout unresolved=2",
      "[BATCH:END] id=b1 success=1 warning=0 error=2 elapsedMs=1235",
    ]);
  });

  it("should only log completed checks when verbose", () => {
    const quiet = new BatchLogger({ logFn: (line) => lines.push(line) });
    quiet.checkCompleted("b1", "home", "website_status", "success", 10, "ok");
    expect(lines).toEqual([]);

    const verbose = new BatchLogger({ verbose: true, logFn: (line) => lines.push(line) });
    verbose.checkCompleted("b1", "home", "website_status", "success", 10.4, "ok");
    expect(lines).toEqual([
      "[BATCH:CHECK] id=b1 identity=home type=website_status kind=success elapsedMs=10 message=ok",
    ]);
  });

  it("should truncate long messages", () => {
    const logger = new BatchLogger({ maxMessageLength: 5, logFn: (line) => lines.push(line) });

    logger.requestRejected("b1", "check-2", ["checkType: Required"]);

    expect(lines).toEqual(["[BATCH:REJECT] id=b1 identity=check-2 issues=check...(truncated)"]);
  });
});
