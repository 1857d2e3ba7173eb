import { describe, it, expect } from "vitest";
import { setTimeout as sleep } from "node:timers/promises";
import { BatchConfigError, PoolClosedError } from "../../errors";
import { WorkerPool } from "../worker-pool";

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("WorkerPool", () => {
  it.each([0, -1, 1.5, Number.NaN])("should reject size %s", (size) => {
    expect(() => new WorkerPool(size)).toThrow(BatchConfigError);
  });

  it("should start units up to its size and queue the rest", () => {
    const pool = new WorkerPool(2);
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()];
    const started: number[] = [];

    gates.forEach((gate, i) => {
      void pool.submit(() => {
        started.push(i);
        return gate.promise;
      });
    });

    expect(started).toEqual([0, 1]);
    expect(pool.activeCount).toBe(2);
    expect(pool.pendingCount).toBe(1);
  });

  it("should start the next queued unit when a slot frees", async () => {
    const pool = new WorkerPool(1);
    const first = deferred<string>();
    const started: string[] = [];

    const a = pool.submit(() => {
      started.push("a");
      return first.promise;
    });
    const b = pool.submit(async () => {
      started.push("b");
      return "b";
    });

    expect(started).toEqual(["a"]);
    first.resolve("a");

    await expect(a).resolves.toBe("a");
    await expect(b).resolves.toBe("b");
    expect(started).toEqual(["a", "b"]);
  });

  it("should run queued units in submission order", async () => {
    const pool = new WorkerPool(1);
    const order: number[] = [];

    await Promise.all(
      [0, 1, 2, 3].map((i) =>
        pool.submit(async () => {
          order.push(i);
          await sleep(5);
        }),
      ),
    );

    expect(order).toEqual([0, 1, 2, 3]);
  });

  it("should isolate a failing unit", async () => {
    const pool = new WorkerPool(2);

    const settled = await Promise.allSettled([
      pool.submit(async () => {
        throw new Error("unit failed");
      }),
      pool.submit(() => {
        throw new Error("sync failure");
      }),
      pool.submit(async () => 42),
    ]);

    expect(settled.map((result) => result.status)).toEqual(["rejected", "rejected", "fulfilled"]);
    expect(settled[0]).toMatchObject({ reason: expect.objectContaining({ message: "unit failed" }) });
    expect(settled[1]).toMatchObject({ reason: expect.objectContaining({ message: "sync failure" }) });
    expect(settled[2]).toEqual({ status: "fulfilled", value: 42 });
    expect(pool.activeCount).toBe(0);
  });

  it("should reject submissions after close", async () => {
    const pool = new WorkerPool(1);
    pool.close();

    await expect(pool.submit(async () => 1)).rejects.toThrow(PoolClosedError);
    expect(pool.isClosed).toBe(true);
  });

  it("should still run queued units after a plain close", async () => {
    const pool = new WorkerPool(1);
    const gate = deferred<void>();
    const running = pool.submit(() => gate.promise);
    const queued = pool.submit(async () => "ran");

    pool.close();
    gate.resolve();

    await running;
    await expect(queued).resolves.toBe("ran");
  });

  it("should abandon queued units but let in-flight ones finish", async () => {
    const pool = new WorkerPool(1);
    const gate = deferred<string>();
    let queuedStarted = false;

    const running = pool.submit(() => gate.promise);
    const queued = pool.submit(async () => {
      queuedStarted = true;
    });

    pool.close({ abandonQueued: true });

    await expect(queued).rejects.toThrow("Worker pool closed before the unit started");
    expect(pool.activeCount).toBe(1);
    expect(pool.pendingCount).toBe(0);

    gate.resolve("done");
    await expect(running).resolves.toBe("done");
    expect(queuedStarted).toBe(false);
  });

  it("should resolve onIdle once all work has settled", async () => {
    const pool = new WorkerPool(2);
    await expect(pool.onIdle()).resolves.toBeUndefined();

    let finished = 0;
    for (let i = 0; i < 4; i++) {
      void pool.submit(async () => {
        await sleep(10);
        finished++;
      });
    }

    await pool.onIdle();
    expect(finished).toBe(4);
    expect(pool.activeCount).toBe(0);
  });

  it("should wait for in-flight units on shutdown", async () => {
    const pool = new WorkerPool(1);
    let finished = false;
    void pool.submit(async () => {
      await sleep(20);
      finished = true;
    });

    await pool.shutdown();

    expect(finished).toBe(true);
    expect(pool.isClosed).toBe(true);
  });
});
