import { describe, expect, it } from "vitest";
import { KeyedMutex } from "./keyed-mutex";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs tasks on the same key one at a time, in call order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("k", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("k", async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(mutex.isLocked("k")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked("k")).toBe(false);
  });

  it("does not hold other keys back", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const blocked = mutex.runExclusive("a", () => gate.promise);
    await expect(mutex.runExclusive("b", async () => "done")).resolves.toBe("done");
    gate.resolve();
    await blocked;
  });

  it("passes a task's error to its caller and keeps the queue going", async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.runExclusive("k", async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive("k", async () => 42);
    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });
});
