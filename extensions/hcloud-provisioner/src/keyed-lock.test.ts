import { describe, expect, it } from "vitest";

import { KeyedLock } from "./keyed-lock.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs work for one key in order", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.run("alice", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = lock.run("alice", async () => {
      events.push("second");
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(events).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(lock.size).toBe(0);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run("alice", () => gate.promise);

    expect(await lock.run("bob", async () => "done")).toBe("done");
    gate.resolve();
    await blocked;
  });

  it("releases the key after a failure", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run("alice", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await lock.run("alice", async () => 1)).toBe(1);
    expect(lock.size).toBe(0);
  });
});
