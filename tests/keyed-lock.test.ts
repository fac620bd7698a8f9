import { describe, it, expect } from "vitest";
import { createKeyedLock } from "../src/lib/keyed-lock.js";
import { sleep } from "../src/lib/retry.js";

describe("keyed lock", () => {
  it("serializes holders of the same key in arrival order", async () => {
    const lock = createKeyedLock();
    const events: string[] = [];

    const first = lock.run("a", async () => {
      events.push("first:start");
      await sleep(20);
      events.push("first:end");
    });
    const second = lock.run("a", async () => {
      events.push("second:start");
      events.push("second:end");
    });

    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("does not block other keys", async () => {
    const lock = createKeyedLock();
    const events: string[] = [];

    const slow = lock.run("a", async () => {
      await sleep(30);
      events.push("a");
    });
    const fast = lock.run("b", async () => {
      events.push("b");
    });

    await Promise.all([slow, fast]);
    expect(events).toEqual(["b", "a"]);
  });

  it("a failing holder does not wedge the key", async () => {
    const lock = createKeyedLock();
    await expect(lock.run("a", async () => { throw new Error("nope"); })).rejects.toThrow("nope");
    await expect(lock.run("a", async () => 42)).resolves.toBe(42);
  });

  it("drops drained keys", async () => {
    const lock = createKeyedLock();
    await lock.run("a", async () => "x");
    await sleep(0);
    expect(lock.activeKeys).toBe(0);
  });
});
