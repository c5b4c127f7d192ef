/**
 * Tests for KeyLock.
 *
 * Verifies:
 * - Same-key operations run strictly one after another, in order
 * - Different keys do not wait on each other
 * - A rejected operation releases the key
 */

import { describe, it, expect } from "vitest";
import { KeyLock } from "../src/key-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyLock", () => {
  it("serializes operations on the same key", async () => {
    const lock = new KeyLock();
    const log: string[] = [];
    const gate = deferred();

    const first = lock.run("k", async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
    });
    const second = lock.run("k", () => {
      log.push("second");
    });

    // Let microtasks run: second must still be waiting on first
    await Promise.resolve();
    await Promise.resolve();
    expect(log).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block operations on other keys", async () => {
    const lock = new KeyLock();
    const gate = deferred();
    const log: string[] = [];

    const blocked = lock.run("a", async () => {
      await gate.promise;
      log.push("a");
    });
    await lock.run("b", () => {
      log.push("b");
    });

    expect(log).toEqual(["b"]);

    gate.resolve();
    await blocked;
    expect(log).toEqual(["b", "a"]);
  });

  it("releases the key after a rejected operation", async () => {
    const lock = new KeyLock();

    await expect(
      lock.run("k", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    const value = await lock.run("k", () => 42);
    expect(value).toBe(42);
  });

  it("forgets keys once their queue drains", async () => {
    const lock = new KeyLock();

    await Promise.all([lock.run("a", () => 1), lock.run("b", () => 2)]);

    expect(lock.heldKeys).toBe(0);
  });

  it("returns each operation's own result", async () => {
    const lock = new KeyLock();

    const results = await Promise.all([
      lock.run("k", () => "one"),
      lock.run("k", async () => "two"),
    ]);

    expect(results).toEqual(["one", "two"]);
  });
});
