/**
 * Tests for TaskQueue.
 *
 * Verifies:
 * - Concurrency bound and FIFO start order
 * - Jobs never start inline in add()
 * - onIdle / stop semantics
 * - Rejected jobs are reported, the queue keeps going
 */

import { describe, it, expect, vi } from "vitest";
import { TaskQueue } from "../src/task-queue.js";
import { TaskError } from "../src/task-registry.js";
import { deferred } from "./helpers.js";

describe("TaskQueue", () => {
  it("rejects a non-positive concurrency", () => {
    expect(() => new TaskQueue({ concurrency: 0, onError: () => undefined })).toThrow(RangeError);
  });

  it("does not run a job inside add()", async () => {
    const queue = new TaskQueue({ onError: () => undefined });
    const started: string[] = [];

    queue.add(async () => {
      started.push("job");
    });

    expect(started).toEqual([]);
    await queue.onIdle();
    expect(started).toEqual(["job"]);
  });

  it("runs at most `concurrency` jobs at once, in arrival order", async () => {
    const queue = new TaskQueue({ concurrency: 2, onError: () => undefined });
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    gates.forEach((gate, i) => {
      queue.add(async () => {
        started.push(i);
        await gate.promise;
      });
    });
    await Promise.resolve();

    expect(queue.active).toBe(2);
    expect(queue.pending).toBe(1);
    expect(started).toEqual([0, 1]);

    gates[0]!.resolve();
    gates[1]!.resolve();
    gates[2]!.resolve();
    await queue.onIdle();

    expect(started).toEqual([0, 1, 2]);
    expect(queue.isIdle).toBe(true);
  });

  it("resolves onIdle immediately when nothing is queued", async () => {
    const queue = new TaskQueue({ onError: () => undefined });

    await expect(queue.onIdle()).resolves.toBeUndefined();
  });

  it("reports a rejected job and continues with the next", async () => {
    const onError = vi.fn();
    const queue = new TaskQueue({ concurrency: 1, onError });
    const ran = vi.fn();

    queue.add(async () => {
      throw new Error("worker blew up");
    });
    queue.add(async () => {
      ran();
    });
    await queue.onIdle();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]![0]).toBeInstanceOf(Error);
    expect(ran).toHaveBeenCalledTimes(1);
  });

  it("waits for queued jobs on stop, then refuses new ones", async () => {
    const queue = new TaskQueue({ concurrency: 1, onError: () => undefined });
    const gate = deferred();
    const finished: string[] = [];
    queue.add(async () => {
      await gate.promise;
      finished.push("a");
    });
    queue.add(async () => {
      finished.push("b");
    });

    const stopped = queue.stop();
    expect(queue.isAccepting).toBe(false);
    expect(() => queue.add(async () => undefined)).toThrow(TaskError);

    gate.resolve();
    await stopped;

    expect(finished).toEqual(["a", "b"]);
  });
});
