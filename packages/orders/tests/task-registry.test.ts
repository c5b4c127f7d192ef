/**
 * Tests for TaskRegistry.
 *
 * Verifies:
 * - Register: pending, null result/error, frozen snapshot
 * - Valid transitions and their timestamps
 * - Terminal states reject further transitions
 * - Unknown task ids
 */

import { describe, it, expect } from "vitest";
import { MonotonicClock } from "@ordergrid/store";
import type { Order } from "@ordergrid/types";
import { TaskError, TaskRegistry } from "../src/task-registry.js";

function makeRegistry(): TaskRegistry {
  let t = Date.parse("2025-01-16T10:00:00.000Z");
  let n = 0;
  return new TaskRegistry({
    clock: new MonotonicClock(() => {
      const current = t;
      t += 1000;
      return current;
    }),
    generateId: () => `t-${++n}`,
  });
}

const ORDER: Order = {
  order_id: "o-1",
  user_id: "u-1",
  order_date: "2025-01-16T10:00:00.000Z",
  total_price: 10,
  status: "pending",
  created_at: "2025-01-16T10:00:00.000Z",
  updated_at: "2025-01-16T10:00:00.000Z",
  links: {
    self: "/orders/o-1",
    payments: "/payments?order_id=o-1",
    order_details: "/order-details?order_id=o-1",
  },
};

// =============================================================================
// Register
// =============================================================================

describe("register", () => {
  it("creates a pending task", () => {
    const registry = makeRegistry();

    const task = registry.register();

    expect(task).toEqual({
      task_id: "t-1",
      status: "pending",
      created_at: "2025-01-16T10:00:00.000Z",
      updated_at: "2025-01-16T10:00:00.000Z",
      result: null,
      error: null,
    });
    expect(registry.get("t-1")).toBe(task);
  });

  it("freezes the snapshot", () => {
    const registry = makeRegistry();

    expect(Object.isFrozen(registry.register())).toBe(true);
  });
});

// =============================================================================
// Transitions
// =============================================================================

describe("transitions", () => {
  it("moves pending → processing → completed", () => {
    const registry = makeRegistry();
    const { task_id } = registry.register();

    const processing = registry.markProcessing(task_id);
    const completed = registry.complete(task_id, { order_id: "o-1", order: ORDER });

    expect(processing.status).toBe("processing");
    expect(processing.updated_at).toBe("2025-01-16T10:00:01.000Z");
    expect(completed).toEqual({
      task_id,
      status: "completed",
      created_at: "2025-01-16T10:00:00.000Z",
      updated_at: "2025-01-16T10:00:02.000Z",
      result: { order_id: "o-1", order: ORDER },
      error: null,
    });
  });

  it("records the error message on failure", () => {
    const registry = makeRegistry();
    const { task_id } = registry.register();
    registry.markProcessing(task_id);

    const failed = registry.fail(task_id, "inventory unavailable");

    expect(failed.status).toBe("failed");
    expect(failed.error).toBe("inventory unavailable");
    expect(failed.result).toBeNull();
  });

  it("allows failing a task that never started", () => {
    const registry = makeRegistry();
    const { task_id } = registry.register();

    expect(registry.fail(task_id, "cancelled").status).toBe("failed");
  });

  it("does not mutate earlier snapshots", () => {
    const registry = makeRegistry();
    const pending = registry.register();

    registry.markProcessing(pending.task_id);

    expect(pending.status).toBe("pending");
    expect(registry.require(pending.task_id).status).toBe("processing");
  });

  it("rejects completing a pending task", () => {
    const registry = makeRegistry();
    const { task_id } = registry.register();

    expect(() => registry.complete(task_id, { order_id: "o-1", order: ORDER })).toThrow(
      "Cannot transition task 't-1' from 'pending' to 'completed'",
    );
  });

  it.each(["completed", "failed"] as const)("keeps a %s task immutable", (terminal) => {
    const registry = makeRegistry();
    const { task_id } = registry.register();
    registry.markProcessing(task_id);
    const final =
      terminal === "completed"
        ? registry.complete(task_id, { order_id: "o-1", order: ORDER })
        : registry.fail(task_id, "boom");

    for (const attempt of [
      () => registry.markProcessing(task_id),
      () => registry.complete(task_id, { order_id: "o-1", order: ORDER }),
      () => registry.fail(task_id, "again"),
    ]) {
      try {
        attempt();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(TaskError);
        expect(err).toMatchObject({ code: "INVALID_TRANSITION" });
      }
    }
    expect(registry.require(task_id)).toBe(final);
  });
});

// =============================================================================
// Queries
// =============================================================================

describe("queries", () => {
  it("throws TASK_NOT_FOUND for an unknown id", () => {
    const registry = makeRegistry();

    expect(() => registry.require("nope")).toThrow(TaskError);
    expect(() => registry.require("nope")).toThrow("Task 'nope' not found");
  });

  it("lists tasks by status", () => {
    const registry = makeRegistry();
    registry.register();
    const second = registry.register();
    registry.markProcessing(second.task_id);

    expect(registry.list("pending").map((t) => t.task_id)).toEqual(["t-1"]);
    expect(registry.list().map((t) => t.task_id)).toEqual(["t-1", "t-2"]);
    expect(registry.size).toBe(2);
  });
});
